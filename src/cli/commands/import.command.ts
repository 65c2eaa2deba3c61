// src/cli/commands/import.command.ts
import { InvalidArgumentError, type Command } from 'commander';
import { BatchImporterService } from '../../core/importing';
import { CliContext, printJson } from '../context';

interface ImportCommandOptions {
    readonly batchSize?: number;
}

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

export function registerImportCommand(program: Command, context: CliContext): void {
    program
        .command('import')
        .description('Bulk-import records from an xlsx, csv or JSON file; safe to re-run')
        .argument('<file>', 'source file')
        .option('-b, --batch-size <n>', 'rows per store batch', parsePositiveInt)
        .action(async (file: string, options: ImportCommandOptions) => {
            const importer = context.container.resolve(BatchImporterService);
            const content = await context.io.readFile(file);
            const summary = await importer.importFile(content, { batchSize: options.batchSize });
            printJson(context.io, summary);
            context.exitCode = summary.failed > 0 ? 1 : 0;
        });
}
