// src/cli/commands/export.command.ts
import type { Command } from 'commander';
import {
    IVerificationRecordRepository,
    VERIFICATION_RECORD_REPOSITORY_TOKEN
} from '../../core/common/interfaces/repositories';
import { ReportGeneratorService } from '../../core/reporting';
import { CliContext } from '../context';

export function registerExportCommand(program: Command, context: CliContext): void {
    program
        .command('export')
        .description('Write every stored record to an xlsx workbook, newest first')
        .argument('<file>', 'output .xlsx path')
        .action(async (file: string) => {
            const store = context.container.resolve<IVerificationRecordRepository>(VERIFICATION_RECORD_REPOSITORY_TOKEN);
            const reports = context.container.resolve(ReportGeneratorService);
            const records = await store.list();
            await context.io.writeFile(file, await reports.exportRecords(records));
            context.io.out(`Exported ${records.length} record(s) to ${file}`);
        });
}
