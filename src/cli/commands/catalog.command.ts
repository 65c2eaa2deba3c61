// src/cli/commands/catalog.command.ts
import type { Command } from 'commander';
import { PlanningCatalogService } from '../../core/catalog';
import { CliContext } from '../context';

export function registerCatalogCommands(program: Command, context: CliContext): void {
    program
        .command('catalog:replace')
        .description('Replace the planning catalog with a new workbook')
        .argument('<file>', 'new catalog (.xlsx, .xls or .csv)')
        .action(async (file: string) => {
            const catalog = context.container.resolve(PlanningCatalogService);
            const entries = await catalog.replaceSource(await context.io.readFile(file));
            context.io.out(`Planning catalog replaced: ${entries} entries.`);
        });
}
