// src/cli/program.ts
import { Command } from 'commander';
import { registerCatalogCommands } from './commands/catalog.command';
import { registerExportCommand } from './commands/export.command';
import { registerImportCommand } from './commands/import.command';
import { registerRecordCommands } from './commands/records.command';
import { registerValidateCommand } from './commands/validate.command';
import { CliContext } from './context';

export function createProgram(context: CliContext): Command {
    const program = new Command()
        .name('invoice-receipt-validator')
        .description('Validate received invoices against the planning catalog and manage verification records');

    registerValidateCommand(program, context);
    registerImportCommand(program, context);
    registerExportCommand(program, context);
    registerCatalogCommands(program, context);
    registerRecordCommands(program, context);

    return program;
}
