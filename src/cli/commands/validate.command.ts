// src/cli/commands/validate.command.ts
import type { Command } from 'commander';
import { ValidationService } from '../../core/validation';
import { CliContext, printJson } from '../context';

/**
 * validate <region> <invoice> <order> <receivedDate>
 * Prints the validation result; exits 1 when the result is not valid.
 */
export function registerValidateCommand(program: Command, context: CliContext): void {
    program
        .command('validate')
        .description('Check a received invoice against the planning catalog and record the outcome')
        .argument('<region>', 'region code, e.g. SP')
        .argument('<invoice>', 'invoice number')
        .argument('<order>', 'order number')
        .argument('<receivedDate>', 'date the invoice was received, e.g. 2025-05-20 or 20/05/2025')
        .action(async (region: string, invoice: string, order: string, receivedDate: string) => {
            const validation = context.container.resolve(ValidationService);
            const result = await validation.validate(region, invoice, order, receivedDate);
            printJson(context.io, result);
            context.exitCode = result.valid ? 0 : 1;
        });
}
