// src/cli/commands/records.command.ts
import type { Command } from 'commander';
import { NotFoundError } from '../../core/common/errors';
import { toRecordView, VerificationRecordFilter } from '../../core/common/interfaces/models';
import {
    IVerificationRecordRepository,
    VERIFICATION_RECORD_REPOSITORY_TOKEN
} from '../../core/common/interfaces/repositories';
import { IntegrityService } from '../../core/integrity';
import { CliContext, printJson } from '../context';
import { parsePositiveInt } from './import.command';

interface RecordsCommandOptions {
    readonly region?: string;
    readonly limit?: number;
}

function resolveStore(context: CliContext): IVerificationRecordRepository {
    return context.container.resolve<IVerificationRecordRepository>(VERIFICATION_RECORD_REPOSITORY_TOKEN);
}

export function registerRecordCommands(program: Command, context: CliContext): void {
    program
        .command('records')
        .description('List stored records, newest first')
        .option('-r, --region <code>', 'only records of this region')
        .option('-l, --limit <n>', 'maximum number of records', parsePositiveInt)
        .action(async (options: RecordsCommandOptions) => {
            const filter: VerificationRecordFilter = options.region ? { region: options.region.trim().toUpperCase() } : {};
            const records = await resolveStore(context).list(filter, options.limit);
            printJson(context.io, records.map(toRecordView));
        });

    program
        .command('record')
        .description('Show one stored record')
        .argument('<id>', 'record id')
        .action(async (id: string) => {
            const record = await resolveStore(context).findById(id);
            if (!record) {
                throw new NotFoundError(`No record with id ${id}`);
            }
            printJson(context.io, toRecordView(record));
        });

    program
        .command('record:delete')
        .description('Delete one stored record')
        .argument('<id>', 'record id')
        .action(async (id: string) => {
            const deleted = await resolveStore(context).delete(id);
            if (!deleted) {
                throw new NotFoundError(`No record with id ${id}`);
            }
            context.io.out(`Deleted record ${id}`);
        });

    program
        .command('integrity')
        .description('Count stored records and report malformed ones')
        .action(async () => {
            const report = await context.container.resolve(IntegrityService).check();
            printJson(context.io, report);
            context.exitCode = report.invalidRecords > 0 ? 1 : 0;
        });
}
