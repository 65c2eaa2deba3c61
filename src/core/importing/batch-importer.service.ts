// src/core/importing/batch-importer.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { DuplicateRecordError, FileParsingError } from '../common/errors';
import { ImportFailure, ImportSummary, NewVerificationRecord } from '../common/interfaces/models';
import {
    IVerificationRecordRepository,
    VERIFICATION_RECORD_REPOSITORY_TOKEN
} from '../common/interfaces/repositories';
import { chunk, errorMessage } from '../common/utils';
import { FileParserService, HeaderMap } from '../parsing';
import { normalizeImportRow } from './import-row.utils';
import { IBatchImporter, ImportField, ImportOptions, ImportRow } from './interfaces/services';

const REQUIRED_FIELDS: readonly ImportField[] = ['region', 'invoiceNumber', 'orderNumber', 'receivedDate'];

export const IMPORT_HEADER_MAP: HeaderMap<ImportField> = {
    'uf': 'region', 'region': 'region', 'region code': 'region',
    'nfe': 'invoiceNumber', 'nf': 'invoiceNumber', 'nota': 'invoiceNumber',
    'invoice': 'invoiceNumber', 'invoice number': 'invoiceNumber', 'invoicenumber': 'invoiceNumber',
    'pedido': 'orderNumber', 'order': 'orderNumber', 'order number': 'orderNumber', 'ordernumber': 'orderNumber',
    'data recebimento': 'receivedDate', 'data de recebimento': 'receivedDate', 'recebimento': 'receivedDate',
    'received date': 'receivedDate', 'receiveddate': 'receivedDate',
    'data planejada': 'plannedDate', 'planejamento': 'plannedDate', 'planned date': 'plannedDate', 'planneddate': 'plannedDate',
    'decisao': 'decision', 'decision': 'decision',
    'mensagem': 'message', 'message': 'message',
    'valido': 'valid', 'valid': 'valid', 'isvalid': 'valid',
};

interface SourceRow {
    line: number;
    values: ImportRow;
}

interface PreparedRow {
    line: number;
    key: string;
    record: NewVerificationRecord;
}

/** Mutable tally shared by the import phases */
class ImportTally {
    imported = 0;
    skipped = 0;
    readonly importedKeys: string[] = [];
    readonly failures: ImportFailure[] = [];

    constructor(private readonly total: number) { }

    fail(line: number, reason: string, key?: string): void {
        this.failures.push({ line, key, reason });
    }

    summary(): ImportSummary {
        return {
            total: this.total,
            imported: this.imported,
            skipped: this.skipped,
            failed: this.failures.length,
            importedKeys: this.importedKeys,
            failures: this.failures,
        };
    }
}

@singleton()
@injectable()
export class BatchImporterService implements IBatchImporter {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(FileParserService) private fileParser: FileParserService,
        @inject(VERIFICATION_RECORD_REPOSITORY_TOKEN) private store: IVerificationRecordRepository
    ) {
        this.logger.info('BatchImporterService initialized.');
    }

    async importRows(rows: ImportRow[], options?: ImportOptions): Promise<ImportSummary> {
        return this.run(rows.map((values, index) => ({ line: index + 1, values })), options);
    }

    async importFile(fileBuffer: Buffer, options?: ImportOptions): Promise<ImportSummary> {
        const table = await this.fileParser.parseTable(fileBuffer, IMPORT_HEADER_MAP);
        const missing = REQUIRED_FIELDS.filter(field => !table.matchedFields.has(field));
        if (missing.length > 0) {
            throw new FileParsingError(`Import file is missing required columns: ${missing.join(', ')} (found: ${table.headers.join(', ')})`);
        }
        return this.run(table.rows.map(row => ({ line: row.originalLineNumber, values: row.values })), options);
    }

    private async run(rows: SourceRow[], options?: ImportOptions): Promise<ImportSummary> {
        const batchSize = options?.batchSize ?? config.importer.batchSize;
        if (!Number.isInteger(batchSize) || batchSize < 1) {
            throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
        }
        const tally = new ImportTally(rows.length);
        this.logger.info(`Import started: ${rows.length} row(s), batch size ${batchSize}.`);

        // Normalize, then keep the first occurrence of each key
        const prepared: PreparedRow[] = [];
        const seen = new Set<string>();
        for (const { line, values } of rows) {
            const normalized = normalizeImportRow(values);
            if (!normalized.ok) {
                tally.fail(line, normalized.reason, normalized.key);
                continue;
            }
            if (seen.has(normalized.key)) {
                tally.skipped++;
                this.logger.debug(`Line ${line}: ${normalized.key} repeats an earlier line, skipped.`);
                continue;
            }
            seen.add(normalized.key);
            prepared.push({ line, key: normalized.key, record: normalized.record });
        }

        const existingKeys = await this.store.listKeys();
        this.logger.info(`Store holds ${existingKeys.size} key(s); ${prepared.length} candidate row(s) to import.`);

        const batches = chunk(prepared, batchSize);
        for (const [index, batch] of batches.entries()) {
            await this.importBatch(batch, existingKeys, tally);
            this.logger.info(`Batch ${index + 1}/${batches.length} done: ${tally.imported} imported, ${tally.skipped} skipped, ${tally.failures.length} failed so far.`);
        }

        const summary = tally.summary();
        this.logger.info(`Import finished: ${summary.imported} imported, ${summary.skipped} skipped, ${summary.failed} failed of ${summary.total}.`);
        return summary;
    }

    /**
     * Attempts every row of the batch, then commits once. Rows written before
     * a failed commit are reported as failed.
     */
    private async importBatch(batch: PreparedRow[], existingKeys: Set<string>, tally: ImportTally): Promise<void> {
        const settled = new Set<PreparedRow>();
        const pending: PreparedRow[] = [];

        try {
            await this.store.withBatch(async writer => {
                for (const row of batch) {
                    if (existingKeys.has(row.key)) {
                        tally.skipped++;
                        settled.add(row);
                        continue;
                    }
                    try {
                        await writer.create(row.record);
                        pending.push(row);
                    } catch (error: unknown) {
                        settled.add(row);
                        if (error instanceof DuplicateRecordError) {
                            tally.skipped++;
                        } else {
                            this.logger.warn(`Line ${row.line}: ${row.key} could not be written: ${errorMessage(error)}`);
                            tally.fail(row.line, errorMessage(error), row.key);
                        }
                    }
                }
            });
        } catch (error: unknown) {
            const reason = `batch could not be committed: ${errorMessage(error)}`;
            this.logger.warn(`Import batch failed: ${errorMessage(error)}`);
            for (const row of batch) {
                if (!settled.has(row)) {
                    tally.fail(row.line, reason, row.key);
                }
            }
            return;
        }

        for (const row of pending) {
            tally.imported++;
            tally.importedKeys.push(row.key);
            existingKeys.add(row.key);
        }
    }
}
