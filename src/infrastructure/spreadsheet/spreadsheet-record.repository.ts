// src/infrastructure/spreadsheet/spreadsheet-record.repository.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import winston from 'winston';

import { AppError, DuplicateRecordError, PersistenceError } from '../../core/common/errors';
import {
    NewVerificationRecord,
    parseDecisionTag,
    VerificationRecord,
    VerificationRecordFilter,
    VerificationRecordUpdate
} from '../../core/common/interfaces/models';
import { IVerificationRecordRepository, RecordBatchWriter } from '../../core/common/interfaces/repositories';
import { recordKey } from '../../core/common/normalization.utils';
import { errorMessage, generateUniqueId } from '../../core/common/utils';
import { LOGGER_TOKEN } from '../logger';
import { SheetRow, SPREADSHEET_GATEWAY_TOKEN, SpreadsheetGateway } from './spreadsheet.gateway';

export const RECORD_SHEET_HEADER: readonly string[] = [
    'id', 'region', 'invoiceNumber', 'orderNumber', 'receivedDate', 'isValid',
    'plannedDate', 'decision', 'message', 'createdAt', 'updatedAt',
];

const FILTER_FIELDS = ['region', 'invoiceNumber', 'orderNumber', 'receivedDate', 'isValid', 'plannedDate', 'decision'] as const;

interface StoredRow {
    /** 1-based worksheet row */
    rowNumber: number;
    record: VerificationRecord;
}

export function recordToRow(record: VerificationRecord): SheetRow {
    return [
        record.id,
        record.region,
        record.invoiceNumber,
        record.orderNumber,
        record.receivedDate,
        record.isValid ? 'TRUE' : 'FALSE',
        record.plannedDate ?? '',
        record.decision,
        record.message,
        record.createdAt.toISOString(),
        record.updatedAt.toISOString(),
    ];
}

function parseTimestamp(text: string): Date {
    const parsed = new Date(text);
    return isNaN(parsed.getTime()) ? new Date(0) : parsed;
}

export function rowToRecord(row: SheetRow): VerificationRecord | null {
    const cell = (index: number): string => (row[index] ?? '').trim();
    const id = cell(0);
    if (!id) {
        return null;
    }
    const plannedDate = cell(6);
    return {
        id,
        region: cell(1),
        invoiceNumber: cell(2),
        orderNumber: cell(3),
        receivedDate: cell(4),
        isValid: cell(5).toUpperCase() === 'TRUE',
        plannedDate: plannedDate.length > 0 ? plannedDate : null,
        decision: parseDecisionTag(cell(7)),
        message: row[8] ?? '',
        createdAt: parseTimestamp(cell(9)),
        updatedAt: parseTimestamp(cell(10)),
    };
}

/** Applies the supplied fields; a field set to undefined keeps its stored value */
function applyUpdate(record: VerificationRecord, fields: VerificationRecordUpdate): VerificationRecord {
    return {
        ...record,
        region: fields.region ?? record.region,
        invoiceNumber: fields.invoiceNumber ?? record.invoiceNumber,
        orderNumber: fields.orderNumber ?? record.orderNumber,
        receivedDate: fields.receivedDate ?? record.receivedDate,
        isValid: fields.isValid ?? record.isValid,
        plannedDate: fields.plannedDate === undefined ? record.plannedDate : fields.plannedDate,
        decision: fields.decision ?? record.decision,
        message: fields.message ?? record.message,
        updatedAt: new Date(),
    };
}

function matchesFilter(record: VerificationRecord, filter: VerificationRecordFilter): boolean {
    return FILTER_FIELDS.every(field => filter[field] === undefined || filter[field] === record[field]);
}

/**
 * Record store on a worksheet. The sheet has no unique index, so every write
 * checks for an existing key first. Writes run one at a time so a check and
 * its write are never interleaved with another writer in this process.
 */
@injectable()
export class SpreadsheetRecordRepository implements IVerificationRecordRepository {

    private writes: Promise<void> = Promise.resolve();

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(SPREADSHEET_GATEWAY_TOKEN) private readonly gateway: SpreadsheetGateway
    ) {
        this.logger.info(`SpreadsheetRecordRepository initialized (target: ${this.gateway.describe()}).`);
    }

    private exclusive<T>(operation: () => Promise<T>): Promise<T> {
        const run = this.writes.then(operation);
        this.writes = run.then(() => undefined, () => undefined);
        return run;
    }

    private async call<T>(action: string, operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (error: unknown) {
            if (error instanceof AppError) {
                throw error;
            }
            this.logger.error(`SpreadsheetRecordRepository: ${action} failed: ${errorMessage(error)}`);
            throw new PersistenceError(`Spreadsheet ${action} failed`, error);
        }
    }

    /**
     * Reads every stored record. Writes an initial header into an empty sheet
     * when `ensureHeader` is set.
     */
    private async readAll(ensureHeader = false): Promise<StoredRow[]> {
        const rows = await this.call('read', () => this.gateway.readRows());
        if (rows.length === 0) {
            if (ensureHeader) {
                this.logger.info('SpreadsheetRecordRepository: Empty worksheet, writing header row.');
                await this.call('header write', () => this.gateway.appendRows([[...RECORD_SHEET_HEADER]]));
            }
            return [];
        }

        const header = rows[0].map(cell => cell.trim());
        const headerMatches = RECORD_SHEET_HEADER.every((name, index) => header[index] === name);
        if (!headerMatches) {
            throw new PersistenceError(`Unexpected worksheet header: ${header.join(', ')}`);
        }

        const stored: StoredRow[] = [];
        rows.slice(1).forEach((row, index) => {
            const record = rowToRecord(row);
            if (record) {
                stored.push({ rowNumber: index + 2, record });
            }
        });
        return stored;
    }

    private buildRecord(record: NewVerificationRecord): VerificationRecord {
        const now = new Date();
        return { ...record, id: generateUniqueId(), createdAt: now, updatedAt: now };
    }

    create(record: NewVerificationRecord): Promise<VerificationRecord> {
        return this.exclusive(() => this.createNow(record));
    }

    private async createNow(record: NewVerificationRecord): Promise<VerificationRecord> {
        const stored = await this.readAll(true);
        const key = recordKey(record.region, record.invoiceNumber);
        if (stored.some(row => recordKey(row.record.region, row.record.invoiceNumber) === key)) {
            throw new DuplicateRecordError(record.region, record.invoiceNumber);
        }
        const created = this.buildRecord(record);
        await this.call('append', () => this.gateway.appendRows([recordToRow(created)]));
        this.logger.debug(`SpreadsheetRecordRepository: Created ${key} (${created.id}).`);
        return created;
    }

    async findByKey(region: string, invoiceNumber: string): Promise<VerificationRecord | null> {
        const stored = await this.readAll();
        const match = stored.find(row => row.record.region === region && row.record.invoiceNumber === invoiceNumber);
        return match ? match.record : null;
    }

    async findById(id: string): Promise<VerificationRecord | null> {
        const stored = await this.readAll();
        return stored.find(row => row.record.id === id)?.record ?? null;
    }

    async list(filter: VerificationRecordFilter = {}, limit?: number): Promise<VerificationRecord[]> {
        const stored = await this.readAll();
        const matching = stored
            .filter(row => matchesFilter(row.record, filter))
            // Newest first; later rows win ties
            .sort((a, b) => (b.record.createdAt.getTime() - a.record.createdAt.getTime()) || (b.rowNumber - a.rowNumber))
            .map(row => row.record);
        return limit === undefined ? matching : matching.slice(0, limit);
    }

    update(id: string, fields: VerificationRecordUpdate): Promise<VerificationRecord | null> {
        return this.exclusive(() => this.updateNow(id, fields));
    }

    private async updateNow(id: string, fields: VerificationRecordUpdate): Promise<VerificationRecord | null> {
        const stored = await this.readAll();
        const target = stored.find(row => row.record.id === id);
        if (!target) {
            return null;
        }
        const updated = applyUpdate(target.record, fields);
        const key = recordKey(updated.region, updated.invoiceNumber);
        const collision = stored.some(row => row.record.id !== id && recordKey(row.record.region, row.record.invoiceNumber) === key);
        if (collision) {
            throw new DuplicateRecordError(updated.region, updated.invoiceNumber);
        }
        await this.call('update', () => this.gateway.updateRow(target.rowNumber, recordToRow(updated)));
        this.logger.debug(`SpreadsheetRecordRepository: Updated record ${id} (row ${target.rowNumber}).`);
        return updated;
    }

    delete(id: string): Promise<boolean> {
        return this.exclusive(() => this.deleteNow(id));
    }

    private async deleteNow(id: string): Promise<boolean> {
        const stored = await this.readAll();
        const target = stored.find(row => row.record.id === id);
        if (!target) {
            return false;
        }
        await this.call('delete', () => this.gateway.deleteRow(target.rowNumber));
        return true;
    }

    async listKeys(): Promise<Set<string>> {
        const stored = await this.readAll();
        return new Set(stored.map(row => recordKey(row.record.region, row.record.invoiceNumber)));
    }

    async count(): Promise<number> {
        const stored = await this.readAll();
        return stored.length;
    }

    /**
     * Checks rows against the keys present at batch start plus the rows
     * already buffered, then appends the whole buffer in one call.
     */
    /** `work` must write through `writer`; a write on the repository itself would queue behind this batch */
    withBatch<T>(work: (writer: RecordBatchWriter) => Promise<T>): Promise<T> {
        return this.exclusive(() => this.runBatch(work));
    }

    private async runBatch<T>(work: (writer: RecordBatchWriter) => Promise<T>): Promise<T> {
        const stored = await this.readAll(true);
        const keys = new Set(stored.map(row => recordKey(row.record.region, row.record.invoiceNumber)));
        const buffer: SheetRow[] = [];

        const writer: RecordBatchWriter = {
            create: async (record: NewVerificationRecord): Promise<VerificationRecord> => {
                const key = recordKey(record.region, record.invoiceNumber);
                if (keys.has(key)) {
                    throw new DuplicateRecordError(record.region, record.invoiceNumber);
                }
                const created = this.buildRecord(record);
                keys.add(key);
                buffer.push(recordToRow(created));
                return created;
            },
        };

        const result = await work(writer);
        if (buffer.length > 0) {
            await this.call('batch append', () => this.gateway.appendRows(buffer));
            this.logger.info(`SpreadsheetRecordRepository: Flushed ${buffer.length} row(s) in one append.`);
        }
        return result;
    }
}
