// src/core/integrity/integrity.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { IntegrityReport, VerificationRecord } from '../common/interfaces/models';
import {
    IVerificationRecordRepository,
    VERIFICATION_RECORD_REPOSITORY_TOKEN
} from '../common/interfaces/repositories';
import { normalizeDocumentNumber, normalizeRegion } from '../common/normalization.utils';
import { isIsoDate } from '../decision';
import { IIntegrityService } from './interfaces/services';

/** Problems found on one record; empty when the record is sound */
export function inspectRecord(record: VerificationRecord): string[] {
    const problems: string[] = [];
    if (normalizeRegion(record.region) !== record.region) {
        problems.push(`${record.id}: invalid region "${record.region}"`);
    }
    if (normalizeDocumentNumber(record.invoiceNumber) !== record.invoiceNumber) {
        problems.push(`${record.id}: invalid invoice number "${record.invoiceNumber}"`);
    }
    if (normalizeDocumentNumber(record.orderNumber) !== record.orderNumber) {
        problems.push(`${record.id}: invalid order number "${record.orderNumber}"`);
    }
    if (!isIsoDate(record.receivedDate)) {
        problems.push(`${record.id}: invalid received date "${record.receivedDate}"`);
    }
    return problems;
}

@singleton()
@injectable()
export class IntegrityService implements IIntegrityService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(VERIFICATION_RECORD_REPOSITORY_TOKEN) private store: IVerificationRecordRepository
    ) {
        this.logger.info('IntegrityService initialized.');
    }

    async check(): Promise<IntegrityReport> {
        const records = await this.store.list();
        const problems: string[] = [];
        let invalidRecords = 0;
        for (const record of records) {
            const found = inspectRecord(record);
            if (found.length > 0) {
                invalidRecords++;
                problems.push(...found);
            }
        }
        this.logger.info(`Integrity check: ${records.length} record(s), ${invalidRecords} with problems.`);
        return { totalRecords: records.length, invalidRecords, problems };
    }
}
