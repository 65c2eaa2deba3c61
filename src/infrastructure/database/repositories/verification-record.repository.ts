// src/infrastructure/database/repositories/verification-record.repository.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { EntityManager, FindOptionsWhere, IsNull, QueryFailedError, Repository } from 'typeorm';
import winston from 'winston';

import { LOGGER_TOKEN } from '../../logger';
import { AppDataSource } from '../providers/data-source.provider';

import { VerificationRecordEntity } from '../../../core/common/entities';
import { AppError, DuplicateRecordError, PersistenceError } from '../../../core/common/errors';
import {
    NewVerificationRecord,
    VerificationRecord,
    VerificationRecordFilter,
    VerificationRecordUpdate
} from '../../../core/common/interfaces/models';
import {
    IVerificationRecordRepository,
    RecordBatchWriter
} from '../../../core/common/interfaces/repositories';
import { recordKey } from '../../../core/common/normalization.utils';
import { errorMessage } from '../../../core/common/utils';

// sqlite, SQL Server (2627 constraint, 2601 unique index) and postgres codes
const UNIQUE_VIOLATION_CODES: ReadonlySet<unknown> = new Set(['SQLITE_CONSTRAINT_UNIQUE', '23505']);
const UNIQUE_VIOLATION_NUMBERS: ReadonlySet<unknown> = new Set([2627, 2601]);

export function isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) {
        return false;
    }
    const driverError: unknown = error.driverError;
    if (typeof driverError !== 'object' || driverError === null) {
        return false;
    }
    if ('code' in driverError && UNIQUE_VIOLATION_CODES.has(driverError.code)) {
        return true;
    }
    return 'number' in driverError && UNIQUE_VIOLATION_NUMBERS.has(driverError.number);
}

function toModel(entity: VerificationRecordEntity): VerificationRecord {
    return {
        id: entity.id,
        region: entity.region,
        invoiceNumber: entity.invoiceNumber,
        orderNumber: entity.orderNumber,
        receivedDate: entity.receivedDate,
        isValid: entity.isValid,
        plannedDate: entity.plannedDate,
        decision: entity.decision,
        message: entity.message,
        createdAt: entity.createdAt,
        updatedAt: entity.updatedAt,
    };
}

function toWhere(filter: VerificationRecordFilter): FindOptionsWhere<VerificationRecordEntity> {
    const where: FindOptionsWhere<VerificationRecordEntity> = {};
    if (filter.region !== undefined) where.region = filter.region;
    if (filter.invoiceNumber !== undefined) where.invoiceNumber = filter.invoiceNumber;
    if (filter.orderNumber !== undefined) where.orderNumber = filter.orderNumber;
    if (filter.receivedDate !== undefined) where.receivedDate = filter.receivedDate;
    if (filter.isValid !== undefined) where.isValid = filter.isValid;
    if (filter.decision !== undefined) where.decision = filter.decision;
    if (filter.plannedDate !== undefined) {
        where.plannedDate = filter.plannedDate === null ? IsNull() : filter.plannedDate;
    }
    return where;
}

/**
 * Relational record store. Uniqueness comes from the database's unique index
 * on (region, invoiceNumber).
 */
@injectable()
export class VerificationRecordRepository implements IVerificationRecordRepository {

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(AppDataSource) private readonly dataSourceProvider: AppDataSource
    ) {
        this.logger.info('VerificationRecordRepository initialized.');
    }

    /**
     * Gets the TypeORM repository, initializing the DataSource on first use.
     */
    private async _getRepository(): Promise<Repository<VerificationRecordEntity>> {
        try {
            const dataSource = await this.dataSourceProvider.init();
            return dataSource.getRepository(VerificationRecordEntity);
        } catch (error: unknown) {
            throw new PersistenceError('Record store is unavailable', error);
        }
    }

    /** Maps driver errors onto the store's error contract */
    private translateError(error: unknown, action: string, record?: Pick<NewVerificationRecord, 'region' | 'invoiceNumber'>): AppError {
        if (error instanceof AppError) {
            return error;
        }
        if (record && isUniqueViolation(error)) {
            return new DuplicateRecordError(record.region, record.invoiceNumber);
        }
        this.logger.error(`VerificationRecordRepository: ${action} failed.`, {
            errorMessage: errorMessage(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return new PersistenceError(`Failed to ${action}`, error);
    }

    private async insert(manager: EntityManager, record: NewVerificationRecord): Promise<VerificationRecord> {
        // Stamped here for millisecond precision; sqlite's column default keeps whole seconds
        const now = new Date();
        const entity = manager.create(VerificationRecordEntity, {
            region: record.region,
            invoiceNumber: record.invoiceNumber,
            orderNumber: record.orderNumber,
            receivedDate: record.receivedDate,
            isValid: record.isValid,
            plannedDate: record.plannedDate,
            decision: record.decision,
            message: record.message,
            createdAt: now,
            updatedAt: now,
        });
        const saved = await manager.save(entity);
        return toModel(saved);
    }

    async create(record: NewVerificationRecord): Promise<VerificationRecord> {
        const repository = await this._getRepository();
        try {
            const created = await this.insert(repository.manager, record);
            this.logger.debug(`VerificationRecordRepository: Created ${recordKey(created.region, created.invoiceNumber)} (${created.id}).`);
            return created;
        } catch (error: unknown) {
            throw this.translateError(error, 'save record', record);
        }
    }

    async findByKey(region: string, invoiceNumber: string): Promise<VerificationRecord | null> {
        const repository = await this._getRepository();
        try {
            const entity = await repository.findOneBy({ region, invoiceNumber });
            return entity ? toModel(entity) : null;
        } catch (error: unknown) {
            throw this.translateError(error, 'find record by key');
        }
    }

    async findById(id: string): Promise<VerificationRecord | null> {
        const repository = await this._getRepository();
        this.logger.debug(`VerificationRecordRepository: Finding record by ID: ${id}`);
        try {
            const entity = await repository.findOneBy({ id });
            return entity ? toModel(entity) : null;
        } catch (error: unknown) {
            throw this.translateError(error, 'find record by ID');
        }
    }

    async list(filter: VerificationRecordFilter = {}, limit?: number): Promise<VerificationRecord[]> {
        const repository = await this._getRepository();
        try {
            const entities = await repository.find({
                where: toWhere(filter),
                order: { createdAt: 'DESC', id: 'DESC' },
                take: limit,
            });
            return entities.map(toModel);
        } catch (error: unknown) {
            throw this.translateError(error, 'list records');
        }
    }

    async update(id: string, fields: VerificationRecordUpdate): Promise<VerificationRecord | null> {
        const repository = await this._getRepository();
        const existing = await this.findById(id);
        if (!existing) {
            return null;
        }
        const target = {
            region: fields.region ?? existing.region,
            invoiceNumber: fields.invoiceNumber ?? existing.invoiceNumber,
        };
        try {
            await repository.update({ id }, { ...fields, updatedAt: new Date() });
        } catch (error: unknown) {
            throw this.translateError(error, 'update record', target);
        }
        this.logger.debug(`VerificationRecordRepository: Updated record ${id}.`);
        return this.findById(id);
    }

    async delete(id: string): Promise<boolean> {
        const repository = await this._getRepository();
        try {
            const result = await repository.delete({ id });
            return (result.affected ?? 0) > 0;
        } catch (error: unknown) {
            throw this.translateError(error, 'delete record');
        }
    }

    async listKeys(): Promise<Set<string>> {
        const repository = await this._getRepository();
        try {
            const rows = await repository.find({ select: { region: true, invoiceNumber: true } });
            return new Set(rows.map(row => recordKey(row.region, row.invoiceNumber)));
        } catch (error: unknown) {
            throw this.translateError(error, 'list record keys');
        }
    }

    async count(): Promise<number> {
        const repository = await this._getRepository();
        try {
            return await repository.count();
        } catch (error: unknown) {
            throw this.translateError(error, 'count records');
        }
    }

    /**
     * One transaction per batch. Each row runs in a nested transaction, which
     * TypeORM issues as a savepoint, so a rejected row is rolled back alone.
     */
    async withBatch<T>(work: (writer: RecordBatchWriter) => Promise<T>): Promise<T> {
        const repository = await this._getRepository();
        const queryRunner = repository.manager.connection.createQueryRunner();
        try {
            await queryRunner.connect();
            await queryRunner.startTransaction();
        } catch (error: unknown) {
            await queryRunner.release();
            throw this.translateError(error, 'start batch');
        }

        const writer: RecordBatchWriter = {
            create: async (record: NewVerificationRecord): Promise<VerificationRecord> => {
                await queryRunner.startTransaction();
                try {
                    const created = await this.insert(queryRunner.manager, record);
                    await queryRunner.commitTransaction();
                    return created;
                } catch (error: unknown) {
                    await queryRunner.rollbackTransaction();
                    throw this.translateError(error, 'save record', record);
                }
            },
        };

        try {
            const result = await work(writer);
            await queryRunner.commitTransaction();
            return result;
        } catch (error: unknown) {
            if (queryRunner.isTransactionActive) {
                await queryRunner.rollbackTransaction();
            }
            throw this.translateError(error, 'commit batch');
        } finally {
            await queryRunner.release();
        }
    }
}
