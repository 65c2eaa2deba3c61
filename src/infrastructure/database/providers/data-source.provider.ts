// src/infrastructure/database/providers/data-source.provider.ts
import 'reflect-metadata'; // Keep for DI
import { mkdir } from 'fs/promises';
import path from 'path';
import { inject, injectable } from 'tsyringe';
import { DataSource, DataSourceOptions } from 'typeorm';
import winston from 'winston';

import { DatabaseConfig } from '../../../config';
import { VerificationRecordEntity } from '../../../core/common/entities';
import { errorMessage } from '../../../core/common/utils';
import { LOGGER_TOKEN } from '../../logger';
import { CreateVerificationRecords1717000000000 } from '../migrations/1717000000000-CreateVerificationRecords';

export const DATA_SOURCE_OPTIONS_TOKEN = Symbol.for('DataSourceOptions');

/**
 * Builds TypeORM options for the configured driver. Pending migrations run on
 * initialization, so a fresh database gets its schema without `synchronize`.
 * better-sqlite3 treats `database` as a file path (or ":memory:").
 */
export function buildDataSourceOptions(database: DatabaseConfig): DataSourceOptions {
    const common = {
        synchronize: database.synchronize,
        logging: database.logging,
        entities: [VerificationRecordEntity],
        subscribers: [],
        migrations: [CreateVerificationRecords1717000000000],
        migrationsRun: true,
    };

    if (database.type === 'better-sqlite3') {
        return { ...common, type: 'better-sqlite3', database: database.database };
    }

    return {
        ...common,
        type: 'mssql',
        host: database.host,
        port: database.port,
        username: database.username,
        password: database.password,
        database: database.database,
        connectionTimeout: 150000,
        extra: {
            trustServerCertificate: true // Often needed for local/non-prod SQL Server
        },
        options: {
            encrypt: false,
        },
    };
}

@injectable()
export class AppDataSource {

    private _dataSource: DataSource | null = null;
    private initPromise: Promise<DataSource> | null = null;

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(DATA_SOURCE_OPTIONS_TOKEN) private readonly options: DataSourceOptions
    ) {
        this.logger.info(`AppDataSource service initialized (driver: ${this.options.type}).`);
    }

    /**
     * Initializes the DataSource once; concurrent callers share the attempt.
     */
    init(): Promise<DataSource> {
        if (this._dataSource && this._dataSource.isInitialized) {
            return Promise.resolve(this._dataSource);
        }
        if (!this.initPromise) {
            this.initPromise = this.initialize().finally(() => {
                this.initPromise = null;
            });
        }
        return this.initPromise;
    }

    private async initialize(): Promise<DataSource> {
        this.logger.info(`AppDataSource: Creating new DataSource instance for ${this.describe()}.`);
        if (this.options.type === 'better-sqlite3' && this.options.database !== ':memory:') {
            await mkdir(path.dirname(this.options.database), { recursive: true });
        }

        const dataSource = new DataSource(this.options);
        try {
            this.logger.info('AppDataSource: Attempting to initialize TypeORM DataSource...');
            await dataSource.initialize();
            this.logger.info(`AppDataSource: TypeORM DataSource initialized successfully! [${this.describe()}]`);
        } catch (err: unknown) {
            this.logger.error('AppDataSource: Error during Data Source initialization', {
                message: errorMessage(err),
                stack: err instanceof Error ? err.stack : undefined,
                target: this.describe(),
            });
            throw err; // Re-throw to indicate failure
        }

        this._dataSource = dataSource;
        return dataSource;
    }

    async close(): Promise<void> {
        if (this._dataSource && this._dataSource.isInitialized) {
            try {
                this.logger.info('AppDataSource: Attempting to close TypeORM DataSource...');
                await this._dataSource.destroy();
                this.logger.info('AppDataSource: TypeORM DataSource has been closed successfully!');
                this._dataSource = null;
            } catch (err: unknown) {
                this.logger.error('AppDataSource: Error during Data Source closing', { message: errorMessage(err) });
                throw err;
            }
        } else {
            this.logger.debug('AppDataSource: Close called but DataSource was not initialized.');
            this._dataSource = null;
        }
    }

    private describe(): string {
        if (this.options.type === 'mssql') {
            return `${this.options.database}@${this.options.host}:${this.options.port}`;
        }
        if (this.options.type === 'better-sqlite3') {
            return `better-sqlite3:${this.options.database}`;
        }
        return this.options.type;
    }
}
