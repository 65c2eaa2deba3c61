//src/register.ts

import { container, instanceCachingFactory, Lifecycle } from 'tsyringe';
import config from './config';
import { CATALOG_SOURCE_TOKEN, PlanningCatalogService } from './core/catalog';
import { ConfigurationError } from './core/common/errors';
import { VERIFICATION_RECORD_REPOSITORY_TOKEN } from './core/common/interfaces/repositories';
import { DecisionEngine } from './core/decision';
import { BatchImporterService } from './core/importing';
import { IntegrityService } from './core/integrity';
import { FileParserService } from './core/parsing';
import { ReportGeneratorService } from './core/reporting';
import { ValidationService } from './core/validation';
import { FileCatalogSource } from './infrastructure/catalog/file-catalog.source';
import {
    AppDataSource,
    buildDataSourceOptions,
    DATA_SOURCE_OPTIONS_TOKEN
} from './infrastructure/database/providers/data-source.provider';
import { VerificationRecordRepository } from './infrastructure/database/repositories/verification-record.repository';
import loggerInstance, { LOGGER_TOKEN } from './infrastructure/logger';
import { GoogleSheetsGateway } from './infrastructure/spreadsheet/google-sheets.gateway';
import { RateLimitedSpreadsheetGateway } from './infrastructure/spreadsheet/rate-limited.gateway';
import { SPREADSHEET_GATEWAY_TOKEN, SpreadsheetGateway } from './infrastructure/spreadsheet/spreadsheet.gateway';
import { SpreadsheetRecordRepository } from './infrastructure/spreadsheet/spreadsheet-record.repository';

function createSpreadsheetGateway(): SpreadsheetGateway {
    const { spreadsheetId, worksheet, keyFile, minIntervalMs } = config.spreadsheet;
    if (!spreadsheetId) {
        throw new ConfigurationError('SHEETS_SPREADSHEET_ID is required when STORE_BACKEND=spreadsheet');
    }
    return new RateLimitedSpreadsheetGateway(new GoogleSheetsGateway({ spreadsheetId, worksheet, keyFile }), minIntervalMs);
}

export function registerDependencies(): void {
    // IMPORTANT: Register Logger FIRST
    container.register(LOGGER_TOKEN, {
        useValue: loggerInstance
    });
    loggerInstance.debug('--- Starting Dependency Registration ---');

    // Infrastructure
    container.register(DATA_SOURCE_OPTIONS_TOKEN, {
        useValue: buildDataSourceOptions(config.database)
    });
    container.registerSingleton(AppDataSource);

    container.register(CATALOG_SOURCE_TOKEN, {
        useValue: new FileCatalogSource(config.catalog.path)
    });

    if (config.storeBackend === 'spreadsheet') {
        container.register(SPREADSHEET_GATEWAY_TOKEN, {
            useFactory: instanceCachingFactory<SpreadsheetGateway>(createSpreadsheetGateway)
        });
        container.register(VERIFICATION_RECORD_REPOSITORY_TOKEN, {
            useClass: SpreadsheetRecordRepository
        }, { lifecycle: Lifecycle.Singleton });
    } else {
        container.register(VERIFICATION_RECORD_REPOSITORY_TOKEN, {
            useClass: VerificationRecordRepository
        }, { lifecycle: Lifecycle.Singleton });
    }
    loggerInstance.debug(`Registered: VERIFICATION_RECORD_REPOSITORY_TOKEN (${config.storeBackend})`);

    // Core services
    container.registerSingleton(FileParserService);
    container.registerSingleton(DecisionEngine);
    container.registerSingleton(PlanningCatalogService);
    container.registerSingleton(ValidationService);
    container.registerSingleton(BatchImporterService);
    container.registerSingleton(ReportGeneratorService);
    container.registerSingleton(IntegrityService);

    loggerInstance.debug('--- Dependency Registration Complete ---');
}
