// src/config/index.ts
import 'reflect-metadata'; // Ensure metadata reflection is available
import { ConfigurationError } from '../core/common/errors';

// --- Interfaces ---

export type DatabaseType = 'mssql' | 'better-sqlite3';
export type StoreBackend = 'database' | 'spreadsheet';
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';
export type NodeEnv = 'development' | 'production' | 'test';

// Define the structure for Database Configuration
export interface DatabaseConfig {
    readonly type: DatabaseType;
    readonly host: string;
    readonly port: number;
    readonly username: string;
    readonly password?: string;
    readonly database: string; // file path for better-sqlite3
    readonly synchronize: boolean;
    readonly logging: boolean;
}

export interface SpreadsheetConfig {
    readonly spreadsheetId?: string;
    readonly worksheet: string;
    readonly keyFile?: string;
    /** Minimum spacing between two outbound calls, in milliseconds */
    readonly minIntervalMs: number;
}

// Define the structure of our main application configuration
export interface AppConfig {
    readonly nodeEnv: NodeEnv;
    readonly logLevel: LogLevel;
    readonly storeBackend: StoreBackend;
    readonly catalog: {
        readonly path: string;
        readonly sheetName?: string;
    };
    readonly decision: {
        readonly manualReviewCategories: readonly string[];
    };
    readonly importer: {
        readonly batchSize: number;
    };
    readonly database: DatabaseConfig;
    readonly spreadsheet: SpreadsheetConfig;
}

// --- Helper Functions ---
function parseIntEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueInt = parseInt(valueStr, 10);
        if (!isNaN(valueInt)) {
            return valueInt;
        }
        throw new ConfigurationError(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseBoolEnv(varName: string, defaultValue: boolean): boolean {
    const valueStr = process.env[varName];
    if (valueStr === undefined || valueStr === '') {
        return defaultValue;
    }
    return valueStr.trim().toLowerCase() === 'true';
}

function parseEnumEnv<T extends string>(varName: string, allowed: readonly T[], defaultValue: T): T {
    const valueStr = process.env[varName];
    if (!valueStr) {
        return defaultValue;
    }
    const match = allowed.find(option => option === valueStr.trim());
    if (!match) {
        throw new ConfigurationError(`Invalid value for ${varName}: ${valueStr}. Expected one of: ${allowed.join(', ')}`);
    }
    return match;
}

function parseListEnv(varName: string, defaultValue: string[]): string[] {
    const valueStr = process.env[varName];
    if (!valueStr) {
        return defaultValue;
    }
    return valueStr.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];
const DATABASE_TYPES: readonly DatabaseType[] = ['mssql', 'better-sqlite3'];
const STORE_BACKENDS: readonly StoreBackend[] = ['database', 'spreadsheet'];

// --- Load, Validate, and Export Configuration ---
const config: AppConfig = {
    nodeEnv: parseEnumEnv('NODE_ENV', NODE_ENVS, 'development'),
    logLevel: parseEnumEnv('LOG_LEVEL', LOG_LEVELS, 'info'),
    storeBackend: parseEnumEnv('STORE_BACKEND', STORE_BACKENDS, 'database'),

    catalog: {
        path: process.env.CATALOG_PATH || 'data/planning-catalog.xlsx',
        sheetName: process.env.CATALOG_SHEET || undefined,
    },

    decision: {
        manualReviewCategories: parseListEnv('MANUAL_REVIEW_CATEGORIES', ['engineering-network']),
    },

    importer: {
        batchSize: parseIntEnv('IMPORT_BATCH_SIZE', 50),
    },

    database: {
        type: parseEnumEnv('DB_TYPE', DATABASE_TYPES, 'better-sqlite3'),
        host: process.env.DB_HOST || 'localhost',
        port: parseIntEnv('DB_PORT', 1433),
        username: process.env.DB_USER || 'sa',
        password: process.env.DB_PASS || undefined,
        database: process.env.DB_NAME || 'data/records.db',
        synchronize: parseBoolEnv('DB_SYNCHRONIZE', false),
        logging: parseBoolEnv('DB_LOGGING', false),
    },

    spreadsheet: {
        spreadsheetId: process.env.SHEETS_SPREADSHEET_ID || undefined,
        worksheet: process.env.SHEETS_WORKSHEET || 'records',
        keyFile: process.env.SHEETS_KEY_FILE || undefined,
        minIntervalMs: parseIntEnv('SHEETS_MIN_INTERVAL_MS', 1100),
    },
};

// --- Validation ---
if (config.importer.batchSize < 1) {
    throw new ConfigurationError(`IMPORT_BATCH_SIZE must be at least 1, got ${config.importer.batchSize}`);
}
if (config.spreadsheet.minIntervalMs < 0) {
    throw new ConfigurationError(`SHEETS_MIN_INTERVAL_MS must not be negative, got ${config.spreadsheet.minIntervalMs}`);
}

// --- Freeze Configuration ---
Object.freeze(config);
Object.freeze(config.catalog);
Object.freeze(config.decision);
Object.freeze(config.importer);
Object.freeze(config.database);
Object.freeze(config.spreadsheet);

// --- Export ---
export default config;
