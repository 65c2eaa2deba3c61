// src/core/parsing/file-parser.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import * as XLSX from 'xlsx';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError, FileParsingError } from '../common/errors';
import { CellValue } from '../common/normalization.utils';
import { errorMessage } from '../common/utils';
import { FileParsingOptions, HeaderMap, IFileParserService, ParsedRow, ParsedTable } from './interfaces/services';

type FileType = 'excel' | 'csv' | 'json';

/** Header row plus data rows as positional cells */
interface RawTable {
    headers: string[];
    rows: { line: number; cells: unknown[] }[];
}

/** Lower-case, accent-free, single-spaced header text used for alias lookup */
export function normalizeHeader(header: string): string {
    return header
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .trim()
        .toLowerCase()
        .replace(/[\s_\-.]+/g, ' ');
}

function toCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Date) return value;
    return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@singleton()
@injectable()
export class FileParserService implements IFileParserService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('FileParserService initialized.');
    }

    async parseTable<K extends string>(
        fileBuffer: Buffer,
        headerMap: HeaderMap<K>,
        options?: FileParsingOptions
    ): Promise<ParsedTable<K>> {
        const fileType = options?.fileTypeHint ?? this.detectFileType(fileBuffer);
        this.logger.info(`Attempting to parse file as ${fileType}`);

        let raw: RawTable;
        try {
            if (fileType === 'json') {
                raw = this.readJson(fileBuffer);
            } else {
                raw = this.readSheet(fileBuffer, fileType, options);
            }
        } catch (error: unknown) {
            this.logger.error(`File parsing failed: ${errorMessage(error)}`);
            if (error instanceof AppError) { // Keep specific errors
                throw error;
            }
            throw new FileParsingError('Failed to parse file', error instanceof Error ? error : undefined);
        }

        return this.mapHeaders(raw, headerMap);
    }

    private detectFileType(buffer: Buffer): FileType {
        // xlsx is a zip archive ("PK"), legacy xls an OLE compound file
        if (buffer.length >= 2 && buffer[0] === 0x50 && buffer[1] === 0x4b) return 'excel';
        if (buffer.length >= 4 && buffer[0] === 0xd0 && buffer[1] === 0xcf && buffer[2] === 0x11 && buffer[3] === 0xe0) return 'excel';

        const startChar = buffer.toString('utf8', 0, Math.min(buffer.length, 64)).replace(/^\uFEFF/, '').trim().charAt(0);
        if (startChar === '{' || startChar === '[') {
            this.logger.debug('Inferred file type as: json');
            return 'json';
        }
        this.logger.debug('Inferred file type as: csv');
        return 'csv';
    }

    private readSheet(buffer: Buffer, fileType: 'excel' | 'csv', options?: FileParsingOptions): RawTable {
        // Excel dates stay serial numbers; CSV cells stay text
        const workbook = fileType === 'csv'
            ? XLSX.read(buffer.toString('utf8').replace(/^\uFEFF/, ''), { type: 'string', raw: true })
            : XLSX.read(buffer, { type: 'buffer', cellDates: false });

        const sheetName = options?.sheetName ?? workbook.SheetNames[0];
        if (!sheetName) { throw new FileParsingError('No sheets found in the workbook.'); }
        const worksheet = workbook.Sheets[sheetName];
        if (!worksheet) { throw new FileParsingError(`Sheet "${sheetName}" not found.`); }

        const matrix = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: true, defval: null });
        this.logger.info(`Parsed ${matrix.length} raw rows (including header) from sheet "${sheetName}".`);

        const [headerRow, ...dataRows] = matrix;
        const headers = (headerRow ?? []).map(cell => (cell === null || cell === undefined ? '' : String(cell)));
        return {
            headers,
            rows: dataRows.map((cells, index) => ({ line: index + 2, cells })),
        };
    }

    private readJson(buffer: Buffer): RawTable {
        const parsed: unknown = JSON.parse(buffer.toString('utf8').replace(/^\uFEFF/, ''));
        const items = Array.isArray(parsed)
            ? parsed
            : (isPlainObject(parsed) && Array.isArray(parsed.rows) ? parsed.rows : null);
        if (!items) {
            throw new FileParsingError('JSON content must be an array of row objects or an object with a "rows" array');
        }

        const headers: string[] = [];
        const seen = new Set<string>();
        const objects = items.filter(isPlainObject);
        for (const item of objects) {
            for (const key of Object.keys(item)) {
                if (!seen.has(key)) {
                    seen.add(key);
                    headers.push(key);
                }
            }
        }
        if (objects.length !== items.length) {
            this.logger.warn(`Ignored ${items.length - objects.length} JSON entries that are not objects.`);
        }
        return {
            headers,
            rows: objects.map((item, index) => ({ line: index + 2, cells: headers.map(header => item[header]) })),
        };
    }

    private mapHeaders<K extends string>(raw: RawTable, headerMap: HeaderMap<K>): ParsedTable<K> {
        const columnFields: (K | undefined)[] = raw.headers.map(header => headerMap[normalizeHeader(header)]);
        const matchedFields = new Set<K>();
        columnFields.forEach(field => { if (field) matchedFields.add(field); });

        const rows: ParsedRow<K>[] = [];
        for (const { line, cells } of raw.rows) {
            const values: Partial<Record<K, CellValue>> = {};
            let filled = 0;
            for (const [column, field] of columnFields.entries()) {
                // First matching column wins when two headers map to one field
                if (!field || values[field] !== undefined) continue;
                const value = toCellValue(cells[column]);
                if (value === null || (typeof value === 'string' && value.trim() === '')) continue;
                values[field] = value;
                filled++;
            }
            if (filled > 0) {
                rows.push({ originalLineNumber: line, values });
            }
        }

        this.logger.debug(`Mapped ${rows.length} non-empty rows; matched fields: ${[...matchedFields].join(', ')}`);
        return { headers: raw.headers, matchedFields, rows };
    }
}
