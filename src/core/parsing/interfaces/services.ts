// src/core/parsing/interfaces/services.ts
import { CellValue } from '../../common/normalization.utils';

/** Potential options for file parsing */
export interface FileParsingOptions {
    fileTypeHint?: 'excel' | 'csv' | 'json'; // Hint if content sniffing is ambiguous
    sheetName?: string; // Specify sheet name for Excel
}

/**
 * Maps normalized header text (lower-case, accent-free, single spaces) to a
 * logical field name.
 */
export type HeaderMap<K extends string> = Readonly<Record<string, K>>;

export interface ParsedRow<K extends string> {
    /** Line in the source (header is line 1) */
    originalLineNumber: number;
    values: Partial<Record<K, CellValue>>;
}

export interface ParsedTable<K extends string> {
    /** Headers exactly as they appear in the source */
    headers: string[];
    /** Logical fields that at least one header mapped to */
    matchedFields: ReadonlySet<K>;
    rows: ParsedRow<K>[];
}

/** Defines the contract for the File Parser Service */
export interface IFileParserService {
    /**
     * Parses a tabular file (xlsx/xls, csv or a JSON array of objects) into
     * rows keyed by logical field names.
     * @throws {FileParsingError} If the content cannot be read as a table.
     */
    parseTable<K extends string>(
        fileBuffer: Buffer,
        headerMap: HeaderMap<K>,
        options?: FileParsingOptions
    ): Promise<ParsedTable<K>>;
}
