// src/core/importing/interfaces/services.ts
import { CellValue } from '../../common/normalization.utils';
import { ImportSummary } from '../../common/interfaces/models';

export type ImportField =
    | 'region'
    | 'invoiceNumber'
    | 'orderNumber'
    | 'receivedDate'
    | 'plannedDate'
    | 'decision'
    | 'message'
    | 'valid';

/** One source row keyed by logical field */
export type ImportRow = Partial<Record<ImportField, CellValue>>;

export interface ImportOptions {
    /** Rows per store batch; defaults to IMPORT_BATCH_SIZE */
    batchSize?: number;
}

/** Defines the contract for the Batch Importer */
export interface IBatchImporter {
    /**
     * Imports rows in source order. Row problems are counted, never thrown.
     * Line numbers in failures are 1-based positions in `rows`.
     */
    importRows(rows: ImportRow[], options?: ImportOptions): Promise<ImportSummary>;

    /**
     * Imports an xlsx/xls/csv/JSON file. Failure lines are file lines
     * (header is line 1).
     * @throws {FileParsingError} If the file cannot be read or lacks required columns.
     */
    importFile(fileBuffer: Buffer, options?: ImportOptions): Promise<ImportSummary>;
}
