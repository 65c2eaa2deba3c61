// src/core/reporting/interfaces/services.ts
import { VerificationRecord } from '../../common/interfaces/models';

export const RECORDS_SHEET_NAME = 'Records';

/** Potential options for report generation */
export interface ReportOptions {
    sheetName?: string;
}

/** Defines the contract for the Report Generator Service */
export interface IReportGeneratorService {
    /**
     * Writes records to an xlsx workbook, one row per record in the order given.
     * @returns A promise resolving to a Buffer containing the workbook.
     */
    exportRecords(records: VerificationRecord[], options?: ReportOptions): Promise<Buffer>;
}
