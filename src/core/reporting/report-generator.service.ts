// src/core/reporting/report-generator.service.ts
import ExcelJS, { Row, Worksheet } from 'exceljs';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError } from '../common/errors';
import { toRecordView, VerificationRecord } from '../common/interfaces/models';
import { errorMessage } from '../common/utils';
import { IReportGeneratorService, RECORDS_SHEET_NAME, ReportOptions } from './interfaces/services';

export const RECORD_EXPORT_HEADERS: readonly string[] = [
    'ID', 'Region', 'Invoice', 'Order', 'Received Date', 'Valid',
    'Planned Date', 'Decision', 'Message', 'Created At', 'Updated At',
];

const MAX_COLUMN_WIDTH = 60;

@singleton()
@injectable()
export class ReportGeneratorService implements IReportGeneratorService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('ReportGeneratorService initialized.');
    }

    async exportRecords(records: VerificationRecord[], options?: ReportOptions): Promise<Buffer> {
        this.logger.info(`Exporting ${records.length} record(s) to Excel...`);
        try {
            const workbook = new ExcelJS.Workbook();
            workbook.creator = 'Invoice Receipt Validator';
            workbook.created = new Date();

            const sheet = workbook.addWorksheet(options?.sheetName ?? RECORDS_SHEET_NAME);
            const headers = [...RECORD_EXPORT_HEADERS];
            this.styleHeaderRow(sheet.addRow(headers), headers);
            sheet.views = [{ state: 'frozen', ySplit: 1 }];

            for (const record of records) {
                const view = toRecordView(record);
                sheet.addRow([
                    view.id,
                    view.region,
                    view.invoice,
                    view.order,
                    view.receivedDate,
                    view.valid ? 'Yes' : 'No',
                    view.plannedDate,
                    view.decision,
                    view.message,
                    view.createdAt,
                    view.updatedAt,
                ]);
            }
            this.autoFitColumns(sheet, headers);

            const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
            this.logger.info('Excel export generated successfully.');
            return buffer;
        } catch (error: unknown) {
            this.logger.error('Failed to generate Excel export:', { message: errorMessage(error), stack: error instanceof Error ? error.stack : undefined });
            if (error instanceof AppError) throw error;
            throw new AppError('ReportGenerationError', 'Failed to generate Excel export', 500, false);
        }
    }

    private styleHeaderRow(row: Row, headers: string[]): void {
        for (let i = 1; i <= headers.length; i++) {
            const cell = row.getCell(i);
            cell.font = {
                bold: true,
                color: { argb: 'FFFFFFFF' }
            };
            cell.alignment = { vertical: 'middle', horizontal: 'center', wrapText: true };
            cell.fill = {
                type: 'pattern',
                pattern: 'solid',
                fgColor: { argb: 'FF1F4E79' }
            };
            cell.border = {
                top: { style: 'thin' },
                left: { style: 'thin' },
                bottom: { style: 'thin' },
                right: { style: 'thin' }
            };
        }
    }

    /** Sizes each column to its longest value, capped */
    private autoFitColumns(sheet: Worksheet, headers: string[]): void {
        headers.forEach((header, index) => {
            const column = sheet.getColumn(index + 1);
            let maxLength = header.length;
            column.eachCell({ includeEmpty: false }, cell => {
                const length = cell.value === null || cell.value === undefined ? 0 : String(cell.value).length;
                maxLength = Math.max(maxLength, length);
            });
            column.width = Math.min(maxLength + 2, MAX_COLUMN_WIDTH);
        });
    }
}
