// src/infrastructure/spreadsheet/google-sheets.gateway.ts
import { google, sheets_v4 } from 'googleapis';
import { SheetRow, SpreadsheetGateway } from './spreadsheet.gateway';

export interface GoogleSheetsSettings {
    spreadsheetId: string;
    worksheet: string;
    /** Service account key file; falls back to application default credentials */
    keyFile?: string;
}

function toCellText(cell: unknown): string {
    if (cell === null || cell === undefined) {
        return '';
    }
    return String(cell);
}

/**
 * Google Sheets worksheet through the v4 values API. Values are written RAW so
 * digit strings are not turned into numbers.
 */
export class GoogleSheetsGateway implements SpreadsheetGateway {

    private readonly sheets: sheets_v4.Sheets;
    private sheetId: number | null = null;

    constructor(private readonly settings: GoogleSheetsSettings) {
        const auth = new google.auth.GoogleAuth({
            keyFile: settings.keyFile,
            scopes: ['https://www.googleapis.com/auth/spreadsheets'],
        });
        this.sheets = google.sheets({ version: 'v4', auth });
    }

    describe(): string {
        return `google-sheets:${this.settings.spreadsheetId}/${this.settings.worksheet}`;
    }

    async readRows(): Promise<SheetRow[]> {
        const response = await this.sheets.spreadsheets.values.get({
            spreadsheetId: this.settings.spreadsheetId,
            range: this.quotedWorksheet(),
        });
        const values: unknown[][] = response.data.values ?? [];
        return values.map(row => row.map(toCellText));
    }

    async appendRows(rows: SheetRow[]): Promise<void> {
        if (rows.length === 0) return;
        await this.sheets.spreadsheets.values.append({
            spreadsheetId: this.settings.spreadsheetId,
            range: this.quotedWorksheet(),
            valueInputOption: 'RAW',
            insertDataOption: 'INSERT_ROWS',
            requestBody: { values: rows },
        });
    }

    async updateRow(rowNumber: number, row: SheetRow): Promise<void> {
        await this.sheets.spreadsheets.values.update({
            spreadsheetId: this.settings.spreadsheetId,
            range: `${this.quotedWorksheet()}!A${rowNumber}`,
            valueInputOption: 'RAW',
            requestBody: { values: [row] },
        });
    }

    async deleteRow(rowNumber: number): Promise<void> {
        const sheetId = await this.resolveSheetId();
        await this.sheets.spreadsheets.batchUpdate({
            spreadsheetId: this.settings.spreadsheetId,
            requestBody: {
                requests: [{
                    deleteDimension: {
                        range: { sheetId, dimension: 'ROWS', startIndex: rowNumber - 1, endIndex: rowNumber },
                    },
                }],
            },
        });
    }

    private quotedWorksheet(): string {
        return `'${this.settings.worksheet.replace(/'/g, "''")}'`;
    }

    private async resolveSheetId(): Promise<number> {
        if (this.sheetId !== null) {
            return this.sheetId;
        }
        const response = await this.sheets.spreadsheets.get({
            spreadsheetId: this.settings.spreadsheetId,
            fields: 'sheets.properties',
        });
        const match = (response.data.sheets ?? [])
            .map(sheet => sheet.properties)
            .find(properties => properties?.title === this.settings.worksheet);
        const sheetId = match?.sheetId;
        if (sheetId === null || sheetId === undefined) {
            throw new Error(`Worksheet "${this.settings.worksheet}" not found in ${this.settings.spreadsheetId}`);
        }
        this.sheetId = sheetId;
        return sheetId;
    }
}
