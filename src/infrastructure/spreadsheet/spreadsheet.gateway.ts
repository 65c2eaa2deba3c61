// src/infrastructure/spreadsheet/spreadsheet.gateway.ts

/** One worksheet row as cell text */
export type SheetRow = string[];

/**
 * Minimal worksheet access used by the spreadsheet record store.
 * Row numbers are 1-based, as in the spreadsheet UI.
 */
export interface SpreadsheetGateway {
    /** Human-readable target, for logs */
    describe(): string;
    /** Every row of the worksheet, header included */
    readRows(): Promise<SheetRow[]>;
    /** Appends rows after the last non-empty row in a single call */
    appendRows(rows: SheetRow[]): Promise<void>;
    updateRow(rowNumber: number, row: SheetRow): Promise<void>;
    deleteRow(rowNumber: number): Promise<void>;
}

export const SPREADSHEET_GATEWAY_TOKEN = Symbol.for('SpreadsheetGateway');
