import { SheetRow, SpreadsheetGateway } from '../../src/infrastructure/spreadsheet/spreadsheet.gateway';
import { RECORD_SHEET_HEADER } from '../../src/infrastructure/spreadsheet/spreadsheet-record.repository';

/** Worksheet held in memory; records every call by name */
export class MemorySheetGateway implements SpreadsheetGateway {
    rows: SheetRow[] = [];
    readonly calls: string[] = [];
    failAppend: Error | null = null;

    static withHeader(): MemorySheetGateway {
        const gateway = new MemorySheetGateway();
        gateway.rows.push([...RECORD_SHEET_HEADER]);
        return gateway;
    }

    describe(): string {
        return 'memory-sheet';
    }

    async readRows(): Promise<SheetRow[]> {
        this.calls.push('read');
        return this.rows.map(row => [...row]);
    }

    async appendRows(rows: SheetRow[]): Promise<void> {
        this.calls.push('append');
        if (this.failAppend) {
            throw this.failAppend;
        }
        this.rows.push(...rows.map(row => [...row]));
    }

    async updateRow(rowNumber: number, row: SheetRow): Promise<void> {
        this.calls.push('update');
        this.rows[rowNumber - 1] = [...row];
    }

    async deleteRow(rowNumber: number): Promise<void> {
        this.calls.push('delete');
        this.rows.splice(rowNumber - 1, 1);
    }
}
