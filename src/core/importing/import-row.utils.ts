// src/core/importing/import-row.utils.ts
import { DateParseError } from '../common/errors';
import { DecisionOutcome, NewVerificationRecord, parseDecisionTag } from '../common/interfaces/models';
import {
    CellValue,
    cellToText,
    excelSerialDateToJSDate,
    normalizeDocumentNumber,
    normalizeRegion,
    recordKey
} from '../common/normalization.utils';
import { formatIsoDate, parseCalendarDate } from '../decision';
import { ImportRow } from './interfaces/services';

const TRUE_WORDS: ReadonlySet<string> = new Set(['true', 'yes', 'sim', 'y', 's', '1', 'verdadeiro']);
const FALSE_WORDS: ReadonlySet<string> = new Set(['false', 'no', 'nao', 'não', 'n', '0', 'falso']);

export type NormalizedRow =
    | { ok: true; key: string; record: NewVerificationRecord }
    | { ok: false; key?: string; reason: string };

/**
 * Reads a date cell: Date objects, Excel serial numbers or any text the
 * date parser accepts.
 * @returns ISO date, or null when the cell cannot be read as a date.
 */
export function cellToIsoDate(value: CellValue): string | null {
    if (typeof value === 'number') {
        const date = excelSerialDateToJSDate(value);
        return date ? cellToText(date) : null;
    }
    if (value instanceof Date) {
        return isNaN(value.getTime()) ? null : cellToText(value);
    }
    const parsed = parseCalendarDate(cellToText(value));
    return parsed instanceof DateParseError ? null : formatIsoDate(parsed);
}

function cellToBoolean(value: CellValue): boolean | null {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value === 1 ? true : value === 0 ? false : null;
    const text = cellToText(value).toLowerCase();
    if (text.length === 0) return true; // Column default
    if (TRUE_WORDS.has(text)) return true;
    if (FALSE_WORDS.has(text)) return false;
    return null;
}

function cellToDecision(value: CellValue): DecisionOutcome | '' | null {
    const text = cellToText(value);
    if (text.length === 0) return '';
    const tag = parseDecisionTag(text);
    return tag === '' ? null : tag;
}

/**
 * Normalizes one import row into a record ready for the store, or the reason
 * it cannot be imported.
 */
export function normalizeImportRow(row: ImportRow): NormalizedRow {
    const region = normalizeRegion(row.region);
    if (!region) {
        return { ok: false, reason: `invalid region "${cellToText(row.region)}"` };
    }
    const invoiceNumber = normalizeDocumentNumber(row.invoiceNumber);
    if (!invoiceNumber) {
        return { ok: false, reason: `invalid invoice number "${cellToText(row.invoiceNumber)}"` };
    }
    const key = recordKey(region, invoiceNumber);
    const orderNumber = normalizeDocumentNumber(row.orderNumber);
    if (!orderNumber) {
        return { ok: false, key, reason: `invalid order number "${cellToText(row.orderNumber)}"` };
    }
    const receivedDate = cellToIsoDate(row.receivedDate);
    if (!receivedDate) {
        return { ok: false, key, reason: `invalid received date "${cellToText(row.receivedDate)}"` };
    }

    let plannedDate: string | null = null;
    if (cellToText(row.plannedDate).length > 0) {
        plannedDate = cellToIsoDate(row.plannedDate);
        if (!plannedDate) {
            return { ok: false, key, reason: `invalid planned date "${cellToText(row.plannedDate)}"` };
        }
    }

    const decision = cellToDecision(row.decision);
    if (decision === null) {
        return { ok: false, key, reason: `unknown decision "${cellToText(row.decision)}"` };
    }
    const isValid = cellToBoolean(row.valid);
    if (isValid === null) {
        return { ok: false, key, reason: `invalid valid flag "${cellToText(row.valid)}"` };
    }

    return {
        ok: true,
        key,
        record: {
            region,
            invoiceNumber,
            orderNumber,
            receivedDate,
            isValid,
            plannedDate,
            decision,
            message: cellToText(row.message),
        },
    };
}
