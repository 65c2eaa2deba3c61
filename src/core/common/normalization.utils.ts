// src/core/common/normalization.utils.ts

/** Raw value of a parsed spreadsheet/CSV/JSON cell */
export type CellValue = string | number | boolean | Date | null | undefined;

export const MAX_REGION_LENGTH = 6;

// Largest unsigned 64-bit integer
const MAX_DOCUMENT_NUMBER = BigInt('18446744073709551615');

/**
 * Renders a cell as trimmed text. Dates become ISO dates (UTC components).
 */
export function cellToText(value: CellValue): string {
    if (value === null || value === undefined) {
        return '';
    }
    if (value instanceof Date) {
        if (isNaN(value.getTime())) return '';
        const month = String(value.getUTCMonth() + 1).padStart(2, '0');
        const day = String(value.getUTCDate()).padStart(2, '0');
        return `${value.getUTCFullYear()}-${month}-${day}`;
    }
    return String(value).trim();
}

/**
 * Normalizes a region code: trimmed and upper-cased, 1 to 6 characters.
 * @returns The normalized code, or null when blank or too long.
 */
export function normalizeRegion(value: CellValue): string | null {
    const text = cellToText(value).toUpperCase();
    if (text.length === 0 || text.length > MAX_REGION_LENGTH) {
        return null;
    }
    return text;
}

/**
 * Normalizes an invoice or order number to the canonical decimal form of a
 * non-negative 64-bit integer (no sign, no leading zeros).
 * Spreadsheet exports sometimes carry a ".0" suffix, which is accepted.
 * @returns The digit string, or null when the value is not such an integer.
 */
export function normalizeDocumentNumber(value: CellValue): string | null {
    if (typeof value === 'number') {
        if (!Number.isSafeInteger(value) || value < 0) {
            return null;
        }
        return String(value);
    }
    if (typeof value !== 'string') {
        return null;
    }
    const match = value.trim().match(/^(\d+)(?:\.0+)?$/);
    if (!match) {
        return null;
    }
    const parsed = BigInt(match[1]);
    if (parsed > MAX_DOCUMENT_NUMBER) {
        return null;
    }
    return parsed.toString();
}

/** Identity key of a verification record */
export function recordKey(region: string, invoiceNumber: string): string {
    return `${region}|${invoiceNumber}`;
}

/** Join key of a planning catalog entry */
export function catalogKey(region: string, invoiceNumber: string, orderNumber: string): string {
    return `${region}|${invoiceNumber}|${orderNumber}`;
}

/**
 * Converts an Excel date serial number to a JavaScript Date object SET TO UTC NOON.
 * Assumes the standard Excel 1900 date system (Windows).
 * @param serial Excel date serial number (number of days since 1899-12-31).
 * @returns JavaScript Date object representing UTC noon of that date, or null if input is invalid.
 */
export function excelSerialDateToJSDate(serial: number | string | null | undefined): Date | null {
    if (typeof serial === 'string') {
        serial = parseFloat(serial);
    }
    if (typeof serial !== 'number' || isNaN(serial) || serial < 1) {
        return null;
    }

    // 25569 = days from 1900-01-01 to 1970-01-01 (inclusive of Excel's fake 1900 leap day)
    const excelEpochDiff = 25569;
    const millisecondsPerDay = 86400 * 1000;

    const daysSinceEpoch = Math.floor(serial) - excelEpochDiff;
    const targetMillisecondsUTC = (daysSinceEpoch * millisecondsPerDay) + (12 * 60 * 60 * 1000);

    const date = new Date(targetMillisecondsUTC);
    if (isNaN(date.getTime())) {
        return null;
    }
    return date;
}
