// src/core/decision/date-parser.utils.ts
import { DateParseError } from '../common/errors';
import { CalendarDate, YearMonth } from '../common/interfaces/models';

/**
 * Month names of the catalog's locale. Embedded so parsing never depends on
 * the host's locale settings.
 */
const MONTH_NAMES: Readonly<Record<string, number>> = {
    'janeiro': 1, 'fevereiro': 2, 'março': 3, 'marco': 3, 'abril': 4, 'maio': 5, 'junho': 6,
    'julho': 7, 'agosto': 8, 'setembro': 9, 'outubro': 10, 'novembro': 11, 'dezembro': 12,
    'jan': 1, 'fev': 2, 'mar': 3, 'abr': 4, 'mai': 5, 'jun': 6,
    'jul': 7, 'ago': 8, 'set': 9, 'out': 10, 'nov': 11, 'dez': 12,
};

export const UNPARSED_YEAR_MONTH: YearMonth = Object.freeze({ year: 0, month: 0 });

const FULL_DATE_YEAR_FIRST = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})$/;
const FULL_DATE_YEAR_LAST = /^(\d{1,2})([-/])(\d{1,2})\2(\d{4})$/;
const YEAR_MONTH_NUMERIC = /^(\d{4})[-/](\d{1,2})$/;
const YEAR_MONTH_NAME = /^(\d{4})\s*[-/]\s*(\p{L}+)$/u;

/** Drops "T10:00:00", " 10:00" and similar trailing time components */
function stripTimeComponent(text: string): string {
    return text
        .replace(/(\d)t\d{1,2}:\d{2}.*$/, '$1')
        .replace(/\s+\d{1,2}:\d{2}.*$/, '');
}

/** Builds a date only if the components name a real calendar day */
function buildCalendarDate(year: number, month: number, day: number): CalendarDate | null {
    if (year < 1000 || year > 9999 || month < 1 || month > 12 || day < 1 || day > 31) {
        return null;
    }
    const candidate = new Date(Date.UTC(year, month - 1, day, 12, 0, 0));
    if (candidate.getUTCFullYear() !== year || candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) {
        return null; // e.g. 30 February
    }
    return { year, month, day };
}

/**
 * Parses a human-entered date or planning token.
 *
 * Patterns, first match wins: `YYYY-MM-DD`/`YYYY/MM/DD`; `DD/MM/YYYY` then
 * `MM/DD/YYYY` (also with dashes); `YYYY-MM`/`YYYY/MM`; `YYYY/<month name>`.
 * Formats without a day yield day 1.
 *
 * @returns The calendar date, or a DateParseError carrying the original input.
 *          Never falls back to the current date.
 */
export function parseCalendarDate(text: string): CalendarDate | DateParseError {
    const cleaned = stripTimeComponent(text.normalize('NFC').trim().toLowerCase());

    let match = cleaned.match(FULL_DATE_YEAR_FIRST);
    if (match) {
        const parsed = buildCalendarDate(Number(match[1]), Number(match[3]), Number(match[4]));
        if (parsed) return parsed;
    }

    match = cleaned.match(FULL_DATE_YEAR_LAST);
    if (match) {
        const first = Number(match[1]);
        const second = Number(match[3]);
        const year = Number(match[4]);
        const parsed = buildCalendarDate(year, second, first) ?? buildCalendarDate(year, first, second);
        if (parsed) return parsed;
    }

    match = cleaned.match(YEAR_MONTH_NUMERIC);
    if (match) {
        const parsed = buildCalendarDate(Number(match[1]), Number(match[2]), 1);
        if (parsed) return parsed;
    }

    match = cleaned.match(YEAR_MONTH_NAME);
    if (match) {
        const month = MONTH_NAMES[match[2]];
        if (month !== undefined) {
            const parsed = buildCalendarDate(Number(match[1]), month, 1);
            if (parsed) return parsed;
        }
    }

    return new DateParseError(text);
}

/**
 * Year and month of a date/planning token, or the {0, 0} sentinel when the
 * text cannot be parsed.
 */
export function parseYearMonth(text: string): YearMonth {
    const parsed = parseCalendarDate(text);
    if (parsed instanceof DateParseError) {
        return UNPARSED_YEAR_MONTH;
    }
    return { year: parsed.year, month: parsed.month };
}

/** YYYY-MM-DD */
export function formatIsoDate(date: CalendarDate): string {
    const month = String(date.month).padStart(2, '0');
    const day = String(date.day).padStart(2, '0');
    return `${date.year}-${month}-${day}`;
}

/** Strict check for the canonical YYYY-MM-DD form of a real date */
export function isIsoDate(text: string): boolean {
    const match = text.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return false;
    return buildCalendarDate(Number(match[1]), Number(match[2]), Number(match[3])) !== null;
}
