import { DateParseError } from '../../../src/core/common/errors';
import {
    formatIsoDate,
    isIsoDate,
    parseCalendarDate,
    parseYearMonth,
    UNPARSED_YEAR_MONTH
} from '../../../src/core/decision';

describe('parseCalendarDate', () => {
    it.each([
        ['2025-05-20', { year: 2025, month: 5, day: 20 }],
        ['2025/05/20', { year: 2025, month: 5, day: 20 }],
        ['20/05/2025', { year: 2025, month: 5, day: 20 }],
        ['20-05-2025', { year: 2025, month: 5, day: 20 }],
        ['2025-05', { year: 2025, month: 5, day: 1 }],
        ['2025/5', { year: 2025, month: 5, day: 1 }],
        ['2025/maio', { year: 2025, month: 5, day: 1 }],
        ['2025-Dezembro', { year: 2025, month: 12, day: 1 }],
        ['2025 / Março', { year: 2025, month: 3, day: 1 }],
        ['2025/marco', { year: 2025, month: 3, day: 1 }],
        ['2025/set', { year: 2025, month: 9, day: 1 }],
    ])('parses %s', (text, expected) => {
        expect(parseCalendarDate(text)).toEqual(expected);
    });

    it('prefers day-first for ambiguous slashed dates', () => {
        expect(parseCalendarDate('03/04/2025')).toEqual({ year: 2025, month: 4, day: 3 });
    });

    it('falls back to month-first when day-first is not a real date', () => {
        expect(parseCalendarDate('05/20/2025')).toEqual({ year: 2025, month: 5, day: 20 });
    });

    it('ignores a trailing time component', () => {
        expect(parseCalendarDate('2025-05-20T10:30:00')).toEqual({ year: 2025, month: 5, day: 20 });
        expect(parseCalendarDate('20/05/2025 14:05')).toEqual({ year: 2025, month: 5, day: 20 });
    });

    it('trims surrounding whitespace', () => {
        expect(parseCalendarDate('  2025-05-20 ')).toEqual({ year: 2025, month: 5, day: 20 });
    });

    it.each(['2025-02-30', '31/02/2025', 'yesterday', '', '2025-05/20', '0999-01-01', '2025/brumaire', '2025-13'])(
        'returns a DateParseError for %j',
        text => {
            const result = parseCalendarDate(text);
            expect(result).toBeInstanceOf(DateParseError);
            expect(result instanceof DateParseError && result.input).toBe(text);
        }
    );

    it('reads its own ISO output back to the same date', () => {
        const original = { year: 2024, month: 2, day: 29 };
        expect(parseCalendarDate(formatIsoDate(original))).toEqual(original);
    });
});

describe('parseYearMonth', () => {
    it('keeps year and month', () => {
        expect(parseYearMonth('2025/maio')).toEqual({ year: 2025, month: 5 });
        expect(parseYearMonth('15/06/2025')).toEqual({ year: 2025, month: 6 });
    });

    it('returns the unparsed sentinel on failure', () => {
        expect(parseYearMonth('n/a')).toEqual(UNPARSED_YEAR_MONTH);
        expect(parseYearMonth('n/a')).toEqual({ year: 0, month: 0 });
    });
});

describe('formatIsoDate / isIsoDate', () => {
    it('pads month and day', () => {
        expect(formatIsoDate({ year: 2025, month: 5, day: 1 })).toBe('2025-05-01');
    });

    it('accepts only canonical real dates', () => {
        expect(isIsoDate('2024-02-29')).toBe(true);
        expect(isIsoDate('2025-02-29')).toBe(false);
        expect(isIsoDate('2025-5-1')).toBe(false);
        expect(isIsoDate('20/05/2025')).toBe(false);
    });
});
