import { describe, it, expect } from 'vitest';
import {
    addDays,
    contains,
    isValidIsoDate,
    lastDay,
    lastNCompletedWeeks,
    lastNMonths,
    monthRange,
    mostRecentCompletedWeek,
    previousMonth,
    utcNowIso,
    weekToDate,
} from './windows.js';

describe('mostRecentCompletedWeek', () => {
    it('on a Saturday returns the week that ended 7 days earlier', () => {
        expect(mostRecentCompletedWeek('2026-10-17')).toEqual({ start: '2026-10-04', endExclusive: '2026-10-11' });
    });

    it('on Sunday and Monday returns the week that just ended', () => {
        const expected = { start: '2026-10-11', endExclusive: '2026-10-18' };
        expect(mostRecentCompletedWeek('2026-10-18')).toEqual(expected);
        expect(mostRecentCompletedWeek('2026-10-19')).toEqual(expected);
    });

    it('rejects malformed dates', () => {
        expect(() => mostRecentCompletedWeek('2026-13-01')).toThrow(RangeError);
        expect(() => mostRecentCompletedWeek('yesterday')).toThrow(RangeError);
    });
});

describe('lastNCompletedWeeks', () => {
    it('is newest first and contiguous', () => {
        expect(lastNCompletedWeeks('2026-10-19', 3)).toEqual([
            { start: '2026-10-11', endExclusive: '2026-10-18' },
            { start: '2026-10-04', endExclusive: '2026-10-11' },
            { start: '2026-09-27', endExclusive: '2026-10-04' },
        ]);
    });
});

describe('weekToDate', () => {
    it('runs from Sunday through today inclusive', () => {
        expect(weekToDate('2026-10-19')).toEqual({ start: '2026-10-18', endExclusive: '2026-10-20' });
    });
});

describe('monthRange', () => {
    it('is half-open at the first of the next month', () => {
        expect(monthRange('2026-02')).toEqual({ start: '2026-02-01', endExclusive: '2026-03-01' });
    });

    it('rolls December over into January', () => {
        expect(monthRange('2026-12')).toEqual({ start: '2026-12-01', endExclusive: '2027-01-01' });
    });

    it('rejects invalid months', () => {
        expect(() => monthRange('2026-13')).toThrow(RangeError);
        expect(() => monthRange('2026-1')).toThrow(RangeError);
    });
});

describe('month arithmetic', () => {
    it('previousMonth crosses the year boundary', () => {
        expect(previousMonth('2026-01')).toBe('2025-12');
    });

    it('lastNMonths ends with the current month, oldest first', () => {
        expect(lastNMonths('2026-10-19', 3)).toEqual(['2026-08', '2026-09', '2026-10']);
    });
});

describe('range helpers', () => {
    const week = { start: '2026-10-04', endExclusive: '2026-10-11' };

    it('contains() excludes the end date', () => {
        expect(contains(week, '2026-10-04')).toBe(true);
        expect(contains(week, '2026-10-10')).toBe(true);
        expect(contains(week, '2026-10-11')).toBe(false);
    });

    it('lastDay() is the inclusive end', () => {
        expect(lastDay(week)).toBe('2026-10-10');
    });

    it('addDays() crosses month and year ends', () => {
        expect(addDays('2026-12-31', 1)).toBe('2027-01-01');
        expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
    });

    it('utcNowIso() drops milliseconds', () => {
        expect(utcNowIso(new Date('2026-01-05T14:03:09.123Z'))).toBe('2026-01-05T14:03:09Z');
    });

    it('isValidIsoDate() accepts only real calendar dates', () => {
        expect(isValidIsoDate('2026-02-28')).toBe(true);
        expect(isValidIsoDate('2026-02-30')).toBe(false);
        expect(isValidIsoDate('2026-10')).toBe(false);
    });
});
