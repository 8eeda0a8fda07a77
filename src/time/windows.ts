/**
 * src/time/windows.ts
 *
 * Calendar windows over ISO dates ("YYYY-MM-DD"), all computed in UTC.
 *
 * Every range is half-open: [start, endExclusive). Weeks run Sunday through
 * Saturday, so a week's endExclusive is the following Sunday. A week is
 * "completed" once its Saturday has fully elapsed; on a Saturday the week
 * ending that day is still in progress.
 */

export interface DateRange {
    start: string;
    endExclusive: string;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_MONTH = /^(\d{4})-(0[1-9]|1[0-2])$/;
const DAY_MS = 24 * 60 * 60 * 1000;

// ─── Primitives ───────────────────────────────────────────────────────────────

function toUtcDate(iso: string): Date {
    if (!ISO_DATE.test(iso)) throw new RangeError(`Expected YYYY-MM-DD, got "${iso}"`);
    const d = new Date(`${iso}T00:00:00Z`);
    if (Number.isNaN(d.getTime()) || formatIsoDate(d) !== iso) {
        throw new RangeError(`Not a calendar date: "${iso}"`);
    }
    return d;
}

export function formatIsoDate(d: Date): string {
    return d.toISOString().slice(0, 10);
}

export function addDays(iso: string, days: number): string {
    return formatIsoDate(new Date(toUtcDate(iso).getTime() + days * DAY_MS));
}

/** 0 = Sunday … 6 = Saturday */
export function dayOfWeek(iso: string): number {
    return toUtcDate(iso).getUTCDay();
}

export function todayIso(now: Date = new Date()): string {
    return formatIsoDate(now);
}

/** Second-precision UTC timestamp, e.g. "2026-01-05T14:03:09Z". */
export function utcNowIso(now: Date = new Date()): string {
    return now.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** The last day inside the range. */
export function lastDay(range: DateRange): string {
    return addDays(range.endExclusive, -1);
}

export function contains(range: DateRange, iso: string): boolean {
    return iso >= range.start && iso < range.endExclusive;
}

// ─── Weeks ────────────────────────────────────────────────────────────────────

export function weekContaining(iso: string): DateRange {
    const start = addDays(iso, -dayOfWeek(iso));
    return { start, endExclusive: addDays(start, 7) };
}

export function mostRecentCompletedWeek(today: string): DateRange {
    const sinceSaturday = (dayOfWeek(today) + 1) % 7;
    const lastSaturday = addDays(today, -(sinceSaturday === 0 ? 7 : sinceSaturday));
    return weekContaining(lastSaturday);
}

/** Newest first; each week ends where the next one (older) begins. */
export function lastNCompletedWeeks(today: string, n: number): DateRange[] {
    const weeks: DateRange[] = [];
    let week = mostRecentCompletedWeek(today);
    for (let i = 0; i < n; i++) {
        weeks.push(week);
        week = { start: addDays(week.start, -7), endExclusive: week.start };
    }
    return weeks;
}

/** Sunday of the current week through today, inclusive. */
export function weekToDate(today: string): DateRange {
    return { start: weekContaining(today).start, endExclusive: addDays(today, 1) };
}

// ─── Months ───────────────────────────────────────────────────────────────────

export function monthRange(month: string): DateRange {
    const m = ISO_MONTH.exec(month);
    if (!m) throw new RangeError(`Month must be YYYY-MM, got "${month}"`);
    const year = Number(m[1]);
    const mon = Number(m[2]);
    const next = mon === 12 ? `${year + 1}-01` : `${year}-${String(mon + 1).padStart(2, '0')}`;
    return { start: `${month}-01`, endExclusive: `${next}-01` };
}

export function monthOf(iso: string): string {
    return toUtcDate(iso).toISOString().slice(0, 7);
}

export function previousMonth(month: string): string {
    return monthOf(addDays(monthRange(month).start, -1));
}

/** The `count` months ending with the month of `today`, oldest first. */
export function lastNMonths(today: string, count: number): string[] {
    const months: string[] = [];
    let m = monthOf(today);
    for (let i = 0; i < count; i++) {
        months.unshift(m);
        m = previousMonth(m);
    }
    return months;
}

export function isValidMonth(month: string): boolean {
    return ISO_MONTH.test(month);
}

export function isValidIsoDate(iso: string): boolean {
    try {
        toUtcDate(iso);
        return true;
    } catch {
        return false;
    }
}
