/**
 * src/services/reports.ts
 *
 * Report builders over the persisted store. Each returns plain data; the CLI
 * decides how to print it.
 */

import { log } from '@crawlee/core';
import type { Db } from '../utils/db.js';
import type { JobSearchSource } from '../sources/types.js';
import { errorMessage } from '../sources/httpRetry.js';
import { pause, type Throttle } from '../utils/sleep.js';
import {
    companyIndicators,
    countDistinctJobs,
    countJobsWithRequirement,
    countJobsWithTitleKeyword,
    newCompaniesInRange,
    sampleJobs,
    sectorStats,
    topEmployers,
    topTitles,
    windowJobIds,
    type CompanyIndicator,
    type EmployerCount,
    type JobLink,
    type NewCompany,
    type SectorStats,
} from '../store/reportQueries.js';
import { latestRunForDate, sumRunStats, type LatestRun, type RunStats } from '../store/runStore.js';
import { REQUIREMENT_TAGS, SECTOR_TAGS, type RequirementTag, type SectorTag } from '../tagging/rules.js';
import {
    addDays,
    lastNMonths,
    monthOf,
    monthRange,
    mostRecentCompletedWeek,
    previousMonth,
    weekToDate,
    type DateRange,
} from '../time/windows.js';

// ─── Monthly ──────────────────────────────────────────────────────────────────

export interface MonthlyReport {
    month: string;
    window: DateRange;
    totalJobs: number;
    employers: EmployerCount[];
}

export function buildMonthlyReport(db: Db, month: string, topN: number): MonthlyReport {
    const window = monthRange(month);
    return {
        month,
        window,
        totalJobs: countDistinctJobs(db, window),
        employers: topEmployers(db, window, topN),
    };
}

// ─── Weekly ───────────────────────────────────────────────────────────────────

export interface WeeklyReport {
    window: DateRange;
    /** True when the completed week was empty and week-to-date was used instead. */
    weekToDate: boolean;
    runStats: RunStats;
    newCompanies: NewCompany[];
    topEmployers: EmployerCount[];
    sectors: SectorSection[];
}

export interface SectorSection {
    tag: SectorTag;
    stats: SectorStats;
    topEmployers: EmployerCount[];
    newCompanies: NewCompany[];
}

/**
 * The most recent completed week, unless nothing was captured in it (e.g.
 * the pipeline only just started), in which case the current week so far.
 */
export function resolveReportWeek(db: Db, today: string): { window: DateRange; weekToDate: boolean } {
    const completed = mostRecentCompletedWeek(today);
    if (countDistinctJobs(db, completed) > 0) return { window: completed, weekToDate: false };
    return { window: weekToDate(today), weekToDate: true };
}

export function buildWeeklyReport(
    db: Db,
    today: string,
    options: { topN: number; excludedEmployers: readonly string[] },
): WeeklyReport {
    const { window, weekToDate: isWeekToDate } = resolveReportWeek(db, today);

    return {
        window,
        weekToDate: isWeekToDate,
        runStats: sumRunStats(db, window),
        newCompanies: newCompaniesInRange(db, window, { excluded: options.excludedEmployers }),
        topEmployers: topEmployers(db, window, options.topN, options.excludedEmployers),
        sectors: SECTOR_TAGS.map((tag) => ({
            tag,
            stats: sectorStats(db, tag, window),
            topEmployers: topEmployers(db, window, options.topN, options.excludedEmployers, tag),
            newCompanies: newCompaniesInRange(db, window, { excluded: options.excludedEmployers, sectorTag: tag }),
        })),
    };
}

// ─── Indicators ───────────────────────────────────────────────────────────────

export interface IndicatorRow extends CompanyIndicator {
    titlesThisMonth: string[];
    titlesLastMonth: string[];
    /** Postings the search API lists for the employer from the last month; null when unknown. */
    openLastMonth: number | null;
    /** max(0, openLastMonth - thisCount); null when openLastMonth is. */
    hardToFill: number | null;
}

export interface IndicatorsReport {
    thisMonth: string;
    lastMonth: string;
    rows: IndicatorRow[];
}

export interface IndicatorsOptions {
    limit: number;
    excludedEmployers: readonly string[];
    /** Live lookups are skipped when null. */
    source: JobSearchSource | null;
    throttle: Throttle;
}

async function openLastMonth(source: JobSearchSource | null, employerName: string, throttle: Throttle): Promise<number | null> {
    if (!source) return null;
    await pause(throttle);
    try {
        return (await source.fetchOpenJobIdentifiers(employerName)).size;
    } catch (err) {
        log.warning(`[Indicators] Could not fetch open postings for ${employerName}: ${errorMessage(err)}`);
        return null;
    }
}

export async function buildIndicatorsReport(db: Db, today: string, options: IndicatorsOptions): Promise<IndicatorsReport> {
    const thisMonth = monthOf(today);
    const lastMonth = previousMonth(thisMonth);
    const thisRange = monthRange(thisMonth);
    const lastRange = monthRange(lastMonth);

    const rows: IndicatorRow[] = [];
    for (const c of companyIndicators(db, thisRange, lastRange, options.limit, options.excludedEmployers)) {
        const open = await openLastMonth(options.source, c.employerName, options.throttle);
        rows.push({
            ...c,
            titlesThisMonth: topTitles(db, c.employerNorm, thisRange),
            titlesLastMonth: topTitles(db, c.employerNorm, lastRange),
            openLastMonth: open,
            hardToFill: open === null ? null : Math.max(0, open - c.thisCount),
        });
    }

    return { thisMonth, lastMonth, rows };
}

// ─── Daily ────────────────────────────────────────────────────────────────────

export interface DailyCompany extends NewCompany {
    jobCount: number;
    samples: JobLink[];
}

export interface DailyReport {
    runDate: string;
    /** Last run recorded that day. */
    run: LatestRun | null;
    newCompanies: DailyCompany[];
}

/** Companies first seen on `runDate`, with their job count and up to three sample jobs from that day. */
export function buildDailyReport(db: Db, runDate: string): DailyReport {
    const day = { start: runDate, endExclusive: addDays(runDate, 1) };
    return {
        runDate,
        run: latestRunForDate(db, runDate),
        newCompanies: newCompaniesInRange(db, day).map((c) => ({
            ...c,
            jobCount: windowJobIds(db, c.employerNorm, day).size,
            samples: sampleJobs(db, c.employerNorm, day),
        })),
    };
}

// ─── Trends ───────────────────────────────────────────────────────────────────

/** Series key → case-insensitive substring looked for in job titles. */
export const TITLE_KEYWORDS = [
    ['engineer', 'engineer'],
    ['chemist', 'chemist'],
    ['software_developer', 'software developer'],
    ['data_scientist', 'data scientist'],
] as const;

export type TitleKeyword = (typeof TITLE_KEYWORDS)[number][0];

export interface TrendSeries {
    /** Oldest first; every `counts` below is aligned with it. */
    months: string[];
    requirements: Array<{ tag: RequirementTag; counts: number[] }>;
    titles: Array<{ keyword: TitleKeyword; counts: number[] }>;
}

export function buildTrendSeries(db: Db, today: string, monthCount: number): TrendSeries {
    const months = lastNMonths(today, monthCount);
    const ranges = months.map(monthRange);

    return {
        months,
        requirements: REQUIREMENT_TAGS.map((tag) => ({
            tag,
            counts: ranges.map((r) => countJobsWithRequirement(db, tag, r)),
        })),
        titles: TITLE_KEYWORDS.map(([keyword, needle]) => ({
            keyword,
            counts: ranges.map((r) => countJobsWithTitleKeyword(db, needle, r)),
        })),
    };
}
