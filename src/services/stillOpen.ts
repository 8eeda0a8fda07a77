/**
 * src/services/stillOpen.ts
 *
 * Still-open snapshot for the top employers of last month.
 *
 * For each tracked employer the search API is asked once for the postings it
 * lists today; that one set is intersected with the employer's captured ids
 * for last month and for each of the last three completed weeks.
 */

import { log } from '@crawlee/core';
import type { Db } from '../utils/db.js';
import { withTransaction } from '../utils/db.js';
import type { JobSearchSource } from '../sources/types.js';
import { errorMessage } from '../sources/httpRetry.js';
import { pause, type Sleep } from '../utils/sleep.js';
import { topEmployers, windowJobIds } from '../store/reportQueries.js';
import { listStillOpenMetrics, upsertStillOpenMetric, type StillOpenMetric } from '../store/metricStore.js';
import type { StillOpenKind } from '../db/migrate.js';
import {
    computeOverlap,
    DEFAULT_DELAY_POLICY,
    monthlyDelayFlag,
    trendDelayFlag,
    type DelayPolicy,
    type OverlapCounts,
} from '../metrics/overlap.js';
import {
    isValidMonth,
    lastDay,
    lastNCompletedWeeks,
    monthOf,
    monthRange,
    previousMonth,
    type DateRange,
} from '../time/windows.js';

export const TREND_WEEKS = 3;

export interface StillOpenOptions {
    today: string;
    computedUtc: string;
    topN: number;
    excludedEmployers: readonly string[];
    policy?: DelayPolicy;
    delayMs: number;
    jitterMs: number;
}

export interface StillOpenDeps {
    sleep?: Sleep;
    random?: () => number;
}

export interface WeeklyOverlap {
    periodKey: string;
    window: DateRange;
    counts: OverlapCounts;
}

export interface CompanyStillOpen {
    employerNorm: string;
    employerName: string;
    monthly: OverlapCounts;
    /** Newest first. */
    weekly: WeeklyOverlap[];
    monthlyFlag: boolean;
    trendFlag: boolean;
}

export interface StillOpenReport {
    month: string;
    monthWindow: DateRange;
    weeks: DateRange[];
    companies: CompanyStillOpen[];
    /** Employers whose live snapshot could not be fetched. */
    failed: string[];
}

/**
 * @param source null when no search key is configured; the metric is then
 *               skipped and nothing is written.
 */
export async function computeStillOpen(
    db: Db,
    source: JobSearchSource | null,
    options: StillOpenOptions,
    deps: StillOpenDeps = {},
): Promise<StillOpenReport | null> {
    if (!source) {
        log.warning('[StillOpen] No RAPIDAPI_KEY configured; skipping still-open metrics.');
        return null;
    }

    const policy = options.policy ?? DEFAULT_DELAY_POLICY;
    const month = previousMonth(monthOf(options.today));
    const monthWindow = monthRange(month);
    const weeks = lastNCompletedWeeks(options.today, TREND_WEEKS);

    const tracked = topEmployers(db, monthWindow, options.topN, options.excludedEmployers);
    log.info(`[StillOpen] Tracking ${tracked.length} employers for ${month}`);

    const companies: CompanyStillOpen[] = [];
    const failed: string[] = [];

    for (const employer of tracked) {
        let openNow: Set<string>;
        await pause({ delayMs: options.delayMs, jitterMs: options.jitterMs, sleep: deps.sleep, random: deps.random });
        try {
            openNow = await source.fetchOpenJobIdentifiers(employer.employerName);
        } catch (err) {
            log.warning(`[StillOpen] Could not fetch open postings for ${employer.employerName}: ${errorMessage(err)}`);
            failed.push(employer.employerName);
            continue;
        }

        const monthly = computeOverlap(windowJobIds(db, employer.employerNorm, monthWindow), openNow);
        const weekly = weeks.map((window) => ({
            periodKey: lastDay(window),
            window,
            counts: computeOverlap(windowJobIds(db, employer.employerNorm, window), openNow),
        }));

        withTransaction(db, () => {
            const base = {
                employerNorm: employer.employerNorm,
                employerName: employer.employerName,
                computedUtc: options.computedUtc,
            };
            upsertStillOpenMetric(db, 'monthly', { ...base, periodKey: month, window: monthWindow, counts: monthly });
            for (const w of weekly) {
                upsertStillOpenMetric(db, 'threeWeek', { ...base, periodKey: w.periodKey, window: w.window, counts: w.counts });
            }
        });

        companies.push({
            employerNorm: employer.employerNorm,
            employerName: employer.employerName,
            monthly,
            weekly,
            monthlyFlag: monthlyDelayFlag(monthly, policy),
            trendFlag: trendDelayFlag(weekly.map((w) => w.counts), policy),
        });
    }

    return { month, monthWindow, weeks, companies, failed };
}

// ─── History ──────────────────────────────────────────────────────────────────

export interface StillOpenHistory {
    kind: StillOpenKind;
    periodKey: string;
    metrics: StillOpenMetric[];
}

/**
 * Stored snapshots for one period: a month ("YYYY-MM") reads the monthly
 * table, a week's last day ("YYYY-MM-DD") the weekly one.
 */
export function loadStillOpenHistory(db: Db, periodKey: string): StillOpenHistory {
    const kind: StillOpenKind = isValidMonth(periodKey) ? 'monthly' : 'threeWeek';
    return { kind, periodKey, metrics: listStillOpenMetrics(db, kind, periodKey) };
}
