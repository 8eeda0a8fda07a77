/**
 * src/store/runStore.ts
 *
 * One immutable row per ingestion cycle. Counts reflect work actually
 * completed, not work intended: a query that failed contributes nothing.
 */

import type { Db } from '../utils/db.js';
import type { DateRange } from '../time/windows.js';

export interface RunSummary {
    runDate: string;
    startedUtc: string;
    finishedUtc: string;
    queryParams: unknown;
    jobsScannedCount: number;
    jobsInRegionCount: number;
    newJobsCount: number;
    newCompaniesCount: number;
}

export interface RunStats {
    jobsScannedCount: number;
    jobsInRegionCount: number;
    newJobsCount: number;
    newCompaniesCount: number;
}

/** @returns the new run_id */
export function recordRun(db: Db, summary: RunSummary): number {
    const result = db
        .prepare(`
            INSERT INTO runs (
                run_date, started_utc, finished_utc, queries_json,
                jobs_scanned_count, jobs_in_moco_count, new_jobs_count, new_companies_count
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`)
        .run(
            summary.runDate,
            summary.startedUtc,
            summary.finishedUtc,
            JSON.stringify(summary.queryParams),
            summary.jobsScannedCount,
            summary.jobsInRegionCount,
            summary.newJobsCount,
            summary.newCompaniesCount,
        );
    return Number(result.lastInsertRowid);
}

interface RunStatsRow {
    scanned: number | null;
    in_region: number | null;
    new_jobs: number | null;
    new_companies: number | null;
}

function toStats(row: RunStatsRow | undefined): RunStats {
    return {
        jobsScannedCount: row?.scanned ?? 0,
        jobsInRegionCount: row?.in_region ?? 0,
        newJobsCount: row?.new_jobs ?? 0,
        newCompaniesCount: row?.new_companies ?? 0,
    };
}

export interface LatestRun extends RunStats {
    runId: number;
    startedUtc: string;
    finishedUtc: string;
}

/** The last run recorded for `runDate`, if any. */
export function latestRunForDate(db: Db, runDate: string): LatestRun | null {
    const row = db
        .prepare<[string], RunStatsRow & { run_id: number; started_utc: string | null; finished_utc: string | null }>(`
            SELECT run_id, started_utc, finished_utc,
                   jobs_scanned_count AS scanned, jobs_in_moco_count AS in_region,
                   new_jobs_count AS new_jobs, new_companies_count AS new_companies
            FROM runs
            WHERE run_date = ?
            ORDER BY run_id DESC
            LIMIT 1`)
        .get(runDate);
    if (!row) return null;
    return {
        runId: row.run_id,
        startedUtc: row.started_utc ?? '',
        finishedUtc: row.finished_utc ?? '',
        ...toStats(row),
    };
}

/** Date of the most recently recorded run, or null before the first one. */
export function latestRunDate(db: Db): string | null {
    return db
        .prepare<[], { run_date: string }>('SELECT run_date FROM runs ORDER BY run_date DESC, run_id DESC LIMIT 1')
        .get()?.run_date ?? null;
}

/** Sum of run counts for runs dated inside [start, endExclusive). */
export function sumRunStats(db: Db, range: DateRange): RunStats {
    const row = db
        .prepare<[string, string], RunStatsRow>(`
            SELECT SUM(jobs_scanned_count) AS scanned,
                   SUM(jobs_in_moco_count)  AS in_region,
                   SUM(new_jobs_count)      AS new_jobs,
                   SUM(new_companies_count) AS new_companies
            FROM runs
            WHERE run_date >= ? AND run_date < ?`)
        .get(range.start, range.endExclusive);
    return toStats(row);
}
