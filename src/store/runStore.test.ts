import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { latestRunDate, latestRunForDate, recordRun, sumRunStats, type RunSummary } from './runStore.js';
import { closeDb, type Db } from '../utils/db.js';
import { memoryDb } from '../testing/fixtures.js';

function summary(runDate: string, overrides: Partial<RunSummary> = {}): RunSummary {
    return {
        runDate,
        startedUtc: `${runDate}T06:00:00Z`,
        finishedUtc: `${runDate}T06:05:00Z`,
        queryParams: { queries: ['engineer'], date_posted: 'today', num_pages: 1 },
        jobsScannedCount: 10,
        jobsInRegionCount: 4,
        newJobsCount: 3,
        newCompaniesCount: 1,
        ...overrides,
    };
}

describe('runStore', () => {
    let db: Db;

    beforeEach(() => {
        db = memoryDb();
    });

    afterEach(() => {
        closeDb(db);
    });

    it('records runs with increasing ids and stores query params as JSON', () => {
        const first = recordRun(db, summary('2026-10-05'));
        const second = recordRun(db, summary('2026-10-05', { newJobsCount: 0 }));

        expect(second).toBeGreaterThan(first);
        const row = db
            .prepare<[number], { queries_json: string }>('SELECT queries_json FROM runs WHERE run_id = ?')
            .get(first);
        expect(JSON.parse(row?.queries_json ?? '')).toEqual({
            queries: ['engineer'],
            date_posted: 'today',
            num_pages: 1,
        });
    });

    it('returns the latest run for a date', () => {
        recordRun(db, summary('2026-10-05'));
        const lastId = recordRun(db, summary('2026-10-05', { newJobsCount: 0, finishedUtc: '2026-10-05T07:00:00Z' }));

        expect(latestRunForDate(db, '2026-10-05')).toEqual({
            runId: lastId,
            startedUtc: '2026-10-05T06:00:00Z',
            finishedUtc: '2026-10-05T07:00:00Z',
            jobsScannedCount: 10,
            jobsInRegionCount: 4,
            newJobsCount: 0,
            newCompaniesCount: 1,
        });
        expect(latestRunForDate(db, '2026-10-06')).toBeNull();
    });

    it('finds the date of the newest run', () => {
        expect(latestRunDate(db)).toBeNull();

        recordRun(db, summary('2026-10-12'));
        recordRun(db, summary('2026-10-03'));

        expect(latestRunDate(db)).toBe('2026-10-12');
    });

    it('sums runs inside a half-open range', () => {
        recordRun(db, summary('2026-10-03'));
        recordRun(db, summary('2026-10-04'));
        recordRun(db, summary('2026-10-10', { jobsScannedCount: 5 }));
        recordRun(db, summary('2026-10-11'));

        expect(sumRunStats(db, { start: '2026-10-04', endExclusive: '2026-10-11' })).toEqual({
            jobsScannedCount: 15,
            jobsInRegionCount: 8,
            newJobsCount: 6,
            newCompaniesCount: 2,
        });
    });

    it('sums to zero over an empty range', () => {
        expect(sumRunStats(db, { start: '2026-01-01', endExclusive: '2026-01-08' })).toEqual({
            jobsScannedCount: 0,
            jobsInRegionCount: 0,
            newJobsCount: 0,
            newCompaniesCount: 0,
        });
    });
});
