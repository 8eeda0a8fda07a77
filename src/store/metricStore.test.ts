import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { listStillOpenMetrics, upsertStillOpenMetric, type StillOpenMetric } from './metricStore.js';
import { closeDb, type Db } from '../utils/db.js';
import { memoryDb } from '../testing/fixtures.js';

const SEPTEMBER = { start: '2026-09-01', endExclusive: '2026-10-01' };

function metric(employerNorm: string, stillOpen: number, computedUtc = '2026-10-19T08:00:00Z'): StillOpenMetric {
    return {
        periodKey: '2026-09',
        employerNorm,
        employerName: employerNorm.toUpperCase(),
        window: SEPTEMBER,
        counts: { captured: 4, openNow: 5, stillOpen, rate: stillOpen / 4 },
        computedUtc,
    };
}

describe('metricStore', () => {
    let db: Db;

    beforeEach(() => {
        db = memoryDb();
    });

    afterEach(() => {
        closeDb(db);
    });

    it('overwrites the row for the same period and employer', () => {
        upsertStillOpenMetric(db, 'monthly', metric('acme', 1));
        upsertStillOpenMetric(db, 'monthly', metric('acme', 3, '2026-10-20T08:00:00Z'));

        const rows = listStillOpenMetrics(db, 'monthly', '2026-09');
        expect(rows).toEqual([{
            periodKey: '2026-09',
            employerNorm: 'acme',
            employerName: 'ACME',
            window: SEPTEMBER,
            counts: { captured: 4, openNow: 5, stillOpen: 3, rate: 0.75 },
            computedUtc: '2026-10-20T08:00:00Z',
        }]);
    });

    it('keeps monthly and three-week tables apart', () => {
        upsertStillOpenMetric(db, 'monthly', metric('acme', 1));

        expect(listStillOpenMetrics(db, 'threeWeek', '2026-09')).toEqual([]);
    });

    it('lists by still-open count, then employer key', () => {
        upsertStillOpenMetric(db, 'monthly', metric('gamma', 1));
        upsertStillOpenMetric(db, 'monthly', metric('beta', 2));
        upsertStillOpenMetric(db, 'monthly', metric('alpha', 1));

        expect(listStillOpenMetrics(db, 'monthly', '2026-09').map((m) => m.employerNorm))
            .toEqual(['beta', 'alpha', 'gamma']);
    });
});
