/**
 * src/store/metricStore.ts
 *
 * Still-open metric snapshots. Unique per (period_key, employer_norm);
 * recomputing a period overwrites the row in place.
 */

import type { Db } from '../utils/db.js';
import { STILL_OPEN_TABLES, type StillOpenKind } from '../db/migrate.js';
import type { DateRange } from '../time/windows.js';
import type { OverlapCounts } from '../metrics/overlap.js';

export interface StillOpenMetric {
    periodKey: string;
    employerNorm: string;
    employerName: string;
    window: DateRange;
    counts: OverlapCounts;
    computedUtc: string;
}

export function upsertStillOpenMetric(db: Db, kind: StillOpenKind, metric: StillOpenMetric): void {
    const table = STILL_OPEN_TABLES[kind];
    db.prepare(`
        INSERT INTO ${table} (
            period_key, employer_norm, employer_name, window_start, window_end,
            captured_count, open_now_count, still_open_count, still_open_rate, computed_utc
        ) VALUES (
            @periodKey, @employerNorm, @employerName, @windowStart, @windowEnd,
            @captured, @openNow, @stillOpen, @rate, @computedUtc
        )
        ON CONFLICT (period_key, employer_norm) DO UPDATE SET
            employer_name    = excluded.employer_name,
            window_start     = excluded.window_start,
            window_end       = excluded.window_end,
            captured_count   = excluded.captured_count,
            open_now_count   = excluded.open_now_count,
            still_open_count = excluded.still_open_count,
            still_open_rate  = excluded.still_open_rate,
            computed_utc     = excluded.computed_utc`)
        .run({
            periodKey: metric.periodKey,
            employerNorm: metric.employerNorm,
            employerName: metric.employerName,
            windowStart: metric.window.start,
            windowEnd: metric.window.endExclusive,
            captured: metric.counts.captured,
            openNow: metric.counts.openNow,
            stillOpen: metric.counts.stillOpen,
            rate: metric.counts.rate,
            computedUtc: metric.computedUtc,
        });
}

interface StillOpenRow {
    period_key: string;
    employer_norm: string;
    employer_name: string | null;
    window_start: string;
    window_end: string;
    captured_count: number;
    open_now_count: number;
    still_open_count: number;
    still_open_rate: number;
    computed_utc: string;
}

export function listStillOpenMetrics(db: Db, kind: StillOpenKind, periodKey: string): StillOpenMetric[] {
    const rows = db
        .prepare<[string], StillOpenRow>(`
            SELECT * FROM ${STILL_OPEN_TABLES[kind]}
            WHERE period_key = ?
            ORDER BY still_open_count DESC, employer_norm ASC`)
        .all(periodKey);

    return rows.map((r) => ({
        periodKey: r.period_key,
        employerNorm: r.employer_norm,
        employerName: r.employer_name ?? r.employer_norm,
        window: { start: r.window_start, endExclusive: r.window_end },
        counts: {
            captured: r.captured_count,
            openNow: r.open_now_count,
            stillOpen: r.still_open_count,
            rate: r.still_open_rate,
        },
        computedUtc: r.computed_utc,
    }));
}
