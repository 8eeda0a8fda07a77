/**
 * src/metrics/overlap.ts
 *
 * "Still open" overlap between two snapshots of the same employer:
 *   window ids  = postings we captured during a past window
 *   open-now ids = postings the search API still lists today
 *
 * The overlap rate is a proxy for roles that are slow to fill. It assumes
 * upstream ids are stable; a reissued id looks like a filled role, so the
 * metric can only undercount.
 */

export interface OverlapCounts {
    captured: number;
    openNow: number;
    stillOpen: number;
    /** stillOpen / captured, 0 when nothing was captured */
    rate: number;
}

export interface DelayPolicy {
    monthMinCaptured: number;
    monthMinStillOpen: number;
    monthMinRate: number;
    trendAvgRate: number;
    trendAvgMinStillOpen: number;
    trendDelta: number;
    trendDeltaMinStillOpen: number;
    trendNewestRate: number;
    trendNewestMinStillOpen: number;
}

export const DEFAULT_DELAY_POLICY: DelayPolicy = {
    monthMinCaptured: 3,
    monthMinStillOpen: 5,
    monthMinRate: 0.5,
    trendAvgRate: 0.45,
    trendAvgMinStillOpen: 6,
    trendDelta: 0.15,
    trendDeltaMinStillOpen: 4,
    trendNewestRate: 0.6,
    trendNewestMinStillOpen: 3,
};

export function computeOverlap(windowIds: ReadonlySet<string>, openNowIds: ReadonlySet<string>): OverlapCounts {
    let stillOpen = 0;
    for (const id of windowIds) {
        if (openNowIds.has(id)) stillOpen++;
    }
    const captured = windowIds.size;
    return {
        captured,
        openNow: openNowIds.size,
        stillOpen,
        rate: captured === 0 ? 0 : stillOpen / captured,
    };
}

export function monthlyDelayFlag(c: OverlapCounts, policy: DelayPolicy = DEFAULT_DELAY_POLICY): boolean {
    return c.captured >= policy.monthMinCaptured
        && (c.stillOpen >= policy.monthMinStillOpen || c.rate >= policy.monthMinRate);
}

/**
 * @param weeks newest first; the first entry is the most recent completed week
 */
export function trendDelayFlag(weeks: readonly OverlapCounts[], policy: DelayPolicy = DEFAULT_DELAY_POLICY): boolean {
    const [newest, previous] = weeks;
    if (!newest) return false;

    const meanRate = weeks.reduce((sum, w) => sum + w.rate, 0) / weeks.length;
    const totalStillOpen = weeks.reduce((sum, w) => sum + w.stillOpen, 0);
    if (meanRate >= policy.trendAvgRate && totalStillOpen >= policy.trendAvgMinStillOpen) return true;

    if (previous
        && newest.rate - previous.rate >= policy.trendDelta
        && newest.stillOpen >= policy.trendDeltaMinStillOpen) return true;

    return newest.rate >= policy.trendNewestRate && newest.stillOpen >= policy.trendNewestMinStillOpen;
}
