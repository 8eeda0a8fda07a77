import { log } from '@crawlee/core';
import type { Db } from '../utils/db.js';
import { retagSectors } from '../store/jobStore.js';
import type { TagRules } from '../tagging/rules.js';
import { addDays } from '../time/windows.js';

/**
 * Re-derive sector tags for jobs first seen in the last `daysBack` days,
 * after the rule table changed. Requirement tags and first-seen fields are
 * left alone.
 */
export function retagRecentJobs(db: Db, today: string, daysBack: number, rules?: TagRules): number {
    const since = addDays(today, -daysBack);
    const updated = retagSectors(db, since, rules);
    log.info(`[Retag] Updated sector tags on ${updated} jobs first seen since ${since}`);
    return updated;
}
