/**
 * src/services/dailyRun.ts
 *
 * One ingestion cycle: search → geofence → insert-if-new → run summary.
 *
 * Network calls are strictly sequential with a jittered pause before each
 * query. Every in-region job is stored in its own short transaction (together
 * with its company when the employer is new), so an interrupted run leaves a
 * valid store and a rerun picks up where it stopped.
 */

import { log } from '@crawlee/core';
import type { Db } from '../utils/db.js';
import { withTransaction } from '../utils/db.js';
import { sleep as defaultSleep, jitteredDelay, type Sleep } from '../utils/sleep.js';
import type { RunContext } from '../utils/runContext.js';
import type { CompanyVerification, DatePosted, JobSearchSource } from '../sources/types.js';
import { isInRegion } from '../region/classifier.js';
import type { Region } from '../region/types.js';
import { insertJobIfNew, toStorableJob } from '../store/jobStore.js';
import { companyExists, upsertCompanyIfAbsent } from '../store/companyStore.js';
import { recordRun, type RunSummary } from '../store/runStore.js';
import type { TagRules } from '../tagging/rules.js';
import { utcNowIso } from '../time/windows.js';

export interface CompanyVerifier {
    verifyCompany(companyName: string): Promise<CompanyVerification>;
}

export interface DailyRunDeps {
    db: Db;
    source: JobSearchSource;
    region: Region;
    /** Omit to skip place verification of new companies. */
    verifier?: CompanyVerifier;
    sleep?: Sleep;
    random?: () => number;
    clock?: () => Date;
    tagRules?: TagRules;
}

export interface DailyRunOptions {
    queries: readonly string[];
    datePosted: DatePosted;
    numPages: number;
    country: string;
    delayMs: number;
    jitterMs: number;
}

export interface NewCompanyRecord {
    employerNorm: string;
    employerName: string;
    verification?: CompanyVerification;
}

export interface DailyRunResult {
    runId: number;
    summary: RunSummary;
    newCompanies: NewCompanyRecord[];
}

export async function runDaily(
    deps: DailyRunDeps,
    options: DailyRunOptions,
    ctx: RunContext,
): Promise<DailyRunResult> {
    const { db, source, region } = deps;
    const pause = deps.sleep ?? defaultSleep;
    const clock = deps.clock ?? (() => new Date());

    let scanned = 0;
    let inRegion = 0;
    let newJobs = 0;
    const newCompanies: NewCompanyRecord[] = [];

    const queries = options.queries.map((q) => q.trim()).filter(Boolean);
    if (queries.length === 0) {
        log.warning('[Daily] No search queries configured (SEARCH_QUERIES). Nothing to fetch.');
    }

    for (const [i, query] of queries.entries()) {
        await pause(jitteredDelay(options.delayMs, options.jitterMs, deps.random));

        const records = await source.search({
            query,
            page: 1,
            numPages: options.numPages,
            datePosted: options.datePosted,
            country: options.country,
        });
        scanned += records.length;

        let queryInRegion = 0;
        let queryNew = 0;

        for (const record of records) {
            if (!isInRegion(record, region)) continue;
            inRegion++;
            queryInRegion++;

            const job = toStorableJob(
                record,
                { searchQuery: query, runDate: ctx.runDate, nowUtc: utcNowIso(clock()) },
                deps.tagRules,
            );
            if (!job) {
                log.debug(`[Daily] Skipping in-region record without job_id (query "${query}")`);
                continue;
            }

            const isNewEmployer = job.employerNorm !== '' && !companyExists(db, job.employerNorm);

            if (isNewEmployer) {
                // Verification is a network call, so it happens before the transaction opens.
                const verification = deps.verifier ? await deps.verifier.verifyCompany(job.employerName) : undefined;

                const { created, inserted } = withTransaction(db, () => ({
                    created: upsertCompanyIfAbsent(db, job.employerName, ctx.runDate, job.firstSeenUtc, verification),
                    inserted: insertJobIfNew(db, job),
                }));

                if (created) {
                    newCompanies.push({ employerNorm: job.employerNorm, employerName: job.employerName, verification });
                    log.info(`[Daily] New company: ${job.employerName}` +
                        (verification ? ` (places: ${verification.reason})` : ''));
                }
                if (inserted) {
                    newJobs++;
                    queryNew++;
                }
            } else if (withTransaction(db, () => insertJobIfNew(db, job))) {
                newJobs++;
                queryNew++;
            }
        }

        log.info(`[Daily] (${i + 1}/${queries.length}) "${query}": ${records.length} scanned, ` +
            `${queryInRegion} in region, ${queryNew} new`);
    }

    const summary: RunSummary = {
        runDate: ctx.runDate,
        startedUtc: ctx.startedUtc,
        finishedUtc: utcNowIso(clock()),
        queryParams: { queries, date_posted: options.datePosted, num_pages: options.numPages },
        jobsScannedCount: scanned,
        jobsInRegionCount: inRegion,
        newJobsCount: newJobs,
        newCompaniesCount: newCompanies.length,
    };
    const runId = recordRun(db, summary);

    log.info(`[Daily] Run ${runId} done: scanned=${scanned} in_region=${inRegion} ` +
        `new_jobs=${newJobs} new_companies=${newCompanies.length}`);

    return { runId, summary, newCompanies };
}
