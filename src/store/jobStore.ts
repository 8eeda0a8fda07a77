/**
 * src/store/jobStore.ts
 *
 * Append-only job fact table.
 *
 * Design
 * ──────
 * • INSERT OR IGNORE keyed on job_id: the first observation of a posting
 *   wins, later observations are no-ops and report "not new".
 * • Derived tags are computed once, at insert. retagSectors() is the only
 *   path that rewrites a stored row, and it touches only `fields`.
 */

import { log } from '@crawlee/core';
import type { Db } from '../utils/db.js';
import { resolveJobFields } from '../sources/fieldMap.js';
import type { RawJobRecord } from '../sources/types.js';
import { normalizeCompany } from '../utils/normalize.js';
import {
    deriveRequirementTags,
    deriveSectorTags,
    encodeTagField,
    encodeTagList,
    requirementText,
    sectorText,
} from '../tagging/tagger.js';
import type { TagRules } from '../tagging/rules.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface StorableJob {
    jobId: string;
    employerName: string;
    employerNorm: string;
    title: string;
    publisher: string;
    employmentType: string;
    city: string;
    state: string;
    country: string;
    postedAt: string | null;
    applyLink: string;
    requirementTags: string[];
    sectorTags: string[];
    salary: string;
    searchQuery: string;
    firstSeenRunDate: string;
    firstSeenUtc: string;
}

export interface ObservationContext {
    searchQuery: string;
    runDate: string;
    nowUtc: string;
}

// ─── Mapping ────────────────────────────────────────────────────────────────

/**
 * Builds the row for an upstream record. Returns null when the record has no
 * job id, since it could never be deduplicated.
 */
export function toStorableJob(
    record: RawJobRecord,
    ctx: ObservationContext,
    rules?: TagRules,
): StorableJob | null {
    const f = resolveJobFields(record);
    if (!f.jobId) return null;

    const text = { title: f.title, description: f.description, employerName: f.employerName };

    return {
        jobId: f.jobId,
        employerName: f.employerName,
        employerNorm: normalizeCompany(f.employerName),
        title: f.title,
        publisher: f.publisher,
        employmentType: f.employmentType,
        city: f.city,
        state: f.state,
        country: f.country,
        postedAt: f.postedAt,
        applyLink: f.applyLink,
        requirementTags: [...deriveRequirementTags(requirementText(text), rules)],
        sectorTags: [...deriveSectorTags(sectorText(text), rules)],
        salary: f.salary,
        searchQuery: ctx.searchQuery,
        firstSeenRunDate: ctx.runDate,
        firstSeenUtc: ctx.nowUtc,
    };
}

// ─── Insert ─────────────────────────────────────────────────────────────────

const INSERT_SQL = `
INSERT OR IGNORE INTO jobs (
    job_id, employer_name, employer_norm, job_title, job_publisher, job_employment_type,
    job_city, job_state, job_country, job_posted_at, apply_link,
    job_requirements, fields, salary,
    search_query, first_seen_run_date, first_seen_utc
) VALUES (
    @jobId, @employerName, @employerNorm, @title, @publisher, @employmentType,
    @city, @state, @country, @postedAt, @applyLink,
    @requirements, @fields, @salary,
    @searchQuery, @firstSeenRunDate, @firstSeenUtc
)
`;

/**
 * @returns true iff this call inserted the row.
 */
export function insertJobIfNew(db: Db, job: StorableJob): boolean {
    const result = db.prepare(INSERT_SQL).run({
        jobId: job.jobId,
        employerName: job.employerName,
        employerNorm: job.employerNorm,
        title: job.title,
        publisher: job.publisher,
        employmentType: job.employmentType,
        city: job.city,
        state: job.state,
        country: job.country,
        postedAt: job.postedAt,
        applyLink: job.applyLink,
        requirements: encodeTagList(job.requirementTags),
        fields: encodeTagField(job.sectorTags),
        salary: job.salary,
        searchQuery: job.searchQuery,
        firstSeenRunDate: job.firstSeenRunDate,
        firstSeenUtc: job.firstSeenUtc,
    });

    const inserted = result.changes === 1;
    log.debug(
        inserted
            ? `[DB] Inserted job ${job.jobId}: "${job.title}" @ "${job.employerName}"`
            : `[DB] Skipped duplicate ${job.jobId}`,
    );
    return inserted;
}

// ─── Reads ──────────────────────────────────────────────────────────────────

export interface JobRow {
    job_id: string;
    employer_name: string | null;
    employer_norm: string | null;
    job_title: string | null;
    job_requirements: string | null;
    fields: string | null;
    salary: string | null;
    apply_link: string | null;
    first_seen_run_date: string | null;
    first_seen_utc: string | null;
}

export function getJob(db: Db, jobId: string): JobRow | undefined {
    return db
        .prepare<[string], JobRow>(`
            SELECT job_id, employer_name, employer_norm, job_title, job_requirements,
                   fields, salary, apply_link, first_seen_run_date, first_seen_utc
            FROM jobs WHERE job_id = ?`)
        .get(jobId);
}

export function countJobs(db: Db): number {
    return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM jobs').get()?.n ?? 0;
}

// ─── Retag ──────────────────────────────────────────────────────────────────

/**
 * Recomputes sector tags for jobs first seen on or after `sinceDate`.
 * Descriptions are not stored, so tags come from title + employer only.
 *
 * @returns number of rows rewritten
 */
export function retagSectors(db: Db, sinceDate: string, rules?: TagRules): number {
    const rows = db
        .prepare<[string], { job_id: string; job_title: string | null; employer_name: string | null }>(`
            SELECT job_id, job_title, employer_name
            FROM jobs
            WHERE first_seen_run_date >= ?`)
        .all(sinceDate);

    const update = db.prepare<[string, string]>('UPDATE jobs SET fields = ? WHERE job_id = ?');

    const apply = db.transaction(() => {
        for (const row of rows) {
            const text = sectorText({ title: row.job_title ?? '', employerName: row.employer_name ?? '' });
            update.run(encodeTagField(deriveSectorTags(text, rules)), row.job_id);
        }
    });
    apply();

    return rows.length;
}
