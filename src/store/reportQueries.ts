/**
 * src/store/reportQueries.ts
 *
 * Read-only aggregates over the job/company tables. Every range predicate is
 * half-open: first_seen_run_date >= start AND first_seen_run_date < endExclusive.
 */

import type { Db } from '../utils/db.js';
import type { DateRange } from '../time/windows.js';
import { normalizeCompany } from '../utils/normalize.js';
import { tagLikePattern } from '../tagging/tagger.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

interface SqlFragment {
    sql: string;
    params: string[];
}

/** `AND <column> NOT IN (...)` over the normalized names, or nothing. */
export function excludeEmployersClause(column: string, excluded: readonly string[]): SqlFragment {
    const norms = [...new Set(excluded.map(normalizeCompany).filter(Boolean))].sort();
    if (norms.length === 0) return { sql: '', params: [] };
    return {
        sql: `AND ${column} NOT IN (${norms.map(() => '?').join(',')})`,
        params: norms,
    };
}

function rangeParams(range: DateRange): [string, string] {
    return [range.start, range.endExclusive];
}

// ─── Counts ───────────────────────────────────────────────────────────────────

export function countDistinctJobs(db: Db, range: DateRange): number {
    return db
        .prepare<[string, string], { n: number }>(`
            SELECT COUNT(DISTINCT job_id) AS n
            FROM jobs
            WHERE first_seen_run_date >= ? AND first_seen_run_date < ?`)
        .get(...rangeParams(range))?.n ?? 0;
}

// ─── Employers ────────────────────────────────────────────────────────────────

export interface EmployerCount {
    employerNorm: string;
    employerName: string;
    count: number;
}

/**
 * Top employers by distinct jobs first seen in `range`; ties break on key.
 * With `sectorTag`, only jobs carrying that tag are counted.
 */
export function topEmployers(
    db: Db,
    range: DateRange,
    limit: number,
    excluded: readonly string[] = [],
    sectorTag?: string,
): EmployerCount[] {
    const excl = excludeEmployersClause('employer_norm', excluded);
    const tag = sectorTag ? { sql: 'AND fields LIKE ?', params: [tagLikePattern(sectorTag)] } : { sql: '', params: [] };
    const rows = db
        .prepare<Array<string | number>, { employer_norm: string; employer_name: string; cnt: number }>(`
            SELECT employer_norm, MIN(employer_name) AS employer_name, COUNT(DISTINCT job_id) AS cnt
            FROM jobs
            WHERE first_seen_run_date >= ? AND first_seen_run_date < ?
              AND employer_norm IS NOT NULL AND employer_norm <> ''
              ${tag.sql}
              ${excl.sql}
            GROUP BY employer_norm
            ORDER BY cnt DESC, employer_norm ASC
            LIMIT ?`)
        .all(...rangeParams(range), ...tag.params, ...excl.params, limit);

    return rows.map((r) => ({ employerNorm: r.employer_norm, employerName: r.employer_name, count: r.cnt }));
}

export interface SampleJob {
    title: string;
    applyLink: string;
    salary: string;
    requirements: string;
}

export interface NewCompany {
    employerNorm: string;
    employerName: string;
    firstSeenRunDate: string;
    verified: boolean;
    placesReason: string;
    address: string;
    sampleJob: SampleJob | null;
}

export interface NewCompanyQuery {
    excluded?: readonly string[];
    limit?: number;
    /** Keep companies with a job in range carrying this tag; the sample job carries it too. */
    sectorTag?: string;
}

/**
 * Companies first seen in `range`, newest first, each with the most recent
 * job of theirs captured in the same range.
 */
export function newCompaniesInRange(db: Db, range: DateRange, query: NewCompanyQuery = {}): NewCompany[] {
    const excl = excludeEmployersClause('employer_norm', query.excluded ?? []);
    const tagParams = query.sectorTag ? [tagLikePattern(query.sectorTag)] : [];
    const companyTag = query.sectorTag
        ? `AND EXISTS (
                SELECT 1 FROM jobs j
                WHERE j.employer_norm = companies.employer_norm
                  AND j.first_seen_run_date >= ? AND j.first_seen_run_date < ?
                  AND j.fields LIKE ?)`
        : '';
    const companies = db
        .prepare<Array<string | number>, {
            employer_norm: string;
            employer_name: string | null;
            first_seen_run_date: string;
            places_verified: number | null;
            places_reason: string | null;
            places_address: string | null;
        }>(`
            SELECT employer_norm, employer_name, first_seen_run_date, places_verified, places_reason, places_address
            FROM companies
            WHERE first_seen_run_date >= ? AND first_seen_run_date < ?
              ${companyTag}
              ${excl.sql}
            ORDER BY first_seen_run_date DESC, employer_name ASC
            LIMIT ?`)
        .all(
            ...rangeParams(range),
            ...(query.sectorTag ? [...rangeParams(range), ...tagParams] : []),
            ...excl.params,
            query.limit ?? 250,
        );

    const sampleStmt = db.prepare<string[], {
        job_title: string | null;
        apply_link: string | null;
        salary: string | null;
        job_requirements: string | null;
    }>(`
        SELECT job_title, apply_link, salary, job_requirements
        FROM jobs
        WHERE employer_norm = ?
          AND first_seen_run_date >= ? AND first_seen_run_date < ?
          ${query.sectorTag ? 'AND fields LIKE ?' : ''}
        ORDER BY first_seen_run_date DESC, job_id ASC
        LIMIT 1`);

    return companies.map((c) => {
        const job = sampleStmt.get(c.employer_norm, ...rangeParams(range), ...tagParams);
        return {
            employerNorm: c.employer_norm,
            employerName: c.employer_name ?? c.employer_norm,
            firstSeenRunDate: c.first_seen_run_date,
            verified: c.places_verified === 1,
            placesReason: c.places_reason ?? '',
            address: c.places_address ?? '',
            sampleJob: job
                ? {
                    title: job.job_title ?? '',
                    applyLink: job.apply_link ?? '',
                    salary: job.salary ?? '',
                    requirements: job.job_requirements ?? '',
                }
                : null,
        };
    });
}

// ─── Sectors ──────────────────────────────────────────────────────────────────

export interface SectorStats {
    captured: number;
    distinctJobs: number;
    newCompanies: number;
}

export function sectorStats(db: Db, tag: string, range: DateRange): SectorStats {
    const like = tagLikePattern(tag);
    const [start, end] = rangeParams(range);

    const jobs = db
        .prepare<[string, string, string], { captured: number; distinct_jobs: number }>(`
            SELECT COUNT(*) AS captured, COUNT(DISTINCT job_id) AS distinct_jobs
            FROM jobs
            WHERE first_seen_run_date >= ? AND first_seen_run_date < ?
              AND fields LIKE ?`)
        .get(start, end, like);

    const companies = db
        .prepare<[string, string, string, string, string], { n: number }>(`
            SELECT COUNT(DISTINCT c.employer_norm) AS n
            FROM companies c
            JOIN jobs j ON j.employer_norm = c.employer_norm
            WHERE c.first_seen_run_date >= ? AND c.first_seen_run_date < ?
              AND j.first_seen_run_date >= ? AND j.first_seen_run_date < ?
              AND j.fields LIKE ?`)
        .get(start, end, start, end, like);

    return {
        captured: jobs?.captured ?? 0,
        distinctJobs: jobs?.distinct_jobs ?? 0,
        newCompanies: companies?.n ?? 0,
    };
}

// ─── Per-employer ─────────────────────────────────────────────────────────────

export function topTitles(db: Db, employerNorm: string, range: DateRange, limit = 3): string[] {
    return db
        .prepare<[string, string, string, number], { job_title: string }>(`
            SELECT job_title, COUNT(*) AS c
            FROM jobs
            WHERE employer_norm = ?
              AND first_seen_run_date >= ? AND first_seen_run_date < ?
              AND job_title IS NOT NULL AND TRIM(job_title) <> ''
            GROUP BY job_title
            ORDER BY c DESC, job_title ASC
            LIMIT ?`)
        .all(employerNorm, ...rangeParams(range), limit)
        .map((r) => r.job_title);
}

export interface JobLink {
    title: string;
    applyLink: string;
}

/** Up to `limit` jobs of one employer first seen in `range`, by job id. */
export function sampleJobs(db: Db, employerNorm: string, range: DateRange, limit = 3): JobLink[] {
    return db
        .prepare<[string, string, string, number], { job_title: string | null; apply_link: string | null }>(`
            SELECT job_title, apply_link
            FROM jobs
            WHERE employer_norm = ?
              AND first_seen_run_date >= ? AND first_seen_run_date < ?
            ORDER BY job_id ASC
            LIMIT ?`)
        .all(employerNorm, ...rangeParams(range), limit)
        .map((r) => ({ title: r.job_title ?? '', applyLink: r.apply_link ?? '' }));
}

/** Job ids captured for one employer inside `range`. */
export function windowJobIds(db: Db, employerNorm: string, range: DateRange): Set<string> {
    const rows = db
        .prepare<[string, string, string], { job_id: string }>(`
            SELECT DISTINCT job_id
            FROM jobs
            WHERE employer_norm = ?
              AND first_seen_run_date >= ? AND first_seen_run_date < ?`)
        .all(employerNorm, ...rangeParams(range));
    return new Set(rows.map((r) => r.job_id));
}

// ─── Trends ───────────────────────────────────────────────────────────────────

export function countJobsWithRequirement(db: Db, tag: string, range: DateRange): number {
    return db
        .prepare<[string, string, string], { n: number }>(`
            SELECT COUNT(DISTINCT job_id) AS n
            FROM jobs
            WHERE first_seen_run_date >= ? AND first_seen_run_date < ?
              AND (',' || COALESCE(job_requirements, '') || ',') LIKE ?`)
        .get(...rangeParams(range), tagLikePattern(tag))?.n ?? 0;
}

export function countJobsWithTitleKeyword(db: Db, keyword: string, range: DateRange): number {
    return db
        .prepare<[string, string, string], { n: number }>(`
            SELECT COUNT(DISTINCT job_id) AS n
            FROM jobs
            WHERE first_seen_run_date >= ? AND first_seen_run_date < ?
              AND LOWER(job_title) LIKE ?`)
        .get(...rangeParams(range), `%${keyword.toLowerCase()}%`)?.n ?? 0;
}

// ─── Indicators ───────────────────────────────────────────────────────────────

export interface CompanyIndicator {
    employerNorm: string;
    employerName: string;
    thisCount: number;
    lastCount: number | null;
    /** Percent change vs last period; null when last period had none. */
    pctChange: number | null;
}

export function companyIndicators(
    db: Db,
    thisRange: DateRange,
    lastRange: DateRange,
    limit: number,
    excluded: readonly string[] = [],
): CompanyIndicator[] {
    const current = topEmployers(db, thisRange, limit, excluded);
    if (current.length === 0) return [];

    const lastStmt = db.prepare<[string, string, string], { n: number }>(`
        SELECT COUNT(DISTINCT job_id) AS n
        FROM jobs
        WHERE employer_norm = ?
          AND first_seen_run_date >= ? AND first_seen_run_date < ?`);

    return current.map((e) => {
        const last = lastStmt.get(e.employerNorm, ...rangeParams(lastRange))?.n ?? 0;
        return {
            employerNorm: e.employerNorm,
            employerName: e.employerName,
            thisCount: e.count,
            lastCount: last === 0 ? null : last,
            pctChange: last === 0 ? null : ((e.count - last) / last) * 100,
        };
    });
}
