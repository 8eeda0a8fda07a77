/**
 * src/sources/fieldMap.ts
 *
 * Centralised mapping from JSearch's loosely-typed payload to the attributes
 * we store. Each logical attribute has an ordered list of candidate field
 * names; the first one present (not null/undefined) wins.
 */

import type { RawJobRecord } from './types.js';

// ─── Candidate Field Names ────────────────────────────────────────────────────

export const FIELD_CANDIDATES = {
    jobId: ['job_id'],
    employerName: ['employer_name'],
    title: ['job_title'],
    publisher: ['job_publisher'],
    employmentType: ['job_employment_type'],
    city: ['job_city', 'job_location_city'],
    state: ['job_state', 'job_location_state'],
    country: ['job_country'],
    location: ['job_location'],
    postedAt: [
        'job_posted_at_datetime_utc',
        'job_posted_at_datetime',
        'job_posted_at',
        'job_posted_at_timestamp',
    ],
    applyLink: ['job_apply_link'],
    description: ['job_description', 'job_highlights', 'job_summary'],
    latitude: ['job_latitude'],
    longitude: ['job_longitude'],
    salaryFormatted: ['job_salary', 'salary', 'job_salary_range', 'job_salary_formatted'],
    salaryMin: ['job_min_salary', 'job_salary_min', 'min_salary'],
    salaryMax: ['job_max_salary', 'job_salary_max', 'max_salary'],
    salaryCurrency: ['job_salary_currency', 'salary_currency', 'currency'],
    salaryPeriod: ['job_salary_period', 'salary_period'],
} as const satisfies Record<string, readonly string[]>;

export type LogicalField = keyof typeof FIELD_CANDIDATES;

// ─── Resolution ───────────────────────────────────────────────────────────────

export function firstPresent(record: RawJobRecord, keys: readonly string[]): unknown {
    for (const key of keys) {
        const value = record[key];
        if (value !== undefined && value !== null) return value;
    }
    return undefined;
}

/**
 * Flattens a scalar, array or plain object into text. JSearch's
 * `job_highlights` is an object of string arrays, for instance.
 */
export function asText(value: unknown): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (Array.isArray(value)) return value.map(asText).filter(Boolean).join('\n');
    if (typeof value === 'object') {
        return Object.values(value).map(asText).filter(Boolean).join('\n');
    }
    return '';
}

export function resolveText(record: RawJobRecord, field: LogicalField): string {
    return asText(firstPresent(record, FIELD_CANDIDATES[field])).trim();
}

function resolveNumber(record: RawJobRecord, field: LogicalField): number | null {
    const value = firstPresent(record, FIELD_CANDIDATES[field]);
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function resolvePostedAt(record: RawJobRecord): string | null {
    const value = firstPresent(record, FIELD_CANDIDATES.postedAt);
    return value === undefined ? null : asText(value);
}

export function resolveCoordinates(record: RawJobRecord): { lat: number; lon: number } | null {
    const lat = resolveNumber(record, 'latitude');
    const lon = resolveNumber(record, 'longitude');
    return lat !== null && lon !== null ? { lat, lon } : null;
}

/**
 * Human-readable salary: the upstream formatted string when there is one,
 * otherwise built from min/max/currency/period. Empty when nothing is known.
 */
export function resolveSalaryText(record: RawJobRecord): string {
    const formatted = resolveText(record, 'salaryFormatted');
    if (formatted) return formatted;

    const min = firstPresent(record, FIELD_CANDIDATES.salaryMin);
    const max = firstPresent(record, FIELD_CANDIDATES.salaryMax);
    if (min === undefined && max === undefined) return '';

    let core: string;
    if (min !== undefined && max !== undefined) core = `${asText(min)}-${asText(max)}`;
    else if (min !== undefined) core = `${asText(min)}+`;
    else core = `up to ${asText(max)}`;

    const tail = [resolveText(record, 'salaryCurrency'), resolveText(record, 'salaryPeriod')]
        .filter(Boolean)
        .join(' ');
    return `${core} ${tail}`.trim();
}

// ─── Resolved Record ──────────────────────────────────────────────────────────

export interface ResolvedJobFields {
    jobId: string;
    employerName: string;
    title: string;
    publisher: string;
    employmentType: string;
    city: string;
    state: string;
    country: string;
    location: string;
    postedAt: string | null;
    applyLink: string;
    description: string;
    salary: string;
    coordinates: { lat: number; lon: number } | null;
}

export function resolveJobFields(record: RawJobRecord): ResolvedJobFields {
    return {
        jobId: resolveText(record, 'jobId'),
        employerName: resolveText(record, 'employerName'),
        title: resolveText(record, 'title'),
        publisher: resolveText(record, 'publisher'),
        employmentType: resolveText(record, 'employmentType'),
        city: resolveText(record, 'city'),
        state: resolveText(record, 'state'),
        country: resolveText(record, 'country'),
        location: resolveText(record, 'location'),
        postedAt: resolvePostedAt(record),
        applyLink: resolveText(record, 'applyLink'),
        description: resolveText(record, 'description'),
        salary: resolveSalaryText(record),
        coordinates: resolveCoordinates(record),
    };
}
