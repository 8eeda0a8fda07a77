/**
 * src/sources/types.ts
 *
 * Shared types for the job-search and places sources.
 *
 * Upstream records are schema-less JSON. They stay as `RawJobRecord` until
 * the field map (fieldMap.ts) resolves the attributes we persist, so a
 * renamed or missing upstream field never throws.
 */

// ─── Raw Upstream Records ─────────────────────────────────────────────────────

export type RawJobRecord = Record<string, unknown>;

export type DatePosted = 'all' | 'today' | '3days' | 'week' | 'month';

// ─── Search ───────────────────────────────────────────────────────────────────

export interface SearchParams {
    query: string;
    page?: number;          // 1-based
    numPages?: number;      // pages returned per call
    datePosted?: DatePosted;
    country?: string;       // ISO country code, e.g. "us"
}

/** The operations ingestion and the still-open metric need from a job source. */
export interface JobSearchSource {
    search(params: SearchParams): Promise<RawJobRecord[]>;
    fetchOpenJobIdentifiers(companyName: string): Promise<Set<string>>;
}

// ─── Places ───────────────────────────────────────────────────────────────────

export interface PlaceCandidate {
    placeId: string;
    address: string;
    lat: number | null;
    lon: number | null;
}

export type VerificationReason =
    | 'no_places_key'
    | 'no_places_match'
    | 'inside_region'
    | 'outside_region'
    | 'no_latlon';

export interface CompanyVerification {
    verified: boolean;
    reason: VerificationReason;
    placeId: string;
    address: string;
    lat: number | null;
    lon: number | null;
}
