/**
 * src/sources/jsearchApi.ts
 *
 * JSearch API (RapidAPI) client.
 *
 * API docs: https://rapidapi.com/letscrape-6bRBa3QguO5/api/jsearch
 *
 * Two uses:
 *   • search()                  daily ingestion; degrades to [] when retries run out
 *   • fetchOpenJobIdentifiers() live "open now" snapshot for one employer,
 *                               used by the still-open metric
 *
 * Transport retries (429/5xx/timeouts, Retry-After) live in httpRetry.ts.
 */

import { log } from '@crawlee/core';
import { z } from 'zod';
import { DEFAULT_RETRY_POLICY, errorMessage, getJsonWithRetry, type HttpDeps, type RetryPolicy } from './httpRetry.js';
import { resolveJobFields } from './fieldMap.js';
import type { JobSearchSource, RawJobRecord, SearchParams } from './types.js';
import { normalizeCompany } from '../utils/normalize.js';
import { isInRegion } from '../region/classifier.js';
import type { Region } from '../region/types.js';
import { pause, type Throttle } from '../utils/sleep.js';

// ─── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_API_HOST = 'jsearch.p.rapidapi.com';
const DEFAULT_OPEN_JOBS_MAX_PAGES = 5;

// Records are validated field by field later, so only the envelope is checked here.
const searchResponseSchema = z.object({
    data: z.array(z.unknown()).nullish(),
});

function isRecord(value: unknown): value is RawJobRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Client ───────────────────────────────────────────────────────────────────

export interface JSearchClientOptions {
    apiKey: string;
    apiHost?: string;
    country?: string;
    retry?: RetryPolicy;
    /** Needed by fetchOpenJobIdentifiers() to drop out-of-region postings. */
    region: Region;
    openJobsMaxPages?: number;
    /**
     * Paces pages 2..n of fetchOpenJobIdentifiers(). The caller paces the
     * first page, as it does for every other call it makes.
     */
    pageThrottle?: Throttle;
    http?: HttpDeps;
}

export class JSearchClient implements JobSearchSource {
    private readonly apiHost: string;
    private readonly country: string;
    private readonly retry: RetryPolicy;
    private readonly openJobsMaxPages: number;

    constructor(private readonly options: JSearchClientOptions) {
        this.apiHost = options.apiHost ?? DEFAULT_API_HOST;
        this.country = options.country ?? 'us';
        this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
        this.openJobsMaxPages = options.openJobsMaxPages ?? DEFAULT_OPEN_JOBS_MAX_PAGES;
    }

    /**
     * One search call. Never throws: when the call fails for good the failure
     * is logged and an empty page is returned.
     */
    async search(params: SearchParams): Promise<RawJobRecord[]> {
        try {
            return await this.fetchPage(params);
        } catch (err) {
            log.warning(`[JSearch] Search failed for "${params.query}": ${errorMessage(err)}`);
            return [];
        }
    }

    /**
     * Ids of postings the API currently lists for `companyName` inside the
     * region, from the last month. Pages until a page comes back empty, or
     * until a page after the second adds no new match.
     *
     * Rejects when a page cannot be fetched, so callers can tell "no open
     * postings" from "could not ask".
     */
    async fetchOpenJobIdentifiers(companyName: string): Promise<Set<string>> {
        const target = normalizeCompany(companyName);
        const ids = new Set<string>();
        if (!target) return ids;

        for (let page = 1; page <= this.openJobsMaxPages; page++) {
            if (page > 1 && this.options.pageThrottle) await pause(this.options.pageThrottle);
            const records = await this.fetchPage({
                query: companyName,
                page,
                numPages: 1,
                datePosted: 'month',
            });
            if (records.length === 0) break;

            let added = 0;
            for (const record of records) {
                const fields = resolveJobFields(record);
                if (!fields.jobId || normalizeCompany(fields.employerName) !== target) continue;
                if (!isInRegion(record, this.options.region)) continue;
                if (!ids.has(fields.jobId)) {
                    ids.add(fields.jobId);
                    added++;
                }
            }

            log.debug(`[JSearch] ${companyName}: page ${page} → ${records.length} records, ${added} new matches`);
            if (page > 2 && added === 0) break;
        }

        return ids;
    }

    private async fetchPage(params: SearchParams): Promise<RawJobRecord[]> {
        const query = new URLSearchParams({
            query: params.query,
            page: String(params.page ?? 1),
            num_pages: String(params.numPages ?? 1),
            date_posted: params.datePosted ?? 'today',
            country: params.country ?? this.country,
        });
        const url = `https://${this.apiHost}/search?${query.toString()}`;

        const payload = await getJsonWithRetry(
            url,
            {
                'x-rapidapi-key': this.options.apiKey,
                'x-rapidapi-host': this.apiHost,
            },
            this.retry,
            this.options.http,
        );

        const parsed = searchResponseSchema.safeParse(payload);
        if (!parsed.success) {
            log.warning(`[JSearch] Unexpected response shape for "${params.query}"; treating as empty.`);
            return [];
        }
        return (parsed.data.data ?? []).filter(isRecord);
    }
}
