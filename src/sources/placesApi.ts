/**
 * src/sources/placesApi.ts
 *
 * Google Places text search, used once per new employer to check whether
 * the business itself sits inside the region.
 */

import { log } from '@crawlee/core';
import { z } from 'zod';
import { DEFAULT_RETRY_POLICY, errorMessage, getJsonWithRetry, type HttpDeps, type RetryPolicy } from './httpRetry.js';
import type { CompanyVerification, PlaceCandidate } from './types.js';
import { isPointInRegion } from '../region/classifier.js';
import type { Region } from '../region/types.js';

const TEXT_SEARCH_URL = 'https://maps.googleapis.com/maps/api/place/textsearch/json';

// Places lookups should not hold up ingestion for long.
const PLACES_RETRY_POLICY: RetryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: 2,
    readTimeoutMs: 20_000,
};

const placeResultSchema = z.object({
    place_id: z.string().optional(),
    formatted_address: z.string().optional(),
    geometry: z
        .object({
            location: z
                .object({ lat: z.unknown(), lng: z.unknown() })
                .partial()
                .optional(),
        })
        .optional(),
});

const textSearchResponseSchema = z.object({
    results: z.array(placeResultSchema).nullish(),
});

function finiteOrNull(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export interface PlacesClientOptions {
    apiKey: string;
    region: Region;
    retry?: RetryPolicy;
    http?: HttpDeps;
}

export class PlacesClient {
    private readonly retry: RetryPolicy;

    constructor(private readonly options: PlacesClientOptions) {
        this.retry = options.retry ?? PLACES_RETRY_POLICY;
    }

    get enabled(): boolean {
        return this.options.apiKey.length > 0;
    }

    /** Top text-search candidate, or null on no match or any failure. */
    async placesTextSearch(query: string): Promise<PlaceCandidate | null> {
        if (!this.enabled) return null;

        const url = `${TEXT_SEARCH_URL}?${new URLSearchParams({ query, key: this.options.apiKey }).toString()}`;
        try {
            const payload = await getJsonWithRetry(url, {}, this.retry, this.options.http);
            const parsed = textSearchResponseSchema.safeParse(payload);
            const top = parsed.success ? parsed.data.results?.[0] : undefined;
            if (!top) return null;

            return {
                placeId: top.place_id ?? '',
                address: top.formatted_address ?? '',
                lat: finiteOrNull(top.geometry?.location?.lat),
                lon: finiteOrNull(top.geometry?.location?.lng),
            };
        } catch (err) {
            log.warning(`[Places] Text search failed for "${query}": ${errorMessage(err)}`);
            return null;
        }
    }

    async verifyCompany(companyName: string): Promise<CompanyVerification> {
        const empty = { placeId: '', address: '', lat: null, lon: null };
        if (!this.enabled) return { verified: false, reason: 'no_places_key', ...empty };

        const { settings } = this.options.region;
        const top = await this.placesTextSearch(`${companyName} ${settings.label} ${settings.stateCode}`);
        if (!top) return { verified: false, reason: 'no_places_match', ...empty };

        if (top.lat === null || top.lon === null) {
            return { verified: false, reason: 'no_latlon', ...top, lat: null, lon: null };
        }

        const inside = isPointInRegion(top.lat, top.lon, this.options.region);
        log.debug(`[Places] ${companyName} → ${top.address} (${inside ? 'inside' : 'outside'})`);
        return { verified: inside, reason: inside ? 'inside_region' : 'outside_region', ...top };
    }
}
