/**
 * src/region/boundary.ts
 *
 * Loads the target region's boundary polygon.
 *
 * LOOKUP ORDER
 * ────────────
 *  1. The cached single-feature file (BOUNDARY_CACHE_PATH), if present.
 *  2. The first existing source file in BOUNDARY_SOURCE_PATHS: a
 *     FeatureCollection of sub-regions (e.g. every county of a state). The
 *     feature whose NAME / name / County / county equals the target name
 *     (trimmed, case-insensitive) is extracted and written to the cache.
 *
 * No cache and no source, or no feature with that name, throws
 * RegionBoundaryError.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { log } from '@crawlee/core';
import { RegionBoundaryError } from '../utils/errors.js';
import type { Region, RegionFeature, RegionSettings } from './types.js';

// ─── Schema ───────────────────────────────────────────────────────────────────

const position = z.array(z.number()).min(2);
const linearRing = z.array(position);

const geometrySchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('Polygon'), coordinates: z.array(linearRing) }),
    z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(linearRing)) }),
]);

const featureSchema = z.object({
    type: z.literal('Feature'),
    properties: z.record(z.unknown()).nullable().default(null),
    geometry: geometrySchema,
});

const featureCollectionSchema = z.object({
    features: z.array(z.unknown()),
});

const NAME_KEYS = ['NAME', 'name', 'County', 'county'] as const;

export interface BoundaryPaths {
    sourcePaths: string[];
    cachePath: string;
}

// ─── Extraction ───────────────────────────────────────────────────────────────

function featureName(feature: unknown): string {
    if (typeof feature !== 'object' || feature === null || !('properties' in feature)) return '';
    const props = feature.properties;
    if (typeof props !== 'object' || props === null) return '';

    const record: Record<string, unknown> = { ...props };
    for (const key of NAME_KEYS) {
        const value = record[key];
        if (value) return String(value).trim().toLowerCase();
    }
    return '';
}

function samplePropertyKeys(features: unknown[]): string[] {
    const first = features[0];
    if (typeof first !== 'object' || first === null || !('properties' in first)) return [];
    const props = first.properties;
    return typeof props === 'object' && props !== null ? Object.keys(props) : [];
}

/**
 * Picks the feature named `targetName` out of a parsed FeatureCollection.
 */
export function extractRegionFeature(collection: unknown, targetName: string): RegionFeature {
    const parsed = featureCollectionSchema.safeParse(collection);
    if (!parsed.success) {
        throw new RegionBoundaryError('Boundary source is not a GeoJSON FeatureCollection.');
    }

    const wanted = targetName.trim().toLowerCase();
    const match = parsed.data.features.find((f) => featureName(f) === wanted);
    if (match === undefined) {
        throw new RegionBoundaryError(
            `Could not find "${targetName}" in the boundary source.\n` +
            `Checked keys ${NAME_KEYS.join('/')}. Sample property keys: ` +
            `[${samplePropertyKeys(parsed.data.features).join(', ')}]`,
        );
    }

    const feature = featureSchema.safeParse(match);
    if (!feature.success) {
        throw new RegionBoundaryError(
            `Feature "${targetName}" has no Polygon/MultiPolygon geometry.`,
            { cause: feature.error },
        );
    }
    return feature.data;
}

// ─── Disk I/O ─────────────────────────────────────────────────────────────────

function readJson(filePath: string): unknown {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function readCache(cachePath: string): RegionFeature | null {
    if (!fs.existsSync(cachePath)) return null;
    try {
        const parsed = featureSchema.safeParse(readJson(cachePath));
        if (parsed.success) return parsed.data;
        log.warning(`[Boundary] Cache ${cachePath} is not a polygon feature; rebuilding.`);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warning(`[Boundary] Cache ${cachePath} is corrupt; rebuilding. (${message})`);
    }
    return null;
}

function writeCache(cachePath: string, feature: RegionFeature): void {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    // temp file + rename: readers never see a partial cache
    const tmp = cachePath + '.tmp';
    fs.writeFileSync(tmp, JSON.stringify(feature), 'utf-8');
    fs.renameSync(tmp, cachePath);
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function loadRegionBoundary(paths: BoundaryPaths, targetName: string): RegionFeature {
    const cached = readCache(paths.cachePath);
    if (cached) {
        log.debug(`[Boundary] Loaded cached boundary from ${paths.cachePath}`);
        return cached;
    }

    const sourcePath = paths.sourcePaths.find((p) => fs.existsSync(p));
    if (!sourcePath) {
        throw new RegionBoundaryError(
            'Missing boundary source GeoJSON.\nPlace it at one of:\n' +
            paths.sourcePaths.map((p) => `  - ${p}`).join('\n'),
        );
    }

    let collection: unknown;
    try {
        collection = readJson(sourcePath);
    } catch (err) {
        throw new RegionBoundaryError(`Boundary source ${sourcePath} is not valid JSON.`, { cause: err });
    }

    const feature = extractRegionFeature(collection, targetName);
    writeCache(paths.cachePath, feature);
    log.info(`[Boundary] Extracted "${targetName}" from ${sourcePath}; cached to ${paths.cachePath}`);
    return feature;
}

export function loadRegion(settings: RegionSettings, paths: BoundaryPaths): Region {
    return { settings, boundary: loadRegionBoundary(paths, settings.boundaryName) };
}
