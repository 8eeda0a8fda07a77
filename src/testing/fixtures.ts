/**
 * Shared test fixtures: an in-memory database, a square stand-in for the
 * county boundary, and a job row builder.
 */

import { openDb, type Db } from '../utils/db.js';
import { migrate } from '../db/migrate.js';
import type { Region, RegionFeature } from '../region/types.js';
import type { StorableJob } from '../store/jobStore.js';

/** lon -77.5..-76.9, lat 38.9..39.4 */
export const SQUARE_BOUNDARY: RegionFeature = {
    type: 'Feature',
    properties: { NAME: 'Montgomery' },
    geometry: {
        type: 'Polygon',
        coordinates: [[[-77.5, 38.9], [-76.9, 38.9], [-76.9, 39.4], [-77.5, 39.4], [-77.5, 38.9]]],
    },
};

export const INSIDE = { lat: 39.1, lon: -77.2 };
export const OUTSIDE = { lat: 39.29, lon: -76.61 };

export const TEST_REGION: Region = {
    settings: {
        boundaryName: 'Montgomery',
        stateCode: 'MD',
        label: 'Montgomery County',
        cities: ['rockville', 'bethesda', 'silver spring'],
    },
    boundary: SQUARE_BOUNDARY,
};

export function memoryDb(): Db {
    const db = openDb(':memory:');
    migrate(db);
    return db;
}

export function makeJob(overrides: Partial<StorableJob> & Pick<StorableJob, 'jobId'>): StorableJob {
    return {
        employerName: 'Acme Inc.',
        employerNorm: 'acme',
        title: 'Engineer',
        publisher: '',
        employmentType: 'FULLTIME',
        city: 'Rockville',
        state: 'MD',
        country: 'US',
        postedAt: null,
        applyLink: '',
        requirementTags: [],
        sectorTags: [],
        salary: '',
        searchQuery: 'test',
        firstSeenRunDate: '2026-10-01',
        firstSeenUtc: '2026-10-01T12:00:00Z',
        ...overrides,
    };
}
