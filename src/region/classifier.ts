/**
 * src/region/classifier.ts
 *
 * Decides whether a posting (or a verified place) lies inside the region.
 *
 *  • Coordinates present → exact point-in-polygon against the boundary.
 *  • No coordinates      → state code + allow-listed city, or the region's
 *                          full name + state code in the free-text location.
 */

import booleanPointInPolygon from '@turf/boolean-point-in-polygon';
import { resolveJobFields } from '../sources/fieldMap.js';
import type { RawJobRecord } from '../sources/types.js';
import type { Region, RegionSettings } from './types.js';

export function isPointInRegion(lat: number, lon: number, region: Region): boolean {
    // GeoJSON positions are [longitude, latitude]
    return booleanPointInPolygon([lon, lat], region.boundary);
}

export interface LocationText {
    city: string;
    state: string;
    location: string;
}

export function matchesRegionByText(loc: LocationText, settings: RegionSettings): boolean {
    const city = loc.city.toLowerCase();
    const state = loc.state.toLowerCase();
    const text = loc.location.toLowerCase();
    const stateCode = settings.stateCode.toLowerCase();

    if (state === stateCode && settings.cities.some((c) => city.includes(c.toLowerCase()))) {
        return true;
    }
    return text.includes(settings.label.toLowerCase()) && text.includes(stateCode);
}

export function isInRegion(record: RawJobRecord, region: Region): boolean {
    const fields = resolveJobFields(record);
    if (fields.coordinates) {
        return isPointInRegion(fields.coordinates.lat, fields.coordinates.lon, region);
    }
    return matchesRegionByText(fields, region.settings);
}
