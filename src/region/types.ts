import type { Feature, MultiPolygon, Polygon } from 'geojson';

export type RegionGeometry = Polygon | MultiPolygon;

export type RegionFeature = Feature<RegionGeometry>;

/** What the fallback (no-coordinates) path needs to know about the region. */
export interface RegionSettings {
    /** Name of the feature to extract from the boundary source, e.g. "Montgomery". */
    boundaryName: string;
    /** Two-letter state code, compared case-insensitively. */
    stateCode: string;
    /** Full name looked for in free-text locations, e.g. "Montgomery County". */
    label: string;
    /** Lowercase city names known to lie inside the region. */
    cities: string[];
}

/**
 * A loaded region: settings plus its boundary polygon. Loaded once per
 * process and passed to whoever filters records.
 */
export interface Region {
    settings: RegionSettings;
    boundary: RegionFeature;
}
