/**
 * Error types that abort a command. Everything else (HTTP failures,
 * malformed upstream records, missing optional keys) degrades in place.
 */

export class MonitorError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Invalid or missing configuration, e.g. no RAPIDAPI_KEY for a live run. */
export class ConfigError extends MonitorError {}

/** No boundary cache and no usable source file, or the region is not in it. */
export class RegionBoundaryError extends MonitorError {}
