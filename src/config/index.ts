import type { Env } from './env.js';
import type { RetryPolicy } from '../sources/httpRetry.js';
import type { RegionSettings } from '../region/types.js';
import type { DelayPolicy } from '../metrics/overlap.js';
import type { DatePosted } from '../sources/types.js';

export interface AppConfig {
    dbPath: string;
    search: {
        apiKey: string;
        apiHost: string;
        queries: string[];
        datePosted: DatePosted;
        numPages: number;
        country: string;
        delayMs: number;
        jitterMs: number;
    };
    placesKey: string;
    retry: RetryPolicy;
    region: RegionSettings;
    boundary: {
        sourcePaths: string[];
        cachePath: string;
    };
    reports: {
        monthlyTopN: number;
        stillOpenTopN: number;
        openJobsMaxPages: number;
        excludedEmployers: string[];
    };
    delayPolicy: DelayPolicy;
}

export function buildAppConfig(env: Env): AppConfig {
    return {
        dbPath: env.DB_PATH,
        search: {
            apiKey: env.RAPIDAPI_KEY,
            apiHost: env.RAPIDAPI_HOST,
            queries: env.SEARCH_QUERIES,
            datePosted: env.DATE_POSTED,
            numPages: env.NUM_PAGES,
            country: env.SEARCH_COUNTRY,
            delayMs: Math.round(env.JSEARCH_DELAY_SECONDS * 1000),
            jitterMs: Math.round(env.JSEARCH_JITTER_SECONDS * 1000),
        },
        placesKey: env.GOOGLE_PLACES_KEY,
        retry: {
            maxAttempts: env.HTTP_MAX_ATTEMPTS,
            backoffBaseMs: Math.round(env.HTTP_BACKOFF_SECONDS * 1000),
            connectTimeoutMs: Math.round(env.HTTP_CONNECT_TIMEOUT_SECONDS * 1000),
            readTimeoutMs: Math.round(env.HTTP_READ_TIMEOUT_SECONDS * 1000),
        },
        region: {
            boundaryName: env.REGION_BOUNDARY_NAME,
            stateCode: env.REGION_STATE,
            label: env.REGION_LABEL,
            cities: env.REGION_CITIES,
        },
        boundary: {
            sourcePaths: env.BOUNDARY_SOURCE_PATHS,
            cachePath: env.BOUNDARY_CACHE_PATH,
        },
        reports: {
            monthlyTopN: env.MONTHLY_TOP_N,
            stillOpenTopN: env.STILL_OPEN_TOP_N,
            openJobsMaxPages: env.OPEN_JOBS_MAX_PAGES,
            excludedEmployers: env.EXCLUDED_EMPLOYERS,
        },
        delayPolicy: {
            monthMinCaptured: env.DELAY_MONTH_MIN_CAPTURED,
            monthMinStillOpen: env.DELAY_MONTH_MIN_STILL_OPEN,
            monthMinRate: env.DELAY_MONTH_MIN_RATE,
            trendAvgRate: env.DELAY_TREND_AVG_RATE,
            trendAvgMinStillOpen: env.DELAY_TREND_AVG_MIN_STILL_OPEN,
            trendDelta: env.DELAY_TREND_DELTA,
            trendDeltaMinStillOpen: env.DELAY_TREND_DELTA_MIN_STILL_OPEN,
            trendNewestRate: env.DELAY_TREND_NEWEST_RATE,
            trendNewestMinStillOpen: env.DELAY_TREND_NEWEST_MIN_STILL_OPEN,
        },
    };
}
