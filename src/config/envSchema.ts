import { z } from 'zod';

const numFromEnv = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const intFromEnv = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().int());

const trimmed = z.preprocess((v) => (typeof v === 'string' ? v.trim() : v), z.string());

const commaList = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') {
        return v.split(',').map((s) => s.trim()).filter(Boolean);
    }
    return v;
}, z.array(z.string()));

const searchQueriesJson = z.preprocess((v) => {
    if (typeof v !== 'string') return v;
    try {
        return JSON.parse(v);
    } catch {
        return v;
    }
}, z.array(z.string(), { invalid_type_error: 'Expected a JSON array of strings' }));

const datePosted = z.enum(['all', 'today', '3days', 'week', 'month']);

export const envSchema = z.object({
    RAPIDAPI_KEY: trimmed.default(''),
    RAPIDAPI_HOST: trimmed.default('jsearch.p.rapidapi.com'),
    GOOGLE_PLACES_KEY: trimmed.default(''),

    DB_PATH: trimmed.default('./data/moco_jobs.sqlite'),

    SEARCH_QUERIES: searchQueriesJson.default([]),
    DATE_POSTED: datePosted.default('today'),
    NUM_PAGES: intFromEnv.pipe(z.number().min(1).max(20)).default(1),
    SEARCH_COUNTRY: trimmed.default('us'),

    JSEARCH_DELAY_SECONDS: numFromEnv.pipe(z.number().min(0)).default(0.25),
    JSEARCH_JITTER_SECONDS: numFromEnv.pipe(z.number().min(0)).default(0.15),

    HTTP_MAX_ATTEMPTS: intFromEnv.pipe(z.number().min(1)).default(6),
    HTTP_BACKOFF_SECONDS: numFromEnv.pipe(z.number().min(0)).default(1.5),
    HTTP_CONNECT_TIMEOUT_SECONDS: numFromEnv.pipe(z.number().positive()).default(10),
    HTTP_READ_TIMEOUT_SECONDS: numFromEnv.pipe(z.number().positive()).default(90),

    REGION_BOUNDARY_NAME: trimmed.default('Montgomery'),
    REGION_STATE: trimmed.default('MD'),
    REGION_LABEL: trimmed.default('Montgomery County'),
    REGION_CITIES: commaList.default([
        'rockville', 'bethesda', 'silver spring', 'gaithersburg', 'germantown',
        'wheaton', 'takoma park', 'chevy chase', 'potomac', 'olney', 'kensington',
    ]),
    BOUNDARY_SOURCE_PATHS: commaList.default([
        './data/maryland-counties.geojson',
        './maryland-counties.geojson',
    ]),
    BOUNDARY_CACHE_PATH: trimmed.default('./data/region_boundary.geojson'),

    MONTHLY_TOP_N: intFromEnv.pipe(z.number().min(1)).default(30),
    STILL_OPEN_TOP_N: intFromEnv.pipe(z.number().min(1)).default(25),
    OPEN_JOBS_MAX_PAGES: intFromEnv.pipe(z.number().min(1).max(20)).default(5),
    EXCLUDED_EMPLOYERS: commaList.default([
        'uber', 'uber technologies', 'doordash', 'lyft', 'amazon', 'walmart',
        'montgomery county public schools', 'mcps', 'pizza hut',
    ]),

    DELAY_MONTH_MIN_CAPTURED: intFromEnv.default(3),
    DELAY_MONTH_MIN_STILL_OPEN: intFromEnv.default(5),
    DELAY_MONTH_MIN_RATE: numFromEnv.pipe(z.number().min(0).max(1)).default(0.5),
    DELAY_TREND_AVG_RATE: numFromEnv.pipe(z.number().min(0).max(1)).default(0.45),
    DELAY_TREND_AVG_MIN_STILL_OPEN: intFromEnv.default(6),
    DELAY_TREND_DELTA: numFromEnv.pipe(z.number().min(0).max(1)).default(0.15),
    DELAY_TREND_DELTA_MIN_STILL_OPEN: intFromEnv.default(4),
    DELAY_TREND_NEWEST_RATE: numFromEnv.pipe(z.number().min(0).max(1)).default(0.6),
    DELAY_TREND_NEWEST_MIN_STILL_OPEN: intFromEnv.default(3),

    LOG_LEVEL: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
