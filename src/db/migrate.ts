/**
 * src/db/migrate.ts
 *
 * Idempotent schema setup for the monitor database.
 *
 * Uses CREATE TABLE IF NOT EXISTS / CREATE INDEX IF NOT EXISTS, then adds
 * any optional column an older database file is missing. New columns always
 * carry a default ('' or 0) so historical rows stay valid; nothing is ever
 * dropped or rewritten.
 *
 * Run:  hiring-monitor migrate   (every other command also calls migrate())
 */

import { log } from '@crawlee/core';
import type { Db } from '../utils/db.js';

// ─── Schema ─────────────────────────────────────────────────────────────────

const CREATE_JOBS_TABLE = `
CREATE TABLE IF NOT EXISTS jobs (
    job_id               TEXT PRIMARY KEY,
    employer_name        TEXT,
    employer_norm        TEXT,
    job_title            TEXT,
    job_publisher        TEXT,
    job_employment_type  TEXT,
    job_city             TEXT,
    job_state            TEXT,
    job_country          TEXT,
    job_posted_at        TEXT,
    apply_link           TEXT,

    job_requirements     TEXT DEFAULT '',   -- "no_degree,over_3_years"
    fields               TEXT DEFAULT '',   -- ",life_sciences,technology,"
    salary               TEXT DEFAULT '',

    search_query         TEXT,
    first_seen_run_date  TEXT,              -- YYYY-MM-DD
    first_seen_utc       TEXT
);
`;

const CREATE_COMPANIES_TABLE = `
CREATE TABLE IF NOT EXISTS companies (
    employer_norm        TEXT PRIMARY KEY,
    employer_name        TEXT,
    first_seen_run_date  TEXT,
    first_seen_utc       TEXT,
    places_verified      INTEGER DEFAULT 0,
    places_reason        TEXT DEFAULT '',
    places_place_id      TEXT DEFAULT '',
    places_address       TEXT DEFAULT '',
    places_verified_utc  TEXT DEFAULT ''
);
`;

const CREATE_RUNS_TABLE = `
CREATE TABLE IF NOT EXISTS runs (
    run_id               INTEGER PRIMARY KEY AUTOINCREMENT,
    run_date             TEXT,
    started_utc          TEXT,
    finished_utc         TEXT,
    queries_json         TEXT,
    jobs_scanned_count   INTEGER DEFAULT 0,
    jobs_in_moco_count   INTEGER DEFAULT 0,
    new_jobs_count       INTEGER DEFAULT 0,
    new_companies_count  INTEGER DEFAULT 0
);
`;

function createStillOpenTable(table: string): string {
    return `
CREATE TABLE IF NOT EXISTS ${table} (
    period_key           TEXT NOT NULL,     -- "YYYY-MM" or week-ending "YYYY-MM-DD"
    employer_norm        TEXT NOT NULL,
    employer_name        TEXT,
    window_start         TEXT,
    window_end           TEXT,              -- exclusive
    captured_count       INTEGER DEFAULT 0,
    open_now_count       INTEGER DEFAULT 0,
    still_open_count     INTEGER DEFAULT 0,
    still_open_rate      REAL DEFAULT 0,
    computed_utc         TEXT,
    PRIMARY KEY (period_key, employer_norm)
);
`;
}

export const STILL_OPEN_TABLES = {
    monthly: 'still_open_monthly',
    threeWeek: 'still_open_3wk',
} as const;

export type StillOpenKind = keyof typeof STILL_OPEN_TABLES;

// Columns added after the first release
const OPTIONAL_COLUMNS: Array<[table: string, column: string, definition: string]> = [
    ['companies', 'places_verified', 'INTEGER DEFAULT 0'],
    ['companies', 'places_reason', "TEXT DEFAULT ''"],
    ['companies', 'places_place_id', "TEXT DEFAULT ''"],
    ['companies', 'places_address', "TEXT DEFAULT ''"],
    ['companies', 'places_verified_utc', "TEXT DEFAULT ''"],

    ['runs', 'jobs_scanned_count', 'INTEGER DEFAULT 0'],
    ['runs', 'jobs_in_moco_count', 'INTEGER DEFAULT 0'],
    ['runs', 'new_jobs_count', 'INTEGER DEFAULT 0'],
    ['runs', 'new_companies_count', 'INTEGER DEFAULT 0'],

    ['jobs', 'job_publisher', "TEXT DEFAULT ''"],
    ['jobs', 'job_requirements', "TEXT DEFAULT ''"],
    ['jobs', 'fields', "TEXT DEFAULT ''"],
    ['jobs', 'salary', "TEXT DEFAULT ''"],
];

const INDEXES = [
    `CREATE INDEX IF NOT EXISTS idx_jobs_first_seen     ON jobs(first_seen_run_date);`,
    `CREATE INDEX IF NOT EXISTS idx_jobs_employer_norm  ON jobs(employer_norm, first_seen_run_date);`,
    `CREATE INDEX IF NOT EXISTS idx_companies_first_seen ON companies(first_seen_run_date);`,
    `CREATE INDEX IF NOT EXISTS idx_runs_run_date       ON runs(run_date);`,
];

// ─── Helpers ────────────────────────────────────────────────────────────────

export function columnNames(db: Db, table: string): Set<string> {
    const rows = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
    return new Set(rows.map((r) => r.name));
}

/** Adds `column` to `table` unless it is already there. Returns true if added. */
export function ensureColumn(db: Db, table: string, column: string, definition: string): boolean {
    if (columnNames(db, table).has(column)) return false;
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    log.info(`[migrate] Added column ${table}.${column}`);
    return true;
}

/** Sector tags stored under an earlier name. */
const RENAMED_SECTOR_TAGS: Array<[from: string, to: string]> = [
    ['aero_defense_sat', 'aero_defense_satellite'],
];

/** Rewrites renamed tags inside `jobs.fields`. Returns the number of rows changed. */
export function renameSectorTags(db: Db): number {
    let changed = 0;
    for (const [from, to] of RENAMED_SECTOR_TAGS) {
        const result = db
            .prepare<[string, string, string]>(`
                UPDATE jobs SET fields = REPLACE(fields, ?, ?)
                WHERE fields LIKE ?`)
            .run(`,${from},`, `,${to},`, `%,${from},%`);
        if (result.changes > 0) log.info(`[migrate] Renamed sector tag ${from} → ${to} on ${result.changes} jobs`);
        changed += result.changes;
    }
    return changed;
}

// ─── Runner ─────────────────────────────────────────────────────────────────

export function migrate(db: Db): void {
    db.exec(CREATE_JOBS_TABLE);
    db.exec(CREATE_COMPANIES_TABLE);
    db.exec(CREATE_RUNS_TABLE);
    for (const table of Object.values(STILL_OPEN_TABLES)) {
        db.exec(createStillOpenTable(table));
    }

    for (const [table, column, definition] of OPTIONAL_COLUMNS) {
        ensureColumn(db, table, column, definition);
    }

    for (const idx of INDEXES) {
        db.exec(idx);
    }
    renameSectorTags(db);
    log.debug('[migrate] Schema ready.');
}
