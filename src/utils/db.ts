/**
 * src/utils/db.ts
 *
 * SQLite connection for the monitor.
 *
 * The store is a single file (DB_PATH, default ./data/moco_jobs.sqlite) with
 * one writer: the process that runs a command. better-sqlite3 is synchronous,
 * so every statement completes before the next network call starts.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { log } from '@crawlee/core';

export type Db = Database.Database;

/**
 * Open (creating the parent directory if needed) the database at `dbPath`.
 * Pass ":memory:" for a throwaway database.
 */
export function openDb(dbPath: string): Db {
    if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    log.debug(`[DB] Opened ${dbPath}`);
    return db;
}

/**
 * Run `fn` inside one short write transaction. If it throws, nothing it
 * wrote is kept.
 */
export function withTransaction<T>(db: Db, fn: () => T): T {
    return db.transaction(fn)();
}

export function closeDb(db: Db): void {
    if (db.open) db.close();
}
