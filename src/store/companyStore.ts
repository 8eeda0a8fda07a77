/**
 * src/store/companyStore.ts
 *
 * One row per normalized employer key. Created on the first in-region job
 * for the employer, with its place verification (if any) written in the same
 * statement; never revisited afterwards.
 */

import type { Db } from '../utils/db.js';
import { normalizeCompany } from '../utils/normalize.js';
import type { CompanyVerification } from '../sources/types.js';

export interface CompanyRow {
    employer_norm: string;
    employer_name: string | null;
    first_seen_run_date: string | null;
    first_seen_utc: string | null;
    places_verified: number;
    places_reason: string;
    places_place_id: string;
    places_address: string;
    places_verified_utc: string;
}

export function companyExists(db: Db, employerNorm: string): boolean {
    return db.prepare<[string]>('SELECT 1 FROM companies WHERE employer_norm = ?').get(employerNorm) !== undefined;
}

export function getCompany(db: Db, employerNorm: string): CompanyRow | undefined {
    return db
        .prepare<[string], CompanyRow>('SELECT * FROM companies WHERE employer_norm = ?')
        .get(employerNorm);
}

/**
 * Creates the company for `employerName` unless its normalized key exists.
 *
 * @returns true iff this call created the row. Names that normalize to ""
 *          are never stored.
 */
export function upsertCompanyIfAbsent(
    db: Db,
    employerName: string,
    runDate: string,
    nowUtc: string,
    verification?: CompanyVerification,
): boolean {
    const norm = normalizeCompany(employerName);
    if (!norm) return false;

    const result = db
        .prepare(`
            INSERT OR IGNORE INTO companies (
                employer_norm, employer_name, first_seen_run_date, first_seen_utc,
                places_verified, places_reason, places_place_id, places_address, places_verified_utc
            ) VALUES (
                @norm, @name, @runDate, @nowUtc,
                @verified, @reason, @placeId, @address, @verifiedUtc
            )`)
        .run({
            norm,
            name: employerName.trim(),
            runDate,
            nowUtc,
            verified: verification?.verified ? 1 : 0,
            reason: verification?.reason ?? '',
            placeId: verification?.placeId ?? '',
            address: verification?.address ?? '',
            verifiedUtc: verification ? nowUtc : '',
        });

    return result.changes === 1;
}

export function countCompanies(db: Db): number {
    return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM companies').get()?.n ?? 0;
}
