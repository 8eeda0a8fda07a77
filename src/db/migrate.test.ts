import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { columnNames, ensureColumn, migrate, renameSectorTags } from './migrate.js';
import { getJob, insertJobIfNew } from '../store/jobStore.js';
import { closeDb, type Db } from '../utils/db.js';
import { makeJob, memoryDb } from '../testing/fixtures.js';

describe('migrate', () => {
    let db: Db;

    beforeEach(() => {
        db = memoryDb();
    });

    afterEach(() => {
        closeDb(db);
    });

    it('can run again over an existing schema', () => {
        expect(() => migrate(db)).not.toThrow();
        expect(ensureColumn(db, 'jobs', 'fields', "TEXT DEFAULT ''")).toBe(false);
        expect(columnNames(db, 'companies').has('places_reason')).toBe(true);
    });

    it('renames the old satellite sector tag on stored jobs', () => {
        insertJobIfNew(db, makeJob({ jobId: 'J1' }));
        insertJobIfNew(db, makeJob({ jobId: 'J2', sectorTags: ['technology'] }));
        db.prepare<[string, string]>('UPDATE jobs SET fields = ? WHERE job_id = ?')
            .run(',aero_defense_sat,technology,', 'J1');

        migrate(db);

        expect(getJob(db, 'J1')?.fields).toBe(',aero_defense_satellite,technology,');
        expect(getJob(db, 'J2')?.fields).toBe(',technology,');
        expect(renameSectorTags(db)).toBe(0);
    });
});
