import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    companyIndicators,
    countDistinctJobs,
    countJobsWithRequirement,
    countJobsWithTitleKeyword,
    excludeEmployersClause,
    newCompaniesInRange,
    sampleJobs,
    sectorStats,
    topEmployers,
    topTitles,
    windowJobIds,
} from './reportQueries.js';
import { insertJobIfNew } from './jobStore.js';
import { upsertCompanyIfAbsent } from './companyStore.js';
import { closeDb, type Db } from '../utils/db.js';
import { makeJob, memoryDb } from '../testing/fixtures.js';

const WEEK = { start: '2026-10-04', endExclusive: '2026-10-11' };
const NEXT_WEEK = { start: '2026-10-11', endExclusive: '2026-10-18' };
const OCTOBER = { start: '2026-10-01', endExclusive: '2026-11-01' };
const SEPTEMBER = { start: '2026-09-01', endExclusive: '2026-10-01' };

const beta = { employerName: 'Beta LLC', employerNorm: 'beta' };

function seed(db: Db): void {
    insertJobIfNew(db, makeJob({
        jobId: 'J1', title: 'Software Engineer', firstSeenRunDate: '2026-10-04', sectorTags: ['technology'],
    }));
    insertJobIfNew(db, makeJob({
        jobId: 'J2', title: 'Data Engineer', firstSeenRunDate: '2026-10-10',
        requirementTags: ['no_degree', 'over_3_years'],
    }));
    insertJobIfNew(db, makeJob({ jobId: 'J3', firstSeenRunDate: '2026-10-11' }));
    insertJobIfNew(db, makeJob({
        jobId: 'J4', ...beta, title: 'Lab Chemist', firstSeenRunDate: '2026-10-05',
        sectorTags: ['life_sciences', 'technology'],
    }));
    insertJobIfNew(db, makeJob({ jobId: 'J5', ...beta, firstSeenRunDate: '2026-09-15' }));

    upsertCompanyIfAbsent(db, 'Acme Inc.', '2026-10-04', '2026-10-04T12:00:00Z');
    upsertCompanyIfAbsent(db, 'Beta LLC', '2026-09-20', '2026-09-20T12:00:00Z');
}

describe('reportQueries', () => {
    let db: Db;

    beforeEach(() => {
        db = memoryDb();
        seed(db);
    });

    afterEach(() => {
        closeDb(db);
    });

    it('counts distinct jobs over a half-open range', () => {
        expect(countDistinctJobs(db, WEEK)).toBe(3);
        expect(countDistinctJobs(db, NEXT_WEEK)).toBe(1);
    });

    it('ranks employers and honours exclusions by normalized name', () => {
        expect(topEmployers(db, WEEK, 10)).toEqual([
            { employerNorm: 'acme', employerName: 'Acme Inc.', count: 2 },
            { employerNorm: 'beta', employerName: 'Beta LLC', count: 1 },
        ]);
        expect(topEmployers(db, WEEK, 10, ['Acme Inc']).map((e) => e.employerNorm)).toEqual(['beta']);
        expect(topEmployers(db, WEEK, 1)).toHaveLength(1);
    });

    it('collects window job ids for one employer', () => {
        expect(windowJobIds(db, 'acme', WEEK)).toEqual(new Set(['J1', 'J2']));
    });

    it('computes sector stats with new companies joined on the same window', () => {
        expect(sectorStats(db, 'technology', WEEK)).toEqual({ captured: 2, distinctJobs: 2, newCompanies: 1 });
        expect(sectorStats(db, 'life_sciences', WEEK)).toEqual({ captured: 1, distinctJobs: 1, newCompanies: 0 });
    });

    it('counts requirement tags and title keywords', () => {
        expect(countJobsWithRequirement(db, 'over_3_years', WEEK)).toBe(1);
        expect(countJobsWithRequirement(db, 'no_degree', WEEK)).toBe(1);
        expect(countJobsWithRequirement(db, 'under_3_years', WEEK)).toBe(0);
        expect(countJobsWithTitleKeyword(db, 'Engineer', WEEK)).toBe(2);
        expect(countJobsWithTitleKeyword(db, 'chemist', WEEK)).toBe(1);
    });

    it('lists top titles with ties broken alphabetically', () => {
        expect(topTitles(db, 'acme', WEEK)).toEqual(['Data Engineer', 'Software Engineer']);
    });

    it('lists new companies with their most recent job in range', () => {
        const companies = newCompaniesInRange(db, WEEK);

        expect(companies).toHaveLength(1);
        expect(companies[0]).toMatchObject({
            employerNorm: 'acme',
            employerName: 'Acme Inc.',
            firstSeenRunDate: '2026-10-04',
            verified: false,
            sampleJob: { title: 'Data Engineer', requirements: 'no_degree,over_3_years' },
        });
        expect(newCompaniesInRange(db, WEEK, { excluded: ['ACME'] })).toEqual([]);
    });

    it('narrows employers and new companies to one sector', () => {
        expect(topEmployers(db, WEEK, 10, [], 'technology')).toEqual([
            { employerNorm: 'acme', employerName: 'Acme Inc.', count: 1 },
            { employerNorm: 'beta', employerName: 'Beta LLC', count: 1 },
        ]);
        expect(topEmployers(db, WEEK, 10, [], 'life_sciences').map((e) => e.employerNorm)).toEqual(['beta']);

        const tech = newCompaniesInRange(db, WEEK, { sectorTag: 'technology' });
        expect(tech.map((c) => c.employerNorm)).toEqual(['acme']);
        expect(tech[0]?.sampleJob?.title).toBe('Software Engineer');
        expect(newCompaniesInRange(db, WEEK, { sectorTag: 'life_sciences' })).toEqual([]);
    });

    it('samples up to three jobs of an employer by job id', () => {
        insertJobIfNew(db, makeJob({ jobId: 'J0', title: 'Chemist', applyLink: 'https://jobs.example.com/0', firstSeenRunDate: '2026-10-06' }));

        expect(sampleJobs(db, 'acme', WEEK)).toEqual([
            { title: 'Chemist', applyLink: 'https://jobs.example.com/0' },
            { title: 'Software Engineer', applyLink: '' },
            { title: 'Data Engineer', applyLink: '' },
        ]);
        expect(sampleJobs(db, 'acme', WEEK, 1)).toHaveLength(1);
        expect(sampleJobs(db, 'beta', NEXT_WEEK)).toEqual([]);
    });

    it('compares employer counts with the previous period', () => {
        expect(companyIndicators(db, OCTOBER, SEPTEMBER, 10)).toEqual([
            { employerNorm: 'acme', employerName: 'Acme Inc.', thisCount: 3, lastCount: null, pctChange: null },
            { employerNorm: 'beta', employerName: 'Beta LLC', thisCount: 1, lastCount: 1, pctChange: 0 },
        ]);
    });
});

describe('excludeEmployersClause', () => {
    it('normalizes and dedupes names into placeholders', () => {
        expect(excludeEmployersClause('employer_norm', ['Walmart Inc.', 'walmart', ''])).toEqual({
            sql: 'AND employer_norm NOT IN (?)',
            params: ['walmart'],
        });
    });

    it('produces nothing for an empty list', () => {
        expect(excludeEmployersClause('employer_norm', [])).toEqual({ sql: '', params: [] });
    });
});
