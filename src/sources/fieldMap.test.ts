import { describe, it, expect } from 'vitest';
import { asText, resolveCoordinates, resolveJobFields, resolvePostedAt, resolveSalaryText } from './fieldMap.js';

describe('resolveSalaryText', () => {
    it('renders a min-max range with currency and period', () => {
        expect(resolveSalaryText({
            job_min_salary: 50000,
            job_max_salary: 70000,
            job_salary_currency: 'USD',
            job_salary_period: 'YEAR',
        })).toBe('50000-70000 USD YEAR');
    });

    it('renders open-ended ranges', () => {
        expect(resolveSalaryText({ job_min_salary: 20, job_salary_period: 'HOUR' })).toBe('20+ HOUR');
        expect(resolveSalaryText({ job_max_salary: 90000 })).toBe('up to 90000');
    });

    it('prefers an upstream formatted string', () => {
        expect(resolveSalaryText({ job_salary: '$60K-$80K', job_min_salary: 1 })).toBe('$60K-$80K');
    });

    it('treats null as absent', () => {
        expect(resolveSalaryText({ job_min_salary: null, job_max_salary: 100 })).toBe('up to 100');
        expect(resolveSalaryText({})).toBe('');
    });
});

describe('resolvePostedAt', () => {
    it('takes the first candidate present', () => {
        expect(resolvePostedAt({
            job_posted_at_datetime_utc: '2026-10-01T00:00:00.000Z',
            job_posted_at: '3 days ago',
        })).toBe('2026-10-01T00:00:00.000Z');
        expect(resolvePostedAt({ job_posted_at: '3 days ago' })).toBe('3 days ago');
    });

    it('is null when no candidate is present', () => {
        expect(resolvePostedAt({})).toBeNull();
    });
});

describe('resolveCoordinates', () => {
    it('needs both numbers', () => {
        expect(resolveCoordinates({ job_latitude: 39.08, job_longitude: -77.15 })).toEqual({ lat: 39.08, lon: -77.15 });
        expect(resolveCoordinates({ job_latitude: '39.08', job_longitude: -77.15 })).toBeNull();
        expect(resolveCoordinates({ job_latitude: 39.08 })).toBeNull();
    });
});

describe('asText', () => {
    it('flattens nested highlight objects', () => {
        expect(asText({ Qualifications: ['a', 'b'], Benefits: ['c'] })).toBe('a\nb\nc');
    });
});

describe('resolveJobFields', () => {
    it('falls back through alternative field names and defaults the rest', () => {
        const fields = resolveJobFields({ job_id: 'J1', job_location_city: 'Rockville' });
        expect(fields.jobId).toBe('J1');
        expect(fields.city).toBe('Rockville');
        expect(fields.state).toBe('');
        expect(fields.postedAt).toBeNull();
        expect(fields.coordinates).toBeNull();
    });
});
