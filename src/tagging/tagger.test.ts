import { describe, it, expect } from 'vitest';
import {
    decodeTags,
    deriveRequirementTags,
    deriveSectorTags,
    encodeTagField,
    encodeTagList,
    normalizeSectorText,
    sectorText,
    tagLikePattern,
} from './tagger.js';
import { getDefaultTagRules, parseTagRules } from './rules.js';

function sectors(title: string, description = '', employerName = ''): string[] {
    return [...deriveSectorTags(sectorText({ title, description, employerName }))].sort();
}

describe('deriveSectorTags', () => {
    it('does not tag "Automotive Technician" as technology', () => {
        expect(deriveSectorTags('Automotive Technician').has('technology')).toBe(false);
        expect(sectors('Automotive Technician', 'Use diagnostic software to troubleshoot vehicles.')).toEqual([]);
    });

    it('tags software roles as technology', () => {
        expect(sectors('Software Engineer', 'Build APIs in TypeScript.', 'Example Labs')).toEqual(['technology']);
    });

    it('lets a retail role veto technology', () => {
        expect(sectors('Barista', 'Some cloud ordering software', 'Coffee Co')).toEqual([]);
    });

    it('matches "gene" as a whole word only', () => {
        expect(sectors('General Manager', 'Oversee operations.', 'Example Foods')).toEqual([]);
        expect(sectors('Gene Therapy Associate')).toEqual(['life_sciences']);
    });

    it('excludes clinical nursing from life sciences', () => {
        expect(sectors('Clinical Nurse')).toEqual([]);
    });

    it('tags cleared RF work as aero/defense', () => {
        expect(sectors('RF Engineer', 'Secret clearance required.', 'Example Dynamics')).toEqual(['aero_defense_satellite']);
    });

    it('can tag several sectors at once', () => {
        expect(sectors('Data Scientist', '', 'Example Biotech')).toEqual(['life_sciences', 'technology']);
    });
});

describe('deriveRequirementTags', () => {
    it('prefers over_3_years when both experience bands match', () => {
        expect([...deriveRequirementTags('Requires 5+ years of experience; 2 years in a lead role')])
            .toEqual(['over_3_years']);
    });

    it('finds degree and experience waivers', () => {
        expect([...deriveRequirementTags('Entry level role. No degree required.')].sort())
            .toEqual(['no_degree', 'no_experience']);
    });

    it('finds a short experience band', () => {
        expect([...deriveRequirementTags('1-2 years of experience')]).toEqual(['under_3_years']);
    });
});

describe('normalizeSectorText', () => {
    it('lowercases and keeps only [a-z0-9+/.-]', () => {
        expect(normalizeSectorText('C++ / Back-End_Dev!')).toBe('c++ / back-end dev');
    });
});

describe('tag storage encoding', () => {
    it('wraps sector tags in commas, sorted', () => {
        expect(encodeTagField(['technology', 'life_sciences'])).toBe(',life_sciences,technology,');
        expect(encodeTagField([])).toBe('');
    });

    it('joins requirement tags without wrapping', () => {
        expect(encodeTagList(new Set(['over_3_years', 'no_degree']))).toBe('no_degree,over_3_years');
    });

    it('decodes either form', () => {
        expect([...decodeTags(',a,b,')]).toEqual(['a', 'b']);
        expect([...decodeTags('a,b')]).toEqual(['a', 'b']);
        expect(decodeTags(null).size).toBe(0);
    });

    it('builds a containment pattern', () => {
        expect(tagLikePattern('technology')).toBe('%,technology,%');
    });
});

describe('rule tables', () => {
    it('loads the bundled rules', () => {
        const rules = getDefaultTagRules();
        expect(rules.sectors.life_sciences.blockedByRetail).toBe(false);
        expect(rules.sectors.technology.blockedByRetail).toBe(true);
    });

    it('rejects a table missing a sector', () => {
        const { sectors: { technology, life_sciences }, ...rest } = getDefaultTagRules();
        expect(() => parseTagRules({ ...rest, sectors: { technology, life_sciences } })).toThrow();
    });
});
