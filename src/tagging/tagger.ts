/**
 * src/tagging/tagger.ts
 *
 * Heuristic requirement and sector tags derived from posting text.
 * Pure functions of their input: no I/O beyond the bundled rule tables.
 */

import {
    REQUIREMENT_TAGS,
    SECTOR_TAGS,
    getDefaultTagRules,
    type RequirementTag,
    type SectorRule,
    type SectorTag,
    type TagRules,
} from './rules.js';

// ─── Text Preparation ─────────────────────────────────────────────────────────

export interface TaggableText {
    title: string;
    description?: string;
    employerName?: string;
}

export function requirementText(t: TaggableText): string {
    return `${t.title}\n${t.description ?? ''}`;
}

export function sectorText(t: TaggableText): string {
    return `${t.title}\n${t.description ?? ''}\n${t.employerName ?? ''}`;
}

/** Lowercase, keep [a-z0-9+/.-], collapse whitespace. */
export function normalizeSectorText(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^a-z0-9+\s/.-]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

// ─── Matchers ─────────────────────────────────────────────────────────────────

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

const wordPatterns = new Map<string, RegExp>();

function hasWord(text: string, word: string): boolean {
    let pattern = wordPatterns.get(word);
    if (!pattern) {
        pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(word)}(?![a-z0-9])`);
        wordPatterns.set(word, pattern);
    }
    return pattern.test(text);
}

function hasAnyPhrase(text: string, phrases: readonly string[]): boolean {
    return phrases.some((p) => text.includes(p));
}

function hasAnyWord(text: string, words: readonly string[]): boolean {
    return words.some((w) => hasWord(text, w));
}

function sectorHit(text: string, rule: SectorRule, retailish: boolean): boolean {
    const included = hasAnyPhrase(text, rule.phrases) || hasAnyWord(text, rule.words);
    if (!included) return false;
    if (hasAnyPhrase(text, rule.excludePhrases) || hasAnyWord(text, rule.excludeWords)) return false;
    return !(rule.blockedByRetail && retailish);
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function deriveRequirementTags(text: string, rules: TagRules = getDefaultTagRules()): Set<RequirementTag> {
    const lower = text.toLowerCase();
    const tags = new Set<RequirementTag>();

    for (const tag of REQUIREMENT_TAGS) {
        if (hasAnyPhrase(lower, rules.requirements[tag])) tags.add(tag);
    }

    // A posting asking for both is read as the stricter requirement
    if (tags.has('over_3_years')) tags.delete('under_3_years');

    return tags;
}

export function deriveSectorTags(text: string, rules: TagRules = getDefaultTagRules()): Set<SectorTag> {
    const normalized = normalizeSectorText(text);
    const retailish = hasAnyPhrase(normalized, rules.retailBlockers);
    const tags = new Set<SectorTag>();

    for (const tag of SECTOR_TAGS) {
        if (sectorHit(normalized, rules.sectors[tag], retailish)) tags.add(tag);
    }
    return tags;
}

// ─── Storage Encoding ─────────────────────────────────────────────────────────
//
// Requirement tags are stored comma-joined ("no_degree,over_3_years"),
// sector tags comma-wrapped (",life_sciences,technology,") so that a
// containment query is a single LIKE. Callers never build these by hand.

export function encodeTagList(tags: Iterable<string>): string {
    return [...new Set(tags)].sort().join(',');
}

export function encodeTagField(tags: Iterable<string>): string {
    const joined = encodeTagList(tags);
    return joined ? `,${joined},` : '';
}

export function decodeTags(stored: string | null | undefined): Set<string> {
    return new Set((stored ?? '').split(',').map((s) => s.trim()).filter(Boolean));
}

/** LIKE pattern matching a comma-wrapped tag field that contains `tag`. */
export function tagLikePattern(tag: string): string {
    return `%,${tag},%`;
}
