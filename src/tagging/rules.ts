/**
 * src/tagging/rules.ts
 *
 * Loads the include/exclude phrase tables from data/tag-rules.json.
 * Extending a tag means editing that file, not the scanning code.
 */

import * as fs from 'fs';
import { z } from 'zod';

export const REQUIREMENT_TAGS = ['no_degree', 'no_experience', 'under_3_years', 'over_3_years'] as const;
export type RequirementTag = (typeof REQUIREMENT_TAGS)[number];

export const SECTOR_TAGS = ['technology', 'life_sciences', 'aero_defense_satellite'] as const;
export type SectorTag = (typeof SECTOR_TAGS)[number];

const phraseList = z.array(z.string().min(1));

const sectorRuleSchema = z.object({
    /** Substring matches. */
    phrases: phraseList,
    /** Whole-word matches (not preceded or followed by [a-z0-9]). */
    words: phraseList,
    excludePhrases: phraseList,
    excludeWords: phraseList,
    /** Vetoed when the text looks like a retail/service role. */
    blockedByRetail: z.boolean(),
});

export const tagRulesSchema = z.object({
    requirements: z.object({
        no_degree: phraseList,
        no_experience: phraseList,
        under_3_years: phraseList,
        over_3_years: phraseList,
    }),
    sectors: z.object({
        technology: sectorRuleSchema,
        life_sciences: sectorRuleSchema,
        aero_defense_satellite: sectorRuleSchema,
    }),
    retailBlockers: phraseList,
});

export type SectorRule = z.infer<typeof sectorRuleSchema>;
export type TagRules = z.infer<typeof tagRulesSchema>;

const RULES_URL = new URL('../../data/tag-rules.json', import.meta.url);

let defaultRules: TagRules | null = null;

export function parseTagRules(raw: unknown): TagRules {
    return tagRulesSchema.parse(raw);
}

/** The bundled rule tables, read on first use. */
export function getDefaultTagRules(): TagRules {
    if (defaultRules === null) {
        defaultRules = parseTagRules(JSON.parse(fs.readFileSync(RULES_URL, 'utf-8')));
    }
    return defaultRules;
}
