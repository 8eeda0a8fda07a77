/**
 * Employer-name normalisation used as the company dedup key.
 *
 *   "Acme Inc."  → "acme"
 *   "ACME, INC"  → "acme"
 *
 * Suffixes are stripped until none remains, so the result is a fixed point:
 * normalizeCompany(normalizeCompany(x)) === normalizeCompany(x).
 */

const LEGAL_SUFFIXES = [
    ' inc', ' llc', ' ltd', ' co', ' corporation', ' corp',
    ' company', ' incorporated', ' limited',
];

const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s&-]/gu;

export function normalizeCompany(name: string | null | undefined): string {
    if (!name) return '';

    let s = name.trim().toLowerCase()
        .replace(DISALLOWED_CHARS, '')
        .replace(/\s+/g, ' ')
        .trim();

    let stripped = true;
    while (stripped) {
        stripped = false;
        for (const suffix of LEGAL_SUFFIXES) {
            if (s.endsWith(suffix)) {
                s = s.slice(0, -suffix.length).trim();
                stripped = true;
            }
        }
    }
    return s;
}
