// src/core/normalization/normalization.utils.ts

/**
 * Legal-entity words removed from company names before comparing them.
 * Covers the Portuguese corporate forms seen in the registry plus their
 * English counterparts ("Acme Unipessoal, Lda." and "Acme" are one company).
 */
const LEGAL_SUFFIX_PATTERN = /\b(?:lda|ltda|unipessoal|sociedade|por|quotas?|sa|s\s+a|ltd|limited|llc|inc|company|co)\b/g;

/** Punctuation treated as a word separator in company names */
const COMPANY_PUNCTUATION_PATTERN = /[.,;:\-_/()[\]{}&'"+]/g;

/** Name particles that carry no identity ("Maria da Costa" == "Maria Costa") */
const PERSON_NAME_PARTICLES = new Set(['DE', 'DA', 'DO', 'DOS', 'DAS', 'E']);

const TOTAL_MARKER_TOKENS = new Set(['total', 'totals', 'subtotal', 'subtotals', 'soma', 'sum']);

/** Decomposes accented characters and drops the combining marks. */
export function stripDiacritics(text: string): string {
    return text.normalize('NFD').replace(/\p{M}/gu, '');
}

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Light normalisation for person names (technician alias lookups):
 * accents, case and spacing only, plus the connector particles.
 * Punctuation is kept, so "J. Smith" and "J Smith" stay distinct keys.
 */
export function normalizePersonName(name: string | null | undefined): string {
    if (!name) return '';
    const upper = stripDiacritics(String(name).trim()).toUpperCase();
    return upper
        .split(/\s+/)
        .filter(token => token && !PERSON_NAME_PARTICLES.has(token))
        .join(' ');
}

/**
 * Strong normalisation for company names: accents, case, punctuation and
 * legal-entity suffixes. When stripping the suffixes leaves nothing
 * (a company literally called "Sociedade"), the pre-strip text is returned.
 * @returns '' for blank input; callers must treat it as unmatched.
 */
export function normalizeCompanyName(name: string | null | undefined): string {
    if (!name) return '';
    let text = stripDiacritics(String(name).trim()).toLowerCase();
    text = collapseWhitespace(text.replace(COMPANY_PUNCTUATION_PATTERN, ' '));
    if (!text) return '';

    const withoutSuffixes = collapseWhitespace(text.replace(LEGAL_SUFFIX_PATTERN, ' '));
    return withoutSuffixes || text;
}

/**
 * Key used by the company matcher: upper-case, no accents, every run of
 * non-alphanumerics turned into a single space. Legal suffixes are kept;
 * the token tier drops them through its stop list.
 */
export function normalizeMatchKey(name: string | null | undefined): string {
    if (!name) return '';
    const upper = stripDiacritics(String(name).trim()).toUpperCase();
    return collapseWhitespace(upper.replace(/[^A-Z0-9]+/g, ' '));
}

/** Normalises a spreadsheet header cell for synonym lookups. */
export function normalizeHeader(value: unknown): string {
    if (value === null || value === undefined) return '';
    const text = String(value).trim();
    if (!text) return '';
    const lower = stripDiacritics(text).toLowerCase().replace(/\//g, ' ');
    return collapseWhitespace(lower.replace(/[^a-z0-9]+/g, ' '));
}

/**
 * True when a cell reads as a report artifact such as "Total", "Sub-total"
 * or "Grand Total" rather than data.
 */
export function isTotalMarker(value: unknown): boolean {
    const normalized = normalizeHeader(value);
    if (!normalized) return false;
    return normalized.split(' ').some(token => TOTAL_MARKER_TOKENS.has(token));
}
