// src/core/matching/similarity.utils.ts
import { distance as levenshteinDistance } from 'fastest-levenshtein';

/** Corporate forms and connectors that say nothing about which company is meant */
const STOP_TOKENS = new Set([
    'LDA', 'LTDA', 'LTD', 'SA', 'SOCIEDADE', 'UNIPESSOAL', 'UNIP', 'ME',
    'LIMITED', 'LLC', 'INC', 'CO', 'COMPANY',
    'E', 'DE', 'DA', 'DO', 'DOS', 'DAS', 'AND', 'THE',
]);

/**
 * Similarity in [0, 1] derived from the edit distance:
 * `(|a| + |b| - levenshtein(a, b)) / (|a| + |b|)`.
 * "ACME LDA" against "ACMME LDA" scores 16/17.
 */
export function similarityRatio(a: string, b: string): number {
    const total = a.length + b.length;
    if (total === 0) return 1;
    return (total - levenshteinDistance(a, b)) / total;
}

/** Tokens of a match key minus the stop list. */
export function significantTokens(matchKey: string): Set<string> {
    return new Set(matchKey.split(' ').filter(token => token && !STOP_TOKENS.has(token)));
}

export function isSubset(small: ReadonlySet<string>, large: ReadonlySet<string>): boolean {
    for (const token of small) {
        if (!large.has(token)) return false;
    }
    return true;
}

export function overlapSize(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    let count = 0;
    for (const token of a) {
        if (b.has(token)) count++;
    }
    return count;
}
