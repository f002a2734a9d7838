// src/core/matching/interfaces/services.ts
import { LedgerYear, TimeRecord } from '../../common/interfaces/models';

export type MatchTier = 'exact' | 'tokenInclusion' | 'fuzzy' | 'none';

export interface MatchCandidate {
    readonly name: string;
    /** Similarity ratio to the query, 0..1 */
    readonly score: number;
}

export interface CompanyMatch {
    readonly tier: MatchTier;
    /** Ledger key the query resolved to, null for `none` */
    readonly matchedKey: string | null;
    readonly record: TimeRecord | null;
    readonly score: number | null;
    /** Top fuzzy candidates, filled only when nothing matched */
    readonly candidates: MatchCandidate[];
}

/** Thresholds for the fuzzy tier; unset fields fall back to configuration */
export interface MatchOptions {
    readonly fuzzyMinRatio?: number;
    readonly fuzzyMinMargin?: number;
    readonly prefilterCutoff?: number;
    readonly prefilterLimit?: number;
    readonly fallbackScanLimit?: number;
}

export interface IndexedCompany {
    readonly name: string;
    readonly matchKey: string;
    readonly tokens: ReadonlySet<string>;
    readonly record: TimeRecord;
}

/** Defines the contract for resolving free-text company names against a ledger year */
export interface ICompanyMatcherService {
    /** Prepares the live (not deleted) records of a year for repeated matching. */
    buildIndex(slice: LedgerYear): readonly IndexedCompany[];

    /**
     * Tries exact, then token inclusion, then bounded fuzzy matching.
     * An empty query never matches.
     */
    match(name: string, index: readonly IndexedCompany[], options?: MatchOptions): CompanyMatch;

    /** One-off match straight against a ledger year. */
    matchInYear(name: string, slice: LedgerYear, options?: MatchOptions): CompanyMatch;
}
