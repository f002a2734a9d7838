// src/core/matching/company-matcher.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import config, { MatchingConfig } from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { LedgerYear } from '../common/interfaces/models';
import { normalizeMatchKey } from '../normalization';
import {
    CompanyMatch,
    ICompanyMatcherService,
    IndexedCompany,
    MatchCandidate,
    MatchOptions,
} from './interfaces/services';
import { isSubset, overlapSize, significantTokens, similarityRatio } from './similarity.utils';

interface ScoredKey {
    readonly matchKey: string;
    readonly score: number;
}

/** Several ledger spellings can share a key; the closest to the query wins. */
function closestSpelling(queryKey: string, first: IndexedCompany, others: readonly IndexedCompany[] = []): IndexedCompany {
    let best = first;
    for (const entry of others) {
        if (similarityRatio(queryKey, entry.name.toUpperCase()) > similarityRatio(queryKey, best.name.toUpperCase())) {
            best = entry;
        }
    }
    return best;
}

/** Index entries per match key, keys in index order */
function groupByMatchKey(index: readonly IndexedCompany[]): Map<string, IndexedCompany[]> {
    const groups = new Map<string, IndexedCompany[]>();
    for (const entry of index) {
        const group = groups.get(entry.matchKey);
        if (group) {
            group.push(entry);
        } else {
            groups.set(entry.matchKey, [entry]);
        }
    }
    return groups;
}

function matched(tier: CompanyMatch['tier'], entry: IndexedCompany, score: number): CompanyMatch {
    return { tier, matchedKey: entry.name, record: entry.record, score, candidates: [] };
}

@singleton()
@injectable()
export class CompanyMatcherService implements ICompanyMatcherService {

    constructor(@inject(LOGGER_TOKEN) private logger: Logger) {
        this.logger.info('CompanyMatcherService initialized.');
    }

    buildIndex(slice: LedgerYear): IndexedCompany[] {
        const index: IndexedCompany[] = [];
        for (const [name, record] of Object.entries(slice)) {
            if (record.deleted) continue;
            const matchKey = normalizeMatchKey(name);
            if (!matchKey) continue;
            index.push({ name, matchKey, tokens: significantTokens(matchKey), record });
        }
        return index;
    }

    matchInYear(name: string, slice: LedgerYear, options?: MatchOptions): CompanyMatch {
        return this.match(name, this.buildIndex(slice), options);
    }

    match(name: string, index: readonly IndexedCompany[], options: MatchOptions = {}): CompanyMatch {
        const settings: MatchingConfig = { ...config.matching, ...options };
        const queryKey = normalizeMatchKey(name);
        if (!queryKey || index.length === 0) {
            return { tier: 'none', matchedKey: null, record: null, score: null, candidates: [] };
        }

        return this.matchExact(queryKey, index)
            ?? this.matchByTokens(queryKey, index)
            ?? this.matchFuzzy(name, queryKey, index, settings);
    }

    private matchExact(queryKey: string, index: readonly IndexedCompany[]): CompanyMatch | null {
        const [first, ...others] = index.filter(entry => entry.matchKey === queryKey);
        return first ? matched('exact', closestSpelling(queryKey, first, others), 1) : null;
    }

    private matchByTokens(queryKey: string, index: readonly IndexedCompany[]): CompanyMatch | null {
        const queryTokens = significantTokens(queryKey);
        if (queryTokens.size === 0) return null;

        let best: { entry: IndexedCompany; overlap: number; ratio: number } | null = null;
        for (const entry of index) {
            if (entry.tokens.size === 0) continue;
            if (!isSubset(queryTokens, entry.tokens) && !isSubset(entry.tokens, queryTokens)) continue;

            const overlap = overlapSize(queryTokens, entry.tokens);
            const ratio = similarityRatio(queryKey, entry.matchKey);
            const better = !best
                || overlap > best.overlap
                || (overlap === best.overlap && ratio > best.ratio)
                || (overlap === best.overlap && ratio === best.ratio && entry.name.length < best.entry.name.length);
            if (better) {
                best = { entry, overlap, ratio };
            }
        }
        return best ? matched('tokenInclusion', best.entry, best.ratio) : null;
    }

    /**
     * Bounded fuzzy pass over distinct match keys: the prefilter keeps the
     * closest keys above the cutoff; when none qualify only the first keys of
     * the year are scanned. The best key must clear the ratio and lead the
     * runner-up by the margin.
     */
    private matchFuzzy(name: string, queryKey: string, index: readonly IndexedCompany[], settings: MatchingConfig): CompanyMatch {
        const groups = groupByMatchKey(index);
        const keys = [...groups.keys()];
        const byScore = (a: ScoredKey, b: ScoredKey) => b.score - a.score;
        const score = (matchKey: string): ScoredKey => ({ matchKey, score: similarityRatio(queryKey, matchKey) });

        let pool = keys
            .map(score)
            .filter(candidate => candidate.score >= settings.prefilterCutoff)
            .sort(byScore)
            .slice(0, settings.prefilterLimit);
        if (pool.length === 0) {
            pool = keys.slice(0, settings.fallbackScanLimit).map(score).sort(byScore);
        }

        const spellingOf = (matchKey: string): IndexedCompany | null => {
            const [first, ...others] = groups.get(matchKey) ?? [];
            return first ? closestSpelling(queryKey, first, others) : null;
        };

        const [best, runnerUp] = pool;
        if (best && best.score >= settings.fuzzyMinRatio && (!runnerUp || best.score - runnerUp.score >= settings.fuzzyMinMargin)) {
            const entry = spellingOf(best.matchKey);
            if (entry) return matched('fuzzy', entry, best.score);
        }

        if (best && best.score >= settings.fuzzyMinRatio) {
            this.logger.debug(`Ambiguous fuzzy match for "${name}": ${best.matchKey} (${best.score.toFixed(3)}) vs ${runnerUp?.matchKey} (${runnerUp?.score.toFixed(3)}).`);
        }
        const candidates: MatchCandidate[] = [];
        for (const { matchKey, score: keyScore } of pool.slice(0, 3)) {
            const entry = spellingOf(matchKey);
            if (entry) candidates.push({ name: entry.name, score: keyScore });
        }
        return { tier: 'none', matchedKey: null, record: null, score: null, candidates };
    }
}
