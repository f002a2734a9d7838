// src/core/matching/company-matcher.service.test.ts
import 'reflect-metadata';
import winston from 'winston';

import { LedgerYear, TimeRecord } from '../common/interfaces/models';
import { CompanyMatcherService } from './company-matcher.service';
import { similarityRatio } from './similarity.utils';

const logger = winston.createLogger({ silent: true });

function record(deleted: boolean = false): TimeRecord {
    return { monthlyMinutes: { 1: 60 }, extraMonthlyMinutes: 0, perTechnicianMonthlyMinutes: {}, deleted };
}

function year(...names: string[]): LedgerYear {
    const slice: LedgerYear = {};
    for (const name of names) slice[name] = record();
    return slice;
}

describe('similarityRatio', () => {
    it('scores by edit distance over the combined length', () => {
        expect(similarityRatio('ACME LDA', 'ACMME LDA')).toBeCloseTo(16 / 17, 10);
        expect(similarityRatio('ACME LDA', 'ACNE LDA')).toBeCloseTo(15 / 16, 10);
        expect(similarityRatio('', '')).toBe(1);
    });
});

describe('CompanyMatcherService', () => {
    let matcher: CompanyMatcherService;

    beforeEach(() => {
        matcher = new CompanyMatcherService(logger);
    });

    it('matches on the normalised key before anything else', () => {
        const result = matcher.matchInYear('ACME, Lda.', year('Globex', 'Acme Lda'));
        expect(result.tier).toBe('exact');
        expect(result.matchedKey).toBe('Acme Lda');
        expect(result.score).toBe(1);
    });

    it('prefers the spelling closest to the query when several share a key', () => {
        const result = matcher.matchInYear('ACME LDA', year('Acme, Lda', 'ACME LDA'));
        expect(result.matchedKey).toBe('ACME LDA');
    });

    it('falls back to token inclusion once legal forms are ignored', () => {
        const result = matcher.matchInYear('Acme Unipessoal, Lda.', year('Globex', 'Acme'));
        expect(result.tier).toBe('tokenInclusion');
        expect(result.matchedKey).toBe('Acme');
    });

    it('breaks token-inclusion ties by similarity', () => {
        const result = matcher.matchInYear('Acme Lda', year('Acme Consulting', 'Acme'));
        expect(result.tier).toBe('tokenInclusion');
        expect(result.matchedKey).toBe('Acme');
    });

    it('accepts a lone fuzzy candidate above the ratio', () => {
        const result = matcher.matchInYear('Acme Lda', year('Acmme Lda', 'Globex'));
        expect(result.tier).toBe('fuzzy');
        expect(result.matchedKey).toBe('Acmme Lda');
        expect(result.score).toBeCloseTo(16 / 17, 10);
        expect(result.candidates).toEqual([]);
    });

    it('refuses a fuzzy winner that does not clear the margin and lists the candidates', () => {
        const result = matcher.matchInYear('Acme Lda', year('Acmme Lda', 'Acne Lda'));
        expect(result.tier).toBe('none');
        expect(result.matchedKey).toBeNull();
        expect(result.record).toBeNull();
        expect(result.candidates.map(c => c.name)).toEqual(['Acmme Lda', 'Acne Lda']);
        expect(result.candidates[0]?.score).toBeCloseTo(16 / 17, 10);
        expect(result.candidates[1]?.score).toBeCloseTo(15 / 16, 10);
    });

    it('scores spellings that share a key as one fuzzy candidate', () => {
        const result = matcher.matchInYear('Acme Lda', year('Acmme, Lda.', 'ACMME LDA'));
        expect(result.tier).toBe('fuzzy');
        expect(result.matchedKey).toBe('ACMME LDA');
        expect(result.score).toBeCloseTo(16 / 17, 10);
    });

    it('lists each key once among the candidates', () => {
        const result = matcher.matchInYear('Acme Lda', year('Acmme Lda', 'ACMME LDA', 'Acne Lda'));
        expect(result.tier).toBe('none');
        expect(result.candidates.map(c => c.name)).toEqual(['Acmme Lda', 'Acne Lda']);
    });

    it('honours per-call threshold overrides', () => {
        const result = matcher.matchInYear('Acme Lda', year('Acmme Lda'), { fuzzyMinRatio: 0.95 });
        expect(result.tier).toBe('none');
        expect(result.candidates.map(c => c.name)).toEqual(['Acmme Lda']);
    });

    it('scans the first keys when nothing passes the prefilter', () => {
        const result = matcher.matchInYear('Initech', year('Globex'));
        expect(result.tier).toBe('none');
        expect(result.candidates.map(c => c.name)).toEqual(['Globex']);
    });

    it('never matches deleted records', () => {
        const slice: LedgerYear = { 'Acme Lda': record(true) };
        expect(matcher.buildIndex(slice)).toEqual([]);
        expect(matcher.matchInYear('Acme Lda', slice).tier).toBe('none');
    });

    it('never matches a blank query', () => {
        const result = matcher.matchInYear(' ,. ', year('Acme'));
        expect(result).toEqual({ tier: 'none', matchedKey: null, record: null, score: null, candidates: [] });
    });

    it('reuses one index across queries', () => {
        const index = matcher.buildIndex(year('Acme', 'Globex'));
        expect(matcher.match('Globex', index).matchedKey).toBe('Globex');
        expect(matcher.match('ACME', index).matchedKey).toBe('Acme');
    });
});
