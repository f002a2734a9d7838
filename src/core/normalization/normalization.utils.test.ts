// src/core/normalization/normalization.utils.test.ts
import {
    isTotalMarker,
    normalizeCompanyName,
    normalizeHeader,
    normalizeMatchKey,
    normalizePersonName,
} from './normalization.utils';

describe('normalizePersonName', () => {
    it('strips accents, case, extra spaces and name particles', () => {
        expect(normalizePersonName('  José  da Silva ')).toBe('JOSE SILVA');
    });

    it('keeps punctuation so initials remain distinct spellings', () => {
        expect(normalizePersonName('J. Smith')).toBe('J. SMITH');
        expect(normalizePersonName('J Smith')).toBe('J SMITH');
    });

    it('returns an empty key for blank input', () => {
        expect(normalizePersonName('   ')).toBe('');
        expect(normalizePersonName(null)).toBe('');
        expect(normalizePersonName(undefined)).toBe('');
    });
});

describe('normalizeCompanyName', () => {
    it('removes punctuation and legal-entity suffixes', () => {
        expect(normalizeCompanyName('Acme Unipessoal, Lda.')).toBe('acme');
        expect(normalizeCompanyName('ACME LDA')).toBe('acme');
    });

    it('treats a spaced "S.A." as a suffix', () => {
        expect(normalizeCompanyName('Café Central, S.A.')).toBe('cafe central');
    });

    it('keeps the text when only suffix words remain', () => {
        expect(normalizeCompanyName('Sociedade')).toBe('sociedade');
    });

    it('does not strip suffix words embedded in longer words', () => {
        expect(normalizeCompanyName('Costa Lda')).toBe('costa');
        expect(normalizeCompanyName('Incubadora Norte')).toBe('incubadora norte');
    });

    it('returns an empty key for blank input', () => {
        expect(normalizeCompanyName('')).toBe('');
        expect(normalizeCompanyName(' .,; ')).toBe('');
        expect(normalizeCompanyName(null)).toBe('');
    });
});

describe('normalizeMatchKey', () => {
    it('upper-cases and replaces non-alphanumeric runs with a single space', () => {
        expect(normalizeMatchKey('Acme Unipessoal, Lda.')).toBe('ACME UNIPESSOAL LDA');
        expect(normalizeMatchKey('  Padaria   São-João ')).toBe('PADARIA SAO JOAO');
    });
});

describe('normalizeHeader', () => {
    it('lower-cases and strips accents and separators', () => {
        expect(normalizeHeader('Técnico/Responsável')).toBe('tecnico responsavel');
        expect(normalizeHeader(' Tempo (min) ')).toBe('tempo min');
    });

    it('handles non-string cells', () => {
        expect(normalizeHeader(null)).toBe('');
        expect(normalizeHeader(42)).toBe('42');
    });
});

describe('isTotalMarker', () => {
    it.each(['Total', 'Grand Total', 'Sub-total', 'SUBTOTAL', 'Soma', 'sum'])('flags %s', value => {
        expect(isTotalMarker(value)).toBe(true);
    });

    it.each(['Acme', 'Totalmente Lda', ''])('does not flag %s', value => {
        expect(isTotalMarker(value)).toBe(false);
    });

    it('does not flag empty cells', () => {
        expect(isTotalMarker(null)).toBe(false);
    });
});
