// src/core/technicians/technician-resolver.service.test.ts
import 'reflect-metadata';
import path from 'path';
import winston from 'winston';

import { ConfigurationError } from '../common/errors';
import { AliasTableDefinition, loadAliasTable, parseAliasTable } from './alias-table';
import { buildClientRegistryIndex, TechnicianResolverService, UNASSIGNED_TECHNICIAN } from './technician-resolver.service';

const logger = winston.createLogger({ silent: true });

const aliasTable: AliasTableDefinition = {
    technicians: [
        { canonical: 'John Smith', variants: ['J. Smith', 'Jon Smith'] },
        { canonical: 'Maria Costa', variants: ['Maria da Costa'] },
    ],
    specialCase: { canonical: 'Carlos Mendes', variants: ['C. Mendes'] },
};

describe('TechnicianResolverService', () => {
    let resolver: TechnicianResolverService;

    beforeEach(() => {
        resolver = new TechnicianResolverService(logger, aliasTable);
    });

    describe('resolve', () => {
        it('maps variants to their canonical identity regardless of case and accents', () => {
            expect(resolver.resolve('j. smith')).toEqual({ kind: 'canonical', technician: 'John Smith' });
            expect(resolver.resolve('JON SMITH')).toEqual({ kind: 'canonical', technician: 'John Smith' });
            expect(resolver.resolve('  Maria  da  Costa ')).toEqual({ kind: 'canonical', technician: 'Maria Costa' });
        });

        it('flags the special-case identity instead of taking it literally', () => {
            expect(resolver.resolve('C. Mendes')).toEqual({ kind: 'specialCase', rawName: 'C. Mendes' });
            expect(resolver.resolve('Carlos Mendes')).toEqual({ kind: 'specialCase', rawName: 'Carlos Mendes' });
        });

        it('classifies anything else as unknown', () => {
            expect(resolver.resolve('Pedro Alves')).toEqual({ kind: 'unknown', rawName: 'Pedro Alves' });
            expect(resolver.resolve('   ')).toEqual({ kind: 'unknown', rawName: '' });
            expect(resolver.resolve(null)).toEqual({ kind: 'unknown', rawName: '' });
        });
    });

    describe('canonicalize', () => {
        it('returns canonical names, Unassigned, or the trimmed spelling', () => {
            expect(resolver.canonicalize('Jon Smith')).toBe('John Smith');
            expect(resolver.canonicalize('Carlos Mendes')).toBe(UNASSIGNED_TECHNICIAN);
            expect(resolver.canonicalize('')).toBe(UNASSIGNED_TECHNICIAN);
            expect(resolver.canonicalize(' Pedro ')).toBe('Pedro');
        });
    });

    describe('inferPrimaryTechnician', () => {
        const registry = buildClientRegistryIndex([
            { name: 'Acme, Lda.', primaryTechnician: 'J. Smith' },
            { name: 'Beta SA', primaryTechnician: 'Pedro Alves' },
            { name: 'Gamma' },
            { name: 'Delta', primaryTechnician: 'C. Mendes' },
        ]);

        it('uses the canonical form of the recorded technician', () => {
            expect(resolver.inferPrimaryTechnician('acme', registry)).toBe('John Smith');
        });

        it('keeps an unrecognised recorded technician as written', () => {
            expect(resolver.inferPrimaryTechnician('beta', registry)).toBe('Pedro Alves');
        });

        it('returns null when the registry cannot tell', () => {
            expect(resolver.inferPrimaryTechnician('gamma', registry)).toBeNull();
            expect(resolver.inferPrimaryTechnician('missing', registry)).toBeNull();
            expect(resolver.inferPrimaryTechnician('delta', registry)).toBeNull();
            expect(resolver.inferPrimaryTechnician('', registry)).toBeNull();
        });
    });

    it('lists canonical technicians in order', () => {
        expect(resolver.listCanonical()).toEqual(['John Smith', 'Maria Costa']);
    });

    it('rejects a spelling shared by two identities', () => {
        const conflicting: AliasTableDefinition = {
            technicians: [
                { canonical: 'John Smith', variants: ['Smith'] },
                { canonical: 'Jane Smith', variants: ['Smith'] },
            ],
            specialCase: { canonical: 'Carlos Mendes', variants: [] },
        };
        expect(() => new TechnicianResolverService(logger, conflicting)).toThrow(ConfigurationError);
    });
});

describe('alias table loading', () => {
    it('loads the bundled alias table', () => {
        const table = loadAliasTable(path.resolve(__dirname, '../../../data/technician-aliases.json'));
        expect(table.technicians.map(entry => entry.canonical)).toContain('John Smith');
        expect(table.specialCase.canonical).toBe('Carlos Mendes');
    });

    it('reports a missing file as a configuration error', () => {
        expect(() => loadAliasTable(path.join(__dirname, 'no-such-aliases.json'))).toThrow(ConfigurationError);
    });

    it('rejects malformed definitions', () => {
        expect(() => parseAliasTable([])).toThrow(ConfigurationError);
        expect(() => parseAliasTable({ technicians: [{ canonical: '' }], specialCase: { canonical: 'X' } })).toThrow(ConfigurationError);
        expect(() => parseAliasTable({ technicians: [] })).toThrow(ConfigurationError);
    });

    it('defaults missing variants to an empty list', () => {
        const table = parseAliasTable({ technicians: [{ canonical: 'Ana Ribeiro' }], specialCase: { canonical: 'Carlos Mendes' } });
        expect(table.technicians[0]).toEqual({ canonical: 'Ana Ribeiro', variants: [] });
    });
});
