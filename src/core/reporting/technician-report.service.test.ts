// src/core/reporting/technician-report.service.test.ts
import 'reflect-metadata';
import fs from 'fs';
import os from 'os';
import path from 'path';
import winston from 'winston';
import * as XLSX from 'xlsx';

import { LedgerFileRepository } from '../../infrastructure/persistence/repositories/ledger-file.repository';
import { ValidationError } from '../common/errors';
import { ClientRecord } from '../common/interfaces/models';
import { IClientRegistryRepository } from '../common/interfaces/repositories';
import { LedgerService } from '../ledger';
import { CompanyMatcherService } from '../matching';
import { normalizeCompanyName } from '../normalization';
import { AliasTableDefinition, TechnicianResolverService } from '../technicians';
import { TechnicianReportService } from './technician-report.service';

const logger = winston.createLogger({ silent: true });

const aliasTable: AliasTableDefinition = {
    technicians: [
        { canonical: 'John Smith', variants: ['J. Smith'] },
        { canonical: 'Maria Costa', variants: [] },
    ],
    specialCase: { canonical: 'Carlos Mendes', variants: ['C. Mendes'] },
};

const clients: ClientRecord[] = [
    { name: 'ACME, Lda.', primaryTechnician: 'J. Smith', taxId: '500000001' },
    { name: 'Beta Unipessoal Lda', primaryTechnician: null },
    { name: 'Initech', primaryTechnician: 'Maria Costa' },
];

class InMemoryClientRegistry implements IClientRegistryRepository {
    findAll(): ClientRecord[] {
        return [...clients];
    }
}

function sheetRows(buffer: Buffer, sheetName: string): unknown[][] {
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const sheet = workbook.Sheets[sheetName];
    return sheet ? XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 }) : [];
}

describe('TechnicianReportService', () => {
    let dir: string;
    let ledger: LedgerService;
    let service: TechnicianReportService;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'report-test-'));
        const repository = new LedgerFileRepository(logger, {
            ledgerFile: path.join(dir, 'ledger.json'),
            importReportFile: path.join(dir, 'import-report.json'),
            clientRegistryFile: path.join(dir, 'clients.json'),
        });
        const resolver = new TechnicianResolverService(logger, aliasTable);
        ledger = new LedgerService(logger, repository, resolver);
        ledger.load();

        const acme = { companyKey: normalizeCompanyName('Acme Lda'), companyName: 'Acme Lda' };
        ledger.applyImport('2025', 1, [
            { ...acme, technician: 'John Smith', minutes: 120 },
            { companyKey: 'beta', companyName: 'Beta', technician: null, minutes: 60 },
        ]);
        ledger.applyImport('2025', 2, [{ ...acme, technician: 'John Smith', minutes: 240 }]);

        service = new TechnicianReportService(logger, ledger, new CompanyMatcherService(logger), resolver, new InMemoryClientRegistry());
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('lists every registry client with its match and monthly average', () => {
        const report = service.buildReport('2025');
        expect(report.averageMonths).toBe(2);

        expect(report.rows.map(row => [row.company, row.primaryTechnician, row.matchTier, row.matchedKey])).toEqual([
            ['ACME, Lda.', 'John Smith', 'exact', 'Acme Lda'],
            ['Initech', 'Maria Costa', 'none', null],
            ['Beta Unipessoal Lda', 'Unassigned', 'tokenInclusion', 'Beta'],
        ]);
        expect(report.rows[0]).toMatchObject({ taxId: '500000001', averageMinutes: 180, averageFormatted: '3h00m', noTechnician: false, noTimings: false });
        expect(report.rows[2]).toMatchObject({ taxId: null, averageMinutes: 30, averageFormatted: '0h30m', noTechnician: true, noTimings: false });
    });

    it('flags unmatched clients and suggests the closest ledger names', () => {
        const initech = service.buildReport('2025').rows[1];

        expect(initech?.averageMinutes).toBeNull();
        expect(initech?.noTimings).toBe(true);
        expect(initech?.suggestions.map(candidate => candidate.name).sort()).toEqual(['Acme Lda', 'Beta']);
    });

    it('counts matches and flags', () => {
        const report = service.buildReport('2025');
        expect(report.matchedCount).toBe(2);
        expect(report.noTechnicianCount).toBe(1);
        expect(report.noTimingsCount).toBe(1);
    });

    it('averages over the months of the year that hold minutes', () => {
        ledger.applyImport('2025', 4, [{ companyKey: 'beta', companyName: 'Beta', technician: null, minutes: 90 }]);
        const report = service.buildReport('2025');

        expect(report.averageMonths).toBe(3);
        expect(report.rows[0]?.averageMinutes).toBe(120);
        expect(report.rows[2]?.averageMinutes).toBe(50);
        expect(report.technicianTotals[0]?.averageMinutes).toBe(120);
    });

    it('totals the breakdown minutes per technician', () => {
        expect(service.buildReport('2025').technicianTotals).toEqual([
            { technician: 'John Smith', totalMinutes: 360, averageMinutes: 180, averageFormatted: '3h00m' },
        ]);
    });

    it('filters by any spelling of a technician', () => {
        const report = service.buildReport('2025', 'J. Smith');
        expect(report.technician).toBe('John Smith');
        expect(report.rows.map(row => row.company)).toEqual(['ACME, Lda.']);

        const empty = service.buildReport('2025', 'Maria Costa');
        expect(empty.rows.map(row => row.company)).toEqual(['Initech']);
        expect(empty.technicianTotals).toEqual([]);
    });

    it('ignores soft-deleted ledger records', () => {
        ledger.softDelete('2025', 'Beta');
        const beta = service.buildReport('2025').rows[2];
        expect(beta?.matchTier).toBe('none');
        expect(beta?.noTimings).toBe(true);
    });

    it('rejects a malformed year', () => {
        expect(() => service.buildReport('next year')).toThrow(ValidationError);
    });

    it('exports the clients and technician totals to a workbook', async () => {
        const buffer = await service.exportReport(service.buildReport('2025'));

        const clientRows = sheetRows(buffer, 'Clients');
        expect(clientRows[0]?.slice(0, 3)).toEqual(['Company', 'Tax ID', 'Technician']);
        expect(clientRows[1]?.slice(0, 7)).toEqual(['ACME, Lda.', '500000001', 'John Smith', 'Exact', 'Acme Lda', 180, '3h00m']);
        expect(clientRows).toHaveLength(4);

        expect(sheetRows(buffer, 'Technicians')[1]).toEqual(['John Smith', 360, '6h00m', '3h00m']);
    });
});
