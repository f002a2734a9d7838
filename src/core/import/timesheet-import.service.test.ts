// src/core/import/timesheet-import.service.test.ts
import 'reflect-metadata';
import fs from 'fs';
import os from 'os';
import path from 'path';
import winston from 'winston';
import * as XLSX from 'xlsx';

import { LedgerFileRepository } from '../../infrastructure/persistence/repositories/ledger-file.repository';
import { FileParsingError, ValidationError } from '../common/errors';
import { ClientRecord, ImportReport } from '../common/interfaces/models';
import { IClientRegistryRepository, IImportReportRepository } from '../common/interfaces/repositories';
import { LedgerService } from '../ledger';
import { TimesheetParserService } from '../parsing';
import { AliasTableDefinition, TechnicianResolverService } from '../technicians';
import { ImportDeduplicatorService } from './import-deduplicator.service';
import { TimesheetImportService } from './timesheet-import.service';

const logger = winston.createLogger({ silent: true });

const aliasTable: AliasTableDefinition = {
    technicians: [
        { canonical: 'John Smith', variants: ['J. Smith'] },
        { canonical: 'Maria Costa', variants: [] },
    ],
    specialCase: { canonical: 'Carlos Mendes', variants: ['C. Mendes'] },
};

class InMemoryClientRegistry implements IClientRegistryRepository {
    constructor(private readonly clients: ClientRecord[]) {}

    findAll(): ClientRecord[] {
        return [...this.clients];
    }
}

class InMemoryImportReports implements IImportReportRepository {
    readonly saved: ImportReport[] = [];

    save(report: ImportReport): void {
        this.saved.push(report);
    }

    findLatest(): ImportReport | null {
        return this.saved[this.saved.length - 1] ?? null;
    }
}

function buildWorkbook(...sheets: unknown[][][]): Buffer {
    const workbook = XLSX.utils.book_new();
    sheets.forEach((rows, i) => XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), `Sheet${i + 1}`));
    return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

describe('TimesheetImportService', () => {
    let dir: string;
    let parser: TimesheetParserService;
    let ledger: LedgerService;
    let reports: InMemoryImportReports;
    let service: TimesheetImportService;

    const marchRows: unknown[][] = [
        ['Empresa', 'Técnico', 'Tempo'],
        ['Acme Lda', 'J. Smith', 120],
        ['Delta', 'C. Mendes', 60],
        ['Omega', 'C. Mendes', 30],
        ['Gamma', 'Pedro Alves', 45],
    ];

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'import-test-'));
        const repository = new LedgerFileRepository(logger, {
            ledgerFile: path.join(dir, 'ledger.json'),
            importReportFile: path.join(dir, 'import-report.json'),
            clientRegistryFile: path.join(dir, 'clients.json'),
        });
        const resolver = new TechnicianResolverService(logger, aliasTable);
        parser = new TimesheetParserService(logger, resolver);
        ledger = new LedgerService(logger, repository, resolver);
        ledger.load();
        reports = new InMemoryImportReports();
        service = new TimesheetImportService(
            logger,
            parser,
            new ImportDeduplicatorService(logger),
            resolver,
            ledger,
            new InMemoryClientRegistry([{ name: 'Delta, Lda.', primaryTechnician: 'Maria Costa' }]),
            reports
        );
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('applies the month and attributes the special-case identity through the registry', () => {
        const summary = service.importWorkbooks('2025', '3', [{ fileName: 'march.xlsx', buffer: buildWorkbook(marchRows) }]);

        expect(summary.year).toBe('2025');
        expect(summary.month).toBe(3);
        expect(summary.companiesTouched).toEqual(['Acme Lda', 'Delta', 'Omega']);
        expect(summary.minutesApplied).toBe(210);

        const year = ledger.getYear('2025');
        expect(year['Acme Lda']?.perTechnicianMonthlyMinutes).toEqual({ 'John Smith': { 3: 120 } });
        expect(year['Delta']?.perTechnicianMonthlyMinutes).toEqual({ 'Maria Costa': { 3: 60 } });
        expect(year['Omega']?.monthlyMinutes).toEqual({ 3: 30 });
        expect(year['Omega']?.perTechnicianMonthlyMinutes).toEqual({});
        expect(year['Gamma']).toBeUndefined();
    });

    it('reports unknown technicians and uninferred special-case minutes', () => {
        const summary = service.importWorkbooks(2025, 3, [{ fileName: 'march.xlsx', buffer: buildWorkbook(marchRows) }]);

        expect(summary.diagnostics.unknownTechnicianMinutes).toEqual({ 'Pedro Alves': 45 });
        expect(summary.diagnostics.ignoredMinutesByCompany).toEqual({ Gamma: 45 });
        expect(summary.diagnostics.uninferredSpecialCaseMinutes).toEqual({ Omega: 30 });
        expect(summary.reportWritten).toBe(true);

        expect(reports.saved).toHaveLength(1);
        const report = reports.saved[0];
        expect(report?.batchId).toBe(summary.batchId);
        expect(report?.files).toEqual(['march.xlsx']);
        expect(report?.uninferredSpecialCaseMinutes).toEqual({ Omega: 30 });
    });

    it('writes no report for a clean import', () => {
        const rows = [['Empresa', 'Técnico', 'Tempo'], ['Acme Lda', 'J. Smith', 120]];
        const summary = service.importWorkbooks('2025', '4', [{ fileName: 'april.xlsx', buffer: buildWorkbook(rows) }]);

        expect(summary.reportWritten).toBe(false);
        expect(reports.saved).toEqual([]);
        expect(ledger.getYear('2025')['Acme Lda']?.monthlyMinutes).toEqual({ 4: 120 });
    });

    it('leaves the ledger unchanged when the same workbook is imported again', () => {
        const upload = [{ fileName: 'march.xlsx', buffer: buildWorkbook(marchRows) }];
        service.importWorkbooks('2025', '3', upload);
        const first = ledger.getYear('2025');

        const again = service.importWorkbooks('2025', '3', upload);

        expect(again.minutesApplied).toBe(210);
        expect(ledger.getYear('2025')).toEqual(first);
    });

    it('counts a fact repeated on another sheet of the workbook once', () => {
        const first = [['Empresa', 'Técnico', 'Tempo'], ['Acme Lda', 'J. Smith', 120], ['Beta SA', 'Maria Costa', 60]];
        const second = [['Empresa', 'Técnico', 'Tempo'], ['ACME, Lda.', 'J. Smith', 120]];

        const summary = service.importWorkbooks('2025', '3', [{ fileName: 'march.xlsx', buffer: buildWorkbook(first, second) }]);

        expect(summary.diagnostics.duplicateCount).toBe(1);
        expect(summary.diagnostics.totalDuplicateMinutes).toBe(120);
        expect(summary.diagnostics.duplicateMinutesByCompany).toEqual({ 'Acme Lda': 120 });
        expect(summary.companiesTouched).toEqual(['Acme Lda', 'Beta SA']);
        expect(summary.minutesApplied).toBe(180);
        expect(ledger.getYear('2025')['Acme Lda']?.perTechnicianMonthlyMinutes).toEqual({ 'John Smith': { 3: 120 } });
    });

    it('records a file refused on upload as failed and imports the rest', () => {
        const summary = service.importWorkbooks('2025', '3', [
            { fileName: 'notes.txt', buffer: Buffer.from('hello'), rejection: 'Invalid file type: text/plain.' },
            { fileName: 'march.xlsx', buffer: buildWorkbook(marchRows) },
        ]);

        expect(summary.files).toEqual(['notes.txt', 'march.xlsx']);
        expect(summary.diagnostics.failedFiles).toEqual([{ fileName: 'notes.txt', message: 'Invalid file type: text/plain.' }]);
        expect(summary.minutesApplied).toBe(210);
        expect(reports.saved[0]?.failedFiles).toEqual([{ fileName: 'notes.txt', message: 'Invalid file type: text/plain.' }]);
    });

    it('keeps going when one file cannot be parsed', () => {
        const parseWorkbook = parser.parseWorkbook.bind(parser);
        jest.spyOn(parser, 'parseWorkbook').mockImplementation((buffer, fileName) => {
            if (fileName === 'broken.xlsx') throw new FileParsingError('Failed to read workbook "broken.xlsx"');
            return parseWorkbook(buffer, fileName);
        });

        const summary = service.importWorkbooks('2025', '3', [
            { fileName: 'broken.xlsx', buffer: Buffer.from('') },
            { fileName: 'march.xlsx', buffer: buildWorkbook(marchRows) },
        ]);

        expect(summary.files).toEqual(['broken.xlsx', 'march.xlsx']);
        expect(summary.diagnostics.failedFiles).toEqual([
            { fileName: 'broken.xlsx', message: 'Failed to read workbook "broken.xlsx"' },
        ]);
        expect(summary.minutesApplied).toBe(210);
    });

    it('rejects a bad year, a bad month and an empty upload', () => {
        const upload = [{ fileName: 'march.xlsx', buffer: buildWorkbook(marchRows) }];
        expect(() => service.importWorkbooks('25', '3', upload)).toThrow(ValidationError);
        expect(() => service.importWorkbooks('2025', '13', upload)).toThrow(ValidationError);
        expect(() => service.importWorkbooks('2025', '3', [])).toThrow(ValidationError);
        expect(ledger.listYears()).toEqual([]);
    });
});
