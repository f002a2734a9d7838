// src/core/reporting/technician-report.service.ts
import ExcelJS, { Row, Workbook } from 'exceljs';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError, ValidationError } from '../common/errors';
import { MONTHS, MinutesByName } from '../common/interfaces/models';
import { CLIENT_REGISTRY_REPOSITORY_TOKEN, IClientRegistryRepository } from '../common/interfaces/repositories';
import { addMinutes, formatMinutes, parseYear } from '../common/utils';
import { ILedgerService, LedgerService } from '../ledger';
import { CompanyMatcherService, ICompanyMatcherService } from '../matching';
import { ITechnicianResolverService, TechnicianResolverService, UNASSIGNED_TECHNICIAN } from '../technicians';
import { ITechnicianReportService, TechnicianReport, TechnicianReportRow, TechnicianTotal } from './interfaces/services';

const MINUTES_FORMAT = '#,##0';
const MATCH_LABELS: Record<TechnicianReportRow['matchTier'], string> = {
    exact: 'Exact',
    tokenInclusion: 'Name contained',
    fuzzy: 'Approximate',
    none: 'Not found',
};

const CLIENT_HEADERS = [
    'Company', 'Tax ID', 'Technician', 'Match', 'Ledger Company',
    'Average (min)', 'Average', 'No Technician', 'No Timings', 'Suggestions',
];
const TECHNICIAN_HEADERS = ['Technician', 'Total (min)', 'Total', 'Monthly Average'];

@singleton()
@injectable()
export class TechnicianReportService implements ITechnicianReportService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(LedgerService) private ledger: ILedgerService,
        @inject(CompanyMatcherService) private matcher: ICompanyMatcherService,
        @inject(TechnicianResolverService) private technicianResolver: ITechnicianResolverService,
        @inject(CLIENT_REGISTRY_REPOSITORY_TOKEN) private clientRegistry: IClientRegistryRepository
    ) {
        this.logger.info('TechnicianReportService initialized.');
    }

    buildReport(year: unknown, technician?: string | null): TechnicianReport {
        const validYear = parseYear(year);
        if (!validYear) throw new ValidationError(`Invalid year: "${String(year)}". Expected four digits.`);
        const filter = technician?.trim() ? this.technicianResolver.canonicalize(technician) : null;

        const slice = this.ledger.getYear(validYear);
        const index = this.matcher.buildIndex(slice);
        const view = this.ledger.getYearView(validYear);
        const averages = new Map(view.rows.map(row => [row.company, row.averageMinutes]));

        const rows: TechnicianReportRow[] = [];
        for (const client of this.clientRegistry.findAll()) {
            const primaryTechnician = this.technicianResolver.canonicalize(client.primaryTechnician);
            if (filter && primaryTechnician !== filter) continue;

            const match = this.matcher.match(client.name, index);
            const averageMinutes = match.matchedKey !== null ? averages.get(match.matchedKey) ?? 0 : null;
            rows.push({
                company: client.name,
                taxId: client.taxId ?? null,
                primaryTechnician,
                matchTier: match.tier,
                matchedKey: match.matchedKey,
                averageMinutes,
                averageFormatted: averageMinutes !== null ? formatMinutes(averageMinutes) : null,
                noTechnician: primaryTechnician === UNASSIGNED_TECHNICIAN,
                noTimings: !averageMinutes,
                suggestions: match.candidates,
            });
        }
        rows.sort((a, b) => a.primaryTechnician.localeCompare(b.primaryTechnician) || a.company.localeCompare(b.company));

        // Breakdown minutes per technician over the live records of the year
        const tally: MinutesByName = {};
        for (const record of Object.values(slice)) {
            if (record.deleted) continue;
            for (const [name, months] of Object.entries(record.perTechnicianMonthlyMinutes)) {
                addMinutes(tally, name, MONTHS.reduce((sum, month) => sum + (months[month] ?? 0), 0));
            }
        }
        const technicianTotals: TechnicianTotal[] = Object.entries(tally)
            .filter(([name, minutes]) => minutes > 0 && (!filter || name === filter))
            .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
            .map(([name, totalMinutes]) => {
                const averageMinutes = Math.round(totalMinutes / view.averageMonths);
                return { technician: name, totalMinutes, averageMinutes, averageFormatted: formatMinutes(averageMinutes) };
            });

        const report: TechnicianReport = {
            year: validYear,
            technician: filter,
            averageMonths: view.averageMonths,
            rows,
            technicianTotals,
            matchedCount: rows.filter(row => row.matchTier !== 'none').length,
            noTechnicianCount: rows.filter(row => row.noTechnician).length,
            noTimingsCount: rows.filter(row => row.noTimings).length,
        };
        this.logger.info(`Technician report ${validYear}${filter ? ` (${filter})` : ''}: ${rows.length} clients, ${report.matchedCount} matched.`);
        return report;
    }

    async exportReport(report: TechnicianReport): Promise<Buffer> {
        this.logger.info(`Generating technician report workbook for ${report.year}...`);
        try {
            const workbook = new ExcelJS.Workbook();
            workbook.created = new Date();
            this.createClientsSheet(workbook, report);
            this.createTechniciansSheet(workbook, report);

            const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
            this.logger.info('Technician report workbook generated.');
            return buffer;
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error('Failed to generate technician report workbook:', { message });
            if (error instanceof AppError) throw error;
            throw new AppError('ReportGenerationError', 'Failed to generate technician report workbook', 500, false);
        }
    }

    private createClientsSheet(workbook: Workbook, report: TechnicianReport): void {
        const sheet = workbook.addWorksheet('Clients');
        this.styleHeaderRow(sheet.addRow(CLIENT_HEADERS), CLIENT_HEADERS.length);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        for (const row of report.rows) {
            const added = sheet.addRow([
                row.company,
                row.taxId ?? '',
                row.primaryTechnician,
                MATCH_LABELS[row.matchTier],
                row.matchedKey ?? '',
                row.averageMinutes ?? '',
                row.averageFormatted ?? '',
                row.noTechnician ? 'Yes' : '',
                row.noTimings ? 'Yes' : '',
                row.suggestions.map(candidate => `${candidate.name} (${candidate.score.toFixed(2)})`).join('; '),
            ]);
            added.getCell(6).numFmt = MINUTES_FORMAT;
        }

        CLIENT_HEADERS.forEach((header, i) => sheet.getColumn(i + 1).width = 18);
        sheet.getColumn(1).width = 40;
        sheet.getColumn(10).width = 50;
    }

    private createTechniciansSheet(workbook: Workbook, report: TechnicianReport): void {
        const sheet = workbook.addWorksheet('Technicians');
        this.styleHeaderRow(sheet.addRow(TECHNICIAN_HEADERS), TECHNICIAN_HEADERS.length);

        for (const total of report.technicianTotals) {
            const added = sheet.addRow([total.technician, total.totalMinutes, formatMinutes(total.totalMinutes), total.averageFormatted]);
            added.getCell(2).numFmt = MINUTES_FORMAT;
        }
        TECHNICIAN_HEADERS.forEach((header, i) => sheet.getColumn(i + 1).width = 20);
    }

    private styleHeaderRow(row: Row, columnCount: number): void {
        for (let i = 1; i <= columnCount; i++) {
            const cell = row.getCell(i);
            cell.font = { bold: true, color: { argb: 'FFFFFFFF' } };
            cell.alignment = { vertical: 'middle', horizontal: 'center', wrapText: true };
            cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF1F4E79' } };
            cell.border = {
                top: { style: 'thin' },
                left: { style: 'thin' },
                bottom: { style: 'thin' },
                right: { style: 'thin' },
            };
        }
    }
}
