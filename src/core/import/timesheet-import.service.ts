// src/core/import/timesheet-import.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ValidationError } from '../common/errors';
import { FailedFile, ImportBatch, ImportDiagnostics, LedgerFact, ParsedWorkbook } from '../common/interfaces/models';
import {
    CLIENT_REGISTRY_REPOSITORY_TOKEN,
    IClientRegistryRepository,
    IImportReportRepository,
    IMPORT_REPORT_REPOSITORY_TOKEN,
} from '../common/interfaces/repositories';
import { addMinutes, parseMonth, parseYear } from '../common/utils';
import { ILedgerService, LedgerService } from '../ledger';
import { ITimesheetParserService, TimesheetParserService } from '../parsing';
import { ClientRegistryIndex, ITechnicianResolverService, TechnicianResolverService, buildClientRegistryIndex } from '../technicians';
import { ImportDeduplicatorService } from './import-deduplicator.service';
import {
    IImportDeduplicatorService,
    ITimesheetImportService,
    ImportSummary,
    UploadedWorkbook,
} from './interfaces/services';

function hasFindings(diagnostics: ImportDiagnostics): boolean {
    return diagnostics.failedFiles.length > 0
        || diagnostics.duplicateCount > 0
        || diagnostics.blankCompanyFacts > 0
        || [
            diagnostics.unknownTechnicianMinutes,
            diagnostics.ignoredMinutesByCompany,
            diagnostics.ignoredSummaryMinutesByCompany,
            diagnostics.uninferredSpecialCaseMinutes,
        ].some(tally => Object.keys(tally).length > 0);
}

@singleton()
@injectable()
export class TimesheetImportService implements ITimesheetImportService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(TimesheetParserService) private parser: ITimesheetParserService,
        @inject(ImportDeduplicatorService) private deduplicator: IImportDeduplicatorService,
        @inject(TechnicianResolverService) private technicianResolver: ITechnicianResolverService,
        @inject(LedgerService) private ledger: ILedgerService,
        @inject(CLIENT_REGISTRY_REPOSITORY_TOKEN) private clientRegistry: IClientRegistryRepository,
        @inject(IMPORT_REPORT_REPOSITORY_TOKEN) private importReports: IImportReportRepository
    ) {
        this.logger.info('TimesheetImportService initialized.');
    }

    importWorkbooks(year: unknown, month: unknown, uploads: readonly UploadedWorkbook[]): ImportSummary {
        const targetYear = parseYear(year);
        if (!targetYear) throw new ValidationError(`Invalid year: "${String(year)}". Expected four digits.`);
        const targetMonth = parseMonth(month);
        if (!targetMonth) throw new ValidationError(`Invalid month: "${String(month)}". Expected 1 to 12.`);
        if (uploads.length === 0) throw new ValidationError('No timesheet files were uploaded.');

        this.logger.info(`Importing ${uploads.length} file(s) into ${targetYear}-${targetMonth}.`);

        // A broken workbook is reported; the rest of the upload still goes in
        const workbooks: ParsedWorkbook[] = [];
        const failedFiles: FailedFile[] = [];
        for (const upload of uploads) {
            if (upload.rejection) {
                this.logger.warn(`Skipping "${upload.fileName}": ${upload.rejection}`);
                failedFiles.push({ fileName: upload.fileName, message: upload.rejection });
                continue;
            }
            try {
                workbooks.push(this.parser.parseWorkbook(upload.buffer, upload.fileName));
            } catch (error: unknown) {
                const message = error instanceof Error ? error.message : String(error);
                this.logger.warn(`Skipping "${upload.fileName}": ${message}`);
                failedFiles.push({ fileName: upload.fileName, message });
            }
        }

        const batch = this.deduplicator.buildBatch({
            year: targetYear,
            month: targetMonth,
            files: uploads.map(upload => upload.fileName),
            workbooks,
            failedFiles,
        });

        const facts = this.toLedgerFacts(batch, buildClientRegistryIndex(this.clientRegistry.findAll()));
        const applied = this.ledger.applyImport(targetYear, targetMonth, facts);

        const reportWritten = hasFindings(batch.diagnostics);
        if (reportWritten) {
            this.importReports.save({
                batchId: batch.id,
                createdAt: new Date().toISOString(),
                year: batch.year,
                month: batch.month,
                files: batch.files,
                ...batch.diagnostics,
            });
        }

        this.logger.info(`Import ${batch.id} applied ${applied.minutesApplied} min to ${applied.companiesTouched.length} company(ies).`);
        return {
            batchId: batch.id,
            year: batch.year,
            month: batch.month,
            files: batch.files,
            companiesTouched: applied.companiesTouched,
            minutesApplied: applied.minutesApplied,
            diagnostics: batch.diagnostics,
            reportWritten,
        };
    }

    /**
     * Special-case minutes go to the company's registered primary technician.
     * When the registry cannot tell, they still count towards the company
     * but carry no technician and are reported.
     */
    private toLedgerFacts(batch: ImportBatch, registry: ClientRegistryIndex): LedgerFact[] {
        return batch.facts.map(fact => {
            const base = { companyKey: fact.companyKey, companyName: fact.companyName, minutes: fact.minutes };
            switch (fact.attribution.kind) {
                case 'canonical':
                    return { ...base, technician: fact.attribution.technician };
                case 'summary':
                    return { ...base, technician: null };
                case 'specialCase': {
                    const inferred = this.technicianResolver.inferPrimaryTechnician(fact.companyKey, registry);
                    if (!inferred) {
                        addMinutes(batch.diagnostics.uninferredSpecialCaseMinutes, fact.companyName, fact.minutes);
                    }
                    return { ...base, technician: inferred };
                }
            }
        });
    }
}
