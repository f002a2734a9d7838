// src/infrastructure/webserver/controllers/timesheet.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { NotFoundError, ValidationError } from '../../../core/common/errors';
import {
    CLIENT_REGISTRY_REPOSITORY_TOKEN,
    IClientRegistryRepository,
    IImportReportRepository,
    IMPORT_REPORT_REPOSITORY_TOKEN,
} from '../../../core/common/interfaces/repositories';
import { ITimesheetImportService, TimesheetImportService, UploadedWorkbook } from '../../../core/import';
import { ILedgerService, LedgerService } from '../../../core/ledger';
import { LOGGER_TOKEN } from '../../logger';
import { spreadsheetRejection } from '../middleware/upload.middleware';
import { bodyOf, queryText, requireMinutes, requireText } from './request.utils';

/** Year shown when the request names none */
function currentYear(): string {
    return String(new Date().getFullYear());
}

@singleton()
@injectable()
export class TimesheetController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(LedgerService) private ledger: ILedgerService,
        @inject(TimesheetImportService) private importer: ITimesheetImportService,
        @inject(CLIENT_REGISTRY_REPOSITORY_TOKEN) private clientRegistry: IClientRegistryRepository,
        @inject(IMPORT_REPORT_REPOSITORY_TOKEN) private importReports: IImportReportRepository
    ) {
        this.logger.info('TimesheetController initialized.');
    }

    /** GET /api/timesheets?year=&months=&company=&technician= */
    public handleGetYearView = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const year = queryText(req.query.year) ?? currentYear();
            const months = queryText(req.query.months);
            const technician = queryText(req.query.technician);
            res.status(200).json(this.ledger.getYearView(year, {
                months: months === undefined ? undefined : Number(months),
                company: queryText(req.query.company),
                technician,
                clients: technician ? this.clientRegistry.findAll() : undefined,
            }));
        } catch (error) {
            next(error);
        }
    };

    /** GET /api/timesheets/years */
    public handleListYears = (req: Request, res: Response, next: NextFunction): void => {
        try {
            res.status(200).json({ years: this.ledger.listYears() });
        } catch (error) {
            next(error);
        }
    };

    /**
     * POST /api/timesheets/import
     * Multipart upload of `files` with `year` and `month` fields. Answers with a
     * redirect to the refreshed year view; diagnostics go to the import report.
     */
    public handleImport = (req: Request, res: Response, next: NextFunction): void => {
        this.logger.info('Received timesheet import request.');
        try {
            const files = Array.isArray(req.files) ? req.files : [];
            if (files.length === 0) {
                throw new ValidationError('At least one timesheet file ("files") is required.');
            }
            files.forEach((file, i) => this.logger.debug(`File ${i + 1}: ${file.originalname} (${(file.size / 1024).toFixed(2)} KB)`));

            const body = bodyOf(req.body);
            const uploads: UploadedWorkbook[] = files.map(file => {
                const rejection = spreadsheetRejection(file);
                return rejection
                    ? { fileName: file.originalname, buffer: file.buffer, rejection }
                    : { fileName: file.originalname, buffer: file.buffer };
            });
            const summary = this.importer.importWorkbooks(body.year, body.month, uploads);

            this.logger.info(`Import ${summary.batchId} done: ${summary.companiesTouched.length} company(ies), ${summary.minutesApplied} min, ${summary.diagnostics.failedFiles.length} failed file(s).`);
            res.redirect(303, `/api/timesheets?year=${encodeURIComponent(summary.year)}`);
        } catch (error) {
            next(error);
        }
    };

    /** GET /api/timesheets/import-report */
    public handleGetImportReport = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const report = this.importReports.findLatest();
            if (!report) throw new NotFoundError('No import report is available yet.');
            res.status(200).json(report);
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/timesheets/average `{ year, company, minutes }` */
    public handleSetAverage = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const body = bodyOf(req.body);
            const year = requireText(body, 'year');
            const minutes = requireMinutes(body, 'minutes');
            const company = this.ledger.setAverageMinutes(year, requireText(body, 'company'), minutes);
            res.status(200).json({ year, company, minutes });
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/timesheets/extra `{ year, company, minutes }` */
    public handleSetExtra = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const body = bodyOf(req.body);
            const year = requireText(body, 'year');
            const minutes = requireMinutes(body, 'minutes');
            const company = this.ledger.setExtraMinutes(year, requireText(body, 'company'), minutes);
            res.status(200).json({ year, company, extraMonthlyMinutes: minutes });
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/timesheets/delete `{ year, company }` */
    public handleSoftDelete = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const body = bodyOf(req.body);
            const year = requireText(body, 'year');
            const company = this.ledger.softDelete(year, requireText(body, 'company'));
            res.status(200).json({ year, company, deleted: true });
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/timesheets/sync-clients `{ year }` */
    public handleSyncClients = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const year = requireText(bodyOf(req.body), 'year');
            const added = this.ledger.syncClients(year, this.clientRegistry.findAll());
            res.status(200).json({ year, added });
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/timesheets/migrate */
    public handleMigrate = (req: Request, res: Response, next: NextFunction): void => {
        try {
            res.status(200).json(this.ledger.migrateFromDisk());
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/timesheets/clear `{ confirm: "CLEAR" }` */
    public handleClear = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const confirm = bodyOf(req.body).confirm;
            this.ledger.clear(typeof confirm === 'string' ? confirm : '');
            res.status(200).json({ message: 'Ledger cleared.' });
        } catch (error) {
            next(error);
        }
    };
}
