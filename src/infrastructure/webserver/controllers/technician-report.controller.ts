// src/infrastructure/webserver/controllers/technician-report.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { ITechnicianReportService, TechnicianReportService } from '../../../core/reporting';
import { LOGGER_TOKEN } from '../../logger';
import { queryText } from './request.utils';

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

@singleton()
@injectable()
export class TechnicianReportController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(TechnicianReportService) private reports: ITechnicianReportService
    ) {
        this.logger.info('TechnicianReportController initialized.');
    }

    /** GET /api/reports/technicians?year=&technician= */
    public handleGetReport = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const report = this.reports.buildReport(queryText(req.query.year) ?? String(new Date().getFullYear()), queryText(req.query.technician));
            res.status(200).json(report);
        } catch (error) {
            next(error);
        }
    };

    /** GET /api/reports/technicians/export?year=&technician= */
    public handleExport = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const report = this.reports.buildReport(queryText(req.query.year) ?? String(new Date().getFullYear()), queryText(req.query.technician));
            const buffer = await this.reports.exportReport(report);

            const suffix = report.technician ? `_${report.technician.replace(/[^A-Za-z0-9]+/g, '_')}` : '';
            const fileName = `Technician_Report_${report.year}${suffix}.xlsx`;
            res.setHeader('Content-Type', XLSX_CONTENT_TYPE);
            res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
            res.setHeader('Content-Length', buffer.length);
            res.status(200).send(buffer);
            this.logger.info(`Sent ${fileName} (${buffer.length} bytes).`);
        } catch (error) {
            next(error);
        }
    };
}
