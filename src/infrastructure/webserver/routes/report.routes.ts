// src/infrastructure/webserver/routes/report.routes.ts
import { Router } from 'express';
import { container } from 'tsyringe';
import { TechnicianReportController } from '../controllers/technician-report.controller';

export function createReportRouter(): Router {
    const router = Router();
    const controller = container.resolve(TechnicianReportController);

    // GET /api/reports/technicians?year=&technician=
    router.get('/technicians', controller.handleGetReport);
    // GET /api/reports/technicians/export - Same report as an xlsx download
    router.get('/technicians/export', controller.handleExport);

    return router;
}
