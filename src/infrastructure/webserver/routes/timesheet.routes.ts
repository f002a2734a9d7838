// src/infrastructure/webserver/routes/timesheet.routes.ts
import { Router } from 'express';
import { container } from 'tsyringe';
import { TimesheetController } from '../controllers/timesheet.controller';
import { uploadTimesheetFiles } from '../middleware/upload.middleware';

/** Builds the router; called once the container is populated. */
export function createTimesheetRouter(): Router {
    const router = Router();
    const controller = container.resolve(TimesheetController);

    // GET /api/timesheets?year= - Year view of the ledger
    router.get('/', controller.handleGetYearView);
    router.get('/years', controller.handleListYears);

    // POST /api/timesheets/import - Upload workbooks for one (year, month)
    router.post('/import', uploadTimesheetFiles, controller.handleImport);
    router.get('/import-report', controller.handleGetImportReport);

    // Manual edits
    router.post('/average', controller.handleSetAverage);
    router.post('/extra', controller.handleSetExtra);
    router.post('/delete', controller.handleSoftDelete);
    router.post('/sync-clients', controller.handleSyncClients);

    // Maintenance
    router.post('/migrate', controller.handleMigrate);
    router.post('/clear', controller.handleClear);

    return router;
}
