//src/register.ts

import { container } from "tsyringe";
import config from "./config";
import {
    CLIENT_REGISTRY_REPOSITORY_TOKEN,
    IMPORT_REPORT_REPOSITORY_TOKEN,
    LEDGER_REPOSITORY_TOKEN,
} from "./core/common/interfaces/repositories";
import { ImportDeduplicatorService, TimesheetImportService } from "./core/import";
import { LedgerService } from "./core/ledger";
import { CompanyMatcherService } from "./core/matching";
import { TimesheetParserService } from "./core/parsing";
import { TechnicianReportService } from "./core/reporting";
import { ALIAS_TABLE_TOKEN, TechnicianResolverService, loadAliasTable } from "./core/technicians";
import loggerInstance, { LOGGER_TOKEN } from "./infrastructure/logger";
import { ClientRegistryFileRepository } from "./infrastructure/persistence/repositories/client-registry-file.repository";
import { ImportReportFileRepository } from "./infrastructure/persistence/repositories/import-report-file.repository";
import { LedgerFileRepository } from "./infrastructure/persistence/repositories/ledger-file.repository";
import { STORAGE_CONFIG_TOKEN } from "./infrastructure/persistence/tokens";
import { TechnicianReportController } from "./infrastructure/webserver/controllers/technician-report.controller";
import { TimesheetController } from "./infrastructure/webserver/controllers/timesheet.controller";

/**
 * Populates the container. Throws ConfigurationError when the technician
 * alias table cannot be loaded.
 */
export function registerDependencies(): void {
    loggerInstance.debug("--- Starting Dependency Registration ---");

    // IMPORTANT: Register Logger FIRST
    container.register(LOGGER_TOKEN, { useValue: loggerInstance });

    // Configuration values
    container.register(STORAGE_CONFIG_TOKEN, { useValue: config.storage });
    container.register(ALIAS_TABLE_TOKEN, { useValue: loadAliasTable(config.timesheets.technicianAliasesFile) });

    // Infrastructure Repositories
    container.registerSingleton(LEDGER_REPOSITORY_TOKEN, LedgerFileRepository);
    container.registerSingleton(CLIENT_REGISTRY_REPOSITORY_TOKEN, ClientRegistryFileRepository);
    container.registerSingleton(IMPORT_REPORT_REPOSITORY_TOKEN, ImportReportFileRepository);

    // Core Services
    container.registerSingleton(TechnicianResolverService);
    container.registerSingleton(TimesheetParserService);
    container.registerSingleton(ImportDeduplicatorService);
    container.registerSingleton(LedgerService);
    container.registerSingleton(CompanyMatcherService);
    container.registerSingleton(TimesheetImportService);
    container.registerSingleton(TechnicianReportService);

    // Controllers
    container.registerSingleton(TimesheetController);
    container.registerSingleton(TechnicianReportController);

    loggerInstance.debug("--- Dependency Registration Complete ---");
}
