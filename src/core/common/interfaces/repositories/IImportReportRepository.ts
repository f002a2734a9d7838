// src/core/common/interfaces/repositories/IImportReportRepository.ts

import { ImportReport } from '../models';

/** Stores the diagnostics of the most recent import for manual follow-up */
export interface IImportReportRepository {
    /**
     * Overwrites the stored report.
     * @throws {PersistenceError} If the report cannot be written.
     */
    save(report: ImportReport): void;

    /** The last saved report, or null when none exists or it cannot be read. */
    findLatest(): ImportReport | null;
}

export const IMPORT_REPORT_REPOSITORY_TOKEN = Symbol.for("IImportReportRepository");
