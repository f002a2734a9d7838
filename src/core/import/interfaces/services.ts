// src/core/import/interfaces/services.ts
import { FailedFile, ImportBatch, ImportDiagnostics, Month, ParsedWorkbook } from '../../common/interfaces/models';

export interface BatchInput {
    readonly year: string;
    readonly month: Month;
    /** Every uploaded file name, including the ones that failed */
    readonly files: readonly string[];
    readonly workbooks: readonly ParsedWorkbook[];
    readonly failedFiles: readonly FailedFile[];
}

/** Defines the contract for collapsing one upload into a deduplicated batch */
export interface IImportDeduplicatorService {
    /**
     * Deduplicates facts across every sheet and file of one (year, month)
     * upload. Unknown-technician facts end up in the diagnostics only.
     */
    buildBatch(input: BatchInput): ImportBatch;
}

/** One uploaded workbook as it reaches the import service */
export interface UploadedWorkbook {
    readonly fileName: string;
    readonly buffer: Buffer;
    /** Set when the upload layer refused the file; it is then reported as failed without parsing */
    readonly rejection?: string;
}

export interface ImportSummary {
    readonly batchId: string;
    readonly year: string;
    readonly month: Month;
    readonly files: string[];
    /** Ledger keys that received this month's minutes */
    readonly companiesTouched: string[];
    readonly minutesApplied: number;
    readonly diagnostics: ImportDiagnostics;
    /** True when a diagnostics report file was written */
    readonly reportWritten: boolean;
}

/** Defines the contract for the upload orchestration */
export interface ITimesheetImportService {
    /**
     * Parses, deduplicates and applies uploaded workbooks to one month.
     * @throws {ValidationError} For a bad year, month or an empty upload.
     * @throws {LedgerWriteRejectedError} If persisting would trip the drop guard.
     */
    importWorkbooks(year: unknown, month: unknown, uploads: readonly UploadedWorkbook[]): ImportSummary;
}
