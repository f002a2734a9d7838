// src/core/common/interfaces/models.ts

// --- Calendar ---

export type Month = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export const MONTHS: readonly Month[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];

/** Minutes keyed by month number. Months without time are absent, never zero. */
export type MonthlyMinutes = Partial<Record<Month, number>>;

// --- Ledger ---

/**
 * One company's time data for one year. The key it is stored under in the
 * year slice is the company's first-seen display name.
 */
export interface TimeRecord {
    /** Minutes logged directly against the company, per month */
    monthlyMinutes: MonthlyMinutes;
    /** Recurring addend applied to every month (retainer work not tied to a week) */
    extraMonthlyMinutes: number;
    /** Canonical technician -> monthly minutes. Attribution only, may sum below the month total */
    perTechnicianMonthlyMinutes: Record<string, MonthlyMinutes>;
    /** Soft-delete flag; deleted records stay for audit and are hidden from reports */
    deleted: boolean;
}

/** Company display name -> record, for one year */
export type LedgerYear = Record<string, TimeRecord>;

/** Year (string of digits) -> companies */
export type Ledger = Record<string, LedgerYear>;

// --- Technicians ---

export type TechnicianClassification =
    | { readonly kind: 'canonical'; readonly technician: string }
    | { readonly kind: 'specialCase'; readonly rawName: string }
    | { readonly kind: 'unknown'; readonly rawName: string };

/** How a spreadsheet fact attributes its minutes. `summary` rows carry no technician. */
export type FactAttribution = TechnicianClassification | { readonly kind: 'summary' };

/** Attributions that may reach the ledger */
export type ApplicableAttribution = Exclude<FactAttribution, { kind: 'unknown' }>;

// --- Client registry ---

/** Read-only view of a client-registry entry */
export interface ClientRecord {
    readonly name: string;
    readonly primaryTechnician?: string | null;
    readonly taxId?: string | null;
}

// --- Spreadsheet import ---

export type SheetLayout = 'tabular' | 'workload';

export interface FactSource {
    readonly fileName: string;
    readonly sheetName: string;
    /** 1-based row number inside the sheet */
    readonly row: number;
}

/** One `(company, technician-or-blank, minutes)` observation read from a sheet */
export interface RawTimeFact {
    readonly company: string;
    readonly attribution: FactAttribution;
    readonly minutes: number;
    readonly source: FactSource;
}

/** Summary minutes dropped because the same block/company had per-technician rows */
export interface IgnoredSummary {
    readonly company: string;
    readonly minutes: number;
    readonly source: FactSource;
}

export interface ParsedSheet {
    readonly sheetName: string;
    readonly layout: SheetLayout;
    readonly facts: RawTimeFact[];
    readonly ignoredSummaries: IgnoredSummary[];
}

export interface ParsedWorkbook {
    readonly fileName: string;
    readonly sheets: ParsedSheet[];
}

/** A deduplicated fact ready to be resolved against the client registry */
export interface BatchFact {
    readonly companyKey: string;
    /** First-seen spelling of the company inside the batch */
    readonly companyName: string;
    readonly attribution: ApplicableAttribution;
    readonly minutes: number;
}

/** Per-company / per-name minute tallies reported after an import */
export type MinutesByName = Record<string, number>;

export interface FailedFile {
    readonly fileName: string;
    readonly message: string;
}

export interface ImportDiagnostics {
    /** Raw technician spelling -> minutes that could not be attributed */
    unknownTechnicianMinutes: MinutesByName;
    /** Company -> minutes left out of the ledger (unknown technicians plus ignored summaries) */
    ignoredMinutesByCompany: MinutesByName;
    /** Company -> summary-row minutes dropped in favour of per-technician rows */
    ignoredSummaryMinutesByCompany: MinutesByName;
    /** Company -> minutes of exact duplicates suppressed inside the batch */
    duplicateMinutesByCompany: MinutesByName;
    duplicateCount: number;
    totalDuplicateMinutes: number;
    /** Company -> special-case minutes whose technician could not be inferred */
    uninferredSpecialCaseMinutes: MinutesByName;
    /** Facts dropped because the company name normalised to nothing */
    blankCompanyFacts: number;
    failedFiles: FailedFile[];
}

export interface ImportBatch {
    readonly id: string;
    readonly year: string;
    readonly month: Month;
    readonly files: string[];
    readonly facts: BatchFact[];
    readonly diagnostics: ImportDiagnostics;
}

/** A fact in the form the ledger applies it */
export interface LedgerFact {
    readonly companyKey: string;
    readonly companyName: string;
    /** Canonical technician, or null when the minutes carry no attribution */
    readonly technician: string | null;
    readonly minutes: number;
}

/** Written to the import report file after every import that reported something */
export interface ImportReport extends ImportDiagnostics {
    batchId: string;
    createdAt: string;
    year: string;
    month: Month;
    files: string[];
}
