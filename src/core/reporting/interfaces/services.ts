// src/core/reporting/interfaces/services.ts
import { CompanyMatch, MatchCandidate, MatchTier } from '../../matching';

/** One client-registry company and what the ledger knows about it */
export interface TechnicianReportRow {
    readonly company: string;
    readonly taxId: string | null;
    /** Canonical primary technician, "Unassigned" when the registry names none */
    readonly primaryTechnician: string;
    readonly matchTier: MatchTier;
    readonly matchedKey: CompanyMatch['matchedKey'];
    /** Monthly average of the matched ledger record over the report's months, null when unmatched */
    readonly averageMinutes: number | null;
    readonly averageFormatted: string | null;
    readonly noTechnician: boolean;
    /** Unmatched, or matched to a record without any time */
    readonly noTimings: boolean;
    /** Closest ledger names when nothing matched */
    readonly suggestions: MatchCandidate[];
}

/** Minutes attributed to one technician in the year's breakdowns */
export interface TechnicianTotal {
    readonly technician: string;
    readonly totalMinutes: number;
    readonly averageMinutes: number;
    readonly averageFormatted: string;
}

export interface TechnicianReport {
    readonly year: string;
    /** Canonical technician the report was filtered on, if any */
    readonly technician: string | null;
    /** Divisor of every average in the report */
    readonly averageMonths: number;
    readonly rows: TechnicianReportRow[];
    readonly technicianTotals: TechnicianTotal[];
    readonly matchedCount: number;
    readonly noTechnicianCount: number;
    readonly noTimingsCount: number;
}

/** Defines the contract for the client/technician relation report */
export interface ITechnicianReportService {
    /**
     * Matches every client-registry company against the ledger year.
     * @param technician - Optional filter; any known spelling of the technician.
     * @throws {ValidationError} For a year that is not four digits.
     */
    buildReport(year: unknown, technician?: string | null): TechnicianReport;

    /**
     * Renders the report as an xlsx workbook.
     * @returns A promise resolving to the workbook bytes.
     */
    exportReport(report: TechnicianReport): Promise<Buffer>;
}
