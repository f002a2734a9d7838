// src/core/ledger/interfaces/services.ts
import { ClientRecord, LedgerFact, LedgerYear, Month } from '../../common/interfaces/models';

export interface LedgerLoadResult {
    readonly years: string[];
    /** True when a legacy shape or stale technician keys were rewritten on load */
    readonly migrated: boolean;
}

export interface ApplyImportResult {
    /** Ledger keys the facts landed on, in batch order */
    readonly companiesTouched: string[];
    readonly minutesApplied: number;
}

export interface MigrationResult {
    readonly years: string[];
    readonly totalMinutes: number;
    readonly backupPath: string | null;
}

export interface YearViewRow {
    readonly company: string;
    /** Twelve entries, January first; each month's minutes plus the recurring extra */
    readonly effectiveMonthlyMinutes: number[];
    readonly baseMinutes: number;
    readonly extraMonthlyMinutes: number;
    /** baseMinutes + 12 × extra */
    readonly totalMinutes: number;
    /** round(totalMinutes / averageMonths) */
    readonly averageMinutes: number;
    readonly averageFormatted: string;
}

export interface YearViewOptions {
    /** Divisor of the averages, 1 to 12. Defaults to the months of the year that hold minutes. */
    readonly months?: number;
    /** Keeps companies whose strong key contains this text's strong key */
    readonly company?: string;
    /** Keeps companies the registry assigns to this technician ("Unassigned" for none) */
    readonly technician?: string;
    /** Registry consulted by the technician filter */
    readonly clients?: readonly ClientRecord[];
}

export interface YearView {
    readonly year: string;
    readonly averageMonths: number;
    readonly rows: YearViewRow[];
    readonly totalMinutes: number;
}

/** Defines the contract for the durable time ledger */
export interface ILedgerService {
    /**
     * Loads the ledger file, migrating legacy shapes. A migration is saved
     * at once; an unreadable file loads as an empty ledger.
     * @throws {LedgerWriteRejectedError} If saving the migration trips the drop guard.
     */
    load(): LedgerLoadResult;

    /**
     * Persists the in-memory ledger.
     * @throws {LedgerWriteRejectedError} If the total volume would fall below the guard ratio.
     */
    save(): void;

    /**
     * Makes `facts` the authoritative minutes for `month` of every company
     * they mention, then persists.
     */
    applyImport(year: string, month: Month, facts: readonly LedgerFact[]): ApplyImportResult;

    /** Sets all twelve months to `minutes`, keeps the extra, clears technician detail. */
    setAverageMinutes(year: string, company: string, minutes: number): string;

    /** Replaces the recurring monthly extra. */
    setExtraMinutes(year: string, company: string, minutes: number): string;

    /** Flags the company as deleted, creating an empty record when absent. */
    softDelete(year: string, company: string): string;

    /**
     * Adds empty placeholder records for registry companies not in the year yet.
     * @returns The names added.
     */
    syncClients(year: string, clients: readonly ClientRecord[]): string[];

    /** Re-reads the file, migrates, backs up and saves. */
    migrateFromDisk(): MigrationResult;

    /**
     * Wipes the ledger past the drop guard.
     * @throws {ValidationError} Unless `confirmation` is exactly "CLEAR".
     */
    clear(confirmation: string): void;

    listYears(): string[];

    /** A copy of one year's records, deleted ones included. */
    getYear(year: string): LedgerYear;

    /**
     * Report rows of one year, deleted records excluded.
     * @throws {ValidationError} If `options.months` is not a whole number from 1 to 12.
     */
    getYearView(year: string, options?: YearViewOptions): YearView;
}
