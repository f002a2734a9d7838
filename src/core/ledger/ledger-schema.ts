// src/core/ledger/ledger-schema.ts
//
// On-disk shapes the ledger has had, newest first:
//
//   current:    { "2025": { "Acme": { monthlyMinutes: { "1": 120 }, extraMonthlyMinutes: 15,
//                                      perTechnicianMonthlyMinutes: { ... }, deleted: false } } }
//   flat hours: { "2025": { "Acme": { "1": 1.5, "2": 0.75, extra: 12 } } }        (extra is annual)
//   sectioned:  { minutes: { "2025": { companies: { "Acme": { "1": 1.5 } } } },
//                 extra:   { "2025": { companies: { "Acme": 12 } } } }          (extra is annual)
//
// Legacy values go through the import duration rule, so decimal hours become minutes.

import { Ledger, LedgerYear, MONTHS, MonthlyMinutes, TimeRecord } from '../common/interfaces/models';
import { isPlainObject, parseMonth } from '../common/utils';
import { parseDurationToMinutes } from '../normalization';

export type TechnicianCanonicalizer = (rawName: string) => string;

export interface LedgerReadOutcome {
    readonly ledger: Ledger;
    /** True when a legacy shape was converted or technician keys were rewritten */
    readonly migrated: boolean;
}

const YEAR_KEY_PATTERN = /^\d+$/;

export function emptyTimeRecord(): TimeRecord {
    return { monthlyMinutes: {}, extraMonthlyMinutes: 0, perTechnicianMonthlyMinutes: {}, deleted: false };
}

function toMinutes(value: unknown): number {
    return parseDurationToMinutes(value);
}

/** Annual legacy extras become a monthly addend */
function annualToMonthly(value: unknown): number {
    const annual = toMinutes(value);
    return annual > 0 ? Math.round(annual / 12) : 0;
}

/** Month-keyed values to positive integer minutes; zero months and foreign keys are dropped. */
function readMonths(raw: unknown): MonthlyMinutes {
    const months: MonthlyMinutes = {};
    if (!isPlainObject(raw)) return months;
    for (const [key, value] of Object.entries(raw)) {
        const month = parseMonth(key);
        if (month === null) continue;
        const minutes = toMinutes(value);
        if (minutes > 0) {
            months[month] = (months[month] ?? 0) + minutes;
        }
    }
    return months;
}

function hasMonths(months: MonthlyMinutes): boolean {
    return MONTHS.some(month => months[month] !== undefined);
}

class LedgerReader {
    migrated = false;

    constructor(private readonly canonicalize: TechnicianCanonicalizer) {}

    read(document: unknown): Ledger {
        if (!isPlainObject(document)) return {};
        if ('minutes' in document || 'extra' in document) {
            this.migrated = true;
            return this.readSectioned(document.minutes, document.extra);
        }

        const ledger: Ledger = {};
        for (const [year, companies] of Object.entries(document)) {
            if (!YEAR_KEY_PATTERN.test(year) || !isPlainObject(companies)) continue;
            const slice: LedgerYear = {};
            for (const [company, raw] of Object.entries(companies)) {
                if (!isPlainObject(raw)) continue;
                slice[company] = 'monthlyMinutes' in raw ? this.readCurrentRecord(raw) : this.readFlatHoursRecord(raw);
            }
            ledger[year] = slice;
        }
        return ledger;
    }

    private readCurrentRecord(raw: Record<string, unknown>): TimeRecord {
        let extraMonthlyMinutes = 0;
        if (raw.extraMonthlyMinutes !== undefined && raw.extraMonthlyMinutes !== null) {
            extraMonthlyMinutes = toMinutes(raw.extraMonthlyMinutes);
        } else if (raw.extra !== undefined && raw.extra !== null) {
            extraMonthlyMinutes = annualToMonthly(raw.extra);
            this.migrated = true;
        }
        return {
            monthlyMinutes: readMonths(raw.monthlyMinutes),
            extraMonthlyMinutes,
            perTechnicianMonthlyMinutes: this.readTechnicians(raw.perTechnicianMonthlyMinutes),
            deleted: raw.deleted === true,
        };
    }

    private readFlatHoursRecord(raw: Record<string, unknown>): TimeRecord {
        this.migrated = true;
        return {
            ...emptyTimeRecord(),
            monthlyMinutes: readMonths(raw),
            extraMonthlyMinutes: annualToMonthly(raw.extra),
            deleted: raw.deleted === true,
        };
    }

    private readSectioned(minutesSection: unknown, extraSection: unknown): Ledger {
        const ledger: Ledger = {};
        const companiesOf = (section: unknown, year: string): Record<string, unknown> => {
            if (!isPlainObject(section)) return {};
            const yearEntry = section[year];
            return isPlainObject(yearEntry) && isPlainObject(yearEntry.companies) ? yearEntry.companies : {};
        };
        const years = new Set<string>([
            ...(isPlainObject(minutesSection) ? Object.keys(minutesSection) : []),
            ...(isPlainObject(extraSection) ? Object.keys(extraSection) : []),
        ]);

        for (const year of years) {
            if (!YEAR_KEY_PATTERN.test(year)) continue;
            const slice: LedgerYear = {};
            for (const [company, months] of Object.entries(companiesOf(minutesSection, year))) {
                slice[company] = { ...emptyTimeRecord(), monthlyMinutes: readMonths(months) };
            }
            for (const [company, annual] of Object.entries(companiesOf(extraSection, year))) {
                const extraMonthlyMinutes = annualToMonthly(annual);
                const record = slice[company];
                if (record) {
                    record.extraMonthlyMinutes = extraMonthlyMinutes;
                } else if (extraMonthlyMinutes > 0) {
                    slice[company] = { ...emptyTimeRecord(), extraMonthlyMinutes };
                }
            }
            ledger[year] = slice;
        }
        return ledger;
    }

    /** Collapses historical spellings into canonical names, summing on collision. */
    private readTechnicians(raw: unknown): Record<string, MonthlyMinutes> {
        const result: Record<string, MonthlyMinutes> = {};
        if (!isPlainObject(raw)) return result;

        for (const [name, rawMonths] of Object.entries(raw)) {
            const months = readMonths(rawMonths);
            if (!hasMonths(months)) continue;

            const canonical = this.canonicalize(name);
            if (canonical !== name) this.migrated = true;

            const target = result[canonical] ?? {};
            for (const month of MONTHS) {
                const minutes = months[month];
                if (minutes !== undefined) {
                    target[month] = (target[month] ?? 0) + minutes;
                }
            }
            result[canonical] = target;
        }
        return result;
    }
}

/**
 * Interprets a persisted document of any known shape as a normalised ledger:
 * integer non-negative minutes, no zero months, defaulted flags, canonical
 * technician keys. Unknown shapes read as an empty ledger. Idempotent on
 * its own output.
 */
export function readLedgerDocument(document: unknown, canonicalize: TechnicianCanonicalizer): LedgerReadOutcome {
    const reader = new LedgerReader(canonicalize);
    const ledger = reader.read(document);
    return { ledger, migrated: reader.migrated };
}

export function recordMonthSum(record: TimeRecord): number {
    return MONTHS.reduce((sum, month) => sum + (record.monthlyMinutes[month] ?? 0), 0);
}

/** Minutes a record represents over the year: its months plus twelve extras. */
export function recordTotalMinutes(record: TimeRecord): number {
    return recordMonthSum(record) + record.extraMonthlyMinutes * 12;
}

/** Volume compared by the mass-drop guard. Deleted records still count. */
export function totalLedgerMinutes(ledger: Ledger): number {
    let total = 0;
    for (const slice of Object.values(ledger)) {
        for (const record of Object.values(slice)) {
            total += recordTotalMinutes(record);
        }
    }
    return total;
}
