// src/core/ledger/ledger.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { LedgerWriteRejectedError, NotFoundError, PersistenceError, ValidationError } from '../common/errors';
import { ClientRecord, Ledger, LedgerFact, LedgerYear, Month, MONTHS, MonthlyMinutes, TimeRecord } from '../common/interfaces/models';
import { ILedgerRepository, LEDGER_REPOSITORY_TOKEN } from '../common/interfaces/repositories';
import { formatMinutes, parseYear } from '../common/utils';
import { normalizeCompanyName } from '../normalization';
import { buildClientRegistryIndex, ITechnicianResolverService, TechnicianResolverService } from '../technicians';
import {
    ApplyImportResult,
    ILedgerService,
    LedgerLoadResult,
    MigrationResult,
    YearView,
    YearViewOptions,
    YearViewRow,
} from './interfaces/services';
import { emptyTimeRecord, readLedgerDocument, recordMonthSum, totalLedgerMinutes } from './ledger-schema';

export const CLEAR_CONFIRMATION_WORD = 'CLEAR';

function requireYear(year: string): string {
    const parsed = parseYear(year);
    if (!parsed) throw new ValidationError(`Invalid year: "${year}". Expected four digits.`);
    return parsed;
}

function requireMinutes(minutes: number): number {
    if (!Number.isInteger(minutes) || minutes < 0) {
        throw new ValidationError(`Invalid minutes: ${minutes}. Expected a non-negative integer.`);
    }
    return minutes;
}

/** Existing key of the year whose strong normalisation equals `companyKey` */
export function findRecordKey(slice: LedgerYear, companyKey: string): string | null {
    if (!companyKey) return null;
    return Object.keys(slice).find(name => normalizeCompanyName(name) === companyKey) ?? null;
}

function clearMonth(record: TimeRecord, month: Month): void {
    delete record.monthlyMinutes[month];
    for (const [technician, months] of Object.entries(record.perTechnicianMonthlyMinutes)) {
        delete months[month];
        if (!MONTHS.some(m => months[m] !== undefined)) {
            delete record.perTechnicianMonthlyMinutes[technician];
        }
    }
}

/** Months of the year in which some live company has minutes; 12 for an empty year */
function monthsWithMinutes(slice: LedgerYear): number {
    const months = new Set<Month>();
    for (const record of Object.values(slice)) {
        if (record.deleted) continue;
        for (const month of MONTHS) {
            if ((record.monthlyMinutes[month] ?? 0) > 0) months.add(month);
        }
    }
    return months.size || 12;
}

function requireAverageMonths(months: number): number {
    if (!Number.isInteger(months) || months < 1 || months > 12) {
        throw new ValidationError(`Invalid number of months for the average: ${months}. Expected 1 to 12.`);
    }
    return months;
}

function addToMonth(months: MonthlyMinutes, month: Month, minutes: number): void {
    months[month] = (months[month] ?? 0) + minutes;
}

@singleton()
@injectable()
export class LedgerService implements ILedgerService {
    private ledger: Ledger = {};
    /** Copy of what the file holds after the last successful write or load */
    private persisted: Ledger = {};
    private backupPending = false;
    private backupTaken = false;
    private readonly dropGuardRatio = config.timesheets.dropGuardRatio;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(LEDGER_REPOSITORY_TOKEN) private repository: ILedgerRepository,
        @inject(TechnicianResolverService) private technicianResolver: ITechnicianResolverService
    ) {
        this.logger.info('LedgerService initialized.');
    }

    private readonly canonicalize = (rawName: string): string => this.technicianResolver.canonicalize(rawName);

    // --- Persistence ---

    load(): LedgerLoadResult {
        const result = this.repository.read();
        this.ledger = {};
        this.persisted = {};

        if (result.status === 'missing') {
            this.logger.info(`No ledger file at ${this.repository.location}; starting empty.`);
            return { years: [], migrated: false };
        }
        if (result.status === 'unreadable') {
            // keep a copy of the broken file before anything overwrites it
            this.backupPending = true;
            this.logger.warn(`Ledger file ${this.repository.location} is unreadable (${result.reason}); starting empty.`);
            return { years: [], migrated: false };
        }

        const outcome = readLedgerDocument(result.document, this.canonicalize);
        this.ledger = outcome.ledger;
        if (outcome.migrated) {
            this.logger.warn(`Ledger file ${this.repository.location} used a legacy layout; saving the migrated ledger.`);
            this.backupPending = true;
            this.persist();
        } else {
            this.persisted = structuredClone(this.ledger);
        }
        this.logger.info(`Ledger loaded: ${this.listYears().length} year(s), ${totalLedgerMinutes(this.ledger)} minutes.`);
        return { years: this.listYears(), migrated: outcome.migrated };
    }

    save(): void {
        this.persist();
    }

    /** Total of the file as it is now, read through the same migration rules. */
    private persistedFileTotal(): number {
        const result = this.repository.read();
        if (result.status !== 'ok') return 0;
        return totalLedgerMinutes(readLedgerDocument(result.document, this.canonicalize).ledger);
    }

    private rollback(): void {
        this.ledger = structuredClone(this.persisted);
    }

    private persist(force: boolean = false): void {
        const newTotal = totalLedgerMinutes(this.ledger);
        if (!force) {
            const previousTotal = this.persistedFileTotal();
            if (previousTotal > 0 && newTotal < previousTotal * this.dropGuardRatio) {
                this.logger.error(`Ledger save rejected: total would drop from ${previousTotal} to ${newTotal} minutes. In-memory ledger restored.`);
                this.rollback();
                throw new LedgerWriteRejectedError(previousTotal, newTotal);
            }
        }

        try {
            if (this.backupPending && !this.backupTaken) {
                this.repository.backup();
                this.backupTaken = true;
            }
            this.backupPending = false;
            this.repository.write(this.ledger);
        } catch (error: unknown) {
            this.rollback();
            throw error;
        }
        this.persisted = structuredClone(this.ledger);
    }

    /** Runs a change against the live ledger and persists it; any failure restores the last saved state. */
    private mutate<T>(action: string, change: (ledger: Ledger) => T): T {
        let result: T;
        try {
            result = change(this.ledger);
        } catch (error: unknown) {
            this.rollback();
            throw error;
        }
        this.persist();
        this.logger.info(`Ledger updated: ${action}.`);
        return result;
    }

    private resolveRecordKey(slice: LedgerYear, company: string): string {
        const companyKey = normalizeCompanyName(company);
        if (!companyKey) throw new ValidationError('Company name is required.');
        return findRecordKey(slice, companyKey) ?? company.trim();
    }

    // --- Mutations ---

    applyImport(year: string, month: Month, facts: readonly LedgerFact[]): ApplyImportResult {
        const validYear = requireYear(year);

        const groups = new Map<string, { companyName: string; facts: LedgerFact[] }>();
        for (const fact of facts) {
            if (!fact.companyKey || fact.minutes <= 0) continue;
            const group = groups.get(fact.companyKey);
            if (group) group.facts.push(fact);
            else groups.set(fact.companyKey, { companyName: fact.companyName, facts: [fact] });
        }
        if (groups.size === 0) {
            return { companiesTouched: [], minutesApplied: 0 };
        }

        return this.mutate(`import ${validYear}-${month}`, ledger => {
            const slice = (ledger[validYear] ??= {});
            const companiesTouched: string[] = [];
            let minutesApplied = 0;

            for (const [companyKey, group] of groups) {
                const key = findRecordKey(slice, companyKey) ?? group.companyName;
                const record = (slice[key] ??= emptyTimeRecord());
                clearMonth(record, month);

                for (const fact of group.facts) {
                    addToMonth(record.monthlyMinutes, month, fact.minutes);
                    if (fact.technician) {
                        addToMonth(record.perTechnicianMonthlyMinutes[fact.technician] ??= {}, month, fact.minutes);
                    }
                    minutesApplied += fact.minutes;
                }
                if ((record.monthlyMinutes[month] ?? 0) > 0) {
                    record.deleted = false;
                }
                companiesTouched.push(key);
            }
            return { companiesTouched, minutesApplied };
        });
    }

    setAverageMinutes(year: string, company: string, minutes: number): string {
        const validYear = requireYear(year);
        const value = requireMinutes(minutes);
        return this.mutate(`average of ${company} in ${validYear} set to ${value} min`, ledger => {
            const slice = (ledger[validYear] ??= {});
            const key = this.resolveRecordKey(slice, company);
            const record = (slice[key] ??= emptyTimeRecord());
            const monthlyMinutes: MonthlyMinutes = {};
            if (value > 0) {
                for (const month of MONTHS) monthlyMinutes[month] = value;
            }
            record.monthlyMinutes = monthlyMinutes;
            // a flat override cannot keep the old attribution
            record.perTechnicianMonthlyMinutes = {};
            record.deleted = false;
            return key;
        });
    }

    setExtraMinutes(year: string, company: string, minutes: number): string {
        const validYear = requireYear(year);
        const value = requireMinutes(minutes);
        return this.mutate(`extra of ${company} in ${validYear} set to ${value} min`, ledger => {
            const slice = (ledger[validYear] ??= {});
            const key = this.resolveRecordKey(slice, company);
            const record = (slice[key] ??= emptyTimeRecord());
            record.extraMonthlyMinutes = value;
            return key;
        });
    }

    softDelete(year: string, company: string): string {
        const validYear = requireYear(year);
        return this.mutate(`${company} deleted in ${validYear}`, ledger => {
            const slice = (ledger[validYear] ??= {});
            const key = this.resolveRecordKey(slice, company);
            const record = (slice[key] ??= emptyTimeRecord());
            record.deleted = true;
            return key;
        });
    }

    syncClients(year: string, clients: readonly ClientRecord[]): string[] {
        const validYear = requireYear(year);
        const slice = this.ledger[validYear] ?? {};
        const known = new Set(Object.keys(slice).map(name => normalizeCompanyName(name)));
        const additions: string[] = [];
        for (const client of clients) {
            const companyKey = normalizeCompanyName(client.name);
            if (!companyKey || known.has(companyKey)) continue;
            known.add(companyKey);
            additions.push(client.name.trim());
        }
        if (additions.length === 0) {
            this.logger.info(`Client sync for ${validYear}: nothing to add.`);
            return [];
        }

        return this.mutate(`${additions.length} client placeholder(s) added to ${validYear}`, ledger => {
            const target = (ledger[validYear] ??= {});
            for (const name of additions) {
                target[name] = emptyTimeRecord();
            }
            return additions;
        });
    }

    migrateFromDisk(): MigrationResult {
        const result = this.repository.read();
        if (result.status === 'missing') {
            throw new NotFoundError(`Ledger file not found at ${this.repository.location}`);
        }
        if (result.status === 'unreadable') {
            throw new PersistenceError(`Ledger file at ${this.repository.location} cannot be read: ${result.reason}`);
        }

        const outcome = readLedgerDocument(result.document, this.canonicalize);
        const backupPath = this.repository.backup();
        this.backupTaken = true;
        this.backupPending = false;

        this.ledger = outcome.ledger;
        this.persist();
        const totalMinutes = totalLedgerMinutes(this.ledger);
        this.logger.info(`Manual ledger migration done: ${totalMinutes} minutes, backup ${backupPath ?? 'not needed'}.`);
        return { years: this.listYears(), totalMinutes, backupPath };
    }

    clear(confirmation: string): void {
        if (confirmation !== CLEAR_CONFIRMATION_WORD) {
            throw new ValidationError(`Type ${CLEAR_CONFIRMATION_WORD} to confirm wiping the ledger.`);
        }
        this.repository.backup();
        this.ledger = {};
        this.persist(true);
        this.logger.warn('Ledger cleared.');
    }

    // --- Queries ---

    listYears(): string[] {
        return Object.keys(this.ledger).sort();
    }

    getYear(year: string): LedgerYear {
        return structuredClone(this.ledger[year] ?? {});
    }

    getYearView(year: string, options: YearViewOptions = {}): YearView {
        const validYear = requireYear(year);
        const slice = this.ledger[validYear] ?? {};
        const averageMonths = options.months === undefined ? monthsWithMinutes(slice) : requireAverageMonths(options.months);
        const companyFilter = options.company?.trim() ? normalizeCompanyName(options.company) : '';
        const technicianFilter = options.technician?.trim() ? this.technicianResolver.canonicalize(options.technician) : null;
        const registry = buildClientRegistryIndex(options.clients ?? []);

        const rows: YearViewRow[] = Object.keys(slice)
            .filter(company => !slice[company].deleted)
            .filter(company => !companyFilter || normalizeCompanyName(company).includes(companyFilter))
            .filter(company => {
                if (technicianFilter === null) return true;
                const client = registry.get(normalizeCompanyName(company));
                return this.technicianResolver.canonicalize(client?.primaryTechnician) === technicianFilter;
            })
            .sort((a, b) => a.toUpperCase().localeCompare(b.toUpperCase()))
            .map(company => {
                const record = slice[company];
                const extra = record.extraMonthlyMinutes;
                const baseMinutes = recordMonthSum(record);
                const totalMinutes = baseMinutes + extra * 12;
                const averageMinutes = Math.round(totalMinutes / averageMonths);
                return {
                    company,
                    effectiveMonthlyMinutes: MONTHS.map(month => (record.monthlyMinutes[month] ?? 0) + extra),
                    baseMinutes,
                    extraMonthlyMinutes: extra,
                    totalMinutes,
                    averageMinutes,
                    averageFormatted: formatMinutes(averageMinutes),
                };
            });
        return {
            year: validYear,
            averageMonths,
            rows,
            totalMinutes: rows.reduce((sum, row) => sum + row.totalMinutes, 0),
        };
    }
}
