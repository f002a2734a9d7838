// src/core/parsing/layouts/tabular-layout.ts
import { FactSource, IgnoredSummary, RawTimeFact, TechnicianClassification } from '../../common/interfaces/models';
import { isTotalMarker, normalizeCompanyName, normalizeHeader, parseDurationToMinutes } from '../../normalization';
import { COMPANY_HEADER_NAMES, TECHNICIAN_HEADER_NAMES, TIME_HEADER_NAMES } from '../header-synonyms';
import { LayoutContext, LayoutResult, SheetRow } from '../interfaces/services';
import { cellText, sourceOf } from './cells';

export interface TabularColumns {
    /** 0-based index of the header row */
    readonly headerRowIndex: number;
    readonly company: number;
    readonly technician: number;
    readonly time: number;
}

interface CompanyRows {
    readonly company: string;
    readonly details: Array<{ classification: TechnicianClassification; minutes: number; source: FactSource }>;
    readonly summaries: Array<{ minutes: number; source: FactSource }>;
}

/**
 * Looks for the first row naming a company, a technician and a time column.
 * All three must sit on the same row.
 */
export function findTabularHeader(rows: readonly SheetRow[]): TabularColumns | null {
    for (let rowIndex = 0; rowIndex < rows.length; rowIndex++) {
        let company: number | null = null;
        let technician: number | null = null;
        let time: number | null = null;

        const row = rows[rowIndex];
        for (let columnIndex = 0; columnIndex < row.length; columnIndex++) {
            const name = normalizeHeader(row[columnIndex]);
            if (!name) continue;
            if (company === null && COMPANY_HEADER_NAMES.has(name)) company = columnIndex;
            else if (technician === null && TECHNICIAN_HEADER_NAMES.has(name)) technician = columnIndex;
            else if (time === null && TIME_HEADER_NAMES.has(name)) time = columnIndex;
        }

        if (company !== null && technician !== null && time !== null) {
            return { headerRowIndex: rowIndex, company, technician, time };
        }
    }
    return null;
}

/**
 * Reads `(company, technician, duration)` rows below the header.
 *
 * A row without a technician is a company summary. When the same company
 * also has resolved technician rows its summaries are redundant and are
 * reported as ignored; otherwise they add up to one unattributed fact.
 */
export function readTabularSheet(rows: readonly SheetRow[], columns: TabularColumns, context: LayoutContext): LayoutResult {
    const byCompany = new Map<string, CompanyRows>();

    for (let rowIndex = columns.headerRowIndex + 1; rowIndex < rows.length; rowIndex++) {
        const row = rows[rowIndex];
        const company = cellText(row[columns.company]);
        if (!company || isTotalMarker(company)) continue;

        const minutes = parseDurationToMinutes(row[columns.time]);
        if (minutes <= 0) continue;

        const technician = cellText(row[columns.technician]);
        if (technician && isTotalMarker(technician)) continue;

        const groupKey = normalizeCompanyName(company) || company;
        let group = byCompany.get(groupKey);
        if (!group) {
            group = { company, details: [], summaries: [] };
            byCompany.set(groupKey, group);
        }

        const source = sourceOf(context, rowIndex);
        if (!technician) {
            group.summaries.push({ minutes, source });
        } else {
            group.details.push({ classification: context.resolveTechnician(technician), minutes, source });
        }
    }

    const facts: RawTimeFact[] = [];
    const ignoredSummaries: IgnoredSummary[] = [];

    for (const group of byCompany.values()) {
        for (const detail of group.details) {
            facts.push({ company: group.company, attribution: detail.classification, minutes: detail.minutes, source: detail.source });
        }

        const hasResolvedDetail = group.details.some(detail => detail.classification.kind !== 'unknown');
        if (hasResolvedDetail) {
            for (const summary of group.summaries) {
                ignoredSummaries.push({ company: group.company, minutes: summary.minutes, source: summary.source });
            }
        } else if (group.summaries.length > 0) {
            const minutes = group.summaries.reduce((sum, summary) => sum + summary.minutes, 0);
            facts.push({ company: group.company, attribution: { kind: 'summary' }, minutes, source: group.summaries[0].source });
        }
    }

    return { facts, ignoredSummaries };
}
