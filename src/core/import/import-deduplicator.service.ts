// src/core/import/import-deduplicator.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { BatchFact, FactAttribution, ImportBatch, ImportDiagnostics, Month } from '../common/interfaces/models';
import { addMinutes, generateUniqueId } from '../common/utils';
import { normalizeCompanyName, normalizePersonName } from '../normalization';
import { BatchInput, IImportDeduplicatorService } from './interfaces/services';

export function emptyDiagnostics(): ImportDiagnostics {
    return {
        unknownTechnicianMinutes: {},
        ignoredMinutesByCompany: {},
        ignoredSummaryMinutesByCompany: {},
        duplicateMinutesByCompany: {},
        duplicateCount: 0,
        totalDuplicateMinutes: 0,
        uninferredSpecialCaseMinutes: {},
        blankCompanyFacts: 0,
        failedFiles: [],
    };
}

function attributionKey(attribution: FactAttribution): string {
    switch (attribution.kind) {
        case 'canonical':
            return `C:${normalizePersonName(attribution.technician)}`;
        case 'specialCase':
            return '__SPECIAL__';
        case 'summary':
            return '__SUMMARY__';
        case 'unknown':
            return `U:${normalizePersonName(attribution.rawName)}`;
    }
}

/** Identity of an observation: same company, same attribution, same month, same minutes. */
export function dedupKey(companyKey: string, attribution: FactAttribution, month: Month, minutes: number): string {
    return `${companyKey}|${attributionKey(attribution)}|${month}|${minutes}`;
}

@singleton()
@injectable()
export class ImportDeduplicatorService implements IImportDeduplicatorService {

    constructor(@inject(LOGGER_TOKEN) private logger: Logger) {
        this.logger.info('ImportDeduplicatorService initialized.');
    }

    buildBatch(input: BatchInput): ImportBatch {
        const diagnostics = emptyDiagnostics();
        diagnostics.failedFiles.push(...input.failedFiles);

        const displayNames = new Map<string, string>();
        const seen = new Set<string>();
        const facts: BatchFact[] = [];

        const displayNameFor = (companyKey: string, spelling: string): string => {
            const known = displayNames.get(companyKey);
            if (known !== undefined) return known;
            displayNames.set(companyKey, spelling);
            return spelling;
        };

        for (const workbook of input.workbooks) {
            for (const sheet of workbook.sheets) {
                for (const fact of sheet.facts) {
                    if (fact.minutes <= 0) continue;
                    const companyKey = normalizeCompanyName(fact.company);
                    if (!companyKey) {
                        diagnostics.blankCompanyFacts++;
                        continue;
                    }
                    const companyName = displayNameFor(companyKey, fact.company);

                    const key = dedupKey(companyKey, fact.attribution, input.month, fact.minutes);
                    if (seen.has(key)) {
                        diagnostics.duplicateCount++;
                        diagnostics.totalDuplicateMinutes += fact.minutes;
                        addMinutes(diagnostics.duplicateMinutesByCompany, companyName, fact.minutes);
                        continue;
                    }
                    seen.add(key);

                    const attribution = fact.attribution;
                    if (attribution.kind === 'unknown') {
                        addMinutes(diagnostics.unknownTechnicianMinutes, attribution.rawName, fact.minutes);
                        addMinutes(diagnostics.ignoredMinutesByCompany, companyName, fact.minutes);
                        continue;
                    }
                    facts.push({ companyKey, companyName, attribution, minutes: fact.minutes });
                }
            }
        }

        // ignored summaries are reported as found, not deduplicated
        for (const workbook of input.workbooks) {
            for (const sheet of workbook.sheets) {
                for (const summary of sheet.ignoredSummaries) {
                    const companyKey = normalizeCompanyName(summary.company);
                    const companyName = companyKey ? displayNameFor(companyKey, summary.company) : summary.company;
                    addMinutes(diagnostics.ignoredSummaryMinutesByCompany, companyName, summary.minutes);
                    addMinutes(diagnostics.ignoredMinutesByCompany, companyName, summary.minutes);
                }
            }
        }

        if (diagnostics.duplicateCount > 0) {
            this.logger.warn(`Suppressed ${diagnostics.duplicateCount} duplicate fact(s) (${diagnostics.totalDuplicateMinutes} min) in ${input.year}-${input.month} import.`);
        }
        this.logger.info(`Import batch for ${input.year}-${input.month}: ${facts.length} facts from ${input.workbooks.length} workbook(s).`);

        return {
            id: generateUniqueId(),
            year: input.year,
            month: input.month,
            files: [...input.files],
            facts,
            diagnostics,
        };
    }
}
