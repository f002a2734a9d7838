// src/core/parsing/layouts/workload-layout.ts
import { FactSource, IgnoredSummary, RawTimeFact } from '../../common/interfaces/models';
import { isTotalMarker, parseDurationToMinutes } from '../../normalization';
import { WORKLOAD_HEADING_WORDS, WORKLOAD_TITLE_FRAGMENTS } from '../header-synonyms';
import { LayoutContext, LayoutResult, SheetRow } from '../interfaces/services';
import { sourceOf } from './cells';

interface CompanyBlock {
    readonly company: string;
    readonly inlineTotal: number;
    readonly source: FactSource;
    readonly facts: RawTimeFact[];
}

/** Technician lines are indented by four spaces or a tab */
export function isIndented(text: string): boolean {
    return text.startsWith('    ') || text.startsWith('\t');
}

function isHeadingOrTitle(text: string): boolean {
    const upper = text.toUpperCase();
    if (WORKLOAD_HEADING_WORDS.has(upper) || isTotalMarker(text)) return true;
    return WORKLOAD_TITLE_FRAGMENTS.some(fragment => upper.includes(fragment));
}

/**
 * Legacy workload export: column A holds a company (not indented) followed
 * by its technicians (indented), column B the duration. A company row may
 * carry an inline total for the whole block.
 */
export function readWorkloadSheet(rows: readonly SheetRow[], context: LayoutContext): LayoutResult {
    const facts: RawTimeFact[] = [];
    const ignoredSummaries: IgnoredSummary[] = [];
    let block: CompanyBlock | null = null;

    const closeBlock = (current: CompanyBlock): void => {
        facts.push(...current.facts);
        if (current.inlineTotal <= 0) return;

        const hasResolvedDetail = current.facts.some(fact => fact.attribution.kind !== 'unknown');
        if (hasResolvedDetail) {
            ignoredSummaries.push({ company: current.company, minutes: current.inlineTotal, source: current.source });
        } else {
            facts.push({ company: current.company, attribution: { kind: 'summary' }, minutes: current.inlineTotal, source: current.source });
        }
    };

    for (let rowIndex = 0; rowIndex < rows.length; rowIndex++) {
        const row = rows[rowIndex];
        const first = row[0];
        if (typeof first !== 'string' && typeof first !== 'number') continue;

        const text = String(first);
        const trimmed = text.trim();
        if (!trimmed || isHeadingOrTitle(trimmed)) continue;

        if (isIndented(text)) {
            if (!block) continue;
            const minutes = parseDurationToMinutes(row[1]);
            if (minutes <= 0) continue;
            block.facts.push({
                company: block.company,
                attribution: context.resolveTechnician(trimmed),
                minutes,
                source: sourceOf(context, rowIndex),
            });
        } else {
            if (block) closeBlock(block);
            block = {
                company: trimmed,
                inlineTotal: parseDurationToMinutes(row[1]),
                source: sourceOf(context, rowIndex),
                facts: [],
            };
        }
    }
    if (block) closeBlock(block);

    return { facts, ignoredSummaries };
}
