// src/core/parsing/interfaces/services.ts
import {
    IgnoredSummary,
    ParsedSheet,
    ParsedWorkbook,
    RawTimeFact,
    TechnicianClassification,
} from '../../common/interfaces/models';

/** One sheet row as SheetJS returns it with `header: 1` */
export type SheetRow = readonly unknown[];

/** What a layout reader needs besides the rows */
export interface LayoutContext {
    readonly fileName: string;
    readonly sheetName: string;
    resolveTechnician(rawName: string): TechnicianClassification;
}

export interface LayoutResult {
    readonly facts: RawTimeFact[];
    readonly ignoredSummaries: IgnoredSummary[];
}

/** Defines the contract for the Timesheet Parser Service */
export interface ITimesheetParserService {
    /**
     * Reads every sheet of an uploaded workbook.
     * @param fileBuffer - Workbook bytes (xlsx, xls, ods or csv).
     * @param fileName - Original upload name, carried into fact sources.
     * @throws {FileParsingError} If the workbook cannot be read at all.
     */
    parseWorkbook(fileBuffer: Buffer, fileName: string): ParsedWorkbook;

    /**
     * Parses already-extracted rows of one sheet, tabular layout first and
     * the workload layout as fallback. Exposed for callers that build rows
     * themselves.
     */
    parseRows(rows: readonly SheetRow[], sheetName: string, fileName: string): ParsedSheet;
}
