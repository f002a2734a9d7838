// src/core/parsing/timesheet-parser.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import * as XLSX from 'xlsx';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { FileParsingError } from '../common/errors';
import { ParsedSheet, ParsedWorkbook, SheetLayout } from '../common/interfaces/models';
import { ITechnicianResolverService, TechnicianResolverService } from '../technicians';
import { ITimesheetParserService, LayoutContext, LayoutResult, SheetRow } from './interfaces/services';
import { timeCellsToClockText } from './layouts/cells';
import { findTabularHeader, readTabularSheet } from './layouts/tabular-layout';
import { readWorkloadSheet } from './layouts/workload-layout';

interface LayoutSelection {
    readonly layout: SheetLayout;
    read(): LayoutResult;
}

@singleton()
@injectable()
export class TimesheetParserService implements ITimesheetParserService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(TechnicianResolverService) private technicianResolver: ITechnicianResolverService
    ) {
        this.logger.info('TimesheetParserService initialized.');
    }

    parseWorkbook(fileBuffer: Buffer, fileName: string): ParsedWorkbook {
        let workbook: XLSX.WorkBook;
        try {
            workbook = XLSX.read(fileBuffer, { type: 'buffer', cellNF: true });
        } catch (error: unknown) {
            this.logger.error(`Workbook "${fileName}" could not be read.`);
            throw new FileParsingError(`Failed to read workbook "${fileName}"`, error instanceof Error ? error : undefined);
        }
        if (workbook.SheetNames.length === 0) {
            throw new FileParsingError(`No sheets found in workbook "${fileName}".`);
        }

        const sheets: ParsedSheet[] = [];
        for (const sheetName of workbook.SheetNames) {
            const worksheet = workbook.Sheets[sheetName];
            if (!worksheet) continue;
            const timeCells = timeCellsToClockText(worksheet);
            if (timeCells > 0) {
                this.logger.debug(`Sheet "${sheetName}" of "${fileName}": ${timeCells} time-formatted cell(s) read as clock durations.`);
            }
            // raw values keep the leading spaces that mark technician rows;
            // blank rows are kept so row numbers match the sheet
            const rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: true, defval: null, blankrows: true });
            sheets.push(this.parseRows(rows, sheetName, fileName));
        }

        const factCount = sheets.reduce((sum, sheet) => sum + sheet.facts.length, 0);
        this.logger.info(`Parsed ${factCount} facts from ${sheets.length} sheet(s) of "${fileName}".`);
        return { fileName, sheets };
    }

    parseRows(rows: readonly SheetRow[], sheetName: string, fileName: string): ParsedSheet {
        const context: LayoutContext = {
            fileName,
            sheetName,
            resolveTechnician: rawName => this.technicianResolver.resolve(rawName),
        };
        const selection = this.selectLayout(rows, context);
        const { facts, ignoredSummaries } = selection.read();
        this.logger.debug(`Sheet "${sheetName}" of "${fileName}" read as ${selection.layout}: ${facts.length} facts, ${ignoredSummaries.length} ignored summaries.`);
        return { sheetName, layout: selection.layout, facts, ignoredSummaries };
    }

    /** Tabular wins whenever a header row is present; workload is the fallback. */
    private selectLayout(rows: readonly SheetRow[], context: LayoutContext): LayoutSelection {
        const columns = findTabularHeader(rows);
        if (columns) {
            return { layout: 'tabular', read: () => readTabularSheet(rows, columns, context) };
        }
        return { layout: 'workload', read: () => readWorkloadSheet(rows, context) };
    }
}
