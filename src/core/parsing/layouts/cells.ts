// src/core/parsing/layouts/cells.ts
import * as XLSX from 'xlsx';

import { FactSource } from '../../common/interfaces/models';
import { isPlainObject } from '../../common/utils';
import { LayoutContext } from '../interfaces/services';

/** "h:mm", "hh:mm:ss", "[h]:mm" and the like */
const TIME_FORMAT_PATTERN = /^\[?h{1,2}\]?:mm/i;

interface TimeFormattedCell {
    readonly t: 'n';
    readonly v: number;
    readonly z: string;
}

function isTimeFormattedCell(cell: unknown): cell is TimeFormattedCell {
    return isPlainObject(cell)
        && cell.t === 'n'
        && typeof cell.v === 'number'
        && cell.v >= 0
        && typeof cell.z === 'string'
        && TIME_FORMAT_PATTERN.test(cell.z);
}

/**
 * Numeric cells with a time format hold a fraction of a day (1:30 is 0.0625).
 * Rewrites them as "H:MM" text so the duration parser reads them as a clock.
 * @returns The number of cells rewritten.
 */
export function timeCellsToClockText(worksheet: XLSX.WorkSheet): number {
    let rewritten = 0;
    for (const address of Object.keys(worksheet)) {
        if (address.startsWith('!')) continue;
        const cell: unknown = worksheet[address];
        if (!isTimeFormattedCell(cell)) continue;

        const minutes = Math.round(cell.v * 24 * 60);
        const clock = `${Math.floor(minutes / 60)}:${String(minutes % 60).padStart(2, '0')}`;
        const text: XLSX.CellObject = { t: 's', v: clock };
        worksheet[address] = text;
        rewritten++;
    }
    return rewritten;
}

/** Trimmed text of a raw cell value; '' for empty or non-textual cells. */
export function cellText(value: unknown): string {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return '';
}

export function sourceOf(context: LayoutContext, rowIndex: number): FactSource {
    return { fileName: context.fileName, sheetName: context.sheetName, row: rowIndex + 1 };
}
