// src/core/normalization/duration.utils.ts
import { stripDiacritics } from './normalization.utils';

const HOUR_MARKER_PATTERN = /(\d+(?:[.,]\d+)?)\s*h/;
const MINUTE_MARKER_PATTERN = /(\d+)\s*m/;
const CLOCK_PATTERN = /^(\d+):(\d{1,2})(?::\d{1,2})?$/;

/** Decimals up to this magnitude are read as hours, anything above as minutes */
const MAX_DECIMAL_HOURS = 24;

function numberToMinutes(value: number, hasDecimalPoint: boolean): number {
    if (!Number.isFinite(value) || value < 0) return 0;
    if (hasDecimalPoint && value <= MAX_DECIMAL_HOURS) {
        return Math.round(value * 60);
    }
    return Math.round(value);
}

/**
 * Converts a spreadsheet duration cell to whole minutes.
 *
 * Accepted forms: "2h30", "2h 30m", "1.5h", "2 horas", "45m", "45 min",
 * "1:30", decimal hours ("1,5" or 1.5, up to 24) and plain minutes ("90").
 * Anything unreadable or negative yields 0; stray text in a time column
 * is common and must not stop an import.
 */
export function parseDurationToMinutes(value: unknown): number {
    if (value === null || value === undefined) return 0;

    if (typeof value === 'number') {
        return numberToMinutes(value, !Number.isInteger(value));
    }
    if (typeof value !== 'string') return 0;

    const text = stripDiacritics(value.trim()).toLowerCase();
    if (!text || text.startsWith('-')) return 0;

    const hourMatch = HOUR_MARKER_PATTERN.exec(text);
    if (hourMatch) {
        const hours = Number(hourMatch[1].replace(',', '.'));
        // first digits after the marker are minutes ("2h30", "2h 30m")
        const rest = text.slice(hourMatch.index + hourMatch[0].length);
        const minuteMatch = /(\d+)/.exec(rest);
        const minutes = minuteMatch ? Number(minuteMatch[1]) : 0;
        return numberToMinutes(hours * 60 + minutes, false);
    }

    const minuteMatch = MINUTE_MARKER_PATTERN.exec(text);
    if (minuteMatch) {
        return numberToMinutes(Number(minuteMatch[1]), false);
    }

    const clockMatch = CLOCK_PATTERN.exec(text);
    if (clockMatch) {
        return Number(clockMatch[1]) * 60 + Number(clockMatch[2]);
    }

    const numeric = text.replace(',', '.');
    return numberToMinutes(Number(numeric), numeric.includes('.'));
}
