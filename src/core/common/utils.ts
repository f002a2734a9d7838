// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';
import { MinutesByName, Month, MONTHS } from './interfaces/models';

/**
 * Generates a unique Version 4 UUID.
 * @returns A unique identifier string.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/** Type guard for JSON objects (not arrays, not null). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Adds minutes to a name-keyed tally in place. */
export function addMinutes(tally: MinutesByName, name: string, minutes: number): void {
    tally[name] = (tally[name] ?? 0) + minutes;
}

/** Parses "1".."12" (or a number) into a month, null for anything else. */
export function parseMonth(value: unknown): Month | null {
    const num = typeof value === 'number' ? value : Number(String(value ?? '').trim());
    return MONTHS.find(month => month === num) ?? null;
}

/** Accepts four-digit years given as string or number. */
export function parseYear(value: unknown): string | null {
    const text = String(value ?? '').trim();
    return /^\d{4}$/.test(text) ? text : null;
}

/**
 * Formats minutes as "XhYYm", e.g. 150 -> "2h30m".
 */
export function formatMinutes(minutes: number): string {
    const safe = Math.max(0, Math.trunc(minutes || 0));
    const hours = Math.floor(safe / 60);
    const rest = safe % 60;
    return `${hours}h${String(rest).padStart(2, '0')}m`;
}

/**
 * Local timestamp as YYYYMMDD-HHmmss, used in backup file names.
 */
export function formatFileTimestamp(date: Date = new Date()): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** Sorts a tally by minutes, largest first, and keeps the top entries. */
export function topEntries(tally: MinutesByName, limit: number = 30): Array<[string, number]> {
    return Object.entries(tally)
        .sort((a, b) => b[1] - a[1])
        .slice(0, limit);
}
