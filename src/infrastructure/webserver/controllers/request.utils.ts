// src/infrastructure/webserver/controllers/request.utils.ts
import { ValidationError } from '../../../core/common/errors';
import { isPlainObject } from '../../../core/common/utils';

/** Single string value of a query parameter, ignoring repeated or nested forms. */
export function queryText(value: unknown): string | undefined {
    if (typeof value !== 'string') return undefined;
    const text = value.trim();
    return text ? text : undefined;
}

/** The request body as a JSON object; anything else counts as empty. */
export function bodyOf(body: unknown): Record<string, unknown> {
    return isPlainObject(body) ? body : {};
}

export function requireText(body: Record<string, unknown>, field: string): string {
    const value = body[field];
    const text = typeof value === 'string' || typeof value === 'number' ? String(value).trim() : '';
    if (!text) throw new ValidationError(`Field "${field}" is required.`);
    return text;
}

/** Whole minutes given as a number or a string of digits. */
export function requireMinutes(body: Record<string, unknown>, field: string): number {
    const text = requireText(body, field);
    const minutes = Number(text);
    if (!Number.isInteger(minutes) || minutes < 0) {
        throw new ValidationError(`Field "${field}" must be a non-negative whole number of minutes.`);
    }
    return minutes;
}
