// src/core/technicians/alias-table.ts
import fs from 'fs';

import { ConfigurationError } from '../common/errors';
import { isPlainObject } from '../common/utils';

/** One technician identity with every spelling seen in spreadsheets or the registry */
export interface TechnicianAliasEntry {
    readonly canonical: string;
    readonly variants: readonly string[];
}

export interface AliasTableDefinition {
    readonly technicians: readonly TechnicianAliasEntry[];
    /** Identity whose minutes are re-attributed through the client registry */
    readonly specialCase: TechnicianAliasEntry;
}

export const ALIAS_TABLE_TOKEN = Symbol.for('TechnicianAliasTable');

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function toAliasEntry(value: unknown, where: string): TechnicianAliasEntry {
    if (!isPlainObject(value) || typeof value.canonical !== 'string' || !value.canonical.trim()) {
        throw new ConfigurationError(`${where}: "canonical" must be a non-empty string`);
    }
    const variants = value.variants ?? [];
    if (!isStringArray(variants)) {
        throw new ConfigurationError(`${where}: "variants" must be an array of strings`);
    }
    return { canonical: value.canonical.trim(), variants };
}

/** Validates the parsed JSON of an alias table file. */
export function parseAliasTable(raw: unknown): AliasTableDefinition {
    if (!isPlainObject(raw)) {
        throw new ConfigurationError('Technician alias table must be a JSON object');
    }
    if (!Array.isArray(raw.technicians)) {
        throw new ConfigurationError('Technician alias table: "technicians" must be an array');
    }
    const technicians = raw.technicians.map((entry: unknown, index: number) =>
        toAliasEntry(entry, `technicians[${index}]`));
    const specialCase = toAliasEntry(raw.specialCase, 'specialCase');
    return { technicians, specialCase };
}

/**
 * Reads the alias table at startup. A missing or malformed file is a
 * configuration error: attribution cannot work without it.
 */
export function loadAliasTable(filePath: string): AliasTableDefinition {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf8');
    } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read technician alias table at ${filePath}: ${reason}`);
    }
    try {
        return parseAliasTable(JSON.parse(content));
    } catch (error: unknown) {
        if (error instanceof ConfigurationError) throw error;
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Invalid JSON in technician alias table ${filePath}: ${reason}`);
    }
}
