// src/infrastructure/persistence/json-file.utils.ts
import fs from 'fs';
import path from 'path';

import { PersistenceError } from '../../core/common/errors';

export type JsonFileReadResult =
    | { readonly status: 'missing' }
    | { readonly status: 'ok'; readonly document: unknown }
    | { readonly status: 'unreadable'; readonly reason: string };

// fs errors may come from another realm, where `instanceof Error` is false
function errorCode(error: unknown): unknown {
    return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

function toError(error: unknown): Error {
    if (error instanceof Error) return error;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return new Error(error.message);
    }
    return new Error(String(error));
}

function isMissingFileError(error: unknown): boolean {
    return errorCode(error) === 'ENOENT';
}

/** Reads and parses a JSON file, telling a missing file apart from a broken one. */
export function readJsonFile(filePath: string): JsonFileReadResult {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf8');
    } catch (error: unknown) {
        if (isMissingFileError(error)) return { status: 'missing' };
        return { status: 'unreadable', reason: toError(error).message };
    }
    try {
        return { status: 'ok', document: JSON.parse(content) };
    } catch (error: unknown) {
        return { status: 'unreadable', reason: `invalid JSON: ${toError(error).message}` };
    }
}

/**
 * Writes `data` as pretty JSON through `<file>.tmp` and a rename, so readers
 * see either the old file or the new one, never a partial write.
 */
export function writeJsonFileAtomic(filePath: string, data: unknown): void {
    const tmpPath = `${filePath}.tmp`;
    try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf8');
        fs.renameSync(tmpPath, filePath);
    } catch (error: unknown) {
        fs.rmSync(tmpPath, { force: true });
        throw new PersistenceError(`Failed to write ${filePath}`, toError(error));
    }
}

/**
 * Copies `filePath` to `target` without replacing an existing file. When
 * `target` is taken, `.1`, `.2`, ... are appended until a free name is found.
 * Returns the path written, or null when the source does not exist.
 */
export function copyFileIfExists(filePath: string, target: string): string | null {
    if (!fs.existsSync(filePath)) return null;
    for (let attempt = 0; ; attempt++) {
        const candidate = attempt === 0 ? target : `${target}.${attempt}`;
        try {
            fs.copyFileSync(filePath, candidate, fs.constants.COPYFILE_EXCL);
            return candidate;
        } catch (error: unknown) {
            if (errorCode(error) === 'EEXIST') continue;
            throw new PersistenceError(`Failed to copy ${filePath} to ${candidate}`, toError(error));
        }
    }
}
