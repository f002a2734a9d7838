// src/core/common/interfaces/repositories/ILedgerRepository.ts

import { Ledger } from '../models';

export type LedgerFileReadResult =
    | { readonly status: 'missing' }
    | { readonly status: 'ok'; readonly document: unknown }
    | { readonly status: 'unreadable'; readonly reason: string };

/**
 * Defines the contract for the single file the ledger lives in.
 * All calls are synchronous: a ledger mutation is read-modify-persist
 * inside one request and must not yield half way.
 */
export interface ILedgerRepository {
    /** Absolute location, for logs and messages */
    readonly location: string;

    /**
     * Reads the raw persisted document without interpreting its shape.
     */
    read(): LedgerFileReadResult;

    /**
     * Replaces the file atomically (temporary file, then rename).
     * @throws {PersistenceError} If the file system refuses the write.
     */
    write(ledger: Ledger): void;

    /**
     * Copies the current file to a timestamped sibling.
     * @returns The backup path, or null when there is no file to copy.
     * @throws {PersistenceError} If the copy fails.
     */
    backup(): string | null;
}

// Define a unique symbol token for DI registration
export const LEDGER_REPOSITORY_TOKEN = Symbol.for("ILedgerRepository");
