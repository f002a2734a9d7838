// src/infrastructure/persistence/repositories/client-registry-file.repository.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import winston from 'winston';

import { StorageConfig } from '../../../config';
import { ClientRecord } from '../../../core/common/interfaces/models';
import { IClientRegistryRepository } from '../../../core/common/interfaces/repositories';
import { isPlainObject } from '../../../core/common/utils';
import { LOGGER_TOKEN } from '../../logger';
import { readJsonFile } from '../json-file.utils';
import { STORAGE_CONFIG_TOKEN } from '../tokens';

function optionalText(value: unknown): string | null {
    return typeof value === 'string' && value.trim() ? value.trim() : null;
}

/**
 * Accepts either a bare array of clients or `{ "clients": [...] }`.
 * Entries without a name are skipped.
 */
export function parseClientRegistry(document: unknown): ClientRecord[] {
    const entries: unknown[] = Array.isArray(document)
        ? document
        : isPlainObject(document) && Array.isArray(document.clients) ? document.clients : [];

    const clients: ClientRecord[] = [];
    for (const entry of entries) {
        if (!isPlainObject(entry)) continue;
        const name = optionalText(entry.name);
        if (!name) continue;
        clients.push({
            name,
            primaryTechnician: optionalText(entry.primaryTechnician),
            taxId: optionalText(entry.taxId),
        });
    }
    return clients;
}

/**
 * Reads the client registry file on every call; the registry is edited by
 * another part of the application and is small.
 */
@injectable()
export class ClientRegistryFileRepository implements IClientRegistryRepository {
    private readonly filePath: string;

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(STORAGE_CONFIG_TOKEN) storage: StorageConfig
    ) {
        this.filePath = storage.clientRegistryFile;
    }

    findAll(): ClientRecord[] {
        const result = readJsonFile(this.filePath);
        switch (result.status) {
            case 'missing':
                this.logger.warn(`Client registry not found at ${this.filePath}; continuing with an empty registry.`);
                return [];
            case 'unreadable':
                this.logger.warn(`Client registry at ${this.filePath} is unreadable (${result.reason}); continuing with an empty registry.`);
                return [];
            case 'ok':
                return parseClientRegistry(result.document);
        }
    }
}
