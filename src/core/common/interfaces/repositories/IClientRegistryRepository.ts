// src/core/common/interfaces/repositories/IClientRegistryRepository.ts

import { ClientRecord } from '../models';

/**
 * Read-only access to the client registry maintained by the wider
 * application.
 */
export interface IClientRegistryRepository {
    /**
     * Returns every registry entry with a usable name.
     * A missing or unreadable registry yields an empty list.
     */
    findAll(): ClientRecord[];
}

export const CLIENT_REGISTRY_REPOSITORY_TOKEN = Symbol.for("IClientRegistryRepository");
