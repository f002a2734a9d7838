// src/infrastructure/persistence/tokens.ts

/** Injects the `StorageConfig` section with the file locations */
export const STORAGE_CONFIG_TOKEN = Symbol.for('StorageConfig');
