// src/core/import/index.ts

export * from './import-deduplicator.service';
export * from './timesheet-import.service';
export * from './interfaces/services';
