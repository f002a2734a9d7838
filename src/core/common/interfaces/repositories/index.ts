// src/core/common/interfaces/repositories/index.ts

export * from './IClientRegistryRepository';
export * from './IImportReportRepository';
export * from './ILedgerRepository';
