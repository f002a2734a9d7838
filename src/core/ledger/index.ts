// src/core/ledger/index.ts

export * from './ledger.service';
export * from './ledger-schema';
export * from './interfaces/services';
