// src/core/matching/index.ts

export * from './company-matcher.service';
export * from './similarity.utils';
export * from './interfaces/services';
