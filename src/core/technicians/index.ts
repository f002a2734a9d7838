// src/core/technicians/index.ts

export * from './alias-table';
export * from './technician-resolver.service';
export * from './interfaces/services';
