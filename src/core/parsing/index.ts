// src/core/parsing/index.ts

// Export the service implementation
export * from './timesheet-parser.service';

// Export interfaces
export * from './interfaces/services';
