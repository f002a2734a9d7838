// src/core/reporting/index.ts

// Export the service implementation
export * from './technician-report.service';

// Export interfaces
export * from './interfaces/services';
