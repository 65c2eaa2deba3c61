// src/core/reporting/index.ts

// Export the service implementation
export * from './report-generator.service';

// Export interfaces
export * from './interfaces/services';
