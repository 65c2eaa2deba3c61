// src/core/importing/index.ts

// Export the service implementation
export * from './batch-importer.service';
export * from './import-row.utils';

// Export interfaces
export * from './interfaces/services';
