// src/core/decision/index.ts

// Export the service implementation
export * from './decision-engine.service';

// Export interfaces
export * from './interfaces/services';

// Export the date helpers used by validation and import
export * from './date-parser.utils';
