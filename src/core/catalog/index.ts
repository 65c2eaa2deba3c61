// src/core/catalog/index.ts

// Export the service implementation
export * from './planning-catalog.service';

// Export interfaces and tokens
export * from './interfaces/services';
