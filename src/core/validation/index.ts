// src/core/validation/index.ts

// Export the service implementation
export * from './validation.service';

// Export interfaces
export * from './interfaces/services';
