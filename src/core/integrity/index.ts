// src/core/integrity/index.ts
export * from './integrity.service';
export * from './interfaces/services';
