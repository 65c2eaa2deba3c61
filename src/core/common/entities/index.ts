// src/core/common/entities/index.ts
export * from './verification-record.entity';
