// src/core/common/interfaces/repositories/IVerificationRecordRepository.ts

import {
    NewVerificationRecord,
    VerificationRecord,
    VerificationRecordFilter,
    VerificationRecordUpdate
} from '../models';

/**
 * Write handle passed to the work function of {@link IVerificationRecordRepository.withBatch}.
 */
export interface RecordBatchWriter {
    /**
     * Attempts one row inside the batch. A rejected row leaves the rest of the
     * batch usable.
     * @throws {DuplicateRecordError} If the key already exists in the store or earlier in the batch.
     * @throws {PersistenceError} For any other backend failure of this row.
     */
    create(record: NewVerificationRecord): Promise<VerificationRecord>;
}

/**
 * Defines the contract for data access operations on verification records.
 * (region, invoiceNumber) is unique across the store.
 */
export interface IVerificationRecordRepository {
    /**
     * @throws {DuplicateRecordError} On a (region, invoiceNumber) collision; never overwrites.
     * @throws {PersistenceError} If the backend is unreachable or rejects the write.
     */
    create(record: NewVerificationRecord): Promise<VerificationRecord>;

    findByKey(region: string, invoiceNumber: string): Promise<VerificationRecord | null>;

    findById(id: string): Promise<VerificationRecord | null>;

    /** Exact-match filter, newest first */
    list(filter?: VerificationRecordFilter, limit?: number): Promise<VerificationRecord[]>;

    /**
     * Changes only the supplied fields and refreshes updatedAt.
     * @returns The updated record, or null when the id is unknown.
     * @throws {DuplicateRecordError} If the change moves the record onto an existing key.
     */
    update(id: string, fields: VerificationRecordUpdate): Promise<VerificationRecord | null>;

    /** @returns false when the id is unknown */
    delete(id: string): Promise<boolean>;

    /** Every "REGION|invoice" key, read in one call */
    listKeys(): Promise<Set<string>>;

    count(): Promise<number>;

    /**
     * Runs `work` against a batch writer and commits (or flushes) once after it
     * returns. A failure to commit rejects with {@link PersistenceError}.
     */
    withBatch<T>(work: (writer: RecordBatchWriter) => Promise<T>): Promise<T>;
}

// Define a unique symbol token for DI registration
export const VERIFICATION_RECORD_REPOSITORY_TOKEN = Symbol.for('IVerificationRecordRepository');
