// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';

/**
 * Generates a unique Version 4 UUID.
 * @returns A unique identifier string.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/**
 * Pauses execution for the given duration.
 * @param ms Milliseconds to sleep.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/** Message of an unknown thrown value, for logs and result annotations */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/** Splits a list into consecutive chunks of at most `size` items */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    if (size < 1) {
        throw new RangeError(`Chunk size must be at least 1, got ${size}`);
    }
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}
