// src/core/catalog/interfaces/services.ts
import { PlanningEntry } from '../../common/interfaces/models';

/**
 * Where the planning catalog workbook lives.
 */
export interface ICatalogSource {
    /** Human-readable location, for logs */
    describe(): string;
    /**
     * Reads the raw catalog file.
     * @throws {CatalogLoadError} If the source is missing or unreadable.
     */
    read(): Promise<Buffer>;
    /** Replaces the catalog file */
    write(content: Buffer): Promise<void>;
}

export const CATALOG_SOURCE_TOKEN = Symbol.for('ICatalogSource');

/** Defines the contract for the Planning Catalog */
export interface IPlanningCatalog {
    /**
     * Exact match on the normalized (region, invoice, order) key.
     * Loads and caches the catalog on first use.
     * @returns The entry, or null when the catalog has no such key.
     * @throws {CatalogLoadError} If the catalog cannot be loaded.
     */
    lookup(region: string, invoiceNumber: string, orderNumber: string): Promise<PlanningEntry | null>;

    /** Drops the cached catalog; the next lookup reloads it. */
    invalidate(): void;

    /**
     * Validates and stores a new catalog file, then invalidates the cache.
     * @returns Number of entries in the new catalog.
     */
    replaceSource(content: Buffer): Promise<number>;

    /** Number of entries in the (loaded) catalog */
    size(): Promise<number>;
}
