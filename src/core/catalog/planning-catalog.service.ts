// src/core/catalog/planning-catalog.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { CatalogLoadError } from '../common/errors';
import { PlanningEntry } from '../common/interfaces/models';
import {
    catalogKey,
    cellToText,
    excelSerialDateToJSDate,
    normalizeDocumentNumber,
    normalizeRegion
} from '../common/normalization.utils';
import { errorMessage } from '../common/utils';
import { FileParserService, HeaderMap, ParsedTable } from '../parsing';
import { CATALOG_SOURCE_TOKEN, ICatalogSource, IPlanningCatalog } from './interfaces/services';

export type CatalogField = 'region' | 'invoiceNumber' | 'orderNumber' | 'planningToken' | 'category';

const REQUIRED_FIELDS: readonly CatalogField[] = ['region', 'invoiceNumber', 'orderNumber', 'planningToken'];

export const CATALOG_HEADER_MAP: HeaderMap<CatalogField> = {
    'uf': 'region', 'region': 'region', 'region code': 'region',
    'nfe': 'invoiceNumber', 'nf': 'invoiceNumber', 'nota': 'invoiceNumber',
    'invoice': 'invoiceNumber', 'invoice number': 'invoiceNumber', 'invoicenumber': 'invoiceNumber',
    'pedido': 'orderNumber', 'order': 'orderNumber', 'order number': 'orderNumber', 'ordernumber': 'orderNumber',
    'planejamento': 'planningToken', 'planning': 'planningToken', 'planning token': 'planningToken', 'planningtoken': 'planningToken',
    'categoria': 'category', 'category': 'category',
};

interface CatalogSnapshot {
    readonly entries: ReadonlyMap<string, PlanningEntry>;
}

@singleton()
@injectable()
export class PlanningCatalogService implements IPlanningCatalog {

    // Replaced wholesale on invalidation; readers keep whichever promise they already hold
    private snapshot: Promise<CatalogSnapshot> | null = null;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(FileParserService) private fileParser: FileParserService,
        @inject(CATALOG_SOURCE_TOKEN) private source: ICatalogSource
    ) {
        this.logger.info(`PlanningCatalogService initialized (source: ${this.source.describe()}).`);
    }

    async lookup(region: string, invoiceNumber: string, orderNumber: string): Promise<PlanningEntry | null> {
        const normalizedRegion = normalizeRegion(region);
        const normalizedInvoice = normalizeDocumentNumber(invoiceNumber);
        const normalizedOrder = normalizeDocumentNumber(orderNumber);

        const { entries } = await this.getSnapshot();
        if (!normalizedRegion || !normalizedInvoice || !normalizedOrder) {
            return null;
        }
        const entry = entries.get(catalogKey(normalizedRegion, normalizedInvoice, normalizedOrder)) ?? null;
        this.logger.debug(`Catalog lookup ${normalizedRegion}/${normalizedInvoice}/${normalizedOrder}: ${entry ? 'hit' : 'miss'}`);
        return entry;
    }

    invalidate(): void {
        this.logger.info('Planning catalog cache invalidated.');
        this.snapshot = null;
    }

    async replaceSource(content: Buffer): Promise<number> {
        // Refuse to replace a working catalog with one that cannot be loaded
        const candidate = await this.buildSnapshot(content);
        try {
            await this.source.write(content);
        } catch (error: unknown) {
            throw new CatalogLoadError(`Failed to store the new catalog at ${this.source.describe()}`, error instanceof Error ? error : undefined);
        }
        this.invalidate();
        this.logger.info(`Planning catalog replaced with ${candidate.entries.size} entries.`);
        return candidate.entries.size;
    }

    async size(): Promise<number> {
        const { entries } = await this.getSnapshot();
        return entries.size;
    }

    private getSnapshot(): Promise<CatalogSnapshot> {
        if (this.snapshot) {
            return this.snapshot;
        }
        const loading = this.load();
        this.snapshot = loading;
        // A failed load is not cached; the next lookup retries
        loading.catch(() => {
            if (this.snapshot === loading) {
                this.snapshot = null;
            }
        });
        return loading;
    }

    private async load(): Promise<CatalogSnapshot> {
        this.logger.info(`Loading planning catalog from ${this.source.describe()}...`);
        const content = await this.source.read();
        const snapshot = await this.buildSnapshot(content);
        this.logger.info(`Planning catalog loaded: ${snapshot.entries.size} entries.`);
        return snapshot;
    }

    private async buildSnapshot(content: Buffer): Promise<CatalogSnapshot> {
        let table: ParsedTable<CatalogField>;
        try {
            table = await this.fileParser.parseTable(content, CATALOG_HEADER_MAP, { sheetName: config.catalog.sheetName });
        } catch (error: unknown) {
            this.logger.error(`Failed to parse planning catalog: ${errorMessage(error)}`);
            if (error instanceof CatalogLoadError) throw error;
            throw new CatalogLoadError('Planning catalog could not be read', error instanceof Error ? error : undefined);
        }

        const missing = REQUIRED_FIELDS.filter(field => !table.matchedFields.has(field));
        if (missing.length > 0) {
            throw new CatalogLoadError(`Planning catalog is missing required columns: ${missing.join(', ')} (found: ${table.headers.join(', ')})`);
        }

        const entries = new Map<string, PlanningEntry>();
        let skipped = 0;
        for (const row of table.rows) {
            const region = normalizeRegion(row.values.region);
            const invoiceNumber = normalizeDocumentNumber(row.values.invoiceNumber);
            const orderNumber = normalizeDocumentNumber(row.values.orderNumber);
            const rawToken = row.values.planningToken;
            // A date-formatted planning cell arrives as an Excel serial number
            const serialDate = typeof rawToken === 'number' ? excelSerialDateToJSDate(rawToken) : null;
            const planningToken = serialDate ? cellToText(serialDate) : cellToText(rawToken);

            if (!region || !invoiceNumber || !orderNumber || !planningToken) {
                skipped++;
                this.logger.warn(`Skipping catalog line ${row.originalLineNumber}: incomplete or invalid key/planning values.`);
                continue;
            }

            const key = catalogKey(region, invoiceNumber, orderNumber);
            if (entries.has(key)) {
                skipped++;
                this.logger.warn(`Skipping catalog line ${row.originalLineNumber}: duplicate key ${key}.`);
                continue;
            }

            const category = cellToText(row.values.category);
            entries.set(key, {
                region,
                invoiceNumber,
                orderNumber,
                planningToken,
                category: category.length > 0 ? category : undefined,
                originalLineNumber: row.originalLineNumber,
            });
        }
        if (skipped > 0) {
            this.logger.warn(`Planning catalog: skipped ${skipped} line(s).`);
        }
        return { entries };
    }
}
