import { PlanningCatalogService } from '../../../src/core/catalog';
import { CatalogLoadError } from '../../../src/core/common/errors';
import { FileParserService } from '../../../src/core/parsing';
import logger from '../../../src/infrastructure/logger';
import { MemoryCatalogSource } from '../../helpers/memory-catalog.source';
import { buildWorkbook, csv } from '../../helpers/workbook';

const HEADER = ['UF', 'NFe', 'Pedido', 'Planejamento', 'Categoria'];

function catalogWith(...rows: unknown[][]): Buffer {
    return buildWorkbook([HEADER, ...rows]);
}

describe('PlanningCatalogService', () => {
    let source: MemoryCatalogSource;
    let catalog: PlanningCatalogService;

    beforeEach(() => {
        source = new MemoryCatalogSource(catalogWith(
            ['SP', 15733, 75710, '2025/maio', ''],
            ['rj', '200', '300', '2025-07', 'Engineering-Network'],
        ));
        catalog = new PlanningCatalogService(logger, new FileParserService(logger), source);
    });

    it('finds entries by normalized keys', async () => {
        await expect(catalog.lookup(' sp ', '015733', '75710')).resolves.toEqual({
            region: 'SP',
            invoiceNumber: '15733',
            orderNumber: '75710',
            planningToken: '2025/maio',
            category: undefined,
            originalLineNumber: 2,
        });
        const withCategory = await catalog.lookup('RJ', '200', '300');
        expect(withCategory?.category).toBe('Engineering-Network');
    });

    it('returns null on a miss or unusable keys', async () => {
        await expect(catalog.lookup('SP', '15733', '1')).resolves.toBeNull();
        await expect(catalog.lookup('SP', 'abc', '75710')).resolves.toBeNull();
    });

    it('loads once for concurrent and repeated lookups', async () => {
        await Promise.all([
            catalog.lookup('SP', '15733', '75710'),
            catalog.lookup('RJ', '200', '300'),
            catalog.size(),
        ]);
        await catalog.lookup('SP', '15733', '75710');
        expect(source.reads).toBe(1);
    });

    it('reloads after invalidation', async () => {
        await expect(catalog.size()).resolves.toBe(2);
        source.content = catalogWith(['MG', 1, 2, '2025-01', '']);
        await expect(catalog.size()).resolves.toBe(2);

        catalog.invalidate();
        await expect(catalog.lookup('MG', '1', '2')).resolves.not.toBeNull();
        await expect(catalog.lookup('SP', '15733', '75710')).resolves.toBeNull();
        expect(source.reads).toBe(2);
    });

    it('does not cache a failed load', async () => {
        source.content = null;
        await expect(catalog.size()).rejects.toBeInstanceOf(CatalogLoadError);

        source.content = catalogWith(['SP', 1, 2, '2025-01', '']);
        await expect(catalog.size()).resolves.toBe(1);
    });

    it('fails when a required column is missing', async () => {
        source.content = buildWorkbook([['UF', 'NFe', 'Planejamento'], ['SP', 1, '2025-01']]);
        await expect(catalog.lookup('SP', '1', '2')).rejects.toThrow(
            'Planning catalog is missing required columns: orderNumber (found: UF, NFe, Planejamento)'
        );
    });

    it('skips invalid and repeated rows, keeping the first', async () => {
        source.content = catalogWith(
            ['SP', 'abc', 1, '2025-01', ''],
            ['SP', 2, 3, '', ''],
            ['TOOLONG', 4, 5, '2025-01', ''],
            ['SP', 6, 7, '2025-02', ''],
            ['SP', 6, 7, '2025-09', ''],
        );
        await expect(catalog.size()).resolves.toBe(1);
        const entry = await catalog.lookup('SP', '6', '7');
        expect(entry?.planningToken).toBe('2025-02');
        expect(entry?.originalLineNumber).toBe(5);
    });

    it('reads date-formatted planning cells as ISO dates', async () => {
        source.content = catalogWith(['SP', 1, 2, 45778, '']);
        const entry = await catalog.lookup('SP', '1', '2');
        expect(entry?.planningToken).toBe('2025-05-01');
    });

    it('accepts CSV catalogs', async () => {
        source.content = csv(['uf,nfe,pedido,planejamento', 'BA,10,20,2025/junho']);
        await expect(catalog.lookup('BA', '10', '20')).resolves.toMatchObject({ planningToken: '2025/junho' });
    });

    describe('replaceSource', () => {
        it('stores a valid catalog and serves it on the next lookup', async () => {
            await catalog.size();
            const replacement = catalogWith(['PR', 9, 8, '2025-03', '']);

            await expect(catalog.replaceSource(replacement)).resolves.toBe(1);
            expect(source.content).toBe(replacement);
            await expect(catalog.lookup('PR', '9', '8')).resolves.not.toBeNull();
        });

        it('keeps the current catalog when the new one cannot be loaded', async () => {
            const original = source.content;
            await expect(catalog.replaceSource(csv(['not a catalog']))).rejects.toBeInstanceOf(CatalogLoadError);
            expect(source.content).toBe(original);
            await expect(catalog.size()).resolves.toBe(2);
        });
    });
});
