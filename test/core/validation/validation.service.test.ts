import { PlanningCatalogService } from '../../../src/core/catalog';
import { CatalogLoadError, InputError } from '../../../src/core/common/errors';
import { DecisionOutcome } from '../../../src/core/common/interfaces/models';
import { DecisionEngine } from '../../../src/core/decision';
import { FileParserService } from '../../../src/core/parsing';
import { ValidationService } from '../../../src/core/validation';
import logger from '../../../src/infrastructure/logger';
import { SpreadsheetRecordRepository } from '../../../src/infrastructure/spreadsheet/spreadsheet-record.repository';
import { MemoryCatalogSource } from '../../helpers/memory-catalog.source';
import { MemorySheetGateway } from '../../helpers/memory-sheet.gateway';
import { buildWorkbook } from '../../helpers/workbook';

const CATALOG = buildWorkbook([
    ['UF', 'NFe', 'Pedido', 'Planejamento', 'Categoria'],
    ['SP', 15733, 75710, '2025/maio', ''],
    ['RJ', 200, 300, '2025-07', ''],
    ['MG', 400, 500, 'sometime', ''],
    ['BA', 600, 700, '2025/06', 'Engineering-Network'],
]);

describe('ValidationService', () => {
    let source: MemoryCatalogSource;
    let gateway: MemorySheetGateway;
    let store: SpreadsheetRecordRepository;
    let service: ValidationService;

    function buildService(): ValidationService {
        const parser = new FileParserService(logger);
        return new ValidationService(
            logger,
            new PlanningCatalogService(logger, parser, source),
            new DecisionEngine(logger),
            store
        );
    }

    beforeEach(() => {
        source = new MemoryCatalogSource(CATALOG);
        gateway = MemorySheetGateway.withHeader();
        store = new SpreadsheetRecordRepository(logger, gateway);
        service = buildService();
    });

    it('opens the ticket once the planned month is reached and records it', async () => {
        const result = await service.validate(' sp ', '015733', '75710', '2025-05-20');

        expect(result).toEqual({
            region: 'SP',
            invoice: '15733',
            order: '75710',
            receivedDate: '2025-05-20',
            valid: true,
            plannedDate: '2025/maio',
            decision: DecisionOutcome.OPEN_NOW,
            message: 'Ticket can be opened now',
        });
        await expect(store.findByKey('SP', '15733')).resolves.toMatchObject({
            orderNumber: '75710',
            receivedDate: '2025-05-20',
            isValid: true,
            plannedDate: '2025-05-01',
            decision: DecisionOutcome.OPEN_NOW,
            message: 'Ticket can be opened now',
        });
    });

    it('reports a repeated validation as already registered', async () => {
        await service.validate('SP', '15733', '75710', '2025-05-20');
        const repeated = await service.validate('SP', '15733', '75710', '21/05/2025');

        expect(repeated.decision).toBe(DecisionOutcome.OPEN_NOW);
        expect(repeated.message).toBe('Ticket can be opened now; record already registered for this region and invoice');
        await expect(store.count()).resolves.toBe(1);
    });

    it('waits for the month close before the planned month', async () => {
        const result = await service.validate('RJ', '200', '300', '2025-06-15');

        expect(result).toMatchObject({
            valid: true,
            plannedDate: '2025-07',
            decision: DecisionOutcome.WAIT_FOR_MONTH_CLOSE,
            message: 'Open the ticket after the month close',
        });
        await expect(store.findByKey('RJ', '200')).resolves.toMatchObject({ plannedDate: '2025-07-01' });
    });

    it('does not record an unreadable planning token', async () => {
        const result = await service.validate('MG', '400', '500', '2025-05-20');

        expect(result).toMatchObject({
            valid: false,
            plannedDate: 'sometime',
            decision: DecisionOutcome.DATE_FORMAT_INVALID,
            message: 'Invalid date format',
        });
        await expect(store.count()).resolves.toBe(0);
    });

    it('does not record an unreadable received date', async () => {
        const result = await service.validate('SP', '15733', '75710', 'tomorrow');

        expect(result.decision).toBe(DecisionOutcome.DATE_FORMAT_INVALID);
        expect(result.valid).toBe(false);
        await expect(store.count()).resolves.toBe(0);
    });

    it('returns a catalog miss without recording', async () => {
        const result = await service.validate('SP', '1', '2', '2025-05-20');

        expect(result).toEqual({
            region: 'SP',
            invoice: '1',
            order: '2',
            receivedDate: '2025-05-20',
            valid: false,
            plannedDate: '',
            decision: '',
            message: 'Invoice not found in planning catalog',
        });
        await expect(store.count()).resolves.toBe(0);
    });

    describe('manual review categories', () => {
        it('records the review with the first day of the planned month', async () => {
            const result = await service.validate('BA', '600', '700', '2025-05-02');

            expect(result).toMatchObject({
                valid: true,
                decision: DecisionOutcome.MANUAL_REVIEW,
                message: 'Category requires manual review',
            });
            await expect(store.findByKey('BA', '600')).resolves.toMatchObject({
                receivedDate: '2025-05-02',
                plannedDate: '2025-06-01',
                decision: DecisionOutcome.MANUAL_REVIEW,
            });
        });

        it('skips the record when the received date is unreadable', async () => {
            const result = await service.validate('BA', '600', '700', 'next week');

            expect(result.decision).toBe(DecisionOutcome.MANUAL_REVIEW);
            expect(result.message).toBe('Category requires manual review; record could not be saved: unreadable received date');
            await expect(store.count()).resolves.toBe(0);
        });
    });

    it('reports a store failure in the message', async () => {
        gateway.failAppend = new Error('quota exceeded');

        const result = await service.validate('SP', '15733', '75710', '2025-05-20');

        expect(result.valid).toBe(true);
        expect(result.message).toBe('Ticket can be opened now; record could not be saved: Spreadsheet append failed: quota exceeded');
    });

    it.each([
        ['', '1', '2', '2025-05-20', 'All fields are required: region, invoice, order and received date'],
        ['SP', '1', '2', '   ', 'All fields are required: region, invoice, order and received date'],
        ['TOOLONG', '1', '2', '2025-05-20', 'Region must have at most 6 characters'],
        ['SP', '12a', '2', '2025-05-20', 'Invoice and order numbers must be non-negative integers'],
        ['SP', '1', '-2', '2025-05-20', 'Invoice and order numbers must be non-negative integers'],
    ])('rejects region %p invoice %p order %p date %p', async (region, invoice, order, receivedDate, message) => {
        const attempt = service.validate(region, invoice, order, receivedDate);

        await expect(attempt).rejects.toBeInstanceOf(InputError);
        await expect(attempt).rejects.toThrow(message);
        expect(source.reads).toBe(0);
    });

    it('propagates a catalog that cannot be loaded', async () => {
        source.content = null;
        await expect(service.validate('SP', '15733', '75710', '2025-05-20')).rejects.toBeInstanceOf(CatalogLoadError);
    });
});
