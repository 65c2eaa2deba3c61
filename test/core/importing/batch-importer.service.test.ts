import { FileParsingError } from '../../../src/core/common/errors';
import { DecisionOutcome } from '../../../src/core/common/interfaces/models';
import { BatchImporterService, ImportRow } from '../../../src/core/importing';
import { FileParserService } from '../../../src/core/parsing';
import logger from '../../../src/infrastructure/logger';
import { SpreadsheetRecordRepository } from '../../../src/infrastructure/spreadsheet/spreadsheet-record.repository';
import { MemorySheetGateway } from '../../helpers/memory-sheet.gateway';
import { newRecord } from '../../helpers/records';
import { csv } from '../../helpers/workbook';

const MIXED_ROWS: ImportRow[] = [
    { region: 'sp', invoiceNumber: '15733', orderNumber: '75710', receivedDate: '2025-05-20' },
    { region: 'SP', invoiceNumber: 15733, orderNumber: '1', receivedDate: '2025-05-21' },
    { region: 'TOOLONGX', invoiceNumber: '1', orderNumber: '2', receivedDate: '2025-05-20' },
    { region: 'RJ', invoiceNumber: '200', orderNumber: 'x', receivedDate: '2025-05-20' },
    { region: 'RJ', invoiceNumber: '201', orderNumber: '300', receivedDate: 'soon' },
    {
        region: 'MG', invoiceNumber: '400', orderNumber: '500', receivedDate: 45797,
        plannedDate: '2025/maio', decision: 'OpenNow', message: 'ok', valid: 'não',
    },
    { region: 'BA', invoiceNumber: '600', orderNumber: '700', receivedDate: '2025-05-20', decision: 'Maybe' },
];

function rowsFor(count: number): ImportRow[] {
    return Array.from({ length: count }, (_, index) => ({
        region: 'SP',
        invoiceNumber: String(index + 1),
        orderNumber: '10',
        receivedDate: '2025-05-20',
    }));
}

describe('BatchImporterService', () => {
    let gateway: MemorySheetGateway;
    let store: SpreadsheetRecordRepository;
    let importer: BatchImporterService;

    beforeEach(() => {
        gateway = MemorySheetGateway.withHeader();
        store = new SpreadsheetRecordRepository(logger, gateway);
        importer = new BatchImporterService(logger, new FileParserService(logger), store);
    });

    it('imports valid rows and reports the rest', async () => {
        const summary = await importer.importRows(MIXED_ROWS);

        expect(summary).toEqual({
            total: 7,
            imported: 2,
            skipped: 1,
            failed: 4,
            importedKeys: ['SP|15733', 'MG|400'],
            failures: [
                { line: 3, key: undefined, reason: 'invalid region "TOOLONGX"' },
                { line: 4, key: 'RJ|200', reason: 'invalid order number "x"' },
                { line: 5, key: 'RJ|201', reason: 'invalid received date "soon"' },
                { line: 7, key: 'BA|600', reason: 'unknown decision "Maybe"' },
            ],
        });
    });

    it('stores normalized values with column defaults', async () => {
        await importer.importRows(MIXED_ROWS);

        await expect(store.findByKey('SP', '15733')).resolves.toMatchObject({
            orderNumber: '75710',
            receivedDate: '2025-05-20',
            isValid: true,
            plannedDate: null,
            decision: '',
            message: '',
        });
        await expect(store.findByKey('MG', '400')).resolves.toMatchObject({
            receivedDate: '2025-05-20',
            isValid: false,
            plannedDate: '2025-05-01',
            decision: DecisionOutcome.OPEN_NOW,
            message: 'ok',
        });
    });

    it('skips everything already stored on a second run', async () => {
        await importer.importRows(MIXED_ROWS);
        const second = await importer.importRows(MIXED_ROWS);

        expect(second).toMatchObject({ total: 7, imported: 0, skipped: 3, failed: 4, importedKeys: [] });
        await expect(store.count()).resolves.toBe(2);
    });

    it('skips keys present in the store before the run', async () => {
        await store.create(newRecord());

        const summary = await importer.importRows([
            { region: 'SP', invoiceNumber: '15733', orderNumber: '1', receivedDate: '2025-06-01' },
        ]);
        expect(summary).toMatchObject({ imported: 0, skipped: 1, failed: 0 });
        await expect(store.findByKey('SP', '15733')).resolves.toMatchObject({ orderNumber: '75710' });
    });

    it('commits once per batch', async () => {
        gateway.calls.length = 0;

        const summary = await importer.importRows(rowsFor(5), { batchSize: 2 });

        expect(summary.imported).toBe(5);
        expect(gateway.calls.filter(call => call === 'append')).toHaveLength(3);
    });

    it('fails the rows of a batch that could not be committed', async () => {
        gateway.failAppend = new Error('quota exceeded');

        const summary = await importer.importRows(rowsFor(2));

        const reason = 'batch could not be committed: Spreadsheet batch append failed: quota exceeded';
        expect(summary).toEqual({
            total: 2,
            imported: 0,
            skipped: 0,
            failed: 2,
            importedKeys: [],
            failures: [
                { line: 1, key: 'SP|1', reason },
                { line: 2, key: 'SP|2', reason },
            ],
        });
    });

    it('rejects a batch size below one', async () => {
        await expect(importer.importRows(rowsFor(1), { batchSize: 0 })).rejects.toThrow(RangeError);
    });

    describe('importFile', () => {
        it('maps headers and reports file line numbers', async () => {
            const summary = await importer.importFile(csv([
                'UF,NFe,Pedido,Data Recebimento,Valido',
                'SP,015733,75710,20/05/2025,sim',
                'RJ,abc,1,2025-05-01,',
                ',,,,',
            ]));

            expect(summary).toEqual({
                total: 2,
                imported: 1,
                skipped: 0,
                failed: 1,
                importedKeys: ['SP|15733'],
                failures: [{ line: 3, key: undefined, reason: 'invalid invoice number "abc"' }],
            });
            await expect(store.findByKey('SP', '15733')).resolves.toMatchObject({ receivedDate: '2025-05-20', isValid: true });
        });

        it('refuses a file without the required columns', async () => {
            const attempt = importer.importFile(csv(['UF,NFe,Data Recebimento', 'SP,1,2025-05-01']));

            await expect(attempt).rejects.toBeInstanceOf(FileParsingError);
            await expect(attempt).rejects.toThrow('Import file is missing required columns: orderNumber (found: UF, NFe, Data Recebimento)');
        });
    });
});
