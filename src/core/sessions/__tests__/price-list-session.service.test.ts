import ExcelJS from 'exceljs';
import { NotFoundError, ValidationError } from '../../common/errors';
import { ColumnMapping, RawTable } from '../../common/interfaces/models';
import { IMappingStore } from '../../common/interfaces/repositories';
import { ColumnMapperService, MappingResolverService } from '../../mapping';
import { RecordMatcherService } from '../../matching';
import { OfferGeneratorService } from '../../offers';
import { FileParserService } from '../../parsing';
import { ReconciliationService } from '../../reconciliation';
import { ReportGeneratorService } from '../../reporting';
import { testLogger, testVocabulary } from '../../../__tests__/fixtures';
import { PriceListSessionService } from '../price-list-session.service';
import { SupplierMappingRequest } from '../interfaces/services';

class InMemoryMappingStore implements IMappingStore {
    private readonly mappings = new Map<string, ColumnMapping>();

    async load(supplierId: string): Promise<ColumnMapping | null> {
        return this.mappings.get(supplierId) ?? null;
    }

    async save(supplierId: string, mapping: ColumnMapping): Promise<void> {
        this.mappings.set(supplierId, { ...mapping });
    }

    async list(): Promise<string[]> {
        return [...this.mappings.keys()].sort();
    }
}

const PRICE_LIST: RawTable = {
    headers: ['Codice', 'Descrizione', 'Prezzo'],
    rows: [['A1', 'Vite', '1,00'], ['A2', 'Dado', '0,50']],
};

const INTERNAL_MAPPING = { 'codice': 'Codice', 'Descrizione articolo': 'Descrizione', 'prezzo di listino': 'Prezzo' };

const SUPPLIER: RawTable = {
    headers: ['Cod.', 'Prezzo fornitore'],
    rows: [['A1', '1,50'], ['N1', '2,00']],
};

const CONFIRMED: SupplierMappingRequest = {
    source: 'confirmed',
    mapping: { 'codice': 'Cod.', 'prezzo di listino': 'Prezzo fornitore' },
};

describe('PriceListSessionService', () => {
    let mappingStore: InMemoryMappingStore;
    let columnMapper: ColumnMapperService;
    let service: PriceListSessionService;

    beforeEach(() => {
        mappingStore = new InMemoryMappingStore();
        columnMapper = new ColumnMapperService(testLogger, testVocabulary);
        service = new PriceListSessionService(
            testLogger,
            columnMapper,
            new MappingResolverService(testLogger, { acme: { 'Cod.': 'codice', 'Prezzo fornitore': 'costo' } }),
            new ReconciliationService(testLogger, new RecordMatcherService(testLogger)),
            new OfferGeneratorService(testLogger),
            new ReportGeneratorService(testLogger),
            new FileParserService(testLogger),
            mappingStore
        );
    });

    const open = () => service.openSession(PRICE_LIST, { sourceFile: 'listino.xlsx', internalMapping: INTERNAL_MAPPING });

    it('suggests the internal mapping of a price list', () => {
        expect(service.describePriceList(PRICE_LIST)).toEqual({
            columns: ['Codice', 'Descrizione', 'Prezzo'],
            suggested: INTERNAL_MAPPING,
            unresolved: ['Codice EAN', 'L', 'iva'],
        });
    });

    describe('openSession', () => {
        it('renames mapped headers to canonical fields', () => {
            const session = open();
            expect(session.fields).toEqual(['codice', 'Descrizione articolo', 'prezzo di listino']);
            expect(session.size).toBe(2);
            expect(service.getSession(session.id)).toMatchObject({ sourceFile: 'listino.xlsx', batches: [] });
        });

        it('rejects mappings to missing columns and renames that collide', () => {
            expect(() => service.openSession(PRICE_LIST, { sourceFile: 'x.xlsx', internalMapping: { codice: 'Cod' } }))
                .toThrow(ValidationError);

            const table = { headers: ['Codice', 'codice'], rows: [] };
            expect(() => service.openSession(table, { sourceFile: 'x.xlsx', internalMapping: { codice: 'Codice' } }))
                .toThrow('Price list mapping produces duplicate column names.');
        });
    });

    describe('applySupplier', () => {
        it('updates matched rows, inserts new ones and records the batch', async () => {
            const { id } = open();

            const report = await service.applySupplier(id, SUPPLIER, CONFIRMED, { label: 'acme.csv' });

            expect(report.outcomes).toEqual([
                { kind: 'Updated', sourceRow: 0, rowIndex: 0, changedFields: ['prezzo di listino'] },
                { kind: 'Inserted', sourceRow: 1, rowIndex: 2 },
            ]);
            expect(report.summary.unmappedFields).toEqual(['Descrizione articolo', 'costo', 'Codice EAN', 'marca', 'L', 'iva']);

            const session = service.getSession(id);
            expect(session.size).toBe(3);
            expect(session.batches).toEqual([{ label: 'acme.csv', summary: report.summary }]);
        });

        it('honours input fields, key overrides and row selection', async () => {
            const { id } = open();
            const table = { headers: ['Cod.', 'Descr', 'Prezzo fornitore'], rows: [['A1', 'Vite M4', '1,50'], ['N1', 'Nuovo', '2,00']] };
            const request: SupplierMappingRequest = {
                source: 'confirmed',
                mapping: { 'codice': 'Cod.', 'Descrizione articolo': 'Descr', 'prezzo di listino': 'Prezzo fornitore' },
            };

            const report = await service.applySupplier(id, table, request, {
                keys: ['codice'], inputFields: ['prezzo di listino'], selectedRows: [0],
            });

            expect(report.outcomes).toEqual([
                { kind: 'Updated', sourceRow: 0, rowIndex: 0, changedFields: ['prezzo di listino'] },
                { kind: 'Skipped', sourceRow: 1, reason: 'not-selected' },
            ]);
        });

        it('refuses to write a suggested mapping into the price list', async () => {
            const { id } = open();
            const table = { headers: ['Codice', 'Classe', 'Prezzo'], rows: [['A1', 'B', '1,50']] };

            await expect(service.applySupplier(id, table, { source: 'suggested' })).rejects.toThrow(ValidationError);
            await expect(service.applySupplierBatch(id, [], { source: 'suggested' })).rejects.toThrow(ValidationError);

            const offers = await service.generateOffers(id);
            expect(offers[0]).toMatchObject({ code: 'A1', price: 1 });
            expect(service.getSession(id).batches).toEqual([]);
        });

        it('fails when the saved source has nothing saved', async () => {
            const { id } = open();
            await expect(service.applySupplier(id, SUPPLIER, { source: 'saved', supplierId: 'nobody' }))
                .rejects.toThrow(NotFoundError);
            expect(service.getSession(id).size).toBe(2);
        });

        it('serialises concurrent writers on one session', async () => {
            const { id } = open();
            const newRow = { headers: ['Cod.', 'Prezzo fornitore'], rows: [['N9', '9,00']] };
            const request: SupplierMappingRequest = {
                source: 'confirmed',
                mapping: { 'codice': 'Cod.', 'prezzo di listino': 'Prezzo fornitore' },
            };

            const reports = await Promise.all([
                service.applySupplier(id, newRow, request),
                service.applySupplier(id, newRow, request),
            ]);

            expect(reports.map(r => r.summary.inserted).reduce((a, b) => a + b, 0)).toBe(1);
            expect(service.getSession(id).size).toBe(3);
        });
    });

    describe('previewSupplier', () => {
        it('reports updates and inserts without changing the session', async () => {
            const { id } = open();

            const preview = await service.previewSupplier(id, SUPPLIER, CONFIRMED);

            expect(preview.updates.map(r => r.values['codice'])).toEqual(['A1']);
            expect(preview.inserts.map(r => r.values['codice'])).toEqual(['N1']);
            expect(service.getSession(id)).toMatchObject({ size: 2, batches: [] });
        });
    });

    describe('resolveSupplierMapping', () => {
        it('saves a confirmed mapping and reuses it as the saved one', async () => {
            await service.resolveSupplierMapping(SUPPLIER, { ...CONFIRMED, supplierId: 'acme', save: true });

            await expect(mappingStore.load('acme')).resolves.toEqual({ 'codice': 'Cod.', 'prezzo di listino': 'Prezzo fornitore' });
            await expect(service.resolveSupplierMapping(SUPPLIER, { source: 'saved', supplierId: 'acme' }))
                .resolves.toEqual({ 'codice': 'Cod.', 'prezzo di listino': 'Prezzo fornitore' });
        });

        it('needs a supplier id to save', async () => {
            await expect(service.resolveSupplierMapping(SUPPLIER, { ...CONFIRMED, save: true })).rejects.toThrow(ValidationError);
        });

        it('rejects the saved source when nothing is saved', async () => {
            await expect(service.resolveSupplierMapping(SUPPLIER, { source: 'saved', supplierId: 'nobody' }))
                .rejects.toThrow('No saved mapping for supplier "nobody".');
        });

        it('applies built-in dictionaries and rejects unknown ones', async () => {
            await expect(service.resolveSupplierMapping(SUPPLIER, { source: 'static', supplierId: 'acme' }))
                .resolves.toEqual({ codice: 'Cod.', costo: 'Prezzo fornitore' });
            await expect(service.resolveSupplierMapping(SUPPLIER, { source: 'static', supplierId: 'other' }))
                .rejects.toThrow(NotFoundError);
        });

        it('drops saved entries whose column is gone', async () => {
            await mappingStore.save('acme', { 'codice': 'Cod.', 'marca': 'Brand' });
            await expect(service.resolveSupplierMapping(SUPPLIER, { source: 'saved', supplierId: 'acme' }))
                .resolves.toEqual({ codice: 'Cod.' });
        });
    });

    it('describes a supplier table with every known mapping', async () => {
        const { id } = open();
        await mappingStore.save('acme', { codice: 'Cod.' });

        const description = await service.describeSupplierTable(id, SUPPLIER, 'acme');

        expect(description.columns).toEqual(['Cod.', 'Prezzo fornitore']);
        expect(description.suggested).toEqual(columnMapper.suggestMapping(SUPPLIER.headers, 'supplier'));
        expect(description.saved).toEqual({ codice: 'Cod.' });
        expect(description.static).toEqual({ codice: 'Cod.', costo: 'Prezzo fornitore' });
        expect(description.staticMappings).toEqual(['acme']);
    });

    describe('applySupplierBatch', () => {
        it('applies files in upload order and reports failures per file', async () => {
            const { id } = open();
            const files = [
                { fileName: 'a.csv', buffer: Buffer.from('Cod.,Prezzo fornitore\nN1,"5,00"\n') },
                { fileName: 'b.pdf', buffer: Buffer.from('%PDF-1.4') },
                { fileName: 'c.csv', buffer: Buffer.from('Cod.,Prezzo fornitore\nN1,"6,00"\n') },
            ];

            const results = await service.applySupplierBatch(id, files, CONFIRMED);

            expect(results.map(r => [r.fileName, r.status])).toEqual([
                ['a.csv', 'applied'], ['b.pdf', 'failed'], ['c.csv', 'applied'],
            ]);
            const last = results[2];
            expect(last.status === 'applied' && last.report.outcomes).toEqual([
                { kind: 'Updated', sourceRow: 0, rowIndex: 2, changedFields: ['prezzo di listino'] },
            ]);
            expect(service.getSession(id).batches.map(b => b.label)).toEqual(['a.csv', 'c.csv']);
            expect(service.getSession(id).size).toBe(3);
        });
    });

    it('generates offers from the session price list', async () => {
        const { id } = open();
        const offers = await service.generateOffers(id, { discountRate: 0.1 });
        expect(offers[0]).toMatchObject({ code: 'A1', price: 1, discount: 0.1, promoPrice: 0.9 });
    });

    it('exports the session as a workbook', async () => {
        const { id } = open();
        await service.applySupplier(id, SUPPLIER, CONFIRMED, { label: 'acme.csv' });

        const buffer = await service.exportWorkbook(id, { includeOffers: true });
        const workbook = new ExcelJS.Workbook();
        await workbook.xlsx.load(buffer);

        expect(workbook.worksheets.map(s => s.name)).toEqual(['Listino', 'Offerte', 'Riepilogo']);
        expect(workbook.getWorksheet('Riepilogo')?.getRow(2).getCell(1).value).toBe('acme.csv');
    });

    it('lists suppliers with a saved mapping', async () => {
        await mappingStore.save('beta', { codice: 'Cod.' });
        await mappingStore.save('acme', { codice: 'Cod.' });
        await expect(service.listSavedMappings()).resolves.toEqual(['acme', 'beta']);
    });

    describe('session expiry', () => {
        const TTL_MS = 120 * 60_000;

        afterEach(() => {
            jest.restoreAllMocks();
        });

        it('keeps sessions that are used within the idle limit', () => {
            const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
            const { id } = open();

            now.mockReturnValue(1_000_000 + TTL_MS);
            expect(service.getSession(id).id).toBe(id);

            now.mockReturnValue(1_000_000 + 2 * TTL_MS);
            expect(service.getSession(id).id).toBe(id);
        });

        it('drops sessions idle past the limit', () => {
            const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
            const { id } = open();

            now.mockReturnValue(1_000_000 + TTL_MS + 1);
            expect(() => service.getSession(id)).toThrow(NotFoundError);
        });

        it('sweeps idle sessions when a new one opens', () => {
            const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
            const stale = open();

            now.mockReturnValue(1_000_000 + TTL_MS + 1);
            open();

            now.mockReturnValue(1_000_000);
            expect(() => service.getSession(stale.id)).toThrow(NotFoundError);
        });
    });

    it('forgets closed sessions', () => {
        const { id } = open();
        service.closeSession(id);
        expect(() => service.getSession(id)).toThrow(NotFoundError);
        expect(() => service.closeSession(id)).toThrow(NotFoundError);
    });
});
