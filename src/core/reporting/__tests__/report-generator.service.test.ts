import ExcelJS, { Cell, Worksheet } from 'exceljs';
import { ReconciliationReport } from '../../common/interfaces/models';
import { CanonicalStore } from '../../store';
import { testLogger } from '../../../__tests__/fixtures';
import {
    INSERTED_ROW_ARGB, OFFERS_SHEET, PRICE_LIST_SHEET, ReportGeneratorService, SUMMARY_SHEET, UPDATED_CELL_ARGB
} from '../report-generator.service';

async function readBack(buffer: Buffer): Promise<ExcelJS.Workbook> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(buffer);
    return workbook;
}

function requireSheet(workbook: ExcelJS.Workbook, name: string): Worksheet {
    const sheet = workbook.getWorksheet(name);
    if (!sheet) throw new Error(`missing sheet ${name}`);
    return sheet;
}

function rowValues(sheet: Worksheet, rowNumber: number, width: number): unknown[] {
    const row = sheet.getRow(rowNumber);
    return Array.from({ length: width }, (_, i) => row.getCell(i + 1).value);
}

function fillColor(cell: Cell): string | undefined {
    const fill = cell.fill;
    return fill && fill.type === 'pattern' ? fill.fgColor?.argb : undefined;
}

describe('ReportGeneratorService', () => {
    const generator = new ReportGeneratorService(testLogger);

    const store = () => CanonicalStore.fromTable({
        headers: ['codice', 'prezzo di listino'],
        rows: [['A1', '1,20'], ['A2', '0,50'], ['N1', '3,00']],
    });

    const report: ReconciliationReport = {
        outcomes: [
            { kind: 'Updated', sourceRow: 0, rowIndex: 0, changedFields: ['prezzo di listino'] },
            { kind: 'Updated', sourceRow: 1, rowIndex: 1, changedFields: [] },
            { kind: 'Inserted', sourceRow: 2, rowIndex: 2 },
        ],
        warnings: [],
        summary: { processed: 3, updated: 1, unchanged: 1, inserted: 1, skipped: 0, ambiguous: 0, unmappedFields: ['iva'] },
    };

    it('writes the price list and the batch summary', async () => {
        const workbook = await readBack(await generator.generateWorkbook(store(), { reports: [{ label: 'acme.xlsx', report }] }));

        expect(workbook.worksheets.map(s => s.name)).toEqual([PRICE_LIST_SHEET, SUMMARY_SHEET]);

        const prices = requireSheet(workbook, PRICE_LIST_SHEET);
        expect(rowValues(prices, 1, 2)).toEqual(['codice', 'prezzo di listino']);
        expect(rowValues(prices, 2, 2)).toEqual(['A1', '1,20']);
        expect(prices.rowCount).toBe(4);

        const summary = requireSheet(workbook, SUMMARY_SHEET);
        expect(rowValues(summary, 2, 8)).toEqual(['acme.xlsx', 3, 1, 1, 1, 0, 0, 'iva']);
    });

    it('highlights changed cells and inserted rows', async () => {
        const workbook = await readBack(await generator.generateWorkbook(store(), { reports: [{ label: 'acme.xlsx', report }] }));
        const prices = requireSheet(workbook, PRICE_LIST_SHEET);

        expect(fillColor(prices.getRow(2).getCell(1))).toBeUndefined();
        expect(fillColor(prices.getRow(2).getCell(2))).toBe(UPDATED_CELL_ARGB);
        expect(fillColor(prices.getRow(3).getCell(2))).toBeUndefined();
        expect(fillColor(prices.getRow(4).getCell(1))).toBe(INSERTED_ROW_ARGB);
        expect(fillColor(prices.getRow(4).getCell(2))).toBe(INSERTED_ROW_ARGB);
    });

    it('adds the offers sheet when offers are given', async () => {
        const offers = {
            fields: ['codice', 'prezzo di listino', 'Sconto Offerta', 'Prezzo Promo'],
            rows: [['A1', 100, 10, 90], ['A3', 'su richiesta', null, null]],
        };

        const workbook = await readBack(await generator.generateWorkbook(store(), { offers }));

        expect(workbook.worksheets.map(s => s.name)).toEqual([PRICE_LIST_SHEET, OFFERS_SHEET, SUMMARY_SHEET]);
        const sheet = requireSheet(workbook, OFFERS_SHEET);
        expect(rowValues(sheet, 2, 4)).toEqual(['A1', 100, 10, 90]);
        expect(sheet.getRow(2).getCell(4).numFmt).toBe('#,##0.00');
        expect(rowValues(sheet, 3, 4)).toEqual(['A3', 'su richiesta', null, null]);
    });
});
