// src/core/reporting/report-generator.service.ts
import ExcelJS, { Row, Workbook, Worksheet } from 'exceljs';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError } from '../common/errors';
import { TabularData } from '../common/interfaces/models';
import { CanonicalStore } from '../store';
import { BatchReport, IReportGeneratorService, WorkbookOptions } from './interfaces/services';

export const PRICE_LIST_SHEET = 'Listino';
export const OFFERS_SHEET = 'Offerte';
export const SUMMARY_SHEET = 'Riepilogo';

const CURRENCY_FORMAT = '#,##0.00';
export const UPDATED_CELL_ARGB = 'FFFFF2CC'; // light amber
export const INSERTED_ROW_ARGB = 'FFE2EFDA'; // light green

const SUMMARY_HEADERS = [
    'Batch', 'Processed', 'Updated', 'Unchanged', 'Inserted', 'Skipped', 'Ambiguous', 'Unmapped Fields'
];

@singleton()
@injectable()
export class ReportGeneratorService implements IReportGeneratorService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('ReportGeneratorService initialized.');
    }

    async generateWorkbook(store: CanonicalStore, options?: WorkbookOptions): Promise<Buffer> {
        this.logger.info(`Generating price list workbook (${store.size} rows)...`);
        const reports = options?.reports ?? [];
        try {
            const workbook = new ExcelJS.Workbook();
            this.setWorkbookProperties(workbook);
            this.createPriceListSheet(workbook, store, reports);
            if (options?.offers) {
                this.createOffersSheet(workbook, options.offers);
            }
            this.createSummarySheet(workbook, reports);

            const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
            this.logger.info('Excel workbook generated successfully.');
            return buffer;
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            this.logger.error('Failed to generate Excel workbook:', { message: err.message, stack: err.stack });
            if (error instanceof AppError) throw error;
            throw new AppError('ReportGenerationError', 'Failed to generate Excel workbook', 500, false);
        }
    }

    private setWorkbookProperties(workbook: Workbook): void {
        workbook.creator = 'Listino Reconciliation Service';
        workbook.created = new Date();
        workbook.modified = new Date();
    }

    private createPriceListSheet(workbook: Workbook, store: CanonicalStore, reports: readonly BatchReport[]): void {
        const sheet = workbook.addWorksheet(PRICE_LIST_SHEET);
        const headers = [...store.fields];
        this.styleHeaderRow(sheet.addRow(headers), headers);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        // Collect what the applied batches touched
        const changedCells = new Map<number, Set<string>>();
        const insertedRows = new Set<number>();
        for (const { report } of reports) {
            for (const outcome of report.outcomes) {
                if (outcome.kind === 'Inserted') {
                    insertedRows.add(outcome.rowIndex);
                } else if (outcome.kind === 'Updated' && outcome.changedFields.length > 0) {
                    const fields = changedCells.get(outcome.rowIndex) ?? new Set<string>();
                    outcome.changedFields.forEach(f => fields.add(f));
                    changedCells.set(outcome.rowIndex, fields);
                }
            }
        }

        for (const record of store.records()) {
            const row = sheet.addRow(headers.map(h => record.values[h]));
            if (insertedRows.has(record.rowIndex)) {
                for (let i = 1; i <= headers.length; i++) {
                    this.highlightCell(row, i, INSERTED_ROW_ARGB);
                }
                continue;
            }
            const changed = changedCells.get(record.rowIndex);
            if (changed) {
                headers.forEach((h, i) => {
                    if (changed.has(h)) this.highlightCell(row, i + 1, UPDATED_CELL_ARGB);
                });
            }
        }
        this.autoFitColumns(sheet, headers);
    }

    private createOffersSheet(workbook: Workbook, offers: TabularData): void {
        const sheet = workbook.addWorksheet(OFFERS_SHEET);
        this.styleHeaderRow(sheet.addRow(offers.fields), offers.fields);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        for (const values of offers.rows) {
            const row = sheet.addRow(values);
            values.forEach((value, i) => {
                if (typeof value === 'number') row.getCell(i + 1).numFmt = CURRENCY_FORMAT;
            });
        }
        this.autoFitColumns(sheet, offers.fields);
    }

    private createSummarySheet(workbook: Workbook, reports: readonly BatchReport[]): void {
        const sheet = workbook.addWorksheet(SUMMARY_SHEET);
        this.styleHeaderRow(sheet.addRow(SUMMARY_HEADERS), SUMMARY_HEADERS);

        for (const { label, report } of reports) {
            const s = report.summary;
            const row = sheet.addRow([
                label, s.processed, s.updated, s.unchanged, s.inserted, s.skipped, s.ambiguous,
                s.unmappedFields.join(', ')
            ]);
            for (let i = 2; i <= 7; i++) row.getCell(i).numFmt = '#,##0';
        }
        this.autoFitColumns(sheet, SUMMARY_HEADERS);
    }

    // --- Helper Methods ---
    private styleHeaderRow(row: Row, headers: string[]): void {
        for (let i = 1; i <= headers.length; i++) {
            const cell = row.getCell(i);
            cell.font = {
                bold: true,
                color: { argb: 'FFFFFFFF' }  // White text
            };
            cell.alignment = { vertical: 'middle', horizontal: 'center', wrapText: true };
            cell.fill = {
                type: 'pattern',
                pattern: 'solid',
                fgColor: { argb: 'FF1F4E79' }  // Dark Blue
            };
            cell.border = {
                top: { style: 'thin' },
                left: { style: 'thin' },
                bottom: { style: 'thin' },
                right: { style: 'thin' }
            };
        }
    }

    private highlightCell(row: Row, column: number, argb: string): void {
        row.getCell(column).fill = { type: 'pattern', pattern: 'solid', fgColor: { argb } };
    }

    /** Sizes columns from the header and the first rows of data */
    private autoFitColumns(sheet: Worksheet, headers: string[]): void {
        const scanRowCount = 21;
        headers.forEach((header, i) => {
            const column = sheet.getColumn(i + 1);
            let maxLength = header.length;
            column.eachCell({ includeEmpty: false }, (cell, rowNumber) => {
                if (rowNumber > scanRowCount) return;
                const value = cell.value;
                if (value !== null && value !== undefined) {
                    maxLength = Math.max(maxLength, String(value).length);
                }
            });
            column.width = Math.min(60, Math.max(12, maxLength + 4));
        });
    }
}
