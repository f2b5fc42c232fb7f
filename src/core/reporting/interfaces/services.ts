// src/core/reporting/interfaces/services.ts
import { ReconciliationReport, TabularData } from '../../common/interfaces/models';
import { CanonicalStore } from '../../store';

/** One applied supplier batch as it appears in the summary sheet */
export interface BatchReport {
    label: string; // usually the supplier file name
    report: ReconciliationReport;
}

/** Optional content of the exported workbook */
export interface WorkbookOptions {
    offers?: TabularData; // Adds the "Offerte" sheet
    reports?: readonly BatchReport[]; // Drives highlighting and the "Riepilogo" sheet
}

/** Defines the contract for the Report Generator Service */
export interface IReportGeneratorService {
    /**
     * Writes the reconciled price list (plus offers and batch summaries) as an .xlsx workbook.
     * @param store - The price list to export.
     * @param options - Offers and applied batch reports to include.
     * @returns A promise resolving to a Buffer containing the workbook.
     */
    generateWorkbook(store: CanonicalStore, options?: WorkbookOptions): Promise<Buffer>;
}
