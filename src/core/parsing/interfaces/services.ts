// src/core/parsing/interfaces/services.ts
import { CellValue, RawTable } from '../../common/interfaces/models';

/** Options for reading one table out of an uploaded file */
export interface FileParsingOptions {
    sheetName?: string; // Specify sheet name for Excel; defaults to the first sheet
    headerRow?: number; // 0-based index of the header row among the sheet rows
}

/** Defines the contract for the File Parser Service */
export interface IFileParserService {
    /**
     * Parses a spreadsheet or delimited text file into a rectangular table.
     * @param fileBuffer - The buffer containing the file content.
     * @param fileName - Original file name; its extension selects the reader.
     * @param options - Optional sheet and header-row selection.
     * @returns A promise resolving to the table with distinct headers.
     * @throws {UnsupportedFormatError} for PDF and unknown extensions
     * @throws {FileParsingError} if the content cannot be read
     */
    parseTable(fileBuffer: Buffer, fileName: string, options?: FileParsingOptions): Promise<RawTable>;

    /** First rows of the sheet exactly as stored, for picking the header row. */
    previewRows(fileBuffer: Buffer, fileName: string, options?: Pick<FileParsingOptions, 'sheetName'>, limit?: number): CellValue[][];

    /** Sheet names of a workbook (a single entry for delimited text). */
    listSheets(fileBuffer: Buffer, fileName: string): string[];
}
