// src/core/parsing/file-parser.service.ts
import 'reflect-metadata'; // DI requirement
import path from 'path';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import * as XLSX from 'xlsx';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError, FileParsingError, UnsupportedFormatError } from '../common/errors';
import { CellValue, RawTable } from '../common/interfaces/models';
import { normalizeCell } from '../normalization';
import { FileParsingOptions, IFileParserService } from './interfaces/services';

export const PREVIEW_ROW_LIMIT = 15;

const WORKBOOK_EXTENSIONS = ['.xlsx', '.xls', '.xlsm'];
const TEXT_EXTENSIONS = ['.csv', '.txt'];

/** Blank headers become "Unnamed: <i>", repeats get ".1", ".2", ... */
function cleanHeaders(cells: readonly CellValue[]): string[] {
    const used = new Set<string>();
    const nextSuffix = new Map<string, number>();
    return cells.map((cell, i) => {
        const base = (cell ?? '').trim() || `Unnamed: ${i}`;
        let name = base;
        if (used.has(name)) {
            let suffix = nextSuffix.get(base) ?? 1;
            while (used.has(`${base}.${suffix}`)) suffix++;
            name = `${base}.${suffix}`;
            nextSuffix.set(base, suffix + 1);
        }
        used.add(name);
        return name;
    });
}

function isEmptyRow(row: readonly CellValue[]): boolean {
    return row.every(cell => cell === null || cell.trim() === '');
}

function padRow(row: readonly CellValue[], width: number): CellValue[] {
    const padded = row.slice(0, width);
    while (padded.length < width) padded.push(null);
    return padded;
}

@singleton()
@injectable()
export class FileParserService implements IFileParserService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('FileParserService initialized.');
    }

    async parseTable(fileBuffer: Buffer, fileName: string, options?: FileParsingOptions): Promise<RawTable> {
        this.logger.info(`Attempting to parse "${fileName}"${options?.sheetName ? ` (sheet "${options.sheetName}")` : ''}`);
        try {
            const matrix = this.readMatrix(fileBuffer, fileName, options?.sheetName);
            const headerRow = options?.headerRow ?? 0;
            if (matrix.length === 0) {
                this.logger.warn(`"${fileName}" contains no rows.`);
                return { headers: [], rows: [] };
            }
            if (!Number.isInteger(headerRow) || headerRow < 0 || headerRow >= matrix.length) {
                throw new FileParsingError(`Header row ${headerRow} is outside the ${matrix.length} rows of "${fileName}".`);
            }

            const dataRows = matrix.slice(headerRow + 1).filter(row => !isEmptyRow(row));
            const width = dataRows.reduce((max, row) => Math.max(max, row.length), matrix[headerRow].length);
            const headers = cleanHeaders(padRow(matrix[headerRow], width));
            const rows = dataRows.map(row => padRow(row, width));

            this.logger.info(`Parsed ${rows.length} rows x ${headers.length} columns from "${fileName}".`);
            return { headers, rows };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(`File parsing failed: ${message}`);
            if (error instanceof AppError) { // Keep specific errors
                throw error;
            }
            throw new FileParsingError(`Failed to parse "${fileName}"`, error instanceof Error ? error : undefined);
        }
    }

    previewRows(
        fileBuffer: Buffer,
        fileName: string,
        options?: Pick<FileParsingOptions, 'sheetName'>,
        limit: number = PREVIEW_ROW_LIMIT
    ): CellValue[][] {
        return this.readMatrix(fileBuffer, fileName, options?.sheetName).slice(0, limit);
    }

    listSheets(fileBuffer: Buffer, fileName: string): string[] {
        return [...this.readWorkbook(fileBuffer, fileName).SheetNames];
    }

    private readWorkbook(buffer: Buffer, fileName: string): XLSX.WorkBook {
        const extension = path.extname(fileName).toLowerCase();
        if (extension === '.pdf') {
            throw new UnsupportedFormatError(`"${fileName}": PDF price lists are not supported. Export the list to Excel or CSV first.`);
        }
        try {
            if (WORKBOOK_EXTENSIONS.includes(extension)) {
                return XLSX.read(buffer, { type: 'buffer', cellDates: true });
            }
            if (TEXT_EXTENSIONS.includes(extension)) {
                // raw: keep every cell as the text it was written as
                const text = buffer.toString('utf8').replace(/^\uFEFF/, '');
                return XLSX.read(text, { type: 'string', raw: true });
            }
        } catch (error) {
            throw new FileParsingError(`Cannot read "${fileName}"`, error instanceof Error ? error : undefined);
        }
        throw new UnsupportedFormatError(
            `"${fileName}": unsupported file type "${extension || 'none'}". Expected one of ${[...WORKBOOK_EXTENSIONS, ...TEXT_EXTENSIONS].join(', ')}.`
        );
    }

    /** Every row of the chosen sheet as cells, blank rows included so indices match the sheet. */
    private readMatrix(buffer: Buffer, fileName: string, sheetName?: string): CellValue[][] {
        const workbook = this.readWorkbook(buffer, fileName);
        const name = sheetName ?? workbook.SheetNames[0];
        if (!name) { throw new FileParsingError(`No sheets found in "${fileName}".`); }
        const worksheet = workbook.Sheets[name];
        if (!worksheet) { throw new FileParsingError(`Sheet "${name}" not found in "${fileName}".`); }

        const raw = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: true, defval: null, blankrows: true });
        return raw.map(row => row.map(cell => normalizeCell(cell)));
    }
}
