// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from './errors';
import { ColumnMapping, RawTable } from './interfaces/models';

/**
 * Generates a unique Version 4 UUID.
 * @returns A unique identifier string.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/**
 * Checks the ingestion contract of a table: distinct headers and
 * rows exactly as wide as the header row.
 * @throws {ValidationError} on the first violation found
 */
export function assertRawTable(table: RawTable, label = 'table'): void {
    const seen = new Set<string>();
    for (const header of table.headers) {
        if (seen.has(header)) {
            throw new ValidationError(`Duplicate column "${header}" in ${label}.`);
        }
        seen.add(header);
    }
    table.rows.forEach((row, index) => {
        if (row.length !== table.headers.length) {
            throw new ValidationError(
                `Row ${index} of ${label} has ${row.length} cells, expected ${table.headers.length}.`
            );
        }
    });
}

/** Renders a list of names for messages: 'a', 'b' */
export function quoteList(names: readonly string[]): string {
    return names.map(n => `'${n}'`).join(', ');
}

/**
 * Turns a supplier name into a safe storage key: every run of characters
 * outside [A-Za-z0-9._-] becomes "_".
 * @throws {ValidationError} when nothing usable is left
 */
export function sanitizeSupplierId(supplierId: string): string {
    const sanitized = supplierId.trim().replace(/[^A-Za-z0-9._-]+/g, '_');
    if (sanitized === '' || /^[._]+$/.test(sanitized)) {
        throw new ValidationError(`Invalid supplier id "${supplierId}".`);
    }
    return sanitized;
}

/** Type guard for a persisted field -> column dictionary. */
export function isColumnMapping(value: unknown): value is ColumnMapping {
    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && Object.values(value).every(v => typeof v === 'string');
}
