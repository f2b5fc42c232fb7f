// src/core/store/canonical-store.ts
import { ValidationError } from '../common/errors';
import { CanonicalRecord, CellValue, FieldName, RawTable, TabularData } from '../common/interfaces/models';
import { assertRawTable } from '../common/utils';
import { normalizeText } from '../normalization';

type MutableRow = Record<FieldName, CellValue>;

/**
 * The company price list held in memory: an ordered, append-only list of
 * records over a fixed field set.
 *
 * Row indices are positions and never change once assigned. Lookups by
 * (field, value) are served from a per-field index kept current on every
 * `set` and `append`, keyed by the trimmed cell text.
 */
export class CanonicalStore {
    private readonly fieldList: readonly FieldName[];
    private readonly fieldSet: ReadonlySet<FieldName>;
    private readonly rows: MutableRow[] = [];
    private readonly index = new Map<FieldName, Map<string, number[]>>();

    constructor(fields: readonly FieldName[], rows: ReadonlyArray<Readonly<Record<FieldName, CellValue>>> = []) {
        const unique = new Set(fields);
        if (unique.size !== fields.length) {
            throw new ValidationError('Price list field names must be distinct.');
        }
        this.fieldList = [...fields];
        this.fieldSet = unique;
        for (const field of this.fieldList) {
            this.index.set(field, new Map());
        }
        for (const row of rows) {
            this.append(row);
        }
    }

    /**
     * Loads a store from an ingested table; the header row becomes the field set.
     * @throws {ValidationError} when headers repeat or rows are ragged
     */
    static fromTable(table: RawTable): CanonicalStore {
        assertRawTable(table, 'price list');
        const store = new CanonicalStore(table.headers);
        for (const row of table.rows) {
            const values: MutableRow = {};
            table.headers.forEach((header, i) => {
                values[header] = row[i];
            });
            store.append(values);
        }
        return store;
    }

    get fields(): readonly FieldName[] {
        return this.fieldList;
    }

    get size(): number {
        return this.rows.length;
    }

    hasField(field: FieldName): boolean {
        return this.fieldSet.has(field);
    }

    /**
     * Row indices whose `field` equals `value` after trimming, in store order.
     * Empty values and unknown fields never match.
     */
    find(field: FieldName, value: CellValue): readonly number[] {
        const key = normalizeText(value);
        if (key === '') return [];
        const hits = this.index.get(field)?.get(key);
        return hits ? [...hits] : [];
    }

    get(rowIndex: number, field: FieldName): CellValue {
        this.assertField(field);
        return this.row(rowIndex)[field];
    }

    set(rowIndex: number, field: FieldName, value: CellValue): void {
        this.assertField(field);
        const row = this.row(rowIndex);
        this.unindex(field, row[field], rowIndex);
        row[field] = value;
        this.indexCell(field, value, rowIndex);
    }

    /**
     * Adds a record at the end. Fields absent from `values` are stored as null.
     * @returns the new row index (the previous size)
     * @throws {ValidationError} when `values` names a field the store does not have
     */
    append(values: Readonly<Record<FieldName, CellValue>>): number {
        for (const field of Object.keys(values)) {
            this.assertField(field);
        }
        const rowIndex = this.rows.length;
        const row: MutableRow = {};
        for (const field of this.fieldList) {
            const value = values[field] ?? null;
            row[field] = value;
            this.indexCell(field, value, rowIndex);
        }
        this.rows.push(row);
        return rowIndex;
    }

    getRecord(rowIndex: number): CanonicalRecord {
        return { rowIndex, values: { ...this.row(rowIndex) } };
    }

    records(): CanonicalRecord[] {
        return this.rows.map((row, rowIndex) => ({ rowIndex, values: { ...row } }));
    }

    /** Independent copy; changes to either store do not affect the other. */
    clone(): CanonicalStore {
        return new CanonicalStore(this.fieldList, this.rows);
    }

    toTable(): TabularData {
        return {
            fields: [...this.fieldList],
            rows: this.rows.map(row => this.fieldList.map(field => row[field])),
        };
    }

    private row(rowIndex: number): MutableRow {
        if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= this.rows.length) {
            throw new ValidationError(`Row index ${rowIndex} is out of range (size ${this.rows.length}).`);
        }
        return this.rows[rowIndex];
    }

    private assertField(field: FieldName): void {
        if (!this.fieldSet.has(field)) {
            throw new ValidationError(`Unknown price list field "${field}".`);
        }
    }

    private indexCell(field: FieldName, value: CellValue, rowIndex: number): void {
        const key = normalizeText(value);
        if (key === '') return;
        const byValue = this.index.get(field);
        if (!byValue) return;
        const hits = byValue.get(key);
        if (!hits) {
            byValue.set(key, [rowIndex]);
            return;
        }
        // keep store order: appends land at the end, `set` may revisit an older row
        let at = hits.length;
        while (at > 0 && hits[at - 1] > rowIndex) at--;
        hits.splice(at, 0, rowIndex);
    }

    private unindex(field: FieldName, value: CellValue, rowIndex: number): void {
        const key = normalizeText(value);
        const hits = this.index.get(field)?.get(key);
        if (!hits) return;
        const at = hits.indexOf(rowIndex);
        if (at >= 0) hits.splice(at, 1);
        if (hits.length === 0) this.index.get(field)?.delete(key);
    }
}
