// src/__tests__/fixtures.ts
import config from '../config';
import { CellValue, FieldName, SupplierRecord } from '../core/common/interfaces/models';
import { loadFieldVocabulary } from '../core/mapping';
import { CanonicalStore } from '../core/store';
import testLogger from '../infrastructure/logger';

export { testLogger };

/** The vocabulary shipped in config/canonical-fields.json */
export const testVocabulary = loadFieldVocabulary(config.mapping.vocabularyFile);

export const PRICE_LIST_FIELDS: readonly FieldName[] = [
    'codice', 'codice fornitore', 'Descrizione articolo', 'prezzo di listino', 'Codice EAN', 'note',
];

/** Store over PRICE_LIST_FIELDS; each row lists values in that order. */
export function priceListStore(rows: ReadonlyArray<readonly CellValue[]>): CanonicalStore {
    return CanonicalStore.fromTable({ headers: [...PRICE_LIST_FIELDS], rows: rows.map(r => [...r]) });
}

/** Supplier row over the given values; unlisted fields are null, as after mapping. */
export function supplierRow(sourceRow: number, values: Readonly<Record<FieldName, CellValue>>): SupplierRecord {
    const total: Record<FieldName, CellValue> = {};
    for (const field of testVocabulary.fields) {
        total[field] = null;
    }
    return { sourceRow, values: { ...total, ...values } };
}
