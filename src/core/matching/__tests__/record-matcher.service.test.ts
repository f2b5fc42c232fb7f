import { ValidationError } from '../../common/errors';
import { priceListStore, supplierRow, testLogger } from '../../../__tests__/fixtures';
import { RecordMatcherService } from '../record-matcher.service';

const KEYS = ['codice', 'codice fornitore', 'Codice EAN'];

describe('RecordMatcherService', () => {
    const matcher = new RecordMatcherService(testLogger);
    const store = priceListStore([
        // codice, codice fornitore, Descrizione articolo, prezzo di listino, Codice EAN, note
        ['A1', 'F-100', 'Vite', '1,00', '8000000000017', null],
        ['A2', 'F-200', 'Dado', '0,50', null, null],
        ['A3', 'F-200', 'Rondella', '0,20', '8000000000031', null],
    ]);

    it('matches on the first key', () => {
        expect(matcher.match(supplierRow(0, { codice: ' A2 ' }), KEYS, store))
            .toEqual({ kind: 'Matched', rowIndex: 1, keyField: 'codice', keyValue: 'A2' });
    });

    it('falls back to the next key when the first is empty', () => {
        const row = supplierRow(0, { 'codice': null, 'Codice EAN': '8000000000031' });
        expect(matcher.match(row, KEYS, store))
            .toEqual({ kind: 'Matched', rowIndex: 2, keyField: 'Codice EAN', keyValue: '8000000000031' });
    });

    it('falls back when the first key has no hit', () => {
        const row = supplierRow(0, { 'codice': 'ZZ', 'codice fornitore': 'F-100' });
        expect(matcher.match(row, KEYS, store))
            .toEqual({ kind: 'Matched', rowIndex: 0, keyField: 'codice fornitore', keyValue: 'F-100' });
    });

    it('reports several hits as ambiguous, pointing at the first row', () => {
        const row = supplierRow(0, { 'codice fornitore': 'F-200' });
        expect(matcher.match(row, KEYS, store)).toEqual({
            kind: 'AmbiguousMatch', rowIndex: 1, keyField: 'codice fornitore', keyValue: 'F-200', candidates: [1, 2],
        });
    });

    it('returns NoMatch when no key resolves', () => {
        expect(matcher.match(supplierRow(0, { codice: 'ZZ' }), KEYS, store)).toEqual({ kind: 'NoMatch' });
        expect(matcher.match(supplierRow(0, { codice: '   ' }), KEYS, store)).toEqual({ kind: 'NoMatch' });
    });

    it('is deterministic for a fixed store and key order', () => {
        const row = supplierRow(0, { 'codice fornitore': 'F-200', 'Codice EAN': '8000000000017' });
        const first = matcher.match(row, KEYS, store);
        expect(matcher.match(row, KEYS, store)).toEqual(first);
        expect(matcher.match(row, ['Codice EAN', 'codice fornitore'], store))
            .toEqual({ kind: 'Matched', rowIndex: 0, keyField: 'Codice EAN', keyValue: '8000000000017' });
    });

    it('requires at least one key', () => {
        expect(() => matcher.match(supplierRow(0, { codice: 'A1' }), [], store)).toThrow(ValidationError);
    });
});
