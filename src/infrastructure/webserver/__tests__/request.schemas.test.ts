import { ValidationError } from '../../../core/common/errors';
import {
    exportQuerySchema, offersSchema, openSessionSchema, parseRequest, supplierRequestSchema, toMappingRequest
} from '../validation/request.schemas';

describe('request schemas', () => {
    describe('supplierRequestSchema', () => {
        it('defaults to the suggested mapping', () => {
            expect(parseRequest(supplierRequestSchema, {})).toEqual({ source: 'suggested' });
            expect(parseRequest(supplierRequestSchema, undefined)).toEqual({ source: 'suggested' });
        });

        it('decodes multipart text fields', () => {
            const input = parseRequest(supplierRequestSchema, {
                source: 'confirmed',
                mapping: '{"codice":"Cod."}',
                save: 'true',
                keys: 'codice, Codice EAN',
                inputFields: '["prezzo di listino"]',
                selectedRows: '0,2',
                headerRow: '1',
            });

            expect(input).toEqual({
                source: 'confirmed',
                mapping: { codice: 'Cod.' },
                save: true,
                keys: ['codice', 'Codice EAN'],
                inputFields: ['prezzo di listino'],
                selectedRows: [0, 2],
                headerRow: 1,
            });
        });

        it('reports every invalid field', () => {
            expect(() => parseRequest(supplierRequestSchema, { source: 'nope' })).toThrow(ValidationError);
            expect(() => parseRequest(supplierRequestSchema, { source: 'nope' })).toThrow(/^Invalid request: source: /);
            expect(() => parseRequest(supplierRequestSchema, { mapping: 'not json' }))
                .toThrow('Invalid request: mapping: Expected object, received string');
            expect(() => parseRequest(supplierRequestSchema, { headerRow: '-1' })).toThrow(/headerRow/);
        });
    });

    it('parses the price list mapping of a new session', () => {
        expect(parseRequest(openSessionSchema, { internalMapping: '{"codice":"Codice"}', sheetName: 'Listino' }))
            .toEqual({ internalMapping: { codice: 'Codice' }, sheetName: 'Listino' });
    });

    it('coerces offer and export options', () => {
        expect(parseRequest(exportQuerySchema, { includeOffers: '1', discountRate: '0.15' }))
            .toEqual({ includeOffers: true, discountRate: 0.15 });
        expect(() => parseRequest(offersSchema, { discountRate: '2' })).toThrow(ValidationError);
    });

    describe('toMappingRequest', () => {
        it('builds each mapping source', () => {
            expect(toMappingRequest({ source: 'static', supplierId: 'acme' })).toEqual({ source: 'static', supplierId: 'acme' });
            expect(toMappingRequest({ source: 'suggested', supplierId: 'acme' })).toEqual({ source: 'suggested' });
            expect(toMappingRequest({ source: 'confirmed', mapping: { codice: 'Cod.' }, supplierId: 'acme', save: true }))
                .toEqual({ source: 'confirmed', mapping: { codice: 'Cod.' }, supplierId: 'acme', save: true });
        });

        it('rejects incomplete requests', () => {
            expect(() => toMappingRequest({ source: 'confirmed' })).toThrow('A confirmed mapping requires the "mapping" field.');
            expect(() => toMappingRequest({ source: 'saved' })).toThrow('Mapping source "saved" requires "supplierId".');
        });
    });
});
