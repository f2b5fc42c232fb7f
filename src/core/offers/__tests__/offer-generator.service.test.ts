import { MissingFieldError, ValidationError } from '../../common/errors';
import { CanonicalStore } from '../../store';
import { testLogger } from '../../../__tests__/fixtures';
import { DISCOUNT_HEADING, OfferGeneratorService, PROMO_PRICE_HEADING } from '../offer-generator.service';

const OPTIONS = {
    priceField: 'prezzo di listino',
    discountRate: 0.1,
    codeField: 'codice',
    descriptionField: 'Descrizione articolo',
};

function offerStore(): CanonicalStore {
    return CanonicalStore.fromTable({
        headers: ['codice', 'Descrizione articolo', 'prezzo di listino'],
        rows: [
            ['A1', 'Vite', '100.00'],
            ['A2', 'Dado', '12,50'],
            ['A3', 'Rondella', 'su richiesta'],
        ],
    });
}

describe('OfferGeneratorService', () => {
    const generator = new OfferGeneratorService(testLogger);

    it('computes the discount and promo price per row', () => {
        const offers = generator.generate(offerStore(), OPTIONS);

        expect(offers[0]).toEqual({
            rowIndex: 0, code: 'A1', description: 'Vite', listPrice: '100.00', price: 100, discount: 10, promoPrice: 90,
        });
        expect(offers[1]).toMatchObject({ price: 12.5, discount: 1.25, promoPrice: 11.25 });
    });

    it('leaves unparseable prices without an offer', () => {
        const offers = generator.generate(offerStore(), OPTIONS);
        expect(offers[2]).toEqual({
            rowIndex: 2, code: 'A3', description: 'Rondella', listPrice: 'su richiesta', price: null, discount: null, promoPrice: null,
        });
    });

    it('rounds half away from zero', () => {
        const store = CanonicalStore.fromTable({
            headers: ['codice', 'Descrizione articolo', 'prezzo di listino'],
            rows: [['B1', 'Tassello', '10,05']],
        });
        const [offer] = generator.generate(store, { ...OPTIONS, discountRate: 0.5 });
        expect(offer.discount).toBe(5.03);
        expect(offer.promoPrice).toBe(5.02);
    });

    it('fails when required fields are absent from the price list', () => {
        expect.assertions(3);
        const store = new CanonicalStore(['codice', 'prezzo']);
        expect(() => generator.generate(store, OPTIONS)).toThrow(MissingFieldError);
        try {
            generator.generate(store, OPTIONS);
        } catch (error) {
            expect(error).toBeInstanceOf(MissingFieldError);
            if (error instanceof MissingFieldError) {
                expect(error.missingFields).toEqual(['Descrizione articolo', 'prezzo di listino']);
            }
        }
    });

    it.each([-0.1, 1.5, Number.NaN])('rejects discount rate %p', (discountRate) => {
        expect(() => generator.generate(offerStore(), { ...OPTIONS, discountRate })).toThrow(ValidationError);
    });

    it('exports offers as a table with the parsed price', () => {
        const table = generator.toTable(generator.generate(offerStore(), OPTIONS), OPTIONS);

        expect(table.fields).toEqual(['codice', 'Descrizione articolo', 'prezzo di listino', DISCOUNT_HEADING, PROMO_PRICE_HEADING]);
        expect(table.rows).toEqual([
            ['A1', 'Vite', 100, 10, 90],
            ['A2', 'Dado', 12.5, 1.25, 11.25],
            ['A3', 'Rondella', 'su richiesta', null, null],
        ]);
    });
});
