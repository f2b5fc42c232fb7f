import { bestMatch, headerHasHint, scoreSimilarity } from '../similarity.utils';

describe('scoreSimilarity', () => {
    it('scores headers that normalize alike as identical', () => {
        expect(scoreSimilarity('Codice', 'codice')).toBe(100);
        expect(scoreSimilarity('€ Cf', 'cf')).toBe(100);
    });

    it('scores an empty side as 0', () => {
        expect(scoreSimilarity('', 'codice')).toBe(0);
        expect(scoreSimilarity('€', 'codice')).toBe(0);
    });

    it('credits a short header contained in a longer one', () => {
        expect(scoreSimilarity('prezzo', 'Prezzo listino')).toBeCloseTo(90, 5);
    });

    it('does not credit a 2-letter label for letters inside a longer header', () => {
        expect(scoreSimilarity('€ cl', 'Classe')).toBeCloseTo(100 / 3, 5);
        expect(scoreSimilarity('€ cl', 'Cliente')).toBeCloseTo(200 / 7, 5);
    });

    it('is symmetric and deterministic', () => {
        const first = scoreSimilarity('costo', 'Costi');
        expect(first).toBeCloseTo(80, 5);
        expect(scoreSimilarity('Costi', 'costo')).toBe(first);
    });
});

describe('bestMatch', () => {
    it('returns the closest candidate above the threshold', () => {
        expect(bestMatch('€ cf', ['Codice', '€ Cf', '€ Cl'], 72)).toEqual({ candidate: '€ Cf', score: 100 });
    });

    it('returns null when nothing reaches the threshold', () => {
        expect(bestMatch('zzz', ['Codice', 'Prezzo'], 72)).toBeNull();
        expect(bestMatch('codice', [], 0)).toBeNull();
    });

    it('keeps the earliest candidate on ties', () => {
        expect(bestMatch('codice', ['CODICE', 'Codice'], 72)).toEqual({ candidate: 'CODICE', score: 100 });
    });
});

describe('headerHasHint', () => {
    it('matches whole tokens and token runs only', () => {
        expect(headerHasHint('cod art', 'cod')).toBe(true);
        expect(headerHasHint('codice', 'cod')).toBe(false);
        expect(headerHasHint('bar code', 'bar code')).toBe(true);
        expect(headerHasHint('', 'cod')).toBe(false);
    });
});
