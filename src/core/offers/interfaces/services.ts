// src/core/offers/interfaces/services.ts
import { OfferOptions, OfferRecord, TabularData } from '../../common/interfaces/models';
import { CanonicalStore } from '../../store';

/** Defines the contract for the Offer Generator */
export interface IOfferGeneratorService {
    /**
     * Computes the promotional price of every row of the store. Read-only.
     * @param options - Missing entries fall back to the configured offer settings.
     * @throws {MissingFieldError} when the code, description or price field is absent
     * @throws {ValidationError} when the discount rate is outside [0, 1]
     */
    generate(store: CanonicalStore, options?: Partial<OfferOptions>): OfferRecord[];

    /** Renders offers for export, headed by the option field names plus discount and promo columns. */
    toTable(offers: readonly OfferRecord[], options?: Partial<OfferOptions>): TabularData;
}
