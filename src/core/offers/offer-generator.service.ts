// src/core/offers/offer-generator.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { MissingFieldError, ValidationError } from '../common/errors';
import { OfferOptions, OfferRecord, TabularData } from '../common/interfaces/models';
import { normalizeNumber, roundCurrency } from '../normalization';
import { CanonicalStore } from '../store';
import { IOfferGeneratorService } from './interfaces/services';

export const DISCOUNT_HEADING = 'Sconto Offerta';
export const PROMO_PRICE_HEADING = 'Prezzo Promo';

type ResolvedOfferOptions = Required<OfferOptions>;

@singleton()
@injectable()
export class OfferGeneratorService implements IOfferGeneratorService {

    constructor(@inject(LOGGER_TOKEN) private logger: Logger) {
        this.logger.info('OfferGeneratorService initialized.');
    }

    generate(store: CanonicalStore, options?: Partial<OfferOptions>): OfferRecord[] {
        const { priceField, discountRate, codeField, descriptionField } = this.resolveOptions(options);

        if (!Number.isFinite(discountRate) || discountRate < 0 || discountRate > 1) {
            throw new ValidationError(`Discount rate must be a number between 0 and 1, got ${discountRate}.`);
        }
        const required = [...new Set([codeField, descriptionField, priceField])];
        const missing = required.filter(field => !store.hasField(field));
        if (missing.length > 0) {
            throw new MissingFieldError(missing);
        }

        let unpriced = 0;
        const offers = store.records().map((record): OfferRecord => {
            const listPrice = record.values[priceField];
            const price = normalizeNumber(listPrice);
            if (price === null) {
                unpriced++;
                return {
                    rowIndex: record.rowIndex,
                    code: record.values[codeField],
                    description: record.values[descriptionField],
                    listPrice,
                    price: null,
                    discount: null,
                    promoPrice: null,
                };
            }
            const discount = roundCurrency(price * discountRate);
            return {
                rowIndex: record.rowIndex,
                code: record.values[codeField],
                description: record.values[descriptionField],
                listPrice,
                price,
                discount,
                promoPrice: roundCurrency(price - discount),
            };
        });

        this.logger.info(`Generated ${offers.length} offers at ${discountRate * 100}% (${unpriced} without a usable price).`);
        return offers;
    }

    toTable(offers: readonly OfferRecord[], options?: Partial<OfferOptions>): TabularData {
        const { priceField, codeField, descriptionField } = this.resolveOptions(options);
        return {
            fields: [codeField, descriptionField, priceField, DISCOUNT_HEADING, PROMO_PRICE_HEADING],
            rows: offers.map(o => [o.code, o.description, o.price ?? o.listPrice, o.discount, o.promoPrice]),
        };
    }

    private resolveOptions(options?: Partial<OfferOptions>): ResolvedOfferOptions {
        return {
            priceField: options?.priceField ?? config.offers.priceField,
            discountRate: options?.discountRate ?? config.offers.discountRate,
            codeField: options?.codeField ?? config.offers.codeField,
            descriptionField: options?.descriptionField ?? config.offers.descriptionField,
        };
    }
}
