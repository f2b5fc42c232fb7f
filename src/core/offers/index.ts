// src/core/offers/index.ts

export * from './offer-generator.service';
export * from './interfaces/services';
