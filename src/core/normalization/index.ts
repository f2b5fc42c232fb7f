// src/core/normalization/index.ts

export * from './normalization.utils';
