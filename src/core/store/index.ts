// src/core/store/index.ts

export * from './canonical-store';
