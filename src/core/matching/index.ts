// src/core/matching/index.ts

export * from './record-matcher.service';
export * from './interfaces/services';
