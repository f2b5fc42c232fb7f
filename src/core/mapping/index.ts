// src/core/mapping/index.ts

export * from './column-mapper.service';
export * from './mapping-resolver.service';
export * from './interfaces/services';

// Scoring and vocabulary helpers are used directly by tests and bootstrap
export * from './similarity.utils';
export * from './vocabulary';
