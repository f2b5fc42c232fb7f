// src/core/common/interfaces/repositories/index.ts

export * from './IMappingStore';
