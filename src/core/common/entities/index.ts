// src/core/common/entities/index.ts

export * from './supplier-column-mapping.entity';
