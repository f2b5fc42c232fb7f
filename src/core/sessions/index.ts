// src/core/sessions/index.ts

export * from './price-list-session.service';
export * from './interfaces/services';
