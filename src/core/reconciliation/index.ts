// src/core/reconciliation/index.ts

// Export the service implementation
export * from './reconciliation.service';

// Export interfaces
export * from './interfaces/services';
