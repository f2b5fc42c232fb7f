// src/core/common/interfaces/repositories/IMappingStore.ts

import { ColumnMapping } from '../models';

/**
 * Persistence of confirmed column mappings, keyed by supplier identity.
 * Implementations sanitise the supplier id before using it as a key.
 */
export interface IMappingStore {
    /**
     * Loads the mapping saved for a supplier.
     * @returns the mapping, or null when none is saved or the saved entry is unreadable.
     */
    load(supplierId: string): Promise<ColumnMapping | null>;

    /** Saves (or replaces) the mapping of a supplier. */
    save(supplierId: string, mapping: ColumnMapping): Promise<void>;

    /** Ids of every supplier with a saved mapping. */
    list(): Promise<string[]>;
}

// Define a unique symbol token for DI registration
export const MAPPING_STORE_TOKEN = Symbol.for('IMappingStore');
