// src/core/reconciliation/interfaces/services.ts
import {
    ReconciliationOptions, ReconciliationPreview, ReconciliationReport, SupplierRecord
} from '../../common/interfaces/models';
import { CanonicalStore } from '../../store';

/** Defines the contract for the Reconciliation Engine */
export interface IReconciliationService {
    /**
     * Classifies every supplier row as update or insert and applies it to the store, in order.
     * Rows inserted earlier in the call can be matched by later rows.
     * @param rows - Supplier records after column mapping.
     * @param options - Key fields, protected input fields, ambiguity policy and row selection.
     * @param store - The price list to mutate.
     * @returns Outcomes per row, ambiguity warnings and a summary.
     * @throws {ValidationError} when the key list is empty
     */
    apply(rows: readonly SupplierRecord[], options: ReconciliationOptions, store: CanonicalStore): ReconciliationReport;

    /**
     * Same classification as `apply`, run against a copy of the store.
     * The given store is left untouched.
     */
    preview(rows: readonly SupplierRecord[], options: ReconciliationOptions, store: CanonicalStore): ReconciliationPreview;
}
