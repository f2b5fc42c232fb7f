// src/core/matching/interfaces/services.ts
import { KeyFieldList, MatchResult, SupplierRecord } from '../../common/interfaces/models';
import { CanonicalStore } from '../../store';

/** Defines the contract for the Record Matcher */
export interface IRecordMatcherService {
    /**
     * Finds the canonical row a supplier record refers to, trying `keys` in order.
     * @throws {ValidationError} when `keys` is empty
     */
    match(row: SupplierRecord, keys: KeyFieldList, store: CanonicalStore): MatchResult;
}
