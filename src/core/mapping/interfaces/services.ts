// src/core/mapping/interfaces/services.ts
import {
    ColumnMapping, FieldName, MappingRole, RawTable, StaticColumnMapping, SupplierRecord
} from '../../common/interfaces/models';

export interface SuggestMappingOptions {
    /** Minimum fuzzy score (0-100) for a label match; defaults to the configured threshold */
    threshold?: number;
}

/** Defines the contract for the Column Mapper */
export interface IColumnMapperService {
    /**
     * Proposes canonical field -> source column for the given header row.
     * Fields with no convincing column are left out.
     */
    suggestMapping(columns: readonly string[], role: MappingRole, options?: SuggestMappingOptions): ColumnMapping;

    /** Fields the role looks for that the mapping does not resolve, in rule order. */
    unresolvedFields(mapping: ColumnMapping, role: MappingRole): FieldName[];

    /** Every canonical field of the vocabulary, in vocabulary order. */
    canonicalFields(): readonly FieldName[];
}

export interface MappingValidationOptions {
    /** Confirmed mappings fail on unknown columns; saved ones drop them. */
    strict: boolean;
}

/** Defines the contract for the Mapping Resolver */
export interface IMappingResolverService {
    /** Converts a per-supplier original->canonical dictionary against a header row. */
    fromStatic(columns: readonly string[], staticMapping: StaticColumnMapping): ColumnMapping;

    /** Looks up a built-in static mapping by supplier id. */
    getStaticMapping(supplierId: string): StaticColumnMapping | null;

    /** Ids of the built-in static mappings. */
    listStaticMappings(): string[];

    /**
     * Checks that every mapped column exists in the header row.
     * @throws {ValidationError} in strict mode when a column is unknown
     */
    validate(mapping: ColumnMapping, columns: readonly string[], options: MappingValidationOptions): ColumnMapping;

    /**
     * Builds supplier records total over `fields` (plus any mapping target
     * outside it); unmapped fields are null.
     * @throws {ValidationError} when the table breaks the ingestion contract
     */
    toSupplierRecords(table: RawTable, mapping: ColumnMapping, fields: readonly FieldName[]): SupplierRecord[];
}
