// src/core/common/interfaces/models.ts

/** A single cell as it travels through the core: text, or absent. */
export type CellValue = string | null;

/** Name of a canonical field (a column of the company price list). */
export type FieldName = string;

/**
 * Rectangular table delivered by the ingestion layer.
 * Headers are distinct; every row has exactly `headers.length` cells.
 */
export interface RawTable {
    headers: string[];
    rows: CellValue[][];
}

/** Generic tabular export shape handed to writers (spreadsheet, JSON). */
export interface TabularData {
    fields: string[];
    rows: Array<Array<string | number | null>>;
}

/**
 * One row of the company price list. Identity is positional.
 */
export interface CanonicalRecord {
    readonly rowIndex: number;
    /** Ordered as the store's field set */
    readonly values: Readonly<Record<FieldName, CellValue>>;
}

/**
 * One supplier row after column mapping. Total over the canonical vocabulary:
 * fields the supplier file does not provide are `null`, never missing.
 */
export interface SupplierRecord {
    /** 0-based position of the row in the supplier table */
    readonly sourceRow: number;
    readonly values: Readonly<Record<FieldName, CellValue>>;
}

/** canonical field -> original supplier column */
export type ColumnMapping = Record<FieldName, string>;

/** original supplier column -> canonical field (fixed per-supplier dictionaries) */
export type StaticColumnMapping = Record<string, FieldName>;

export type MappingRole = 'internal' | 'supplier';

/** Ordered key fields, highest priority first. Never empty. */
export type KeyFieldList = readonly FieldName[];

export type MatchResult =
    | { readonly kind: 'NoMatch' }
    | {
        readonly kind: 'Matched';
        readonly rowIndex: number;
        readonly keyField: FieldName;
        readonly keyValue: string;
    }
    | {
        readonly kind: 'AmbiguousMatch';
        /** first candidate in store order */
        readonly rowIndex: number;
        readonly keyField: FieldName;
        readonly keyValue: string;
        readonly candidates: readonly number[];
    };

/** 'first' resolves ambiguity to the first row in store order; 'review' leaves the row unapplied. */
export type AmbiguityPolicy = 'first' | 'review';

export type SkipReason = 'not-selected' | 'needs-review';

export type ReconciliationOutcome =
    | { readonly kind: 'Updated'; readonly sourceRow: number; readonly rowIndex: number; readonly changedFields: readonly FieldName[] }
    | { readonly kind: 'Inserted'; readonly sourceRow: number; readonly rowIndex: number }
    | { readonly kind: 'Skipped'; readonly sourceRow: number; readonly reason: SkipReason };

/** Non-fatal signal: a key lookup hit several canonical rows. */
export interface AmbiguousMatchWarning {
    readonly sourceRow: number;
    readonly keyField: FieldName;
    readonly keyValue: string;
    readonly candidates: readonly number[];
    /** Row the engine applied the supplier data to, null when left for review */
    readonly resolvedTo: number | null;
}

export interface ReconciliationSummary {
    processed: number;
    /** Matched rows with at least one changed field */
    updated: number;
    /** Matched rows where every value was already current */
    unchanged: number;
    inserted: number;
    skipped: number;
    ambiguous: number;
    unmappedFields: FieldName[];
}

export interface ReconciliationReport {
    readonly outcomes: ReconciliationOutcome[];
    readonly warnings: AmbiguousMatchWarning[];
    readonly summary: ReconciliationSummary;
}

export interface ReconciliationOptions {
    keys: KeyFieldList;
    /** Overwritable fields. Undefined/null: every field present on the supplier row. */
    inputFields?: readonly FieldName[] | null;
    ambiguityPolicy?: AmbiguityPolicy;
    /** Supplier `sourceRow`s to apply; others are skipped. Undefined applies all. */
    selectedRows?: ReadonlySet<number>;
    /** Reported in the summary only */
    unmappedFields?: readonly FieldName[];
}

/** Preview of a supplier batch split into the rows that would update and insert. */
export interface ReconciliationPreview {
    readonly report: ReconciliationReport;
    readonly updates: SupplierRecord[];
    readonly inserts: SupplierRecord[];
}

export interface OfferRecord {
    readonly rowIndex: number;
    readonly code: CellValue;
    readonly description: CellValue;
    /** Price cell as stored in the price list */
    readonly listPrice: CellValue;
    readonly price: number | null;
    readonly discount: number | null;
    readonly promoPrice: number | null;
}

export interface OfferOptions {
    priceField: FieldName;
    discountRate: number;
    codeField?: FieldName;
    descriptionField?: FieldName;
}
