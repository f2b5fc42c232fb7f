// src/core/sessions/interfaces/services.ts
import {
    AmbiguityPolicy, ColumnMapping, FieldName, OfferOptions, OfferRecord, RawTable,
    ReconciliationPreview, ReconciliationReport, ReconciliationSummary
} from '../../common/interfaces/models';
import { FileParsingOptions } from '../../parsing';

/** How the column mapping of a supplier table is obtained */
export type SupplierMappingRequest =
    | { source: 'confirmed'; mapping: ColumnMapping; supplierId?: string; save?: boolean }
    | { source: 'static'; supplierId: string }
    | { source: 'saved'; supplierId: string }
    | { source: 'suggested' };

/** Per-call overrides of the configured reconciliation settings */
export interface ApplySupplierOptions {
    keys?: readonly FieldName[];
    inputFields?: readonly FieldName[] | null;
    ambiguityPolicy?: AmbiguityPolicy;
    /** Supplier row positions (0-based) to apply; all when omitted */
    selectedRows?: readonly number[];
    /** Name shown for the batch in the summary sheet */
    label?: string;
}

export interface OpenSessionOptions {
    sourceFile: string;
    /** canonical field -> price list column; mapped headers are renamed to the field names */
    internalMapping?: ColumnMapping;
}

export interface SessionInfo {
    id: string;
    sourceFile: string;
    createdAt: Date;
    fields: readonly FieldName[];
    size: number;
    batches: Array<{ label: string; summary: ReconciliationSummary }>;
}

/** Suggested mapping of the company price list, for the caller to confirm before opening a session */
export interface PriceListDescription {
    columns: string[];
    suggested: ColumnMapping;
    unresolved: FieldName[];
}

export interface SupplierTableDescription {
    columns: string[];
    suggested: ColumnMapping;
    unresolved: FieldName[];
    saved: ColumnMapping | null;
    static: ColumnMapping | null;
    staticMappings: string[];
}

export interface UploadedTableFile {
    buffer: Buffer;
    fileName: string;
}

export type BatchFileResult =
    | { fileName: string; status: 'applied'; report: ReconciliationReport }
    | { fileName: string; status: 'failed'; error: string };

/** Defines the contract for the Price List Session Service */
export interface IPriceListSessionService {
    describePriceList(table: RawTable): PriceListDescription;
    openSession(table: RawTable, options: OpenSessionOptions): SessionInfo;
    getSession(sessionId: string): SessionInfo;
    describeSupplierTable(sessionId: string, table: RawTable, supplierId?: string): Promise<SupplierTableDescription>;
    /** Supplier ids with a saved mapping */
    listSavedMappings(): Promise<string[]>;
    resolveSupplierMapping(table: RawTable, request: SupplierMappingRequest): Promise<ColumnMapping>;
    previewSupplier(sessionId: string, table: RawTable, request: SupplierMappingRequest, options?: ApplySupplierOptions): Promise<ReconciliationPreview>;
    /** Rejects the `suggested` source: only confirmed, saved or static mappings change the price list */
    applySupplier(sessionId: string, table: RawTable, request: SupplierMappingRequest, options?: ApplySupplierOptions): Promise<ReconciliationReport>;
    /**
     * Parses every file concurrently, then applies them one after another in
     * upload order. A file that fails to parse or map is reported, not fatal.
     * Rejects the `suggested` source like `applySupplier`.
     */
    applySupplierBatch(
        sessionId: string,
        files: readonly UploadedTableFile[],
        request: SupplierMappingRequest,
        options?: ApplySupplierOptions,
        parseOptions?: FileParsingOptions
    ): Promise<BatchFileResult[]>;
    generateOffers(sessionId: string, options?: Partial<OfferOptions>): Promise<OfferRecord[]>;
    exportWorkbook(sessionId: string, options?: { includeOffers?: boolean; offerOptions?: Partial<OfferOptions> }): Promise<Buffer>;
    closeSession(sessionId: string): void;
}
