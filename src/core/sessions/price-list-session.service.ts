// src/core/sessions/price-list-session.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { NotFoundError, ValidationError } from '../common/errors';
import {
    ColumnMapping, OfferOptions, OfferRecord, RawTable, ReconciliationOptions,
    ReconciliationPreview, ReconciliationReport, SupplierRecord
} from '../common/interfaces/models';
import { IMappingStore, MAPPING_STORE_TOKEN } from '../common/interfaces/repositories';
import { assertRawTable, generateUniqueId } from '../common/utils';
import {
    ColumnMapperService, IColumnMapperService, IMappingResolverService, MappingResolverService
} from '../mapping';
import { IOfferGeneratorService, OfferGeneratorService } from '../offers';
import { FileParserService, FileParsingOptions, IFileParserService } from '../parsing';
import { IReconciliationService, ReconciliationService } from '../reconciliation';
import { BatchReport, IReportGeneratorService, ReportGeneratorService } from '../reporting';
import { CanonicalStore } from '../store';
import {
    ApplySupplierOptions, BatchFileResult, IPriceListSessionService, OpenSessionOptions,
    PriceListDescription, SessionInfo, SupplierMappingRequest, SupplierTableDescription, UploadedTableFile
} from './interfaces/services';

interface PriceListSession {
    readonly id: string;
    readonly sourceFile: string;
    readonly createdAt: Date;
    readonly store: CanonicalStore;
    readonly batches: BatchReport[];
    /** Epoch ms of the last lookup; idle sessions past the TTL are dropped */
    lastUsedAt: number;
    /** Tail of the writer chain; every mutation of `store` runs after it */
    queue: Promise<void>;
}

interface PreparedSupplierRows {
    rows: SupplierRecord[];
    options: ReconciliationOptions;
}

@singleton()
@injectable()
export class PriceListSessionService implements IPriceListSessionService {

    private readonly sessions = new Map<string, PriceListSession>();
    private readonly ttlMs = config.sessions.ttlMinutes * 60_000;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(ColumnMapperService) private columnMapper: IColumnMapperService,
        @inject(MappingResolverService) private mappingResolver: IMappingResolverService,
        @inject(ReconciliationService) private reconciliation: IReconciliationService,
        @inject(OfferGeneratorService) private offerGenerator: IOfferGeneratorService,
        @inject(ReportGeneratorService) private reportGenerator: IReportGeneratorService,
        @inject(FileParserService) private fileParser: IFileParserService,
        @inject(MAPPING_STORE_TOKEN) private mappingStore: IMappingStore
    ) {
        this.logger.info('PriceListSessionService initialized.');
    }

    describePriceList(table: RawTable): PriceListDescription {
        assertRawTable(table, 'price list');
        const suggested = this.columnMapper.suggestMapping(table.headers, 'internal');
        return {
            columns: [...table.headers],
            suggested,
            unresolved: this.columnMapper.unresolvedFields(suggested, 'internal'),
        };
    }

    openSession(table: RawTable, options: OpenSessionOptions): SessionInfo {
        this.evictExpired();
        assertRawTable(table, `price list "${options.sourceFile}"`);
        const headers = options.internalMapping
            ? this.renameHeaders(table.headers, options.internalMapping)
            : [...table.headers];

        const store = CanonicalStore.fromTable({ headers, rows: table.rows });
        const session: PriceListSession = {
            id: generateUniqueId(),
            sourceFile: options.sourceFile,
            createdAt: new Date(),
            store,
            batches: [],
            queue: Promise.resolve(),
            lastUsedAt: Date.now(),
        };
        this.sessions.set(session.id, session);
        this.logger.info(`Session ${session.id} opened from "${options.sourceFile}" (${store.size} rows, ${store.fields.length} fields).`);
        return this.toInfo(session);
    }

    getSession(sessionId: string): SessionInfo {
        return this.toInfo(this.requireSession(sessionId));
    }

    async describeSupplierTable(sessionId: string, table: RawTable, supplierId?: string): Promise<SupplierTableDescription> {
        this.requireSession(sessionId);
        const suggested = this.columnMapper.suggestMapping(table.headers, 'supplier');

        let saved: ColumnMapping | null = null;
        let staticMapping: ColumnMapping | null = null;
        if (supplierId) {
            const stored = await this.mappingStore.load(supplierId);
            saved = stored ? this.mappingResolver.validate(stored, table.headers, { strict: false }) : null;
            const fixed = this.mappingResolver.getStaticMapping(supplierId);
            staticMapping = fixed ? this.mappingResolver.fromStatic(table.headers, fixed) : null;
        }

        return {
            columns: [...table.headers],
            suggested,
            unresolved: this.columnMapper.unresolvedFields(suggested, 'supplier'),
            saved,
            static: staticMapping,
            staticMappings: this.mappingResolver.listStaticMappings(),
        };
    }

    async listSavedMappings(): Promise<string[]> {
        return this.mappingStore.list();
    }

    async resolveSupplierMapping(table: RawTable, request: SupplierMappingRequest): Promise<ColumnMapping> {
        switch (request.source) {
            case 'confirmed': {
                const mapping = this.mappingResolver.validate(request.mapping, table.headers, { strict: true });
                if (request.save) {
                    if (!request.supplierId) {
                        throw new ValidationError('A supplier id is required to save a mapping.');
                    }
                    await this.mappingStore.save(request.supplierId, mapping);
                }
                return mapping;
            }
            case 'static': {
                const fixed = this.mappingResolver.getStaticMapping(request.supplierId);
                if (!fixed) {
                    throw new NotFoundError(`No built-in mapping for supplier "${request.supplierId}".`);
                }
                return this.mappingResolver.fromStatic(table.headers, fixed);
            }
            case 'saved': {
                const stored = await this.mappingStore.load(request.supplierId);
                if (!stored) {
                    throw new NotFoundError(`No saved mapping for supplier "${request.supplierId}".`);
                }
                return this.mappingResolver.validate(stored, table.headers, { strict: false });
            }
            case 'suggested':
                return this.columnMapper.suggestMapping(table.headers, 'supplier');
        }
    }

    async previewSupplier(
        sessionId: string,
        table: RawTable,
        request: SupplierMappingRequest,
        options?: ApplySupplierOptions
    ): Promise<ReconciliationPreview> {
        const session = this.requireSession(sessionId);
        const prepared = await this.prepareSupplierRows(table, request, options);
        // Previews read the store, so they wait for pending writers too
        return this.enqueue(session, () => this.reconciliation.preview(prepared.rows, prepared.options, session.store));
    }

    async applySupplier(
        sessionId: string,
        table: RawTable,
        request: SupplierMappingRequest,
        options?: ApplySupplierOptions
    ): Promise<ReconciliationReport> {
        const session = this.requireSession(sessionId);
        this.assertApplicable(request);
        const prepared = await this.prepareSupplierRows(table, request, options);
        return this.enqueue(session, () => this.applyPrepared(session, prepared, options?.label ?? 'supplier'));
    }

    async applySupplierBatch(
        sessionId: string,
        files: readonly UploadedTableFile[],
        request: SupplierMappingRequest,
        options?: ApplySupplierOptions,
        parseOptions?: FileParsingOptions
    ): Promise<BatchFileResult[]> {
        const session = this.requireSession(sessionId);
        this.assertApplicable(request);
        this.logger.info(`Session ${sessionId}: parsing ${files.length} supplier files...`);

        const parsed = await Promise.allSettled(
            files.map(file => this.fileParser.parseTable(file.buffer, file.fileName, parseOptions))
        );

        // Mapping may hit the mapping store; resolve per file before taking the writer slot
        const prepared: Array<{ fileName: string; rows: PreparedSupplierRows } | { fileName: string; error: string }> = [];
        for (let i = 0; i < files.length; i++) {
            const fileName = files[i].fileName;
            const result = parsed[i];
            if (result.status === 'rejected') {
                prepared.push({ fileName, error: this.describeError(result.reason) });
                continue;
            }
            try {
                prepared.push({ fileName, rows: await this.prepareSupplierRows(result.value, request, options) });
            } catch (error) {
                prepared.push({ fileName, error: this.describeError(error) });
            }
        }

        return this.enqueue(session, () => prepared.map((entry): BatchFileResult => {
            if ('error' in entry) {
                this.logger.warn(`Session ${sessionId}: skipped "${entry.fileName}": ${entry.error}`);
                return { fileName: entry.fileName, status: 'failed', error: entry.error };
            }
            const report = this.applyPrepared(session, entry.rows, entry.fileName);
            return { fileName: entry.fileName, status: 'applied', report };
        }));
    }

    async generateOffers(sessionId: string, options?: Partial<OfferOptions>): Promise<OfferRecord[]> {
        const session = this.requireSession(sessionId);
        return this.enqueue(session, () => this.offerGenerator.generate(session.store, options));
    }

    async exportWorkbook(
        sessionId: string,
        options?: { includeOffers?: boolean; offerOptions?: Partial<OfferOptions> }
    ): Promise<Buffer> {
        const session = this.requireSession(sessionId);
        return this.enqueue(session, () => {
            const offers = options?.includeOffers
                ? this.offerGenerator.toTable(this.offerGenerator.generate(session.store, options.offerOptions), options.offerOptions)
                : undefined;
            return this.reportGenerator.generateWorkbook(session.store, { offers, reports: session.batches });
        });
    }

    closeSession(sessionId: string): void {
        this.requireSession(sessionId);
        this.sessions.delete(sessionId);
        this.logger.info(`Session ${sessionId} closed.`);
    }

    // --- Helper Methods ---

    private requireSession(sessionId: string): PriceListSession {
        const session = this.sessions.get(sessionId);
        const now = Date.now();
        if (session && this.isExpired(session, now)) {
            this.sessions.delete(sessionId);
            this.logger.info(`Session ${sessionId} expired after ${config.sessions.ttlMinutes} idle minutes.`);
        } else if (session) {
            session.lastUsedAt = now;
            return session;
        }
        throw new NotFoundError(`Price list session "${sessionId}" not found.`);
    }

    private isExpired(session: PriceListSession, now: number): boolean {
        return now - session.lastUsedAt > this.ttlMs;
    }

    private evictExpired(): void {
        const now = Date.now();
        for (const [id, session] of this.sessions) {
            if (this.isExpired(session, now)) {
                this.sessions.delete(id);
                this.logger.info(`Session ${id} expired after ${config.sessions.ttlMinutes} idle minutes.`);
            }
        }
    }

    /** A suggested mapping is advisory; it is never written into the price list */
    private assertApplicable(request: SupplierMappingRequest): void {
        if (request.source === 'suggested') {
            throw new ValidationError('A suggested mapping cannot be applied; send it back as a confirmed mapping.');
        }
    }

    /**
     * Runs `task` after every writer already queued on the session.
     * A failing task rejects its own promise only; the chain continues.
     */
    private enqueue<T>(session: PriceListSession, task: () => T | Promise<T>): Promise<T> {
        const result = session.queue.then(task);
        session.queue = result.then(
            () => undefined,
            error => {
                this.logger.debug(`Session ${session.id}: queued task failed: ${this.describeError(error)}`);
            }
        );
        return result;
    }

    private renameHeaders(headers: readonly string[], mapping: ColumnMapping): string[] {
        const checked = this.mappingResolver.validate(mapping, headers, { strict: true });
        const renamed = [...headers];
        for (const [field, column] of Object.entries(checked)) {
            renamed[headers.indexOf(column)] = field;
        }
        if (new Set(renamed).size !== renamed.length) {
            throw new ValidationError('Price list mapping produces duplicate column names.');
        }
        return renamed;
    }

    private async prepareSupplierRows(
        table: RawTable,
        request: SupplierMappingRequest,
        options?: ApplySupplierOptions
    ): Promise<PreparedSupplierRows> {
        const mapping = await this.resolveSupplierMapping(table, request);
        const rows = this.mappingResolver.toSupplierRecords(table, mapping, this.columnMapper.canonicalFields());
        return {
            rows,
            options: {
                keys: options?.keys ?? config.reconciliation.keyFields,
                inputFields: options?.inputFields !== undefined ? options.inputFields : config.reconciliation.inputFields,
                ambiguityPolicy: options?.ambiguityPolicy ?? config.reconciliation.ambiguityPolicy,
                selectedRows: options?.selectedRows ? new Set(options.selectedRows) : undefined,
                unmappedFields: this.columnMapper.unresolvedFields(mapping, 'supplier'),
            },
        };
    }

    private applyPrepared(session: PriceListSession, prepared: PreparedSupplierRows, label: string): ReconciliationReport {
        const report = this.reconciliation.apply(prepared.rows, prepared.options, session.store);
        session.batches.push({ label, report });
        return report;
    }

    private toInfo(session: PriceListSession): SessionInfo {
        return {
            id: session.id,
            sourceFile: session.sourceFile,
            createdAt: session.createdAt,
            fields: session.store.fields,
            size: session.store.size,
            batches: session.batches.map(b => ({ label: b.label, summary: b.report.summary })),
        };
    }

    private describeError(error: unknown): string {
        return error instanceof Error ? error.message : String(error);
    }
}
