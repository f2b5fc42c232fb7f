// src/core/reconciliation/reconciliation.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ValidationError } from '../common/errors';
import {
    AmbiguousMatchWarning, CellValue, FieldName, ReconciliationOptions, ReconciliationOutcome,
    ReconciliationPreview, ReconciliationReport, ReconciliationSummary, SupplierRecord
} from '../common/interfaces/models';
import { IRecordMatcherService, RecordMatcherService } from '../matching';
import { normalizeText } from '../normalization';
import { CanonicalStore } from '../store';
import { IReconciliationService } from './interfaces/services';

// Helper to create an empty summary object
const getEmptySummary = (unmappedFields: readonly FieldName[]): ReconciliationSummary => ({
    processed: 0,
    updated: 0,
    unchanged: 0,
    inserted: 0,
    skipped: 0,
    ambiguous: 0,
    unmappedFields: [...unmappedFields],
});

@singleton()
@injectable()
export class ReconciliationService implements IReconciliationService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(RecordMatcherService) private matcher: IRecordMatcherService
    ) {
        this.logger.info('ReconciliationService initialized.');
    }

    apply(rows: readonly SupplierRecord[], options: ReconciliationOptions, store: CanonicalStore): ReconciliationReport {
        if (options.keys.length === 0) {
            throw new ValidationError('At least one key field is required for reconciliation.');
        }

        // --- Determine effective options ---
        const ambiguityPolicy = options.ambiguityPolicy ?? config.reconciliation.ambiguityPolicy;
        const inputFields = options.inputFields ?? null;
        const selectedRows = options.selectedRows;

        this.logger.info(
            `Starting reconciliation. Rows: ${rows.length}, Store size: ${store.size}, Keys: ${options.keys.join(' > ')}, ` +
            `Input fields: ${inputFields ? inputFields.join(', ') : 'all supplied'}, Ambiguity: ${ambiguityPolicy}`
        );

        const outcomes: ReconciliationOutcome[] = [];
        const warnings: AmbiguousMatchWarning[] = [];
        const summary = getEmptySummary(options.unmappedFields ?? []);

        for (const row of rows) {
            summary.processed++;

            if (selectedRows && !selectedRows.has(row.sourceRow)) {
                outcomes.push({ kind: 'Skipped', sourceRow: row.sourceRow, reason: 'not-selected' });
                summary.skipped++;
                continue;
            }

            const writable = this.writableFields(row, inputFields, store);
            const match = this.matcher.match(row, options.keys, store);

            if (match.kind === 'NoMatch') {
                const rowIndex = this.insert(row, writable, store);
                outcomes.push({ kind: 'Inserted', sourceRow: row.sourceRow, rowIndex });
                summary.inserted++;
                this.logger.debug(`Row ${row.sourceRow}: inserted as ${rowIndex}`);
                continue;
            }

            if (match.kind === 'AmbiguousMatch') {
                const resolvedTo = ambiguityPolicy === 'first' ? match.rowIndex : null;
                warnings.push({
                    sourceRow: row.sourceRow,
                    keyField: match.keyField,
                    keyValue: match.keyValue,
                    candidates: match.candidates,
                    resolvedTo,
                });
                summary.ambiguous++;
                this.logger.warn(
                    `Ambiguous match for supplier row ${row.sourceRow}: ${match.keyField}="${match.keyValue}" ` +
                    `matches rows ${match.candidates.join(', ')}. ` +
                    (resolvedTo === null ? 'Left for review.' : `Applied to row ${resolvedTo}.`)
                );
                if (resolvedTo === null) {
                    outcomes.push({ kind: 'Skipped', sourceRow: row.sourceRow, reason: 'needs-review' });
                    summary.skipped++;
                    continue;
                }
            }

            const changedFields = this.update(row, match.rowIndex, writable, store);
            outcomes.push({ kind: 'Updated', sourceRow: row.sourceRow, rowIndex: match.rowIndex, changedFields });
            if (changedFields.length > 0) {
                summary.updated++;
                this.logger.debug(`Row ${row.sourceRow}: updated row ${match.rowIndex} (${changedFields.join(', ')})`);
            } else {
                summary.unchanged++;
            }
        }

        this.logger.info(
            `Reconciliation complete. Updated: ${summary.updated}, Unchanged: ${summary.unchanged}, ` +
            `Inserted: ${summary.inserted}, Skipped: ${summary.skipped}, Ambiguous: ${summary.ambiguous}`
        );
        return { outcomes, warnings, summary };
    }

    preview(rows: readonly SupplierRecord[], options: ReconciliationOptions, store: CanonicalStore): ReconciliationPreview {
        const report = this.apply(rows, options, store.clone());
        const bySourceRow = new Map(rows.map(r => [r.sourceRow, r]));

        const pick = (kind: 'Updated' | 'Inserted'): SupplierRecord[] =>
            report.outcomes
                .filter(o => o.kind === kind)
                .map(o => bySourceRow.get(o.sourceRow))
                .filter((r): r is SupplierRecord => r !== undefined);

        return { report, updates: pick('Updated'), inserts: pick('Inserted') };
    }

    /** Input fields (or every field the row carries) that also exist in the store. */
    private writableFields(row: SupplierRecord, inputFields: readonly FieldName[] | null, store: CanonicalStore): FieldName[] {
        const candidates = inputFields ?? Object.keys(row.values);
        return candidates.filter(field => store.hasField(field));
    }

    private update(row: SupplierRecord, rowIndex: number, fields: readonly FieldName[], store: CanonicalStore): FieldName[] {
        const changed: FieldName[] = [];
        for (const field of fields) {
            const incoming: CellValue | undefined = row.values[field];
            if (incoming === null || incoming === undefined) continue;
            if (normalizeText(incoming) !== normalizeText(store.get(rowIndex, field))) {
                store.set(rowIndex, field, incoming);
                changed.push(field);
            }
        }
        return changed;
    }

    private insert(row: SupplierRecord, fields: readonly FieldName[], store: CanonicalStore): number {
        const values: Record<FieldName, CellValue> = {};
        for (const field of fields) {
            values[field] = row.values[field] ?? null;
        }
        return store.append(values);
    }
}
