// src/core/mapping/mapping-resolver.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ValidationError } from '../common/errors';
import {
    CellValue, ColumnMapping, FieldName, RawTable, StaticColumnMapping, SupplierRecord
} from '../common/interfaces/models';
import { assertRawTable, quoteList } from '../common/utils';
import { IMappingResolverService, MappingValidationOptions } from './interfaces/services';
import { STATIC_MAPPINGS_TOKEN } from './vocabulary';

@singleton()
@injectable()
export class MappingResolverService implements IMappingResolverService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(STATIC_MAPPINGS_TOKEN) private staticMappings: Record<string, StaticColumnMapping>
    ) {
        this.logger.info(`MappingResolverService initialized. Static mappings: ${this.listStaticMappings().join(', ') || 'none'}`);
    }

    /**
     * Header order decides collisions: when several original columns target
     * the same field, the last one present in the table wins.
     */
    fromStatic(columns: readonly string[], staticMapping: StaticColumnMapping): ColumnMapping {
        const mapping: ColumnMapping = {};
        for (const column of columns) {
            if (Object.prototype.hasOwnProperty.call(staticMapping, column)) {
                mapping[staticMapping[column]] = column;
            }
        }
        return mapping;
    }

    getStaticMapping(supplierId: string): StaticColumnMapping | null {
        return Object.prototype.hasOwnProperty.call(this.staticMappings, supplierId)
            ? this.staticMappings[supplierId]
            : null;
    }

    listStaticMappings(): string[] {
        return Object.keys(this.staticMappings);
    }

    validate(mapping: ColumnMapping, columns: readonly string[], options: MappingValidationOptions): ColumnMapping {
        const known = new Set(columns);
        const valid: ColumnMapping = {};
        const invalid: string[] = [];

        for (const [field, column] of Object.entries(mapping)) {
            if (known.has(column)) {
                valid[field] = column;
            } else {
                invalid.push(`${field} -> ${column}`);
            }
        }

        if (invalid.length > 0) {
            if (options.strict) {
                throw new ValidationError(`Mapping refers to columns not present in the file: ${quoteList(invalid)}`);
            }
            this.logger.warn(`Dropped mapping entries with unknown columns: ${quoteList(invalid)}`);
        }
        return valid;
    }

    toSupplierRecords(table: RawTable, mapping: ColumnMapping, fields: readonly FieldName[]): SupplierRecord[] {
        assertRawTable(table, 'supplier table');
        const checked = this.validate(mapping, table.headers, { strict: true });

        const targets = [...fields];
        for (const field of Object.keys(checked)) {
            if (!targets.includes(field)) targets.push(field);
        }
        const sourceIndex = new Map<FieldName, number>();
        for (const [field, column] of Object.entries(checked)) {
            sourceIndex.set(field, table.headers.indexOf(column));
        }

        return table.rows.map((row, sourceRow) => {
            const values: Record<FieldName, CellValue> = {};
            for (const field of targets) {
                const index = sourceIndex.get(field);
                values[field] = index === undefined ? null : row[index];
            }
            return { sourceRow, values };
        });
    }
}
