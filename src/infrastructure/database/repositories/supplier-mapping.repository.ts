// src/infrastructure/database/repositories/supplier-mapping.repository.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Repository } from 'typeorm';
import winston from 'winston';

import { SupplierColumnMapping } from '../../../core/common/entities';
import { AppError } from '../../../core/common/errors';
import { ColumnMapping } from '../../../core/common/interfaces/models';
import { IMappingStore } from '../../../core/common/interfaces/repositories';
import { isColumnMapping, sanitizeSupplierId } from '../../../core/common/utils';
import { LOGGER_TOKEN } from '../../logger';

/** The slice of the TypeORM repository the mapping store relies on. */
export type SupplierMappingOrmRepository = Pick<Repository<SupplierColumnMapping>, 'findOneBy' | 'find' | 'insert' | 'update'>;

export const SUPPLIER_MAPPING_ORM_REPOSITORY_TOKEN = Symbol.for('SupplierMappingOrmRepository');

/**
 * Mapping store backed by the `supplier_column_mappings` table.
 * The ORM repository is resolved from the initialised AppDataSource at registration.
 */
@singleton()
@injectable()
export class DatabaseMappingStore implements IMappingStore {

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(SUPPLIER_MAPPING_ORM_REPOSITORY_TOKEN) private readonly repository: SupplierMappingOrmRepository
    ) {
        this.logger.info('DatabaseMappingStore initialized.');
    }

    async load(supplierId: string): Promise<ColumnMapping | null> {
        const id = sanitizeSupplierId(supplierId);
        const row = await this.withDatabaseError(`load mapping "${id}"`, () => this.repository.findOneBy({ supplierId: id }));
        if (!row) return null;

        try {
            const parsed: unknown = JSON.parse(row.mappingJson);
            if (isColumnMapping(parsed)) return parsed;
            this.logger.warn(`DatabaseMappingStore: mapping "${id}" is not a field -> column object; ignoring it.`);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.warn(`DatabaseMappingStore: mapping "${id}" holds invalid JSON (${reason}); ignoring it.`);
        }
        return null;
    }

    async save(supplierId: string, mapping: ColumnMapping): Promise<void> {
        const id = sanitizeSupplierId(supplierId);
        const mappingJson = JSON.stringify(mapping);
        await this.withDatabaseError(`save mapping "${id}"`, async () => {
            const existing = await this.repository.findOneBy({ supplierId: id });
            if (existing) {
                await this.repository.update({ supplierId: id }, { mappingJson });
            } else {
                await this.repository.insert({ supplierId: id, mappingJson });
            }
        });
        this.logger.info(`DatabaseMappingStore: saved mapping for supplier "${id}" (${Object.keys(mapping).length} fields).`);
    }

    async list(): Promise<string[]> {
        const rows = await this.withDatabaseError('list mappings', () =>
            this.repository.find({ select: { supplierId: true }, order: { supplierId: 'ASC' } })
        );
        return rows.map(r => r.supplierId);
    }

    private async withDatabaseError<T>(action: string, work: () => Promise<T>): Promise<T> {
        try {
            return await work();
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            this.logger.error(`DatabaseMappingStore: failed to ${action}.`, { errorMessage: err.message, stack: err.stack });
            throw new AppError('DatabaseError', `Failed to ${action}: ${err.message}`, 500, false);
        }
    }
}
