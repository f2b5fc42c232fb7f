// src/infrastructure/persistence/file-mapping.store.ts
import 'reflect-metadata';
import { promises as fs } from 'fs';
import path from 'path';
import { inject, injectable, singleton } from 'tsyringe';
import winston from 'winston';

import { ColumnMapping } from '../../core/common/interfaces/models';
import { IMappingStore } from '../../core/common/interfaces/repositories';
import { isColumnMapping, sanitizeSupplierId } from '../../core/common/utils';
import { LOGGER_TOKEN } from '../logger';

export const MAPPING_DIRECTORY_TOKEN = Symbol.for('MappingDirectory');

const MAPPING_FILE_NAME = 'mapping.json';

function isErrnoCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Keeps one JSON file per supplier: `<directory>/<supplierId>/mapping.json`.
 */
@singleton()
@injectable()
export class FileMappingStore implements IMappingStore {

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(MAPPING_DIRECTORY_TOKEN) private readonly directory: string
    ) {
        this.logger.info(`FileMappingStore initialized at ${directory}`);
    }

    async load(supplierId: string): Promise<ColumnMapping | null> {
        const file = this.fileFor(supplierId);
        let text: string;
        try {
            text = await fs.readFile(file, 'utf-8');
        } catch (error) {
            if (isErrnoCode(error, 'ENOENT')) return null;
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.warn(`FileMappingStore: cannot read ${file} (${reason}); treating as no saved mapping.`);
            return null;
        }

        try {
            const parsed: unknown = JSON.parse(text);
            if (isColumnMapping(parsed)) return parsed;
            this.logger.warn(`FileMappingStore: ${file} is not a field -> column object; ignoring it.`);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.warn(`FileMappingStore: ${file} holds invalid JSON (${reason}); ignoring it.`);
        }
        return null;
    }

    async save(supplierId: string, mapping: ColumnMapping): Promise<void> {
        const file = this.fileFor(supplierId);
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(file, JSON.stringify(mapping, null, 2), 'utf-8');
        this.logger.info(`FileMappingStore: saved mapping for "${supplierId}" to ${file}`);
    }

    async list(): Promise<string[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(this.directory);
        } catch (error) {
            if (isErrnoCode(error, 'ENOENT')) return [];
            throw error;
        }
        const ids: string[] = [];
        for (const entry of entries.sort()) {
            try {
                await fs.access(path.join(this.directory, entry, MAPPING_FILE_NAME));
                ids.push(entry);
            } catch (error) {
                this.logger.debug(`FileMappingStore: skipping ${entry} (${error instanceof Error ? error.message : String(error)})`);
            }
        }
        return ids;
    }

    private fileFor(supplierId: string): string {
        return path.join(this.directory, sanitizeSupplierId(supplierId), MAPPING_FILE_NAME);
    }
}
