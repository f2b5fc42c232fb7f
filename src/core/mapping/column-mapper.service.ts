// src/core/mapping/column-mapper.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ColumnMapping, FieldName, MappingRole } from '../common/interfaces/models';
import { normalizeHeader } from '../normalization';
import { IColumnMapperService, SuggestMappingOptions } from './interfaces/services';
import { bestMatch, headerHasHint } from './similarity.utils';
import { FIELD_VOCABULARY_TOKEN, FieldRule, FieldVocabulary } from './vocabulary';

@singleton()
@injectable()
export class ColumnMapperService implements IColumnMapperService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(FIELD_VOCABULARY_TOKEN) private vocabulary: FieldVocabulary
    ) {
        this.logger.info(`ColumnMapperService initialized with ${vocabulary.fields.length} canonical fields.`);
    }

    suggestMapping(columns: readonly string[], role: MappingRole, options?: SuggestMappingOptions): ColumnMapping {
        const threshold = options?.threshold ?? config.mapping.similarityThreshold;
        const normalized = columns.map(c => normalizeHeader(c));
        const mapping: ColumnMapping = {};

        for (const rule of this.vocabulary.roles[role]) {
            const column = this.resolveRule(rule, columns, normalized, threshold);
            if (column !== null) {
                mapping[rule.field] = column;
            }
        }

        this.logger.debug(`Suggested ${role} mapping: ${JSON.stringify(mapping)}`);
        return mapping;
    }

    unresolvedFields(mapping: ColumnMapping, role: MappingRole): FieldName[] {
        return this.vocabulary.roles[role]
            .map(rule => rule.field)
            .filter(field => mapping[field] === undefined);
    }

    canonicalFields(): readonly FieldName[] {
        return this.vocabulary.fields;
    }

    /** preferred label, then hint vocabulary, then fuzzy label */
    private resolveRule(
        rule: FieldRule,
        columns: readonly string[],
        normalized: readonly string[],
        threshold: number
    ): string | null {
        if (rule.preferredLabel) {
            const label = normalizeHeader(rule.preferredLabel);
            const byToken = normalized.findIndex(header => headerHasHint(header, label));
            if (byToken >= 0) {
                return columns[byToken];
            }
            const preferred = bestMatch(rule.preferredLabel, columns, threshold);
            if (preferred) {
                this.logger.debug(`Field "${rule.field}" -> "${preferred.candidate}" (preferred label, score ${preferred.score.toFixed(1)})`);
                return preferred.candidate;
            }
        }

        const byHint = normalized.findIndex(header => rule.hints.some(hint => headerHasHint(header, hint)));
        if (byHint >= 0) {
            return columns[byHint];
        }

        const fuzzy = bestMatch(rule.label, columns, threshold);
        if (fuzzy) {
            this.logger.debug(`Field "${rule.field}" -> "${fuzzy.candidate}" (fuzzy, score ${fuzzy.score.toFixed(1)})`);
            return fuzzy.candidate;
        }
        return null;
    }
}
