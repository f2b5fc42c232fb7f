// src/core/matching/record-matcher.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ValidationError } from '../common/errors';
import { KeyFieldList, MatchResult, SupplierRecord } from '../common/interfaces/models';
import { normalizeText } from '../normalization';
import { CanonicalStore } from '../store';
import { IRecordMatcherService } from './interfaces/services';

const NO_MATCH: MatchResult = { kind: 'NoMatch' };

@singleton()
@injectable()
export class RecordMatcherService implements IRecordMatcherService {

    constructor(@inject(LOGGER_TOKEN) private logger: Logger) {
        this.logger.info('RecordMatcherService initialized.');
    }

    /**
     * The first key with a non-empty supplier value and at least one hit decides.
     * Several hits give an AmbiguousMatch pointing at the first row in store order.
     */
    match(row: SupplierRecord, keys: KeyFieldList, store: CanonicalStore): MatchResult {
        if (keys.length === 0) {
            throw new ValidationError('At least one key field is required for matching.');
        }

        for (const keyField of keys) {
            const keyValue = normalizeText(row.values[keyField]);
            if (keyValue === '') continue; // empty never matches empty

            const candidates = store.find(keyField, keyValue);
            if (candidates.length === 1) {
                return { kind: 'Matched', rowIndex: candidates[0], keyField, keyValue };
            }
            if (candidates.length > 1) {
                this.logger.debug(`Row ${row.sourceRow}: ${keyField}="${keyValue}" hits rows ${candidates.join(', ')}`);
                return { kind: 'AmbiguousMatch', rowIndex: candidates[0], keyField, keyValue, candidates };
            }
        }
        return NO_MATCH;
    }
}
