// src/core/mapping/vocabulary.ts
import fs from 'fs';
import { ConfigurationError } from '../common/errors';
import { FieldName, MappingRole, StaticColumnMapping } from '../common/interfaces/models';
import { normalizeHeader } from '../normalization';

/** How one canonical field is looked for in a header row. */
export interface FieldRule {
    readonly field: FieldName;
    /** Hint phrases, already in normalizeHeader form */
    readonly hints: readonly string[];
    /** Fuzzy fallback label */
    readonly label: string;
    /** Fuzzy label tried before the vocabulary (supplier price columns) */
    readonly preferredLabel?: string;
}

/**
 * The shared canonical field vocabulary: which fields exist and how each
 * mapping role looks for them.
 */
export interface FieldVocabulary {
    readonly fields: readonly FieldName[];
    readonly descriptions: Readonly<Record<FieldName, string>>;
    readonly roles: Readonly<Record<MappingRole, readonly FieldRule[]>>;
}

export const FIELD_VOCABULARY_TOKEN = Symbol.for('FieldVocabulary');
export const STATIC_MAPPINGS_TOKEN = Symbol.for('StaticSupplierMappings');

const ROLES: readonly MappingRole[] = ['internal', 'supplier'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function readJsonFile(filePath: string, what: string): unknown {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read ${what} file ${filePath}: ${reason}`);
    }
    try {
        return JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Invalid JSON in ${what} file ${filePath}: ${reason}`);
    }
}

/**
 * Validates the raw vocabulary document and resolves each rule's hint set.
 * @throws {ConfigurationError} on any structural problem
 */
export function parseFieldVocabulary(raw: unknown): FieldVocabulary {
    if (!isRecord(raw)) {
        throw new ConfigurationError('Field vocabulary must be a JSON object.');
    }
    const { vocabulary, hintSets, roles } = raw;

    if (!Array.isArray(vocabulary) || vocabulary.length === 0) {
        throw new ConfigurationError('Field vocabulary needs a non-empty "vocabulary" array.');
    }
    const fields: FieldName[] = [];
    const descriptions: Record<FieldName, string> = {};
    for (const entry of vocabulary) {
        if (!isRecord(entry) || typeof entry.name !== 'string' || entry.name.trim() === '') {
            throw new ConfigurationError('Every vocabulary entry needs a non-empty "name".');
        }
        if (fields.includes(entry.name)) {
            throw new ConfigurationError(`Duplicate vocabulary field "${entry.name}".`);
        }
        fields.push(entry.name);
        descriptions[entry.name] = typeof entry.description === 'string' ? entry.description : '';
    }

    if (!isRecord(hintSets)) {
        throw new ConfigurationError('Field vocabulary needs a "hintSets" object.');
    }
    const resolvedHints = new Map<string, string[]>();
    for (const [name, hints] of Object.entries(hintSets)) {
        if (!isStringArray(hints)) {
            throw new ConfigurationError(`Hint set "${name}" must be an array of strings.`);
        }
        resolvedHints.set(name, hints.map(normalizeHeader).filter(h => h.length > 0));
    }

    if (!isRecord(roles)) {
        throw new ConfigurationError('Field vocabulary needs a "roles" object.');
    }
    const resolvedRoles: Record<MappingRole, FieldRule[]> = { internal: [], supplier: [] };
    for (const role of ROLES) {
        const rules = roles[role];
        if (!Array.isArray(rules)) {
            throw new ConfigurationError(`Field vocabulary needs a rule list for role "${role}".`);
        }
        for (const rule of rules) {
            if (!isRecord(rule) || typeof rule.field !== 'string' || typeof rule.hints !== 'string' || typeof rule.label !== 'string') {
                throw new ConfigurationError(`Invalid rule in role "${role}": expected { field, hints, label }.`);
            }
            if (!fields.includes(rule.field)) {
                throw new ConfigurationError(`Role "${role}" refers to unknown field "${rule.field}".`);
            }
            const hints = resolvedHints.get(rule.hints);
            if (!hints) {
                throw new ConfigurationError(`Role "${role}" refers to unknown hint set "${rule.hints}".`);
            }
            resolvedRoles[role].push({
                field: rule.field,
                hints,
                label: rule.label,
                preferredLabel: typeof rule.preferredLabel === 'string' ? rule.preferredLabel : undefined,
            });
        }
    }

    return { fields, descriptions, roles: resolvedRoles };
}

export function loadFieldVocabulary(filePath: string): FieldVocabulary {
    return parseFieldVocabulary(readJsonFile(filePath, 'field vocabulary'));
}

/**
 * Validates the per-supplier static mapping dictionaries
 * (supplier id -> { original column -> canonical field }).
 */
export function parseStaticMappings(raw: unknown, vocabulary: FieldVocabulary): Record<string, StaticColumnMapping> {
    if (!isRecord(raw)) {
        throw new ConfigurationError('Static supplier mappings must be a JSON object.');
    }
    const result: Record<string, StaticColumnMapping> = {};
    for (const [supplierId, mapping] of Object.entries(raw)) {
        if (!isRecord(mapping)) {
            throw new ConfigurationError(`Static mapping "${supplierId}" must be an object.`);
        }
        const entries: StaticColumnMapping = {};
        for (const [original, target] of Object.entries(mapping)) {
            if (typeof target !== 'string' || !vocabulary.fields.includes(target)) {
                throw new ConfigurationError(`Static mapping "${supplierId}" maps "${original}" to unknown field "${String(target)}".`);
            }
            entries[original] = target;
        }
        result[supplierId] = entries;
    }
    return result;
}

export function loadStaticMappings(filePath: string, vocabulary: FieldVocabulary): Record<string, StaticColumnMapping> {
    return parseStaticMappings(readJsonFile(filePath, 'static supplier mappings'), vocabulary);
}
