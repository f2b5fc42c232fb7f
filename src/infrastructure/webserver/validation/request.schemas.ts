// src/infrastructure/webserver/validation/request.schemas.ts
import { z } from 'zod';
import { ValidationError } from '../../../core/common/errors';
import { SupplierMappingRequest } from '../../../core/sessions';

// Multipart text fields arrive as strings: JSON for objects, "a,b" or JSON for lists.

function parseJsonText(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    try {
        return JSON.parse(value);
    } catch {
        return value; // left for the schema to reject
    }
}

function splitList(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    const text = value.trim();
    if (text.startsWith('[')) return parseJsonText(text);
    return text === '' ? [] : text.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

function parseBooleanText(value: unknown): unknown {
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    return value;
}

export const columnMappingSchema = z.record(z.string().min(1));

const fieldListSchema = z.preprocess(splitList, z.array(z.string().min(1)));
const booleanFieldSchema = z.preprocess(parseBooleanText, z.boolean());

export const tableSelectionSchema = z.object({
    sheetName: z.string().min(1).optional(),
    headerRow: z.coerce.number().int().min(0).optional(),
});

export const openSessionSchema = tableSelectionSchema.extend({
    internalMapping: z.preprocess(parseJsonText, columnMappingSchema).optional(),
});
export type OpenSessionInput = z.infer<typeof openSessionSchema>;

// `suggested` is accepted by describe and preview only; the apply routes reject it
export const supplierRequestSchema = tableSelectionSchema.extend({
    source: z.enum(['confirmed', 'static', 'saved', 'suggested']).default('suggested'),
    supplierId: z.string().trim().min(1).max(128).optional(),
    mapping: z.preprocess(parseJsonText, columnMappingSchema).optional(),
    save: booleanFieldSchema.optional(),
    keys: fieldListSchema.optional(),
    inputFields: fieldListSchema.optional(),
    ambiguityPolicy: z.enum(['first', 'review']).optional(),
    selectedRows: z.preprocess(splitList, z.array(z.coerce.number().int().min(0))).optional(),
    label: z.string().min(1).max(200).optional(),
});
export type SupplierRequestInput = z.infer<typeof supplierRequestSchema>;

export const offersSchema = z.object({
    discountRate: z.coerce.number().min(0).max(1).optional(),
    priceField: z.string().min(1).optional(),
    codeField: z.string().min(1).optional(),
    descriptionField: z.string().min(1).optional(),
});
export type OffersInput = z.infer<typeof offersSchema>;

export const exportQuerySchema = offersSchema.extend({
    includeOffers: booleanFieldSchema.optional(),
});

/**
 * Validates request input against a schema.
 * @throws {ValidationError} listing every issue as "path: message"
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
    const result = schema.safeParse(input ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`);
        throw new ValidationError(`Invalid request: ${issues.join('; ')}`);
    }
    return result.data;
}

/** Turns validated input into the mapping request understood by the session service. */
export function toMappingRequest(input: SupplierRequestInput): SupplierMappingRequest {
    switch (input.source) {
        case 'confirmed':
            if (!input.mapping) {
                throw new ValidationError('A confirmed mapping requires the "mapping" field.');
            }
            return { source: 'confirmed', mapping: input.mapping, supplierId: input.supplierId, save: input.save };
        case 'static':
        case 'saved':
            if (!input.supplierId) {
                throw new ValidationError(`Mapping source "${input.source}" requires "supplierId".`);
            }
            return { source: input.source, supplierId: input.supplierId };
        case 'suggested':
            return { source: 'suggested' };
    }
}
