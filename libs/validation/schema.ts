import { z } from 'zod';
import { AttachedMetadataSchema } from '../policy/types.js';

/**
 * Central schema definitions for everything the policy API accepts.
 */

// --- Content ---

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function isJsonValue(value: unknown): value is JsonValue {
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return true;
        case 'number':
            return Number.isFinite(value);
        case 'object':
            if (value === null) return true;
            if (Array.isArray(value)) return value.every(isJsonValue);
            return Object.values(value).every(isJsonValue);
        default:
            return false;
    }
}

/**
 * Content the service stores. A top-level `null` is excluded because absent
 * versions already read back as `null`. Content is opaque: the checked value
 * passes through untouched, keys such as `__proto__` included.
 */
export type PolicyContent = Exclude<JsonValue, null>;

export const PolicyContentSchema = z.custom<PolicyContent>(
    value => value !== null && isJsonValue(value),
    { message: 'must be a JSON value other than null' }
);

// --- Requests ---

export const VersionNumberSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/** `{version}` path segment: decimal digits only. */
export const VersionParamSchema = z.string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform(Number)
    .pipe(VersionNumberSchema);

export const AddVersionRequestSchema = z.object({
    metadata: AttachedMetadataSchema,
    contents: PolicyContentSchema,
});

export const ActivateRequestSchema = z.object({
    version: VersionNumberSchema,
});

export type AddVersionRequest = z.infer<typeof AddVersionRequestSchema>;
export type ActivateRequest = z.infer<typeof ActivateRequestSchema>;
