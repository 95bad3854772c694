import { z } from 'zod';
import { IdentitySchema, type Identity } from '../context/identity.js';

/**
 * Metadata supplied by whoever submits a policy. None of it is unique.
 */
export interface AttachedMetadata {
    readonly name: string;
    readonly description: string;
    /** Tag naming the language the content is written in. */
    readonly language: string;
}

/**
 * Full metadata of a stored version: what the submitter attached plus what
 * the ledger assigned.
 */
export interface Metadata {
    readonly attached: AttachedMetadata;
    readonly version: number;
    readonly creator: Identity;
    readonly created: Date;
}

export const AttachedMetadataSchema = z.object({
    name: z.string(),
    description: z.string(),
    language: z.string(),
});

/** Wire form of {@link Metadata}; `created` travels as an ISO-8601 string. */
export const MetadataSchema = z.object({
    attached: AttachedMetadataSchema,
    version: z.number().int().nonnegative(),
    creator: IdentitySchema,
    created: z.coerce.date(),
});

export interface MetadataJson {
    attached: AttachedMetadata;
    version: number;
    creator: Identity;
    created: string;
}

export function metadataToJson(metadata: Metadata): MetadataJson {
    return {
        attached: {
            name: metadata.attached.name,
            description: metadata.attached.description,
            language: metadata.attached.language,
        },
        version: metadata.version,
        creator: { id: metadata.creator.id, name: metadata.creator.name },
        created: metadata.created.toISOString(),
    };
}
