import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Turns policy content into the text stored in the database and back. The
 * store never looks inside the content; it only round-trips it.
 */
export interface ContentCodec<C> {
    serialize(content: C): string;
    /** Throws when the stored text does not decode to a valid `C`. */
    deserialize(raw: string): C;
}

export class ContentCodecError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ContentCodecError';
        Object.setPrototypeOf(this, ContentCodecError.prototype);
    }
}

/**
 * JSON codec whose decoded values are checked against `schema`.
 */
export function createJsonCodec<C>(schema: ZodType<C, ZodTypeDef, unknown>): ContentCodec<C> {
    return {
        serialize(content: C): string {
            const raw: string | undefined = JSON.stringify(content);
            if (raw === undefined) {
                throw new ContentCodecError('Content has no JSON representation');
            }
            return raw;
        },

        deserialize(raw: string): C {
            let parsed: unknown;
            try {
                parsed = JSON.parse(raw);
            } catch (error) {
                throw new ContentCodecError('Stored content is not valid JSON', { cause: error });
            }

            const result = schema.safeParse(parsed);
            if (!result.success) {
                const issues = result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
                throw new ContentCodecError(`Stored content does not match its schema: ${issues.join('; ')}`);
            }
            return result.data;
        },
    };
}
