import { z } from 'zod';

/**
 * Who performed an operation. Stored as a snapshot on every row it
 * attributes, never as a reference.
 */
export interface Identity {
    readonly id: string;
    readonly name: string;
}

/**
 * Tokens carry no display name yet; every authenticated identity gets this one.
 */
export const PLACEHOLDER_DISPLAY_NAME = 'John Smith';

export const IdentitySchema = z.object({
    id: z.string(),
    name: z.string(),
});
