import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

export class ValidationError extends Error {
    readonly code = 'VALIDATION_FAILED' as const;
    readonly statusCode = 400;

    constructor(public readonly context: string, public readonly issues: ValidationIssue[]) {
        super(`Validation failed in ${context}: ${issues.map(issue => `${issue.path || '<root>'}: ${issue.message}`).join('; ')}`);
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Fail-closed input validation: returns the parsed value or throws a
 * ValidationError, which the HTTP layer answers with 400.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Only paths and messages; bodies may carry whole policies.
        logger.info({ context, errors: issues }, "Input validation failure");

        throw new ValidationError(context, issues);
    }

    return result.data;
}

/**
 * Factory for creating validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
