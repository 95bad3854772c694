import { logger } from '../logging/logger.js';
import crypto from 'node:crypto';

/**
 * Server faults never reach a caller verbatim. They are wrapped in a generic
 * message and a unique incidentId that points at the full log entry.
 */

export type FaultCategory = 'AUTH' | 'STORE' | 'OPS';

export class SanitizedError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: FaultCategory = 'OPS',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'SanitizedError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const GENERIC_SERVER_MESSAGE = 'An internal server error occurred';

function describe(err: unknown): { message?: string; stack?: string; code?: string; causeChain: string[] } {
    const causeChain: string[] = [];
    if (err instanceof Error) {
        let current: unknown = err.cause;
        while (current instanceof Error && causeChain.length < 8) {
            causeChain.push(current.message);
            current = current.cause;
        }
        const code = 'code' in err ? err.code : undefined;
        return {
            message: err.message,
            stack: err.stack,
            code: typeof code === 'string' ? code : undefined,
            causeChain
        };
    }
    if (typeof err === 'string') {
        return { message: err, causeChain };
    }
    return { message: String(err), causeChain };
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a SanitizedError.
     */
    sanitize: (err: unknown, contextLabel: string, category: FaultCategory = 'OPS'): SanitizedError => {
        if (err instanceof SanitizedError) return err;

        const details = describe(err);
        return new SanitizedError(
            GENERIC_SERVER_MESSAGE,
            {
                originalError: details.message,
                code: details.code,
                causes: details.causeChain,
                stack: details.stack,
                context: contextLabel
            },
            category,
            { cause: err, contextLabel }
        );
    }
};
