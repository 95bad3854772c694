import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { AuthResolver, ClientFault, PolicyConnector } from '../contracts/index.js';
import type { Identity } from '../context/identity.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { PolicyStoreAbortedError } from '../policy/errors.js';
import type { PolicyContent } from '../validation/schema.js';
import { ValidationError } from '../validation/zod-middleware.js';
import { createAuthMiddleware } from './authMiddleware.js';
import { createPolicyRouter } from './policyRouter.js';

export const DEFAULT_BODY_LIMIT = '10mb';

export interface PolicyAppOptions {
    connector: PolicyConnector<PolicyContent>;
    authResolver: AuthResolver<Identity, ClientFault, Error>;
    bodyLimit?: string;
}

const log = logger.child({ component: 'PolicyApi' });

/** Errors raised by express' body parser carry the status to answer with. */
function bodyParserStatus(err: unknown): number | undefined {
    if (!(err instanceof Error) || !('status' in err)) return undefined;
    const status = err.status;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(err);
        return;
    }

    if (err instanceof ValidationError) {
        res.status(err.statusCode).json({ error: err.message, code: err.code });
        return;
    }

    const parserStatus = bodyParserStatus(err);
    if (parserStatus !== undefined) {
        log.info({ status: parserStatus, path: req.path }, 'Rejected unreadable request body');
        res.status(parserStatus).json({ error: 'Invalid request body', code: 'INVALID_BODY' });
        return;
    }

    if (err instanceof PolicyStoreAbortedError) {
        log.info({ operation: err.operation, path: req.path }, 'Request aborted by client');
    }

    const sanitized = ErrorSanitizer.sanitize(err, `PolicyApi:${req.method} ${req.path}`, 'STORE');
    res.status(500).json({ error: sanitized.publicMessage, incidentId: sanitized.incidentId });
}

/**
 * Builds the policy API: JSON parsing, then authentication, then the routes.
 */
export function createPolicyApp(options: PolicyAppOptions): Express {
    const app = express();
    app.disable('x-powered-by');

    app.use(express.json({ limit: options.bodyLimit ?? DEFAULT_BODY_LIMIT }));
    app.use(createAuthMiddleware(options.authResolver));
    app.use(createPolicyRouter(options.connector));
    app.use(errorHandler);

    return app;
}
