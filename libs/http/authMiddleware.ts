import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AuthResolver } from '../contracts/authResolver.js';
import type { ClientFault } from '../contracts/clientFault.js';
import type { Identity } from '../context/identity.js';
import { RequestContext } from '../context/requestContext.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';

const log = logger.child({ component: 'AuthMiddleware' });

/**
 * Express Middleware Factory
 *
 * Authenticates every request before any handler runs. Server faults answer
 * 500 with an incident id only; client faults answer with their own status.
 * On success the rest of the chain runs inside the identity's RequestContext.
 */
export function createAuthMiddleware(resolver: AuthResolver<Identity, ClientFault, Error>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        resolver.authorize(req.headers).then(outcome => {
            if (!outcome.ok) {
                const sanitized = ErrorSanitizer.sanitize(outcome.error, 'AuthMiddleware:authorize', 'AUTH');
                res.status(500).json({ error: sanitized.publicMessage, incidentId: sanitized.incidentId });
                return;
            }

            const decision = outcome.value;
            if (!decision.ok) {
                const fault = decision.error;
                log.info({ code: fault.code, statusCode: fault.statusCode, path: req.path }, 'Request rejected by auth resolver');
                res.status(fault.statusCode).json({ error: fault.message, code: fault.code });
                return;
            }

            RequestContext.run(decision.value, () => next());
        }).catch(next);
    };
}
