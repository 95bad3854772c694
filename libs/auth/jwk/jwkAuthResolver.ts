import type { IncomingHttpHeaders } from 'node:http';
import { decodeProtectedHeader, jwtVerify, type JWTPayload, type ProtectedHeaderParameters } from 'jose';
import type { AuthResolver } from '../../contracts/authResolver.js';
import type { ClientFault } from '../../contracts/clientFault.js';
import type { KeyResolver } from '../../contracts/keyResolver.js';
import { accepted, failed, rejected, type TwoLevelOutcome } from '../../contracts/outcome.js';
import { PLACEHOLDER_DISPLAY_NAME, type Identity } from '../../context/identity.js';
import { logger } from '../../logging/logger.js';
import { AuthClientError, AuthServerError } from './errors.js';

const AUTHORIZATION = 'authorization';
const BEARER_PREFIX = 'Bearer ';
const CLOCK_TOLERANCE_SECONDS = 60;

// Visible ASCII plus space and tab: anything else cannot be a header token.
const HEADER_SAFE = /^[\t\x20-\x7e]*$/;

const log = logger.child({ component: 'JwkAuthResolver' });

function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

/**
 * Extracts the raw token from `Authorization: Bearer <token>`.
 */
export function extractBearer(headers: IncomingHttpHeaders): { ok: true; token: string } | { ok: false; error: AuthClientError } {
    const value = headers[AUTHORIZATION];
    if (value === undefined) {
        return { ok: false, error: new AuthClientError('AUTH_HEADER_MISSING', 400, `Missing header '${AUTHORIZATION}' in request`) };
    }
    if (!HEADER_SAFE.test(value)) {
        return {
            ok: false,
            error: new AuthClientError('AUTH_HEADER_NON_ASCII', 400, `Value of header '${AUTHORIZATION}' in request is not visible ASCII`),
        };
    }
    if (!value.startsWith(BEARER_PREFIX)) {
        return {
            ok: false,
            error: new AuthClientError('AUTH_BEARER_MISSING', 400, `Missing "Bearer " in header '${AUTHORIZATION}' in request`),
        };
    }
    return { ok: true, token: value.slice(BEARER_PREFIX.length) };
}

/**
 * Authenticates requests carrying a JWT signed with a key from the key
 * resolver. The identity id comes from `initiatorClaim`; the display name is
 * not carried by tokens yet.
 */
export class JwkAuthResolver implements AuthResolver<Identity, AuthClientError, AuthServerError> {
    constructor(
        private readonly initiatorClaim: string,
        private readonly keyResolver: KeyResolver<ClientFault, Error>
    ) {}

    async authorize(headers: IncomingHttpHeaders): Promise<TwoLevelOutcome<Identity, AuthClientError, AuthServerError>> {
        log.debug('Handling JWT authentication for incoming request');

        const bearer = extractBearer(headers);
        if (!bearer.ok) {
            return rejected(bearer.error);
        }
        const raw = bearer.token;

        let header: ProtectedHeaderParameters;
        try {
            header = decodeProtectedHeader(raw);
        } catch (error) {
            return rejected(new AuthClientError('ILLEGAL_JWT', 400, `Illegal JWT in header '${AUTHORIZATION}'`, { cause: error }));
        }
        if (typeof header.alg !== 'string') {
            return rejected(new AuthClientError('ILLEGAL_JWT', 400, `JWT in header '${AUTHORIZATION}' names no algorithm`));
        }
        const algorithm = header.alg;

        log.debug({ kid: header.kid, alg: algorithm }, 'Resolving key');
        const resolved = await this.keyResolver.resolveKey(header);
        if (!resolved.ok) {
            return failed(new AuthServerError(resolved.error));
        }
        if (!resolved.value.ok) {
            const fault = resolved.value.error;
            return rejected(new AuthClientError('KEY_RESOLVE', fault.statusCode, fault.message, { cause: fault }));
        }

        let payload: JWTPayload;
        try {
            ({ payload } = await jwtVerify(raw, resolved.value.value, {
                algorithms: [algorithm],
                requiredClaims: ['exp'],
                clockTolerance: CLOCK_TOLERANCE_SECONDS,
            }));
        } catch (error) {
            return rejected(new AuthClientError('JWT_VALIDATE', 401, `Failed to validate JWT in header '${AUTHORIZATION}'`, { cause: error }));
        }

        if (!Object.prototype.hasOwnProperty.call(payload, this.initiatorClaim)) {
            return rejected(new AuthClientError(
                'JWT_MISSING_CLAIM',
                400,
                `Initiator claim '${this.initiatorClaim}' not found in JWT in header '${AUTHORIZATION}'`
            ));
        }

        const initiator: unknown = payload[this.initiatorClaim];
        let id: string;
        if (typeof initiator === 'string') {
            id = initiator;
        } else if (typeof initiator === 'number') {
            // Fractions and unsafe integers have no single decimal spelling.
            if (!Number.isSafeInteger(initiator)) {
                return rejected(new AuthClientError(
                    'JWT_ILLEGAL_CLAIM_TYPE',
                    400,
                    `JWT initiator claim '${this.initiatorClaim}' has an invalid value: numbers must be integers (got ${String(initiator)})`
                ));
            }
            id = String(initiator);
        } else {
            return rejected(new AuthClientError(
                'JWT_ILLEGAL_CLAIM_TYPE',
                400,
                `JWT initiator claim '${this.initiatorClaim}' has an invalid type: only strings and numbers allowed (got ${describeValue(initiator)})`
            ));
        }

        log.debug({ userId: id }, 'JWT validated');
        return accepted({ id, name: PLACEHOLDER_DISPLAY_NAME });
    }
}
