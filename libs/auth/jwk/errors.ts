/**
 * Failures of the JWK auth pipeline, split by who can fix them.
 */

export type KeyStoreErrorCode =
    | 'KEYSTORE_READ_FAILED'
    | 'KEYSTORE_PARSE_FAILED'
    | 'KEY_TYPE_UNSUPPORTED'
    | 'KEY_DECODE_FAILED';

/** The key store on disk is unreadable or holds keys we cannot use. */
export class KeyStoreError extends Error {
    readonly code: KeyStoreErrorCode;
    readonly path: string;
    readonly kid?: string;

    constructor(code: KeyStoreErrorCode, path: string, message: string, options?: { kid?: string; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = 'KeyStoreError';
        this.code = code;
        this.path = path;
        this.kid = options?.kid;
        Object.setPrototypeOf(this, KeyStoreError.prototype);
    }
}

export type KeyResolveErrorCode = 'KEY_ID_MISSING' | 'KEY_ID_UNKNOWN';

const KEY_RESOLVE_STATUS: Record<KeyResolveErrorCode, number> = {
    KEY_ID_MISSING: 400,
    KEY_ID_UNKNOWN: 404,
};

export class KeyResolveError extends Error {
    readonly code: KeyResolveErrorCode;
    readonly statusCode: number;
    readonly kid?: string;

    constructor(code: KeyResolveErrorCode, kid?: string) {
        super(code === 'KEY_ID_MISSING' ? 'Missing key ID field in given JWT header' : `Unknown key with ID '${kid}'`);
        this.name = 'KeyResolveError';
        this.code = code;
        this.kid = kid;
        this.statusCode = KEY_RESOLVE_STATUS[code];
        Object.setPrototypeOf(this, KeyResolveError.prototype);
    }
}

export type AuthClientErrorCode =
    | 'AUTH_HEADER_MISSING'
    | 'AUTH_HEADER_NON_ASCII'
    | 'AUTH_BEARER_MISSING'
    | 'ILLEGAL_JWT'
    | 'KEY_RESOLVE'
    | 'JWT_VALIDATE'
    | 'JWT_ILLEGAL_CLAIM_TYPE'
    | 'JWT_MISSING_CLAIM';

/** Something wrong with the request's credentials. */
export class AuthClientError extends Error {
    readonly code: AuthClientErrorCode;
    readonly statusCode: number;

    constructor(code: AuthClientErrorCode, statusCode: number, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = 'AuthClientError';
        this.code = code;
        this.statusCode = statusCode;
        Object.setPrototypeOf(this, AuthClientError.prototype);
    }
}

/** The key resolver failed on its own side. */
export class AuthServerError extends Error {
    readonly code = 'KEY_RESOLVE_FAILED' as const;

    constructor(cause: unknown) {
        super('Failed to resolve key', { cause });
        this.name = 'AuthServerError';
        Object.setPrototypeOf(this, AuthServerError.prototype);
    }
}
