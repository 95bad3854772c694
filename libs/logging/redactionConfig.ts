/**
 * Centralized Redaction Configuration
 * Keys that must never reach the logs in clear.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'headers.authorization', '*.headers.authorization',
    'token', '*.token',
    'jwt', '*.jwt',
    'rawToken', '*.rawToken',
    'password', '*.password',
    'secret', '*.secret',

    // Key material: the `k` member of an octet JWK
    'k', '*.k',
    'keys[*].k',

    // Database
    'db.password',
    'connectionString', '*.connectionString'
];

export const REDACT_CENSOR = '[REDACTED]';
