import type { GuardRule } from '../config-guard.js';

/**
 * Auth Configuration Guards
 */
export const AUTH_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'JWKS_PATH', when: (env) => (env.AUTH_MODE ?? 'jwk') === 'jwk' },

    {
        type: 'forbidIf',
        name: 'NOOP_AUTH_IN_PRODUCTION',
        when: (env) => env.NODE_ENV === 'production' && env.AUTH_MODE === 'none',
        message: 'AUTH_MODE=none accepts every request and is forbidden in production',
    },
];
