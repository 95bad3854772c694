import type { Env, GuardRule } from '../config-guard.js';

const usesPostgres = (env: Env) => (env.POLICY_STORE_BACKEND ?? 'postgres') === 'postgres';

/**
 * DB Configuration Guards
 * Connection parameters must be explicit whenever the Postgres backend is selected.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST', when: usesPostgres },
    { type: 'required', name: 'DB_PORT', when: usesPostgres },
    { type: 'required', name: 'DB_USER', when: usesPostgres },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true, when: usesPostgres },
    { type: 'required', name: 'DB_NAME', when: usesPostgres },

    {
        type: 'forbidIf',
        name: 'MEMORY_BACKEND_IN_PRODUCTION',
        when: (env) => env.NODE_ENV === 'production' && env.POLICY_STORE_BACKEND === 'memory',
        message: 'The in-memory policy store loses every version on restart and is forbidden in production',
    },

    {
        type: 'assert',
        check: (env) => env.NODE_ENV !== 'production' || !usesPostgres(env) || env.DB_SSL === 'true',
        message: 'DB_SSL must be true in production',
    },
];
