import { z } from 'zod';
import type { DatabaseConnectionConfig } from '../../db/pool.js';
import { ConfigGuard, ConfigGuardViolation, type Env } from '../config-guard.js';
import { AUTH_CONFIG_GUARDS } from './auth-config.js';
import { DB_CONFIG_GUARDS } from './db-config.js';

const booleanFlag = z.enum(['true', 'false']).default('false').transform(value => value === 'true');

const EnvSchema = z.object({
    NODE_ENV: z.string().optional(),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    HOST: z.string().min(1).default('0.0.0.0'),

    POLICY_STORE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),
    DB_HOST: z.string().optional(),
    DB_PORT: z.coerce.number().int().min(1).max(65535).optional(),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().optional(),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    DB_SSL: booleanFlag,
    DB_CA_CERT: z.string().optional(),

    AUTH_MODE: z.enum(['jwk', 'none']).default('jwk'),
    JWKS_PATH: z.string().optional(),
    JWT_INITIATOR_CLAIM: z.string().min(1).default('sub'),
});

export type StoreConfig =
    | { backend: 'postgres'; database: DatabaseConnectionConfig }
    | { backend: 'memory' };

export type AuthConfig =
    | { mode: 'jwk'; jwksPath: string; initiatorClaim: string }
    | { mode: 'none' };

export interface ServiceConfig {
    host: string;
    port: number;
    store: StoreConfig;
    auth: AuthConfig;
}

/**
 * Parses and validates the service environment.
 * @throws ConfigGuardViolation listing every problem found
 */
export function loadServiceConfig(env: Env = process.env): ServiceConfig {
    ConfigGuard.enforce([...DB_CONFIG_GUARDS, ...AUTH_CONFIG_GUARDS], env);

    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigGuardViolation(
            result.error.issues.map(issue => `FATAL CONFIG: ${issue.path.join('.')} ${issue.message}`)
        );
    }
    const parsed = result.data;

    let store: StoreConfig;
    if (parsed.POLICY_STORE_BACKEND === 'memory') {
        store = { backend: 'memory' };
    } else {
        // Presence is guaranteed by DB_CONFIG_GUARDS; re-checked to narrow.
        const { DB_HOST, DB_PORT, DB_USER, DB_PASSWORD, DB_NAME } = parsed;
        if (DB_HOST === undefined || DB_PORT === undefined || DB_USER === undefined || DB_PASSWORD === undefined || DB_NAME === undefined) {
            throw new ConfigGuardViolation(['FATAL CONFIG: Incomplete database configuration']);
        }
        store = {
            backend: 'postgres',
            database: {
                host: DB_HOST,
                port: DB_PORT,
                user: DB_USER,
                password: DB_PASSWORD,
                database: DB_NAME,
                max: parsed.DB_POOL_MAX,
                connectionTimeoutMillis: parsed.DB_CONNECT_TIMEOUT_MS,
                ssl: parsed.DB_SSL,
                caCert: parsed.DB_CA_CERT,
            },
        };
    }

    let auth: AuthConfig;
    if (parsed.AUTH_MODE === 'none') {
        auth = { mode: 'none' };
    } else {
        if (parsed.JWKS_PATH === undefined) {
            throw new ConfigGuardViolation(['FATAL CONFIG: Required env var JWKS_PATH is missing']);
        }
        auth = { mode: 'jwk', jwksPath: parsed.JWKS_PATH, initiatorClaim: parsed.JWT_INITIATOR_CLAIM };
    }

    return { host: parsed.HOST, port: parsed.PORT, store, auth };
}
