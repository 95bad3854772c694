import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard, ConfigGuardViolation } from '../../libs/bootstrap/config-guard.js';
import { loadServiceConfig } from '../../libs/bootstrap/config/service-config.js';

const POSTGRES_ENV = {
    DB_HOST: 'localhost',
    DB_PORT: '5432',
    DB_USER: 'policy',
    DB_PASSWORD: 'test-password',
    DB_NAME: 'policies',
    JWKS_PATH: '/etc/policy-store/keys.json',
};

function violations(fn: () => unknown): readonly string[] {
    try {
        fn();
    } catch (error) {
        if (error instanceof ConfigGuardViolation) return error.violations;
        throw error;
    }
    assert.fail('expected a ConfigGuardViolation');
}

describe('loadServiceConfig', () => {
    it('builds a Postgres configuration with defaults', () => {
        const config = loadServiceConfig(POSTGRES_ENV);

        assert.deepStrictEqual(config, {
            host: '0.0.0.0',
            port: 3000,
            store: {
                backend: 'postgres',
                database: {
                    host: 'localhost',
                    port: 5432,
                    user: 'policy',
                    password: 'test-password',
                    database: 'policies',
                    max: 10,
                    connectionTimeoutMillis: 2000,
                    ssl: false,
                    caCert: undefined,
                },
            },
            auth: { mode: 'jwk', jwksPath: '/etc/policy-store/keys.json', initiatorClaim: 'sub' },
        });
    });

    it('needs no database settings for the memory backend', () => {
        const config = loadServiceConfig({ POLICY_STORE_BACKEND: 'memory', AUTH_MODE: 'none', PORT: '8080' });

        assert.deepStrictEqual(config.store, { backend: 'memory' });
        assert.deepStrictEqual(config.auth, { mode: 'none' });
        assert.strictEqual(config.port, 8080);
    });

    it('lists every missing database setting at once', () => {
        assert.deepStrictEqual(violations(() => loadServiceConfig({ AUTH_MODE: 'none', DB_HOST: 'localhost' })), [
            'FATAL CONFIG: Required env var DB_PORT is missing',
            'FATAL CONFIG: Required env var DB_USER is missing',
            'FATAL CONFIG: Required env var DB_PASSWORD is missing',
            'FATAL CONFIG: Required env var DB_NAME is missing',
        ]);
    });

    it('requires a key set in jwk mode', () => {
        assert.deepStrictEqual(violations(() => loadServiceConfig({ POLICY_STORE_BACKEND: 'memory' })), [
            'FATAL CONFIG: Required env var JWKS_PATH is missing',
        ]);
    });

    it('refuses unsafe settings in production', () => {
        const found = violations(() => loadServiceConfig({
            ...POSTGRES_ENV,
            NODE_ENV: 'production',
            AUTH_MODE: 'none',
        }));

        assert.deepStrictEqual(found, [
            'FATAL CONFIG: DB_SSL must be true in production',
            'FATAL CONFIG: AUTH_MODE=none accepts every request and is forbidden in production (Rule: NOOP_AUTH_IN_PRODUCTION)',
        ]);
    });

    it('refuses the memory backend in production', () => {
        const found = violations(() => loadServiceConfig({
            NODE_ENV: 'production',
            POLICY_STORE_BACKEND: 'memory',
            JWKS_PATH: '/keys.json',
        }));

        assert.deepStrictEqual(found, [
            'FATAL CONFIG: The in-memory policy store loses every version on restart and is forbidden in production (Rule: MEMORY_BACKEND_IN_PRODUCTION)',
        ]);
    });

    it('reports values of the wrong shape', () => {
        const found = violations(() => loadServiceConfig({ ...POSTGRES_ENV, DB_PORT: 'five', DB_SSL: 'yes' }));

        assert.strictEqual(found.length, 2);
        assert.ok(found[0].startsWith('FATAL CONFIG: DB_PORT '));
        assert.ok(found[1].startsWith('FATAL CONFIG: DB_SSL '));
    });
});

describe('ConfigGuard', () => {
    it('records a rule that throws as a violation', () => {
        const found = violations(() => ConfigGuard.enforce([
            {
                type: 'assert',
                check: () => {
                    throw new Error('lookup failed');
                },
                message: 'unreachable',
            },
        ], {}));

        assert.deepStrictEqual(found, ['Check failed for rule: lookup failed']);
    });

    it('treats blank values as missing', () => {
        const found = violations(() => ConfigGuard.enforce([{ type: 'required', name: 'TOKEN' }], { TOKEN: '   ' }));

        assert.deepStrictEqual(found, ['FATAL CONFIG: Required env var TOKEN is missing']);
    });
});
