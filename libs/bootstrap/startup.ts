import type { Express } from 'express';
import { JwkAuthResolver, KidResolver } from '../auth/jwk/index.js';
import { NoOpAuthResolver } from '../auth/noopResolver.js';
import type { AuthResolver } from '../contracts/authResolver.js';
import type { ClientFault } from '../contracts/clientFault.js';
import type { PolicyConnector } from '../contracts/policyConnector.js';
import type { Identity } from '../context/identity.js';
import { createPool, describeDatabase } from '../db/pool.js';
import { createPolicyApp } from '../http/app.js';
import { logger } from '../logging/logger.js';
import { MemoryPolicyConnector, PostgresPolicyConnector, createJsonCodec, migratePolicyStore } from '../policy/index.js';
import { PolicyContentSchema, type PolicyContent } from '../validation/schema.js';
import type { AuthConfig, ServiceConfig, StoreConfig } from './config/service-config.js';

export interface PolicyService {
    app: Express;
    /** Releases the store's resources. The HTTP server is the caller's to close. */
    close(): Promise<void>;
}

function createAuthResolver(config: AuthConfig): AuthResolver<Identity, ClientFault, Error> {
    if (config.mode === 'none') {
        logger.warn('Authentication disabled: every request runs as the placeholder identity');
        return new NoOpAuthResolver();
    }
    return new JwkAuthResolver(config.initiatorClaim, KidResolver.fromFile(config.jwksPath));
}

async function createConnector(config: StoreConfig): Promise<{ connector: PolicyConnector<PolicyContent>; close(): Promise<void> }> {
    const codec = createJsonCodec(PolicyContentSchema);

    if (config.backend === 'memory') {
        logger.warn('Using the in-memory policy store: versions are lost on restart');
        return { connector: new MemoryPolicyConnector({ codec }), close: async () => undefined };
    }

    const database = describeDatabase(config.database);
    const pool = createPool(config.database);
    try {
        const applied = await migratePolicyStore(pool, database);
        logger.info({ database, applied }, 'Policy store schema ready');
    } catch (error) {
        await pool.end();
        throw error;
    }

    const connector = new PostgresPolicyConnector({ pool, codec, database });
    return { connector, close: () => connector.close() };
}

export async function bootstrap(config: ServiceConfig): Promise<PolicyService> {
    logger.info({ backend: config.store.backend, auth: config.auth.mode }, 'Bootstrapping policy store');

    const authResolver = createAuthResolver(config.auth);
    const store = await createConnector(config.store);
    const app = createPolicyApp({ connector: store.connector, authResolver });

    logger.info('Startup checks passed');
    return { app, close: store.close };
}
