import pg from 'pg';
import { logger } from '../logging/logger.js';

const { Pool } = pg;

export interface DatabaseConnectionConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    /** Upper bound of pooled connections. */
    max: number;
    /** How long connect() waits for a free connection before rejecting. */
    connectionTimeoutMillis: number;
    ssl: boolean;
    caCert?: string;
}

/** Rows arrive untyped; callers validate their shape. */
export interface DbQueryResult {
    rows: unknown[];
    rowCount: number | null;
}

export interface DbClient {
    query(text: string, params?: unknown[]): Promise<DbQueryResult>;
    /** Passing an error destroys the underlying connection instead of reusing it. */
    release(destroy?: Error): void;
}

export interface DbPool {
    connect(): Promise<DbClient>;
    end(): Promise<void>;
}

/**
 * Bounded pg pool. Exhaustion makes connect() reject after
 * `connectionTimeoutMillis` rather than queue forever.
 */
export function createPool(config: DatabaseConnectionConfig): DbPool {
    const pool = new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.max,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: config.connectionTimeoutMillis,
        ssl: config.ssl
            ? {
                rejectUnauthorized: true,
                ca: config.caCert,
            }
            : false
    });

    pool.on('error', (error) => {
        // Idle clients can die underneath the pool; pg drops them itself.
        logger.error({ error }, '[DB] Idle client error');
    });

    return {
        connect: async () => {
            const client = await pool.connect();
            return {
                query: (text: string, params?: unknown[]) => client.query(text, params),
                release: (destroy?: Error) => client.release(destroy),
            };
        },
        end: () => pool.end(),
    };
}

/** Identity of a database for error messages. Never includes the password. */
export function describeDatabase(config: Pick<DatabaseConnectionConfig, 'host' | 'port' | 'user' | 'database'>): string {
    return `${config.user}@${config.host}:${config.port}/${config.database}`;
}

export function releaseClient(client: DbClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}
