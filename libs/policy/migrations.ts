import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { releaseClient, type DbClient, type DbPool } from '../db/pool.js';
import { PolicyStoreConnectError, PolicyStoreQueryError } from './errors.js';
import {
    MIGRATION_LOCK_KEY,
    MIGRATION_QUERIES,
    TX_BEGIN,
    TX_COMMIT,
    TX_ROLLBACK,
    type MigrationQueryName,
} from './queries.js';

export interface Migration {
    readonly id: string;
    readonly statements: readonly string[];
}

/**
 * Schema of the policy store, oldest first. Applied migrations are never
 * edited; changes go in a new entry.
 *
 * `active_version.version` has no foreign key: activating a
 * version does not require it to exist.
 */
export const POLICY_MIGRATIONS: readonly Migration[] = [
    {
        id: '0001_create_policies',
        statements: [
            `CREATE TABLE IF NOT EXISTS policies (
                version BIGINT PRIMARY KEY,
                name TEXT NOT NULL,
                description TEXT NOT NULL,
                language TEXT NOT NULL,
                creator_id TEXT NOT NULL,
                creator_name TEXT NOT NULL,
                created_at TIMESTAMPTZ NOT NULL,
                content TEXT NOT NULL
            )`,
        ],
    },
    {
        id: '0002_create_active_version',
        statements: [
            `CREATE TABLE IF NOT EXISTS active_version (
                id BIGSERIAL PRIMARY KEY,
                version BIGINT NOT NULL,
                activated_at TIMESTAMPTZ NOT NULL,
                activated_by_id TEXT NOT NULL,
                activated_by_name TEXT NOT NULL,
                deactivated_at TIMESTAMPTZ NULL,
                deactivated_by_id TEXT NULL,
                deactivated_by_name TEXT NULL
            )`,
            'CREATE INDEX IF NOT EXISTS active_version_recency_idx ON active_version (activated_at DESC, id DESC)',
        ],
    },
];

const MigrationRowSchema = z.object({ id: z.string() });

const log = logger.child({ component: 'PolicyMigrations' });

/**
 * Applies every pending migration in one transaction. Returns the ids that
 * were applied by this call (empty when the schema is current).
 */
export async function migratePolicyStore(
    pool: DbPool,
    database: string,
    migrations: readonly Migration[] = POLICY_MIGRATIONS,
    clock: () => Date = () => new Date()
): Promise<string[]> {
    let client: DbClient;
    try {
        client = await pool.connect();
    } catch (error) {
        throw new PolicyStoreConnectError(database, error);
    }

    const run = async (name: string, text: string, params?: unknown[]) => {
        try {
            return await client.query(text, params);
        } catch (error) {
            throw new PolicyStoreQueryError(name, database, error);
        }
    };
    const runNamed = (name: MigrationQueryName, params?: unknown[]) =>
        run(`migrate:${name}`, MIGRATION_QUERIES[name], params);

    let forceDestroy = false;
    try {
        await run('migrate:begin', TX_BEGIN);
        const applied: string[] = [];
        try {
            await runNamed('advisoryLock', [MIGRATION_LOCK_KEY]);
            await runNamed('ensureLedger');
            const appliedRows = (await runNamed('appliedMigrations')).rows;
            const done = new Set<string>();
            for (const row of appliedRows) {
                const parsed = MigrationRowSchema.safeParse(row);
                if (!parsed.success) {
                    throw new PolicyStoreQueryError('migrate:appliedMigrations', database, parsed.error);
                }
                done.add(parsed.data.id);
            }

            for (const migration of migrations) {
                if (done.has(migration.id)) continue;
                log.info({ migration: migration.id }, 'Applying migration');
                for (const statement of migration.statements) {
                    await run(`migrate:${migration.id}`, statement);
                }
                await runNamed('recordMigration', [migration.id, clock()]);
                applied.push(migration.id);
            }

            await run('migrate:commit', TX_COMMIT);
        } catch (error) {
            try {
                await client.query(TX_ROLLBACK);
            } catch (rollbackError) {
                forceDestroy = true;
                log.error({ error: rollbackError }, 'Failed to rollback migrations');
            }
            throw error;
        }

        if (applied.length === 0) {
            log.debug('Policy store schema is current');
        }
        return applied;
    } finally {
        releaseClient(client, forceDestroy, 'migratePolicyStore');
    }
}
