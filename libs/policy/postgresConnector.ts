import { z, type ZodType, type ZodTypeDef } from 'zod';
import { ExclusiveLock } from '../concurrency/exclusiveLock.js';
import type { Identity } from '../context/identity.js';
import type { ConnectOptions, PolicyConnection, PolicyConnector } from '../contracts/policyConnector.js';
import { releaseClient, type DbClient, type DbPool, type DbQueryResult } from '../db/pool.js';
import { logger } from '../logging/logger.js';
import type { ContentCodec } from './codec.js';
import {
    PolicyContentError,
    PolicyStoreConnectError,
    PolicyStoreError,
    PolicyStoreQueryError,
    throwIfAborted,
} from './errors.js';
import { POLICY_QUERIES, TX_BEGIN, TX_COMMIT, TX_ROLLBACK, type PolicyQueryName } from './queries.js';
import type { AttachedMetadata, Metadata } from './types.js';

// BIGINT and BIGSERIAL columns arrive as strings from pg.
const IntegerColumn = z.union([z.string(), z.number()]);

const LatestVersionRowSchema = z.object({
    latest: IntegerColumn,
});

const PolicyMetadataRowSchema = z.object({
    version: IntegerColumn,
    name: z.string(),
    description: z.string(),
    language: z.string(),
    creator_id: z.string(),
    creator_name: z.string(),
    created_at: z.date(),
});

const PolicyContentRowSchema = z.object({
    name: z.string(),
    content: z.string(),
});

const ActivationRowSchema = z.object({
    id: IntegerColumn,
    version: IntegerColumn,
    activated_by_id: z.string(),
    activated_by_name: z.string(),
    deactivated_at: z.date().nullable(),
});

type PolicyMetadataRow = z.infer<typeof PolicyMetadataRowSchema>;

interface ActiveEvent {
    id: string;
    version: number;
    activator: Identity;
}

export interface PostgresConnectorOptions<C> {
    pool: DbPool;
    codec: ContentCodec<C>;
    /** Printable identity of the database, used in errors and logs. */
    database: string;
    clock?: () => Date;
}

const log = logger.child({ component: 'PostgresPolicyConnector' });

/**
 * Policy backend on Postgres. Each connection holds one pooled client until
 * released; each mutation runs in a transaction that takes an EXCLUSIVE lock
 * on both ledger tables before reading anything.
 */
export class PostgresPolicyConnector<C> implements PolicyConnector<C> {
    private readonly clock: () => Date;

    constructor(private readonly options: PostgresConnectorOptions<C>) {
        this.clock = options.clock ?? (() => new Date());
    }

    async connect(identity: Identity, options: ConnectOptions = {}): Promise<PolicyConnection<C>> {
        throwIfAborted(options.signal, 'connect');
        log.debug({ database: this.options.database, userId: identity.id }, 'Opening policy connection');

        let client: DbClient;
        try {
            client = await this.options.pool.connect();
        } catch (error) {
            log.error({ error, database: this.options.database }, 'Failed to acquire database connection');
            throw new PolicyStoreConnectError(this.options.database, error);
        }

        return new PostgresPolicyConnection(client, identity, {
            codec: this.options.codec,
            database: this.options.database,
            clock: this.clock,
            signal: options.signal,
        });
    }

    async close(): Promise<void> {
        await this.options.pool.end();
    }
}

interface ConnectionSettings<C> {
    codec: ContentCodec<C>;
    database: string;
    clock: () => Date;
    signal?: AbortSignal;
}

class PostgresPolicyConnection<C> implements PolicyConnection<C> {
    private released = false;
    private tainted = false;
    private readonly transactions = new ExclusiveLock();

    constructor(
        private readonly client: DbClient,
        private readonly identity: Identity,
        private readonly settings: ConnectionSettings<C>
    ) {}

    async addVersion(metadata: AttachedMetadata, content: C): Promise<number> {
        let serialized: string;
        try {
            serialized = this.settings.codec.serialize(content);
        } catch (error) {
            log.error({ error, policy: metadata.name }, 'Failed to serialize policy content');
            throw new PolicyContentError('serialize', metadata.name, undefined, error);
        }

        return this.runExclusive('addVersion', async () => {
            const rows = await this.select(LatestVersionRowSchema, 'latestVersion');
            const next = this.toVersion(rows.length === 0 ? 0 : rows[0].latest, 'latestVersion') + 1;

            log.debug({ version: next, policy: metadata.name }, 'Adding policy version');
            await this.run('insertVersion', [
                next,
                metadata.name,
                metadata.description,
                metadata.language,
                this.identity.id,
                this.identity.name,
                this.settings.clock(),
                serialized,
            ]);
            return next;
        });
    }

    async activate(version: number): Promise<void> {
        await this.runExclusive('activate', async () => {
            const active = await this.readActiveEvent();
            if (active !== null && active.version === version) {
                log.info({ version }, 'Activated already-active version');
                return;
            }

            log.debug({ version }, 'Activating policy version');
            await this.run('insertActivation', [version, this.settings.clock(), this.identity.id, this.identity.name]);
        });
    }

    async deactivate(): Promise<void> {
        await this.runExclusive('deactivate', async () => {
            const active = await this.readActiveEvent();
            if (active === null) {
                log.info('Deactivated a policy whilst none were active');
                return;
            }

            log.debug({ version: active.version }, 'Deactivating active policy version');
            await this.run('stampDeactivation', [active.id, this.settings.clock(), this.identity.id, this.identity.name]);
        });
    }

    async getVersions(): Promise<Map<number, Metadata>> {
        const rows = await this.select(PolicyMetadataRowSchema, 'listVersions');
        const versions = new Map<number, Metadata>();
        for (const row of rows) {
            const metadata = this.mapRowToMetadata(row, 'listVersions');
            versions.set(metadata.version, metadata);
        }
        return versions;
    }

    async getActiveVersion(): Promise<number | null> {
        const active = await this.readActiveEvent();
        return active === null ? null : active.version;
    }

    async getActivator(): Promise<Identity | null> {
        const active = await this.readActiveEvent();
        return active === null ? null : active.activator;
    }

    async getVersionMetadata(version: number): Promise<Metadata | null> {
        const rows = await this.select(PolicyMetadataRowSchema, 'versionMetadata', [version]);
        if (rows.length === 0) {
            return null;
        }
        return this.mapRowToMetadata(rows[0], 'versionMetadata');
    }

    async getVersionContent(version: number): Promise<C | null> {
        const rows = await this.select(PolicyContentRowSchema, 'versionContent', [version]);
        if (rows.length === 0) {
            return null;
        }

        const row = rows[0];
        try {
            return this.settings.codec.deserialize(row.content);
        } catch (error) {
            log.error({ error, version, policy: row.name }, 'Stored policy content is corrupt');
            throw new PolicyContentError('deserialize', row.name, version, error);
        }
    }

    release(): void {
        if (this.released) return;
        this.released = true;
        releaseClient(this.client, this.tainted, 'PostgresPolicyConnection');
    }

    /** Latest ledger row, or null when it is missing or already deactivated. */
    private async readActiveEvent(): Promise<ActiveEvent | null> {
        const rows = await this.select(ActivationRowSchema, 'latestActivation');
        if (rows.length === 0) {
            return null;
        }

        const row = rows[0];
        if (row.deactivated_at !== null) {
            return null;
        }
        return {
            id: String(row.id),
            version: this.toVersion(row.version, 'latestActivation'),
            activator: { id: row.activated_by_id, name: row.activated_by_name },
        };
    }

    /** Runs a read and validates every returned row against `schema`. */
    private async select<T>(schema: ZodType<T, ZodTypeDef, unknown>, name: PolicyQueryName, params?: unknown[]): Promise<T[]> {
        const result = await this.run(name, params);
        return result.rows.map(row => {
            const parsed = schema.safeParse(row);
            if (!parsed.success) {
                throw new PolicyStoreQueryError(name, this.settings.database, parsed.error);
            }
            return parsed.data;
        });
    }

    private async run(name: PolicyQueryName, params?: unknown[]): Promise<DbQueryResult> {
        if (this.released) {
            throw new PolicyStoreConnectError(this.settings.database, new Error('Connection already released'));
        }
        throwIfAborted(this.settings.signal, name);

        try {
            return await this.client.query(POLICY_QUERIES[name], params);
        } catch (error) {
            log.error({ error, query: name, database: this.settings.database }, 'Policy query failed');
            throw new PolicyStoreQueryError(name, this.settings.database, error);
        }
    }

    /**
     * Runs `work` inside BEGIN / LOCK / COMMIT. Mutations on one connection
     * queue behind each other. Aborting the signal cancels the work up to the
     * moment COMMIT is sent; after that it runs to the end.
     */
    private runExclusive<T>(operation: string, work: () => Promise<T>): Promise<T> {
        return this.transactions.runExclusive(() => this.transaction(operation, work));
    }

    private async transaction<T>(operation: string, work: () => Promise<T>): Promise<T> {
        if (this.released) {
            throw new PolicyStoreConnectError(this.settings.database, new Error('Connection already released'));
        }
        throwIfAborted(this.settings.signal, operation);

        let began = false;
        let commitAttempted = false;
        try {
            await this.rawQuery(TX_BEGIN, `${operation}:begin`);
            began = true;
            await this.run('lockLedger');

            const result = await work();

            throwIfAborted(this.settings.signal, operation);
            commitAttempted = true;
            await this.rawQuery(TX_COMMIT, `${operation}:commit`);
            return result;
        } catch (error) {
            let rollbackFailed = false;
            if (began) {
                try {
                    await this.client.query(TX_ROLLBACK);
                } catch (rollbackError) {
                    rollbackFailed = true;
                    log.error({ error: rollbackError, operation }, 'Failed to rollback transaction');
                }
            }
            if (commitAttempted || rollbackFailed) {
                this.tainted = true;
            }
            throw error instanceof PolicyStoreError
                ? error
                : new PolicyStoreQueryError(operation, this.settings.database, error);
        }
    }

    private async rawQuery(text: string, name: string): Promise<void> {
        try {
            await this.client.query(text);
        } catch (error) {
            log.error({ error, query: name, database: this.settings.database }, 'Transaction control failed');
            throw new PolicyStoreQueryError(name, this.settings.database, error);
        }
    }

    private toVersion(raw: string | number, query: string): number {
        const version = typeof raw === 'number' ? raw : Number(raw);
        if (!Number.isSafeInteger(version) || version < 0) {
            throw new PolicyStoreQueryError(
                query,
                this.settings.database,
                new Error(`Stored version '${String(raw)}' is not a non-negative integer`)
            );
        }
        return version;
    }

    private mapRowToMetadata(row: PolicyMetadataRow, query: string): Metadata {
        return {
            attached: {
                name: row.name,
                description: row.description,
                language: row.language,
            },
            version: this.toVersion(row.version, query),
            creator: { id: row.creator_id, name: row.creator_name },
            created: row.created_at,
        };
    }
}
