import type { Identity } from '../context/identity.js';
import type { ConnectOptions, PolicyConnection, PolicyConnector } from '../contracts/policyConnector.js';
import { ExclusiveLock } from '../concurrency/exclusiveLock.js';
import { Semaphore } from '../concurrency/semaphore.js';
import { logger } from '../logging/logger.js';
import type { ContentCodec } from './codec.js';
import { PolicyContentError, PolicyStoreConnectError, throwIfAborted } from './errors.js';
import type { AttachedMetadata, Metadata } from './types.js';

interface StoredPolicy {
    metadata: Metadata;
    content: string;
}

interface ActivationEvent {
    id: number;
    version: number;
    activatedAt: Date;
    activatedBy: Identity;
    deactivatedAt: Date | null;
    deactivatedBy: Identity | null;
}

export interface MemoryConnectorOptions<C> {
    codec: ContentCodec<C>;
    /** Connections that may be open at once; connect() fails beyond this. */
    maxConnections?: number;
    clock?: () => Date;
}

export const MEMORY_DATABASE = 'memory';

const log = logger.child({ component: 'MemoryPolicyConnector' });

function byRecency(a: ActivationEvent, b: ActivationEvent): number {
    const timeDiff = a.activatedAt.getTime() - b.activatedAt.getTime();
    if (timeDiff !== 0) {
        return timeDiff;
    }
    return a.id - b.id;
}

/**
 * Process-local policy backend with the same ledger semantics as the
 * Postgres one. Content is kept serialized so codec failures surface exactly
 * where they would against a database.
 */
export class MemoryPolicyConnector<C> implements PolicyConnector<C> {
    private readonly policies = new Map<number, StoredPolicy>();
    private readonly activations: ActivationEvent[] = [];
    private readonly lock = new ExclusiveLock();
    private readonly slots: Semaphore;
    private readonly clock: () => Date;
    private nextActivationId = 1;

    constructor(private readonly options: MemoryConnectorOptions<C>) {
        this.slots = new Semaphore(options.maxConnections ?? 16);
        this.clock = options.clock ?? (() => new Date());
    }

    async connect(identity: Identity, options: ConnectOptions = {}): Promise<PolicyConnection<C>> {
        throwIfAborted(options.signal, 'connect');
        if (!this.slots.tryAcquire()) {
            log.error({ capacity: this.slots.capacity }, 'Connection slots exhausted');
            throw new PolicyStoreConnectError(
                MEMORY_DATABASE,
                new Error(`All ${this.slots.capacity} connection slots are in use`)
            );
        }
        return new MemoryPolicyConnection(this, identity, options.signal);
    }

    /** Connections currently open. */
    get openConnections(): number {
        return this.slots.active;
    }

    /** @internal */
    releaseSlot(): void {
        this.slots.release();
    }

    /** @internal */
    exclusive<T>(operation: string, signal: AbortSignal | undefined, work: () => T): Promise<T> {
        throwIfAborted(signal, operation);
        return this.lock.runExclusive(() => {
            throwIfAborted(signal, operation);
            return work();
        });
    }

    /** @internal */
    now(): Date {
        return this.clock();
    }

    /** @internal */
    get codec(): ContentCodec<C> {
        return this.options.codec;
    }

    /** @internal */
    latestVersion(): number {
        let latest = 0;
        for (const version of this.policies.keys()) {
            if (version > latest) latest = version;
        }
        return latest;
    }

    /** @internal */
    insertPolicy(policy: StoredPolicy): void {
        this.policies.set(policy.metadata.version, policy);
    }

    /** @internal */
    policy(version: number): StoredPolicy | undefined {
        return this.policies.get(version);
    }

    /** @internal */
    allPolicies(): StoredPolicy[] {
        return [...this.policies.values()];
    }

    /** @internal Latest ledger row if it is still active. */
    activeEvent(): ActivationEvent | null {
        let latest: ActivationEvent | null = null;
        for (const event of this.activations) {
            if (latest === null || byRecency(event, latest) > 0) {
                latest = event;
            }
        }
        if (latest === null || latest.deactivatedAt !== null) {
            return null;
        }
        return latest;
    }

    /** @internal */
    appendActivation(version: number, activatedBy: Identity): void {
        this.activations.push({
            id: this.nextActivationId++,
            version,
            activatedAt: this.clock(),
            activatedBy,
            deactivatedAt: null,
            deactivatedBy: null,
        });
    }

    /** Ledger rows oldest first; exposed for inspection. */
    get ledger(): readonly Readonly<ActivationEvent>[] {
        return this.activations.map(event => ({ ...event }));
    }
}

function copyMetadata(metadata: Metadata): Metadata {
    return {
        attached: { ...metadata.attached },
        version: metadata.version,
        creator: { ...metadata.creator },
        created: new Date(metadata.created.getTime()),
    };
}

class MemoryPolicyConnection<C> implements PolicyConnection<C> {
    private released = false;

    constructor(
        private readonly store: MemoryPolicyConnector<C>,
        private readonly identity: Identity,
        private readonly signal: AbortSignal | undefined
    ) {}

    async addVersion(metadata: AttachedMetadata, content: C): Promise<number> {
        this.assertOpen();
        const serialized = this.serialize(metadata.name, content);
        const creator = { id: this.identity.id, name: this.identity.name };

        return this.store.exclusive('addVersion', this.signal, () => {
            const version = this.store.latestVersion() + 1;
            log.debug({ version, policy: metadata.name }, 'Adding policy version');
            this.store.insertPolicy({
                metadata: {
                    attached: { name: metadata.name, description: metadata.description, language: metadata.language },
                    version,
                    creator,
                    created: this.store.now(),
                },
                content: serialized,
            });
            return version;
        });
    }

    async activate(version: number): Promise<void> {
        this.assertOpen();
        await this.store.exclusive('activate', this.signal, () => {
            const active = this.store.activeEvent();
            if (active !== null && active.version === version) {
                log.info({ version }, 'Activated already-active version');
                return;
            }
            log.debug({ version }, 'Activating policy version');
            this.store.appendActivation(version, { id: this.identity.id, name: this.identity.name });
        });
    }

    async deactivate(): Promise<void> {
        this.assertOpen();
        await this.store.exclusive('deactivate', this.signal, () => {
            const active = this.store.activeEvent();
            if (active === null) {
                log.info('Deactivated a policy whilst none were active');
                return;
            }
            log.debug({ version: active.version }, 'Deactivating active policy version');
            active.deactivatedAt = this.store.now();
            active.deactivatedBy = { id: this.identity.id, name: this.identity.name };
        });
    }

    async getVersions(): Promise<Map<number, Metadata>> {
        this.beforeRead('getVersions');
        const versions = new Map<number, Metadata>();
        for (const policy of this.store.allPolicies()) {
            versions.set(policy.metadata.version, copyMetadata(policy.metadata));
        }
        return versions;
    }

    async getActiveVersion(): Promise<number | null> {
        this.beforeRead('getActiveVersion');
        const active = this.store.activeEvent();
        return active === null ? null : active.version;
    }

    async getActivator(): Promise<Identity | null> {
        this.beforeRead('getActivator');
        const active = this.store.activeEvent();
        return active === null ? null : { ...active.activatedBy };
    }

    async getVersionMetadata(version: number): Promise<Metadata | null> {
        this.beforeRead('getVersionMetadata');
        const policy = this.store.policy(version);
        return policy === undefined ? null : copyMetadata(policy.metadata);
    }

    async getVersionContent(version: number): Promise<C | null> {
        this.beforeRead('getVersionContent');
        const policy = this.store.policy(version);
        if (policy === undefined) {
            return null;
        }
        try {
            return this.store.codec.deserialize(policy.content);
        } catch (error) {
            log.error({ error, version, policy: policy.metadata.attached.name }, 'Stored policy content is corrupt');
            throw new PolicyContentError('deserialize', policy.metadata.attached.name, version, error);
        }
    }

    release(): void {
        if (this.released) return;
        this.released = true;
        this.store.releaseSlot();
    }

    private serialize(name: string, content: C): string {
        try {
            return this.store.codec.serialize(content);
        } catch (error) {
            log.error({ error, policy: name }, 'Failed to serialize policy content');
            throw new PolicyContentError('serialize', name, undefined, error);
        }
    }

    private beforeRead(operation: string): void {
        this.assertOpen();
        throwIfAborted(this.signal, operation);
    }

    private assertOpen(): void {
        if (this.released) {
            throw new PolicyStoreConnectError(MEMORY_DATABASE, new Error('Connection already released'));
        }
    }
}
