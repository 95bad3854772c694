import type { Identity } from '../context/identity.js';
import type { AttachedMetadata, Metadata } from '../policy/types.js';

export interface ConnectOptions {
    /** Aborting cancels the running operation up to the point its commit starts. */
    signal?: AbortSignal;
}

/**
 * Entry point of a policy backend. Shared by every request; must tolerate
 * concurrent callers.
 */
export interface PolicyConnector<C> {
    connect(identity: Identity, options?: ConnectOptions): Promise<PolicyConnection<C>>;
}

/**
 * One checked-out connection, scoped to the identity that opened it.
 * Every mutation runs in its own exclusive transaction. Lookups of unknown
 * versions resolve with `null`; all rejections are server faults.
 */
export interface PolicyConnection<C> {
    addVersion(metadata: AttachedMetadata, content: C): Promise<number>;
    activate(version: number): Promise<void>;
    deactivate(): Promise<void>;
    getVersions(): Promise<Map<number, Metadata>>;
    getActiveVersion(): Promise<number | null>;
    getActivator(): Promise<Identity | null>;
    getVersionMetadata(version: number): Promise<Metadata | null>;
    getVersionContent(version: number): Promise<C | null>;
    /** Hands the underlying connection back. Safe to call more than once. */
    release(): void;
}
