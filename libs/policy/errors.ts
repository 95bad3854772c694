/**
 * Storage failures. Every one of these is a server fault; "not found" is
 * never an error and resolves as `null` instead.
 */

export type PolicyStoreErrorCode =
    | 'STORE_CONNECT_FAILED'
    | 'STORE_QUERY_FAILED'
    | 'POLICY_CONTENT_INVALID'
    | 'STORE_OPERATION_ABORTED';

export abstract class PolicyStoreError extends Error {
    abstract readonly code: PolicyStoreErrorCode;
    readonly statusCode = 500;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** No connection could be acquired, including when the pool is exhausted. */
export class PolicyStoreConnectError extends PolicyStoreError {
    readonly code = 'STORE_CONNECT_FAILED' as const;

    constructor(public readonly database: string, cause?: unknown) {
        super(`Failed to connect to policy database ${database}`, { cause });
    }
}

/** The engine rejected a statement, or the transaction around it. */
export class PolicyStoreQueryError extends PolicyStoreError {
    readonly code = 'STORE_QUERY_FAILED' as const;

    constructor(
        public readonly query: string,
        public readonly database: string,
        cause?: unknown
    ) {
        super(`Query '${query}' failed against policy database ${database}`, { cause });
    }
}

/** Stored content could not be (de)serialized. Distinct from the store being unreachable. */
export class PolicyContentError extends PolicyStoreError {
    readonly code = 'POLICY_CONTENT_INVALID' as const;

    constructor(
        public readonly direction: 'serialize' | 'deserialize',
        public readonly policyName: string,
        public readonly version?: number,
        cause?: unknown
    ) {
        super(
            direction === 'serialize'
                ? `Failed to serialize content of policy '${policyName}'`
                : `Failed to deserialize content of policy '${policyName}' (version ${version ?? 'unknown'})`,
            { cause }
        );
    }
}

/** The caller went away before the transaction started committing. */
export class PolicyStoreAbortedError extends PolicyStoreError {
    readonly code = 'STORE_OPERATION_ABORTED' as const;

    constructor(public readonly operation: string, cause?: unknown) {
        super(`Operation '${operation}' aborted before commit`, { cause });
    }
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
    if (signal?.aborted) {
        throw new PolicyStoreAbortedError(operation, signal.reason);
    }
}
