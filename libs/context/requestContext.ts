import { AsyncLocalStorage } from 'node:async_hooks';
import type { Identity } from "./identity.js";

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the auth middleware should call run(); handlers only call get().
 */

const storage = new AsyncLocalStorage<Identity>();

export class RequestContext {
    /**
     * Establish the identity scope for one request.
     * Supports both sync and async functions.
     */
    public static run<T>(
        identity: Identity,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze({ ...identity }), fn);
    }

    /**
     * Get the authenticated identity of the current request.
     * Throws if called outside run() scope.
     */
    public static get(): Identity {
        const identity = storage.getStore();
        if (!identity) {
            throw new Error("MISSING_REQUEST_CONTEXT: No identity scope established - execution denied");
        }
        return identity;
    }

    public static tryGet(): Identity | undefined {
        return storage.getStore();
    }
}
