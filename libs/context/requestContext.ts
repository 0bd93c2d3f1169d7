import { AsyncLocalStorage } from 'node:async_hooks';
import type { CallerIdentity } from "./identity.js";

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the request boundary (the service facade) calls run().
 * Downstream code calls get() or current().
 */

const storage = new AsyncLocalStorage<CallerIdentity>();

export class RequestContext {
    /**
     * Establish identity scope for the request lifecycle.
     */
    public static run<T>(
        identity: CallerIdentity,
        fn: () => Promise<T>
    ): Promise<T> {
        return storage.run(Object.freeze({ ...identity }), fn);
    }

    /**
     * Get current identity.
     * FAIL-CLOSED: throws if called outside a run() scope.
     */
    public static get(): CallerIdentity {
        const ctx = storage.getStore();
        if (!ctx) {
            throw new Error("MISSING_REQUEST_CONTEXT: No identity scope established - request denied");
        }
        return ctx;
    }

    /**
     * Identity of the current scope, if any.
     */
    public static current(): CallerIdentity | undefined {
        return storage.getStore();
    }
}
