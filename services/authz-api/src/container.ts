import type pg from 'pg';
import { AuthorizationEngine } from '../../../libs/authz/AuthorizationEngine.js';
import { GroupDirectory } from '../../../libs/authz/GroupDirectory.js';
import type { PolicyTable } from '../../../libs/authz/actions.js';
import { loadPolicyTable } from '../../../libs/authz/policy.js';
import type { ServiceConfig } from '../../../libs/bootstrap/config/authz-config.js';
import { LruPermissionCache } from '../../../libs/cache/LruPermissionCache.js';
import type { PermissionCache } from '../../../libs/cache/permissionCache.js';
import { createPool } from '../../../libs/db/index.js';
import { KeyedLock } from '../../../libs/guards/groupLock.js';
import { MutationGuard } from '../../../libs/guards/mutationGuard.js';
import { InMemoryResourceStore } from '../../../libs/store/InMemoryResourceStore.js';
import { PostgresResourceStore } from '../../../libs/store/PostgresResourceStore.js';
import type { ResourceStore } from '../../../libs/store/resourceStore.js';
import { AuthzApi } from './AuthzApi.js';

export interface AuthzService {
    readonly api: AuthzApi;
    readonly engine: AuthorizationEngine;
    readonly guard: MutationGuard;
    readonly directory: GroupDirectory;
    readonly store: ResourceStore;
    readonly cache: PermissionCache;
    readonly policy: PolicyTable;
    close(): Promise<void>;
}

/** Collaborators a caller may supply instead of the configured ones. */
export interface ServiceOverrides {
    readonly store?: ResourceStore;
    readonly cache?: PermissionCache;
    readonly policy?: PolicyTable;
}

/**
 * Wires the service from configuration.
 * One engine, guard and lock per process; they share one cache.
 */
export function createAuthzService(config: ServiceConfig, overrides: ServiceOverrides = {}): AuthzService {
    let pool: pg.Pool | undefined;
    let store = overrides.store;
    if (!store) {
        if (config.store === 'memory') {
            store = new InMemoryResourceStore();
        } else if (config.database) {
            pool = createPool(config.database);
            store = new PostgresResourceStore(pool);
        } else {
            throw new Error('FATAL CONFIG: AUTHZ_STORE=postgres without database settings');
        }
    }

    const cache = overrides.cache ?? new LruPermissionCache({
        ttlMs: config.cache.ttlMs,
        maxEntries: config.cache.maxEntries,
    });
    const policy = overrides.policy ?? loadPolicyTable(config.policyFile);

    const engine = new AuthorizationEngine(store, cache, {
        policy,
        storeTimeoutMs: config.storeTimeoutMs,
        cacheTimeoutMs: config.cache.timeoutMs,
    });
    const guard = new MutationGuard(store, cache, engine, {
        storeTimeoutMs: config.storeTimeoutMs,
        cacheTimeoutMs: config.cache.timeoutMs,
        transactionTimeoutMs: config.transactionTimeoutMs,
        lock: new KeyedLock(),
    });
    const directory = new GroupDirectory(store, engine, config.storeTimeoutMs);

    return {
        api: new AuthzApi(engine, guard, directory),
        engine,
        guard,
        directory,
        store,
        cache,
        policy,
        async close() {
            await pool?.end();
        },
    };
}
