import { LruPermissionCache } from '../../libs/cache/LruPermissionCache.js';
import type {
    CachedValue,
    CacheSetOptions,
    CacheStats,
    Fingerprint,
    PermissionCache
} from '../../libs/cache/permissionCache.js';
import type { CallerIdentity } from '../../libs/context/identity.js';
import { InMemoryResourceStore } from '../../libs/store/InMemoryResourceStore.js';
import type { SeedData } from '../../libs/store/InMemoryResourceStore.js';
import type { ResourceTx } from '../../libs/store/resourceStore.js';

let requestCounter = 0;

export function caller(subjectId: string, overrides: Partial<CallerIdentity> = {}): CallerIdentity {
    requestCounter += 1;
    return {
        requestId: `req-${requestCounter}`,
        subjectId,
        displayName: subjectId,
        email: `${subjectId}@example.test`,
        superadmin: false,
        ...overrides,
    };
}

export function superadmin(subjectId = 'root'): CallerIdentity {
    return caller(subjectId, { superadmin: true });
}

export function newCache(): LruPermissionCache {
    return new LruPermissionCache({ ttlMs: 60_000, maxEntries: 1_000 });
}

/**
 * Two groups, four people and three agents:
 *
 *   g1 (Alpha): alice admin, bob user          agents: a1, a3
 *   g2 (Beta):  carol admin, bob admin         agents: a2, a3
 *   dave has no memberships
 */
export const FIXTURE_DATA: SeedData = {
    users: [
        { id: 'alice', displayName: 'Alice', email: 'alice@example.test' },
        { id: 'bob', displayName: 'Bob', email: 'bob@example.test' },
        { id: 'carol', displayName: 'Carol', email: 'carol@example.test' },
        { id: 'dave', displayName: 'Dave', email: 'dave@example.test' },
    ],
    groups: [
        { id: 'g1', name: 'Alpha' },
        { id: 'g2', name: 'Beta' },
    ],
    memberships: [
        { userId: 'alice', groupId: 'g1', role: 'admin' },
        { userId: 'bob', groupId: 'g1', role: 'user' },
        { userId: 'carol', groupId: 'g2', role: 'admin' },
        { userId: 'bob', groupId: 'g2', role: 'admin' },
    ],
    agents: [
        { id: 'a1', name: 'Agent One' },
        { id: 'a2', name: 'Agent Two' },
        { id: 'a3', name: 'Agent Three' },
    ],
    groupAgents: [
        { groupId: 'g1', agentId: 'a1' },
        { groupId: 'g2', agentId: 'a2' },
        { groupId: 'g1', agentId: 'a3' },
        { groupId: 'g2', agentId: 'a3' },
    ],
};

export function seededStore(options: { latencyMs?: number } = {}): InMemoryResourceStore {
    return new InMemoryResourceStore(options).seed(FIXTURE_DATA);
}

/**
 * In-memory store whose transactions wait for `transactionGate` before running.
 * A gate that never resolves models a transaction stuck in the database.
 */
export class GatedStore extends InMemoryResourceStore {
    transactionGate: Promise<void> = Promise.resolve();
    transactionsStarted = 0;

    override async transaction<T>(fn: (tx: ResourceTx) => Promise<T>): Promise<T> {
        this.transactionsStarted += 1;
        await this.transactionGate;
        return super.transaction(fn);
    }
}

type CacheOperation = 'get' | 'set' | 'invalidate';

/**
 * Cache stand-in that delegates to a real LRU cache until told to fail
 * (reject) or hang (never settle) on chosen operations.
 */
export class FaultyCache implements PermissionCache {
    readonly inner = newCache();
    failing = new Set<CacheOperation>();
    hanging = new Set<CacheOperation>();
    invalidations: string[][] = [];

    async get(fingerprint: Fingerprint): Promise<CachedValue | undefined> {
        await this.fault('get');
        return this.inner.get(fingerprint);
    }

    async set(fingerprint: Fingerprint, value: CachedValue, options: CacheSetOptions): Promise<boolean> {
        await this.fault('set');
        return this.inner.set(fingerprint, value, options);
    }

    stamp(): number {
        return this.inner.stamp();
    }

    async invalidate(tags: readonly string[]): Promise<number> {
        await this.fault('invalidate');
        this.invalidations.push([...tags]);
        return this.inner.invalidate(tags);
    }

    async invalidateAll(): Promise<void> {
        await this.inner.invalidateAll();
    }

    stats(): CacheStats {
        return this.inner.stats();
    }

    private async fault(operation: CacheOperation): Promise<void> {
        if (this.failing.has(operation)) {
            throw new Error(`cache ${operation} refused`);
        }
        if (this.hanging.has(operation)) {
            await new Promise<never>(() => undefined);
        }
    }
}
