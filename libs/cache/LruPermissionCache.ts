import { LRUCache } from 'lru-cache';
import { getComponentLogger } from '../logging/logger.js';
import type {
    CachedValue,
    CacheSetOptions,
    CacheStats,
    Fingerprint,
    PermissionCache
} from './permissionCache.js';

const log = getComponentLogger('PermissionCache');

interface Entry {
    readonly value: CachedValue;
    readonly tags: readonly string[];
}

export interface LruPermissionCacheOptions {
    readonly ttlMs: number;
    readonly maxEntries: number;
    /** Upper bound on remembered tag invalidations. Default: 4 × maxEntries. */
    readonly maxTrackedTags?: number;
}

/**
 * In-process permission cache.
 *
 * Secondary index tag → keys turns subject- and group-scoped invalidation
 * into a lookup instead of a key scan. Every invalidation advances a clock;
 * a write stamped before the latest invalidation of one of its tags is
 * dropped, so a reader that raced a mutation cannot re-populate stale data.
 */
export class LruPermissionCache implements PermissionCache {
    private readonly entries: LRUCache<string, Entry>;
    private readonly tagIndex = new Map<string, Set<string>>();

    // tag → clock value of its latest invalidation
    private readonly epochs: LRUCache<string, number>;
    // highest epoch forgotten through eviction; older stamps are rejected
    private floor = 0;
    private allInvalidatedAt = 0;
    private clock = 0;

    private hits = 0;
    private misses = 0;
    private dropped = 0;

    constructor(options: LruPermissionCacheOptions) {
        this.entries = new LRUCache<string, Entry>({
            max: options.maxEntries,
            ttl: options.ttlMs,
            dispose: (entry, key) => this.unindex(key, entry.tags),
        });

        this.epochs = new LRUCache<string, number>({
            max: options.maxTrackedTags ?? options.maxEntries * 4,
            dispose: (epoch, _tag, reason) => {
                if (reason === 'evict' && epoch > this.floor) {
                    this.floor = epoch;
                }
            },
        });
    }

    async get(fingerprint: Fingerprint): Promise<CachedValue | undefined> {
        const entry = this.entries.get(fingerprint.key);
        if (entry === undefined) {
            this.misses++;
            return undefined;
        }
        this.hits++;
        return entry.value;
    }

    async set(fingerprint: Fingerprint, value: CachedValue, options: CacheSetOptions): Promise<boolean> {
        const tags = options.extraTags
            ? [...new Set([...fingerprint.tags, ...options.extraTags])]
            : [...fingerprint.tags];

        if (this.isStale(tags, options.stamp)) {
            this.dropped++;
            log.debug({ key: fingerprint.key, stamp: options.stamp, clock: this.clock },
                'Dropped cache write that raced an invalidation');
            return false;
        }

        this.entries.set(fingerprint.key, { value, tags });
        for (const tag of tags) {
            let keys = this.tagIndex.get(tag);
            if (keys === undefined) {
                keys = new Set();
                this.tagIndex.set(tag, keys);
            }
            keys.add(fingerprint.key);
        }
        return true;
    }

    stamp(): number {
        return this.clock;
    }

    async invalidate(tags: readonly string[]): Promise<number> {
        const epoch = ++this.clock;
        const keys = new Set<string>();

        for (const tag of tags) {
            this.epochs.set(tag, epoch);
            for (const key of this.tagIndex.get(tag) ?? []) {
                keys.add(key);
            }
        }

        for (const key of keys) {
            this.entries.delete(key);
        }

        log.debug({ tags, dropped: keys.size, epoch }, 'Invalidated permission cache entries');
        return keys.size;
    }

    async invalidateAll(): Promise<void> {
        this.allInvalidatedAt = ++this.clock;
        this.entries.clear();
        this.tagIndex.clear();
        log.info({ epoch: this.allInvalidatedAt }, 'Permission cache cleared');
    }

    stats(): CacheStats {
        return {
            hits: this.hits,
            misses: this.misses,
            dropped: this.dropped,
            size: this.entries.size,
        };
    }

    private isStale(tags: readonly string[], stamp: number): boolean {
        if (stamp < this.allInvalidatedAt || stamp < this.floor) return true;
        return tags.some(tag => (this.epochs.get(tag) ?? 0) > stamp);
    }

    private unindex(key: string, tags: readonly string[]): void {
        for (const tag of tags) {
            const keys = this.tagIndex.get(tag);
            if (keys === undefined) continue;
            keys.delete(key);
            if (keys.size === 0) this.tagIndex.delete(tag);
        }
    }
}
