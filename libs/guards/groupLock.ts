/**
 * KeyedLock - in-process mutual exclusion per key.
 *
 * Each key holds a chain of waiters; a caller proceeds once every earlier
 * holder of the same key has released. Multi-key acquisition takes keys in
 * sorted order so two callers can never wait on each other.
 *
 * This only serializes writers inside one process. Across processes the
 * PostgreSQL row lock taken by the store does the same job.
 */

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => { resolve = r; });
    return { promise, resolve };
}

export class KeyedLock {
    private tails = new Map<string, Promise<void>>();

    async runExclusive<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
        const ordered = [...new Set(keys)].sort();
        const releases: Array<() => void> = [];
        try {
            for (const key of ordered) {
                releases.push(await this.acquire(key));
            }
            return await fn();
        } finally {
            for (const release of releases.reverse()) {
                release();
            }
        }
    }

    /** Number of keys currently held or waited on. */
    get size(): number {
        return this.tails.size;
    }

    private async acquire(key: string): Promise<() => void> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const gate = deferred();
        const tail = previous.then(() => gate.promise);
        this.tails.set(key, tail);

        await previous;

        return () => {
            gate.resolve();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        };
    }
}
