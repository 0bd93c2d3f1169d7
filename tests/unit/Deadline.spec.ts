import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as sleep } from 'node:timers/promises';
import { ConflictError, UnavailableError } from '../../libs/errors/authzErrors.js';
import { callCache, callStore } from '../../libs/timing/dependencyCall.js';
import { withTimeout } from '../../libs/timing/deadline.js';

const never = (): Promise<never> => new Promise<never>(() => undefined);

describe('withTimeout', () => {
    it('should resolve with the operation result inside the deadline', async () => {
        assert.strictEqual(await withTimeout(async () => 42, 100, 'fast'), 42);
    });

    it('should reject with a TIMEOUT naming the label', async () => {
        await assert.rejects(withTimeout(never, 10, 'store.getMembership'), (err: unknown) =>
            err instanceof UnavailableError
            && err.reason === 'TIMEOUT'
            && err.message === 'store.getMembership timed out after 10ms');
    });

    it('should propagate the operation error as is', async () => {
        const boom = new Error('boom');
        await assert.rejects(withTimeout(async () => { throw boom; }, 100, 'x'), (err: unknown) => err === boom);
    });
});

describe('dependency calls', () => {
    it('should let domain errors from the store through', async () => {
        await assert.rejects(
            callStore('insert', async () => { throw new ConflictError('DUPLICATE_AGENT'); }, 100),
            (err: unknown) => err instanceof ConflictError && err.reason === 'DUPLICATE_AGENT'
        );
    });

    it('should sanitize raw store errors', async () => {
        await assert.rejects(
            callStore('getGroup', async () => { throw new Error('socket hang up'); }, 100),
            (err: unknown) => err instanceof UnavailableError && err.reason === 'STORE_UNAVAILABLE'
        );
    });

    it('should report any cache failure as CACHE_UNAVAILABLE', async () => {
        await assert.rejects(
            callCache('get', async () => { throw new Error('connection reset'); }, 100),
            (err: unknown) => err instanceof UnavailableError
                && err.reason === 'CACHE_UNAVAILABLE'
                && err.message === 'Permission cache get failed'
        );
        await assert.rejects(
            callCache('set', never, 10),
            (err: unknown) => err instanceof UnavailableError && err.reason === 'CACHE_UNAVAILABLE'
        );
    });

    it('should resolve a fast call without waiting for the deadline', async () => {
        const started = Date.now();
        await withTimeout(async () => sleep(1), 5_000, 'cleared');
        assert.ok(Date.now() - started < 1_000);
    });
});
