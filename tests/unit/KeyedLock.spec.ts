/**
 * Unit Tests: KeyedLock
 *
 * @see libs/guards/groupLock.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as sleep } from 'node:timers/promises';
import { KeyedLock } from '../../libs/guards/groupLock.js';

describe('KeyedLock', () => {
    it('should run holders of the same key one after another', async () => {
        const lock = new KeyedLock();
        const events: string[] = [];

        const first = lock.runExclusive(['group:g1'], async () => {
            events.push('first:start');
            await sleep(20);
            events.push('first:end');
        });
        const second = lock.runExclusive(['group:g1'], async () => {
            events.push('second:start');
        });

        await Promise.all([first, second]);
        assert.deepStrictEqual(events, ['first:start', 'first:end', 'second:start']);
    });

    it('should let different keys proceed concurrently', async () => {
        const lock = new KeyedLock();
        const events: string[] = [];

        await Promise.all([
            lock.runExclusive(['group:g1'], async () => {
                events.push('g1:start');
                await sleep(20);
                events.push('g1:end');
            }),
            lock.runExclusive(['group:g2'], async () => {
                events.push('g2:start');
            }),
        ]);

        assert.deepStrictEqual(events, ['g1:start', 'g2:start', 'g1:end']);
    });

    it('should not deadlock when callers name the same keys in opposite order', async () => {
        const lock = new KeyedLock();
        const results = await Promise.all([
            lock.runExclusive(['group:a', 'group:b'], async () => { await sleep(5); return 1; }),
            lock.runExclusive(['group:b', 'group:a'], async () => { await sleep(5); return 2; }),
        ]);

        assert.deepStrictEqual(results, [1, 2]);
        assert.strictEqual(lock.size, 0);
    });

    it('should release the key when the holder throws', async () => {
        const lock = new KeyedLock();

        await assert.rejects(lock.runExclusive(['group:g1'], async () => { throw new Error('failed'); }), /failed/);
        assert.strictEqual(await lock.runExclusive(['group:g1'], async () => 'next'), 'next');
        assert.strictEqual(lock.size, 0);
    });

    it('should run immediately with no keys', async () => {
        const lock = new KeyedLock();
        assert.strictEqual(await lock.runExclusive([], async () => 'free'), 'free');
    });
});
