/**
 * Unit Tests: InMemoryResourceStore
 *
 * Transaction atomicity, duplicate and missing-parent errors, cascades.
 *
 * @see libs/store/InMemoryResourceStore.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ConflictError, NotFoundError, UnavailableError } from '../../libs/errors/authzErrors.js';
import type { InMemoryResourceStore } from '../../libs/store/InMemoryResourceStore.js';
import { seededStore } from '../helpers/fixtures.js';

describe('InMemoryResourceStore', () => {
    let store: InMemoryResourceStore;

    beforeEach(() => {
        store = seededStore();
    });

    it('should read seeded rows', async () => {
        const membership = await store.getMembership('alice', 'g1');
        assert.strictEqual(membership?.role, 'admin');
        assert.strictEqual(await store.getMembership('alice', 'g2'), null);

        const links = await store.listAgentGroups('a3');
        assert.deepStrictEqual(links.map(l => l.groupId).sort(), ['g1', 'g2']);

        const counts = await store.countMembershipsByGroup();
        assert.deepStrictEqual([...counts.entries()].sort(), [['g1', 2], ['g2', 2]]);
    });

    it('should commit every write of a successful transaction', async () => {
        const group = await store.transaction(async tx => {
            const created = await tx.createGroup({ name: 'Gamma', description: null });
            await tx.insertMembership({ userId: 'dave', groupId: created.id, role: 'admin' });
            return created;
        });

        assert.strictEqual((await store.getGroup(group.id))?.name, 'Gamma');
        assert.strictEqual((await store.getMembership('dave', group.id))?.role, 'admin');
    });

    it('should leave nothing behind when a transaction fails', async () => {
        await assert.rejects(
            store.transaction(async tx => {
                await tx.insertMembership({ userId: 'dave', groupId: 'g1', role: 'user' });
                throw new Error('abort');
            }),
            /abort/
        );

        assert.strictEqual(await store.getMembership('dave', 'g1'), null);
    });

    it('should reject duplicate memberships and links with ConflictError', async () => {
        await assert.rejects(
            store.transaction(tx => tx.insertMembership({ userId: 'alice', groupId: 'g1', role: 'user' })),
            (err: unknown) => err instanceof ConflictError && err.reason === 'DUPLICATE_MEMBERSHIP'
        );
        await assert.rejects(
            store.transaction(tx => tx.insertGroupAgent({ groupId: 'g1', agentId: 'a1', addedBy: 'alice' })),
            (err: unknown) => err instanceof ConflictError && err.reason === 'DUPLICATE_GROUP_AGENT'
        );
    });

    it('should reject duplicate agent external ids with ConflictError', async () => {
        await assert.rejects(
            store.transaction(tx => tx.createAgent({ externalId: 'a1', name: 'Copy', createdBy: 'alice' })),
            (err: unknown) => err instanceof ConflictError && err.reason === 'DUPLICATE_AGENT'
        );
    });

    it('should reject rows whose parent is missing with NotFoundError', async () => {
        await assert.rejects(
            store.transaction(tx => tx.insertMembership({ userId: 'nobody', groupId: 'g1', role: 'user' })),
            (err: unknown) => err instanceof NotFoundError && err.reason === 'USER_NOT_FOUND' && err.resourceId === 'nobody'
        );
        await assert.rejects(
            store.transaction(tx => tx.insertGroupAgent({ groupId: 'g9', agentId: 'a1', addedBy: 'alice' })),
            (err: unknown) => err instanceof NotFoundError && err.reason === 'GROUP_NOT_FOUND'
        );
    });

    it('should cascade memberships and links on group delete, keeping users and agents', async () => {
        const cascade = await store.transaction(tx => tx.deleteGroup('g1'));

        assert.ok(cascade);
        assert.deepStrictEqual(cascade.memberships.map(m => m.userId).sort(), ['alice', 'bob']);
        assert.deepStrictEqual(cascade.groupAgents.map(l => l.agentId).sort(), ['a1', 'a3']);

        assert.strictEqual(await store.getGroup('g1'), null);
        assert.deepStrictEqual(await store.listMemberships('g1'), []);
        assert.ok(await store.getUser('alice'));
        assert.ok(await store.getAgent('a1'));
        assert.deepStrictEqual((await store.listAgentGroups('a3')).map(l => l.groupId), ['g2']);
    });

    it('should replace the links of an agent and report the removed ones', async () => {
        const removed = await store.transaction(tx => tx.replaceAgentGroups('a3', ['g2'], 'root'));

        assert.deepStrictEqual(removed.map(l => l.groupId).sort(), ['g1', 'g2']);
        const links = await store.listAgentGroups('a3');
        assert.deepStrictEqual(links.map(l => [l.groupId, l.addedBy]), [['g2', 'root']]);
    });

    it('should keep createdAt when upserting an existing user', async () => {
        const before = await store.getUser('alice');
        const after = await store.transaction(tx =>
            tx.upsertUser({ id: 'alice', displayName: 'Alice A.', email: 'alice@example.test' }));

        assert.strictEqual(after.displayName, 'Alice A.');
        assert.strictEqual(after.createdAt, before?.createdAt);
    });

    it('should reject every call while marked unavailable', async () => {
        store.setAvailable(false);

        await assert.rejects(store.getGroup('g1'),
            (err: unknown) => err instanceof UnavailableError && err.reason === 'STORE_UNAVAILABLE');
        await assert.rejects(store.transaction(tx => tx.lockGroup('g1')), UnavailableError);

        store.setAvailable(true);
        assert.ok(await store.getGroup('g1'));
    });
});
