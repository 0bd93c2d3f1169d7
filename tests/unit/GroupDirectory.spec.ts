/**
 * Unit Tests: GroupDirectory
 *
 * @see libs/authz/GroupDirectory.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AuthorizationEngine } from '../../libs/authz/AuthorizationEngine.js';
import { GroupDirectory } from '../../libs/authz/GroupDirectory.js';
import { ForbiddenError, NotFoundError } from '../../libs/errors/authzErrors.js';
import type { InMemoryResourceStore } from '../../libs/store/InMemoryResourceStore.js';
import { caller, newCache, seededStore, superadmin } from '../helpers/fixtures.js';

const isForbidden = (reason: string) => (err: unknown) => err instanceof ForbiddenError && err.reason === reason;

describe('GroupDirectory', () => {
    let store: InMemoryResourceStore;
    let directory: GroupDirectory;

    beforeEach(() => {
        store = seededStore();
        directory = new GroupDirectory(store, new AuthorizationEngine(store, newCache()));
    });

    describe('getGroup', () => {
        it('should return the group to any member', async () => {
            assert.strictEqual((await directory.getGroup(caller('bob'), 'g1')).name, 'Alpha');
        });

        it('should refuse a non-member before revealing whether the group exists', async () => {
            await assert.rejects(directory.getGroup(caller('dave'), 'g1'), isForbidden('INSUFFICIENT_ROLE'));
            await assert.rejects(directory.getGroup(caller('dave'), 'g9'), isForbidden('INSUFFICIENT_ROLE'));
        });

        it('should report a missing group to a superadmin', async () => {
            await assert.rejects(directory.getGroup(superadmin(), 'g9'),
                (err: unknown) => err instanceof NotFoundError && err.reason === 'GROUP_NOT_FOUND');
        });
    });

    describe('listMembers', () => {
        it('should list admins first, then by display name', async () => {
            const members = await directory.listMembers(caller('alice'), 'g1');

            assert.deepStrictEqual(members.map(m => [m.userId, m.displayName, m.role]), [
                ['alice', 'Alice', 'admin'],
                ['bob', 'Bob', 'user'],
            ]);
            assert.strictEqual(members[1]?.email, 'bob@example.test');
        });

        it('should order admins of equal rank by display name', async () => {
            const members = await directory.listMembers(caller('carol'), 'g2');
            assert.deepStrictEqual(members.map(m => m.userId), ['bob', 'carol']);
        });

        it('should refuse a plain user', async () => {
            await assert.rejects(directory.listMembers(caller('bob'), 'g1'), isForbidden('NOT_GROUP_ADMIN'));
        });
    });

    describe('listAgentsInGroup', () => {
        it('should list the agents linked to the group by name', async () => {
            const agents = await directory.listAgentsInGroup(caller('alice'), 'g1');
            assert.deepStrictEqual(agents.map(a => a.name), ['Agent One', 'Agent Three']);
        });

        it('should refuse an admin of another group', async () => {
            await assert.rejects(directory.listAgentsInGroup(caller('carol'), 'g1'), isForbidden('NOT_GROUP_ADMIN'));
        });
    });

    describe('superadmin listings', () => {
        it('should list every agent', async () => {
            const agents = await directory.listAllAgents(superadmin());
            assert.deepStrictEqual(agents.map(a => a.agent.id), ['a1', 'a3', 'a2']);
        });

        it('should list every group with its member count', async () => {
            const empty = await store.transaction(tx => tx.createGroup({ name: 'Empty', description: null }));

            const groups = await directory.listAllGroupsWithCounts(superadmin());

            assert.deepStrictEqual(groups.map(g => [g.group.id, g.memberCount]), [
                ['g1', 2],
                ['g2', 2],
                [empty.id, 0],
            ]);
        });

        it('should refuse both listings to anyone else', async () => {
            await assert.rejects(directory.listAllAgents(caller('alice')), isForbidden('SUPERADMIN_REQUIRED'));
            await assert.rejects(directory.listAllGroupsWithCounts(caller('alice')), isForbidden('SUPERADMIN_REQUIRED'));
        });
    });
});
