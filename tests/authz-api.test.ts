/**
 * Service facade tests
 *
 * Identity handling at the boundary, cross-user rules and one end-to-end
 * flow through the wired service on the in-memory store.
 */

import { describe, it, beforeEach, mock } from 'node:test';
import assert from 'node:assert';
import { loadServiceConfig } from '../libs/bootstrap/config/authz-config.js';
import { ForbiddenError, UnavailableError, ValidationError } from '../libs/errors/authzErrors.js';
import type { InMemoryResourceStore } from '../libs/store/InMemoryResourceStore.js';
import { createAuthzService } from '../services/authz-api/src/index.js';
import type { AuthzService } from '../services/authz-api/src/index.js';
import { caller, seededStore, superadmin } from './helpers/fixtures.js';

describe('AuthzApi', () => {
    let store: InMemoryResourceStore;
    let service: AuthzService;

    beforeEach(() => {
        store = seededStore();
        service = createAuthzService(loadServiceConfig({ AUTHZ_STORE: 'memory', NODE_ENV: 'test' }), { store });
    });

    describe('authorize', () => {
        it('should deny a malformed identity without throwing', async () => {
            const decision = await service.api.authorize({ subjectId: 'alice' }, 'read-group', { kind: 'group', groupId: 'g1' });
            assert.deepStrictEqual(decision, { allowed: false, role: 'none', groupId: null, reason: 'MALFORMED_IDENTITY' });
        });

        it('should deny an unknown action without throwing', async () => {
            const decision = await service.api.authorize(caller('alice'), 'launch-rockets', { kind: 'group', groupId: 'g1' });
            assert.deepStrictEqual(decision, { allowed: false, role: 'none', groupId: null, reason: 'UNKNOWN_ACTION' });
        });

        it('should reject a malformed resource', async () => {
            await assert.rejects(
                service.api.authorize(caller('alice'), 'read-group', { kind: 'team', groupId: 'g1' }),
                (err: unknown) => err instanceof ValidationError && err.context === 'authorize.resource'
            );
        });

        it('should evaluate a well-formed request', async () => {
            const decision = await service.api.authorize(caller('bob'), 'create-agent', { kind: 'agent', agentId: 'a3' });
            assert.deepStrictEqual(decision, { allowed: true, role: 'admin', groupId: 'g2' });
        });
    });

    describe('checks and listings', () => {
        it('should answer a self permission check', async () => {
            const decision = await service.api.checkPermission(caller('bob'),
                { targetUserId: 'bob', agentId: 'a3', action: 'create' });
            assert.strictEqual(decision.allowed, true);
        });

        it('should reject an invalid permission kind', async () => {
            await assert.rejects(
                service.api.checkPermission(caller('bob'), { targetUserId: 'bob', agentId: 'a3', action: 'delete' }),
                ValidationError
            );
        });

        it('should report admin as the role of a superadmin in any group', async () => {
            assert.strictEqual(await service.api.roleInGroup(superadmin(), 'g1'), 'admin');
            assert.strictEqual(await service.api.roleInGroup(caller('dave'), 'g1'), 'none');
        });

        it('should refuse cross-user listings to non-superadmins', async () => {
            await assert.rejects(service.api.visibleAgents(caller('alice'), 'bob'),
                (err: unknown) => err instanceof ForbiddenError && err.reason === 'CROSS_USER_QUERY');
            await assert.rejects(service.api.adminGroups(caller('alice'), 'bob'),
                (err: unknown) => err instanceof ForbiddenError && err.reason === 'CROSS_USER_QUERY');
        });

        it('should give a superadmin the membership view of the target user', async () => {
            const agents = await service.api.visibleAgents(superadmin(), 'alice');
            assert.deepStrictEqual(agents.map(a => a.agent.id), ['a1', 'a3']);

            const groups = await service.api.adminGroups(superadmin(), 'bob');
            assert.deepStrictEqual(groups.map(g => g.id), ['g2']);
        });

        it('should treat the caller own id as a self query', async () => {
            const agents = await service.api.visibleAgents(caller('alice'), 'alice');
            assert.deepStrictEqual(agents.map(a => a.agent.id), ['a1', 'a3']);
        });

        it('should reject a malformed identity on every other call', async () => {
            await assert.rejects(service.api.listGroups({ superadmin: true }), ValidationError);
        });

        it('should sanitize unexpected failures', async () => {
            mock.method(store, 'listGroups', async () => { throw new Error('disk on fire'); });

            await assert.rejects(service.api.listGroups(superadmin()), (err: unknown) =>
                err instanceof UnavailableError
                && err.reason === 'STORE_UNAVAILABLE'
                && !err.message.includes('disk on fire'));
        });
    });

    describe('end-to-end', () => {
        it('should follow a group from creation through membership changes', async () => {
            const root = superadmin();
            const { group } = await service.api.createGroup(root, { name: 'Gamma', initialAdminId: 'dave' });

            const registered = await service.api.registerAgent(caller('dave'),
                { externalId: 'ext-helper', name: 'Helper', groupId: group.id });
            assert.deepStrictEqual(registered.groups, [{ groupId: group.id, groupName: 'Gamma' }]);

            assert.deepStrictEqual((await service.api.visibleAgents(caller('alice'))).map(a => a.agent.name),
                ['Agent One', 'Agent Three']);

            await service.api.addMember(caller('dave'), group.id, 'alice', 'user');
            assert.deepStrictEqual((await service.api.visibleAgents(caller('alice'))).map(a => a.agent.name),
                ['Agent One', 'Agent Three', 'Helper']);

            const members = await service.api.listMembers(caller('dave'), group.id);
            assert.deepStrictEqual(members.map(m => [m.userId, m.role]), [['dave', 'admin'], ['alice', 'user']]);

            await service.api.removeMember(caller('dave'), group.id, 'alice');
            assert.deepStrictEqual((await service.api.visibleAgents(caller('alice'))).map(a => a.agent.name),
                ['Agent One', 'Agent Three']);

            const cascade = await service.api.deleteGroup(caller('dave'), group.id);
            assert.deepStrictEqual(cascade.groupAgents.map(l => l.agentId), [registered.agent.id]);
            assert.deepStrictEqual(await service.api.listGroups(caller('dave')), []);
        });
    });
});
