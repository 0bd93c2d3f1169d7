import type { CallerIdentity } from '../context/identity.js';
import { NotFoundError } from '../errors/authzErrors.js';
import type { ResourceReader } from '../store/resourceStore.js';
import type {
    Agent,
    AgentWithGroups,
    Group,
    GroupWithMemberCount,
    MemberView
} from '../store/types.js';
import { callStore } from '../timing/dependencyCall.js';
import { EntityIdSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import type { AuthorizationEngine } from './AuthorizationEngine.js';
import type { Action } from './actions.js';

const ROLE_ORDER = { admin: 0, user: 1 } as const;

/**
 * Authorized reads over groups, their members and their agents.
 * Nothing here is cached; these are management views, not hot-path checks.
 */
export class GroupDirectory {
    constructor(
        private readonly store: ResourceReader,
        private readonly engine: AuthorizationEngine,
        private readonly storeTimeoutMs = 2_000
    ) { }

    async getGroup(identity: CallerIdentity, groupId: string): Promise<Group> {
        validate(EntityIdSchema, groupId, 'getGroup.groupId');
        await this.require(identity, 'read-group', groupId);
        return this.existingGroup(groupId);
    }

    /** Members with their user details, admins first. */
    async listMembers(identity: CallerIdentity, groupId: string): Promise<MemberView[]> {
        validate(EntityIdSchema, groupId, 'listMembers.groupId');
        await this.require(identity, 'manage-members', groupId);
        await this.existingGroup(groupId);

        const memberships = await this.read('listMemberships', () => this.store.listMemberships(groupId));
        const users = await this.read('listUsersByIds',
            () => this.store.listUsersByIds(memberships.map(m => m.userId)));
        const byId = new Map(users.map(u => [u.id, u]));

        return memberships
            .map(m => ({
                userId: m.userId,
                displayName: byId.get(m.userId)?.displayName ?? '',
                email: byId.get(m.userId)?.email ?? '',
                role: m.role,
                createdAt: m.createdAt,
            }))
            .sort((a, b) =>
                ROLE_ORDER[a.role] - ROLE_ORDER[b.role]
                || a.displayName.localeCompare(b.displayName)
                || (a.userId < b.userId ? -1 : a.userId > b.userId ? 1 : 0));
    }

    async listAgentsInGroup(identity: CallerIdentity, groupId: string): Promise<Agent[]> {
        validate(EntityIdSchema, groupId, 'listAgentsInGroup.groupId');
        await this.require(identity, 'manage-agents', groupId);
        await this.existingGroup(groupId);

        const links = await this.read('listGroupAgents', () => this.store.listGroupAgents(groupId));
        const agents = await this.read('listAgentsByIds',
            () => this.store.listAgentsByIds(links.map(l => l.agentId)));
        return [...agents].sort((a, b) => a.name.localeCompare(b.name) || (a.id < b.id ? -1 : 1));
    }

    /** Every agent with every group link. Superadmin only. */
    async listAllAgents(identity: CallerIdentity): Promise<readonly AgentWithGroups[]> {
        this.engine.requireSuperadmin(identity);
        return this.engine.visibleAgents(identity);
    }

    /** Every group with its member count. Superadmin only. */
    async listAllGroupsWithCounts(identity: CallerIdentity): Promise<GroupWithMemberCount[]> {
        this.engine.requireSuperadmin(identity);
        const [groups, counts] = await Promise.all([
            this.read('listGroups', () => this.store.listGroups()),
            this.read('countMembershipsByGroup', () => this.store.countMembershipsByGroup()),
        ]);
        return groups.map(group => ({ group, memberCount: counts.get(group.id) ?? 0 }));
    }

    private async require(identity: CallerIdentity, action: Action, groupId: string): Promise<void> {
        const decision = await this.engine.authorize(identity, action, { kind: 'group', groupId });
        this.engine.requireAllowed(decision, action);
    }

    private async existingGroup(groupId: string): Promise<Group> {
        const group = await this.read('getGroup', () => this.store.getGroup(groupId));
        if (!group) {
            throw new NotFoundError('GROUP_NOT_FOUND', groupId);
        }
        return group;
    }

    private read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        return callStore(operation, fn, this.storeTimeoutMs);
    }
}
