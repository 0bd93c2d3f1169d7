import type { AuthorizationEngine } from '../authz/AuthorizationEngine.js';
import type { Action } from '../authz/actions.js';
import { agentTag, groupTag, subjectTag } from '../cache/permissionCache.js';
import type { PermissionCache } from '../cache/permissionCache.js';
import type { CallerIdentity } from '../context/identity.js';
import { ConflictError, NotFoundError, UnavailableError } from '../errors/authzErrors.js';
import { getContextLogger } from '../logging/logger.js';
import type { ResourceStore, ResourceTx } from '../store/resourceStore.js';
import type {
    Agent,
    AgentWithGroups,
    Group,
    GroupAgent,
    GroupCascade,
    GroupRole,
    Membership,
    User
} from '../store/types.js';
import { withTimeout } from '../timing/deadline.js';
import { callCache, callStore } from '../timing/dependencyCall.js';
import {
    AgentGroupsSchema,
    CreateGroupSchema,
    EntityIdSchema,
    GroupRoleSchema,
    RegisterAgentSchema,
    UpdateGroupSchema
} from '../validation/schema.js';
import type { CreateGroupInput, RegisterAgentInput, UpdateGroupInput } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import { KeyedLock } from './groupLock.js';

export interface MutationGuardOptions {
    readonly storeTimeoutMs?: number;
    readonly cacheTimeoutMs?: number;
    /**
     * Bound on one mutation, from waiting for the lock to the end of cache
     * invalidation. Defaults to four store timeouts.
     */
    readonly transactionTimeoutMs?: number;
    /** Shared lock; one per process. */
    readonly lock?: KeyedLock;
}

export interface LinkResult {
    readonly groupId: string;
    readonly agentId: string;
    /** False when the link was already in the requested state. */
    readonly changed: boolean;
}

export interface CreatedGroup {
    readonly group: Group;
    readonly initialAdmin: Membership | null;
}

interface Outcome<T> {
    readonly result: T;
    /** Cache tags made stale by the committed change. */
    readonly tags: readonly string[];
}

const lockKeyForGroup = groupTag;
const lockKeyForAgent = agentTag;

function countAdmins(memberships: readonly Membership[]): number {
    return memberships.filter(m => m.role === 'admin').length;
}

/**
 * MutationGuard - the only write path for memberships and agent links.
 *
 * Every operation authorizes the caller, then, under the group lock and
 * inside one store transaction, re-reads what it depends on, checks the
 * invariants and writes. Cache invalidation runs after COMMIT and before the
 * call returns; if it fails the caller sees UnavailableError even though the
 * write is durable.
 *
 * Invariant: a group with at least one member has at least one admin.
 */
export class MutationGuard {
    private readonly lock: KeyedLock;
    private readonly storeTimeoutMs: number;
    private readonly cacheTimeoutMs: number;
    private readonly transactionTimeoutMs: number;

    constructor(
        private readonly store: ResourceStore,
        private readonly cache: PermissionCache,
        private readonly engine: AuthorizationEngine,
        options: MutationGuardOptions = {}
    ) {
        this.lock = options.lock ?? new KeyedLock();
        this.storeTimeoutMs = options.storeTimeoutMs ?? 2_000;
        this.cacheTimeoutMs = options.cacheTimeoutMs ?? 250;
        this.transactionTimeoutMs = options.transactionTimeoutMs ?? this.storeTimeoutMs * 4;
    }

    // ── Memberships ──────────────────────────────────────────────

    async addMember(identity: CallerIdentity, groupId: string, userId: string, role: GroupRole): Promise<Membership> {
        validate(EntityIdSchema, groupId, 'addMember.groupId');
        validate(EntityIdSchema, userId, 'addMember.userId');
        validate(GroupRoleSchema, role, 'addMember.role');

        return this.mutate(identity, 'addMember', [lockKeyForGroup(groupId)], async () => {
            await this.requireAllowedInGroup(identity, 'manage-members', groupId);

            return this.store.transaction(async tx => {
                await this.lockExistingGroup(tx, groupId);
                if (!(await tx.getUser(userId))) {
                    throw new NotFoundError('USER_NOT_FOUND', userId);
                }
                if (await tx.getMembership(userId, groupId)) {
                    throw new ConflictError('DUPLICATE_MEMBERSHIP');
                }
                if (role === 'user' && countAdmins(await tx.listMemberships(groupId)) === 0) {
                    this.rejectInvariant(identity, 'NO_ADMIN', { groupId, userId });
                }

                const membership = await tx.insertMembership({ userId, groupId, role });
                return { result: membership, tags: [subjectTag(userId)] };
            });
        });
    }

    async updateMemberRole(
        identity: CallerIdentity,
        groupId: string,
        userId: string,
        newRole: GroupRole
    ): Promise<Membership> {
        validate(EntityIdSchema, groupId, 'updateMemberRole.groupId');
        validate(EntityIdSchema, userId, 'updateMemberRole.userId');
        validate(GroupRoleSchema, newRole, 'updateMemberRole.role');

        return this.mutate(identity, 'updateMemberRole', [lockKeyForGroup(groupId)], async () => {
            await this.requireAllowedInGroup(identity, 'manage-members', groupId);

            return this.store.transaction(async tx => {
                await this.lockExistingGroup(tx, groupId);
                const membership = await this.existingMembership(tx, userId, groupId);
                if (membership.role === newRole) {
                    return { result: membership, tags: [] };
                }

                // Covers the sole admin demoting themselves.
                if (membership.role === 'admin' && countAdmins(await tx.listMemberships(groupId)) <= 1) {
                    this.rejectInvariant(identity, 'LAST_ADMIN', { groupId, userId, newRole });
                }

                const updated = await tx.updateMembershipRole(userId, groupId, newRole);
                if (!updated) {
                    throw new NotFoundError('MEMBERSHIP_NOT_FOUND', `${groupId}/${userId}`);
                }
                return { result: updated, tags: [subjectTag(userId)] };
            });
        });
    }

    async removeMember(identity: CallerIdentity, groupId: string, userId: string): Promise<Membership> {
        validate(EntityIdSchema, groupId, 'removeMember.groupId');
        validate(EntityIdSchema, userId, 'removeMember.userId');

        return this.mutate(identity, 'removeMember', [lockKeyForGroup(groupId)], async () => {
            await this.requireAllowedInGroup(identity, 'manage-members', groupId);

            return this.store.transaction(async tx => {
                await this.lockExistingGroup(tx, groupId);
                const membership = await this.existingMembership(tx, userId, groupId);

                // Deleting the group is the only way to drop its last admin.
                if (membership.role === 'admin' && countAdmins(await tx.listMemberships(groupId)) <= 1) {
                    this.rejectInvariant(identity, 'LAST_ADMIN', { groupId, userId });
                }

                await tx.deleteMembership(userId, groupId);
                return { result: membership, tags: [subjectTag(userId)] };
            });
        });
    }

    // ── Agent links ──────────────────────────────────────────────

    async linkAgentToGroup(identity: CallerIdentity, groupId: string, agentId: string): Promise<LinkResult> {
        validate(EntityIdSchema, groupId, 'linkAgentToGroup.groupId');
        validate(EntityIdSchema, agentId, 'linkAgentToGroup.agentId');

        const keys = [lockKeyForGroup(groupId), lockKeyForAgent(agentId)];
        return this.mutate<LinkResult>(identity, 'linkAgentToGroup', keys, async () => {
            await this.requireAllowedInGroup(identity, 'manage-agents', groupId);

            return this.store.transaction(async tx => {
                await this.lockExistingGroup(tx, groupId);
                if (!(await tx.getAgent(agentId))) {
                    throw new NotFoundError('AGENT_NOT_FOUND', agentId);
                }

                const linked = (await tx.listAgentGroups(agentId)).some(l => l.groupId === groupId);
                if (linked) {
                    return { result: { groupId, agentId, changed: false }, tags: [] };
                }

                await tx.insertGroupAgent({ groupId, agentId, addedBy: identity.subjectId });
                return {
                    result: { groupId, agentId, changed: true },
                    tags: [groupTag(groupId), agentTag(agentId)],
                };
            });
        });
    }

    async unlinkAgentFromGroup(identity: CallerIdentity, groupId: string, agentId: string): Promise<LinkResult> {
        validate(EntityIdSchema, groupId, 'unlinkAgentFromGroup.groupId');
        validate(EntityIdSchema, agentId, 'unlinkAgentFromGroup.agentId');

        const keys = [lockKeyForGroup(groupId), lockKeyForAgent(agentId)];
        return this.mutate<LinkResult>(identity, 'unlinkAgentFromGroup', keys, async () => {
            await this.requireAllowedInGroup(identity, 'manage-agents', groupId);

            return this.store.transaction(async tx => {
                await this.lockExistingGroup(tx, groupId);
                const changed = await tx.deleteGroupAgent(groupId, agentId);
                return {
                    result: { groupId, agentId, changed },
                    tags: changed ? [groupTag(groupId), agentTag(agentId)] : [],
                };
            });
        });
    }

    // ── Groups ───────────────────────────────────────────────────

    async deleteGroup(identity: CallerIdentity, groupId: string): Promise<GroupCascade> {
        validate(EntityIdSchema, groupId, 'deleteGroup.groupId');

        return this.mutate(identity, 'deleteGroup', [lockKeyForGroup(groupId)], async () => {
            await this.requireAllowedInGroup(identity, 'delete-group', groupId);

            return this.store.transaction(async tx => {
                await this.lockExistingGroup(tx, groupId);
                const cascade = await tx.deleteGroup(groupId);
                if (!cascade) {
                    throw new NotFoundError('GROUP_NOT_FOUND', groupId);
                }
                return {
                    result: cascade,
                    tags: [
                        groupTag(groupId),
                        ...cascade.memberships.map(m => subjectTag(m.userId)),
                        ...cascade.groupAgents.map(ga => agentTag(ga.agentId)),
                    ],
                };
            });
        });
    }

    async createGroup(identity: CallerIdentity, input: CreateGroupInput): Promise<CreatedGroup> {
        this.engine.requireSuperadmin(identity);
        const { name, description, initialAdminId } = validate(CreateGroupSchema, input, 'createGroup');

        return this.mutate<CreatedGroup>(identity, 'createGroup', [], async () => {
            return this.store.transaction(async tx => {
                const group = await tx.createGroup({ name, description });
                if (initialAdminId === undefined) {
                    return { result: { group, initialAdmin: null }, tags: [] };
                }

                if (!(await tx.getUser(initialAdminId))) {
                    throw new NotFoundError('USER_NOT_FOUND', initialAdminId);
                }
                const initialAdmin = await tx.insertMembership({ userId: initialAdminId, groupId: group.id, role: 'admin' });
                return { result: { group, initialAdmin }, tags: [subjectTag(initialAdminId)] };
            });
        });
    }

    async updateGroup(identity: CallerIdentity, groupId: string, patch: UpdateGroupInput): Promise<Group> {
        validate(EntityIdSchema, groupId, 'updateGroup.groupId');
        const changes = validate(UpdateGroupSchema, patch, 'updateGroup');

        return this.mutate(identity, 'updateGroup', [lockKeyForGroup(groupId)], async () => {
            await this.requireAllowedInGroup(identity, 'update-group', groupId);

            return this.store.transaction(async tx => {
                await this.lockExistingGroup(tx, groupId);
                const group = await tx.updateGroup(groupId, changes);
                if (!group) {
                    throw new NotFoundError('GROUP_NOT_FOUND', groupId);
                }
                // Group names are embedded in cached listings.
                return { result: group, tags: [groupTag(groupId)] };
            });
        });
    }

    // ── Agents ───────────────────────────────────────────────────

    /** Creates an agent together with its first group link. */
    async registerAgent(identity: CallerIdentity, input: RegisterAgentInput): Promise<AgentWithGroups> {
        const { externalId, name, groupId } = validate(RegisterAgentSchema, input, 'registerAgent');

        return this.mutate(identity, 'registerAgent', [lockKeyForGroup(groupId)], async () => {
            await this.requireAllowedInGroup(identity, 'create-agent', groupId);

            return this.store.transaction(async tx => {
                const group = await this.lockExistingGroup(tx, groupId);
                if (await tx.getAgentByExternalId(externalId)) {
                    throw new ConflictError('DUPLICATE_AGENT');
                }
                const agent: Agent = await tx.createAgent({ externalId, name, createdBy: identity.subjectId });
                await tx.insertGroupAgent({ groupId, agentId: agent.id, addedBy: identity.subjectId });
                return {
                    result: { agent, groups: [{ groupId, groupName: group.name }] },
                    tags: [groupTag(groupId), agentTag(agent.id)],
                };
            });
        });
    }

    /** Replaces every group link of an agent. Superadmin only. */
    async setAgentGroups(identity: CallerIdentity, agentId: string, groupIds: readonly string[]): Promise<GroupAgent[]> {
        this.engine.requireSuperadmin(identity);
        validate(EntityIdSchema, agentId, 'setAgentGroups.agentId');
        // Row locks are taken in id order, like the in-process locks.
        const wanted = [...new Set(validate(AgentGroupsSchema, groupIds, 'setAgentGroups.groupIds'))].sort();

        const current = await callStore('listAgentGroups', () => this.store.listAgentGroups(agentId), this.storeTimeoutMs);
        const keys = [
            lockKeyForAgent(agentId),
            ...wanted.map(lockKeyForGroup),
            ...current.map(l => lockKeyForGroup(l.groupId)),
        ];

        return this.mutate(identity, 'setAgentGroups', keys, async () => {
            return this.store.transaction(async tx => {
                for (const groupId of wanted) {
                    await this.lockExistingGroup(tx, groupId);
                }
                const removed = await tx.replaceAgentGroups(agentId, wanted, identity.subjectId);
                const links = await tx.listAgentGroups(agentId);
                return {
                    result: links,
                    tags: [
                        agentTag(agentId),
                        ...removed.map(l => groupTag(l.groupId)),
                        ...wanted.map(groupTag),
                    ],
                };
            });
        });
    }

    // ── Users ────────────────────────────────────────────────────

    /** Creates or refreshes the caller's user record from the identity. */
    async syncUser(identity: CallerIdentity): Promise<User> {
        return this.mutate(identity, 'syncUser', [], async () => {
            return this.store.transaction(async tx => {
                const user = await tx.upsertUser({
                    id: identity.subjectId,
                    displayName: identity.displayName,
                    email: identity.email,
                });
                return { result: user, tags: [] };
            });
        });
    }

    // ── Internals ────────────────────────────────────────────────

    /**
     * Runs one mutation under its locks and a deadline.
     *
     * When the deadline passes the caller gets UnavailableError(TIMEOUT). A
     * mutation still queued for its locks then never starts; one already inside
     * its transaction keeps the locks until the store settles it, and a late
     * commit is still invalidated.
     */
    private async mutate<T>(
        identity: CallerIdentity,
        operation: string,
        lockKeys: readonly string[],
        run: () => Promise<Outcome<T>>
    ): Promise<T> {
        const logger = getContextLogger(identity);
        let settled = false;
        let abandoned = false;

        const work = this.lock.runExclusive(lockKeys, async () => {
            if (abandoned) {
                throw new UnavailableError('TIMEOUT', `${operation} gave up waiting for its lock`);
            }

            const outcome = await run();

            if (outcome.tags.length > 0) {
                const tags = [...new Set(outcome.tags)];
                try {
                    await callCache('invalidate', () => this.cache.invalidate(tags), this.cacheTimeoutMs);
                } catch (error) {
                    logger.error({
                        operation,
                        tags,
                        error: error instanceof Error ? error.message : String(error),
                    }, 'Change committed but cache invalidation failed');
                    throw new UnavailableError(
                        'CACHE_UNAVAILABLE',
                        `${operation} committed but permission cache invalidation failed`,
                        { cause: error }
                    );
                }
            }

            logger.info({ operation, invalidated: outcome.tags.length }, 'Mutation committed');
            return outcome.result;
        });

        void work.then(
            () => {
                settled = true;
                if (abandoned) {
                    logger.warn({ operation }, 'Mutation committed after its caller timed out');
                }
            },
            (error: unknown) => {
                settled = true;
                if (abandoned) {
                    logger.warn({
                        operation,
                        error: error instanceof Error ? error.message : String(error),
                    }, 'Mutation failed after its caller timed out');
                }
            }
        );

        try {
            return await withTimeout(() => work, this.transactionTimeoutMs, `mutation.${operation}`);
        } catch (error) {
            if (!settled) {
                abandoned = true;
                logger.error({ operation, timeoutMs: this.transactionTimeoutMs }, 'Mutation exceeded its deadline');
            }
            throw error;
        }
    }

    private async requireAllowedInGroup(identity: CallerIdentity, action: Action, groupId: string): Promise<void> {
        const decision = await this.engine.authorize(identity, action, { kind: 'group', groupId });
        this.engine.requireAllowed(decision, action);
    }

    private async lockExistingGroup(tx: ResourceTx, groupId: string): Promise<Group> {
        const locked = await tx.lockGroup(groupId);
        const group = locked ? await tx.getGroup(groupId) : null;
        if (!group) {
            throw new NotFoundError('GROUP_NOT_FOUND', groupId);
        }
        return group;
    }

    private async existingMembership(tx: ResourceTx, userId: string, groupId: string): Promise<Membership> {
        const membership = await tx.getMembership(userId, groupId);
        if (!membership) {
            throw new NotFoundError('MEMBERSHIP_NOT_FOUND', `${groupId}/${userId}`);
        }
        return membership;
    }

    private rejectInvariant(identity: CallerIdentity, reason: 'LAST_ADMIN' | 'NO_ADMIN', details: Record<string, string>): never {
        getContextLogger(identity).warn({ reason, ...details }, 'Membership change rejected by admin invariant');
        throw new ConflictError(reason);
    }
}
