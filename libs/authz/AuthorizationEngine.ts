import type { CallerIdentity } from '../context/identity.js';
import { Fingerprints, agentTag, groupTag } from '../cache/permissionCache.js';
import type { CachedValue, Fingerprint, PermissionCache } from '../cache/permissionCache.js';
import { ForbiddenError, UnavailableError, isAuthzError } from '../errors/authzErrors.js';
import { getComponentLogger, getContextLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import type { ResourceReader } from '../store/resourceStore.js';
import { roleSatisfies } from '../store/types.js';
import type { Agent, AgentWithGroups, Group, GroupAgent, GroupRole, ResolvedRole } from '../store/types.js';
import { callCache, callStore } from '../timing/dependencyCall.js';
import { CallerIdentitySchema } from '../validation/identitySchema.js';
import { DEFAULT_POLICY } from './actions.js';
import type { Action, PolicyTable } from './actions.js';
import { allow, deny } from './decision.js';
import type { Decision, ResourceRef } from './decision.js';

export interface AuthorizationEngineOptions {
    readonly policy?: PolicyTable;
    readonly storeTimeoutMs?: number;
    readonly cacheTimeoutMs?: number;
}

export type PermissionKind = 'access' | 'create';

const PERMISSION_ACTIONS: Record<PermissionKind, Action> = {
    access: 'read-agent-visibility',
    create: 'create-agent',
};

interface Loaded {
    readonly value: CachedValue;
    readonly extraTags?: readonly string[];
}

const log = getComponentLogger('AuthorizationEngine');

const byNameThenId = <T extends { readonly id: string; readonly name: string }>(a: T, b: T): number =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : a.id < b.id ? -1 : a.id > b.id ? 1 : 0;

function unique(values: Iterable<string>): string[] {
    return [...new Set(values)].sort();
}

function mismatch(fingerprint: Fingerprint, value: CachedValue): Error {
    return new Error(`Cache entry ${fingerprint.key} holds a '${value.kind}' value`);
}

/**
 * Joins agents with the names of the groups they are linked to.
 * Links to groups not present in `groups` are left out.
 */
export function assembleAgents(
    agents: readonly Agent[],
    links: readonly GroupAgent[],
    groups: readonly Group[]
): AgentWithGroups[] {
    const names = new Map(groups.map(g => [g.id, g.name]));
    return [...agents].sort(byNameThenId).map(agent => ({
        agent,
        groups: links
            .filter(l => l.agentId === agent.id && names.has(l.groupId))
            .map(l => ({ groupId: l.groupId, groupName: names.get(l.groupId) ?? '' }))
            .sort((a, b) => (a.groupId < b.groupId ? -1 : a.groupId > b.groupId ? 1 : 0)),
    }));
}

/**
 * AuthorizationEngine
 *
 * Answers "may this caller do this action on this resource" from group
 * memberships. Roles are only ever evaluated within one group; an agent in
 * several groups is checked group by group and never by merging roles.
 *
 * Fail-closed: `authorize` and `checkPermission` never throw. Any failure to
 * resolve a role yields a Deny. The listing operations propagate
 * UnavailableError instead, since there is no safe default list.
 */
export class AuthorizationEngine {
    private readonly policyTable: PolicyTable;
    private readonly storeTimeoutMs: number;
    private readonly cacheTimeoutMs: number;

    // fingerprint key → shared store read, valid while the cache clock is unchanged
    private readonly inflight = new Map<string, { stamp: number; promise: Promise<CachedValue> }>();

    constructor(
        private readonly store: ResourceReader,
        private readonly cache: PermissionCache,
        options: AuthorizationEngineOptions = {}
    ) {
        this.policyTable = options.policy ?? DEFAULT_POLICY;
        this.storeTimeoutMs = options.storeTimeoutMs ?? 2_000;
        this.cacheTimeoutMs = options.cacheTimeoutMs ?? 250;
    }

    get policy(): PolicyTable {
        return this.policyTable;
    }

    isSuperadmin(identity: CallerIdentity): boolean {
        return identity.superadmin === true;
    }

    /**
     * Role of a subject in one group, from cache or store.
     * Rejects with UnavailableError when neither can answer.
     */
    async roleInGroup(subjectId: string, groupId: string): Promise<ResolvedRole> {
        const fingerprint = Fingerprints.role(subjectId, groupId);
        const value = await this.cached(fingerprint, async () => {
            const membership = await this.fromStore('getMembership', () => this.store.getMembership(subjectId, groupId));
            return { value: { kind: 'role', role: membership?.role ?? 'none' } };
        });
        if (value.kind === 'role') return value.role;
        throw mismatch(fingerprint, value);
    }

    /** Superadmins hold admin in every group; nothing is stored for them. */
    async effectiveRole(identity: CallerIdentity, groupId: string): Promise<ResolvedRole> {
        if (this.isSuperadmin(identity)) return 'admin';
        return this.roleInGroup(identity.subjectId, groupId);
    }

    /** Ids of the groups an agent is linked to, ascending. */
    async agentGroupIds(agentId: string): Promise<readonly string[]> {
        const fingerprint = Fingerprints.agentGroups(agentId);
        const value = await this.cached(fingerprint, async () => {
            const links = await this.fromStore('listAgentGroups', () => this.store.listAgentGroups(agentId));
            const groupIds = unique(links.map(l => l.groupId));
            return { value: { kind: 'agent-groups', groupIds }, extraTags: groupIds.map(groupTag) };
        });
        if (value.kind === 'agent-groups') return value.groupIds;
        throw mismatch(fingerprint, value);
    }

    async authorize(identity: CallerIdentity, action: Action, resource: ResourceRef): Promise<Decision> {
        if (!CallerIdentitySchema.safeParse(identity).success) {
            log.warn({ action, resource }, 'Malformed identity; denying');
            return deny('MALFORMED_IDENTITY');
        }

        const logger = getContextLogger(identity);
        if (this.policyTable[action] === undefined) {
            logger.warn({ action }, 'Action has no policy entry; denying');
            return deny('UNKNOWN_ACTION');
        }

        if (this.isSuperadmin(identity)) {
            const decision = allow('superadmin', resource.groupId ?? null);
            logger.debug({ action, resource, decision }, 'Authorization decision');
            return decision;
        }

        return this.evaluate(logger, identity.subjectId, action, resource);
    }

    /**
     * May `targetUserId` access (`access`) or create under (`create`) an agent?
     * Non-superadmins may only ask about themselves.
     */
    async checkPermission(
        identity: CallerIdentity,
        targetUserId: string,
        agentId: string,
        kind: PermissionKind
    ): Promise<Decision> {
        const action = PERMISSION_ACTIONS[kind];
        const resource: ResourceRef = { kind: 'agent', agentId };

        if (identity.subjectId === targetUserId) {
            return this.authorize(identity, action, resource);
        }

        if (!this.isSuperadmin(identity)) {
            getContextLogger(identity).info({ targetUserId, agentId, kind }, 'Cross-user permission check denied');
            return deny('CROSS_USER_QUERY');
        }

        // The target's own superadmin claim is not known here; only memberships count.
        return this.evaluate(getContextLogger(identity), targetUserId, action, resource);
    }

    /** Every agent for superadmins, otherwise those reachable through a membership. */
    async visibleAgents(identity: CallerIdentity): Promise<readonly AgentWithGroups[]> {
        if (this.isSuperadmin(identity)) {
            const [agents, links, groups] = await Promise.all([
                this.fromStore('listAgents', () => this.store.listAgents()),
                this.fromStore('listAllGroupAgents', () => this.store.listAllGroupAgents()),
                this.fromStore('listGroups', () => this.store.listGroups()),
            ]);
            return assembleAgents(agents, links, groups);
        }
        return this.visibleAgentsFor(identity.subjectId);
    }

    async visibleAgentsFor(subjectId: string): Promise<readonly AgentWithGroups[]> {
        const fingerprint = Fingerprints.visibleAgents(subjectId);
        const value = await this.cached(fingerprint, async () => {
            const memberships = await this.fromStore('listMembershipsForUser',
                () => this.store.listMembershipsForUser(subjectId));
            const groupIds = unique(memberships.map(m => m.groupId));
            if (groupIds.length === 0) {
                return { value: { kind: 'agents', agents: [] } };
            }

            const links = await this.fromStore('listGroupAgentsForGroups',
                () => this.store.listGroupAgentsForGroups(groupIds));
            const agentIds = unique(links.map(l => l.agentId));
            const [agents, groups] = await Promise.all([
                this.fromStore('listAgentsByIds', () => this.store.listAgentsByIds(agentIds)),
                this.fromStore('listGroupsByIds', () => this.store.listGroupsByIds(groupIds)),
            ]);

            return {
                value: { kind: 'agents', agents: assembleAgents(agents, links, groups) },
                extraTags: [...groupIds.map(groupTag), ...agentIds.map(agentTag)],
            };
        });
        if (value.kind === 'agents') return value.agents;
        throw mismatch(fingerprint, value);
    }

    /** Groups where the caller is admin; every group for superadmins. */
    async adminGroups(identity: CallerIdentity): Promise<readonly Group[]> {
        if (this.isSuperadmin(identity)) return this.allGroups();
        return this.groupsFor(Fingerprints.adminGroups(identity.subjectId), identity.subjectId, 'admin');
    }

    async adminGroupsFor(subjectId: string): Promise<readonly Group[]> {
        return this.groupsFor(Fingerprints.adminGroups(subjectId), subjectId, 'admin');
    }

    /** Groups where the caller holds any role; every group for superadmins. */
    async listGroupsForUser(identity: CallerIdentity): Promise<readonly Group[]> {
        if (this.isSuperadmin(identity)) return this.allGroups();
        return this.groupsFor(Fingerprints.memberGroups(identity.subjectId), identity.subjectId, 'any');
    }

    requireSuperadmin(identity: CallerIdentity): void {
        if (!this.isSuperadmin(identity)) {
            throw new ForbiddenError('SUPERADMIN_REQUIRED');
        }
    }

    /**
     * Converts a Deny into the error the caller should see.
     * A Deny caused by a dependency failure surfaces as UnavailableError.
     */
    requireAllowed(decision: Decision, action: Action): void {
        if (decision.allowed) return;

        switch (decision.reason) {
            case 'DEPENDENCY_FAILURE':
                throw new UnavailableError('STORE_UNAVAILABLE', 'Authorization could not be evaluated');
            case 'CROSS_USER_QUERY':
                throw new ForbiddenError('CROSS_USER_QUERY');
            default:
                throw new ForbiddenError(
                    this.policyTable[action] === 'admin' ? 'NOT_GROUP_ADMIN' : 'INSUFFICIENT_ROLE',
                    `Forbidden: ${action} (${decision.reason})`
                );
        }
    }

    private async evaluate(logger: Logger, subjectId: string, action: Action, resource: ResourceRef): Promise<Decision> {
        const required = this.policyTable[action];
        if (required === undefined) {
            return deny('UNKNOWN_ACTION');
        }

        let decision: Decision;
        try {
            decision = await this.decide(subjectId, required, resource);
        } catch (error) {
            logger.warn({
                action,
                resource,
                reason: isAuthzError(error) ? error.reason : undefined,
                error: error instanceof Error ? error.message : String(error),
            }, 'Authorization dependency failed; denying');
            decision = deny('DEPENDENCY_FAILURE', 'none', resource.groupId ?? null);
        }

        if (decision.allowed) {
            logger.debug({ action, resource, decision }, 'Authorization decision');
        } else {
            logger.info({ action, resource, decision }, 'Authorization denied');
        }
        return decision;
    }

    private async decide(subjectId: string, required: GroupRole, resource: ResourceRef): Promise<Decision> {
        if (resource.kind === 'group') {
            return this.decideInGroup(subjectId, resource.groupId, required);
        }

        const linked = await this.agentGroupIds(resource.agentId);
        if (resource.groupId !== undefined) {
            if (!linked.includes(resource.groupId)) {
                return deny('AGENT_NOT_IN_GROUP', 'none', resource.groupId);
            }
            return this.decideInGroup(subjectId, resource.groupId, required);
        }

        if (linked.length === 0) {
            return deny('RESOURCE_NOT_FOUND');
        }

        const roles = await Promise.all(linked.map(groupId => this.roleInGroup(subjectId, groupId)));
        let firstHeld: { role: ResolvedRole; groupId: string } | undefined;
        for (const [index, groupId] of linked.entries()) {
            const role = roles[index] ?? 'none';
            if (role !== 'none' && roleSatisfies(role, required)) {
                return allow(role, groupId);
            }
            if (firstHeld === undefined && role !== 'none') {
                firstHeld = { role, groupId };
            }
        }

        return firstHeld
            ? deny('INSUFFICIENT_ROLE', firstHeld.role, firstHeld.groupId)
            : deny('NOT_A_MEMBER');
    }

    private async decideInGroup(subjectId: string, groupId: string, required: GroupRole): Promise<Decision> {
        const role = await this.roleInGroup(subjectId, groupId);
        if (role !== 'none' && roleSatisfies(role, required)) {
            return allow(role, groupId);
        }
        return deny(role === 'none' ? 'NOT_A_MEMBER' : 'INSUFFICIENT_ROLE', role, groupId);
    }

    private async groupsFor(fingerprint: Fingerprint, subjectId: string, filter: 'admin' | 'any'): Promise<readonly Group[]> {
        const value = await this.cached(fingerprint, async () => {
            const memberships = await this.fromStore('listMembershipsForUser',
                () => this.store.listMembershipsForUser(subjectId));
            const groupIds = unique(memberships
                .filter(m => filter === 'any' || m.role === 'admin')
                .map(m => m.groupId));
            const groups = groupIds.length === 0
                ? []
                : await this.fromStore('listGroupsByIds', () => this.store.listGroupsByIds(groupIds));
            return {
                value: { kind: 'groups', groups: [...groups].sort(byNameThenId) },
                extraTags: groupIds.map(groupTag),
            };
        });
        if (value.kind === 'groups') return value.groups;
        throw mismatch(fingerprint, value);
    }

    private async allGroups(): Promise<readonly Group[]> {
        const groups = await this.fromStore('listGroups', () => this.store.listGroups());
        return [...groups].sort(byNameThenId);
    }

    /**
     * Cache-aside read. Concurrent misses for the same key share one load
     * as long as no invalidation happened in between.
     */
    private async cached(fingerprint: Fingerprint, load: () => Promise<Loaded>): Promise<CachedValue> {
        const hit = await this.fromCache('get', () => this.cache.get(fingerprint));
        if (hit !== undefined) return hit;

        const stamp = this.cache.stamp();
        const pending = this.inflight.get(fingerprint.key);
        if (pending !== undefined && pending.stamp === stamp) {
            return pending.promise;
        }

        const promise = (async () => {
            const loaded = await load();
            await this.fromCache('set', () => this.cache.set(fingerprint, loaded.value, {
                stamp,
                extraTags: loaded.extraTags,
            }));
            return loaded.value;
        })();

        const entry = { stamp, promise };
        this.inflight.set(fingerprint.key, entry);
        try {
            return await promise;
        } finally {
            if (this.inflight.get(fingerprint.key) === entry) {
                this.inflight.delete(fingerprint.key);
            }
        }
    }

    private fromStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        return callStore(operation, fn, this.storeTimeoutMs);
    }

    private fromCache<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        return callCache(operation, fn, this.cacheTimeoutMs);
    }
}
