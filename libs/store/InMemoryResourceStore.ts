import crypto from 'crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import { ConflictError, NotFoundError, UnavailableError } from '../errors/authzErrors.js';
import { logger } from '../logging/logger.js';
import type {
    GroupPatch,
    NewAgent,
    NewGroup,
    ResourceReader,
    ResourceStore,
    ResourceTx
} from './resourceStore.js';
import type {
    Agent,
    Group,
    GroupAgent,
    GroupCascade,
    GroupRole,
    Membership,
    User
} from './types.js';

interface StoreState {
    users: Map<string, User>;
    groups: Map<string, Group>;
    // `${groupId}\u0000${userId}` → Membership
    memberships: Map<string, Membership>;
    agents: Map<string, Agent>;
    // `${groupId}\u0000${agentId}` → GroupAgent
    groupAgents: Map<string, GroupAgent>;
}

export interface SeedData {
    users?: Array<Pick<User, 'id'> & Partial<User>>;
    groups?: Array<Pick<Group, 'id'> & Partial<Group>>;
    memberships?: Array<Pick<Membership, 'userId' | 'groupId' | 'role'>>;
    agents?: Array<Pick<Agent, 'id'> & Partial<Agent>>;
    groupAgents?: Array<Pick<GroupAgent, 'groupId' | 'agentId'> & Partial<GroupAgent>>;
}

export interface InMemoryStoreOptions {
    /** Artificial delay applied to every call. */
    readonly latencyMs?: number;
}

const pairKey = (a: string, b: string): string => `${a}\u0000${b}`;

function emptyState(): StoreState {
    return {
        users: new Map(),
        groups: new Map(),
        memberships: new Map(),
        agents: new Map(),
        groupAgents: new Map(),
    };
}

function cloneState(state: StoreState): StoreState {
    return {
        users: new Map(state.users),
        groups: new Map(state.groups),
        memberships: new Map(state.memberships),
        agents: new Map(state.agents),
        groupAgents: new Map(state.groupAgents),
    };
}

abstract class StateReader implements ResourceReader {
    protected abstract state(): StoreState;
    protected abstract gate(): Promise<void>;

    async getUser(userId: string): Promise<User | null> {
        await this.gate();
        return this.state().users.get(userId) ?? null;
    }

    async listUsersByIds(userIds: readonly string[]): Promise<User[]> {
        await this.gate();
        const users = this.state().users;
        return [...new Set(userIds)].flatMap(id => {
            const user = users.get(id);
            return user ? [user] : [];
        });
    }

    async getGroup(groupId: string): Promise<Group | null> {
        await this.gate();
        return this.state().groups.get(groupId) ?? null;
    }

    async listGroups(): Promise<Group[]> {
        await this.gate();
        return [...this.state().groups.values()];
    }

    async listGroupsByIds(groupIds: readonly string[]): Promise<Group[]> {
        await this.gate();
        const wanted = new Set(groupIds);
        return [...this.state().groups.values()].filter(g => wanted.has(g.id));
    }

    async getMembership(userId: string, groupId: string): Promise<Membership | null> {
        await this.gate();
        return this.state().memberships.get(pairKey(groupId, userId)) ?? null;
    }

    async listMemberships(groupId: string): Promise<Membership[]> {
        await this.gate();
        return [...this.state().memberships.values()].filter(m => m.groupId === groupId);
    }

    async listMembershipsForUser(userId: string): Promise<Membership[]> {
        await this.gate();
        return [...this.state().memberships.values()].filter(m => m.userId === userId);
    }

    async countMembershipsByGroup(): Promise<Map<string, number>> {
        await this.gate();
        const counts = new Map<string, number>();
        for (const m of this.state().memberships.values()) {
            counts.set(m.groupId, (counts.get(m.groupId) ?? 0) + 1);
        }
        return counts;
    }

    async getAgent(agentId: string): Promise<Agent | null> {
        await this.gate();
        return this.state().agents.get(agentId) ?? null;
    }

    async getAgentByExternalId(externalId: string): Promise<Agent | null> {
        await this.gate();
        for (const agent of this.state().agents.values()) {
            if (agent.externalId === externalId) return agent;
        }
        return null;
    }

    async listAgents(): Promise<Agent[]> {
        await this.gate();
        return [...this.state().agents.values()];
    }

    async listAgentsByIds(agentIds: readonly string[]): Promise<Agent[]> {
        await this.gate();
        const wanted = new Set(agentIds);
        return [...this.state().agents.values()].filter(a => wanted.has(a.id));
    }

    async listGroupAgents(groupId: string): Promise<GroupAgent[]> {
        await this.gate();
        return [...this.state().groupAgents.values()].filter(ga => ga.groupId === groupId);
    }

    async listAgentGroups(agentId: string): Promise<GroupAgent[]> {
        await this.gate();
        return [...this.state().groupAgents.values()].filter(ga => ga.agentId === agentId);
    }

    async listGroupAgentsForGroups(groupIds: readonly string[]): Promise<GroupAgent[]> {
        await this.gate();
        const wanted = new Set(groupIds);
        return [...this.state().groupAgents.values()].filter(ga => wanted.has(ga.groupId));
    }

    async listAllGroupAgents(): Promise<GroupAgent[]> {
        await this.gate();
        return [...this.state().groupAgents.values()];
    }
}

class InMemoryTx extends StateReader implements ResourceTx {
    constructor(
        private readonly working: StoreState,
        private readonly checkAvailable: () => Promise<void>
    ) {
        super();
    }

    protected state(): StoreState {
        return this.working;
    }

    protected gate(): Promise<void> {
        return this.checkAvailable();
    }

    async lockGroup(groupId: string): Promise<boolean> {
        await this.gate();
        // Transactions are already serialized; the lock only reports existence.
        return this.working.groups.has(groupId);
    }

    async upsertUser(user: Pick<User, 'id' | 'displayName' | 'email'>): Promise<User> {
        await this.gate();
        const now = new Date();
        const existing = this.working.users.get(user.id);
        const next: User = Object.freeze({
            id: user.id,
            displayName: user.displayName,
            email: user.email,
            createdAt: existing?.createdAt ?? now,
            updatedAt: now,
        });
        this.working.users.set(user.id, next);
        return next;
    }

    async createGroup(group: NewGroup): Promise<Group> {
        await this.gate();
        const now = new Date();
        const created: Group = Object.freeze({
            id: crypto.randomUUID(),
            name: group.name,
            description: group.description,
            createdAt: now,
            updatedAt: now,
        });
        this.working.groups.set(created.id, created);
        return created;
    }

    async updateGroup(groupId: string, patch: GroupPatch): Promise<Group | null> {
        await this.gate();
        const existing = this.working.groups.get(groupId);
        if (!existing) return null;

        const updated: Group = Object.freeze({
            ...existing,
            ...(patch.name !== undefined ? { name: patch.name } : {}),
            ...(patch.description !== undefined ? { description: patch.description } : {}),
            updatedAt: new Date(),
        });
        this.working.groups.set(groupId, updated);
        return updated;
    }

    async deleteGroup(groupId: string): Promise<GroupCascade | null> {
        await this.gate();
        const group = this.working.groups.get(groupId);
        if (!group) return null;

        const memberships: Membership[] = [];
        for (const [key, m] of this.working.memberships) {
            if (m.groupId === groupId) {
                memberships.push(m);
                this.working.memberships.delete(key);
            }
        }

        const groupAgents: GroupAgent[] = [];
        for (const [key, ga] of this.working.groupAgents) {
            if (ga.groupId === groupId) {
                groupAgents.push(ga);
                this.working.groupAgents.delete(key);
            }
        }

        this.working.groups.delete(groupId);
        return { group, memberships, groupAgents };
    }

    async insertMembership(membership: { userId: string; groupId: string; role: GroupRole }): Promise<Membership> {
        await this.gate();
        if (!this.working.groups.has(membership.groupId)) {
            throw new NotFoundError('GROUP_NOT_FOUND', membership.groupId);
        }
        if (!this.working.users.has(membership.userId)) {
            throw new NotFoundError('USER_NOT_FOUND', membership.userId);
        }

        const key = pairKey(membership.groupId, membership.userId);
        if (this.working.memberships.has(key)) {
            throw new ConflictError('DUPLICATE_MEMBERSHIP');
        }

        const created: Membership = Object.freeze({ ...membership, createdAt: new Date() });
        this.working.memberships.set(key, created);
        return created;
    }

    async updateMembershipRole(userId: string, groupId: string, role: GroupRole): Promise<Membership | null> {
        await this.gate();
        const key = pairKey(groupId, userId);
        const existing = this.working.memberships.get(key);
        if (!existing) return null;

        const updated: Membership = Object.freeze({ ...existing, role });
        this.working.memberships.set(key, updated);
        return updated;
    }

    async deleteMembership(userId: string, groupId: string): Promise<boolean> {
        await this.gate();
        return this.working.memberships.delete(pairKey(groupId, userId));
    }

    async createAgent(agent: NewAgent): Promise<Agent> {
        await this.gate();
        for (const existing of this.working.agents.values()) {
            if (existing.externalId === agent.externalId) {
                throw new ConflictError('DUPLICATE_AGENT');
            }
        }

        const created: Agent = Object.freeze({
            id: crypto.randomUUID(),
            externalId: agent.externalId,
            name: agent.name,
            createdBy: agent.createdBy,
            createdAt: new Date(),
        });
        this.working.agents.set(created.id, created);
        return created;
    }

    async insertGroupAgent(link: { groupId: string; agentId: string; addedBy: string }): Promise<GroupAgent> {
        await this.gate();
        if (!this.working.groups.has(link.groupId)) {
            throw new NotFoundError('GROUP_NOT_FOUND', link.groupId);
        }
        if (!this.working.agents.has(link.agentId)) {
            throw new NotFoundError('AGENT_NOT_FOUND', link.agentId);
        }

        const key = pairKey(link.groupId, link.agentId);
        if (this.working.groupAgents.has(key)) {
            throw new ConflictError('DUPLICATE_GROUP_AGENT');
        }

        const created: GroupAgent = Object.freeze({ ...link, createdAt: new Date() });
        this.working.groupAgents.set(key, created);
        return created;
    }

    async deleteGroupAgent(groupId: string, agentId: string): Promise<boolean> {
        await this.gate();
        return this.working.groupAgents.delete(pairKey(groupId, agentId));
    }

    async replaceAgentGroups(agentId: string, groupIds: readonly string[], addedBy: string): Promise<GroupAgent[]> {
        await this.gate();
        if (!this.working.agents.has(agentId)) {
            throw new NotFoundError('AGENT_NOT_FOUND', agentId);
        }

        const removed: GroupAgent[] = [];
        for (const [key, ga] of this.working.groupAgents) {
            if (ga.agentId === agentId) {
                removed.push(ga);
                this.working.groupAgents.delete(key);
            }
        }

        for (const groupId of new Set(groupIds)) {
            await this.insertGroupAgent({ groupId, agentId, addedBy });
        }
        return removed;
    }
}

/**
 * InMemoryResourceStore - process-local store for tests and local runs.
 *
 * Transactions run one at a time against a copy of the committed state and
 * swap it in on success, so a failed transaction leaves nothing behind.
 */
export class InMemoryResourceStore extends StateReader implements ResourceStore {
    private committed: StoreState = emptyState();
    private available = true;
    private queue: Promise<void> = Promise.resolve();
    private readonly latencyMs: number;

    constructor(options: InMemoryStoreOptions = {}) {
        super();
        this.latencyMs = options.latencyMs ?? 0;

        if (process.env.NODE_ENV === 'production') {
            logger.warn({ component: 'InMemoryResourceStore' },
                'Using the in-memory resource store in production is not supported');
        }
    }

    protected state(): StoreState {
        return this.committed;
    }

    protected gate(): Promise<void> {
        return this.checkAvailable();
    }

    async transaction<T>(fn: (tx: ResourceTx) => Promise<T>): Promise<T> {
        const run = async (): Promise<T> => {
            await this.checkAvailable();
            const working = cloneState(this.committed);
            const result = await fn(new InMemoryTx(working, () => this.checkAvailable()));
            await this.checkAvailable();
            this.committed = working;
            return result;
        };

        const next = this.queue.then(run, run);
        this.queue = next.then(
            () => undefined,
            () => undefined
        );
        return next;
    }

    /** Toggles a simulated outage: while unavailable every call rejects. */
    setAvailable(available: boolean): void {
        this.available = available;
    }

    /**
     * Loads fixture rows directly into committed state.
     */
    seed(data: SeedData): this {
        const now = new Date();
        for (const u of data.users ?? []) {
            this.committed.users.set(u.id, Object.freeze({
                displayName: '', email: '', createdAt: now, updatedAt: now, ...u,
            }));
        }
        for (const g of data.groups ?? []) {
            this.committed.groups.set(g.id, Object.freeze({
                name: g.id, description: null, createdAt: now, updatedAt: now, ...g,
            }));
        }
        for (const m of data.memberships ?? []) {
            this.committed.memberships.set(pairKey(m.groupId, m.userId), Object.freeze({ ...m, createdAt: now }));
        }
        for (const a of data.agents ?? []) {
            this.committed.agents.set(a.id, Object.freeze({
                externalId: a.id, name: a.id, createdBy: 'seed', createdAt: now, ...a,
            }));
        }
        for (const ga of data.groupAgents ?? []) {
            this.committed.groupAgents.set(pairKey(ga.groupId, ga.agentId), Object.freeze({
                addedBy: 'seed', createdAt: now, ...ga,
            }));
        }
        return this;
    }

    private async checkAvailable(): Promise<void> {
        if (this.latencyMs > 0) {
            await sleep(this.latencyMs);
        }
        if (!this.available) {
            throw new UnavailableError('STORE_UNAVAILABLE', 'In-memory store is marked unavailable');
        }
    }
}
