import type {
    Agent,
    Group,
    GroupAgent,
    GroupCascade,
    GroupRole,
    Membership,
    User
} from './types.js';

/**
 * Read side of the resource store.
 * Absent rows resolve to null or an empty list; only dependency failures reject.
 */
export interface ResourceReader {
    getUser(userId: string): Promise<User | null>;
    listUsersByIds(userIds: readonly string[]): Promise<User[]>;

    getGroup(groupId: string): Promise<Group | null>;
    listGroups(): Promise<Group[]>;
    listGroupsByIds(groupIds: readonly string[]): Promise<Group[]>;

    getMembership(userId: string, groupId: string): Promise<Membership | null>;
    listMemberships(groupId: string): Promise<Membership[]>;
    listMembershipsForUser(userId: string): Promise<Membership[]>;
    countMembershipsByGroup(): Promise<Map<string, number>>;

    getAgent(agentId: string): Promise<Agent | null>;
    getAgentByExternalId(externalId: string): Promise<Agent | null>;
    listAgents(): Promise<Agent[]>;
    listAgentsByIds(agentIds: readonly string[]): Promise<Agent[]>;

    listGroupAgents(groupId: string): Promise<GroupAgent[]>;
    listAgentGroups(agentId: string): Promise<GroupAgent[]>;
    listGroupAgentsForGroups(groupIds: readonly string[]): Promise<GroupAgent[]>;
    listAllGroupAgents(): Promise<GroupAgent[]>;
}

export interface NewGroup {
    readonly name: string;
    readonly description: string | null;
}

export interface GroupPatch {
    readonly name?: string;
    readonly description?: string | null;
}

export interface NewAgent {
    readonly externalId: string;
    readonly name: string;
    readonly createdBy: string;
}

/**
 * Transaction-scoped store handle.
 * Duplicate rows reject with ConflictError; missing parents with NotFoundError.
 */
export interface ResourceTx extends ResourceReader {
    /** Serializes writers on one group until commit. Resolves false when the group does not exist. */
    lockGroup(groupId: string): Promise<boolean>;

    upsertUser(user: Pick<User, 'id' | 'displayName' | 'email'>): Promise<User>;

    createGroup(group: NewGroup): Promise<Group>;
    updateGroup(groupId: string, patch: GroupPatch): Promise<Group | null>;
    /** Cascades memberships and agent links. Users and agents are never removed. */
    deleteGroup(groupId: string): Promise<GroupCascade | null>;

    insertMembership(membership: { userId: string; groupId: string; role: GroupRole }): Promise<Membership>;
    updateMembershipRole(userId: string, groupId: string, role: GroupRole): Promise<Membership | null>;
    deleteMembership(userId: string, groupId: string): Promise<boolean>;

    createAgent(agent: NewAgent): Promise<Agent>;
    insertGroupAgent(link: { groupId: string; agentId: string; addedBy: string }): Promise<GroupAgent>;
    deleteGroupAgent(groupId: string, agentId: string): Promise<boolean>;
    /** Replaces every link of the agent; returns the links that were removed. */
    replaceAgentGroups(agentId: string, groupIds: readonly string[], addedBy: string): Promise<GroupAgent[]>;
}

export interface ResourceStore extends ResourceReader {
    /**
     * Runs `fn` atomically. Either every write inside commits or none does.
     */
    transaction<T>(fn: (tx: ResourceTx) => Promise<T>): Promise<T>;
}
