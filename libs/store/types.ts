/**
 * Resource model for group-scoped authorization.
 *
 * Users, groups and agents are independent entities. Memberships and
 * group-agent links are the only rows that carry authorization meaning.
 */

export type GroupRole = 'admin' | 'user';

/** Role resolved for a subject within one group. */
export type ResolvedRole = 'none' | GroupRole;

const ROLE_RANK: Record<ResolvedRole, number> = {
    none: 0,
    user: 1,
    admin: 2,
};

/**
 * True when `held` is at least `required`.
 */
export function roleSatisfies(held: ResolvedRole, required: GroupRole): boolean {
    return ROLE_RANK[held] >= ROLE_RANK[required];
}

export interface User {
    /** Identity-provider subject */
    readonly id: string;
    readonly displayName: string;
    readonly email: string;
    readonly createdAt: Date;
    readonly updatedAt: Date;
}

export interface Group {
    readonly id: string;
    readonly name: string;
    readonly description: string | null;
    readonly createdAt: Date;
    readonly updatedAt: Date;
}

export interface Membership {
    readonly userId: string;
    readonly groupId: string;
    readonly role: GroupRole;
    readonly createdAt: Date;
}

export interface Agent {
    readonly id: string;
    /** Opaque reference into the owning platform */
    readonly externalId: string;
    readonly name: string;
    readonly createdBy: string;
    readonly createdAt: Date;
}

export interface GroupAgent {
    readonly groupId: string;
    readonly agentId: string;
    readonly addedBy: string;
    readonly createdAt: Date;
}

export interface AgentGroupRef {
    readonly groupId: string;
    readonly groupName: string;
}

export interface AgentWithGroups {
    readonly agent: Agent;
    readonly groups: readonly AgentGroupRef[];
}

export interface GroupWithMemberCount {
    readonly group: Group;
    readonly memberCount: number;
}

export interface MemberView {
    readonly userId: string;
    readonly displayName: string;
    readonly email: string;
    readonly role: GroupRole;
    readonly createdAt: Date;
}

/** Rows removed by a cascading group delete. */
export interface GroupCascade {
    readonly group: Group;
    readonly memberships: readonly Membership[];
    readonly groupAgents: readonly GroupAgent[];
}
