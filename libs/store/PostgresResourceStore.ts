import type pg from 'pg';
import { asQueryable, withTransaction } from '../db/index.js';
import type { Queryable, TxClient } from '../db/index.js';
import { NotFoundError } from '../errors/authzErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import type { SanitizeHints } from '../errors/sanitizer.js';
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

interface UserRow extends pg.QueryResultRow {
    id: string;
    display_name: string;
    email: string;
    created_at: Date;
    updated_at: Date;
}

interface GroupRow extends pg.QueryResultRow {
    id: string;
    name: string;
    description: string | null;
    created_at: Date;
    updated_at: Date;
}

interface MembershipRow extends pg.QueryResultRow {
    user_id: string;
    group_id: string;
    role: GroupRole;
    created_at: Date;
}

interface AgentRow extends pg.QueryResultRow {
    id: string;
    external_id: string;
    name: string;
    created_by: string;
    created_at: Date;
}

interface GroupAgentRow extends pg.QueryResultRow {
    group_id: string;
    agent_id: string;
    added_by: string;
    created_at: Date;
}

const toUser = (r: UserRow): User => ({
    id: r.id,
    displayName: r.display_name,
    email: r.email,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
});

const toGroup = (r: GroupRow): Group => ({
    id: r.id,
    name: r.name,
    description: r.description,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
});

const toMembership = (r: MembershipRow): Membership => ({
    userId: r.user_id,
    groupId: r.group_id,
    role: r.role,
    createdAt: r.created_at,
});

const toAgent = (r: AgentRow): Agent => ({
    id: r.id,
    externalId: r.external_id,
    name: r.name,
    createdBy: r.created_by,
    createdAt: r.created_at,
});

const toGroupAgent = (r: GroupAgentRow): GroupAgent => ({
    groupId: r.group_id,
    agentId: r.agent_id,
    addedBy: r.added_by,
    createdAt: r.created_at,
});

const USER_COLUMNS = 'id, display_name, email, created_at, updated_at';
const GROUP_COLUMNS = 'id, name, description, created_at, updated_at';
const MEMBERSHIP_COLUMNS = 'user_id, group_id, role, created_at';
const AGENT_COLUMNS = 'id, external_id, name, created_by, created_at';
const GROUP_AGENT_COLUMNS = 'group_id, agent_id, added_by, created_at';

class PostgresReader implements ResourceReader {
    constructor(protected readonly db: Queryable, private readonly label: string) { }

    protected async rows<R extends pg.QueryResultRow>(
        text: string,
        params: unknown[] = [],
        hints?: SanitizeHints
    ): Promise<R[]> {
        try {
            const result = await this.db.query<R>(text, params);
            return result.rows;
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, this.label, hints);
        }
    }

    async getUser(userId: string): Promise<User | null> {
        const [row] = await this.rows<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [userId]);
        return row ? toUser(row) : null;
    }

    async listUsersByIds(userIds: readonly string[]): Promise<User[]> {
        if (userIds.length === 0) return [];
        const rows = await this.rows<UserRow>(
            `SELECT ${USER_COLUMNS} FROM users WHERE id = ANY($1::text[]) ORDER BY id`,
            [[...userIds]]
        );
        return rows.map(toUser);
    }

    async getGroup(groupId: string): Promise<Group | null> {
        const [row] = await this.rows<GroupRow>(`SELECT ${GROUP_COLUMNS} FROM groups WHERE id = $1`, [groupId]);
        return row ? toGroup(row) : null;
    }

    async listGroups(): Promise<Group[]> {
        const rows = await this.rows<GroupRow>(`SELECT ${GROUP_COLUMNS} FROM groups ORDER BY created_at, id`);
        return rows.map(toGroup);
    }

    async listGroupsByIds(groupIds: readonly string[]): Promise<Group[]> {
        if (groupIds.length === 0) return [];
        const rows = await this.rows<GroupRow>(
            `SELECT ${GROUP_COLUMNS} FROM groups WHERE id = ANY($1::text[]) ORDER BY created_at, id`,
            [[...groupIds]]
        );
        return rows.map(toGroup);
    }

    async getMembership(userId: string, groupId: string): Promise<Membership | null> {
        const [row] = await this.rows<MembershipRow>(
            `SELECT ${MEMBERSHIP_COLUMNS} FROM group_memberships WHERE user_id = $1 AND group_id = $2`,
            [userId, groupId]
        );
        return row ? toMembership(row) : null;
    }

    async listMemberships(groupId: string): Promise<Membership[]> {
        const rows = await this.rows<MembershipRow>(
            `SELECT ${MEMBERSHIP_COLUMNS} FROM group_memberships WHERE group_id = $1 ORDER BY created_at, user_id`,
            [groupId]
        );
        return rows.map(toMembership);
    }

    async listMembershipsForUser(userId: string): Promise<Membership[]> {
        const rows = await this.rows<MembershipRow>(
            `SELECT ${MEMBERSHIP_COLUMNS} FROM group_memberships WHERE user_id = $1 ORDER BY group_id`,
            [userId]
        );
        return rows.map(toMembership);
    }

    async countMembershipsByGroup(): Promise<Map<string, number>> {
        const rows = await this.rows<{ group_id: string; member_count: number }>(
            'SELECT group_id, count(*)::int AS member_count FROM group_memberships GROUP BY group_id'
        );
        return new Map(rows.map(r => [r.group_id, r.member_count]));
    }

    async getAgent(agentId: string): Promise<Agent | null> {
        const [row] = await this.rows<AgentRow>(`SELECT ${AGENT_COLUMNS} FROM agents WHERE id = $1`, [agentId]);
        return row ? toAgent(row) : null;
    }

    async getAgentByExternalId(externalId: string): Promise<Agent | null> {
        const [row] = await this.rows<AgentRow>(
            `SELECT ${AGENT_COLUMNS} FROM agents WHERE external_id = $1`,
            [externalId]
        );
        return row ? toAgent(row) : null;
    }

    async listAgents(): Promise<Agent[]> {
        const rows = await this.rows<AgentRow>(`SELECT ${AGENT_COLUMNS} FROM agents ORDER BY created_at, id`);
        return rows.map(toAgent);
    }

    async listAgentsByIds(agentIds: readonly string[]): Promise<Agent[]> {
        if (agentIds.length === 0) return [];
        const rows = await this.rows<AgentRow>(
            `SELECT ${AGENT_COLUMNS} FROM agents WHERE id = ANY($1::text[]) ORDER BY created_at, id`,
            [[...agentIds]]
        );
        return rows.map(toAgent);
    }

    async listGroupAgents(groupId: string): Promise<GroupAgent[]> {
        const rows = await this.rows<GroupAgentRow>(
            `SELECT ${GROUP_AGENT_COLUMNS} FROM group_agents WHERE group_id = $1 ORDER BY created_at, agent_id`,
            [groupId]
        );
        return rows.map(toGroupAgent);
    }

    async listAgentGroups(agentId: string): Promise<GroupAgent[]> {
        const rows = await this.rows<GroupAgentRow>(
            `SELECT ${GROUP_AGENT_COLUMNS} FROM group_agents WHERE agent_id = $1 ORDER BY group_id`,
            [agentId]
        );
        return rows.map(toGroupAgent);
    }

    async listGroupAgentsForGroups(groupIds: readonly string[]): Promise<GroupAgent[]> {
        if (groupIds.length === 0) return [];
        const rows = await this.rows<GroupAgentRow>(
            `SELECT ${GROUP_AGENT_COLUMNS} FROM group_agents WHERE group_id = ANY($1::text[]) ORDER BY group_id, agent_id`,
            [[...groupIds]]
        );
        return rows.map(toGroupAgent);
    }

    async listAllGroupAgents(): Promise<GroupAgent[]> {
        const rows = await this.rows<GroupAgentRow>(
            `SELECT ${GROUP_AGENT_COLUMNS} FROM group_agents ORDER BY group_id, agent_id`
        );
        return rows.map(toGroupAgent);
    }
}

class PostgresTx extends PostgresReader implements ResourceTx {
    constructor(tx: TxClient) {
        super(tx, 'PostgresResourceStore:Tx');
    }

    async lockGroup(groupId: string): Promise<boolean> {
        const rows = await this.rows<{ id: string }>('SELECT id FROM groups WHERE id = $1 FOR UPDATE', [groupId]);
        return rows.length > 0;
    }

    async upsertUser(user: Pick<User, 'id' | 'displayName' | 'email'>): Promise<User> {
        const [row] = await this.rows<UserRow>(
            `INSERT INTO users (id, display_name, email)
             VALUES ($1, $2, $3)
             ON CONFLICT (id) DO UPDATE
                SET display_name = EXCLUDED.display_name,
                    email = EXCLUDED.email,
                    updated_at = now()
             RETURNING ${USER_COLUMNS}`,
            [user.id, user.displayName, user.email]
        );
        if (!row) throw new Error('User upsert returned no row');
        return toUser(row);
    }

    async createGroup(group: NewGroup): Promise<Group> {
        const [row] = await this.rows<GroupRow>(
            `INSERT INTO groups (name, description) VALUES ($1, $2) RETURNING ${GROUP_COLUMNS}`,
            [group.name, group.description]
        );
        if (!row) throw new Error('Group insert returned no row');
        return toGroup(row);
    }

    async updateGroup(groupId: string, patch: GroupPatch): Promise<Group | null> {
        const sets = ['updated_at = now()'];
        const params: unknown[] = [groupId];
        if (patch.name !== undefined) {
            params.push(patch.name);
            sets.push(`name = $${params.length}`);
        }
        if (patch.description !== undefined) {
            params.push(patch.description);
            sets.push(`description = $${params.length}`);
        }

        const [row] = await this.rows<GroupRow>(
            `UPDATE groups SET ${sets.join(', ')} WHERE id = $1 RETURNING ${GROUP_COLUMNS}`,
            params
        );
        return row ? toGroup(row) : null;
    }

    async deleteGroup(groupId: string): Promise<GroupCascade | null> {
        // Rows are captured before the cascade removes them.
        const memberships = await this.listMemberships(groupId);
        const groupAgents = await this.listGroupAgents(groupId);
        const [row] = await this.rows<GroupRow>(
            `DELETE FROM groups WHERE id = $1 RETURNING ${GROUP_COLUMNS}`,
            [groupId]
        );
        return row ? { group: toGroup(row), memberships, groupAgents } : null;
    }

    async insertMembership(membership: { userId: string; groupId: string; role: GroupRole }): Promise<Membership> {
        if (!(await this.getGroup(membership.groupId))) {
            throw new NotFoundError('GROUP_NOT_FOUND', membership.groupId);
        }

        const [row] = await this.rows<MembershipRow>(
            `INSERT INTO group_memberships (user_id, group_id, role)
             VALUES ($1, $2, $3)
             RETURNING ${MEMBERSHIP_COLUMNS}`,
            [membership.userId, membership.groupId, membership.role],
            {
                onUniqueViolation: 'DUPLICATE_MEMBERSHIP',
                onForeignKeyViolation: { reason: 'USER_NOT_FOUND', resourceId: membership.userId },
            }
        );
        if (!row) throw new Error('Membership insert returned no row');
        return toMembership(row);
    }

    async updateMembershipRole(userId: string, groupId: string, role: GroupRole): Promise<Membership | null> {
        const [row] = await this.rows<MembershipRow>(
            `UPDATE group_memberships SET role = $3
             WHERE user_id = $1 AND group_id = $2
             RETURNING ${MEMBERSHIP_COLUMNS}`,
            [userId, groupId, role]
        );
        return row ? toMembership(row) : null;
    }

    async deleteMembership(userId: string, groupId: string): Promise<boolean> {
        const rows = await this.rows<{ user_id: string }>(
            'DELETE FROM group_memberships WHERE user_id = $1 AND group_id = $2 RETURNING user_id',
            [userId, groupId]
        );
        return rows.length > 0;
    }

    async createAgent(agent: NewAgent): Promise<Agent> {
        const [row] = await this.rows<AgentRow>(
            `INSERT INTO agents (external_id, name, created_by)
             VALUES ($1, $2, $3)
             RETURNING ${AGENT_COLUMNS}`,
            [agent.externalId, agent.name, agent.createdBy],
            { onUniqueViolation: 'DUPLICATE_AGENT' }
        );
        if (!row) throw new Error('Agent insert returned no row');
        return toAgent(row);
    }

    async insertGroupAgent(link: { groupId: string; agentId: string; addedBy: string }): Promise<GroupAgent> {
        if (!(await this.getGroup(link.groupId))) {
            throw new NotFoundError('GROUP_NOT_FOUND', link.groupId);
        }

        const [row] = await this.rows<GroupAgentRow>(
            `INSERT INTO group_agents (group_id, agent_id, added_by)
             VALUES ($1, $2, $3)
             RETURNING ${GROUP_AGENT_COLUMNS}`,
            [link.groupId, link.agentId, link.addedBy],
            {
                onUniqueViolation: 'DUPLICATE_GROUP_AGENT',
                onForeignKeyViolation: { reason: 'AGENT_NOT_FOUND', resourceId: link.agentId },
            }
        );
        if (!row) throw new Error('Group-agent insert returned no row');
        return toGroupAgent(row);
    }

    async deleteGroupAgent(groupId: string, agentId: string): Promise<boolean> {
        const rows = await this.rows<{ agent_id: string }>(
            'DELETE FROM group_agents WHERE group_id = $1 AND agent_id = $2 RETURNING agent_id',
            [groupId, agentId]
        );
        return rows.length > 0;
    }

    async replaceAgentGroups(agentId: string, groupIds: readonly string[], addedBy: string): Promise<GroupAgent[]> {
        if (!(await this.getAgent(agentId))) {
            throw new NotFoundError('AGENT_NOT_FOUND', agentId);
        }

        const removed = await this.rows<GroupAgentRow>(
            `DELETE FROM group_agents WHERE agent_id = $1 RETURNING ${GROUP_AGENT_COLUMNS}`,
            [agentId]
        );
        for (const groupId of new Set(groupIds)) {
            await this.insertGroupAgent({ groupId, agentId, addedBy });
        }
        return removed.map(toGroupAgent);
    }
}

/**
 * PostgresResourceStore - durable store.
 *
 * Reads run in autocommit mode on the pool. Writers take a row lock on the
 * group they touch (`lockGroup`) so invariant checks and the writes that
 * depend on them see a stable membership set until COMMIT.
 */
export class PostgresResourceStore extends PostgresReader implements ResourceStore {
    constructor(private readonly pool: pg.Pool) {
        super(asQueryable(pool), 'PostgresResourceStore');
    }

    async transaction<T>(fn: (tx: ResourceTx) => Promise<T>): Promise<T> {
        return withTransaction(this.pool, tx => fn(new PostgresTx(tx)), 'PostgresResourceStore:TransactionFailed');
    }
}
