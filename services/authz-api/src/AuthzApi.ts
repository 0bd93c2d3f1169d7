import type { AuthorizationEngine } from '../../../libs/authz/AuthorizationEngine.js';
import type { GroupDirectory } from '../../../libs/authz/GroupDirectory.js';
import { isAction } from '../../../libs/authz/actions.js';
import { deny } from '../../../libs/authz/decision.js';
import type { Decision } from '../../../libs/authz/decision.js';
import type { CallerIdentity } from '../../../libs/context/identity.js';
import { RequestContext } from '../../../libs/context/requestContext.js';
import { ForbiddenError } from '../../../libs/errors/authzErrors.js';
import { ErrorSanitizer } from '../../../libs/errors/sanitizer.js';
import type { CreatedGroup, LinkResult, MutationGuard } from '../../../libs/guards/mutationGuard.js';
import { logger } from '../../../libs/logging/logger.js';
import type {
    Agent,
    AgentWithGroups,
    Group,
    GroupAgent,
    GroupCascade,
    GroupRole,
    GroupWithMemberCount,
    MemberView,
    Membership,
    ResolvedRole,
    User
} from '../../../libs/store/types.js';
import { CallerIdentitySchema, parseCallerIdentity } from '../../../libs/validation/identitySchema.js';
import {
    EntityIdSchema,
    PermissionCheckSchema,
    ResourceRefSchema
} from '../../../libs/validation/schema.js';
import type {
    CreateGroupInput,
    RegisterAgentInput,
    UpdateGroupInput
} from '../../../libs/validation/schema.js';
import { createValidator, validate } from '../../../libs/validation/zod-middleware.js';

const validateResource = createValidator(ResourceRefSchema);
const validatePermissionCheck = createValidator(PermissionCheckSchema);

/**
 * Request/response surface of the service.
 *
 * Identities arrive already verified by the token layer; they are only
 * shape-checked here. Each call runs inside its own request scope and any
 * non-domain error leaves as a sanitized UnavailableError.
 */
export class AuthzApi {
    constructor(
        private readonly engine: AuthorizationEngine,
        private readonly guard: MutationGuard,
        private readonly directory: GroupDirectory
    ) { }

    // ── Checks ───────────────────────────────────────────────────

    /** Never throws for an unknown action or a malformed identity; both Deny. */
    async authorize(identity: unknown, action: string, resource: unknown): Promise<Decision> {
        const parsed = CallerIdentitySchema.safeParse(identity);
        if (!parsed.success) {
            logger.warn({ action }, 'Authorization request with malformed identity');
            return deny('MALFORMED_IDENTITY');
        }

        return this.handle(parsed.data, 'authorize', async caller => {
            if (!isAction(action)) {
                logger.warn({ action }, 'Authorization request for unknown action');
                return deny('UNKNOWN_ACTION');
            }
            return this.engine.authorize(caller, action, validateResource(resource, 'authorize.resource'));
        });
    }

    async checkPermission(identity: unknown, check: unknown): Promise<Decision> {
        return this.handle(identity, 'checkPermission', async caller => {
            const { targetUserId, agentId, action } = validatePermissionCheck(check, 'checkPermission');
            return this.engine.checkPermission(caller, targetUserId, agentId, action);
        });
    }

    async roleInGroup(identity: unknown, groupId: string): Promise<ResolvedRole> {
        return this.handle(identity, 'roleInGroup', async caller =>
            this.engine.effectiveRole(caller, validate(EntityIdSchema, groupId, 'roleInGroup.groupId')));
    }

    /**
     * Agents visible to `targetUserId` (default: the caller).
     * Only superadmins may ask about someone else, and then the answer is
     * that user's membership view, not the universal one.
     */
    async visibleAgents(identity: unknown, targetUserId?: string): Promise<readonly AgentWithGroups[]> {
        return this.handle(identity, 'visibleAgents', async caller => {
            const target = this.target(caller, targetUserId);
            return target === caller.subjectId
                ? this.engine.visibleAgents(caller)
                : this.engine.visibleAgentsFor(target);
        });
    }

    async adminGroups(identity: unknown, targetUserId?: string): Promise<readonly Group[]> {
        return this.handle(identity, 'adminGroups', async caller => {
            const target = this.target(caller, targetUserId);
            return target === caller.subjectId
                ? this.engine.adminGroups(caller)
                : this.engine.adminGroupsFor(target);
        });
    }

    // ── Reads ────────────────────────────────────────────────────

    async listGroups(identity: unknown): Promise<readonly Group[]> {
        return this.handle(identity, 'listGroups', async caller => this.engine.listGroupsForUser(caller));
    }

    async getGroup(identity: unknown, groupId: string): Promise<Group> {
        return this.handle(identity, 'getGroup', async caller => this.directory.getGroup(caller, groupId));
    }

    async listMembers(identity: unknown, groupId: string): Promise<MemberView[]> {
        return this.handle(identity, 'listMembers', async caller => this.directory.listMembers(caller, groupId));
    }

    async listAgentsInGroup(identity: unknown, groupId: string): Promise<Agent[]> {
        return this.handle(identity, 'listAgentsInGroup',
            async caller => this.directory.listAgentsInGroup(caller, groupId));
    }

    async listAllAgents(identity: unknown): Promise<readonly AgentWithGroups[]> {
        return this.handle(identity, 'listAllAgents', async caller => this.directory.listAllAgents(caller));
    }

    async listAllGroupsWithCounts(identity: unknown): Promise<GroupWithMemberCount[]> {
        return this.handle(identity, 'listAllGroupsWithCounts',
            async caller => this.directory.listAllGroupsWithCounts(caller));
    }

    // ── Mutations ────────────────────────────────────────────────

    async syncUser(identity: unknown): Promise<User> {
        return this.handle(identity, 'syncUser', async caller => this.guard.syncUser(caller));
    }

    async createGroup(identity: unknown, input: CreateGroupInput): Promise<CreatedGroup> {
        return this.handle(identity, 'createGroup', async caller => this.guard.createGroup(caller, input));
    }

    async updateGroup(identity: unknown, groupId: string, patch: UpdateGroupInput): Promise<Group> {
        return this.handle(identity, 'updateGroup', async caller => this.guard.updateGroup(caller, groupId, patch));
    }

    async deleteGroup(identity: unknown, groupId: string): Promise<GroupCascade> {
        return this.handle(identity, 'deleteGroup', async caller => this.guard.deleteGroup(caller, groupId));
    }

    async addMember(identity: unknown, groupId: string, userId: string, role: GroupRole): Promise<Membership> {
        return this.handle(identity, 'addMember',
            async caller => this.guard.addMember(caller, groupId, userId, role));
    }

    async updateMemberRole(identity: unknown, groupId: string, userId: string, role: GroupRole): Promise<Membership> {
        return this.handle(identity, 'updateMemberRole',
            async caller => this.guard.updateMemberRole(caller, groupId, userId, role));
    }

    async removeMember(identity: unknown, groupId: string, userId: string): Promise<Membership> {
        return this.handle(identity, 'removeMember',
            async caller => this.guard.removeMember(caller, groupId, userId));
    }

    async registerAgent(identity: unknown, input: RegisterAgentInput): Promise<AgentWithGroups> {
        return this.handle(identity, 'registerAgent', async caller => this.guard.registerAgent(caller, input));
    }

    async linkAgentToGroup(identity: unknown, groupId: string, agentId: string): Promise<LinkResult> {
        return this.handle(identity, 'linkAgentToGroup',
            async caller => this.guard.linkAgentToGroup(caller, groupId, agentId));
    }

    async unlinkAgentFromGroup(identity: unknown, groupId: string, agentId: string): Promise<LinkResult> {
        return this.handle(identity, 'unlinkAgentFromGroup',
            async caller => this.guard.unlinkAgentFromGroup(caller, groupId, agentId));
    }

    async setAgentGroups(identity: unknown, agentId: string, groupIds: readonly string[]): Promise<GroupAgent[]> {
        return this.handle(identity, 'setAgentGroups',
            async caller => this.guard.setAgentGroups(caller, agentId, groupIds));
    }

    // ── Internals ────────────────────────────────────────────────

    private target(caller: CallerIdentity, targetUserId: string | undefined): string {
        if (targetUserId === undefined || targetUserId === caller.subjectId) {
            return caller.subjectId;
        }
        validate(EntityIdSchema, targetUserId, 'targetUserId');
        if (!this.engine.isSuperadmin(caller)) {
            throw new ForbiddenError('CROSS_USER_QUERY');
        }
        return targetUserId;
    }

    private async handle<T>(identity: unknown, operation: string, fn: (caller: CallerIdentity) => Promise<T>): Promise<T> {
        const caller = parseCallerIdentity(identity);
        try {
            return await RequestContext.run(caller, () => fn(caller));
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, `AuthzApi:${operation}`);
        }
    }
}
