import type { ResolvedRole } from '../store/types.js';

export type ResourceRef =
    | { readonly kind: 'group'; readonly groupId: string }
    | { readonly kind: 'agent'; readonly agentId: string; readonly groupId?: string };

/** Resolved role, or the request-scoped superadmin claim. */
export type EffectiveRole = ResolvedRole | 'superadmin';

export type DenyReason =
    | 'MALFORMED_IDENTITY'
    | 'UNKNOWN_ACTION'
    | 'NOT_A_MEMBER'
    | 'INSUFFICIENT_ROLE'
    | 'AGENT_NOT_IN_GROUP'
    | 'RESOURCE_NOT_FOUND'
    | 'CROSS_USER_QUERY'
    | 'DEPENDENCY_FAILURE';

/**
 * Outcome of one authorization check.
 * `groupId` is the group the decision was evaluated in, when there was one.
 */
export type Decision =
    | {
        readonly allowed: true;
        readonly role: EffectiveRole;
        readonly groupId: string | null;
    }
    | {
        readonly allowed: false;
        readonly role: EffectiveRole;
        readonly groupId: string | null;
        readonly reason: DenyReason;
    };

export const allow = (role: EffectiveRole, groupId: string | null): Decision =>
    ({ allowed: true, role, groupId });

export const deny = (reason: DenyReason, role: EffectiveRole = 'none', groupId: string | null = null): Decision =>
    ({ allowed: false, role, groupId, reason });
