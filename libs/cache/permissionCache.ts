import type { AgentWithGroups, Group, ResolvedRole } from '../store/types.js';

/**
 * Permission Cache contract.
 *
 * Entries are derived data only. Invalidation by tag is the consistency
 * mechanism; TTL is a backstop for missed invalidations.
 */

export type CachedValue =
    | { readonly kind: 'role'; readonly role: ResolvedRole }
    | { readonly kind: 'agent-groups'; readonly groupIds: readonly string[] }
    | { readonly kind: 'agents'; readonly agents: readonly AgentWithGroups[] }
    | { readonly kind: 'groups'; readonly groups: readonly Group[] };

export interface Fingerprint {
    readonly key: string;
    readonly tags: readonly string[];
}

export interface CacheSetOptions {
    /** Value of stamp() taken before the store read that produced the entry. */
    readonly stamp: number;
    /** Tags learned from the store read (e.g. the groups a listing came from). */
    readonly extraTags?: readonly string[];
}

export interface CacheStats {
    readonly hits: number;
    readonly misses: number;
    readonly dropped: number;
    readonly size: number;
}

export interface PermissionCache {
    get(fingerprint: Fingerprint): Promise<CachedValue | undefined>;
    /**
     * Stores the entry unless one of its tags was invalidated after `stamp`.
     * Resolves false when the write was dropped.
     */
    set(fingerprint: Fingerprint, value: CachedValue, options: CacheSetOptions): Promise<boolean>;
    /** Monotonic invalidation clock. */
    stamp(): number;
    /** Drops every entry carrying any of the tags. Resolves the number of entries dropped. */
    invalidate(tags: readonly string[]): Promise<number>;
    invalidateAll(): Promise<void>;
    stats(): CacheStats;
}

// ── Tags ─────────────────────────────────────────────────────────

const enc = encodeURIComponent;

export const subjectTag = (subjectId: string): string => `subject:${enc(subjectId)}`;
export const groupTag = (groupId: string): string => `group:${enc(groupId)}`;
export const agentTag = (agentId: string): string => `agent:${enc(agentId)}`;

// ── Fingerprints ─────────────────────────────────────────────────
//
//   role:<subject>:<group>      → role of subject in group
//   agent-groups:<agent>        → groups an agent is linked to
//   agents:<subject>            → agents visible to subject
//   admin-groups:<subject>      → groups where subject is admin
//   member-groups:<subject>     → groups where subject holds any role

export const Fingerprints = {
    role(subjectId: string, groupId: string): Fingerprint {
        return {
            key: `role:${enc(subjectId)}:${enc(groupId)}`,
            tags: [subjectTag(subjectId), groupTag(groupId)],
        };
    },

    agentGroups(agentId: string): Fingerprint {
        return {
            key: `agent-groups:${enc(agentId)}`,
            tags: [agentTag(agentId)],
        };
    },

    visibleAgents(subjectId: string): Fingerprint {
        return {
            key: `agents:${enc(subjectId)}`,
            tags: [subjectTag(subjectId)],
        };
    },

    adminGroups(subjectId: string): Fingerprint {
        return {
            key: `admin-groups:${enc(subjectId)}`,
            tags: [subjectTag(subjectId)],
        };
    },

    memberGroups(subjectId: string): Fingerprint {
        return {
            key: `member-groups:${enc(subjectId)}`,
            tags: [subjectTag(subjectId)],
        };
    },
} as const;
