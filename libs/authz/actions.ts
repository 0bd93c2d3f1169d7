import type { GroupRole } from '../store/types.js';

/**
 * Action Registry
 *
 * Actions are verbs on a group or on an agent reached through a group.
 * The minimum role for each lives in the policy table, not here.
 */
export const ACTIONS = [
    'read-agent-visibility',
    'read-group',
    'manage-members',
    'manage-agents',
    'update-group',
    'delete-group',
    'create-agent',
] as const;

export type Action = typeof ACTIONS[number];

/** Minimum group role per action. */
export type PolicyTable = Readonly<Partial<Record<Action, GroupRole>>>;

export const DEFAULT_POLICY: PolicyTable = {
    'read-agent-visibility': 'user',
    'read-group': 'user',
    'manage-members': 'admin',
    'manage-agents': 'admin',
    'update-group': 'admin',
    'delete-group': 'admin',
    'create-agent': 'admin',
};

export function isAction(value: string): value is Action {
    const known: readonly string[] = ACTIONS;
    return known.includes(value);
}
