import { z } from 'zod';

/**
 * Input Validation Framework
 * Central schema definitions for mutation and query inputs.
 */

export const EntityIdSchema = z.string().min(1).max(128);

export const GroupRoleSchema = z.enum(['admin', 'user']);

export const CreateGroupSchema = z.object({
    name: z.string().trim().min(1).max(255),
    description: z.string().max(1000).nullable().default(null),
    initialAdminId: EntityIdSchema.optional(),
}).strict();

export const UpdateGroupSchema = z.object({
    name: z.string().trim().min(1).max(255).optional(),
    description: z.string().max(1000).nullable().optional(),
}).strict();

export const RegisterAgentSchema = z.object({
    externalId: z.string().trim().min(1).max(255),
    name: z.string().trim().min(1).max(255),
    groupId: EntityIdSchema,
}).strict();

export const AgentGroupsSchema = z.array(EntityIdSchema).max(500);

export const PermissionActionSchema = z.enum(['access', 'create']);

export type CreateGroupInput = z.input<typeof CreateGroupSchema>;
export type UpdateGroupInput = z.input<typeof UpdateGroupSchema>;
export type RegisterAgentInput = z.input<typeof RegisterAgentSchema>;

export const ResourceRefSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('group'), groupId: EntityIdSchema }).strict(),
    z.object({ kind: z.literal('agent'), agentId: EntityIdSchema, groupId: EntityIdSchema.optional() }).strict(),
]);

export const PermissionCheckSchema = z.object({
    targetUserId: EntityIdSchema,
    agentId: EntityIdSchema,
    action: PermissionActionSchema,
}).strict();
