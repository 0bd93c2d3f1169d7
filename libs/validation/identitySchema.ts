import { z } from 'zod';
import type { CallerIdentity } from '../context/identity.js';
import { validate } from './zod-middleware.js';

export const CallerIdentitySchema = z.object({
    requestId: z.string().min(1).max(128),
    subjectId: z.string().min(1).max(128),
    displayName: z.string().max(255),
    email: z.string().max(320),
    superadmin: z.boolean(),
}).strict();

/**
 * Validates an identity handed over by the routing layer.
 */
export function parseCallerIdentity(data: unknown): CallerIdentity {
    return Object.freeze(validate(CallerIdentitySchema, data, 'CallerIdentity'));
}

