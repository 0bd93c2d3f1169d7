import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { GroupRoleSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import { ACTIONS, DEFAULT_POLICY } from './actions.js';
import type { PolicyTable } from './actions.js';

export const PolicyFileSchema = z.object({
    policyVersion: z.string().min(1),
    actions: z.record(z.enum(ACTIONS), GroupRoleSchema),
}).strict();

/**
 * Loads the action → minimum-role table.
 *
 * Entries in the file replace the defaults action by action. Unknown actions
 * or roles reject, so a bad file fails boot instead of weakening a check.
 */
export function loadPolicyTable(policyFile?: string): PolicyTable {
    if (!policyFile) {
        return DEFAULT_POLICY;
    }

    const absolutePath = path.resolve(process.cwd(), policyFile);
    if (!fs.existsSync(absolutePath)) {
        throw new Error(`Policy file missing at ${policyFile}.`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
        throw new Error(`Policy file ${policyFile} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = validate(PolicyFileSchema, raw, 'PolicyFile');
    const table: PolicyTable = Object.freeze({ ...DEFAULT_POLICY, ...parsed.actions });

    logger.info({ policyFile, policyVersion: parsed.policyVersion, actions: table }, 'Action policy loaded');
    return table;
}
