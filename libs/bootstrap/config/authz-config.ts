import { z } from 'zod';
import type { Env, GuardRule } from '../config-guard.js';
import { validate } from '../../validation/zod-middleware.js';

const PROTECTED_ENVS = ['production', 'staging'];

const intFromEnv = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

/**
 * Service configuration as read from the environment.
 * Defaults live here and nowhere else.
 */
export const ServiceConfigSchema = z.object({
    NODE_ENV: z.string().default('development'),
    AUTHZ_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    AUTHZ_CACHE_TTL_MS: intFromEnv(30_000),
    AUTHZ_CACHE_MAX_ENTRIES: intFromEnv(10_000),
    AUTHZ_STORE_TIMEOUT_MS: intFromEnv(2_000),
    AUTHZ_CACHE_TIMEOUT_MS: intFromEnv(250),
    AUTHZ_TX_TIMEOUT_MS: intFromEnv(8_000),
    AUTHZ_POLICY_FILE: z.string().min(1).optional(),

    DB_HOST: z.string().optional(),
    DB_PORT: z.coerce.number().int().positive().optional(),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().optional(),
    DB_POOL_MAX: intFromEnv(20),
    DB_CA_CERT: z.string().optional(),
    DB_SSL_QUERY: z.enum(['true', 'false']).optional(),
});

export interface DatabaseConfig {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly poolMax: number;
    /** Server-side statement and lock wait bound; also the client query timeout. */
    readonly statementTimeoutMs: number;
    /** Sessions idle inside a transaction longer than this are terminated by the server. */
    readonly idleInTransactionTimeoutMs: number;
    readonly ssl: false | { rejectUnauthorized: true; ca: string | undefined };
}

export interface ServiceConfig {
    readonly environment: string;
    readonly store: 'postgres' | 'memory';
    readonly cache: {
        readonly ttlMs: number;
        readonly maxEntries: number;
        readonly timeoutMs: number;
    };
    readonly storeTimeoutMs: number;
    /** Bound on one mutation: lock wait, transaction and invalidation. */
    readonly transactionTimeoutMs: number;
    readonly policyFile?: string;
    readonly database?: DatabaseConfig;
}

/**
 * Guards that only apply when the service runs against an in-memory store.
 */
export const MEMORY_STORE_GUARDS: GuardRule[] = [
    {
        type: 'forbidIf',
        name: 'AUTHZ_STORE',
        when: (env) => PROTECTED_ENVS.includes(env.NODE_ENV ?? '') && env.AUTHZ_STORE === 'memory',
        message: 'The in-memory store is forbidden in production/staging',
    }
];

/**
 * Parses the environment into a typed ServiceConfig.
 * Presence of DB_* values is enforced separately by DB_CONFIG_GUARDS.
 */
export function loadServiceConfig(env: Env = process.env): ServiceConfig {
    const raw = validate(ServiceConfigSchema, env, 'ServiceConfig');
    const isProtectedEnv = PROTECTED_ENVS.includes(raw.NODE_ENV);

    const config: ServiceConfig = {
        environment: raw.NODE_ENV,
        store: raw.AUTHZ_STORE,
        cache: {
            ttlMs: raw.AUTHZ_CACHE_TTL_MS,
            maxEntries: raw.AUTHZ_CACHE_MAX_ENTRIES,
            timeoutMs: raw.AUTHZ_CACHE_TIMEOUT_MS,
        },
        storeTimeoutMs: raw.AUTHZ_STORE_TIMEOUT_MS,
        transactionTimeoutMs: raw.AUTHZ_TX_TIMEOUT_MS,
        ...(raw.AUTHZ_POLICY_FILE ? { policyFile: raw.AUTHZ_POLICY_FILE } : {}),
    };

    if (raw.AUTHZ_STORE !== 'postgres') {
        return config;
    }

    if (!raw.DB_HOST || !raw.DB_PORT || !raw.DB_USER || raw.DB_PASSWORD === undefined || !raw.DB_NAME) {
        throw new Error('FATAL CONFIG: AUTHZ_STORE=postgres requires DB_HOST, DB_PORT, DB_USER, DB_PASSWORD and DB_NAME');
    }

    const useTls = isProtectedEnv || raw.DB_SSL_QUERY === 'true';
    return {
        ...config,
        database: {
            host: raw.DB_HOST,
            port: raw.DB_PORT,
            user: raw.DB_USER,
            password: raw.DB_PASSWORD,
            database: raw.DB_NAME,
            poolMax: raw.DB_POOL_MAX,
            statementTimeoutMs: raw.AUTHZ_STORE_TIMEOUT_MS,
            idleInTransactionTimeoutMs: raw.AUTHZ_TX_TIMEOUT_MS,
            ssl: useTls ? { rejectUnauthorized: true, ca: raw.DB_CA_CERT } : false,
        },
    };
}
