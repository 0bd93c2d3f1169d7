import pg from 'pg';
import type { DatabaseConfig } from '../bootstrap/config/authz-config.js';
import { logger } from '../logging/logger.js';

const { Pool } = pg;

/**
 * Pool settings for a validated DatabaseConfig; there are no silent fallbacks here.
 * The server aborts (and rolls back) any statement or lock wait that outlives the
 * store timeout, so a stuck query cannot hold a group row lock indefinitely.
 */
export function poolOptions(config: DatabaseConfig): pg.PoolConfig {
    return {
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        statement_timeout: config.statementTimeoutMs,
        lock_timeout: config.statementTimeoutMs,
        query_timeout: config.statementTimeoutMs,
        idle_in_transaction_session_timeout: config.idleInTransactionTimeoutMs,
        ssl: config.ssl,
    };
}

/**
 * PostgreSQL connection pool for the resource store.
 */
export function createPool(config: DatabaseConfig): pg.Pool {
    const pool = new Pool(poolOptions(config));

    // An idle client losing its connection must not take the process down.
    pool.on('error', (error) => {
        logger.error({ error: error.message }, '[DB] Idle client error');
    });

    return pool;
}
