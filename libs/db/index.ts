import type pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';

export { createPool } from './pool.js';

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

// Errors after which the connection state is unknown; the client is destroyed, not pooled.
const taintedErrors = new WeakSet<object>();

function releaseClient(client: pg.PoolClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

/**
 * Wraps a pool as a plain Queryable for autocommit reads.
 */
export function asQueryable(pool: pg.Pool): Queryable {
    return {
        query: <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
            pool.query<T>(text, params)
    };
}

async function runTransaction<T>(
    client: pg.PoolClient,
    callback: (tx: TxClient) => Promise<T>,
    contextLabel: string
): Promise<T> {
    const store = transactionContext.getStore();
    if (store?.inTx) {
        throw new Error('Nested transaction detected: withTransaction cannot be invoked within an active transaction.');
    }

    return transactionContext.run({ inTx: true }, async () => {
        let commitAttempted = false;
        try {
            await client.query('BEGIN');

            const txClient: TxClient = {
                query: <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<T>(text, params)
            };

            const result = await callback(txClient);
            commitAttempted = true;
            await client.query('COMMIT');
            return result;
        } catch (error) {
            let rollbackFailed = false;
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                rollbackFailed = true;
                logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            }
            const sanitized = ErrorSanitizer.sanitize(error, contextLabel);
            if (commitAttempted || rollbackFailed) {
                taintedErrors.add(sanitized);
            }
            throw sanitized;
        }
    });
}

/**
 * Fail-safe transaction wrapper.
 * Rolls back on any error; a client whose state is unknown after a failed
 * COMMIT or ROLLBACK is destroyed instead of returned to the pool.
 */
export async function withTransaction<T>(
    pool: pg.Pool,
    callback: (tx: TxClient) => Promise<T>,
    contextLabel = 'DatabaseLayer:TransactionFailed'
): Promise<T> {
    let client: pg.PoolClient;
    try {
        client = await pool.connect();
    } catch (error) {
        throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:ConnectFailed');
    }

    let forceDestroy = false;
    try {
        return await runTransaction(client, callback, contextLabel);
    } catch (error) {
        if (typeof error === 'object' && error !== null && taintedErrors.has(error)) {
            forceDestroy = true;
        }
        throw error;
    } finally {
        releaseClient(client, forceDestroy, 'withTransaction');
    }
}
