import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { AuthzError, ConflictError, NotFoundError, UnavailableError } from './authzErrors.js';
import type { ConflictReason, NotFoundReason } from './authzErrors.js';

/**
 * Error Information Disclosure Prevention
 * Wraps driver/internal errors in a generic UnavailableError and logs the
 * full details under an incident id for correlation.
 */

export interface SanitizeHints {
    /** Conflict reason to use when the driver reports a unique violation. */
    readonly onUniqueViolation?: ConflictReason;
    /** Not-found reason (and id) to use when the driver reports a foreign-key violation. */
    readonly onForeignKeyViolation?: { reason: NotFoundReason; resourceId: string };
}

const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';

function sqlStateOf(err: unknown): string | undefined {
    if (err && typeof err === 'object' && 'code' in err) {
        return typeof err.code === 'string' ? err.code : undefined;
    }
    return undefined;
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a domain error.
     * Domain errors pass through untouched.
     */
    sanitize: (err: unknown, contextLabel: string, hints: SanitizeHints = {}): AuthzError => {
        if (err instanceof AuthzError) return err;

        const sqlState = sqlStateOf(err);
        if (sqlState === PG_UNIQUE_VIOLATION && hints.onUniqueViolation) {
            return new ConflictError(hints.onUniqueViolation);
        }
        if (sqlState === PG_FOREIGN_KEY_VIOLATION && hints.onForeignKeyViolation) {
            return new NotFoundError(hints.onForeignKeyViolation.reason, hints.onForeignKeyViolation.resourceId);
        }

        const incidentId = crypto.randomUUID();
        logger.error({
            incidentId,
            context: contextLabel,
            sqlState,
            originalError: err instanceof Error ? err.message : String(err),
            stack: err instanceof Error ? err.stack : undefined
        }, 'Dependency failure sanitized');

        return new UnavailableError(
            'STORE_UNAVAILABLE',
            `An internal dependency failed. Incident ID: ${incidentId}`,
            { cause: err }
        );
    }
};
