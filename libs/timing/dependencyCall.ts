import { UnavailableError, isAuthzError } from '../errors/authzErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { withTimeout } from './deadline.js';

/**
 * Store call under a deadline. Driver errors are sanitized; domain errors
 * (NotFound, Conflict) pass through.
 */
export async function callStore<T>(operation: string, fn: () => Promise<T>, timeoutMs: number): Promise<T> {
    try {
        return await withTimeout(fn, timeoutMs, `store.${operation}`);
    } catch (error) {
        throw ErrorSanitizer.sanitize(error, `Store:${operation}`);
    }
}

/**
 * Cache call under a deadline. Any non-domain failure is CACHE_UNAVAILABLE.
 */
export async function callCache<T>(operation: string, fn: () => Promise<T>, timeoutMs: number): Promise<T> {
    try {
        return await withTimeout(fn, timeoutMs, `cache.${operation}`, 'CACHE_UNAVAILABLE');
    } catch (error) {
        if (isAuthzError(error)) throw error;
        throw new UnavailableError('CACHE_UNAVAILABLE', `Permission cache ${operation} failed`, { cause: error });
    }
}
