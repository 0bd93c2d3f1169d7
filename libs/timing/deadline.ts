import { UnavailableError } from '../errors/authzErrors.js';
import type { UnavailableReason } from '../errors/authzErrors.js';

/**
 * Races an operation against a deadline.
 * The timer is always cleared so no handle outlives the call.
 */
export async function withTimeout<T>(
    fn: () => Promise<T>,
    timeoutMs: number,
    label: string,
    reason: UnavailableReason = 'TIMEOUT'
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(
            () => reject(new UnavailableError(reason, `${label} timed out after ${timeoutMs}ms`)),
            timeoutMs
        );
    });

    try {
        return await Promise.race([fn(), deadline]);
    } finally {
        clearTimeout(timer);
    }
}
