import type { ZodTypeAny, output } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError } from '../errors/authzErrors.js';

/**
 * Validation Middleware
 * Fail-closed ingress validation: returns parsed data or throws ValidationError.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Payloads may carry identity claims; only the issue list is logged.
        logger.warn({
            context,
            errors: errorDetails,
        }, "Input Validation Failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for creating bound validators.
 */
export const createValidator = <S extends ZodTypeAny>(schema: S) => {
    return (data: unknown, contextLabel: string): output<S> => validate(schema, data, contextLabel);
};
