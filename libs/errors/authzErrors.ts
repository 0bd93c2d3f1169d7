/**
 * Canonical error taxonomy for the authorization core.
 * Every class carries a machine-readable code and reason so the routing
 * layer can map it without parsing messages.
 */

export type AuthzErrorCode =
    | 'FORBIDDEN'
    | 'NOT_FOUND'
    | 'CONFLICT'
    | 'UNAVAILABLE'
    | 'INVALID';

export type ForbiddenReason =
    | 'NOT_GROUP_ADMIN'
    | 'INSUFFICIENT_ROLE'
    | 'SUPERADMIN_REQUIRED'
    | 'CROSS_USER_QUERY';

export type NotFoundReason =
    | 'GROUP_NOT_FOUND'
    | 'USER_NOT_FOUND'
    | 'AGENT_NOT_FOUND'
    | 'MEMBERSHIP_NOT_FOUND';

export type ConflictReason =
    | 'LAST_ADMIN'
    | 'NO_ADMIN'
    | 'DUPLICATE_MEMBERSHIP'
    | 'DUPLICATE_GROUP_AGENT'
    | 'DUPLICATE_AGENT';

export type UnavailableReason =
    | 'STORE_UNAVAILABLE'
    | 'CACHE_UNAVAILABLE'
    | 'TIMEOUT';

export abstract class AuthzError extends Error {
    abstract readonly code: AuthzErrorCode;
    abstract readonly statusCode: number;
    readonly reason: string;

    protected constructor(reason: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.reason = reason;
    }
}

export class ForbiddenError extends AuthzError {
    readonly code = 'FORBIDDEN';
    readonly statusCode = 403;
    declare readonly reason: ForbiddenReason;

    constructor(reason: ForbiddenReason, message?: string) {
        super(reason, message ?? `Forbidden: ${reason}`);
        this.name = 'ForbiddenError';
        Object.setPrototypeOf(this, ForbiddenError.prototype);
    }
}

export class NotFoundError extends AuthzError {
    readonly code = 'NOT_FOUND';
    readonly statusCode = 404;
    declare readonly reason: NotFoundReason;

    constructor(reason: NotFoundReason, readonly resourceId: string) {
        super(reason, `${reason}: ${resourceId}`);
        this.name = 'NotFoundError';
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

export class ConflictError extends AuthzError {
    readonly code = 'CONFLICT';
    readonly statusCode = 409;
    declare readonly reason: ConflictReason;

    constructor(reason: ConflictReason, message?: string) {
        super(reason, message ?? `Conflict: ${reason}`);
        this.name = 'ConflictError';
        Object.setPrototypeOf(this, ConflictError.prototype);
    }
}

export class UnavailableError extends AuthzError {
    readonly code = 'UNAVAILABLE';
    readonly statusCode = 503;
    declare readonly reason: UnavailableReason;

    constructor(reason: UnavailableReason, message?: string, options?: { cause?: unknown }) {
        super(reason, message ?? `Dependency unavailable: ${reason}`, options);
        this.name = 'UnavailableError';
        Object.setPrototypeOf(this, UnavailableError.prototype);
    }
}

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

export class ValidationError extends AuthzError {
    readonly code = 'INVALID';
    readonly statusCode = 422;

    constructor(readonly context: string, readonly issues: readonly ValidationIssue[]) {
        super('INVALID_INPUT', `Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

export function isAuthzError(err: unknown): err is AuthzError {
    return err instanceof AuthzError;
}
