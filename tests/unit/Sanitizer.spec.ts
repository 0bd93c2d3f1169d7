/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping and information disclosure prevention.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConflictError, ForbiddenError, NotFoundError, UnavailableError } from '../../libs/errors/authzErrors.js';
import { ErrorSanitizer } from '../../libs/errors/sanitizer.js';

describe('ErrorSanitizer', () => {
    it('should wrap raw errors without exposing their message', () => {
        const rawError = new Error('password authentication failed for user "test"');
        const sanitized = ErrorSanitizer.sanitize(rawError, 'db-op');

        assert.ok(sanitized instanceof UnavailableError, 'Should be UnavailableError');
        assert.strictEqual(sanitized.reason, 'STORE_UNAVAILABLE');
        assert.match(sanitized.message, /^An internal dependency failed\. Incident ID: [0-9a-f-]{36}$/);
        assert.strictEqual(sanitized.cause, rawError);
    });

    it('should pass through domain errors unchanged', () => {
        const original = new ForbiddenError('NOT_GROUP_ADMIN');
        assert.strictEqual(ErrorSanitizer.sanitize(original, 'test-context'), original);
    });

    it('should map a unique violation to the hinted conflict', () => {
        const driverError = Object.assign(new Error('duplicate key'), { code: '23505' });
        const sanitized = ErrorSanitizer.sanitize(driverError, 'insert', { onUniqueViolation: 'DUPLICATE_AGENT' });

        assert.ok(sanitized instanceof ConflictError);
        assert.strictEqual(sanitized.reason, 'DUPLICATE_AGENT');
    });

    it('should map a foreign-key violation to the hinted not-found', () => {
        const driverError = Object.assign(new Error('violates foreign key'), { code: '23503' });
        const sanitized = ErrorSanitizer.sanitize(driverError, 'insert', {
            onForeignKeyViolation: { reason: 'USER_NOT_FOUND', resourceId: 'ghost' }
        });

        assert.ok(sanitized instanceof NotFoundError);
        assert.strictEqual(sanitized.message, 'USER_NOT_FOUND: ghost');
    });

    it('should treat a constraint code without a hint as a dependency failure', () => {
        const driverError = Object.assign(new Error('duplicate key'), { code: '23505' });
        assert.ok(ErrorSanitizer.sanitize(driverError, 'insert') instanceof UnavailableError);
    });

    it('should wrap non-Error throwables', () => {
        const sanitized = ErrorSanitizer.sanitize('string thrown', 'misc');
        assert.ok(sanitized instanceof UnavailableError);
        assert.strictEqual(sanitized.cause, 'string thrown');
    });
});
