/**
 * Unit Tests: Zod Middleware
 *
 * Tests input validation middleware.
 *
 * @see libs/validation/zod-middleware.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { ValidationError } from '../../libs/errors/authzErrors.js';
import { createValidator, validate } from '../../libs/validation/zod-middleware.js';
import { CreateGroupSchema, RegisterAgentSchema, UpdateGroupSchema } from '../../libs/validation/schema.js';

describe('Zod Middleware', () => {
    const TestSchema = z.object({
        id: z.string().min(1),
        count: z.number().int().positive()
    });

    it('should return parsed data for valid input', () => {
        assert.deepStrictEqual(validate(TestSchema, { id: 'x', count: 2 }, 'test'), { id: 'x', count: 2 });
    });

    it('should throw ValidationError listing every issue', () => {
        assert.throws(
            () => validate(TestSchema, { id: '', count: -1 }, 'test-context'),
            (err: unknown) => {
                assert.ok(err instanceof ValidationError);
                assert.strictEqual(err.context, 'test-context');
                assert.strictEqual(err.statusCode, 422);
                assert.deepStrictEqual(err.issues.map(i => i.path), ['id', 'count']);
                return true;
            }
        );
    });

    it('should create a bound validator', () => {
        const check = createValidator(TestSchema);
        assert.deepStrictEqual(check({ id: 'y', count: 1 }, 'bound'), { id: 'y', count: 1 });
        assert.throws(() => check({}, 'bound'), ValidationError);
    });

    describe('mutation schemas', () => {
        it('should default a missing group description to null and trim the name', () => {
            assert.deepStrictEqual(validate(CreateGroupSchema, { name: '  Ops  ' }, 'createGroup'), {
                name: 'Ops',
                description: null
            });
        });

        it('should reject unknown fields', () => {
            assert.throws(() => validate(UpdateGroupSchema, { name: 'x', owner: 'bob' }, 'updateGroup'), ValidationError);
            assert.throws(
                () => validate(RegisterAgentSchema, { externalId: 'e', name: 'n', groupId: 'g1', admin: true }, 'registerAgent'),
                ValidationError
            );
        });

        it('should reject an empty group name', () => {
            assert.throws(() => validate(CreateGroupSchema, { name: '   ' }, 'createGroup'), ValidationError);
        });
    });
});
