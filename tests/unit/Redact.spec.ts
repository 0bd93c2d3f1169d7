import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import pino from 'pino';
import { Writable } from 'stream';

function captureLogger(): { logger: pino.Logger; lines: Array<Record<string, unknown>> } {
    const lines: Array<Record<string, unknown>> = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            lines.push(JSON.parse(chunk.toString()));
            callback();
        }
    });

    const logger = pino({
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        }
    }, stream);

    return { logger, lines };
}

describe('Log Redaction', () => {
    it('should redact credentials at the root and one level down', () => {
        const { logger, lines } = captureLogger();

        logger.info({
            password: 'test-password',
            authorization: 'Bearer test-token',
            nested: {
                secret: 'test-secret',
                other: 'safe'
            },
            visible: 'ok'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        assert.strictEqual(lines[0]?.password, REDACT_CENSOR);
        assert.strictEqual(lines[0]?.authorization, REDACT_CENSOR);
        assert.deepStrictEqual(lines[0]?.nested, { secret: REDACT_CENSOR, other: 'safe' });
        assert.strictEqual(lines[0]?.visible, 'ok');
    });

    it('should redact caller PII but keep the subject id', () => {
        const { logger, lines } = captureLogger();

        logger.info({
            identity: { subjectId: 'alice', email: 'alice@example.test', displayName: 'Alice' }
        }, 'identity logged');

        assert.deepStrictEqual(lines[0]?.identity, {
            subjectId: 'alice',
            email: REDACT_CENSOR,
            displayName: REDACT_CENSOR
        });
    });
});
