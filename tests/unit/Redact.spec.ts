import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Writable } from 'node:stream';
import { pino } from 'pino';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';

function captureLogger() {
    const lines: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer, _encoding, callback) {
            lines.push(chunk.toString());
            callback();
        }
    });
    const testLogger = pino({ redact: { paths: REDACT_KEYS, censor: REDACT_CENSOR } }, stream);
    return { lines, testLogger };
}

describe('Log Redaction', () => {
    it('should redact credentials in objects', () => {
        const { lines, testLogger } = captureLogger();

        testLogger.info({
            password: 'test-password',
            authorization: 'Bearer test-token',
            nested: { secret: 'test-secret', other: 'safe' },
            visible: 'ok'
        }, 'test message');

        const log = JSON.parse(lines[0]);
        assert.strictEqual(log.password, REDACT_CENSOR);
        assert.strictEqual(log.authorization, REDACT_CENSOR);
        assert.strictEqual(log.nested.secret, REDACT_CENSOR);
        assert.strictEqual(log.nested.other, 'safe');
        assert.strictEqual(log.visible, 'ok');
    });

    it('should redact octet key material', () => {
        const { lines, testLogger } = captureLogger();

        testLogger.info({ keys: [{ kty: 'oct', kid: 'key-1', k: 'dGVzdC1zZWNyZXQ' }] }, 'key set');

        const log = JSON.parse(lines[0]);
        assert.strictEqual(log.keys[0].k, REDACT_CENSOR);
        assert.strictEqual(log.keys[0].kid, 'key-1');
    });
});
