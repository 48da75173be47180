import test from 'node:test';
import assert from 'node:assert/strict';

import { createLogger, errorFields, LogLevel } from '../src/logger';

function capture(minLevel: LogLevel, json: boolean) {
    const lines: Array<{ level: LogLevel; line: string }> = [];
    const logger = createLogger('orchestrator', { minLevel, json, sink: (level, line) => lines.push({ level, line }) });
    return { logger, lines };
}

test('messages below the minimum level are dropped', () => {
    const { logger, lines } = capture('warn', false);
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    assert.deepEqual(lines.map((l) => l.level), ['warn', 'error']);
});

test('text lines carry level, component, short entry id and data', () => {
    const { logger, lines } = capture('debug', false);
    logger.withContext({ entryId: '0123456789abcdef' }).info('State: checking', { iteration: 2 });

    assert.match(lines[0].line, /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO \] \[orchestrator\] \[01234567\] State: checking \{"iteration":2\}$/);
});

test('JSON lines merge bound context and nest data', () => {
    const { logger, lines } = capture('debug', true);
    logger.withContext({ entryId: 'e1' }).child('client').warn('slow', { ms: 900 });

    const parsed: unknown = JSON.parse(lines[0].line);
    assert.ok(typeof parsed === 'object' && parsed !== null && 'ts' in parsed);
    assert.equal(typeof parsed.ts, 'string');
    assert.deepEqual({ ...parsed, ts: 'T' }, {
        ts: 'T',
        level: 'warn',
        component: 'orchestrator:client',
        msg: 'slow',
        entryId: 'e1',
        data: { ms: 900 },
    });
});

test('errorFields describes Error instances and other thrown values', () => {
    assert.deepEqual(errorFields(new TypeError('bad')), { error: 'bad', error_name: 'TypeError' });
    assert.deepEqual(errorFields('plain'), { error: 'plain' });
});
