import test from 'node:test';
import assert from 'node:assert/strict';

import { ApiError } from '../src/structured_error';
import { handleGenerateRequest, parseGenerateRequest, WorkflowRunner } from '../src/trigger';
import { captureLogger } from './helpers';

interface Recorded {
    method: 'runWorkflow' | 'generateFeatureEnhancedCode';
    prompt: string;
    language: string;
    features?: string[];
}

function runner(fail?: Error): { orchestrator: WorkflowRunner; calls: Recorded[] } {
    const calls: Recorded[] = [];
    const orchestrator: WorkflowRunner = {
        runWorkflow: async (prompt, language = 'python') => {
            calls.push({ method: 'runWorkflow', prompt, language });
            if (fail) throw fail;
            return { entryId: 'e1', code: 'print(1)', iterations: 2, duration: 1.25 };
        },
        generateFeatureEnhancedCode: async (prompt, features, language = 'python') => {
            calls.push({ method: 'generateFeatureEnhancedCode', prompt, language, features });
            if (fail) throw fail;
            return { entryId: 'e2', code: 'print(2)', iterations: 6, featuresImplemented: 2, duration: 3 };
        },
    };
    return { orchestrator, calls };
}

test('a plain request runs the bug-fix loop and reports zero features', async () => {
    const { orchestrator, calls } = runner();
    const { logger } = captureLogger('trigger');

    const res = await handleGenerateRequest(orchestrator, { prompt: 'add two numbers' }, logger);

    assert.deepEqual(res, { status: 200, body: { code: 'print(1)', iterations: 2, duration: 1.25, features_implemented: 0 } });
    assert.deepEqual(calls, [{ method: 'runWorkflow', prompt: 'add two numbers', language: 'python' }]);
});

test('a request with features runs the feature loop', async () => {
    const { orchestrator, calls } = runner();
    const { logger } = captureLogger('trigger');

    const res = await handleGenerateRequest(orchestrator, { prompt: 'todo', language: 'go', features: ['a', 'b'] }, logger);

    assert.deepEqual(res, { status: 200, body: { code: 'print(2)', iterations: 6, duration: 3, features_implemented: 2 } });
    assert.deepEqual(calls, [{ method: 'generateFeatureEnhancedCode', prompt: 'todo', language: 'go', features: ['a', 'b'] }]);
});

test('an empty features list takes the plain path', async () => {
    const { orchestrator, calls } = runner();
    await handleGenerateRequest(orchestrator, { prompt: 'x', features: [] }, captureLogger().logger);
    assert.equal(calls[0].method, 'runWorkflow');
});

test('invalid bodies are rejected with 400 before any run starts', async () => {
    const { orchestrator, calls } = runner();
    const { logger } = captureLogger('trigger');

    const missing = await handleGenerateRequest(orchestrator, {}, logger);
    assert.deepEqual(missing, { status: 400, body: { error: 'Invalid request: .prompt: Required field missing', code: 'INVALID_REQUEST' } });

    const blank = await handleGenerateRequest(orchestrator, { prompt: '   ' }, logger);
    assert.deepEqual(blank, { status: 400, body: { error: 'Invalid request: prompt must not be blank', code: 'INVALID_REQUEST' } });

    const badFeatures = await handleGenerateRequest(orchestrator, { prompt: 'p', features: 'sorting' }, logger);
    assert.equal(badFeatures.status, 400);

    assert.equal(calls.length, 0);
});

test('run failures map to 500 with the error code', async () => {
    const { orchestrator } = runner(new ApiError('HTTP 500: boom', 'claude', 500, true));
    const { logger, lines } = captureLogger('trigger');

    const res = await handleGenerateRequest(orchestrator, { prompt: 'p' }, logger);

    assert.deepEqual(res, { status: 500, body: { error: 'HTTP 500: boom', code: 'API_ERROR' } });
    assert.equal(lines.filter((l) => l.level === 'error').length, 1);
});

test('unexpected errors are reported as INTERNAL_ERROR', async () => {
    const { orchestrator } = runner(new Error('socket closed'));
    const res = await handleGenerateRequest(orchestrator, { prompt: 'p' }, captureLogger().logger);
    assert.deepEqual(res, { status: 500, body: { error: 'socket closed', code: 'INTERNAL_ERROR' } });
});

test('parseGenerateRequest keeps only the known fields', () => {
    assert.deepEqual(parseGenerateRequest({ prompt: 'p', extra: true }), { prompt: 'p' });
    assert.throws(() => parseGenerateRequest('p'), /Expected type object, got string/);
});
