import test from 'node:test';
import assert from 'node:assert/strict';

import { AnalyticsSink } from '../src/analytics';
import { LlmClient, sanitizeErrorSnippet } from '../src/llm_client';
import { RateLimiter } from '../src/rate_limiter';
import { ResponseCache } from '../src/response_cache';
import { ApiError, RateLimitExceededError } from '../src/structured_error';
import { HttpResult } from '../src/transport';
import { captureLogger, FakeTransport, MemoryAnalytics, model, rawReply, reply, Responder } from './helpers';

interface SetupOptions {
    callsPerMinute?: number;
    tokensPerMinute?: number;
    analytics?: AnalyticsSink;
}

function setup(responder: Responder, opts: SetupOptions = {}) {
    const transport = new FakeTransport(responder);
    const analytics = new MemoryAnalytics();
    const { logger, lines } = captureLogger('llm-client');
    const client = new LlmClient({
        rateLimiter: new RateLimiter({
            limits: {},
            defaultLimit: { callsPerMinute: opts.callsPerMinute ?? 60, tokensPerMinute: opts.tokensPerMinute ?? 10_000 },
            logger,
        }),
        cache: new ResponseCache(),
        transport,
        analytics: opts.analytics ?? analytics,
        logger,
    });
    return { client, transport, analytics, lines };
}

test('identical calls within the TTL reach the transport once', async () => {
    const { client, transport, analytics } = setup(() => reply('def add(a, b):\n    return a + b'));
    const m = model('claude');

    const first = await client.call(m, 'add two numbers', 'generate', 'python', { entryId: 'e1' });
    const second = await client.call(m, 'add two numbers\r\n', 'generate', 'python', { entryId: 'e1' });

    assert.equal(transport.count(), 1);
    assert.ok(first.ok && second.ok);
    if (first.ok && second.ok) {
        assert.equal(second.text, first.text);
        assert.equal(first.cached, false);
        assert.equal(second.cached, true);
    }
    assert.equal(analytics.calls.length, 1);
});

test('a repeated tuple is still served from cache after many distinct calls', async () => {
    const { client, transport } = setup((req) => reply(`echo ${req.prompt}`), {
        callsPerMinute: 10_000,
        tokensPerMinute: 10_000_000,
    });
    const m = model('claude');

    await client.call(m, 'first', 'generate', 'python');
    for (let i = 0; i < 6000; i++) {
        await client.call(m, `input ${i}`, 'generate', 'python');
    }
    const again = await client.call(m, 'first', 'generate', 'python');

    assert.equal(transport.count(), 6001);
    assert.ok(again.ok);
    if (again.ok) {
        assert.equal(again.text, 'echo first');
        assert.equal(again.cached, true);
    }
});

test('concurrent identical calls share one request', async () => {
    const { client, transport } = setup(() => new Promise<HttpResult>((resolve) => setTimeout(() => resolve(reply('x = 1')), 5)));
    const m = model('claude');

    const [a, b] = await Promise.all([
        client.call(m, 'p', 'generate', 'python'),
        client.call(m, 'p', 'generate', 'python'),
    ]);

    assert.equal(transport.count(), 1);
    assert.deepEqual([a.ok, b.ok], [true, true]);
});

test('the request carries the credential, action and per-task sampling parameters', async () => {
    const { client, transport } = setup(() => reply('ok'));
    const m = model('claude', { tasks: { checking: { temperature: 0.1 } } });

    await client.call(m, 'code', 'check_bugs', 'go');

    const [sent] = transport.requests;
    assert.equal(sent.url, 'https://llm.test/claude');
    assert.equal(sent.headers['Authorization'], 'Bearer test-secret');
    assert.equal(sent.headers['Content-Type'], 'application/json');
    assert.equal(sent.prompt, 'code');
    assert.equal(sent.action, 'check_bugs');
    assert.equal(sent.language, 'go');
    assert.equal(sent.temperature, 0.1);
    assert.equal(sent.maxTokens, 2000);
    assert.equal(sent.timeoutMs, 30_000);
});

test('call number cpm + 1 fails with RATE_LIMITED and never reaches the transport', async () => {
    const { client, transport } = setup(() => reply('ok'), { callsPerMinute: 2 });
    const m = model('claude');

    assert.equal((await client.call(m, 'one', 'generate', 'python')).ok, true);
    assert.equal((await client.call(m, 'two', 'generate', 'python')).ok, true);
    const third = await client.call(m, 'three', 'generate', 'python');

    assert.equal(third.ok, false);
    if (!third.ok) {
        assert.equal(third.errorCode, 'RATE_LIMITED');
        assert.ok(third.error instanceof RateLimitExceededError);
        assert.equal(third.retryable, true);
    }
    assert.equal(transport.count(), 2);
});

test('a cache hit is served even when the rate budget is spent', async () => {
    const { client, transport } = setup(() => reply('ok'), { callsPerMinute: 1 });
    const m = model('claude');

    await client.call(m, 'same', 'generate', 'python');
    const again = await client.call(m, 'same', 'generate', 'python');

    assert.equal(again.ok, true);
    assert.equal(transport.count(), 1);
});

test('a missing credential fails without sending anything', async () => {
    const { client, transport } = setup(() => reply('ok'));
    const res = await client.call(model('gemini', { credential: '' }), 'p', 'generate', 'python');

    assert.equal(res.ok, false);
    if (!res.ok) {
        assert.equal(res.errorCode, 'API_ERROR');
        assert.equal(res.message, 'No credential configured for model gemini');
    }
    assert.equal(transport.count(), 0);
});

test('HTTP errors become API_ERROR, retryable for 5xx and 429 only', async () => {
    const statuses = [503, 429, 400];
    const { client, analytics } = setup(() => rawReply('upstream said no', statuses.shift() ?? 500));
    const m = model('claude');

    const results = [
        await client.call(m, 'a', 'generate', 'python', { entryId: 'e9' }),
        await client.call(m, 'b', 'generate', 'python', { entryId: 'e9' }),
        await client.call(m, 'c', 'generate', 'python', { entryId: 'e9' }),
    ];

    assert.deepEqual(results.map((r) => (r.ok ? null : [r.message, r.retryable, r.httpStatus])), [
        ['HTTP 503: upstream said no', true, 503],
        ['HTTP 429: upstream said no', true, 429],
        ['HTTP 400: upstream said no', false, 400],
    ]);
    assert.deepEqual(analytics.calls.map((c) => [c.requestId, c.status, c.tokensOut]), [
        ['e9', 'error', 0],
        ['e9', 'error', 0],
        ['e9', 'error', 0],
    ]);
});

test('malformed and error bodies are reported, not thrown', async () => {
    const bodies = ['not json', '[1]', '{"text":"x"}', '{"error":"quota exhausted"}'];
    const { client } = setup(() => rawReply(bodies.shift() ?? '{}'));
    const m = model('claude');

    const messages: string[] = [];
    for (const input of ['a', 'b', 'c', 'd']) {
        const res = await client.call(m, input, 'fix', 'python');
        if (!res.ok) {
            assert.ok(res.error instanceof ApiError);
            messages.push(res.message);
        }
    }

    assert.deepEqual(messages, [
        'Malformed response (not JSON): not json',
        'Malformed response (expected a JSON object)',
        'Malformed response (missing string "result")',
        'API error: quota exhausted',
    ]);
});

test('transport failures are retryable API errors and are not cached', async () => {
    let attempt = 0;
    const { client, transport } = setup((): HttpResult => {
        attempt++;
        return attempt === 1
            ? { ok: false, message: 'timeout after 30000ms', timedOut: true, latencyMs: 30000 }
            : reply('second time lucky');
    });
    const m = model('claude');

    const first = await client.call(m, 'p', 'generate', 'python');
    const second = await client.call(m, 'p', 'generate', 'python');

    assert.equal(first.ok, false);
    if (!first.ok) {
        assert.equal(first.message, 'API request failed: timeout after 30000ms');
        assert.equal(first.retryable, true);
    }
    assert.equal(second.ok, true);
    assert.equal(transport.count(), 2);
});

test('an analytics sink that throws does not fail the call', async () => {
    const broken: AnalyticsSink = {
        logApiCall: () => {
            throw new Error('disk full');
        },
        logCompletion: () => undefined,
    };
    const { client, lines } = setup(() => reply('ok'), { analytics: broken });

    const res = await client.call(model('claude'), 'p', 'generate', 'python');

    assert.equal(res.ok, true);
    assert.equal(lines.filter((l) => l.level === 'warn' && l.line.includes('Analytics record failed')).length, 1);
});

test('sanitizeErrorSnippet redacts keys and addresses and strips control characters', () => {
    assert.equal(sanitizeErrorSnippet('bad key sk-abcdefghijklmnop from 10.0.0.1\n'), 'bad key [REDACTED] from [REDACTED]');
    assert.equal(sanitizeErrorSnippet('x'.repeat(600)).length, 500);
});
