// llm_client.ts - one generate/check/fix/feature call, end to end
//
// Pipeline per call: cache lookup -> join identical in-flight call -> rate budget
// -> transport -> parse -> cache + analytics. No retries here; callers decide.

import { AnalyticsSink } from './analytics';
import { ModelConfig, TaskType, taskDefaults, DEFAULTS } from './config';
import { createLogger, errorFields, Logger } from './logger';
import { estimateTokens, RateLimiter } from './rate_limiter';
import { cacheKey, ResponseCache } from './response_cache';
import { ApiError, RateLimitExceededError } from './structured_error';
import { HttpResult, HttpTransport } from './transport';

// ============================================================================
// Types
// ============================================================================

export type LlmAction = 'generate' | 'check_bugs' | 'fix' | 'apply_feature';

export const ACTION_TASK: Record<LlmAction, TaskType> = {
    generate: 'generation',
    check_bugs: 'checking',
    fix: 'fixing',
    apply_feature: 'feature',
};

export interface CallContext {
    entryId?: string | null;
    iteration?: number | null;
}

export interface LlmSuccess {
    ok: true;
    text: string;
    modelId: string;
    action: LlmAction;
    cached: boolean;
    tokensIn: number;
    tokensOut: number;
    durationMs: number;
}

export type LlmErrorCode = 'RATE_LIMITED' | 'API_ERROR';

export interface LlmFailure {
    ok: false;
    errorCode: LlmErrorCode;
    message: string;
    retryable: boolean;
    httpStatus: number | null;
    modelId: string;
    action: LlmAction;
    error: RateLimitExceededError | ApiError;
}

export type LlmResult = LlmSuccess | LlmFailure;

export interface LlmClientOptions {
    rateLimiter: RateLimiter;
    cache: ResponseCache;
    transport: HttpTransport;
    analytics?: AnalyticsSink;
    logger?: Logger;
    requestTimeoutMs?: number;
    cacheTtlSeconds?: number;
    userAgent?: string;
}

// ============================================================================
// Helpers
// ============================================================================

const SANITIZE = {
    ERROR_SNIPPET_MAX_CHARS: 500,
    STRIP_PATTERNS: [
        /\b\d{1,3}(?:\.\d{1,3}){3}\b/g,
        /[a-fA-F0-9]{32,}/g,
        /sk-[A-Za-z0-9]{10,}/g,
        /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
    ],
};

export function sanitizeErrorSnippet(input: string): string {
    let out = input || '';
    for (const re of SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, '[REDACTED]');
    }
    if (out.length > SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    return out.replace(/[^\x20-\x7E]+/g, ' ').trim();
}

type ParsedBody = { ok: true; text: string } | { ok: false; message: string };

function parseBody(body: string): ParsedBody {
    let data: unknown;
    try {
        data = JSON.parse(body);
    } catch {
        return { ok: false, message: `Malformed response (not JSON): ${sanitizeErrorSnippet(body)}` };
    }
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        return { ok: false, message: 'Malformed response (expected a JSON object)' };
    }
    if ('error' in data && data.error !== undefined && data.error !== null) {
        const detail = typeof data.error === 'string' ? data.error : JSON.stringify(data.error);
        return { ok: false, message: `API error: ${sanitizeErrorSnippet(detail)}` };
    }
    if (!('result' in data) || typeof data.result !== 'string') {
        return { ok: false, message: 'Malformed response (missing string "result")' };
    }
    return { ok: true, text: data.result };
}

// ============================================================================
// LlmClient
// ============================================================================

export class LlmClient {
    private readonly inFlight = new Map<string, Promise<LlmResult>>();
    private readonly log: Logger;
    private readonly timeoutMs: number;
    private readonly cacheTtlSeconds: number;
    private readonly userAgent: string;

    constructor(private readonly opts: LlmClientOptions) {
        this.log = opts.logger ?? createLogger('llm-client');
        this.timeoutMs = opts.requestTimeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS;
        this.cacheTtlSeconds = opts.cacheTtlSeconds ?? DEFAULTS.CACHE_TTL_SECONDS;
        this.userAgent = opts.userAgent ?? 'adversarial-refiner/0.1';
    }

    async call(
        model: ModelConfig,
        input: string,
        action: LlmAction,
        language: string,
        ctx: CallContext = {}
    ): Promise<LlmResult> {
        const key = cacheKey(model.id, input, action, language);

        const hit = this.opts.cache.get(key);
        if (hit !== undefined) {
            this.log.debug('Cache hit', { model: model.id, action, key: key.slice(0, 12) });
            return {
                ok: true,
                text: hit,
                modelId: model.id,
                action,
                cached: true,
                tokensIn: 0,
                tokensOut: 0,
                durationMs: 0,
            };
        }

        const pending = this.inFlight.get(key);
        if (pending) {
            this.log.debug('Joining in-flight call', { model: model.id, action });
            return pending;
        }

        const promise = this.execute(key, model, input, action, language, ctx);
        this.inFlight.set(key, promise);
        try {
            return await promise;
        } finally {
            this.inFlight.delete(key);
        }
    }

    private async execute(
        key: string,
        model: ModelConfig,
        input: string,
        action: LlmAction,
        language: string,
        ctx: CallContext
    ): Promise<LlmResult> {
        if (!model.credential) {
            return this.fail(model, action, new ApiError(`No credential configured for model ${model.id}`, model.id));
        }

        const tokensIn = estimateTokens(input);
        const budget = this.opts.rateLimiter.acquire(model.id, tokensIn);
        if (!budget.ok) {
            return this.fail(model, action, budget.error);
        }

        const params = taskDefaults(model, ACTION_TASK[action]);
        const body = JSON.stringify({
            prompt: input,
            action,
            temperature: params.temperature,
            max_tokens: params.maxTokens,
            language,
        });

        const started = Date.now();
        let res: HttpResult;
        try {
            res = await this.opts.transport.post({
                url: model.endpoint,
                headers: {
                    'Authorization': `Bearer ${model.credential}`,
                    'Content-Type': 'application/json',
                    'User-Agent': this.userAgent,
                },
                body,
                timeoutMs: this.timeoutMs,
            });
        } catch (e) {
            res = { ok: false, message: e instanceof Error ? e.message : String(e), timedOut: false, latencyMs: Date.now() - started };
        }
        const durationMs = Date.now() - started;

        if (!res.ok) {
            await this.emit(ctx, model.id, action, tokensIn, 0, durationMs, 'error');
            return this.fail(model, action, new ApiError(`API request failed: ${sanitizeErrorSnippet(res.message)}`, model.id, null, true));
        }

        if (res.status < 200 || res.status >= 300) {
            await this.emit(ctx, model.id, action, tokensIn, 0, durationMs, 'error');
            const snippet = sanitizeErrorSnippet(res.body);
            const retryable = res.status >= 500 || res.status === 429;
            const message = snippet ? `HTTP ${res.status}: ${snippet}` : `HTTP ${res.status}`;
            return this.fail(model, action, new ApiError(message, model.id, res.status, retryable));
        }

        const parsed = parseBody(res.body);
        if (!parsed.ok) {
            await this.emit(ctx, model.id, action, tokensIn, 0, durationMs, 'error');
            return this.fail(model, action, new ApiError(parsed.message, model.id, res.status));
        }

        const tokensOut = estimateTokens(parsed.text);
        this.opts.cache.put(key, parsed.text, this.cacheTtlSeconds);
        this.opts.rateLimiter.record(model.id, tokensOut);
        await this.emit(ctx, model.id, action, tokensIn, tokensOut, durationMs, 'success');

        this.log.info(`API call to ${model.id} for action ${action}`, { latency_ms: durationMs, tokens_in: tokensIn, tokens_out: tokensOut });

        return {
            ok: true,
            text: parsed.text,
            modelId: model.id,
            action,
            cached: false,
            tokensIn,
            tokensOut,
            durationMs,
        };
    }

    private async emit(
        ctx: CallContext,
        modelId: string,
        action: LlmAction,
        tokensIn: number,
        tokensOut: number,
        durationMs: number,
        status: 'success' | 'error'
    ): Promise<void> {
        if (!this.opts.analytics) return;
        try {
            await this.opts.analytics.logApiCall({
                requestId: ctx.entryId ?? '',
                modelId,
                action,
                tokensIn,
                tokensOut,
                durationSeconds: durationMs / 1000,
                status,
            });
        } catch (e) {
            this.log.warn('Analytics record failed', { model: modelId, action, ...errorFields(e) });
        }
    }

    private fail(model: ModelConfig, action: LlmAction, error: RateLimitExceededError | ApiError): LlmFailure {
        this.log.debug('API call failed', { model: model.id, action, code: error.code, error: error.message });
        return {
            ok: false,
            errorCode: error instanceof RateLimitExceededError ? 'RATE_LIMITED' : 'API_ERROR',
            message: error.message,
            retryable: error.retryable,
            httpStatus: error instanceof ApiError ? error.httpStatus : null,
            modelId: model.id,
            action,
            error,
        };
    }
}
