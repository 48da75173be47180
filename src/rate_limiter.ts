/**
 * RateLimiter - per-model call and token budget.
 *
 * INVARIANT: No outbound model call is issued without a successful acquire().
 *
 * - Fixed 60s window per model, reset lazily on the first acquire after expiry
 * - Two ceilings per model: calls/min and tokens/min
 * - Fail-closed: a call that would exceed either ceiling is refused
 * - Never blocks, waits or retries; the caller decides what to do
 *
 * acquire() checks and increments in one synchronous step, so concurrent runs
 * calling the same model cannot both take the last slot.
 */

import { createLogger, Logger } from './logger';
import { RateLimitExceededError } from './structured_error';

export const RATE_WINDOW_MS = 60_000;

export interface RateLimitConfig {
    callsPerMinute: number;
    tokensPerMinute: number;
}

export interface RateState {
    calls: number;
    tokens: number;
    windowStartMs: number;
}

export type AcquireResult = { ok: true } | { ok: false; error: RateLimitExceededError };

export interface RateLimiterOptions {
    limits: Record<string, RateLimitConfig>;
    defaultLimit: RateLimitConfig;
    now?: () => number;
    logger?: Logger;
}

export class RateLimiter {
    private readonly state = new Map<string, RateState>();
    private readonly limits: Record<string, RateLimitConfig>;
    private readonly defaultLimit: RateLimitConfig;
    private readonly now: () => number;
    private readonly log: Logger;

    constructor(opts: RateLimiterOptions) {
        this.limits = opts.limits;
        this.defaultLimit = opts.defaultLimit;
        this.now = opts.now ?? Date.now;
        this.log = opts.logger ?? createLogger('rate-limiter');
    }

    limitFor(modelId: string): RateLimitConfig {
        return this.limits[modelId] ?? this.defaultLimit;
    }

    /**
     * Reserve one call and `estimatedTokens` tokens for `modelId` in the current window.
     */
    acquire(modelId: string, estimatedTokens: number): AcquireResult {
        const limit = this.limitFor(modelId);
        const current = this.window(modelId);
        const tokens = Math.max(0, Math.ceil(estimatedTokens));

        if (current.calls + 1 > limit.callsPerMinute) {
            this.log.warn('Call rate limit hit', { model: modelId, limit: limit.callsPerMinute });
            return { ok: false, error: new RateLimitExceededError(modelId, `${limit.callsPerMinute} calls/min`) };
        }

        if (current.tokens + tokens > limit.tokensPerMinute) {
            this.log.warn('Token rate limit hit', { model: modelId, limit: limit.tokensPerMinute, recent: current.tokens, requested: tokens });
            return { ok: false, error: new RateLimitExceededError(modelId, `${limit.tokensPerMinute} tokens/min`) };
        }

        current.calls += 1;
        current.tokens += tokens;
        return { ok: true };
    }

    /** Add completion tokens once a call has returned. Not subject to the ceiling. */
    record(modelId: string, tokensOut: number): void {
        const current = this.window(modelId);
        current.tokens += Math.max(0, Math.ceil(tokensOut));
    }

    snapshot(modelId: string): RateState {
        return { ...this.window(modelId) };
    }

    reset(modelId?: string): void {
        if (modelId === undefined) this.state.clear();
        else this.state.delete(modelId);
    }

    private window(modelId: string): RateState {
        const now = this.now();
        const existing = this.state.get(modelId);
        if (existing && now - existing.windowStartMs < RATE_WINDOW_MS) {
            return existing;
        }
        const fresh: RateState = { calls: 0, tokens: 0, windowStartMs: now };
        this.state.set(modelId, fresh);
        return fresh;
    }
}

/** Conservative token estimate: ~3.3 chars/token for code, with a word-count floor. */
export function estimateTokens(text: string): number {
    if (!text) return 0;
    const chars = text.length;
    const words = text.split(/\s+/).filter(Boolean).length;
    return Math.max(Math.ceil(chars / 3.3), Math.ceil(words * 1.3));
}
