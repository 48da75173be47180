/**
 * Response cache - memoized model responses keyed by
 * (model id, normalized input, action, language).
 *
 * Eviction is TTL-only: every entry carries its own lru-cache ttl and is
 * purged when it lapses. There is no entry-count bound. Only successful
 * responses are ever stored.
 */

import crypto from 'crypto';
import { LRUCache } from 'lru-cache';

export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export interface ResponseCacheOptions {
    defaultTtlSeconds?: number;
}

function sha256Hex(s: string): string {
    return crypto.createHash('sha256').update(s).digest('hex');
}

export function normalizeInput(input: string): string {
    return input.replace(/\r\n?/g, '\n').trim();
}

export function cacheKey(modelId: string, input: string, action: string, language: string): string {
    return sha256Hex(JSON.stringify([modelId, normalizeInput(input), action, language]));
}

export class ResponseCache {
    private readonly entries: LRUCache<string, string>;
    private readonly defaultTtlMs: number;

    constructor(opts: ResponseCacheOptions = {}) {
        this.defaultTtlMs = toMs(opts.defaultTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS);
        this.entries = new LRUCache<string, string>({
            // lru-cache wants a positive default; a zero default never reaches set()
            ttl: Math.max(1, this.defaultTtlMs),
            ttlAutopurge: true,
            updateAgeOnGet: false,
        });
    }

    /** An expired entry reads as a miss and is evicted. */
    get(key: string): string | undefined {
        return this.entries.get(key);
    }

    put(key: string, value: string, ttlSeconds?: number): void {
        const ttlMs = ttlSeconds !== undefined ? toMs(ttlSeconds) : this.defaultTtlMs;
        if (ttlMs <= 0) return;
        this.entries.set(key, value, { ttl: ttlMs });
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}

function toMs(seconds: number): number {
    return Math.max(0, Math.ceil(seconds * 1000));
}
