// Shared fakes for the test suite: an in-process transport, an in-memory
// analytics sink, a capturing logger and small config builders.

import { ApiCallRecord, AnalyticsSink, CompletionRecord } from '../src/analytics';
import { ModelConfig } from '../src/config';
import { createLogger, Logger, LogLevel } from '../src/logger';
import { HttpRequest, HttpResult, HttpTransport } from '../src/transport';

export interface SentRequest {
    url: string;
    headers: Record<string, string>;
    prompt: string;
    action: string;
    language: string;
    temperature: number | null;
    maxTokens: number | null;
    timeoutMs: number;
}

export type Responder = (req: SentRequest) => HttpResult | Promise<HttpResult>;

function field(obj: unknown, key: string): unknown {
    if (typeof obj !== 'object' || obj === null) return undefined;
    const value: unknown = Reflect.get(obj, key);
    return value;
}

function decode(req: HttpRequest): SentRequest {
    const body: unknown = JSON.parse(req.body);
    const text = (key: string): string => {
        const v = field(body, key);
        return typeof v === 'string' ? v : '';
    };
    const numeric = (key: string): number | null => {
        const v = field(body, key);
        return typeof v === 'number' ? v : null;
    };
    return {
        url: req.url,
        headers: req.headers,
        prompt: text('prompt'),
        action: text('action'),
        language: text('language'),
        temperature: numeric('temperature'),
        maxTokens: numeric('max_tokens'),
        timeoutMs: req.timeoutMs,
    };
}

export class FakeTransport implements HttpTransport {
    readonly requests: SentRequest[] = [];

    constructor(private readonly responder: Responder) {}

    async post(req: HttpRequest): Promise<HttpResult> {
        const sent = decode(req);
        this.requests.push(sent);
        return this.responder(sent);
    }

    count(action?: string): number {
        return action === undefined ? this.requests.length : this.requests.filter((r) => r.action === action).length;
    }

    actions(): string[] {
        return this.requests.map((r) => r.action);
    }
}

export class MemoryAnalytics implements AnalyticsSink {
    readonly calls: ApiCallRecord[] = [];
    readonly completions: CompletionRecord[] = [];

    logApiCall(r: ApiCallRecord): void {
        this.calls.push(r);
    }

    logCompletion(r: CompletionRecord): void {
        this.completions.push(r);
    }
}

export function reply(result: string, status = 200): HttpResult {
    return { ok: true, status, body: JSON.stringify({ result }), latencyMs: 1 };
}

export function rawReply(body: string, status = 200): HttpResult {
    return { ok: true, status, body, latencyMs: 1 };
}

export interface CapturedLine {
    level: LogLevel;
    line: string;
}

export function captureLogger(component = 'test'): { logger: Logger; lines: CapturedLine[] } {
    const lines: CapturedLine[] = [];
    const logger = createLogger(component, {
        minLevel: 'debug',
        json: false,
        sink: (level, line) => lines.push({ level, line }),
    });
    return { logger, lines };
}

export function model(id: string, overrides: Partial<ModelConfig> = {}): ModelConfig {
    return {
        id,
        endpoint: `https://llm.test/${id}`,
        credential: 'test-secret',
        temperature: 0.7,
        maxTokens: 2000,
        tasks: {},
        weight: 1,
        ...overrides,
    };
}

/** A clock the test advances by hand. */
export function manualClock(start = 1_700_000_000_000): { now: () => number; advance: (ms: number) => void } {
    let t = start;
    return {
        now: () => t,
        advance: (ms: number) => {
            t += ms;
        },
    };
}
