// transport.ts - one outbound HTTP request per call, bounded by a timeout

export interface HttpRequest {
    url: string;
    headers: Record<string, string>;
    body: string;
    timeoutMs: number;
}

export type HttpResult =
    | { ok: true; status: number; body: string; latencyMs: number }
    | { ok: false; message: string; timedOut: boolean; latencyMs: number };

/** Performs exactly one request; never retries. */
export interface HttpTransport {
    post(req: HttpRequest): Promise<HttpResult>;
}

export class FetchTransport implements HttpTransport {
    async post(req: HttpRequest): Promise<HttpResult> {
        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), req.timeoutMs);
        const started = Date.now();

        try {
            const resp = await fetch(req.url, {
                method: 'POST',
                headers: req.headers,
                body: req.body,
                signal: ac.signal,
            });
            const body = await resp.text();
            return { ok: true, status: resp.status, body, latencyMs: Date.now() - started };
        } catch (e) {
            const timedOut = e instanceof Error && e.name === 'AbortError';
            const message = timedOut
                ? `timeout after ${req.timeoutMs}ms`
                : `network_error: ${e instanceof Error ? e.message : String(e)}`;
            return { ok: false, message, timedOut, latencyMs: Date.now() - started };
        } finally {
            clearTimeout(tid);
        }
    }
}
