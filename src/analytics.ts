/**
 * Analytics - per-call and per-run metrics.
 *
 * The engine only depends on AnalyticsSink. SqliteAnalytics is the default
 * sink and also answers usage reports (calls and tokens per model/action).
 */

import Database from 'better-sqlite3';

export type ApiCallStatus = 'success' | 'error';

export interface ApiCallRecord {
    /** Workflow entry the call belongs to ('' when called outside a run). */
    requestId: string;
    modelId: string;
    action: string;
    tokensIn: number;
    tokensOut: number;
    durationSeconds: number;
    status: ApiCallStatus;
}

export interface CompletionRecord {
    entryId: string;
    durationSeconds: number;
    iterations: number;
    featuresImplemented?: number;
}

export interface AnalyticsSink {
    logApiCall(record: ApiCallRecord): void | Promise<void>;
    logCompletion(record: CompletionRecord): void | Promise<void>;
}

export interface UsageRow {
    modelId: string;
    action: string;
    calls: number;
    tokensIn: number;
    tokensOut: number;
    avgDurationSeconds: number;
}

interface UsageDbRow {
    model_id: string;
    action: string;
    calls: number;
    tokens_in: number;
    tokens_out: number;
    avg_duration: number;
}

interface CompletionDbRow {
    entry_id: string;
    duration: number;
    iterations: number;
    features_implemented: number | null;
    created_at: string;
}

export class SqliteAnalytics implements AnalyticsSink {
    private readonly db: Database.Database;

    constructor(dbOrPath: Database.Database | string, private readonly now: () => number = Date.now) {
        this.db = typeof dbOrPath === 'string' ? new Database(dbOrPath) : dbOrPath;
        this.db.pragma('busy_timeout = 5000');
        this.migrate();
    }

    private migrate(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS api_calls (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                request_id TEXT NOT NULL,
                model_id TEXT NOT NULL,
                action TEXT NOT NULL,
                tokens_in INTEGER NOT NULL,
                tokens_out INTEGER NOT NULL,
                duration REAL NOT NULL,
                status TEXT NOT NULL CHECK(status IN ('success','error')),
                created_at TEXT NOT NULL
            );
            CREATE INDEX IF NOT EXISTS idx_api_calls_request ON api_calls(request_id);
            CREATE INDEX IF NOT EXISTS idx_api_calls_model ON api_calls(model_id, action);
            CREATE INDEX IF NOT EXISTS idx_api_calls_created ON api_calls(created_at);

            CREATE TABLE IF NOT EXISTS run_completions (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                entry_id TEXT NOT NULL,
                duration REAL NOT NULL,
                iterations INTEGER NOT NULL,
                features_implemented INTEGER,
                created_at TEXT NOT NULL
            );
        `);
    }

    logApiCall(r: ApiCallRecord): void {
        this.db.prepare(`
            INSERT INTO api_calls (request_id, model_id, action, tokens_in, tokens_out, duration, status, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `).run(r.requestId, r.modelId, r.action, r.tokensIn, r.tokensOut, r.durationSeconds, r.status, this.nowIso());
    }

    logCompletion(r: CompletionRecord): void {
        this.db.prepare(`
            INSERT INTO run_completions (entry_id, duration, iterations, features_implemented, created_at)
            VALUES (?, ?, ?, ?, ?)
        `).run(r.entryId, r.durationSeconds, r.iterations, r.featuresImplemented ?? null, this.nowIso());
    }

    /** Successful and failed calls since `days` ago, grouped by model and action. */
    getUsageReport(days = 30): UsageRow[] {
        const since = new Date(this.now() - days * 86_400_000).toISOString();
        const rows = this.db.prepare(`
            SELECT model_id, action, COUNT(*) AS calls,
                   SUM(tokens_in) AS tokens_in, SUM(tokens_out) AS tokens_out,
                   AVG(duration) AS avg_duration
            FROM api_calls
            WHERE created_at >= ?
            GROUP BY model_id, action
            ORDER BY calls DESC, model_id ASC, action ASC
        `).all(since) as UsageDbRow[];

        return rows.map((r) => ({
            modelId: r.model_id,
            action: r.action,
            calls: r.calls,
            tokensIn: r.tokens_in,
            tokensOut: r.tokens_out,
            avgDurationSeconds: r.avg_duration,
        }));
    }

    getCompletions(entryId: string): CompletionRecord[] {
        const rows = this.db.prepare(`
            SELECT entry_id, duration, iterations, features_implemented, created_at
            FROM run_completions WHERE entry_id = ? ORDER BY id ASC
        `).all(entryId) as CompletionDbRow[];

        return rows.map((r) => ({
            entryId: r.entry_id,
            durationSeconds: r.duration,
            iterations: r.iterations,
            ...(r.features_implemented !== null ? { featuresImplemented: r.features_implemented } : {}),
        }));
    }

    private nowIso(): string {
        return new Date(this.now()).toISOString();
    }
}
