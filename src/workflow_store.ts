// workflow_store.ts - workflow entries, version history and per-checker bug reports
//
// GUARANTEES:
// - Entries are created in 'processing' and only move to 'completed' or 'failed'
// - iteration_count never decreases (enforced in SQL, not only by the caller)
// - Version history is append-only
//
// CONTRACT: Synchronous SQLite underneath (better-sqlite3); the interfaces the
// engine depends on allow async implementations.

import Database from 'better-sqlite3';
import crypto from 'crypto';
import { BugSeverity, CodeMetrics } from './code_metrics';
import { SecurityFinding } from './security_sanitizer';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type WorkflowStatus = 'processing' | 'completed' | 'failed';

export interface WorkflowEntry {
    id: string;
    prompt: string;
    language: string;
    features: string[] | null;
    status: WorkflowStatus;
    generatedCode: string;
    bugReport: string;
    iterationCount: number;
    featuresImplemented: number;
    durationSeconds: number;
    error: string | null;
    securityFindings: SecurityFinding[];
    createdAt: string;
    completedAt: string | null;
}

export interface NewEntryFields {
    prompt: string;
    language: string;
    features?: string[];
    status: WorkflowStatus;
}

export interface EntryUpdate {
    status?: WorkflowStatus;
    generatedCode?: string;
    bugReport?: string;
    iterationCount?: number;
    featuresImplemented?: number;
    durationSeconds?: number;
    error?: string;
    completedAt?: string;
    securityFindings?: SecurityFinding[];
}

export interface VersionInput {
    iteration: number;
    code: string;
    message: string;
    metrics: CodeMetrics;
}

export interface VersionRecord extends VersionInput {
    entryId: string;
    createdAt: string;
}

export interface BugReportInput {
    iteration: number;
    modelId: string;
    report: string;
    severity: BugSeverity;
}

export interface BugReportRecord extends BugReportInput {
    entryId: string;
    createdAt: string;
}

/** Persistence the orchestrator depends on. */
export interface WorkflowStore {
    createEntry(fields: NewEntryFields): string | Promise<string>;
    updateEntry(id: string, fields: EntryUpdate): void | Promise<void>;
}

/** Optional per-iteration history. */
export interface RunJournal {
    saveVersion(entryId: string, version: VersionInput): void | Promise<void>;
    recordBugReport(entryId: string, report: BugReportInput): void | Promise<void>;
}

export class WorkflowStoreError extends Error {
    constructor(message: string, public readonly code: 'ENTRY_NOT_FOUND' | 'INVALID_TRANSITION') {
        super(message);
        this.name = 'WorkflowStoreError';
    }
}

/* -------------------------------------------------------------------------- */
/* Row shapes                                                                 */
/* -------------------------------------------------------------------------- */

interface EntryRow {
    id: string;
    prompt: string;
    language: string;
    features: string | null;
    status: WorkflowStatus;
    generated_code: string;
    bug_report: string;
    iteration_count: number;
    features_implemented: number;
    duration: number;
    error: string | null;
    security_findings: string;
    created_at: string;
    completed_at: string | null;
}

interface VersionRow {
    entry_id: string;
    iteration: number;
    code: string;
    message: string;
    quality_score: number;
    cyclomatic_complexity: number;
    halstead_volume: number;
    created_at: string;
}

interface BugReportRow {
    entry_id: string;
    iteration: number;
    model_id: string;
    report: string;
    severity: BugSeverity;
    created_at: string;
}

const SCHEMA_VERSION = 1;

/* -------------------------------------------------------------------------- */
/* SQLite implementation                                                      */
/* -------------------------------------------------------------------------- */

export class SqliteWorkflowStore implements WorkflowStore, RunJournal {
    private readonly db: Database.Database;

    constructor(dbOrPath: Database.Database | string, private readonly now: () => number = Date.now) {
        this.db = typeof dbOrPath === 'string' ? new Database(dbOrPath) : dbOrPath;
        this.configureDatabase();
        this.runMigrations();
    }

    get database(): Database.Database {
        return this.db;
    }

    private configureDatabase(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 5000');
    }

    private runMigrations(): void {
        const tx = this.db.transaction(() => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS schema_version (
                    version INTEGER PRIMARY KEY,
                    applied_at TEXT DEFAULT CURRENT_TIMESTAMP
                )
            `);

            const row = this.db
                .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get() as { version: number } | undefined;

            const current = row?.version ?? 0;

            if (current < 1) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS workflow_entries (
                        id TEXT PRIMARY KEY,
                        prompt TEXT NOT NULL,
                        language TEXT NOT NULL,
                        features TEXT,
                        status TEXT NOT NULL CHECK(status IN ('processing','completed','failed')),
                        generated_code TEXT NOT NULL DEFAULT '',
                        bug_report TEXT NOT NULL DEFAULT '',
                        iteration_count INTEGER NOT NULL DEFAULT 0 CHECK(iteration_count >= 0),
                        features_implemented INTEGER NOT NULL DEFAULT 0 CHECK(features_implemented >= 0),
                        duration REAL NOT NULL DEFAULT 0,
                        error TEXT,
                        security_findings TEXT NOT NULL DEFAULT '[]',
                        created_at TEXT NOT NULL,
                        completed_at TEXT
                    );

                    CREATE TABLE IF NOT EXISTS code_versions (
                        id INTEGER PRIMARY KEY AUTOINCREMENT,
                        entry_id TEXT NOT NULL REFERENCES workflow_entries(id),
                        iteration INTEGER NOT NULL,
                        code TEXT NOT NULL,
                        message TEXT NOT NULL,
                        quality_score REAL NOT NULL,
                        cyclomatic_complexity REAL NOT NULL,
                        halstead_volume REAL NOT NULL,
                        created_at TEXT NOT NULL
                    );
                    CREATE INDEX IF NOT EXISTS idx_code_versions_entry ON code_versions(entry_id);

                    CREATE TABLE IF NOT EXISTS bug_reports (
                        id INTEGER PRIMARY KEY AUTOINCREMENT,
                        entry_id TEXT NOT NULL REFERENCES workflow_entries(id),
                        iteration INTEGER NOT NULL,
                        model_id TEXT NOT NULL,
                        report TEXT NOT NULL,
                        severity TEXT NOT NULL,
                        created_at TEXT NOT NULL
                    );
                    CREATE INDEX IF NOT EXISTS idx_bug_reports_entry ON bug_reports(entry_id);
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
            }
        });
        tx();
    }

    /* ------------------------------------------------------------------------ */
    /* WorkflowStore                                                            */
    /* ------------------------------------------------------------------------ */

    createEntry(fields: NewEntryFields): string {
        const id = crypto.randomUUID();
        this.db.prepare(`
            INSERT INTO workflow_entries (id, prompt, language, features, status, created_at)
            VALUES (?, ?, ?, ?, ?, ?)
        `).run(
            id,
            fields.prompt,
            fields.language,
            fields.features ? JSON.stringify(fields.features) : null,
            fields.status,
            this.nowIso()
        );
        return id;
    }

    updateEntry(id: string, fields: EntryUpdate): void {
        const existing = this.getEntry(id);
        if (!existing) {
            throw new WorkflowStoreError(`Workflow entry not found: ${id}`, 'ENTRY_NOT_FOUND');
        }
        if (existing.status !== 'processing' && fields.status !== undefined && fields.status !== existing.status) {
            throw new WorkflowStoreError(`Entry ${id} is ${existing.status}; cannot move to ${fields.status}`, 'INVALID_TRANSITION');
        }

        const sets: string[] = [];
        const params: Array<string | number> = [];
        const set = (sql: string, value: string | number): void => {
            sets.push(sql);
            params.push(value);
        };

        if (fields.status !== undefined) set('status = ?', fields.status);
        if (fields.generatedCode !== undefined) set('generated_code = ?', fields.generatedCode);
        if (fields.bugReport !== undefined) set('bug_report = ?', fields.bugReport);
        if (fields.iterationCount !== undefined) set('iteration_count = MAX(iteration_count, ?)', fields.iterationCount);
        if (fields.featuresImplemented !== undefined) set('features_implemented = ?', fields.featuresImplemented);
        if (fields.durationSeconds !== undefined) set('duration = ?', fields.durationSeconds);
        if (fields.error !== undefined) set('error = ?', fields.error);
        if (fields.completedAt !== undefined) set('completed_at = ?', fields.completedAt);
        if (fields.securityFindings !== undefined) set('security_findings = ?', JSON.stringify(fields.securityFindings));

        if (sets.length === 0) return;
        params.push(id);
        this.db.prepare(`UPDATE workflow_entries SET ${sets.join(', ')} WHERE id = ?`).run(...params);
    }

    getEntry(id: string): WorkflowEntry | undefined {
        const row = this.db.prepare(`SELECT * FROM workflow_entries WHERE id = ?`).get(id) as EntryRow | undefined;
        if (!row) return undefined;
        return {
            id: row.id,
            prompt: row.prompt,
            language: row.language,
            features: row.features !== null ? parseStringList(row.features) : null,
            status: row.status,
            generatedCode: row.generated_code,
            bugReport: row.bug_report,
            iterationCount: row.iteration_count,
            featuresImplemented: row.features_implemented,
            durationSeconds: row.duration,
            error: row.error,
            securityFindings: parseFindings(row.security_findings),
            createdAt: row.created_at,
            completedAt: row.completed_at,
        };
    }

    /* ------------------------------------------------------------------------ */
    /* RunJournal                                                               */
    /* ------------------------------------------------------------------------ */

    saveVersion(entryId: string, v: VersionInput): void {
        this.db.prepare(`
            INSERT INTO code_versions (entry_id, iteration, code, message, quality_score, cyclomatic_complexity, halstead_volume, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            entryId,
            v.iteration,
            v.code,
            v.message,
            v.metrics.qualityScore,
            v.metrics.cyclomaticComplexity,
            v.metrics.halsteadVolume,
            this.nowIso()
        );
    }

    /** Newest first. */
    getVersions(entryId: string): VersionRecord[] {
        const rows = this.db.prepare(`
            SELECT entry_id, iteration, code, message, quality_score, cyclomatic_complexity, halstead_volume, created_at
            FROM code_versions WHERE entry_id = ?
            ORDER BY created_at DESC, iteration DESC, id DESC
        `).all(entryId) as VersionRow[];

        return rows.map((r) => ({
            entryId: r.entry_id,
            iteration: r.iteration,
            code: r.code,
            message: r.message,
            metrics: {
                qualityScore: r.quality_score,
                cyclomaticComplexity: r.cyclomatic_complexity,
                halsteadVolume: r.halstead_volume,
            },
            createdAt: r.created_at,
        }));
    }

    recordBugReport(entryId: string, r: BugReportInput): void {
        this.db.prepare(`
            INSERT INTO bug_reports (entry_id, iteration, model_id, report, severity, created_at)
            VALUES (?, ?, ?, ?, ?, ?)
        `).run(entryId, r.iteration, r.modelId, r.report, r.severity, this.nowIso());
    }

    /** In the order they were recorded. */
    getBugReports(entryId: string): BugReportRecord[] {
        const rows = this.db.prepare(`
            SELECT entry_id, iteration, model_id, report, severity, created_at
            FROM bug_reports WHERE entry_id = ? ORDER BY id ASC
        `).all(entryId) as BugReportRow[];

        return rows.map((r) => ({
            entryId: r.entry_id,
            iteration: r.iteration,
            modelId: r.model_id,
            report: r.report,
            severity: r.severity,
            createdAt: r.created_at,
        }));
    }

    close(): void {
        this.db.close();
    }

    private nowIso(): string {
        return new Date(this.now()).toISOString();
    }
}

function parseStringList(raw: string): string[] {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((x): x is string => typeof x === 'string') : [];
}

function isFinding(x: unknown): x is SecurityFinding {
    return typeof x === 'object' && x !== null
        && 'kind' in x && typeof x.kind === 'string'
        && 'token' in x && typeof x.token === 'string'
        && 'message' in x && typeof x.message === 'string';
}

function parseFindings(raw: string): SecurityFinding[] {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter(isFinding) : [];
}
