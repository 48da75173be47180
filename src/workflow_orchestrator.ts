// workflow_orchestrator.ts - drives generate -> (check <-> fix)* [-> feature]* for one entry
//
// GUARANTEES:
// - One run mutates only its own entry; a second run can never claim the same entry id
// - iterationCount only grows and never exceeds maxIterations
// - Checking, fixing and feature failures are logged and skipped; generation and
//   persistence failures mark the entry failed and are rethrown
// - Progress is persisted after every iteration, so a failed entry keeps its last code

import * as fs from 'fs';
import * as path from 'path';
import { AnalyticsSink, SqliteAnalytics } from './analytics';
import { classifySeverity, measure } from './code_metrics';
import { DEFAULTS, ModelConfig, RefinerConfig, RetryPolicy, TaskType } from './config';
import { CallContext, LlmAction, LlmClient, LlmResult } from './llm_client';
import { createLogger, errorFields, Logger } from './logger';
import { ModelSelector, ModelSelectorState } from './model_selector';
import { getFeaturePrompt, getFixPrompt } from './prompts';
import { RateLimiter } from './rate_limiter';
import { ResponseCache } from './response_cache';
import { checkCodeSecurity, sanitizeCode, sanitizePrompt } from './security_sanitizer';
import { PersistenceError } from './structured_error';
import { FetchTransport, HttpTransport } from './transport';
import { EntryUpdate, NewEntryFields, RunJournal, SqliteWorkflowStore, WorkflowStore } from './workflow_store';

// ============================================================================
// Types
// ============================================================================

export type WorkflowState =
    | 'created'
    | 'generating'
    | 'checking'
    | 'fixing'
    | 'feature_injection'
    | 'completed'
    | 'failed';

export interface WorkflowResult {
    entryId: string;
    code: string;
    iterations: number;
    /** Seconds. */
    duration: number;
}

export interface FeatureWorkflowResult extends WorkflowResult {
    featuresImplemented: number;
}

export interface OrchestratorOptions {
    client: LlmClient;
    selector: ModelSelector;
    store: WorkflowStore;
    journal?: RunJournal;
    analytics?: AnalyticsSink;
    logger?: Logger;
    maxIterations?: number;
    iterationLimit?: number;
    retry?: RetryPolicy;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

interface RunContext {
    entryId: string;
    state: WorkflowState;
    code: string;
    bugReport: string;
    iterationCount: number;
    featuresImplemented: number;
    log: Logger;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

// ============================================================================
// WorkflowOrchestrator
// ============================================================================

export class WorkflowOrchestrator {
    private readonly log: Logger;
    private readonly maxIterations: number;
    private readonly iterationLimit: number;
    private readonly retry: RetryPolicy;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly activeEntries = new Set<string>();

    constructor(private readonly opts: OrchestratorOptions) {
        this.log = opts.logger ?? createLogger('orchestrator');
        this.maxIterations = opts.maxIterations ?? DEFAULTS.MAX_ITERATIONS;
        this.iterationLimit = opts.iterationLimit ?? DEFAULTS.ITERATION_LIMIT;
        this.retry = opts.retry ?? DEFAULTS.RETRY;
        this.now = opts.now ?? Date.now;
        this.sleep = opts.sleep ?? defaultSleep;
    }

    /**
     * Generate code for `prompt`, then alternate bug checks and fixes until a
     * check comes back clean or maxIterations is reached.
     */
    async runWorkflow(prompt: string, language = 'python'): Promise<WorkflowResult> {
        const started = this.now();
        const run = await this.begin({ prompt, language, status: 'processing' });
        run.log.info('Starting workflow', { language, max_iterations: this.maxIterations });

        try {
            await this.generate(run, prompt, language);

            while (run.iterationCount < this.maxIterations) {
                const clean = await this.checkAndFix(run, language);
                run.iterationCount++;
                await this.saveProgress(run, clean ? 'no bugs found' : 'applied fixes');
                if (clean) {
                    run.log.info('Code judged bug-free', { iteration: run.iterationCount });
                    break;
                }
            }

            const duration = await this.complete(run, started, false);
            return { entryId: run.entryId, code: run.code, iterations: run.iterationCount, duration };
        } catch (err) {
            await this.fail(run, started, err);
            throw err;
        } finally {
            this.activeEntries.delete(run.entryId);
        }
    }

    /**
     * Like runWorkflow, but always runs maxIterations passes and injects the
     * next feature on every iterationLimit-th pass.
     */
    async generateFeatureEnhancedCode(prompt: string, features: string[], language = 'python'): Promise<FeatureWorkflowResult> {
        const started = this.now();
        const run = await this.begin({ prompt, language, features, status: 'processing' });
        run.log.info('Starting feature-enhanced workflow', {
            language,
            features: features.length,
            max_iterations: this.maxIterations,
            iteration_limit: this.iterationLimit,
        });

        let featureIndex = 0;
        try {
            await this.generate(run, prompt, language);

            for (let pass = 0; pass < this.maxIterations; pass++) {
                await this.checkAndFix(run, language);

                const ordinal = run.iterationCount + 1;
                let message = 'check/fix pass';
                if (ordinal % this.iterationLimit === 0 && featureIndex < features.length) {
                    const feature = features[featureIndex];
                    // Advances even when the call fails.
                    featureIndex++;
                    run.featuresImplemented = featureIndex;
                    await this.applyFeature(run, feature, language);
                    message = `feature: ${feature}`;
                }

                run.iterationCount++;
                await this.saveProgress(run, message);
            }

            const duration = await this.complete(run, started, true);
            return {
                entryId: run.entryId,
                code: run.code,
                iterations: run.iterationCount,
                featuresImplemented: run.featuresImplemented,
                duration,
            };
        } catch (err) {
            await this.fail(run, started, err);
            throw err;
        } finally {
            this.activeEntries.delete(run.entryId);
        }
    }

    /**
     * Ask every checking model about `code` and join the non-empty reports.
     * A model that fails is skipped.
     */
    async checkBugs(code: string, language: string, ctx: CallContext = {}): Promise<string> {
        const log = ctx.entryId ? this.log.withContext({ entryId: ctx.entryId }) : this.log;
        const input = sanitizeCode(code);
        const reports: string[] = [];

        for (const model of this.opts.selector.modelsFor('checking')) {
            const res = await this.callModel(model, input, 'check_bugs', language, ctx, log);
            if (!res.ok) {
                log.warn(`Bug checking failed for model ${model.id}`, { code: res.errorCode, error: res.message });
                continue;
            }
            const report = res.text.trim();
            if (!report) continue;

            reports.push(report);
            if (ctx.entryId && this.opts.journal) {
                const journal = this.opts.journal;
                const entryId = ctx.entryId;
                await this.persist('recordBugReport', () => journal.recordBugReport(entryId, {
                    iteration: ctx.iteration ?? 0,
                    modelId: model.id,
                    report,
                    severity: classifySeverity(report),
                }));
            }
        }

        return reports.join('\n\n');
    }

    // ------------------------------------------------------------------------
    // Steps
    // ------------------------------------------------------------------------

    private async begin(fields: NewEntryFields): Promise<RunContext> {
        const entryId = await this.persist('createEntry', () => this.opts.store.createEntry(fields));
        if (this.activeEntries.has(entryId)) {
            throw new PersistenceError('createEntry', new Error(`entry ${entryId} is already being processed`));
        }
        this.activeEntries.add(entryId);

        const run: RunContext = {
            entryId,
            state: 'created',
            code: '',
            bugReport: '',
            iterationCount: 0,
            featuresImplemented: 0,
            log: this.log.withContext({ entryId }),
        };
        this.transition(run, 'created');
        return run;
    }

    private async generate(run: RunContext, prompt: string, language: string): Promise<void> {
        this.transition(run, 'generating');
        const model = this.opts.selector.select('generation');
        const res = await this.callModel(model, sanitizePrompt(prompt), 'generate', language, this.ctx(run), run.log);
        if (!res.ok) {
            throw res.error;
        }
        run.code = res.text;
        await this.journalVersion(run, 'initial generation');
    }

    /** One check/fix sub-step. Returns true when the aggregate report is empty. */
    private async checkAndFix(run: RunContext, language: string): Promise<boolean> {
        this.transition(run, 'checking');
        const report = await this.checkBugs(run.code, language, this.ctx(run));
        run.bugReport = report;
        if (report.trim() === '') {
            return true;
        }

        this.transition(run, 'fixing');
        const res = await this.callSelected(run, 'fixing', getFixPrompt(run.code, report), 'fix', language);
        if (res.ok) {
            run.code = res.text;
        } else {
            run.log.warn('Fix failed; keeping previous code', { model: res.modelId, code: res.errorCode, error: res.message });
        }
        return false;
    }

    private async applyFeature(run: RunContext, feature: string, language: string): Promise<void> {
        this.transition(run, 'feature_injection');
        const res = await this.callSelected(run, 'feature', getFeaturePrompt(run.code, feature), 'apply_feature', language);
        if (res.ok) {
            run.code = res.text;
        } else {
            run.log.warn('Feature injection failed; keeping previous code', {
                feature,
                model: res.modelId,
                code: res.errorCode,
                error: res.message,
            });
        }
    }

    private async saveProgress(run: RunContext, message: string): Promise<void> {
        const update: EntryUpdate = {
            generatedCode: run.code,
            bugReport: run.bugReport,
            iterationCount: run.iterationCount,
            featuresImplemented: run.featuresImplemented,
        };
        await this.persist('updateEntry', () => this.opts.store.updateEntry(run.entryId, update));
        await this.journalVersion(run, message);
    }

    private async journalVersion(run: RunContext, message: string): Promise<void> {
        const journal = this.opts.journal;
        if (!journal) return;
        const version = { iteration: run.iterationCount, code: run.code, message, metrics: measure(run.code) };
        await this.persist('saveVersion', () => journal.saveVersion(run.entryId, version));
    }

    private async complete(run: RunContext, started: number, withFeatures: boolean): Promise<number> {
        const duration = (this.now() - started) / 1000;
        const findings = checkCodeSecurity(run.code);
        if (findings.length > 0) {
            run.log.warn('Security findings in final code', { findings: findings.map((f) => f.message) });
        }

        await this.persist('updateEntry', () => this.opts.store.updateEntry(run.entryId, {
            generatedCode: run.code,
            bugReport: run.bugReport,
            iterationCount: run.iterationCount,
            featuresImplemented: run.featuresImplemented,
            status: 'completed',
            completedAt: new Date(this.now()).toISOString(),
            durationSeconds: duration,
            securityFindings: findings,
        }));
        this.transition(run, 'completed');

        if (this.opts.analytics) {
            try {
                await this.opts.analytics.logCompletion({
                    entryId: run.entryId,
                    durationSeconds: duration,
                    iterations: run.iterationCount,
                    ...(withFeatures ? { featuresImplemented: run.featuresImplemented } : {}),
                });
            } catch (e) {
                run.log.warn('Analytics completion record failed', errorFields(e));
            }
        }

        run.log.info('Workflow completed', { iterations: run.iterationCount, duration_s: duration });
        return duration;
    }

    private async fail(run: RunContext, started: number, err: unknown): Promise<void> {
        this.transition(run, 'failed');
        run.log.error('Workflow failed', { iteration: run.iterationCount, ...errorFields(err) });
        try {
            await this.opts.store.updateEntry(run.entryId, {
                status: 'failed',
                error: err instanceof Error ? err.message : String(err),
                generatedCode: run.code,
                bugReport: run.bugReport,
                iterationCount: run.iterationCount,
                featuresImplemented: run.featuresImplemented,
                durationSeconds: (this.now() - started) / 1000,
                completedAt: new Date(this.now()).toISOString(),
            });
        } catch (updateErr) {
            run.log.error('Could not mark entry failed', errorFields(updateErr));
        }
    }

    // ------------------------------------------------------------------------
    // Calls
    // ------------------------------------------------------------------------

    private callSelected(run: RunContext, task: TaskType, input: string, action: LlmAction, language: string): Promise<LlmResult> {
        const model = this.opts.selector.select(task);
        return this.callModel(model, input, action, language, this.ctx(run), run.log);
    }

    /** One client call, repeated on retryable failures up to retry.maxAttempts. */
    private async callModel(
        model: ModelConfig,
        input: string,
        action: LlmAction,
        language: string,
        ctx: CallContext,
        log: Logger
    ): Promise<LlmResult> {
        const attempts = Math.max(1, this.retry.maxAttempts);
        let res = await this.opts.client.call(model, input, action, language, ctx);

        for (let attempt = 1; attempt < attempts && !res.ok && res.retryable; attempt++) {
            const backoff = this.retry.backoffMs;
            const delay = backoff.length > 0 ? backoff[Math.min(attempt - 1, backoff.length - 1)] : 0;
            log.warn('Retrying call', { model: model.id, action, attempt: attempt + 1, delay_ms: delay, code: res.errorCode });
            await this.sleep(delay);
            res = await this.opts.client.call(model, input, action, language, ctx);
        }
        return res;
    }

    private ctx(run: RunContext): CallContext {
        return { entryId: run.entryId, iteration: run.iterationCount + 1 };
    }

    private transition(run: RunContext, state: WorkflowState): void {
        run.state = state;
        run.log.info(`State: ${state}`, { iteration: run.iterationCount });
    }

    private async persist<T>(operation: string, fn: () => T | Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (e) {
            if (e instanceof PersistenceError) throw e;
            throw new PersistenceError(operation, e);
        }
    }
}

// ============================================================================
// Wiring
// ============================================================================

export interface RefinerOverrides {
    transport?: HttpTransport;
    logger?: Logger;
    selectorState?: ModelSelectorState;
    random?: () => number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export interface Refiner {
    orchestrator: WorkflowOrchestrator;
    store: SqliteWorkflowStore;
    analytics: SqliteAnalytics;
    client: LlmClient;
    selector: ModelSelector;
    rateLimiter: RateLimiter;
    cache: ResponseCache;
}

/** Build the default engine (SQLite store and analytics, fetch transport) from a resolved config. */
export function createRefiner(config: RefinerConfig, overrides: RefinerOverrides = {}): Refiner {
    const logger = overrides.logger ?? createLogger('refiner');

    if (config.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(config.dbPath), { recursive: true });
    }
    const store = new SqliteWorkflowStore(config.dbPath, overrides.now);
    const analytics = new SqliteAnalytics(store.database, overrides.now);

    const rateLimiter = new RateLimiter({
        limits: config.rateLimits,
        defaultLimit: config.defaultRateLimit,
        now: overrides.now,
        logger: logger.child('rate-limiter'),
    });
    const cache = new ResponseCache({ defaultTtlSeconds: config.cacheTtlSeconds });
    const selector = ModelSelector.fromConfig(config, overrides.selectorState, overrides.random);

    const client = new LlmClient({
        rateLimiter,
        cache,
        transport: overrides.transport ?? new FetchTransport(),
        analytics,
        logger: logger.child('llm-client'),
        requestTimeoutMs: config.requestTimeoutMs,
        cacheTtlSeconds: config.cacheTtlSeconds,
    });

    const orchestrator = new WorkflowOrchestrator({
        client,
        selector,
        store,
        journal: store,
        analytics,
        logger: logger.child('orchestrator'),
        maxIterations: config.maxIterations,
        iterationLimit: config.iterationLimit,
        retry: config.retry,
        now: overrides.now,
        sleep: overrides.sleep,
    });

    return { orchestrator, store, analytics, client, selector, rateLimiter, cache };
}
