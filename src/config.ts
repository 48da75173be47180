/**
 * Shared Configuration
 *
 * Typed configuration for the refinement engine. Values come from, in order
 * of precedence: REFINER_* environment variables, a JSON config file, and the
 * defaults below. Everything is validated eagerly: a bad config fails at load
 * time, never halfway through a run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { RateLimitConfig } from './rate_limiter';
import { SchemaValidator, JsonSchema } from './schema_validator';
import { ConfigError, NoModelsConfiguredError } from './structured_error';

export const TASK_TYPES = ['generation', 'checking', 'fixing', 'feature'] as const;
export type TaskType = (typeof TASK_TYPES)[number];

export const ROTATION_STRATEGIES = ['round_robin', 'random', 'weighted'] as const;
export type RotationStrategy = (typeof ROTATION_STRATEGIES)[number];

export interface TaskDefaults {
    temperature: number;
    maxTokens: number;
}

export interface ModelConfig {
    id: string;
    endpoint: string;
    credential: string;
    temperature: number;
    maxTokens: number;
    /** Per-task overrides of temperature / maxTokens. */
    tasks: Partial<Record<TaskType, Partial<TaskDefaults>>>;
    weight: number;
}

export interface RetryPolicy {
    /** 1 = no retry. */
    maxAttempts: number;
    backoffMs: number[];
}

export interface RefinerConfig {
    maxIterations: number;
    iterationLimit: number;
    rotationStrategy: RotationStrategy;
    models: Record<string, ModelConfig>;
    taskModels: Record<TaskType, string[]>;
    rateLimits: Record<string, RateLimitConfig>;
    defaultRateLimit: RateLimitConfig;
    cacheTtlSeconds: number;
    requestTimeoutMs: number;
    retry: RetryPolicy;
    dbPath: string;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULTS = {
    MAX_ITERATIONS: 5,
    ITERATION_LIMIT: 3,
    TEMPERATURE: 0.7,
    MAX_TOKENS: 2000,
    WEIGHT: 1,
    CACHE_TTL_SECONDS: 3600,
    REQUEST_TIMEOUT_MS: 30_000,
    RATE_LIMIT: { callsPerMinute: 60, tokensPerMinute: 10_000 } satisfies RateLimitConfig,
    RETRY: { maxAttempts: 1, backoffMs: [1000, 2000, 4000] } satisfies RetryPolicy,
    TASK_MODELS: {
        generation: ['claude', 'gemini'],
        checking: ['claude', 'gemini'],
        fixing: ['claude'],
        feature: ['claude'],
    } satisfies Record<TaskType, string[]>,
};

const DEFAULT_ROTATION_STRATEGY: RotationStrategy = 'round_robin';

export const LIMITS = {
    MAX_ITERATIONS: { min: 1, max: 20 },
    ITERATION_LIMIT: { min: 1, max: 10 },
};

export function defaultConfigDir(): string {
    return path.join(process.env.HOME || process.env.USERPROFILE || '', '.refiner');
}

export function defaultConfigPath(): string {
    return path.join(defaultConfigDir(), 'config.json');
}

// ============================================================================
// File schema
// ============================================================================

const TASK_DEFAULTS_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        temperature: { type: 'number', minimum: 0, maximum: 2 },
        maxTokens: { type: 'integer', minimum: 1 },
    },
};

const CONFIG_FILE_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        maxIterations: { type: 'integer', minimum: LIMITS.MAX_ITERATIONS.min, maximum: LIMITS.MAX_ITERATIONS.max },
        iterationLimit: { type: 'integer', minimum: LIMITS.ITERATION_LIMIT.min, maximum: LIMITS.ITERATION_LIMIT.max },
        rotationStrategy: { type: 'string', enum: ROTATION_STRATEGIES },
        models: {
            type: 'object',
            additionalProperties: {
                type: 'object',
                required: ['endpoint'],
                properties: {
                    endpoint: { type: 'string', pattern: '^https?://' },
                    temperature: { type: 'number', minimum: 0, maximum: 2 },
                    maxTokens: { type: 'integer', minimum: 1 },
                    weight: { type: 'number', minimum: 0 },
                    tasks: {
                        type: 'object',
                        properties: Object.fromEntries(TASK_TYPES.map((t): [string, JsonSchema] => [t, TASK_DEFAULTS_SCHEMA])),
                    },
                },
            },
        },
        credentials: { type: 'object', additionalProperties: { type: 'string' } },
        weights: { type: 'object', additionalProperties: { type: 'number', minimum: 0 } },
        taskModels: {
            type: 'object',
            properties: Object.fromEntries(
                TASK_TYPES.map((t): [string, JsonSchema] => [t, { type: 'array', items: { type: 'string', minLength: 1 } }])
            ),
        },
        rateLimits: {
            type: 'object',
            additionalProperties: {
                type: 'object',
                required: ['callsPerMinute', 'tokensPerMinute'],
                properties: {
                    callsPerMinute: { type: 'integer', minimum: 1 },
                    tokensPerMinute: { type: 'integer', minimum: 1 },
                },
            },
        },
        cacheTtlSeconds: { type: 'integer', minimum: 0 },
        requestTimeoutMs: { type: 'integer', minimum: 1 },
        retry: {
            type: 'object',
            properties: {
                maxAttempts: { type: 'integer', minimum: 1, maximum: 10 },
                backoffMs: { type: 'array', items: { type: 'integer', minimum: 0 } },
            },
        },
        dbPath: { type: 'string', minLength: 1 },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('refiner-config', CONFIG_FILE_SCHEMA);

// ============================================================================
// Narrowing helpers (the file has passed schema validation by then)
// ============================================================================

type Rec = Record<string, unknown>;

function isRecord(value: unknown): value is Rec {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rec(obj: Rec, key: string): Rec {
    const v = obj[key];
    return isRecord(v) ? v : {};
}

function num(obj: Rec, key: string): number | undefined {
    const v = obj[key];
    return typeof v === 'number' ? v : undefined;
}

function str(obj: Rec, key: string): string | undefined {
    const v = obj[key];
    return typeof v === 'string' ? v : undefined;
}

function strList(obj: Rec, key: string): string[] | undefined {
    const v = obj[key];
    return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : undefined;
}

function numList(obj: Rec, key: string): number[] | undefined {
    const v = obj[key];
    return Array.isArray(v) ? v.filter((x): x is number => typeof x === 'number') : undefined;
}

function isRotationStrategy(v: string): v is RotationStrategy {
    return ROTATION_STRATEGIES.some((s) => s === v);
}

export function credentialEnvName(modelId: string): string {
    return `REFINER_CREDENTIAL_${modelId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const n = Number(raw);
    if (!Number.isInteger(n)) {
        throw new ConfigError(`${name} must be an integer, got '${raw}'`);
    }
    return n;
}

function checkRange(name: string, value: number, range: { min: number; max: number }): void {
    if (value < range.min || value > range.max) {
        throw new ConfigError(`${name} must be between ${range.min} and ${range.max}, got ${value}`);
    }
}

function resolveTasks(raw: Rec): ModelConfig['tasks'] {
    const tasks: ModelConfig['tasks'] = {};
    for (const t of TASK_TYPES) {
        const entry = raw[t];
        if (!isRecord(entry)) continue;
        const temperature = num(entry, 'temperature');
        const maxTokens = num(entry, 'maxTokens');
        tasks[t] = {
            ...(temperature !== undefined ? { temperature } : {}),
            ...(maxTokens !== undefined ? { maxTokens } : {}),
        };
    }
    return tasks;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Validate a parsed config file and merge it with env overrides and defaults.
 * Throws ConfigError on schema or range violations and NoModelsConfiguredError
 * when any task type ends up with an empty model list.
 */
export function resolveConfig(file: unknown = {}, env: NodeJS.ProcessEnv = process.env): RefinerConfig {
    if (!isRecord(file)) {
        throw new ConfigError('Config must be a JSON object');
    }

    const check = validator.validate(file, 'refiner-config');
    if (!check.valid) {
        const problems = check.errors.map((e) => `${e.path || '<root>'}: ${e.message}`);
        throw new ConfigError(`Invalid config: ${problems.join('; ')}`, problems);
    }

    const maxIterations = envInt(env, 'REFINER_MAX_ITERATIONS') ?? num(file, 'maxIterations') ?? DEFAULTS.MAX_ITERATIONS;
    const iterationLimit = envInt(env, 'REFINER_ITERATION_LIMIT') ?? num(file, 'iterationLimit') ?? DEFAULTS.ITERATION_LIMIT;
    checkRange('maxIterations', maxIterations, LIMITS.MAX_ITERATIONS);
    checkRange('iterationLimit', iterationLimit, LIMITS.ITERATION_LIMIT);

    const strategyRaw = env.REFINER_ROTATION_STRATEGY || str(file, 'rotationStrategy') || DEFAULT_ROTATION_STRATEGY;
    if (!isRotationStrategy(strategyRaw)) {
        throw new ConfigError(`Unknown rotation strategy '${strategyRaw}' (expected ${ROTATION_STRATEGIES.join('|')})`);
    }

    const fileTaskModels = rec(file, 'taskModels');
    const taskList = (t: TaskType): string[] => {
        const list = strList(fileTaskModels, t) ?? [...DEFAULTS.TASK_MODELS[t]];
        if (list.length === 0) {
            throw new NoModelsConfiguredError(t);
        }
        return list;
    };
    const taskModels: Record<TaskType, string[]> = {
        generation: taskList('generation'),
        checking: taskList('checking'),
        fixing: taskList('fixing'),
        feature: taskList('feature'),
    };

    const fileModels = rec(file, 'models');
    const credentials = rec(file, 'credentials');
    const weights = rec(file, 'weights');
    const referenced = new Set<string>(TASK_TYPES.flatMap((t) => taskModels[t]));

    const models: Record<string, ModelConfig> = {};
    for (const id of new Set([...Object.keys(fileModels), ...referenced])) {
        const raw = rec(fileModels, id);
        const endpoint = str(raw, 'endpoint');
        if (!endpoint) {
            throw new ConfigError(`Model '${id}' is used by a task but has no endpoint configured`);
        }
        models[id] = {
            id,
            endpoint,
            credential: env[credentialEnvName(id)] ?? str(credentials, id) ?? '',
            temperature: num(raw, 'temperature') ?? DEFAULTS.TEMPERATURE,
            maxTokens: num(raw, 'maxTokens') ?? DEFAULTS.MAX_TOKENS,
            tasks: resolveTasks(rec(raw, 'tasks')),
            weight: num(weights, id) ?? num(raw, 'weight') ?? DEFAULTS.WEIGHT,
        };
    }

    const rateLimits: Record<string, RateLimitConfig> = {};
    for (const [id, value] of Object.entries(rec(file, 'rateLimits'))) {
        if (!isRecord(value)) continue;
        rateLimits[id] = {
            callsPerMinute: num(value, 'callsPerMinute') ?? DEFAULTS.RATE_LIMIT.callsPerMinute,
            tokensPerMinute: num(value, 'tokensPerMinute') ?? DEFAULTS.RATE_LIMIT.tokensPerMinute,
        };
    }

    const retryRaw = rec(file, 'retry');

    return {
        maxIterations,
        iterationLimit,
        rotationStrategy: strategyRaw,
        models,
        taskModels,
        rateLimits,
        defaultRateLimit: { ...DEFAULTS.RATE_LIMIT },
        cacheTtlSeconds: num(file, 'cacheTtlSeconds') ?? DEFAULTS.CACHE_TTL_SECONDS,
        requestTimeoutMs: num(file, 'requestTimeoutMs') ?? DEFAULTS.REQUEST_TIMEOUT_MS,
        retry: {
            maxAttempts: num(retryRaw, 'maxAttempts') ?? DEFAULTS.RETRY.maxAttempts,
            backoffMs: numList(retryRaw, 'backoffMs') ?? [...DEFAULTS.RETRY.backoffMs],
        },
        dbPath: env.REFINER_DB_PATH || str(file, 'dbPath') || path.join(defaultConfigDir(), 'refiner.db'),
    };
}

/** Read a JSON config file (if present) and resolve it. */
export function loadConfig(opts: { path?: string; env?: NodeJS.ProcessEnv } = {}): RefinerConfig {
    const env = opts.env ?? process.env;
    const configPath = opts.path ?? env.REFINER_CONFIG ?? defaultConfigPath();

    let parsed: unknown = {};
    if (fs.existsSync(configPath)) {
        try {
            parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
        } catch (e) {
            throw new ConfigError(`Cannot parse config file ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
        }
    } else if (opts.path) {
        throw new ConfigError(`Config file not found: ${configPath}`);
    }

    return resolveConfig(parsed, env);
}

/** Models that will be called without a credential. */
export function missingCredentials(config: RefinerConfig): string[] {
    return Object.values(config.models)
        .filter((m) => !m.credential)
        .map((m) => m.id);
}

/**
 * Effective sampling parameters for one task on one model.
 */
export function taskDefaults(model: ModelConfig, task: TaskType): TaskDefaults {
    const override = model.tasks[task] ?? {};
    return {
        temperature: override.temperature ?? model.temperature,
        maxTokens: override.maxTokens ?? model.maxTokens,
    };
}
