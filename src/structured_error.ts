/**
 * Structured errors for the refinement engine
 *
 * Every failure that crosses a component boundary is a RefinerError with a
 * machine-readable code. Inside the refinement loops, failures travel as
 * result values instead (see llm_client.ts) so that individual backend
 * failures can be dropped without unwinding a run.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Budget/limits
    | 'RATE_LIMIT_EXCEEDED'

    // Backend errors (transport, HTTP status, explicit API error)
    | 'API_ERROR'

    // Configuration
    | 'NO_MODELS_CONFIGURED'
    | 'INVALID_CONFIG'

    // Infrastructure
    | 'PERSISTENCE_ERROR'

    // Trigger input
    | 'INVALID_REQUEST';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

const FATAL_CODES: ErrorCode[] = ['NO_MODELS_CONFIGURED', 'INVALID_CONFIG', 'PERSISTENCE_ERROR'];
const WARNING_CODES: ErrorCode[] = ['RATE_LIMIT_EXCEEDED'];

export function getSeverity(code: ErrorCode): Severity {
    if (FATAL_CODES.includes(code)) return 'FATAL';
    if (WARNING_CODES.includes(code)) return 'WARNING';
    return 'ERROR';
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class RefinerError extends Error {
    public readonly severity: Severity;
    public readonly timestamp: string;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly retryable: boolean = false,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'RefinerError';
        this.severity = getSeverity(code);
        this.timestamp = new Date().toISOString();
    }
}

export class RateLimitExceededError extends RefinerError {
    constructor(public readonly modelId: string, public readonly limit: string) {
        super('RATE_LIMIT_EXCEEDED', `Rate limit exceeded for model ${modelId} (${limit})`, true, { model_id: modelId, limit });
        this.name = 'RateLimitExceededError';
    }
}

export class ApiError extends RefinerError {
    constructor(
        message: string,
        public readonly modelId: string,
        public readonly httpStatus: number | null = null,
        retryable = false
    ) {
        super('API_ERROR', message, retryable, { model_id: modelId, http_status: httpStatus });
        this.name = 'ApiError';
    }
}

export class NoModelsConfiguredError extends RefinerError {
    constructor(public readonly taskType: string) {
        super('NO_MODELS_CONFIGURED', `No models configured for task type '${taskType}'`, false, { task_type: taskType });
        this.name = 'NoModelsConfiguredError';
    }
}

export class PersistenceError extends RefinerError {
    constructor(operation: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super('PERSISTENCE_ERROR', `Persistence failure during ${operation}: ${reason}`, false, { operation });
        this.name = 'PersistenceError';
    }
}

export class ConfigError extends RefinerError {
    constructor(message: string, public readonly problems: string[] = []) {
        super('INVALID_CONFIG', message, false, { problems });
        this.name = 'ConfigError';
    }
}

export class InvalidRequestError extends RefinerError {
    constructor(message: string) {
        super('INVALID_REQUEST', message);
        this.name = 'InvalidRequestError';
    }
}

/* -------------------------------------------------------------------------- */
/* Boundary mapping                                                           */
/* -------------------------------------------------------------------------- */

export interface ErrorPayload {
    error: string;
    code: ErrorCode | 'INTERNAL_ERROR';
}

/** Any thrown value → human-readable payload for the external caller. */
export function toErrorPayload(err: unknown): ErrorPayload {
    if (err instanceof RefinerError) {
        return { error: err.message, code: err.code };
    }
    if (err instanceof Error) {
        return { error: err.message, code: 'INTERNAL_ERROR' };
    }
    return { error: String(err), code: 'INTERNAL_ERROR' };
}
