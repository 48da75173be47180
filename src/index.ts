/**
 * Main entry point - exports all public APIs
 */

export { WorkflowOrchestrator, createRefiner } from './workflow_orchestrator';
export type {
    WorkflowState,
    WorkflowResult,
    FeatureWorkflowResult,
    OrchestratorOptions,
    Refiner,
    RefinerOverrides,
} from './workflow_orchestrator';
export { LlmClient, ACTION_TASK, sanitizeErrorSnippet } from './llm_client';
export type { LlmAction, LlmResult, LlmSuccess, LlmFailure, LlmErrorCode, CallContext, LlmClientOptions } from './llm_client';
export { ModelSelector, ModelSelectorState } from './model_selector';
export type { ModelSelectorOptions } from './model_selector';
export { RateLimiter, estimateTokens, RATE_WINDOW_MS } from './rate_limiter';
export type { RateLimitConfig, RateState, AcquireResult } from './rate_limiter';
export { ResponseCache, cacheKey, normalizeInput } from './response_cache';
export { sanitizePrompt, sanitizeCode, checkCodeSecurity } from './security_sanitizer';
export type { SecurityFinding } from './security_sanitizer';
export { FetchTransport } from './transport';
export type { HttpTransport, HttpRequest, HttpResult } from './transport';
export { SqliteWorkflowStore, WorkflowStoreError } from './workflow_store';
export type { WorkflowStore, RunJournal, WorkflowEntry, WorkflowStatus, EntryUpdate, NewEntryFields } from './workflow_store';
export { SqliteAnalytics } from './analytics';
export type { AnalyticsSink, ApiCallRecord, CompletionRecord, UsageRow } from './analytics';
export { measure, qualityScore, cyclomaticComplexity, halsteadVolume, classifySeverity } from './code_metrics';
export type { CodeMetrics, BugSeverity } from './code_metrics';
export { loadConfig, resolveConfig, DEFAULTS, TASK_TYPES, ROTATION_STRATEGIES } from './config';
export type { RefinerConfig, ModelConfig, TaskType, RotationStrategy, RetryPolicy } from './config';
export { handleGenerateRequest, parseGenerateRequest } from './trigger';
export type { GenerateRequest, TriggerResponse } from './trigger';
export { createLogger } from './logger';
export type { Logger, LogLevel, LogSink } from './logger';
export { SchemaValidator } from './schema_validator';
export type { ValidationResult, JsonSchema } from './schema_validator';
export {
    RefinerError,
    RateLimitExceededError,
    ApiError,
    NoModelsConfiguredError,
    PersistenceError,
    ConfigError,
    InvalidRequestError,
    toErrorPayload,
} from './structured_error';
export type { ErrorCode, ErrorPayload } from './structured_error';
