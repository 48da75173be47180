/**
 * Trigger adapter: maps a generate request body onto a workflow run and the
 * outcome onto a status code and JSON body. Transport-agnostic; an HTTP
 * server or queue consumer calls handleGenerateRequest with the parsed body.
 */

import { createLogger, errorFields, Logger } from './logger';
import { SchemaValidator, JsonSchema } from './schema_validator';
import { ErrorPayload, InvalidRequestError, toErrorPayload } from './structured_error';
import { WorkflowOrchestrator } from './workflow_orchestrator';

export interface GenerateRequest {
    prompt: string;
    language?: string;
    features?: string[];
}

export interface GenerateResponseBody {
    code: string;
    iterations: number;
    duration: number;
    features_implemented: number;
}

export type TriggerResponse =
    | { status: 200; body: GenerateResponseBody }
    | { status: 400 | 500; body: ErrorPayload };

export type WorkflowRunner = Pick<WorkflowOrchestrator, 'runWorkflow' | 'generateFeatureEnhancedCode'>;

const REQUEST_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['prompt'],
    properties: {
        prompt: { type: 'string', minLength: 1 },
        language: { type: 'string', minLength: 1 },
        features: { type: 'array', items: { type: 'string', minLength: 1 } },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('generate-request', REQUEST_SCHEMA);

/** Validate an untrusted body. Throws InvalidRequestError. */
export function parseGenerateRequest(body: unknown): GenerateRequest {
    const check = validator.validate(body, 'generate-request');
    if (!check.valid) {
        const problems = check.errors.map((e) => `${e.path || '<root>'}: ${e.message}`);
        throw new InvalidRequestError(`Invalid request: ${problems.join('; ')}`);
    }
    if (typeof body !== 'object' || body === null) {
        throw new InvalidRequestError('Invalid request: expected an object');
    }

    const prompt = 'prompt' in body && typeof body.prompt === 'string' ? body.prompt : '';
    if (prompt.trim() === '') {
        throw new InvalidRequestError('Invalid request: prompt must not be blank');
    }
    const language = 'language' in body && typeof body.language === 'string' ? body.language : undefined;
    const features = 'features' in body && Array.isArray(body.features)
        ? body.features.filter((f): f is string => typeof f === 'string')
        : undefined;

    return {
        prompt,
        ...(language !== undefined ? { language } : {}),
        ...(features !== undefined ? { features } : {}),
    };
}

export async function handleGenerateRequest(
    orchestrator: WorkflowRunner,
    body: unknown,
    logger: Logger = createLogger('trigger')
): Promise<TriggerResponse> {
    let request: GenerateRequest;
    try {
        request = parseGenerateRequest(body);
    } catch (err) {
        logger.warn('Rejected generate request', errorFields(err));
        return { status: 400, body: toErrorPayload(err) };
    }

    const language = request.language ?? 'python';
    try {
        if (request.features && request.features.length > 0) {
            const result = await orchestrator.generateFeatureEnhancedCode(request.prompt, request.features, language);
            return {
                status: 200,
                body: {
                    code: result.code,
                    iterations: result.iterations,
                    duration: result.duration,
                    features_implemented: result.featuresImplemented,
                },
            };
        }

        const result = await orchestrator.runWorkflow(request.prompt, language);
        return {
            status: 200,
            body: { code: result.code, iterations: result.iterations, duration: result.duration, features_implemented: 0 },
        };
    } catch (err) {
        logger.error('Generate request failed', errorFields(err));
        return { status: 500, body: toErrorPayload(err) };
    }
}
