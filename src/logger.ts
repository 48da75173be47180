/**
 * Structured Logger for the refinement engine
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when REFINER_LOG_JSON=1
 * - Optional file output via REFINER_LOG_FILE
 * - Component name on every line
 * - Bound run context (entry id, task, model) via withContext()
 *
 * Environment:
 *   REFINER_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   REFINER_LOG_JSON   = 1 (default: text)
 *   REFINER_LOG_FILE   = path (optional, appends)
 *   REFINER_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'info').toLowerCase();
    return v === 'debug' || v === 'warn' || v === 'error' ? v : 'info';
}

const DEBUG_OVERRIDE = process.env.REFINER_DEBUG === '1' || process.env.REFINER_DEBUG === 'true';
const ENV_MIN_LEVEL: LogLevel = DEBUG_OVERRIDE ? 'debug' : parseLevel(process.env.REFINER_LOG_LEVEL);

const JSON_MODE = process.env.REFINER_LOG_JSON === '1';
const LOG_FILE = process.env.REFINER_LOG_FILE || '';

/** Receives one fully formatted line. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
    context?: Record<string, unknown>;
    sink?: LogSink;
    minLevel?: LogLevel;
    json?: boolean;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function defaultSink(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (err) {
            process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${String(err)}\n`);
        }
    }
}

function formatLine(
    level: LogLevel,
    component: string,
    message: string,
    context: Record<string, unknown>,
    data: Record<string, unknown> | undefined,
    json: boolean
): string {
    const ts = new Date().toISOString();

    if (json) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message, ...context };
        if (data) entry.data = data;
        return JSON.stringify(entry);
    }

    const entryId = typeof context.entryId === 'string' ? context.entryId : '';
    const ctx = entryId ? ` [${entryId.slice(0, 8)}]` : '';
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
    return data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
    withContext(context: Record<string, unknown>): Logger;
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
    const context = options.context ?? {};
    const sink = options.sink ?? defaultSink;
    const min = LEVEL_ORDER[options.minLevel ?? ENV_MIN_LEVEL];
    const json = options.json ?? JSON_MODE;

    const emit = (level: LogLevel, msg: string, data?: Record<string, unknown>): void => {
        if (LEVEL_ORDER[level] < min) return;
        sink(level, formatLine(level, component, msg, context, data, json));
    };

    return {
        debug: (msg, data) => emit('debug', msg, data),
        info:  (msg, data) => emit('info',  msg, data),
        warn:  (msg, data) => emit('warn',  msg, data),
        error: (msg, data) => emit('error', msg, data),
        child: (sub) => createLogger(`${component}:${sub}`, options),
        withContext: (extra) => createLogger(component, { ...options, context: { ...context, ...extra } }),
    };
}

/** Error value → loggable fields. */
export function errorFields(err: unknown): Record<string, unknown> {
    if (err instanceof Error) {
        return { error: err.message, error_name: err.name };
    }
    return { error: String(err) };
}
