/**
 * Structured Logger for the value kernel
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when VALUE_KERNEL_LOG_JSON=1
 * - Optional file output via VALUE_KERNEL_LOG_FILE
 * - Component name on every line
 * - Coordination correlation ID propagated through all log entries
 *
 * Environment:
 *   VALUE_KERNEL_LOG_LEVEL  = debug|info|warn|error|silent (default: info)
 *   VALUE_KERNEL_LOG_JSON   = 1 (default: text)
 *   VALUE_KERNEL_LOG_FILE   = path (optional, appends)
 *   VALUE_KERNEL_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function parseLevel(raw: string | undefined): number {
    const key = (raw || 'info').toLowerCase();
    switch (key) {
        case 'debug':
        case 'info':
        case 'warn':
        case 'error':
        case 'silent':
            return LEVEL_ORDER[key];
        default:
            return LEVEL_ORDER.info;
    }
}

const MIN_LEVEL = parseLevel(process.env.VALUE_KERNEL_LOG_LEVEL);
const DEBUG_OVERRIDE = process.env.VALUE_KERNEL_DEBUG === '1' || process.env.VALUE_KERNEL_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.VALUE_KERNEL_LOG_JSON === '1';
const LOG_FILE = process.env.VALUE_KERNEL_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Correlation Context                                                        */
/* -------------------------------------------------------------------------- */

let _correlationId = '';
let _stage = '';

/** Set the active correlation context. Called by the coordinator per run. */
export function setCorrelation(opts: { correlationId?: string; stage?: string }): void {
    if (opts.correlationId !== undefined) _correlationId = opts.correlationId;
    if (opts.stage !== undefined) _stage = opts.stage;
}

export function clearCorrelation(): void {
    _correlationId = '';
    _stage = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_correlationId) entry.cid = _correlationId;
        if (_stage) entry.stage = _stage;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _correlationId ? ` [${_correlationId.slice(0, 8)}${_stage ? ':' + _stage : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            // optional sink
            process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${e instanceof Error ? e.message : String(e)}\n`);
        }
    }
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
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
