/**
 * Structured Logger - line logging for the merge core
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when DOCXMERGE_LOG_JSON=1
 * - Optional file output (appends), read back by log-tail viewers
 * - Module context (component name) on every line
 * - Pass correlation ID propagated through all log entries
 *
 * Environment:
 *   DOCXMERGE_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   DOCXMERGE_LOG_JSON   = 1 (default: text)
 *   DOCXMERGE_LOG_FILE   = path (optional, appends)
 *   DOCXMERGE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): number {
    if (process.env.DOCXMERGE_DEBUG === '1' || process.env.DOCXMERGE_DEBUG === 'true') return 0;
    const raw = (process.env.DOCXMERGE_LOG_LEVEL || 'info').toLowerCase();
    return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

let minLevel = levelFromEnv();
let jsonMode = process.env.DOCXMERGE_LOG_JSON === '1';
let logFile = process.env.DOCXMERGE_LOG_FILE || '';
let fileWarned = false;

export interface LoggingOptions {
    level?: LogLevel;
    json?: boolean;
    /** Append every line to this file as well. Empty string disables file output. */
    file?: string;
}

export function configureLogging(opts: LoggingOptions): void {
    if (opts.level !== undefined) minLevel = LEVEL_ORDER[opts.level];
    if (opts.json !== undefined) jsonMode = opts.json;
    if (opts.file !== undefined) {
        logFile = opts.file;
        fileWarned = false;
        if (logFile) fs.mkdirSync(path.dirname(logFile), { recursive: true });
    }
}

/* -------------------------------------------------------------------------- */
/* Pass Correlation Context (singleton)                                       */
/* -------------------------------------------------------------------------- */

let _passId: string = '';
let _filename: string = '';

/** Set the active pass context. Called by the merge driver at pass start and per file. */
export function setCorrelation(opts: { passId?: string; filename?: string }): void {
    if (opts.passId !== undefined) _passId = opts.passId;
    if (opts.filename !== undefined) _filename = opts.filename;
}

/** Clear correlation context. Called at pass end. */
export function clearCorrelation(): void {
    _passId = '';
    _filename = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < minLevel) return;

    const ts = new Date().toISOString();

    if (jsonMode) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_passId) entry.pass_id = _passId;
        if (_filename) entry.file = _filename;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _passId ? ` [${_passId.slice(0, 8)}${_filename ? '/' + _filename : ''}]` : '';
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

    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch (e) {
            // Log output must never fail a pass; report the first failure only.
            if (!fileWarned) {
                fileWarned = true;
                process.stderr.write(`log file ${logFile} not writable: ${e instanceof Error ? e.message : String(e)}\n`);
            }
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
