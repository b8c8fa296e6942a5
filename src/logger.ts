/**
 * Structured Logger
 *
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when FORGE_LOG_JSON=1
 * - Optional file output via FORGE_LOG_FILE
 * - Component name on every line
 * - Run correlation (run id, package, round) stamped while a driver runs
 *
 * Environment:
 *   FORGE_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   FORGE_LOG_JSON   = 1 (default: text)
 *   FORGE_LOG_FILE   = path (optional, appends)
 *   FORGE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = (process.env.FORGE_LOG_LEVEL || 'info').toLowerCase();
const MIN_LEVEL: number = isLogLevel(envLevel) ? LEVEL_ORDER[envLevel] : 1;
const DEBUG_OVERRIDE = process.env.FORGE_DEBUG === '1' || process.env.FORGE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.FORGE_LOG_JSON === '1';
const LOG_FILE = process.env.FORGE_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Run Correlation Context                                                    */
/* -------------------------------------------------------------------------- */

let _runId: string = '';
let _packageName: string = '';
let _round: number = 0;
let _phase: string = '';

/** Set the active run context. Called by the convergence driver. */
export function setCorrelation(opts: { runId?: string; packageName?: string; round?: number; phase?: string }): void {
    if (opts.runId !== undefined) _runId = opts.runId;
    if (opts.packageName !== undefined) _packageName = opts.packageName;
    if (opts.round !== undefined) _round = opts.round;
    if (opts.phase !== undefined) _phase = opts.phase;
}

export function clearCorrelation(): void {
    _runId = '';
    _packageName = '';
    _round = 0;
    _phase = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (_packageName) entry.package = _packageName;
        if (_round) entry.round = _round;
        if (_phase) entry.phase = _phase;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _runId
            ? ` [${_runId.slice(0, 8)}${_packageName ? '/' + _packageName : ''}${_round ? ':r' + _round : ''}${_phase ? ':' + _phase : ''}]`
            : '';
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
            // The log file is optional; report once on stderr and keep the console line.
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
