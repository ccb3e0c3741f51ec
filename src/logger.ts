/**
 * Structured Logger — provisioning run logging
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, CRIT
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when FIRSTBOOT_LOG_JSON=1
 * - Optional file output via FIRSTBOOT_LOG_FILE
 * - Component name plus a per-logger prefix stack (the active stage)
 * - Run correlation ID propagated through all log entries
 *
 * Environment:
 *   FIRSTBOOT_LOG_LEVEL  = debug|info|warn|crit (default: info)
 *   FIRSTBOOT_LOG_JSON   = 1 (default: text)
 *   FIRSTBOOT_LOG_FILE   = path (optional, appends)
 *   FIRSTBOOT_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'crit';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, crit: 3 };

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = (process.env.FIRSTBOOT_LOG_LEVEL || 'info').toLowerCase();
const MIN_LEVEL: number = isLogLevel(envLevel) ? LEVEL_ORDER[envLevel] : LEVEL_ORDER.info;
const DEBUG_OVERRIDE = process.env.FIRSTBOOT_DEBUG === '1' || process.env.FIRSTBOOT_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.FIRSTBOOT_LOG_JSON === '1';
const LOG_FILE = process.env.FIRSTBOOT_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Run Correlation Context (singleton, one run per process)                   */
/* -------------------------------------------------------------------------- */

let _runId: string = '';
let _stage: string = '';

/** Set the active run correlation context. Called by the engine at run start. */
export function setCorrelation(opts: { runId?: string; stage?: string }): void {
    if (opts.runId !== undefined) _runId = opts.runId;
    if (opts.stage !== undefined) _stage = opts.stage;
}

/** Clear correlation context. Called at run end. */
export function clearCorrelation(): void {
    _runId = '';
    _stage = '';
}

/* -------------------------------------------------------------------------- */
/* Formatting                                                                 */
/* -------------------------------------------------------------------------- */

export interface LogRecord {
    ts: string;
    level: LogLevel;
    component: string;
    prefixes: readonly string[];
    message: string;
    runId?: string;
    stage?: string;
    data?: Record<string, unknown>;
}

export function formatLine(record: LogRecord, json: boolean): string {
    const { ts, level, component, prefixes, message, runId, stage, data } = record;
    const scoped = prefixes.length > 0 ? `${prefixes.join(': ')}: ${message}` : message;

    if (json) {
        const entry: Record<string, unknown> = { ts, level, component, msg: scoped };
        if (runId) entry.run_id = runId;
        if (stage) entry.stage = stage;
        if (data) entry.data = data;
        return JSON.stringify(entry);
    }

    const ctx = runId ? ` [${runId.slice(0, 8)}${stage ? ':' + stage : ''}]` : '';
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
    return data
        ? `${prefix} ${scoped} ${JSON.stringify(data)}`
        : `${prefix} ${scoped}`;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, prefixes: readonly string[], message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const line = formatLine({
        ts: new Date().toISOString(),
        level,
        component,
        prefixes,
        message,
        runId: _runId || undefined,
        stage: _stage || undefined,
        data,
    }, JSON_MODE);
    writeOutput(level, line);
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'crit': process.stderr.write(line + '\n'); break;
        case 'warn': process.stderr.write(line + '\n'); break;
        default:     process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (err) {
            // console copy already written
            process.stderr.write(`[logger] failed to append to ${LOG_FILE}: ${String(err)}\n`);
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
    crit(msg: string, data?: Record<string, unknown>): void;
    /** Scope subsequent lines under `name` until the matching popPrefix. */
    pushPrefix(name: string): void;
    popPrefix(): void;
    prefixes(): readonly string[];
}

export function createLogger(component: string): Logger {
    const stack: string[] = [];
    return {
        debug: (msg, data) => emit('debug', component, stack, msg, data),
        info:  (msg, data) => emit('info',  component, stack, msg, data),
        warn:  (msg, data) => emit('warn',  component, stack, msg, data),
        crit:  (msg, data) => emit('crit',  component, stack, msg, data),
        pushPrefix: (name) => { stack.push(name); },
        popPrefix: () => { stack.pop(); },
        prefixes: () => [...stack],
    };
}
