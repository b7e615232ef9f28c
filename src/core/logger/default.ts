/**
 * Default Logger
 *
 * Process-wide logger behind the package-level functions. It is created
 * lazily (reading EMBERLOG_LEVEL once) and every `setDefault*` call
 * replaces it with a derived logger in a single assignment, so callers
 * never see a half-applied configuration.
 *
 * @example
 * ```typescript
 * import { info, setDefaultFormatter, textFormatter } from 'emberlog'
 *
 * setDefaultFormatter(textFormatter())
 * info('server started', 'port', 8080)
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import { diagnostics, report } from '../observer.js';
import { LEVEL_ENV, readLevelFromEnv } from '../environment.js';
import { parseLevel } from './levels.js';
import { Logger } from './logger.js';
import type {
    EntryLevel,
    Formatter,
    Hook,
    Level,
    LogSink,
    SourceMode,
    TraceContext,
} from './types.js';

let defaultLogger: Logger | null = null;

function createDefaultLogger(): Logger {

    const raw = readLevelFromEnv();

    if (raw === undefined) {

        return new Logger();

    }

    const [level, err] = attemptSync(() => parseLevel(raw));

    if (err) {

        const logger = new Logger();

        report(() => diagnostics.emit('config:invalid-env', {
            variable: LEVEL_ENV,
            value: raw,
            reason: err.message,
        }));

        logger.warn(`ignoring invalid ${LEVEL_ENV}, using ${logger.level}`, 'value', raw);

        return logger;

    }

    return new Logger({ level: level ?? undefined });

}

/**
 * Get the process-wide logger, creating it on first use.
 */
export function getDefaultLogger(): Logger {

    if (!defaultLogger) {

        defaultLogger = createDefaultLogger();

    }

    return defaultLogger;

}

/**
 * Replace the process-wide logger.
 */
export function setDefaultLogger(logger: Logger): void {

    defaultLogger = logger;

}

export function setDefaultLevel(level: Level | string): void {

    defaultLogger = getDefaultLogger().withLevel(level);

}

export function setDefaultOutput(output: LogSink): void {

    defaultLogger = getDefaultLogger().withOutput(output);

}

export function setDefaultFormatter(formatter: Formatter): void {

    defaultLogger = getDefaultLogger().withFormatter(formatter);

}

export function setDefaultAutoSource(mode: SourceMode): void {

    defaultLogger = getDefaultLogger().withAutoSource(mode);

}

export function setDefaultProjectId(projectId: string): void {

    defaultLogger = getDefaultLogger().withProjectId(projectId);

}

export function setDefaultTraceContextKey(key: PropertyKey): void {

    defaultLogger = getDefaultLogger().withTraceContextKey(key);

}

export function setDefaultPrefix(prefix: string): void {

    defaultLogger = getDefaultLogger().withPrefix(prefix);

}

export function setDefaultLabels(labels: Record<string, string>): void {

    defaultLogger = getDefaultLogger().withLabels(labels);

}

export function removeDefaultLabels(...keys: string[]): void {

    defaultLogger = getDefaultLogger().withoutLabels(...keys);

}

/**
 * Give the default logger a new hook worker. The replacement is visible
 * immediately; the returned promise settles once the previous worker
 * has delivered everything it had queued.
 *
 * @example
 * ```typescript
 * await setDefaultHooks(alertsHook, auditHook)
 * ```
 */
export async function setDefaultHooks(...hooks: Hook[]): Promise<void> {

    const previous = getDefaultLogger();

    defaultLogger = previous.withHooks(...hooks);

    await previous.close();

}

/**
 * Drain and stop the default logger's hook worker.
 */
export async function closeDefault(): Promise<void> {

    await defaultLogger?.close();

}

/**
 * Close and forget the default logger. The next call creates a fresh
 * one from the environment.
 */
export async function resetDefaultLogger(): Promise<void> {

    const current = defaultLogger;

    defaultLogger = null;

    await current?.close();

}

// ─────────────────────────────────────────────────────────────
// Package-level logging
// ─────────────────────────────────────────────────────────────

export function debug(message: string, ...kvs: unknown[]): void {

    getDefaultLogger().debug(message, ...kvs);

}

export function info(message: string, ...kvs: unknown[]): void {

    getDefaultLogger().info(message, ...kvs);

}

export function warn(message: string, ...kvs: unknown[]): void {

    getDefaultLogger().warn(message, ...kvs);

}

export function error(message: string, ...kvs: unknown[]): void {

    getDefaultLogger().error(message, ...kvs);

}

export function critical(message: string, ...kvs: unknown[]): void {

    getDefaultLogger().critical(message, ...kvs);

}

export function debugf(template: string, ...args: unknown[]): void {

    getDefaultLogger().debugf(template, ...args);

}

export function infof(template: string, ...args: unknown[]): void {

    getDefaultLogger().infof(template, ...args);

}

export function warnf(template: string, ...args: unknown[]): void {

    getDefaultLogger().warnf(template, ...args);

}

export function errorf(template: string, ...args: unknown[]): void {

    getDefaultLogger().errorf(template, ...args);

}

export function criticalf(template: string, ...args: unknown[]): void {

    getDefaultLogger().criticalf(template, ...args);

}

export function debugCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

    getDefaultLogger().debugCtx(context, message, ...kvs);

}

export function infoCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

    getDefaultLogger().infoCtx(context, message, ...kvs);

}

export function warnCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

    getDefaultLogger().warnCtx(context, message, ...kvs);

}

export function errorCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

    getDefaultLogger().errorCtx(context, message, ...kvs);

}

export function criticalCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

    getDefaultLogger().criticalCtx(context, message, ...kvs);

}

export function debugfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

    getDefaultLogger().debugfCtx(context, template, ...args);

}

export function infofCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

    getDefaultLogger().infofCtx(context, template, ...args);

}

export function warnfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

    getDefaultLogger().warnfCtx(context, template, ...args);

}

export function errorfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

    getDefaultLogger().errorfCtx(context, template, ...args);

}

export function criticalfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

    getDefaultLogger().criticalfCtx(context, template, ...args);

}

export function log(level: EntryLevel, message: string, ...kvs: unknown[]): void {

    getDefaultLogger().log(level, message, ...kvs);

}

export function logCtx(context: TraceContext | undefined, level: EntryLevel, message: string, ...kvs: unknown[]): void {

    getDefaultLogger().logCtx(context, level, message, ...kvs);

}

export function print(...args: unknown[]): void {

    getDefaultLogger().print(...args);

}

export function printCtx(context: TraceContext | undefined, ...args: unknown[]): void {

    getDefaultLogger().printCtx(context, ...args);

}

export function printf(template: string, ...args: unknown[]): void {

    getDefaultLogger().printf(template, ...args);

}

export function printfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

    getDefaultLogger().printfCtx(context, template, ...args);

}

export function fatal(message: string, ...kvs: unknown[]): void {

    getDefaultLogger().fatal(message, ...kvs);

}

export function fatalf(template: string, ...args: unknown[]): void {

    getDefaultLogger().fatalf(template, ...args);

}

export function fatalCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

    getDefaultLogger().fatalCtx(context, message, ...kvs);

}

export function fatalfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

    getDefaultLogger().fatalfCtx(context, template, ...args);

}

export function isDebugEnabled(): boolean {

    return getDefaultLogger().isDebugEnabled();

}

export function isInfoEnabled(): boolean {

    return getDefaultLogger().isInfoEnabled();

}

export function isWarnEnabled(): boolean {

    return getDefaultLogger().isWarnEnabled();

}

export function isErrorEnabled(): boolean {

    return getDefaultLogger().isErrorEnabled();

}

export function isCriticalEnabled(): boolean {

    return getDefaultLogger().isCriticalEnabled();

}
