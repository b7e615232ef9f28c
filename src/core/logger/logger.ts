/**
 * Logger
 *
 * Leveled, structured logger. Each call runs level check, field merge,
 * optional source capture and a synchronous format + write on the
 * caller's stack, then hands a copy of the entry to the hook worker
 * without waiting for it.
 *
 * Loggers are immutable: every `with*` method returns a new logger that
 * shares the hook worker of the logger it came from.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *     level: 'DEBUG',
 *     formatter: textFormatter(),
 *     labels: { service: 'billing' },
 * })
 *
 * const requestLogger = logger.with('requestId', 'r-42')
 * requestLogger.warn('low disk', 'pct', 91, 'path', '/data')
 * ```
 */
import { format } from 'node:util';
import { attemptSync } from '@logosdx/utils';

import { diagnostics, report } from '../observer.js';
import { EntryPool, makeEntry } from './entry.js';
import { bindKeyValues, mergeFields } from './fields.js';
import type { FieldDefaults } from './fields.js';
import { renderValue } from './formatter.js';
import { jsonFormatter } from './formatters/json.js';
import { isLevelEnabled, parseLevel } from './levels.js';
import { HookQueue } from './queue.js';
import {
    FormatterSchema,
    HookSchema,
    LabelsSchema,
    LoggerOptionsSchema,
    SinkSchema,
    SourceModeSchema,
    TraceContextKeySchema,
    validateOption,
} from './schema.js';
import { captureSource, shouldCaptureSource } from './source.js';
import { DEFAULT_HOOK_BUFFER_SIZE, LEVEL_VALUE } from './types.js';
import type {
    Entry,
    EntryLevel,
    Formatter,
    Hook,
    HookState,
    HookStats,
    Level,
    LogSink,
    SourceMode,
    TraceContext,
} from './types.js';

/**
 * Options for Logger construction. Every option is validated; invalid
 * values throw LoggerConfigError.
 */
export interface LoggerOptions {
    /** Where formatted lines go (default: process.stderr) */
    output?: LogSink;

    /** Where formatting failures are reported (default: process.stderr) */
    errorOutput?: LogSink;

    /** Threshold (default: INFO) */
    level?: Level;

    /** Line format (default: JSON) */
    formatter?: Formatter;

    /** When to attach the caller's file and line (default: never) */
    autoSource?: SourceMode;

    /** Cloud project id used to expand trace headers */
    projectId?: string;

    /** Key of the trace header in request contexts */
    traceContextKey?: PropertyKey;

    /** Prepended to every message */
    prefix?: string;

    labels?: Record<string, string>;

    /** Fields merged into every entry, as if bound with `with(...)` */
    fields?: Record<string, unknown>;

    hooks?: readonly Hook[];

    /** Hook queue capacity (default: 100) */
    hookBufferSize?: number;

    /** Called by fatal() after logging (default: process.exit) */
    exit?: (code: number) => void;
}

/**
 * Resolved, immutable configuration of one logger.
 */
export interface LoggerSettings extends FieldDefaults {
    readonly output: LogSink;
    readonly errorOutput: LogSink;
    readonly level: Level;
    readonly threshold: number;
    readonly formatter: Formatter;
    readonly autoSource: SourceMode;
    readonly hookBufferSize: number;
    readonly exit: (code: number) => void;
}

/**
 * State passed from a logger to the loggers derived from it.
 */
export class LoggerLineage {

    constructor(
        readonly settings: LoggerSettings,
        readonly hooks: HookQueue | null,
        readonly pool: EntryPool,
    ) {}

}

const EMPTY_STATS: Readonly<HookStats> = Object.freeze({
    pending: 0,
    delivered: 0,
    dropped: 0,
    failed: 0,
    panicked: 0,
});

// ─────────────────────────────────────────────────────────────
// Print path
// ─────────────────────────────────────────────────────────────

function writeLine(sink: LogSink, line: string, severity: EntryLevel): void {

    const [, err] = attemptSync(() => sink.write(`${line}\n`));

    if (err) {

        report(() => diagnostics.emit('write:failed', { error: err, severity }));

    }

}

function reportFormatFailure(settings: LoggerSettings, entry: Entry, error: Error): void {

    report(() => diagnostics.emit('format:failed', {
        error,
        severity: entry.severity,
        message: entry.message,
    }));

    const notice = makeEntry('ERROR', `failed to format log entry: ${error.message}`);
    const [line, err] = attemptSync(() => settings.formatter.formatMessageOnly(notice));

    if (err) {

        report(() => diagnostics.emit('format:failed', {
            error: err,
            severity: notice.severity,
            message: notice.message,
        }));

        return;

    }

    if (typeof line === 'string') {

        writeLine(settings.errorOutput, line, notice.severity);

    }

}

/**
 * Format an entry and write it to the logger's output. Never throws.
 */
function writeEntry(settings: LoggerSettings, entry: Entry): void {

    const [line, err] = attemptSync(() => settings.formatter.format(entry));

    if (err) {

        reportFormatFailure(settings, entry, err);
        return;

    }

    if (typeof line === 'string') {

        writeLine(settings.output, line, entry.severity);

    }

}

/**
 * Build, write and (optionally) submit one entry.
 */
function emitEntry(
    lineage: LoggerLineage,
    severity: EntryLevel,
    context: TraceContext | undefined,
    message: string,
    kvs: readonly unknown[],
    submit: boolean,
): void {

    const { settings, hooks, pool } = lineage;
    const entry = pool.acquire();

    mergeFields(entry, settings, severity, message, context, kvs);

    if (!entry.sourceLocation && shouldCaptureSource(settings.autoSource, severity)) {

        entry.sourceLocation = captureSource();

    }

    writeEntry(settings, entry);

    if (submit && hooks?.accepts(severity)) {

        hooks.offer(entry);

    }

    pool.release(entry);

}

/**
 * Start a hook worker whose faults are written through `settings`,
 * whatever its level.
 */
function startHooks(hooks: readonly Hook[], settings: LoggerSettings, pool: EntryPool): HookQueue | null {

    if (hooks.length === 0) {

        return null;

    }

    const origin = new LoggerLineage(settings, null, pool);

    return new HookQueue({
        hooks,
        capacity: settings.hookBufferSize,
        onPanic: (reason) => {

            emitEntry(origin, 'ERROR', undefined, 'A hook panicked', ['panic', reason], false);

        },
    });

}

function createLineage(options: LoggerOptions): LoggerLineage {

    const parsed = validateOption(LoggerOptionsSchema, '', options);
    const level = parsed.level ?? 'INFO';
    const pool = new EntryPool();

    const settings: LoggerSettings = {
        output: parsed.output ?? process.stderr,
        errorOutput: parsed.errorOutput ?? process.stderr,
        level,
        threshold: LEVEL_VALUE[level],
        formatter: parsed.formatter ?? jsonFormatter(),
        autoSource: parsed.autoSource ?? 'never',
        projectId: parsed.projectId ?? '',
        traceContextKey: parsed.traceContextKey,
        prefix: parsed.prefix ?? '',
        labels: Object.freeze({ ...parsed.labels }),
        fields: Object.freeze({ ...parsed.fields }),
        trace: '',
        spanId: '',
        traceSampled: undefined,
        correlationId: '',
        hookBufferSize: parsed.hookBufferSize ?? DEFAULT_HOOK_BUFFER_SIZE,
        exit: parsed.exit ?? ((code) => process.exit(code)),
    };

    return new LoggerLineage(settings, startHooks(parsed.hooks ?? [], settings, pool), pool);

}

// ─────────────────────────────────────────────────────────────
// Logger
// ─────────────────────────────────────────────────────────────

export class Logger {

    readonly #lineage: LoggerLineage;

    constructor(options: LoggerOptions | LoggerLineage = {}) {

        this.#lineage = options instanceof LoggerLineage ? options : createLineage(options);

    }

    /**
     * Threshold of this logger.
     */
    get level(): Level {

        return this.#lineage.settings.level;

    }

    get autoSource(): SourceMode {

        return this.#lineage.settings.autoSource;

    }

    get prefix(): string {

        return this.#lineage.settings.prefix;

    }

    get labels(): Readonly<Record<string, string>> {

        return this.#lineage.settings.labels;

    }

    /**
     * Fields bound with `with(...)` or the `fields` option.
     */
    get fields(): Readonly<Record<string, unknown>> {

        return this.#lineage.settings.fields;

    }

    /**
     * State of the shared hook worker (`unstarted` without hooks).
     */
    get hookState(): HookState {

        return this.#lineage.hooks?.state ?? 'unstarted';

    }

    get hookStats(): HookStats {

        return this.#lineage.hooks?.stats ?? { ...EMPTY_STATS };

    }

    // ─────────────────────────────────────────────────────────────
    // Level checks
    // ─────────────────────────────────────────────────────────────

    isEnabled(level: Level): boolean {

        return isLevelEnabled(this.#lineage.settings.threshold, level);

    }

    isDebugEnabled(): boolean {

        return this.#lineage.settings.threshold >= LEVEL_VALUE.DEBUG;

    }

    isInfoEnabled(): boolean {

        return this.#lineage.settings.threshold >= LEVEL_VALUE.INFO;

    }

    isWarnEnabled(): boolean {

        return this.#lineage.settings.threshold >= LEVEL_VALUE.WARN;

    }

    isErrorEnabled(): boolean {

        return this.#lineage.settings.threshold >= LEVEL_VALUE.ERROR;

    }

    isCriticalEnabled(): boolean {

        return this.#lineage.settings.threshold >= LEVEL_VALUE.CRITICAL;

    }

    // ─────────────────────────────────────────────────────────────
    // Logging
    // ─────────────────────────────────────────────────────────────

    /**
     * Log at a severity with alternating key/value arguments.
     */
    log(level: EntryLevel, message: string, ...kvs: unknown[]): void {

        if (this.isEnabled(level)) {

            emitEntry(this.#lineage, level, undefined, message, kvs, true);

        }

    }

    /**
     * Log with a request context carrying the trace header.
     */
    logCtx(context: TraceContext | undefined, level: EntryLevel, message: string, ...kvs: unknown[]): void {

        if (this.isEnabled(level)) {

            emitEntry(this.#lineage, level, context, message, kvs, true);

        }

    }

    debug(message: string, ...kvs: unknown[]): void {

        this.log('DEBUG', message, ...kvs);

    }

    info(message: string, ...kvs: unknown[]): void {

        this.log('INFO', message, ...kvs);

    }

    warn(message: string, ...kvs: unknown[]): void {

        this.log('WARN', message, ...kvs);

    }

    error(message: string, ...kvs: unknown[]): void {

        this.log('ERROR', message, ...kvs);

    }

    critical(message: string, ...kvs: unknown[]): void {

        this.log('CRITICAL', message, ...kvs);

    }

    /**
     * printf-style variants, formatted with `util.format` only when the
     * level is enabled.
     */
    debugf(template: string, ...args: unknown[]): void {

        this.#logf('DEBUG', undefined, template, args);

    }

    infof(template: string, ...args: unknown[]): void {

        this.#logf('INFO', undefined, template, args);

    }

    warnf(template: string, ...args: unknown[]): void {

        this.#logf('WARN', undefined, template, args);

    }

    errorf(template: string, ...args: unknown[]): void {

        this.#logf('ERROR', undefined, template, args);

    }

    criticalf(template: string, ...args: unknown[]): void {

        this.#logf('CRITICAL', undefined, template, args);

    }

    debugCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

        this.logCtx(context, 'DEBUG', message, ...kvs);

    }

    infoCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

        this.logCtx(context, 'INFO', message, ...kvs);

    }

    warnCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

        this.logCtx(context, 'WARN', message, ...kvs);

    }

    errorCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

        this.logCtx(context, 'ERROR', message, ...kvs);

    }

    criticalCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

        this.logCtx(context, 'CRITICAL', message, ...kvs);

    }

    /**
     * printf-style variants that also read the trace header from a
     * request context.
     */
    debugfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

        this.#logf('DEBUG', context, template, args);

    }

    infofCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

        this.#logf('INFO', context, template, args);

    }

    warnfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

        this.#logf('WARN', context, template, args);

    }

    errorfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

        this.#logf('ERROR', context, template, args);

    }

    criticalfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

        this.#logf('CRITICAL', context, template, args);

    }

    /**
     * Log the arguments, joined by spaces, at INFO.
     */
    print(...args: unknown[]): void {

        this.printCtx(undefined, ...args);

    }

    printCtx(context: TraceContext | undefined, ...args: unknown[]): void {

        if (this.isInfoEnabled()) {

            emitEntry(this.#lineage, 'INFO', context, args.map(renderValue).join(' '), [], true);

        }

    }

    printf(template: string, ...args: unknown[]): void {

        this.#logf('INFO', undefined, template, args);

    }

    printfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

        this.#logf('INFO', context, template, args);

    }

    /**
     * Log at CRITICAL (when enabled), then call the exit function with 1.
     */
    fatal(message: string, ...kvs: unknown[]): void {

        this.critical(message, ...kvs);
        this.#lineage.settings.exit(1);

    }

    fatalf(template: string, ...args: unknown[]): void {

        this.#logf('CRITICAL', undefined, template, args);
        this.#lineage.settings.exit(1);

    }

    fatalCtx(context: TraceContext | undefined, message: string, ...kvs: unknown[]): void {

        this.criticalCtx(context, message, ...kvs);
        this.#lineage.settings.exit(1);

    }

    fatalfCtx(context: TraceContext | undefined, template: string, ...args: unknown[]): void {

        this.#logf('CRITICAL', context, template, args);
        this.#lineage.settings.exit(1);

    }

    #logf(
        level: EntryLevel,
        context: TraceContext | undefined,
        template: string,
        args: readonly unknown[],
    ): void {

        if (this.isEnabled(level)) {

            emitEntry(this.#lineage, level, context, format(template, ...args), [], true);

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Derivation
    // ─────────────────────────────────────────────────────────────

    #derive(patch: Partial<LoggerSettings>): Logger {

        const { settings, hooks, pool } = this.#lineage;

        return new Logger(new LoggerLineage({ ...settings, ...patch }, hooks, pool));

    }

    /**
     * @throws InvalidLevelError for unknown names (case is ignored)
     */
    withLevel(level: Level | string): Logger {

        const parsed = parseLevel(level);

        return this.#derive({ level: parsed, threshold: LEVEL_VALUE[parsed] });

    }

    withOutput(output: LogSink): Logger {

        return this.#derive({ output: validateOption(SinkSchema, 'output', output) });

    }

    /**
     * Sink for the notice written when the formatter throws.
     */
    withErrorOutput(errorOutput: LogSink): Logger {

        return this.#derive({ errorOutput: validateOption(SinkSchema, 'errorOutput', errorOutput) });

    }

    withFormatter(formatter: Formatter): Logger {

        return this.#derive({ formatter: validateOption(FormatterSchema, 'formatter', formatter) });

    }

    withAutoSource(mode: SourceMode): Logger {

        return this.#derive({ autoSource: validateOption(SourceModeSchema, 'autoSource', mode) });

    }

    withProjectId(projectId: string): Logger {

        return this.#derive({ projectId });

    }

    withTraceContextKey(key: PropertyKey): Logger {

        return this.#derive({ traceContextKey: validateOption(TraceContextKeySchema, 'traceContextKey', key) });

    }

    withPrefix(prefix: string): Logger {

        return this.#derive({ prefix });

    }

    /**
     * Add or replace labels.
     */
    withLabels(labels: Record<string, string>): Logger {

        const added = validateOption(LabelsSchema, 'labels', labels);

        return this.#derive({ labels: Object.freeze({ ...this.labels, ...added }) });

    }

    withoutLabels(...keys: string[]): Logger {

        const labels = { ...this.labels };

        for (const key of keys) {

            delete labels[key];

        }

        return this.#derive({ labels: Object.freeze(labels) });

    }

    /**
     * Bind key/value fields to every entry of the returned logger.
     *
     * @throws FieldBindingError on an odd count or a non-string key
     *
     * @example
     * ```typescript
     * const scoped = logger.with('userId', 'u1', 'tenant', 't9')
     * ```
     */
    with(...kvs: unknown[]): Logger {

        const bound = bindKeyValues(kvs);

        return this.#derive({ fields: Object.freeze({ ...this.fields, ...bound }) });

    }

    withTrace(trace: string): Logger {

        return this.#derive({ trace });

    }

    withSpanId(spanId: string): Logger {

        return this.#derive({ spanId });

    }

    withTraceSampled(traceSampled: boolean): Logger {

        return this.#derive({ traceSampled });

    }

    withCorrelationId(correlationId: string): Logger {

        return this.#derive({ correlationId });

    }

    /**
     * Same settings with a new hook worker of its own. The receiver's
     * worker is left running; close it separately.
     */
    withHooks(...hooks: Hook[]): Logger {

        const checked = hooks.map((hook, i) => validateOption(HookSchema, `hooks.${i}`, hook));
        const { settings, pool } = this.#lineage;

        return new Logger(new LoggerLineage(settings, startHooks(checked, settings, pool), pool));

    }

    clone(): Logger {

        return this.#derive({});

    }

    // ─────────────────────────────────────────────────────────────
    // Hook worker
    // ─────────────────────────────────────────────────────────────

    /**
     * Wait until every queued entry has reached its hooks.
     */
    async flush(): Promise<void> {

        await this.#lineage.hooks?.flush();

    }

    /**
     * Stop the shared hook worker after draining it. Idempotent; a
     * no-op without hooks.
     */
    async close(): Promise<void> {

        await this.#lineage.hooks?.close();

    }

}
