/**
 * Logger Types
 *
 * Type definitions for the emberlog pipeline: severities, the entry
 * record that formatters and hooks receive, and the contracts a caller
 * plugs into a logger (sinks, formatters, hooks).
 */

/**
 * Severity thresholds, least to most permissive.
 *
 * - OFF: Nothing is observable
 * - CRITICAL .. DEBUG: Standard severities
 * - ALL: Everything is observable
 */
export type Level = 'OFF' | 'CRITICAL' | 'ERROR' | 'WARN' | 'INFO' | 'DEBUG' | 'ALL';

/**
 * Severity an entry can carry. OFF and ALL are thresholds only.
 */
export type EntryLevel = Exclude<Level, 'OFF' | 'ALL'>;

/**
 * Numeric value per level. Level X is observable when
 * `threshold >= LEVEL_VALUE[X]`.
 */
export const LEVEL_VALUE: Readonly<Record<Level, number>> = {
    OFF: 0,
    CRITICAL: 1,
    ERROR: 2,
    WARN: 3,
    INFO: 4,
    DEBUG: 5,
    ALL: Number.MAX_SAFE_INTEGER,
};

export const ENTRY_LEVELS: readonly EntryLevel[] = ['CRITICAL', 'ERROR', 'WARN', 'INFO', 'DEBUG'];

/**
 * When the logger walks the stack to attach a source location.
 *
 * - never: Only when the caller supplies `sourceLocation`
 * - always: Every entry
 * - error: ERROR and CRITICAL entries
 */
export type SourceMode = 'never' | 'always' | 'error';

/**
 * HTTP request metadata promoted from the `httpRequest` field.
 */
export interface HttpRequest {
    requestMethod?: string;
    requestUrl?: string;
    status?: number;
    userAgent?: string;
    remoteIp?: string;
    latency?: string;
}

export interface SourceLocation {
    file?: string;
    line?: number;
    function?: string;
}

/**
 * A single log record as seen by formatters and hooks.
 */
export interface Entry {
    readonly message: string;
    readonly severity: EntryLevel;
    readonly timestamp: Date;

    /** Empty string when absent. */
    readonly trace: string;
    readonly spanId: string;
    readonly correlationId: string;
    readonly traceSampled: boolean | undefined;

    readonly httpRequest: Readonly<HttpRequest> | undefined;
    readonly sourceLocation: Readonly<SourceLocation> | undefined;
    readonly labels: Readonly<Record<string, string>>;
    readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Destination of formatted lines. A `Writable` stream satisfies it.
 */
export interface LogSink {
    write(chunk: string): unknown;
}

/**
 * Turns an entry into one line of text (without the trailing newline).
 */
export interface Formatter {

    /**
     * Render the full entry. May throw when a value cannot be serialized.
     */
    format(entry: Entry): string;

    /**
     * Render only timestamp, severity and message. Must not throw.
     */
    formatMessageOnly(entry: Entry): string;
}

/**
 * Value a hook reports back. Returning an Error counts as a delivery
 * failure; throwing or rejecting counts as a fault.
 */
export type HookResult = Error | undefined | void;

/**
 * Side-effect handler run by the hook worker, off the logging call's stack.
 *
 * @example
 * ```typescript
 * const alerts: Hook = {
 *     name: 'alerts',
 *     levels: () => ['ERROR', 'CRITICAL'],
 *     fire: async (entry) => { await pager.send(entry.message) },
 * }
 * ```
 */
export interface Hook {

    /** Shown in diagnostics events. */
    readonly name?: string;

    /**
     * Severities this hook receives. Empty means every severity.
     */
    levels(): readonly Level[];

    fire(entry: Entry): HookResult | Promise<HookResult>;
}

/**
 * Lifecycle of a hook worker.
 */
export type HookState = 'unstarted' | 'running' | 'draining' | 'stopped';

/**
 * Counters for a hook worker. `delivered`, `failed` and `panicked`
 * count hook invocations; `dropped` counts entries.
 */
export interface HookStats {
    pending: number;
    delivered: number;
    dropped: number;
    failed: number;
    panicked: number;
}

/**
 * Request-scoped carrier for the trace header.
 */
export type TraceContext = ReadonlyMap<unknown, unknown> | Readonly<Record<PropertyKey, unknown>>;

export const DEFAULT_HOOK_BUFFER_SIZE = 100;
