/**
 * Field Merger
 *
 * Builds a draft entry from, in ascending precedence:
 * 1. the trace header found in a request context
 * 2. logger defaults (prefix, labels, bound trace fields)
 * 3. fields bound with `with(...)`
 * 4. call-site key/value arguments
 *
 * Reserved keys (`error`, `httpRequest`, `sourceLocation`) are handled
 * the same way at tiers 3 and 4.
 */
import { FieldBindingError } from './errors.js';
import { HttpRequestSchema, SourceLocationSchema } from './schema.js';
import type { DraftEntry } from './entry.js';
import type { EntryLevel, TraceContext } from './types.js';

/**
 * Value recorded for a dangling key at the call site.
 */
export const MISSING_VALUE = 'KEY_WITHOUT_VALUE';

/**
 * Payload key describing malformed call-site arguments.
 */
export const LOGGING_ERROR_KEY = 'logging_error';

export const ODD_ARGUMENTS_MESSAGE = 'odd number of arguments received';

/**
 * Logger-level values merged into every entry.
 */
export interface FieldDefaults {
    readonly prefix: string;
    readonly labels: Readonly<Record<string, string>>;
    readonly fields: Readonly<Record<string, unknown>>;
    readonly trace: string;
    readonly spanId: string;
    readonly traceSampled: boolean | undefined;
    readonly correlationId: string;
    readonly projectId: string;
    readonly traceContextKey: PropertyKey | undefined;
}

export interface TraceIds {
    trace: string;
    spanId: string;
}

/**
 * Error instances, and objects carrying a string `name` and `message`.
 */
export function isErrorLike(value: unknown): value is { message: string } {

    if (value instanceof Error) {

        return true;

    }

    return typeof value === 'object'
        && value !== null
        && 'message' in value
        && typeof value.message === 'string'
        && 'name' in value
        && typeof value.name === 'string';

}

function isMapContext(context: TraceContext): context is ReadonlyMap<unknown, unknown> {

    return context instanceof Map;

}

function setPayload(payload: Record<string, unknown>, key: string, value: unknown): void {

    if (key === '__proto__') {

        Object.defineProperty(payload, key, { value, enumerable: true, writable: true, configurable: true });
        return;

    }

    payload[key] = value;

}

/**
 * Read the trace header `TRACE_ID/SPAN_ID;o=OPTIONS` from a context.
 *
 * @returns undefined when the context has no usable header
 *
 * @example
 * ```typescript
 * extractTrace(new Map([['trace', 'abc/123;o=1']]), 'trace', 'my-project')
 * // { trace: 'projects/my-project/traces/abc', spanId: '123' }
 * ```
 */
export function extractTrace(
    context: TraceContext,
    key: PropertyKey,
    projectId: string,
): TraceIds | undefined {

    const header = isMapContext(context) ? context.get(key) : context[key];

    if (typeof header !== 'string' || header === '') {

        return undefined;

    }

    const [traceId = '', spanPart = ''] = header.split('/');
    const traceOnly = traceId.split(';')[0] ?? '';
    const spanId = spanPart.split(';')[0] ?? '';

    return {
        trace: traceOnly ? `projects/${projectId}/traces/${traceOnly}` : '',
        spanId,
    };

}

/**
 * Apply one field, promoting reserved keys.
 */
export function applyField(entry: DraftEntry, key: string, value: unknown): void {

    switch (key) {

    case 'error':
        setPayload(entry.payload, key, isErrorLike(value) ? value.message : value);
        return;

    case 'httpRequest': {

        const result = HttpRequestSchema.safeParse(value);

        if (result.success) {

            entry.httpRequest = result.data;
            return;

        }

        break;

    }

    case 'sourceLocation': {

        const result = SourceLocationSchema.safeParse(value);

        if (result.success) {

            entry.sourceLocation = result.data;
            return;

        }

        break;

    }

    }

    setPayload(entry.payload, key, value);

}

/**
 * Apply call-site key/value arguments. Never throws: malformed lists
 * are recorded under `logging_error`.
 *
 * @example
 * ```typescript
 * applyKeyValues(draft, ['user', 'u1', 'orphan'])
 * // payload: { user: 'u1', orphan: 'KEY_WITHOUT_VALUE',
 * //            logging_error: 'odd number of arguments received' }
 * ```
 */
export function applyKeyValues(entry: DraftEntry, kvs: readonly unknown[]): void {

    const pairedLength = kvs.length - (kvs.length % 2);

    for (let i = 0; i < pairedLength; i += 2) {

        const key = kvs[i];

        if (typeof key !== 'string') {

            setPayload(entry.payload, LOGGING_ERROR_KEY, `non-string key at argument position ${i}`);
            continue;

        }

        applyField(entry, key, kvs[i + 1]);

    }

    if (pairedLength === kvs.length) {

        return;

    }

    const dangling = kvs[pairedLength];

    if (typeof dangling === 'string') {

        setPayload(entry.payload, dangling, MISSING_VALUE);

    }

    setPayload(entry.payload, LOGGING_ERROR_KEY, ODD_ARGUMENTS_MESSAGE);

}

/**
 * Turn `with(...)` arguments into a field record.
 *
 * @throws FieldBindingError on an odd count or a non-string key
 */
export function bindKeyValues(kvs: readonly unknown[]): Record<string, unknown> {

    if (kvs.length % 2 !== 0) {

        throw new FieldBindingError(kvs.length - 1, 'odd number of arguments');

    }

    const fields: Record<string, unknown> = {};

    for (let i = 0; i < kvs.length; i += 2) {

        const key = kvs[i];

        if (typeof key !== 'string') {

            throw new FieldBindingError(i, `key must be a string, got ${typeof key}`);

        }

        setPayload(fields, key, kvs[i + 1]);

    }

    return fields;

}

/**
 * Fill a draft from all four tiers.
 */
export function mergeFields(
    entry: DraftEntry,
    defaults: FieldDefaults,
    severity: EntryLevel,
    message: string,
    context: TraceContext | undefined,
    kvs: readonly unknown[],
): void {

    entry.severity = severity;
    entry.timestamp = new Date();
    entry.message = defaults.prefix + message;
    entry.labels = defaults.labels;
    entry.trace = defaults.trace;
    entry.spanId = defaults.spanId;
    entry.traceSampled = defaults.traceSampled;
    entry.correlationId = defaults.correlationId;

    if (context && defaults.projectId && defaults.traceContextKey !== undefined) {

        const ids = extractTrace(context, defaults.traceContextKey, defaults.projectId);

        if (ids && !entry.trace) {

            entry.trace = ids.trace;

        }

        if (ids && !entry.spanId) {

            entry.spanId = ids.spanId;

        }

    }

    for (const key of Object.keys(defaults.fields)) {

        applyField(entry, key, defaults.fields[key]);

    }

    applyKeyValues(entry, kvs);

}
