/**
 * Entry Pool
 *
 * Entries are built in mutable drafts taken from a pool, formatted once,
 * then cleared and returned. Hooks never see a draft: they receive a
 * frozen copy made with `copyEntry`.
 *
 * @example
 * ```typescript
 * const pool = new EntryPool()
 * const draft = pool.acquire()
 * draft.message = 'ready'
 * sink.write(formatter.format(draft) + '\n')
 * pool.release(draft)
 * ```
 */
import type { Entry, EntryLevel, HttpRequest, SourceLocation } from './types.js';

/**
 * Mutable form of Entry used while merging fields.
 */
export interface DraftEntry {
    message: string;
    severity: EntryLevel;
    timestamp: Date;
    trace: string;
    spanId: string;
    correlationId: string;
    traceSampled: boolean | undefined;
    httpRequest: Readonly<HttpRequest> | undefined;
    sourceLocation: Readonly<SourceLocation> | undefined;
    labels: Readonly<Record<string, string>>;
    payload: Record<string, unknown>;
}

const NO_LABELS: Readonly<Record<string, string>> = Object.freeze({});

/**
 * Payloads with more keys than this are replaced rather than emptied
 * key by key when a draft is released.
 */
const PAYLOAD_RESET_THRESHOLD = 32;

const DEFAULT_POOL_SIZE = 64;

function createDraft(): DraftEntry {

    return {
        message: '',
        severity: 'INFO',
        timestamp: new Date(0),
        trace: '',
        spanId: '',
        correlationId: '',
        traceSampled: undefined,
        httpRequest: undefined,
        sourceLocation: undefined,
        labels: NO_LABELS,
        payload: {},
    };

}

/**
 * Reset a draft to its empty state, keeping the payload object when
 * it is small.
 */
export function clearEntry(entry: DraftEntry): void {

    entry.message = '';
    entry.severity = 'INFO';
    entry.trace = '';
    entry.spanId = '';
    entry.correlationId = '';
    entry.traceSampled = undefined;
    entry.httpRequest = undefined;
    entry.sourceLocation = undefined;
    entry.labels = NO_LABELS;

    const keys = Object.keys(entry.payload);

    if (keys.length > PAYLOAD_RESET_THRESHOLD) {

        entry.payload = {};
        return;

    }

    for (const key of keys) {

        delete entry.payload[key];

    }

}

/**
 * Recycles draft entries between logging calls.
 */
export class EntryPool {

    #free: DraftEntry[] = [];
    #maxSize: number;

    constructor(maxSize = DEFAULT_POOL_SIZE) {

        this.#maxSize = maxSize;

    }

    /**
     * Number of idle drafts held by the pool.
     */
    get size(): number {

        return this.#free.length;

    }

    /**
     * Take an empty draft, creating one when the pool is empty.
     */
    acquire(): DraftEntry {

        return this.#free.pop() ?? createDraft();

    }

    /**
     * Clear a draft and keep it for reuse. The caller must not touch
     * the draft afterwards.
     */
    release(entry: DraftEntry): void {

        clearEntry(entry);

        if (this.#free.length < this.#maxSize) {

            this.#free.push(entry);

        }

    }

}

/**
 * Frozen, independent copy of an entry.
 *
 * Payload and labels are shallow-copied: nested objects inside payload
 * values are shared with the caller.
 */
export function copyEntry(entry: Entry): Entry {

    return Object.freeze({
        message: entry.message,
        severity: entry.severity,
        timestamp: new Date(entry.timestamp.getTime()),
        trace: entry.trace,
        spanId: entry.spanId,
        correlationId: entry.correlationId,
        traceSampled: entry.traceSampled,
        httpRequest: entry.httpRequest ? Object.freeze({ ...entry.httpRequest }) : undefined,
        sourceLocation: entry.sourceLocation ? Object.freeze({ ...entry.sourceLocation }) : undefined,
        labels: Object.freeze({ ...entry.labels }),
        payload: Object.freeze({ ...entry.payload }),
    });

}

/**
 * Build a standalone entry from a few fields. Used for entries the
 * logger writes about itself.
 */
export function makeEntry(severity: EntryLevel, message: string, payload: Record<string, unknown> = {}): Entry {

    return copyEntry({
        ...createDraft(),
        severity,
        message,
        timestamp: new Date(),
        payload,
    });

}
