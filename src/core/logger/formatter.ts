/**
 * Formatter Helpers
 *
 * Rules shared by every formatter: the fixed order of special fields,
 * key-sorted labels and payload, duplicate-key suppression, masking,
 * quoting of tokens in the non-structured formats, and the single
 * conversion of payload values to text.
 */
import { attemptSync } from '@logosdx/utils'

import type { MaskingOptions, MaskingPolicy } from './redact.js'
import type { Entry } from './types.js'


/**
 * Options every formatter accepts.
 */
export type FormatterOptions = MaskingOptions

/**
 * One rendered key/value pair, not yet quoted.
 */
export interface FieldPair {
    readonly key: string
    readonly value: string
}


// ─────────────────────────────────────────────────────────────
// Tokens
// ─────────────────────────────────────────────────────────────

const NEEDS_QUOTING = /[ ="]/

/**
 * True for the empty string and tokens containing space, `=` or `"`.
 */
export function needsQuoting(token: string): boolean {

    return token === '' || NEEDS_QUOTING.test(token)
}


/**
 * Quote a token when needed, escaping inner double quotes.
 *
 * @example
 * ```typescript
 * quoteToken('value')      // value
 * quoteToken('jp east')    // "jp east"
 * quoteToken('a "b"')      // "a \"b\""
 * quoteToken('')           // ""
 * ```
 */
export function quoteToken(token: string): string {

    if (!needsQuoting(token)) {

        return token
    }

    return `"${token.replace(/"/g, '\\"')}"`
}


/**
 * Inverse of quoteToken.
 */
export function unquoteToken(token: string): string {

    if (token.length < 2 || !token.startsWith('"') || !token.endsWith('"')) {

        return token
    }

    return token.slice(1, -1).replace(/\\"/g, '"')
}


/**
 * Render `key=value` with both sides quoted as needed.
 */
export function renderPair(pair: FieldPair): string {

    return `${quoteToken(pair.key)}=${quoteToken(pair.value)}`
}


// ─────────────────────────────────────────────────────────────
// Values
// ─────────────────────────────────────────────────────────────

function hasOwnToString(value: object): boolean {

    return !Array.isArray(value)
        && typeof value.toString === 'function'
        && value.toString !== Object.prototype.toString
}


/**
 * Convert a payload value to text.
 *
 * Strings stay as they are, errors render their message, dates render
 * as ISO 8601, objects with their own `toString` use it, and anything
 * else goes through JSON. Never throws.
 *
 * @example
 * ```typescript
 * renderValue(42)                      // '42'
 * renderValue(new Error('boom'))       // 'boom'
 * renderValue({ a: 1 })                // '{"a":1}'
 * renderValue(new URL('http://x.io/')) // 'http://x.io/'
 * ```
 */
export function renderValue(value: unknown): string {

    if (typeof value === 'string') {

        return value
    }

    if (typeof value === 'symbol') {

        return value.toString()
    }

    if (typeof value === 'function') {

        return `[function ${value.name || 'anonymous'}]`
    }

    if (typeof value !== 'object' || value === null) {

        return String(value)
    }

    if (value instanceof Error) {

        return value.message
    }

    if (value instanceof Date) {

        return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString()
    }

    if (hasOwnToString(value)) {

        const [text] = attemptSync(() => String(value))

        if (text !== null) {

            return text
        }
    }

    const [json] = attemptSync(() => JSON.stringify(value))

    return typeof json === 'string' ? json : '[unserializable]'
}


// ─────────────────────────────────────────────────────────────
// Timestamps and messages
// ─────────────────────────────────────────────────────────────

/**
 * RFC 3339 in UTC with the fractional seconds trimmed of trailing zeros.
 *
 * @example
 * ```typescript
 * formatTimestamp(new Date('2025-09-30T14:00:00.000Z')) // '2025-09-30T14:00:00Z'
 * formatTimestamp(new Date('2025-09-30T14:00:00.120Z')) // '2025-09-30T14:00:00.12Z'
 * ```
 */
export function formatTimestamp(date: Date): string {

    return date.toISOString().replace(/\.(\d*?)0*Z$/, (_, fraction: string) => (fraction ? `.${fraction}Z` : 'Z'))
}


/**
 * RFC 3339 in UTC, whole seconds.
 */
export function formatTimestampSeconds(date: Date): string {

    return `${date.toISOString().slice(0, 19)}Z`
}


/**
 * Drop trailing newlines from a message.
 */
export function trimMessage(message: string): string {

    return message.replace(/\n+$/, '')
}


// ─────────────────────────────────────────────────────────────
// Field collection
// ─────────────────────────────────────────────────────────────

function sourceText(entry: Entry): string | undefined {

    const location = entry.sourceLocation

    if (!location?.file) {

        return undefined
    }

    return location.line ? `${location.file}:${location.line}` : location.file
}


/**
 * Collect the pairs of the non-structured formats in render order:
 * special fields, `label.*` pairs, then payload.
 *
 * Keys already in `rendered` (and keys emitted here) suppress later
 * pairs with the same key. Masking applies to labels and payload only.
 */
export function collectPairs(
    entry: Entry,
    masking: MaskingPolicy,
    rendered: Set<string> = new Set(),
): FieldPair[] {

    const pairs: FieldPair[] = []
    const http = entry.httpRequest

    const add = (key: string, value: string | undefined): void => {

        if (value === undefined || rendered.has(key)) {

            return
        }

        rendered.add(key)
        pairs.push({ key, value })
    }

    const nonEmpty = (value: string | undefined): string | undefined => (value ? value : undefined)

    add('source', sourceText(entry))
    add('trace', nonEmpty(entry.trace))
    add('spanId', nonEmpty(entry.spanId))
    add('traceSampled', entry.traceSampled === undefined ? undefined : String(entry.traceSampled))
    add('correlationId', nonEmpty(entry.correlationId))

    if (http) {

        add('http.method', nonEmpty(http.requestMethod))
        add('http.status', http.status ? String(http.status) : undefined)
        add('http.url', nonEmpty(http.requestUrl))
        add('http.userAgent', nonEmpty(http.userAgent))
        add('http.remoteIp', nonEmpty(http.remoteIp))
        add('http.latency', nonEmpty(http.latency))
    }

    for (const key of Object.keys(entry.labels).sort()) {

        add(`label.${key}`, renderValue(masking.apply(key, entry.labels[key])))
    }

    for (const key of Object.keys(entry.payload).sort()) {

        add(key, renderValue(masking.apply(key, entry.payload[key])))
    }

    return pairs
}
