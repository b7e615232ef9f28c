/**
 * Logfmt Formatter
 *
 * Space-separated `key=value` pairs, starting with timestamp, severity
 * and message. Payload keys named like those three are suppressed.
 *
 * @example
 * ```
 * timestamp=2025-09-30T14:00:00Z severity=ERROR message="request failed" status=500
 * ```
 */
import { MaskingPolicy } from '../redact.js'
import {
    collectPairs,
    formatTimestamp,
    quoteToken,
    renderPair,
    trimMessage,
} from '../formatter.js'
import type { FormatterOptions } from '../formatter.js'
import type { Entry, Formatter } from '../types.js'


const HEAD_KEYS = ['timestamp', 'severity', 'message'] as const


export class LogfmtFormatter implements Formatter {

    readonly #masking: MaskingPolicy

    constructor(options: FormatterOptions = {}) {

        this.#masking = new MaskingPolicy(options)
    }


    format(entry: Entry): string {

        const pairs = collectPairs(entry, this.#masking, new Set<string>(HEAD_KEYS))

        return [this.formatMessageOnly(entry), ...pairs.map(renderPair)].join(' ')
    }


    formatMessageOnly(entry: Entry): string {

        const timestamp = formatTimestamp(entry.timestamp)
        const message = quoteToken(trimMessage(entry.message))

        return `timestamp=${timestamp} severity=${entry.severity} message=${message}`
    }
}


export function logfmtFormatter(options: FormatterOptions = {}): LogfmtFormatter {

    return new LogfmtFormatter(options)
}
