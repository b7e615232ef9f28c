/**
 * Text Formatter
 *
 * Human-readable single line:
 *
 * ```
 * 2025-09-30T14:00:00Z [WARN] low disk { label.region=eu, pct=91 }
 * ```
 *
 * The braces are left out when there are no pairs.
 */
import { MaskingPolicy } from '../redact.js'
import {
    collectPairs,
    formatTimestampSeconds,
    renderPair,
    trimMessage,
} from '../formatter.js'
import type { FormatterOptions } from '../formatter.js'
import type { Entry, Formatter } from '../types.js'


export class TextFormatter implements Formatter {

    readonly #masking: MaskingPolicy

    constructor(options: FormatterOptions = {}) {

        this.#masking = new MaskingPolicy(options)
    }


    format(entry: Entry): string {

        const head = this.formatMessageOnly(entry)
        const pairs = collectPairs(entry, this.#masking)

        if (pairs.length === 0) {

            return head
        }

        return `${head} { ${pairs.map(renderPair).join(', ')} }`
    }


    formatMessageOnly(entry: Entry): string {

        return `${formatTimestampSeconds(entry.timestamp)} [${entry.severity}] ${trimMessage(entry.message)}`
    }
}


export function textFormatter(options: FormatterOptions = {}): TextFormatter {

    return new TextFormatter(options)
}
