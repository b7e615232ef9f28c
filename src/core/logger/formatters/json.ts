/**
 * JSON Formatter
 *
 * One JSON object per line, using the structured-logging key names that
 * log collectors such as Cloud Logging pick up (`severity`,
 * `logging.googleapis.com/trace`, `httpRequest`, ...). Payload keys sit
 * at the top level after the special fields.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ formatter: jsonFormatter({ keys: ['password'] }) })
 * logger.info('signed in', 'user', 'u1')
 * // {"message":"signed in","severity":"INFO","timestamp":"...","user":"u1"}
 * ```
 */
import { MaskingPolicy } from '../redact.js'
import { formatTimestamp } from '../formatter.js'
import type { FormatterOptions } from '../formatter.js'
import type { Entry, Formatter } from '../types.js'


export const SOURCE_LOCATION_KEY = 'logging.googleapis.com/sourceLocation'
export const TRACE_KEY = 'logging.googleapis.com/trace'
export const SPAN_ID_KEY = 'logging.googleapis.com/spanId'
export const TRACE_SAMPLED_KEY = 'logging.googleapis.com/trace_sampled'


/**
 * Drop undefined, empty and zero members.
 */
function omitEmpty(record: object): Record<string, unknown> {

    return Object.fromEntries(
        Object.entries(record).filter(([, value]) => value !== undefined && value !== '' && value !== 0),
    )
}


/**
 * Errors nested in payload values serialize as their message.
 */
function replaceErrors(_key: string, value: unknown): unknown {

    return value instanceof Error ? value.message : value
}


export class JsonFormatter implements Formatter {

    readonly #masking: MaskingPolicy

    constructor(options: FormatterOptions = {}) {

        this.#masking = new MaskingPolicy(options)
    }


    /**
     * @throws TypeError when a payload value cannot be serialized
     * (circular structures, BigInt)
     */
    format(entry: Entry): string {

        const fields: Array<[string, unknown]> = [
            ['message', entry.message],
            ['severity', entry.severity],
            ['timestamp', formatTimestamp(entry.timestamp)],
        ]

        if (entry.sourceLocation) {

            fields.push([SOURCE_LOCATION_KEY, omitEmpty(entry.sourceLocation)])
        }

        if (entry.trace) {

            fields.push([TRACE_KEY, entry.trace])
        }

        if (entry.spanId) {

            fields.push([SPAN_ID_KEY, entry.spanId])
        }

        if (entry.traceSampled !== undefined) {

            fields.push([TRACE_SAMPLED_KEY, entry.traceSampled])
        }

        if (entry.correlationId) {

            fields.push(['correlationId', entry.correlationId])
        }

        if (entry.httpRequest) {

            fields.push(['httpRequest', omitEmpty(entry.httpRequest)])
        }

        const labelKeys = Object.keys(entry.labels).sort()

        if (labelKeys.length > 0) {

            const labels = labelKeys.map((key): [string, unknown] => [
                key,
                this.#masking.apply(key, entry.labels[key]),
            ])

            fields.push(['labels', Object.fromEntries(labels)])
        }

        const rendered = new Set(fields.map(([key]) => key))

        for (const key of Object.keys(entry.payload).sort()) {

            if (rendered.has(key)) {

                continue
            }

            fields.push([key, this.#masking.apply(key, entry.payload[key])])
        }

        return JSON.stringify(Object.fromEntries(fields), replaceErrors)
    }


    formatMessageOnly(entry: Entry): string {

        return JSON.stringify({
            timestamp: formatTimestamp(entry.timestamp),
            severity: entry.severity,
            message: entry.message,
        })
    }
}


export function jsonFormatter(options: FormatterOptions = {}): JsonFormatter {

    return new JsonFormatter(options)
}
