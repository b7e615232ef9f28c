/**
 * Console Formatter
 *
 * Text layout for terminals, with the severity tag coloured and
 * optional per-key highlight styles. Colour follows
 * EMBERLOG_FORCE_COLOR / EMBERLOG_NO_COLOR / TTY detection unless set
 * explicitly. Uses ansis, so any ansis style works as a highlight.
 *
 * @example
 * ```typescript
 * import ansis from 'ansis'
 *
 * const formatter = consoleFormatter({
 *     highlights: { userID: ansis.bold.magenta, 'label.region': ansis.cyan },
 * })
 * ```
 */
import ansis from 'ansis'

import { shouldUseColor } from '../../environment.js'
import { MaskingPolicy } from '../redact.js'
import {
    collectPairs,
    formatTimestampSeconds,
    renderPair,
    trimMessage,
} from '../formatter.js'
import type { FormatterOptions } from '../formatter.js'
import type { Entry, EntryLevel, Formatter } from '../types.js'


/**
 * Function that wraps text in terminal styling.
 */
export type Style = (text: string) => string


export interface ConsoleFormatterOptions extends FormatterOptions {

    /** Colour output. Defaults to the environment's colour support. */
    color?: boolean

    /**
     * Styles applied to whole `key=value` pairs, keyed by the rendered
     * key (`userID`, `label.region`, `http.status`).
     */
    highlights?: Readonly<Record<string, Style>>
}


/**
 * Hex palette for severity tags.
 */
const palette = {
    critical: '#FF5F87',
    error: '#FF6B6B',
    warn: '#FFB86C',
    info: '#50FA7B',
    debug: '#8BE9FD',
} as const


const LEVEL_STYLE: Readonly<Record<EntryLevel, Style>> = {
    CRITICAL: (text) => ansis.bold.hex(palette.critical)(text),
    ERROR: (text) => ansis.hex(palette.error)(text),
    WARN: (text) => ansis.hex(palette.warn)(text),
    INFO: (text) => ansis.hex(palette.info)(text),
    DEBUG: (text) => ansis.hex(palette.debug)(text),
}


export class ConsoleFormatter implements Formatter {

    readonly #masking: MaskingPolicy
    readonly #color: boolean
    readonly #highlights: ReadonlyMap<string, Style>

    constructor(options: ConsoleFormatterOptions = {}) {

        this.#masking = new MaskingPolicy(options)
        this.#color = options.color ?? shouldUseColor()
        this.#highlights = new Map(Object.entries(options.highlights ?? {}))
    }


    get color(): boolean {

        return this.#color
    }


    format(entry: Entry): string {

        const tag = `[${entry.severity}]`
        const level = this.#color ? LEVEL_STYLE[entry.severity](tag) : tag
        const head = `${formatTimestampSeconds(entry.timestamp)} ${level} ${trimMessage(entry.message)}`
        const pairs = collectPairs(entry, this.#masking)

        if (pairs.length === 0) {

            return head
        }

        const rendered = pairs.map((pair) => {

            const text = renderPair(pair)
            const style = this.#color ? this.#highlights.get(pair.key) : undefined

            return style ? style(text) : text
        })

        return `${head} { ${rendered.join(', ')} }`
    }


    /**
     * Never coloured.
     */
    formatMessageOnly(entry: Entry): string {

        return `${formatTimestampSeconds(entry.timestamp)} [${entry.severity}] ${trimMessage(entry.message)}`
    }
}


export function consoleFormatter(options: ConsoleFormatterOptions = {}): ConsoleFormatter {

    return new ConsoleFormatter(options)
}
