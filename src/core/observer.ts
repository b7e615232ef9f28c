/**
 * Diagnostics channel for emberlog.
 *
 * The logger cannot log its own failures through itself without risking
 * a loop, so it reports them here instead. Applications subscribe to
 * forward them wherever they like.
 *
 * @example
 * ```typescript
 * const cleanup = diagnostics.on('hook:failed', ({ hook, error }) => {
 *     metrics.increment('log_hook_failures', { hook })
 * })
 *
 * // Pattern matching for multiple events
 * diagnostics.on(/^hook:/, ({ event, data }) => report(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'
import { attemptSync } from '@logosdx/utils'

import type { EntryLevel } from './logger/types.js'


/**
 * Events emitted by the logging pipeline.
 *
 * - `format:failed` - A formatter threw; the entry missed the sink
 * - `write:failed` - The sink threw while writing a line
 * - `hook:failed` - A hook returned an Error
 * - `hook:panicked` - A hook threw or rejected
 * - `config:invalid-env` - An EMBERLOG_* variable was ignored
 */
export interface DiagnosticEvents {
    'format:failed': { error: Error; severity: EntryLevel; message: string }
    'write:failed': { error: Error; severity: EntryLevel }
    'hook:failed': { hook: string; error: Error; severity: EntryLevel }
    'hook:panicked': { hook: string; reason: string; severity: EntryLevel }
    'config:invalid-env': { variable: string; value: string; reason: string }
}

export type DiagnosticEventNames = Events<DiagnosticEvents>;

/**
 * Global diagnostics bus.
 *
 * Enable debug mode with `EMBERLOG_DEBUG=1` to see all events as they occur.
 */
export const diagnostics = new ObserverEngine<DiagnosticEvents>({
    name: 'emberlog',
    spy: process.env['EMBERLOG_DEBUG']
        ? (action) => console.error(`[emberlog:${action.fn}] ${String(action.event)}`)
        : undefined
});


/**
 * Run a diagnostics emit from inside the logging path.
 *
 * A throwing listener is contained so that logging calls never raise.
 *
 * @example
 * ```typescript
 * report(() => diagnostics.emit('write:failed', { error, severity }))
 * ```
 */
export function report(emit: () => void): void {

    const [, err] = attemptSync(emit)

    if (err) {

        console.error(`[emberlog] diagnostics listener threw: ${err.message}`)
    }
}
