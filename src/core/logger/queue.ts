/**
 * Hook Queue
 *
 * A bounded queue drained by one asynchronous worker that fans entries
 * out to hooks. Offering an entry never waits: when the queue is full
 * the entry is dropped and counted.
 *
 * The queue guarantees:
 * - Order preservation (entries reach each hook in submission order)
 * - Hooks never run on the logging call's stack
 * - Fault isolation (a throwing hook does not stop the others)
 * - Graceful shutdown (close waits until every queued entry is delivered)
 */
import { setImmediate as nextTick } from 'node:timers/promises'
import { attempt } from '@logosdx/utils'

import { diagnostics, report } from '../observer.js'
import { copyEntry } from './entry.js'
import { ENTRY_LEVELS } from './types.js'
import type { Entry, EntryLevel, Hook, HookResult, HookState, HookStats } from './types.js'


export interface HookQueueOptions {
    hooks: readonly Hook[]
    capacity: number

    /**
     * Called when a hook throws or rejects, after the fault is counted
     * and reported.
     */
    onPanic: (reason: string, entry: Entry) => void
}


/**
 * Display name of a hook for diagnostics.
 */
export function hookName(hook: Hook): string {

    return hook.name ?? hook.constructor.name
}


/**
 * Severity to hooks index. An empty level list means every severity;
 * OFF is ignored and ALL stands for every severity.
 */
function indexHooks(hooks: readonly Hook[]): Map<EntryLevel, Hook[]> {

    const index = new Map<EntryLevel, Hook[]>()

    for (const hook of hooks) {

        const levels = hook.levels()
        const wanted = new Set<EntryLevel>()

        for (const level of levels.length === 0 ? ['ALL' as const] : levels) {

            if (level === 'OFF') {

                continue
            }

            if (level === 'ALL') {

                ENTRY_LEVELS.forEach((each) => wanted.add(each))
                continue
            }

            wanted.add(level)
        }

        for (const level of wanted) {

            const list = index.get(level) ?? []
            list.push(hook)
            index.set(level, list)
        }
    }

    return index
}


/**
 * Hook worker shared by a logger and everything derived from it.
 *
 * @example
 * ```typescript
 * const queue = new HookQueue({ hooks: [alerts], capacity: 100, onPanic })
 *
 * queue.offer(entry)    // false when full
 * await queue.close()   // every queued entry delivered
 * ```
 */
/**
 * Run one hook, turning whatever it throws or rejects with into an
 * Error (`throw undefined` included).
 */
async function fireHook(hook: Hook, entry: Entry): Promise<HookResult> {

    try {

        return await hook.fire(entry)
    }
    catch (thrown) {

        throw thrown instanceof Error ? thrown : new Error(String(thrown))
    }
}


export class HookQueue {

    #index: Map<EntryLevel, Hook[]>
    #capacity: number
    #onPanic: HookQueueOptions['onPanic']
    #queue: Entry[] = []
    #state: HookState = 'unstarted'
    #isDraining = false
    #delivered = 0
    #dropped = 0
    #failed = 0
    #panicked = 0

    // Promise of the running drain cycle
    #drainPromise: Promise<void> | null = null

    // Memoized shutdown
    #closePromise: Promise<void> | null = null

    constructor(options: HookQueueOptions) {

        this.#index = indexHooks(options.hooks)
        this.#capacity = options.capacity
        this.#onPanic = options.onPanic
        this.#state = 'running'
    }


    get state(): HookState {

        return this.#state
    }


    get capacity(): number {

        return this.#capacity
    }


    get stats(): HookStats {

        return {
            pending: this.#queue.length,
            delivered: this.#delivered,
            dropped: this.#dropped,
            failed: this.#failed,
            panicked: this.#panicked,
        }
    }


    /**
     * Check if any hook wants entries at this severity.
     */
    accepts(severity: EntryLevel): boolean {

        return this.#state === 'running' && this.#index.has(severity)
    }


    /**
     * Queue a copy of an entry for delivery.
     *
     * This is non-blocking - the caller never waits for hooks.
     *
     * @returns false when the entry was dropped (full or shutting down)
     */
    offer(entry: Entry): boolean {

        if (this.#state !== 'running') {

            return false
        }

        if (this.#queue.length >= this.#capacity) {

            this.#dropped++
            return false
        }

        this.#queue.push(copyEntry(entry))
        this.#startDrainCycle()

        return true
    }


    /**
     * Wait until the queue is empty and no hook is running.
     */
    async flush(): Promise<void> {

        this.#startDrainCycle()

        // A cycle that ends with entries offered meanwhile starts another
        while (this.#drainPromise) {

            await this.#drainPromise
        }
    }


    /**
     * Stop accepting entries and deliver everything already queued.
     *
     * Safe to call more than once; every call gets the same promise.
     */
    close(): Promise<void> {

        if (!this.#closePromise) {

            this.#closePromise = this.#shutdown()
        }

        return this.#closePromise
    }


    async #shutdown(): Promise<void> {

        this.#state = 'draining'

        await this.flush()

        this.#state = 'stopped'
    }


    /**
     * Start the drain cycle if not already running.
     */
    #startDrainCycle(): void {

        if (this.#isDraining || this.#queue.length === 0) {

            return
        }

        this.#isDraining = true
        this.#drainPromise = this.#drainCycle()
    }


    /**
     * Deliver queue entries sequentially, first yielding so that the
     * logging call returns before any hook runs.
     */
    async #drainCycle(): Promise<void> {

        await nextTick()

        while (this.#queue.length > 0) {

            const entry = this.#queue.shift()

            if (!entry) {

                continue
            }

            await this.#deliver(entry)
        }

        this.#isDraining = false
        this.#drainPromise = null
    }


    async #deliver(entry: Entry): Promise<void> {

        const hooks = this.#index.get(entry.severity) ?? []

        for (const hook of hooks) {

            const [result, err] = await attempt(() => fireHook(hook, copyEntry(entry)))

            if (err) {

                this.#panicked++

                const reason = err.message

                report(() => diagnostics.emit('hook:panicked', {
                    hook: hookName(hook),
                    reason,
                    severity: entry.severity,
                }))

                this.#onPanic(reason, entry)
                continue
            }

            if (result instanceof Error) {

                this.#failed++

                report(() => diagnostics.emit('hook:failed', {
                    hook: hookName(hook),
                    error: result,
                    severity: entry.severity,
                }))

                continue
            }

            this.#delivered++
        }
    }
}
