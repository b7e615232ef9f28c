/**
 * Logger errors.
 *
 * Thrown while building or deriving a logger. Logging calls themselves
 * never throw; malformed call-site arguments land in the payload.
 */


/**
 * Error when a logger option fails validation.
 *
 * @example
 * ```typescript
 * const [logger, err] = attemptSync(() => new Logger({ hookBufferSize: 0 }))
 * if (err instanceof LoggerConfigError) {
 *     console.error(`${err.option}: ${err.reason}`)
 * }
 * ```
 */
export class LoggerConfigError extends Error {

    override readonly name = 'LoggerConfigError' as const

    constructor(
        public readonly option: string,
        public readonly reason: string,
    ) {

        super(`Invalid logger option '${option}': ${reason}`)
    }
}


/**
 * Error when a level name is not one of OFF, CRITICAL, ERROR, WARN,
 * INFO, DEBUG or ALL.
 */
export class InvalidLevelError extends Error {

    override readonly name = 'InvalidLevelError' as const

    constructor(public readonly input: string) {

        super(`Invalid log level: '${input}'`)
    }
}


/**
 * Error when `with(...)` receives an odd number of arguments or a
 * key that is not a string.
 *
 * `position` is the zero-based index of the offending argument.
 */
export class FieldBindingError extends Error {

    override readonly name = 'FieldBindingError' as const

    constructor(
        public readonly position: number,
        public readonly reason: string,
    ) {

        super(`Cannot bind fields: ${reason} (argument ${position})`)
    }
}
