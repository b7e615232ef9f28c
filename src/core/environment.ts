/**
 * Environment Detection
 *
 * Reads the EMBERLOG_* variables and terminal capabilities. Used by the
 * default logger (initial level) and the console formatter (colour).
 */

/**
 * Variable holding the default logger's initial level.
 */
export const LEVEL_ENV = 'EMBERLOG_LEVEL';

export const FORCE_COLOR_ENV = 'EMBERLOG_FORCE_COLOR';

export const NO_COLOR_ENV = 'EMBERLOG_NO_COLOR';

/**
 * Raw EMBERLOG_LEVEL value, or undefined when unset or blank.
 */
export function readLevelFromEnv(): string | undefined {

    const value = process.env[LEVEL_ENV]?.trim();

    return value ? value : undefined;

}

/**
 * Decide whether the console formatter colours its output.
 *
 * Checks, in order:
 * - EMBERLOG_FORCE_COLOR set: colour on
 * - EMBERLOG_NO_COLOR or NO_COLOR set: colour off
 * - otherwise colour when stdout or stderr is a TTY
 *
 * @example
 * ```typescript
 * const formatter = consoleFormatter({ color: shouldUseColor() })
 * ```
 */
export function shouldUseColor(): boolean {

    if (process.env[FORCE_COLOR_ENV]) {

        return true;

    }

    if (process.env[NO_COLOR_ENV] || process.env['NO_COLOR']) {

        return false;

    }

    return Boolean(process.stdout.isTTY || process.stderr.isTTY);

}
