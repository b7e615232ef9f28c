/**
 * Level Gate
 *
 * Parsing and comparison of severities. A level is observable when the
 * logger's numeric threshold is at least the level's value, so every
 * check is one comparison made before any allocation.
 */
import { InvalidLevelError } from './errors.js';
import { LEVEL_VALUE } from './types.js';
import type { EntryLevel, Level } from './types.js';

/**
 * Type guard for level names (exact, upper case).
 */
export function isLevel(value: unknown): value is Level {

    return typeof value === 'string' && Object.hasOwn(LEVEL_VALUE, value);

}

/**
 * Parse a level name, ignoring case and surrounding whitespace.
 *
 * @throws InvalidLevelError when the name is unknown
 *
 * @example
 * ```typescript
 * parseLevel('warn')    // 'WARN'
 * parseLevel(' Debug ') // 'DEBUG'
 * parseLevel('verbose') // throws InvalidLevelError
 * ```
 */
export function parseLevel(text: string): Level {

    const normalized = text.trim().toUpperCase();

    if (!isLevel(normalized)) {

        throw new InvalidLevelError(text);

    }

    return normalized;

}

/**
 * Check whether a level is observable under a threshold value.
 *
 * @example
 * ```typescript
 * isLevelEnabled(LEVEL_VALUE.INFO, 'WARN')  // true
 * isLevelEnabled(LEVEL_VALUE.INFO, 'DEBUG') // false
 * isLevelEnabled(LEVEL_VALUE.OFF, 'CRITICAL') // false
 * ```
 */
export function isLevelEnabled(threshold: number, level: Level): boolean {

    return threshold >= LEVEL_VALUE[level];

}

/**
 * True for ERROR and CRITICAL.
 */
export function isErrorOrAbove(level: EntryLevel): boolean {

    return LEVEL_VALUE[level] <= LEVEL_VALUE.ERROR;

}
