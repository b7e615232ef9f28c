/**
 * Masking Policy
 *
 * Per-formatter redaction of label and payload values by key. Keys are
 * matched against an exact set first, then against a case-folded set.
 * Both are plain Set lookups; an empty policy is skipped entirely.
 *
 * @example
 * ```typescript
 * const policy = new MaskingPolicy({
 *     keys: ['password'],
 *     keysIgnoreCase: ['api_key'],
 * })
 *
 * policy.apply('password', 'test-secret')  // '[REDACTED]'
 * policy.apply('API_KEY', 'test-secret')   // '[REDACTED]'
 * policy.apply('Password', 'test-secret')  // 'test-secret'
 * ```
 */

/**
 * Replacement for masked values.
 */
export const REDACTED = '[REDACTED]';

export interface MaskingOptions {

    /** Keys masked on exact match. */
    keys?: readonly string[];

    /** Keys masked regardless of case. */
    keysIgnoreCase?: readonly string[];
}

export class MaskingPolicy {

    readonly #exact: ReadonlySet<string>;
    readonly #folded: ReadonlySet<string>;

    constructor(options: MaskingOptions = {}) {

        this.#exact = new Set(options.keys ?? []);
        this.#folded = new Set((options.keysIgnoreCase ?? []).map((key) => key.toLowerCase()));

    }

    get isEmpty(): boolean {

        return this.#exact.size === 0 && this.#folded.size === 0;

    }

    /**
     * Check whether values under this key are masked.
     */
    shouldMask(key: string): boolean {

        if (this.isEmpty) {

            return false;

        }

        if (this.#exact.has(key)) {

            return true;

        }

        return this.#folded.size > 0 && this.#folded.has(key.toLowerCase());

    }

    /**
     * Return the value to render for a key.
     */
    apply(key: string, value: unknown): unknown {

        return this.shouldMask(key) ? REDACTED : value;

    }

}
