/**
 * Logger Zod schemas and validation.
 *
 * Options are validated once when a logger is built so that logging
 * calls never meet a bad configuration. The HTTP request and source
 * location shapes also decide when a reserved field is promoted out of
 * the payload.
 */
import { z } from 'zod';

import { LoggerConfigError } from './errors.js';
import type { Formatter, Hook, LogSink } from './types.js';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

export const LevelSchema = z.enum(['OFF', 'CRITICAL', 'ERROR', 'WARN', 'INFO', 'DEBUG', 'ALL']);

export const SourceModeSchema = z.enum(['never', 'always', 'error']);

/**
 * Lookup key for the trace header in a request context.
 */
export const TraceContextKeySchema = z.union([
    z.string().min(1, 'Trace context key must not be empty'),
    z.number(),
    z.symbol(),
]);

function hasMethods(value: unknown, ...methods: string[]): boolean {

    if (typeof value !== 'object' || value === null) {

        return false;

    }

    return methods.every((method) => method in value && typeof Reflect.get(value, method) === 'function');

}

export const LabelsSchema = z.record(z.string());

export const SinkSchema = z.custom<LogSink>(
    (value) => hasMethods(value, 'write'),
    'Expected an object with a write() method',
);

export const FormatterSchema = z.custom<Formatter>(
    (value) => hasMethods(value, 'format', 'formatMessageOnly'),
    'Expected an object with format() and formatMessageOnly() methods',
);

export const HookSchema = z.custom<Hook>(
    (value) => hasMethods(value, 'levels', 'fire'),
    'Expected an object with levels() and fire() methods',
);

const ExitSchema = z.custom<(code: number) => void>(
    (value) => typeof value === 'function',
    'Expected a function',
);

// ─────────────────────────────────────────────────────────────
// Promotable Field Shapes
// ─────────────────────────────────────────────────────────────

/**
 * Only known keys, correctly typed, and at least one of them.
 */
export const HttpRequestSchema = z
    .object({
        requestMethod: z.string().optional(),
        requestUrl: z.string().optional(),
        status: z.number().int().optional(),
        userAgent: z.string().optional(),
        remoteIp: z.string().optional(),
        latency: z.string().optional(),
    })
    .strict()
    .refine((value) => Object.keys(value).length > 0, 'Expected at least one request field');

export const SourceLocationSchema = z
    .object({
        file: z.string().optional(),
        line: z.number().int().nonnegative().optional(),
        function: z.string().optional(),
    })
    .strict()
    .refine((value) => Object.keys(value).length > 0, 'Expected at least one location field');

// ─────────────────────────────────────────────────────────────
// Logger Options
// ─────────────────────────────────────────────────────────────

export const LoggerOptionsSchema = z
    .object({
        output: SinkSchema.optional(),
        errorOutput: SinkSchema.optional(),
        level: LevelSchema.optional(),
        formatter: FormatterSchema.optional(),
        autoSource: SourceModeSchema.optional(),
        projectId: z.string().optional(),
        traceContextKey: TraceContextKeySchema.optional(),
        prefix: z.string().optional(),
        labels: LabelsSchema.optional(),
        fields: z.record(z.unknown()).optional(),
        hooks: z.array(HookSchema).optional(),
        hookBufferSize: z
            .number()
            .int('Hook buffer size must be an integer')
            .positive('Hook buffer size must be positive')
            .optional(),
        exit: ExitSchema.optional(),
    })
    .strict();

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Parse a value against a schema, converting the first issue into a
 * LoggerConfigError named after `option` and the failing path. Pass an
 * empty `option` when validating a whole options object.
 *
 * @throws LoggerConfigError if validation fails
 *
 * @example
 * ```typescript
 * const level = validateOption(LevelSchema, 'level', input)
 * ```
 */
export function validateOption<T extends z.ZodTypeAny>(
    schema: T,
    option: string,
    value: unknown,
): z.output<T> {

    const result = schema.safeParse(value);

    if (!result.success) {

        const firstIssue = result.error.issues[0];
        const name = [option, ...(firstIssue?.path ?? [])].filter((part) => part !== '').join('.');

        throw new LoggerConfigError(
            name || 'options',
            firstIssue?.message ?? 'Validation failed',
        );

    }

    return result.data;

}
