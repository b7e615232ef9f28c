/**
 * Logger Module
 *
 * Structured, leveled logging with pluggable formatters and an
 * asynchronous hook worker.
 *
 * Features:
 * - Copy-on-write loggers (`with*` derive, never mutate)
 * - JSON, text, logfmt and console formatters with key masking
 * - Bounded, drop-on-full hook queue with fault isolation
 * - Process-wide default logger and package-level functions
 */

// Types
export type {
    Level,
    EntryLevel,
    SourceMode,
    HttpRequest,
    SourceLocation,
    Entry,
    LogSink,
    Formatter,
    Hook,
    HookResult,
    HookState,
    HookStats,
    TraceContext,
} from './types.js';

export { LEVEL_VALUE, ENTRY_LEVELS, DEFAULT_HOOK_BUFFER_SIZE } from './types.js';

// Errors
export { LoggerConfigError, InvalidLevelError, FieldBindingError } from './errors.js';

// Levels
export { isLevel, parseLevel, isLevelEnabled } from './levels.js';

// Fields
export { MISSING_VALUE, LOGGING_ERROR_KEY, extractTrace } from './fields.js';

// Formatting
export { quoteToken, unquoteToken, renderValue, type FormatterOptions } from './formatter.js';
export { MaskingPolicy, REDACTED, type MaskingOptions } from './redact.js';
export { JsonFormatter, jsonFormatter } from './formatters/json.js';
export { TextFormatter, textFormatter } from './formatters/text.js';
export { LogfmtFormatter, logfmtFormatter } from './formatters/logfmt.js';
export {
    ConsoleFormatter,
    consoleFormatter,
    type ConsoleFormatterOptions,
    type Style,
} from './formatters/console.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';

// Default logger
export {
    getDefaultLogger,
    setDefaultLogger,
    setDefaultLevel,
    setDefaultOutput,
    setDefaultFormatter,
    setDefaultAutoSource,
    setDefaultHooks,
    setDefaultProjectId,
    setDefaultTraceContextKey,
    setDefaultPrefix,
    setDefaultLabels,
    removeDefaultLabels,
    closeDefault,
    resetDefaultLogger,
    debug,
    info,
    warn,
    error,
    critical,
    debugf,
    infof,
    warnf,
    errorf,
    criticalf,
    debugCtx,
    infoCtx,
    warnCtx,
    errorCtx,
    criticalCtx,
    debugfCtx,
    infofCtx,
    warnfCtx,
    errorfCtx,
    criticalfCtx,
    log,
    logCtx,
    print,
    printCtx,
    printf,
    printfCtx,
    fatal,
    fatalf,
    fatalCtx,
    fatalfCtx,
    isDebugEnabled,
    isInfoEnabled,
    isWarnEnabled,
    isErrorEnabled,
    isCriticalEnabled,
} from './default.js';
