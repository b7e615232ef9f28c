/**
 * emberlog
 *
 * Public entry point. Everything applications use is re-exported here.
 */
export * from './core/logger/index.js'

// Diagnostics
export { diagnostics } from './core/observer.js'
export type { DiagnosticEvents, DiagnosticEventNames } from './core/observer.js'

// Environment
export { shouldUseColor } from './core/environment.js'
