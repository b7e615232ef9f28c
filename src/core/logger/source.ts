/**
 * Source Locator
 *
 * Finds the caller of a logging method by walking the V8 call sites and
 * skipping every frame that lies inside this package's own source tree.
 */
import { dirname, sep } from 'node:path';
import { fileURLToPath } from 'node:url';

import { isErrorOrAbove } from './levels.js';
import type { EntryLevel, SourceLocation, SourceMode } from './types.js';

/**
 * Root of the package's sources (`src/` or `dist/`), with a trailing
 * separator.
 */
const PACKAGE_ROOT = dirname(dirname(dirname(fileURLToPath(import.meta.url)))) + sep;

const MAX_FRAMES = 32;

function toPath(fileName: string): string {

    return fileName.startsWith('file://') ? fileURLToPath(fileName) : fileName;

}

/**
 * Whether an entry at this severity gets a source location.
 */
export function shouldCaptureSource(mode: SourceMode, severity: EntryLevel): boolean {

    switch (mode) {

    case 'always':
        return true;
    case 'error':
        return isErrorOrAbove(severity);
    default:
        return false;

    }

}

/**
 * Location of the first stack frame outside `root`.
 *
 * @returns undefined when every frame is internal
 *
 * @example
 * ```typescript
 * // in app/server.ts, line 12, inside handle()
 * captureSource() // { file: '/srv/app/server.ts', line: 12, function: 'handle' }
 * ```
 */
export function captureSource(root: string = PACKAGE_ROOT): SourceLocation | undefined {

    const originalPrepare = Error.prepareStackTrace;
    const originalLimit = Error.stackTraceLimit;

    // Filled by the prepareStackTrace callback
    const captured: { sites: NodeJS.CallSite[] } = { sites: [] };

    try {

        Error.stackTraceLimit = MAX_FRAMES;
        Error.prepareStackTrace = (_err, sites) => {

            captured.sites = sites;

            return sites;

        };

        const err = new Error();

        // Reading the stack runs prepareStackTrace
        void err.stack;

    }
    finally {

        Error.prepareStackTrace = originalPrepare;
        Error.stackTraceLimit = originalLimit;

    }

    for (const site of captured.sites) {

        const fileName = site.getFileName();

        if (!fileName) {

            continue;

        }

        const file = toPath(fileName);

        if (file.startsWith(root) || file.startsWith('node:')) {

            continue;

        }

        const line = site.getLineNumber() ?? 0;
        const fn = site.getFunctionName();

        return fn ? { file, line, function: fn } : { file, line };

    }

    return undefined;

}
