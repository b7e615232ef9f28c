import { describe, it, expect } from 'vitest';

import { captureSource, shouldCaptureSource } from '../../../src/core/logger/source.js';

describe('logger: source', () => {

    describe('captureSource', () => {

        it('should point at the first frame outside the package sources', () => {

            const location = captureSource();

            expect(location?.file).toMatch(/source\.test\.ts$/);
            expect(location?.line).toBeGreaterThan(0);

        });

        it('should report its own frame when the root matches nothing', () => {

            const location = captureSource('/no/such/root/');

            expect(location?.file).toMatch(/src[\\/]core[\\/]logger[\\/]source\.ts$/);
            expect(location?.function).toBe('captureSource');

        });

        it('should restore the stack trace settings', () => {

            const limit = Error.stackTraceLimit;
            const prepare = Error.prepareStackTrace;

            captureSource();

            expect(Error.stackTraceLimit).toBe(limit);
            expect(Error.prepareStackTrace).toBe(prepare);

        });

        it('should keep paths that contain a parenthesis', () => {

            const caller = new Function('capture', 'return capture()\n//# sourceURL=/srv/odd (copy)/caller.js');
            const location: unknown = Reflect.apply(caller, undefined, [captureSource]);

            expect(location).toEqual(expect.objectContaining({
                file: '/srv/odd (copy)/caller.js',
                line: expect.any(Number),
            }));

        });

    });

    describe('shouldCaptureSource', () => {

        it('should follow the mode', () => {

            expect(shouldCaptureSource('never', 'CRITICAL')).toBe(false);
            expect(shouldCaptureSource('always', 'DEBUG')).toBe(true);
            expect(shouldCaptureSource('error', 'WARN')).toBe(false);
            expect(shouldCaptureSource('error', 'ERROR')).toBe(true);
            expect(shouldCaptureSource('error', 'CRITICAL')).toBe(true);

        });

    });

});
