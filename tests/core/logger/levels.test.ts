import { describe, it, expect } from 'vitest';
import { attemptSync } from '@logosdx/utils';

import { isErrorOrAbove, isLevel, isLevelEnabled, parseLevel } from '../../../src/core/logger/levels.js';
import { InvalidLevelError } from '../../../src/core/logger/errors.js';
import { ENTRY_LEVELS, LEVEL_VALUE } from '../../../src/core/logger/types.js';
import type { Level } from '../../../src/core/logger/types.js';

describe('logger: levels', () => {

    describe('parseLevel', () => {

        it('should accept names in any case', () => {

            expect(parseLevel('warn')).toBe('WARN');
            expect(parseLevel('Debug')).toBe('DEBUG');
            expect(parseLevel(' critical ')).toBe('CRITICAL');
            expect(parseLevel('all')).toBe('ALL');

        });

        it('should throw InvalidLevelError for unknown names', () => {

            expect(() => parseLevel('verbose')).toThrow(InvalidLevelError);

            const [, err] = attemptSync(() => parseLevel('loud'));

            expect(err).toBeInstanceOf(InvalidLevelError);
            expect(err?.message).toBe("Invalid log level: 'loud'");

        });

    });

    describe('isLevel', () => {

        it('should only accept exact upper-case names', () => {

            expect(isLevel('INFO')).toBe(true);
            expect(isLevel('info')).toBe(false);
            expect(isLevel('constructor')).toBe(false);
            expect(isLevel(4)).toBe(false);

        });

    });

    describe('isLevelEnabled', () => {

        it('should order OFF < CRITICAL < ERROR < WARN < INFO < DEBUG < ALL', () => {

            const order: Level[] = ['OFF', 'CRITICAL', 'ERROR', 'WARN', 'INFO', 'DEBUG', 'ALL'];
            const values = order.map((level) => LEVEL_VALUE[level]);

            expect([...values].sort((a, b) => a - b)).toEqual(values);

        });

        it('should be monotonic in the threshold', () => {

            for (const level of ENTRY_LEVELS) {

                const enabledAt = (threshold: Level) => isLevelEnabled(LEVEL_VALUE[threshold], level);

                expect(enabledAt('OFF')).toBe(false);
                expect(enabledAt('ALL')).toBe(true);
                expect(enabledAt(level)).toBe(true);

                if (enabledAt('WARN')) {

                    expect(enabledAt('INFO')).toBe(true);
                    expect(enabledAt('DEBUG')).toBe(true);

                }

            }

        });

        it('should hide DEBUG at INFO', () => {

            expect(isLevelEnabled(LEVEL_VALUE.INFO, 'DEBUG')).toBe(false);
            expect(isLevelEnabled(LEVEL_VALUE.INFO, 'INFO')).toBe(true);

        });

    });

    describe('isErrorOrAbove', () => {

        it('should be true for ERROR and CRITICAL only', () => {

            expect(ENTRY_LEVELS.filter(isErrorOrAbove)).toEqual(['CRITICAL', 'ERROR']);

        });

    });

});
