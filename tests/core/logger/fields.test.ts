import { describe, it, expect, beforeEach } from 'vitest';
import { attemptSync } from '@logosdx/utils';

import { EntryPool } from '../../../src/core/logger/entry.js';
import type { DraftEntry } from '../../../src/core/logger/entry.js';
import { FieldBindingError } from '../../../src/core/logger/errors.js';
import {
    applyKeyValues,
    bindKeyValues,
    extractTrace,
    isErrorLike,
    mergeFields,
} from '../../../src/core/logger/fields.js';
import type { FieldDefaults } from '../../../src/core/logger/fields.js';

const NO_DEFAULTS: FieldDefaults = {
    prefix: '',
    labels: {},
    fields: {},
    trace: '',
    spanId: '',
    traceSampled: undefined,
    correlationId: '',
    projectId: '',
    traceContextKey: undefined,
};

describe('logger: fields', () => {

    let pool: EntryPool;
    let entry: DraftEntry;

    beforeEach(() => {

        pool = new EntryPool();
        entry = pool.acquire();

    });

    describe('applyKeyValues', () => {

        it('should add pairs to the payload', () => {

            applyKeyValues(entry, ['pct', 91, 'path', '/data']);

            expect(entry.payload).toEqual({ pct: 91, path: '/data' });

        });

        it('should record a dangling key without throwing', () => {

            applyKeyValues(entry, ['user', 'u1', 'orphan']);

            expect(entry.payload).toEqual({
                user: 'u1',
                orphan: 'KEY_WITHOUT_VALUE',
                logging_error: 'odd number of arguments received',
            });

        });

        it('should skip non-string keys and record their position', () => {

            applyKeyValues(entry, [42, 'x', 'ok', true]);

            expect(entry.payload).toEqual({
                ok: true,
                logging_error: 'non-string key at argument position 0',
            });

        });

        it('should let later keys overwrite earlier ones', () => {

            applyKeyValues(entry, ['k', 1, 'k', 2]);

            expect(entry.payload).toEqual({ k: 2 });

        });

        it('should store the message of an error under "error"', () => {

            applyKeyValues(entry, ['error', new Error('disk full')]);

            expect(entry.payload).toEqual({ error: 'disk full' });

        });

        it('should keep a non-error "error" value as is', () => {

            applyKeyValues(entry, ['error', 404]);

            expect(entry.payload).toEqual({ error: 404 });

        });

        it('should promote a valid httpRequest', () => {

            applyKeyValues(entry, ['httpRequest', { requestMethod: 'POST', status: 401 }]);

            expect(entry.httpRequest).toEqual({ requestMethod: 'POST', status: 401 });
            expect(entry.payload).toEqual({});

        });

        it('should keep an httpRequest with unknown keys in the payload', () => {

            const value = { requestMethod: 'GET', verb: 'x' };

            applyKeyValues(entry, ['httpRequest', value]);

            expect(entry.httpRequest).toBeUndefined();
            expect(entry.payload).toEqual({ httpRequest: value });

        });

        it('should promote a valid sourceLocation and reject a mistyped one', () => {

            applyKeyValues(entry, ['sourceLocation', { file: 'app.ts', line: 7 }]);

            expect(entry.sourceLocation).toEqual({ file: 'app.ts', line: 7 });

            const other = pool.acquire();

            applyKeyValues(other, ['sourceLocation', { file: 'app.ts', line: '7' }]);

            expect(other.sourceLocation).toBeUndefined();
            expect(other.payload).toEqual({ sourceLocation: { file: 'app.ts', line: '7' } });

        });

        it('should store a "__proto__" key as data', () => {

            applyKeyValues(entry, ['__proto__', 'plain']);

            expect(Object.keys(entry.payload)).toEqual(['__proto__']);
            expect(Object.getPrototypeOf(entry.payload)).toBe(Object.prototype);

        });

    });

    describe('bindKeyValues', () => {

        it('should build a record', () => {

            expect(bindKeyValues(['a', 1, 'b', 'two'])).toEqual({ a: 1, b: 'two' });

        });

        it('should throw on an odd count', () => {

            const [, err] = attemptSync(() => bindKeyValues(['a', 1, 'b']));

            expect(err).toBeInstanceOf(FieldBindingError);
            expect(err instanceof FieldBindingError && err.position).toBe(2);

        });

        it('should throw on a non-string key', () => {

            const [, err] = attemptSync(() => bindKeyValues(['a', 1, 5, 'x']));

            expect(err).toBeInstanceOf(FieldBindingError);
            expect(err?.message).toBe('Cannot bind fields: key must be a string, got number (argument 2)');

        });

    });

    describe('extractTrace', () => {

        it('should read the header from a Map', () => {

            const context = new Map([['trace', '105445aa7843bc8bf206b12000100000/1;o=1']]);

            expect(extractTrace(context, 'trace', 'my-project')).toEqual({
                trace: 'projects/my-project/traces/105445aa7843bc8bf206b12000100000',
                spanId: '1',
            });

        });

        it('should read the header from a plain object with a symbol key', () => {

            const key = Symbol('trace');

            expect(extractTrace({ [key]: 'abc/99' }, key, 'p')).toEqual({
                trace: 'projects/p/traces/abc',
                spanId: '99',
            });

        });

        it('should return undefined without a string header', () => {

            expect(extractTrace(new Map(), 'trace', 'p')).toBeUndefined();
            expect(extractTrace({ trace: 42 }, 'trace', 'p')).toBeUndefined();

        });

        it('should leave the span empty when the header has none', () => {

            expect(extractTrace({ trace: 'abc;o=1' }, 'trace', 'p')).toEqual({
                trace: 'projects/p/traces/abc',
                spanId: '',
            });

        });

    });

    describe('isErrorLike', () => {

        it('should accept errors and error-shaped objects', () => {

            expect(isErrorLike(new TypeError('x'))).toBe(true);
            expect(isErrorLike({ name: 'Fault', message: 'x' })).toBe(true);
            expect(isErrorLike({ message: 'x' })).toBe(false);
            expect(isErrorLike('x')).toBe(false);

        });

    });

    describe('mergeFields', () => {

        it('should apply call-site over bound fields', () => {

            const defaults: FieldDefaults = { ...NO_DEFAULTS, fields: { user: 'bound', role: 'admin' } };

            mergeFields(entry, defaults, 'INFO', 'msg', undefined, ['user', 'call']);

            expect(entry.payload).toEqual({ user: 'call', role: 'admin' });

        });

        it('should prepend the prefix and copy defaults', () => {

            const defaults: FieldDefaults = {
                ...NO_DEFAULTS,
                prefix: '[api] ',
                labels: { region: 'eu' },
                correlationId: 'c-1',
                traceSampled: true,
            };

            mergeFields(entry, defaults, 'WARN', 'slow', undefined, []);

            expect(entry.message).toBe('[api] slow');
            expect(entry.severity).toBe('WARN');
            expect(entry.labels).toEqual({ region: 'eu' });
            expect(entry.correlationId).toBe('c-1');
            expect(entry.traceSampled).toBe(true);

        });

        it('should extract trace from context only with project id and key', () => {

            const context = { 'x-trace': 'abc/42;o=1' };

            mergeFields(entry, NO_DEFAULTS, 'INFO', 'm', context, []);

            expect(entry.trace).toBe('');

            const defaults: FieldDefaults = { ...NO_DEFAULTS, projectId: 'proj', traceContextKey: 'x-trace' };
            const second = pool.acquire();

            mergeFields(second, defaults, 'INFO', 'm', context, []);

            expect(second.trace).toBe('projects/proj/traces/abc');
            expect(second.spanId).toBe('42');

        });

        it('should not override a trace bound on the logger', () => {

            const defaults: FieldDefaults = {
                ...NO_DEFAULTS,
                projectId: 'proj',
                traceContextKey: 'x-trace',
                trace: 'bound-trace',
            };

            mergeFields(entry, defaults, 'INFO', 'm', { 'x-trace': 'abc/42' }, []);

            expect(entry.trace).toBe('bound-trace');
            expect(entry.spanId).toBe('42');

        });

        it('should let a call-site httpRequest win over a bound one', () => {

            const defaults: FieldDefaults = { ...NO_DEFAULTS, fields: { httpRequest: { requestMethod: 'GET' } } };

            mergeFields(entry, defaults, 'INFO', 'm', undefined, ['httpRequest', { requestMethod: 'PUT' }]);

            expect(entry.httpRequest).toEqual({ requestMethod: 'PUT' });

        });

    });

});
