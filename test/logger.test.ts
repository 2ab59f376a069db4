import { resolveLogLevel } from '../src/logger';
import { describeError, formatErrorChain } from '../src/utils/format_error_chain';

describe('resolveLogLevel', () => {
    test('accepts npmlog levels in any case', () => {
        expect(resolveLogLevel('verbose')).toBe('verbose');
        expect(resolveLogLevel(' WARN ')).toBe('warn');
        expect(resolveLogLevel('silent')).toBe('silent');
    });

    test('falls back to info', () => {
        expect(resolveLogLevel(undefined)).toBe('info');
        expect(resolveLogLevel('')).toBe('info');
        expect(resolveLogLevel('debug')).toBe('info');
    });
});

describe('formatErrorChain', () => {
    test('lists every cause', () => {
        const root = new Error('connect ECONNREFUSED 127.0.0.1:1080');
        const middle = new Error('Failed to connect', { cause: root });
        const top = new Error('Client handling failed', { cause: middle });

        expect(formatErrorChain(top)).toEqual([
            'Caused by: Failed to connect',
            'Caused by: connect ECONNREFUSED 127.0.0.1:1080',
        ]);
    });

    test('stops on cycles and non-errors', () => {
        const error = new Error('loop');
        error.cause = error;

        expect(formatErrorChain(error)).toEqual([]);
        expect(formatErrorChain(new Error('wrapped', { cause: 'plain string' }))).toEqual(['Caused by: plain string']);
        expect(formatErrorChain('not an error')).toEqual([]);
    });

    test('describeError', () => {
        expect(describeError(new TypeError('bad'))).toBe('bad');
        expect(describeError(42)).toBe('42');
    });
});
