import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Logger, LogLevel, logger } from './Logger';

function spyConsole() {
    return {
        info: vi.spyOn(console, 'info').mockImplementation(() => { }),
        debug: vi.spyOn(console, 'debug').mockImplementation(() => { }),
        warn: vi.spyOn(console, 'warn').mockImplementation(() => { }),
        error: vi.spyOn(console, 'error').mockImplementation(() => { }),
    };
}

describe('Logger', () => {
    let spies: ReturnType<typeof spyConsole>;

    beforeEach(() => {
        spies = spyConsole();
        logger.setLogLevel(LogLevel.INFO);
        logger.setJson(false);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should log info messages by default', () => {
        logger.info('hello world');
        expect(spies.info).toHaveBeenCalledWith('[vmlink] hello world');
    });

    it('constructor with debug=true sets DEBUG level', () => {
        const debugLogger = new Logger('TestDebug', true);
        debugLogger.debug('debug message');
        expect(spies.debug).toHaveBeenCalledWith('[TestDebug] (DEBUG) debug message');
        expect(debugLogger.isDebugEnabled()).toBe(true);
    });

    it('error() logs with error prefix', () => {
        logger.error('something failed');
        expect(spies.error).toHaveBeenCalledWith('[vmlink] ❌ something failed');
    });

    it('warn() logs with warning prefix', () => {
        logger.warn('a warning');
        expect(spies.warn).toHaveBeenCalledWith('[vmlink] ⚠️ a warning');
    });

    it('passes extra arguments through in text mode', () => {
        const detail = { port: 28011 };
        logger.info('listening', detail);
        expect(spies.info).toHaveBeenCalledWith('[vmlink] listening', detail);
    });

    it('should not log debug messages by default', () => {
        logger.debug('should not see this');
        expect(spies.debug).not.toHaveBeenCalled();
        expect(logger.isDebugEnabled()).toBe(false);
    });

    it('respects log levels', () => {
        logger.setLogLevel(LogLevel.ERROR);
        logger.debug('test');
        logger.info('test');
        logger.warn('test');
        logger.conn('test');
        expect(spies.info).not.toHaveBeenCalled();
        expect(spies.warn).not.toHaveBeenCalled();
        expect(spies.debug).not.toHaveBeenCalled();

        logger.setLogLevel(LogLevel.NONE);
        logger.error('test');
        expect(spies.error).not.toHaveBeenCalled();
    });

    it('creates child loggers with inherited settings', () => {
        const child = logger.child('session');
        child.info('accepting');
        expect(spies.info).toHaveBeenCalledWith('[vmlink:session] accepting');
    });

    it('conn() logs at DEBUG level without the debug marker', () => {
        logger.setLogLevel(LogLevel.DEBUG);
        logger.conn('connection accepted');
        expect(spies.debug).toHaveBeenCalledWith('[vmlink] connection accepted');
    });

    it('logs in JSON mode with bigint-safe data', () => {
        logger.setJson(true);
        logger.info('read', { address: 0x1000, value: 0xdeadbeefn });
        const parsed = JSON.parse(spies.info.mock.calls[0][0]);
        expect(parsed.tag).toBe('vmlink');
        expect(parsed.level).toBe('INFO');
        expect(parsed.message).toBe('read');
        expect(parsed.data).toEqual([{ address: 4096, value: '3735928559n' }]);
    });

    it('supports JSON output mode without data', () => {
        logger.setJson(true);
        logger.info('json-msg-no-data');
        const parsed = JSON.parse(spies.info.mock.calls[0][0]);
        expect(parsed.data).toBeUndefined();
    });

    describe('toViewable', () => {
        it('converts BigInt to string with n suffix', () => {
            expect(Logger.toViewable(123n)).toBe('123n');
        });

        it('recursively handles objects and arrays', () => {
            const input = {
                a: [1n, 2n],
                b: { c: 3n }
            };
            expect(Logger.toViewable(input)).toEqual({
                a: ['1n', '2n'],
                b: { c: '3n' }
            });
        });

        it('flattens byte arrays and errors', () => {
            expect(Logger.toViewable(new Uint8Array([0xff, 0x01]))).toEqual([255, 1]);
            expect(Logger.toViewable(new RangeError('out of range'))).toEqual({
                name: 'RangeError',
                message: 'out of range',
            });
        });

        it('handles null and undefined', () => {
            expect(Logger.toViewable(null)).toBeNull();
            expect(Logger.toViewable(undefined)).toBeUndefined();
        });

        it('preserves other types', () => {
            expect(Logger.toViewable('text')).toBe('text');
            expect(Logger.toViewable(123)).toBe(123);
            expect(Logger.toViewable(true)).toBe(true);
        });

        it('ignores inherited properties', () => {
            const obj = Object.assign(Object.create({ inherited: 1n }), { local: 2n });
            expect(Logger.toViewable(obj)).toEqual({ local: '2n' });
        });
    });
});
