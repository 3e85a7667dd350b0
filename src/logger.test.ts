import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AppError, Logger, errnoCode, handleError, parseLogLevel, toError } from './logger.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({ context: 'test', level: 'debug' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Basic Logging', () => {
    it('should write info and debug to stdout', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      logger.info('Info message');
      logger.debug('Debug message');
      expect(consoleSpy).toHaveBeenCalledTimes(2);
    });

    it('should write warnings and errors to their own streams', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      logger.warn('Warning message');
      logger.error('Error message', new Error('boom'));

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(String(errorSpy.mock.calls[0][0])).toContain('Error: boom');
    });

    it('should tag output with the context and data', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      logger.info('Scanned', { files: 3 });

      const output = String(consoleSpy.mock.calls[0][0]);
      expect(output).toContain('INFO  [test] Scanned');
      expect(output).toContain('"files": 3');
    });

    it('should survive circular data', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const data: Record<string, unknown> = { name: 'loop' };
      data.self = data;

      logger.info('Circular', data);

      expect(String(consoleSpy.mock.calls[0][0])).toContain('[Circular]');
    });
  });

  describe('Log Levels', () => {
    it('should drop entries below the minimum level', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const errorLogger = new Logger({ context: 'test', level: 'ERROR' });

      errorLogger.info('Info');

      expect(consoleSpy).not.toHaveBeenCalled();
      expect(errorLogger.getLogs()).toEqual([]);
    });

    it('should read LOG_LEVEL when no level is given', () => {
      const previous = process.env.LOG_LEVEL;
      process.env.LOG_LEVEL = 'warn';
      try {
        expect(new Logger().getMinLevel()).toBe('warn');
        process.env.LOG_LEVEL = 'debug';
        expect(new Logger().getMinLevel()).toBe('debug');
      } finally {
        if (previous === undefined) delete process.env.LOG_LEVEL;
        else process.env.LOG_LEVEL = previous;
      }
    });

    it('should change level at runtime', () => {
      logger.setMinLevel('warn');
      expect(logger.getMinLevel()).toBe('warn');
    });

    it('should parse level names', () => {
      expect(parseLogLevel('WARN')).toBe('warn');
      expect(parseLogLevel(' error ')).toBe('error');
      expect(parseLogLevel('verbose')).toBe('info');
      expect(parseLogLevel(undefined, 'error')).toBe('error');
    });
  });

  describe('Entries', () => {
    it('should keep recent entries and filter them by level', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      logger.info('one');
      logger.warn('two');

      expect(logger.getLogs().map(entry => entry.message)).toEqual(['one', 'two']);
      expect(logger.getLogs('warn').map(entry => entry.message)).toEqual(['two']);

      logger.clear();
      expect(logger.getLogs()).toEqual([]);
    });

    it('should cap the number of stored entries', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const small = new Logger({ level: 'info', maxEntries: 2 });
      small.info('a');
      small.info('b');
      small.info('c');

      expect(small.getLogs().map(entry => entry.message)).toEqual(['b', 'c']);
    });

    it('should nest child contexts', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      logger.child('files').info('hashed');

      expect(String(consoleSpy.mock.calls[0][0])).toContain('[test:files] hashed');
    });
  });

  describe('Errors', () => {
    it('should carry a code and exit code', () => {
      const error = new AppError('Scan cancelled', 'SCAN_CANCELLED', 130, { root: '/data' });

      expect(error).toBeInstanceOf(Error);
      expect(error.toJSON()).toEqual({
        name: 'AppError',
        message: 'Scan cancelled',
        code: 'SCAN_CANCELLED',
        exitCode: 130,
        context: { root: '/data' },
      });
    });

    it('should normalize unknown errors', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const silent = new Logger({ level: 'error' });

      const known = new AppError('bad flag', 'INVALID_ARGUMENT');
      expect(handleError(known, silent)).toBe(known);
      expect(handleError(new Error('oops'), silent)).toMatchObject({ code: 'INTERNAL_ERROR', message: 'oops' });
      expect(handleError('text', silent)).toMatchObject({ code: 'UNKNOWN_ERROR', message: 'text' });
    });

    it('should convert thrown values to errors', () => {
      expect(toError('plain').message).toBe('plain');
      const error = new Error('kept');
      expect(toError(error)).toBe(error);
    });

    it('should read errno codes', () => {
      const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
      expect(errnoCode(error)).toBe('ENOENT');
      expect(errnoCode(new Error('no code'))).toBeUndefined();
      expect(errnoCode('ENOENT')).toBeUndefined();
    });
  });
});
