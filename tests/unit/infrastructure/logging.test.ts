/**
 * @fileoverview Unit tests for logging and environment configuration
 */

import {
  DEFAULT_LOG_LEVEL,
  ILogger,
  consoleLogger,
  createConsoleLogger,
  isLogLevel,
  loadLogLevel,
} from '../../../src';
import { createRecordingLogger } from '../../helpers/assertions';

describe('Logging', () => {
  describe('createConsoleLogger', () => {
    it('should drop messages below the minimum level', () => {
      const { entries, logger } = createRecordingLogger();
      const filtered = createConsoleLogger('warn', logger);

      filtered.debug('d');
      filtered.info('i');
      filtered.warn('w');
      filtered.error('e');

      expect(entries).toEqual([
        { level: 'warn', message: 'w' },
        { level: 'error', message: 'e' },
      ]);
    });

    it('should drop everything when silent', () => {
      const { entries, logger } = createRecordingLogger();
      const silent: ILogger = createConsoleLogger('silent', logger);

      silent.error('e');

      expect(entries).toEqual([]);
    });

    it('should write through console with a level prefix', () => {
      const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      try {
        consoleLogger.warn('careful', 1);

        expect(spy).toHaveBeenCalledWith('[WARN] careful', 1);
      } finally {
        spy.mockRestore();
      }
    });
  });

  describe('loadLogLevel', () => {
    it('should default to warn', () => {
      expect(loadLogLevel({})).toBe(DEFAULT_LOG_LEVEL);
      expect(DEFAULT_LOG_LEVEL).toBe('warn');
    });

    it('should read DI_LOG_LEVEL case-insensitively', () => {
      expect(loadLogLevel({ DI_LOG_LEVEL: 'DEBUG' })).toBe('debug');
      expect(loadLogLevel({ DI_LOG_LEVEL: ' silent ' })).toBe('silent');
    });

    it('should reject unknown levels', () => {
      expect(() => loadLogLevel({ DI_LOG_LEVEL: 'verbose' })).toThrow('Invalid DI_LOG_LEVEL "verbose"');
    });

    it('should recognise log level names', () => {
      expect(isLogLevel('info')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
    });
  });
});
