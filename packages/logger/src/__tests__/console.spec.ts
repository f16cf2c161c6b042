import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, createLogger, SILENT_LOGGER } from '../console';
import { LogLevel } from '../types';

describe('ConsoleLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(Date, 'now').mockReturnValue(1234567890);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Constructor', () => {
    it('should default to empty context at info level', () => {
      const logger = new ConsoleLogger();

      expect(logger.data).toEqual({});
      expect(logger.level).toBe(LogLevel.Info);
    });
  });

  describe('Logging', () => {
    it('should log a simple message with context and timestamp', () => {
      const logger = new ConsoleLogger({ command: 'install' });

      logger.info('Containers started');

      expect(console.info).toHaveBeenCalledWith(
        { command: 'install', ts: 1234567890 },
        'Containers started',
      );
    });

    it('should merge structured data into context', () => {
      const logger = new ConsoleLogger({ command: 'restart' });

      logger.warn({ step: 'stop' }, 'Some containers may not have stopped');

      expect(console.warn).toHaveBeenCalledWith(
        { command: 'restart', step: 'stop', ts: 1234567890 },
        'Some containers may not have stopped',
      );
    });

    it('should use console.error for fatal', () => {
      const logger = new ConsoleLogger();

      logger.fatal('Aborting');

      expect(console.error).toHaveBeenCalledWith({ ts: 1234567890 }, 'Aborting');
    });

    it('should drop calls below the configured level', () => {
      const logger = new ConsoleLogger({}, LogLevel.Warn);

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');

      expect(console.debug).not.toHaveBeenCalled();
      expect(console.info).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('should drop everything when silent', () => {
      SILENT_LOGGER.error('nothing');

      expect(console.error).not.toHaveBeenCalled();
    });
  });

  describe('child', () => {
    it('should inherit context and level', () => {
      const parent = new ConsoleLogger({ command: 'update' }, LogLevel.Debug);
      const child = parent.child({ step: 'pull' });

      child.debug('Pulling images');

      expect(console.debug).toHaveBeenCalledWith(
        { command: 'update', step: 'pull', ts: 1234567890 },
        'Pulling images',
      );
    });
  });

  describe('createLogger', () => {
    it('should honour the level option', () => {
      const logger = createLogger({ level: LogLevel.Error });

      logger.warn('hidden');
      logger.error('shown');

      expect(console.warn).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalledTimes(1);
    });
  });
});
