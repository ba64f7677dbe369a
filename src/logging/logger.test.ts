/**
 * Unit tests for the leveled logger
 */

import { createLogger } from './logger';
import type { LogLevel, LogLevels, LogSink, SinkRoute } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

function createMockSink(name = 'mock') {
  return { name, write: vi.fn<(line: string) => void>() };
}

describe('createLogger', () => {
  let timeNow: number;
  const timeSource = () => timeNow;

  function loggerWith(level: LogLevel, routes: SinkRoute[], demoteHours = 0) {
    return createLogger({ level, demoteHours }, { timeSource, routes }, LOG_LEVELS);
  }

  beforeEach(() => {
    timeNow = 100;
  });

  describe('level methods', () => {
    test('should tag debug lines', () => {
      const sink = createMockSink();
      const logger = loggerWith(LOG_LEVELS.DEBUG, [{ sink, minLevel: LOG_LEVELS.DEBUG }]);

      logger.debug('Serial port COM1 unavailable');

      expect(sink.write).toHaveBeenCalledWith('[DEBUG]    Serial port COM1 unavailable');
    });

    test('should tag warnings', () => {
      const sink = createMockSink();
      const logger = loggerWith(LOG_LEVELS.INFO, [{ sink, minLevel: LOG_LEVELS.INFO }]);

      logger.warning('Empty telemetry line ""');

      expect(sink.write).toHaveBeenCalledWith('⚠️ [WARNING]  Empty telemetry line ""');
    });

    test('should log through the generic method', () => {
      const sink = createMockSink();
      const logger = loggerWith(LOG_LEVELS.INFO, [{ sink, minLevel: LOG_LEVELS.INFO }]);

      logger.log(LOG_LEVELS.CRITICAL, 'device gone');

      expect(sink.write).toHaveBeenCalledWith('🚨 [CRITICAL] device gone');
    });
  });

  describe('level filtering', () => {
    test('should drop lines below the current level', () => {
      const sink = createMockSink();
      const logger = loggerWith(LOG_LEVELS.INFO, [{ sink, minLevel: LOG_LEVELS.DEBUG }]);

      logger.debug('hidden');

      expect(sink.write).not.toHaveBeenCalled();
    });

    test('should route by each sink minimum level', () => {
      const consoleSink = createMockSink('console');
      const slackSink = createMockSink('slack');
      const logger = loggerWith(LOG_LEVELS.DEBUG, [
        { sink: consoleSink, minLevel: LOG_LEVELS.DEBUG },
        { sink: slackSink, minLevel: LOG_LEVELS.WARNING }
      ]);

      logger.info('console only');
      logger.warning('both');

      expect(consoleSink.write).toHaveBeenCalledTimes(2);
      expect(slackSink.write).toHaveBeenCalledTimes(1);
      expect(slackSink.write).toHaveBeenCalledWith('⚠️ [WARNING]  both');
    });

    test('should apply setLevel at runtime', () => {
      const sink = createMockSink();
      const logger = loggerWith(LOG_LEVELS.DEBUG, [{ sink, minLevel: LOG_LEVELS.DEBUG }]);

      logger.setLevel(LOG_LEVELS.WARNING);
      logger.info('hidden');

      expect(logger.getLevel()).toBe(LOG_LEVELS.WARNING);
      expect(sink.write).not.toHaveBeenCalled();
    });
  });

  describe('INFO demotion', () => {
    test('should drop INFO once demoteHours of uptime have passed', () => {
      const sink = createMockSink();
      const logger = loggerWith(LOG_LEVELS.INFO, [{ sink, minLevel: LOG_LEVELS.INFO }], 24);

      timeNow = 100 + 25 * 3600;
      logger.info('demoted');
      logger.warning('kept');

      expect(sink.write).toHaveBeenCalledTimes(1);
      expect(sink.write).toHaveBeenCalledWith('⚠️ [WARNING]  kept');
    });

    test('should keep INFO forever when demoteHours is 0', () => {
      const sink = createMockSink();
      const logger = loggerWith(LOG_LEVELS.INFO, [{ sink, minLevel: LOG_LEVELS.INFO }]);

      timeNow = 100 + 1000 * 3600;
      logger.info('Lights switched ON');

      expect(sink.write).toHaveBeenCalledWith('ℹ️ [INFO]     Lights switched ON');
    });
  });

  describe('sink errors', () => {
    test('should keep writing to other sinks when one throws', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const failing: LogSink = { name: 'broken', write: () => { throw new Error('boom'); } };
      const healthy = createMockSink();
      const logger = loggerWith(LOG_LEVELS.DEBUG, [
        { sink: failing, minLevel: LOG_LEVELS.DEBUG },
        { sink: healthy, minLevel: LOG_LEVELS.DEBUG }
      ]);

      logger.info('hello');

      expect(healthy.write).toHaveBeenCalledWith('ℹ️ [INFO]     hello');
      expect(warn).toHaveBeenCalledWith('Log sink broken failed: Error: boom');
      warn.mockRestore();
    });
  });

  describe('initialize', () => {
    test('should resolve empty when no sink needs starting', async () => {
      const logger = loggerWith(LOG_LEVELS.INFO, [{ sink: createMockSink(), minLevel: LOG_LEVELS.INFO }]);

      await expect(logger.initialize()).resolves.toEqual([]);
    });

    test('should collect a report from every sink in route order', async () => {
      const ok: LogSink = {
        name: 'ok',
        write: vi.fn(),
        initialize: () => Promise.resolve({ sink: 'ok', ok: true, message: 'ready' })
      };
      const bad: LogSink = {
        name: 'bad',
        write: vi.fn(),
        initialize: () => Promise.resolve({ sink: 'bad', ok: false, message: 'no webhook' })
      };
      const logger = loggerWith(LOG_LEVELS.INFO, [{ sink: ok, minLevel: 0 }, { sink: bad, minLevel: 0 }]);

      await expect(logger.initialize()).resolves.toEqual([
        { sink: 'ok', ok: true, message: 'ready' },
        { sink: 'bad', ok: false, message: 'no webhook' }
      ]);
    });
  });
});
