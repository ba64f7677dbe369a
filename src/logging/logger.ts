/**
 * Leveled logger
 *
 * Filters by the current level (and INFO demotion after long uptime), tags
 * the line once, then hands it to every route whose minimum level it meets.
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, SinkReport } from './types';

/**
 * Create a logger
 *
 * @param config - Starting level and INFO demotion
 * @param dependencies - Time source and sink routes
 * @param logLevels - Level constants
 * @returns Logger
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 0 },
 *   {
 *     timeSource: now,
 *     routes: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.DEBUG },
 *       { sink: slackSink, minLevel: LOG_LEVELS.INFO }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.debug('Serial port COM3 unavailable');  // console only
 * logger.info('Lights switched ON');             // console and Slack
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  const { timeSource, routes } = dependencies;
  const startTime = timeSource();
  let currentLevel = config.level;

  function log(level: LogLevel, msg: string): void {
    const context = { currentLevel, uptime: timeSource() - startTime, demoteHours: config.demoteHours };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const line = formatLogMessage(level, msg, logLevels);

    for (const route of routes) {
      if (level < route.minLevel) {
        continue;
      }
      try {
        route.sink.write(line);
      } catch (err) {
        // One broken sink must not silence the others
        console.warn('Log sink ' + route.sink.name + ' failed: ' + String(err));
      }
    }
  }

  function initialize(): Promise<SinkReport[]> {
    const starting: Promise<SinkReport>[] = [];
    for (const route of routes) {
      if (route.sink.initialize) {
        starting.push(route.sink.initialize());
      }
    }
    return Promise.all(starting);
  }

  return {
    log,
    debug: function(msg: string) { log(logLevels.DEBUG, msg); },
    info: function(msg: string) { log(logLevels.INFO, msg); },
    warning: function(msg: string) { log(logLevels.WARNING, msg); },
    critical: function(msg: string) { log(logLevels.CRITICAL, msg); },
    setLevel: function(newLevel: LogLevel) { currentLevel = newLevel; },
    getLevel: function() { return currentLevel; },
    initialize
  };
}
