/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering (createConsoleSink)
 * - Slack sink posting to an incoming webhook (createSlackSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, colorizeLine, toLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createSlackSink, postJson } from './slack';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkRoute,
  SinkReport,
  LogSink,
  TimerAPI,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  HttpPost,
  SlackSink,
  SlackSinkConfig,
  FilterContext
} from './types';
