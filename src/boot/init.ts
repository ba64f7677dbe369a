/**
 * Recorder initialization
 *
 * Validates the configuration, builds the logger, checks the site and
 * opens the device. Any failure returns null; the caller exits with 1.
 */

import { DateTime } from 'luxon';

import { createLogger, createConsoleSink, createSlackSink, postJson, toLogLevel } from '@logging';
import { acquireTransport, openSerialTransport, rankCandidates } from '@hardware/serial';
import { checkSite } from '@features/light-schedule';
import { createHourlyBatchWriter } from '@features/hourly-batch';
import { createInitialState } from '@system/state';
import { createSystemClock, nodeTimer } from '@utils/time';
import type { Clock } from '@utils/time';
import { describeError } from '$types/errors';
import type { MonitorConfig, ScheduleMode } from '$types/config';
import { validateConfig } from '@validation';

import type { ConsoleSink, Logger, LogLevel, SinkRoute } from '@logging';
import type { SerialTransport } from '@hardware/serial';
import type { InitDependencies, InitResult } from './types';

function levelOr(value: number, fallback: LogLevel): LogLevel {
  return toLogLevel(value) ?? fallback;
}

/**
 * Short human description of a schedule mode
 */
export function describeSchedule(mode: ScheduleMode): string {
  switch (mode.kind) {
    case 'manual':
      return 'manual ' + mode.sunrise + '-' + mode.sunset;
    case 'stable-date':
      return 'stable date ' + mode.date;
    case 'days-offset':
      return 'days offset ' + mode.days;
  }
}

/**
 * Build the logger and its sinks from configuration
 */
export function buildLogger(
  config: MonitorConfig,
  deps: InitDependencies,
  clock: Clock
): { logger: Logger; consoleSink: ConsoleSink } {
  const timerApi = deps.timerApi ?? nodeTimer;

  const consoleSink = createConsoleSink(timerApi, deps.consoleApi ?? console, {
    bufferSize: config.CONSOLE_BUFFER_SIZE,
    drainInterval: config.CONSOLE_INTERVAL_MS,
    colorize: deps.colorize ?? process.stdout.isTTY === true
  });

  const slackSink = createSlackSink(deps.httpPost ?? postJson, timerApi, {
    enabled: config.SLACK_ENABLED,
    webhookUrl: config.SLACK_WEBHOOK_URL,
    bufferSize: config.SLACK_BUFFER_SIZE,
    retryDelayMs: config.SLACK_RETRY_DELAY_SEC * 1000,
    maxRetries: config.SLACK_MAX_RETRIES
  });

  const routes: SinkRoute[] = [];
  if (config.CONSOLE_ENABLED) {
    routes.push({ sink: consoleSink, minLevel: levelOr(config.CONSOLE_LOG_LEVEL, config.LOG_LEVELS.DEBUG) });
  }
  if (config.SLACK_ENABLED) {
    routes.push({ sink: slackSink, minLevel: levelOr(config.SLACK_LOG_LEVEL, config.LOG_LEVELS.INFO) });
  }

  const logger = createLogger({
    level: levelOr(config.GLOBAL_LOG_LEVEL, config.LOG_LEVELS.INFO),
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: function() {
      return Math.floor(clock.nowMs() / 1000);
    },
    routes: routes
  }, config.LOG_LEVELS);

  return { logger, consoleSink };
}

/**
 * Initialize the recorder
 *
 * @param config - Loaded configuration
 * @param deps - Optional stand-ins for device, network, timers and clock
 * @returns Wired controller, or null when startup must abort
 */
export async function initialize(config: MonitorConfig, deps: InitDependencies = {}): Promise<InitResult | null> {
  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    console.error('INIT FAIL: Invalid configuration');
    validation.errors.forEach(function(err) {
      console.error('  [' + err.field + ']: ' + err.message);
    });
    return null;
  }

  const clock = deps.clock ?? createSystemClock(config.SITE.timezone);
  const { logger, consoleSink } = buildLogger(config, deps, clock);
  const reports = await logger.initialize();

  logger.info('🚀 Cage light monitor');
  logger.info(
    '🐦 Cage ' + config.CAGE_ID + ' / ' + config.BIRD_NAME +
    ' | 💡 ' + describeSchedule(config.SCHEDULE) +
    ' | 💾 ' + (config.DATA_READING_AND_SAVING ? 'every ' + config.FLUSH_DELAY_MINUTES + ' min to ' + config.DATA_OUTPUT_BASE_PATH : 'OFF')
  );

  // Sink warnings after the title, success lines skipped
  reports.forEach(function(report) {
    if (!report.ok) {
      logger.warning(report.message);
    }
  });
  validation.warnings.forEach(function(warn) {
    logger.warning('[' + warn.field + ']: ' + warn.message);
  });

  function flushLogs(): void {
    consoleSink.flush();
  }

  // Site must yield a light window for today
  try {
    const window = checkSite(config.SCHEDULE, config.SITE, DateTime.fromMillis(clock.nowMs(), { zone: config.SITE.timezone }));
    logger.info('Lights on ' + window.on.toFormat('HH:mm') + ', off ' + window.off.toFormat('HH:mm') + ' (' + config.SITE.timezone + ')');
  } catch (err) {
    logger.critical('INIT FAIL: ' + describeError(err));
    flushLogs();
    return null;
  }

  // Open the device
  const open = deps.openTransport ?? function(path: string) {
    return openSerialTransport(path, {
      baudRate: config.SERIAL_BAUD_RATE,
      readTimeoutMs: config.SERIAL_READ_TIMEOUT_MS,
      maxBufferedLines: config.SERIAL_MAX_BUFFERED_LINES
    });
  };

  let transport: SerialTransport;
  try {
    transport = await acquireTransport(
      rankCandidates(config.SERIAL_PATH, config.CANDIDATE_DEVICE_PATHS),
      open,
      logger
    );
  } catch (err) {
    logger.critical('INIT FAIL: ' + describeError(err));
    flushLogs();
    return null;
  }

  const batch = createHourlyBatchWriter({
    outputDir: config.DATA_OUTPUT_BASE_PATH,
    identity: { cageId: config.CAGE_ID, birdName: config.BIRD_NAME },
    schedule: config.SCHEDULE,
    schema: config.SCHEMA,
    flushDelayMinutes: config.FLUSH_DELAY_MINUTES,
    logger,
    clock
  });

  return {
    controller: {
      state: createInitialState(clock.nowMs()),
      logger,
      config,
      transport,
      batch,
      clock
    },
    flushLogs
  };
}
