import { readFile } from 'node:fs/promises';
import * as path from 'node:path';

import * as dotenv from 'dotenv';

import type {
  MonitorAppConstants,
  MonitorConfig,
  MonitorUserConfig,
  RawMonitorConfig,
  SiteConfig
} from '$types/config';
import { ValidationError, describeError } from '$types/errors';
import { resolveScheduleMode } from '@features/hourly-batch';
import { isFiniteNumber } from '@utils/number';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Defaults for everything the config file may override.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<MonitorUserConfig> = {
  // DATA_OUTPUT_BASE_PATH
  //   Role: Directory the batch CSV files are written to.
  //   Critical: Non-empty; created on first write if missing.
  DATA_OUTPUT_BASE_PATH: './data',

  // CAGE_ID / BIRD_NAME
  //   Role: Identify the recording; both appear in every file name.
  //   Critical: Non-empty.
  CAGE_ID: '1',
  BIRD_NAME: 'bird',

  // DATA_READING_AND_SAVING
  //   Role: Record telemetry. When false the loop only drives the lights
  //   and sleeps an hour between cycles.
  DATA_READING_AND_SAVING: true,

  // FLUSH_DELAY_MINUTES
  //   Role: Minutes between batch files.
  //   Critical: 1–1440 (error outside).
  //   Recommended: 3 for bench runs, 60 for hourly files.
  FLUSH_DELAY_MINUTES: 3,

  // SCHEDULE
  //   Role: Light schedule. Resolved from sunrise/sunset, stable_date and
  //   days_offset in the config file.
  SCHEDULE: { kind: 'days-offset', days: 0 },

  // SITE
  //   Role: Location for sunrise/sunset and the zone for all timestamps.
  //   Default: Rehovot.
  SITE: {
    latitude: 31.8948,
    longitude: 34.8093,
    timezone: 'Asia/Jerusalem'
  },

  // SERIAL_PATH
  //   Role: Device path tried before the built-in candidates.
  SERIAL_PATH: null,

  // SLACK_ENABLED / SLACK_LOG_LEVEL
  //   Role: Mirror log lines at or above the level to Slack.
  //   Recommended: INFO (1) so light changes are reported.
  SLACK_ENABLED: true,
  SLACK_LOG_LEVEL: 1,

  // SLACK_WEBHOOK_URL
  //   Role: Incoming webhook URL. Read from the environment only.
  SLACK_WEBHOOK_URL: null,

  // SLACK_BUFFER_SIZE / SLACK_RETRY_DELAY_SEC
  //   Role: Failed Slack messages kept for retry, and the first retry delay.
  SLACK_BUFFER_SIZE: 10,
  SLACK_RETRY_DELAY_SEC: 30,

  // CONSOLE_*
  //   Role: Console sink level, queue depth and drain interval.
  CONSOLE_ENABLED: true,
  CONSOLE_LOG_LEVEL: 0,
  CONSOLE_BUFFER_SIZE: 50,
  CONSOLE_INTERVAL_MS: 50,

  // GLOBAL_LOG_LEVEL
  //   Role: Logger threshold. 0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours after which INFO lines are dropped (0 disables).
  //   Recommended: 0; light changes are INFO and must keep flowing.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Device protocol and loop timing.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<MonitorAppConstants> = {
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // ═══════════════════════════════════════════════════════════════
  // TELEMETRY
  // ═══════════════════════════════════════════════════════════════

  // SCHEMA
  //   Role: Device fields in wire order, then the local timestamp field.
  //   Critical: Timestamp field last; the device sends SCHEMA.length - 1 values.
  SCHEMA: ['lights_on_time', 'lights_off_time', 'dateTime'],

  // FIELD_DELIMITER
  //   Role: Separator between values on a device line.
  FIELD_DELIMITER: ';',

  // ═══════════════════════════════════════════════════════════════
  // SERIAL
  // ═══════════════════════════════════════════════════════════════

  SERIAL_BAUD_RATE: 9600,
  SERIAL_READ_TIMEOUT_MS: 1000,

  // SERIAL_MAX_BUFFERED_LINES
  //   Role: Lines held while the loop is not reading (e.g. recording disabled).
  //   Critical: Oldest lines are dropped past this; keep above one minute of input.
  SERIAL_MAX_BUFFERED_LINES: 3600,

  // CANDIDATE_DEVICE_PATHS
  //   Role: Paths tried in order when opening the device.
  CANDIDATE_DEVICE_PATHS: [
    '/dev/ttyACM0',
    '/dev/ttyACM1',
    '/dev/cu.usbmodem2401',
    '/dev/cu.usbmodem2301',
    'COM1',
    'COM2',
    'COM3',
    'COM4',
    'COM5',
  ],

  LIGHT_ON_COMMAND: '1\n',
  LIGHT_OFF_COMMAND: '0\n',

  // ═══════════════════════════════════════════════════════════════
  // LOOP TIMING
  // ═══════════════════════════════════════════════════════════════

  INPUT_POLL_MS: 1000,
  SAMPLE_INTERVAL_MS: 1000,
  MINUTE_WINDOW_MS: 60000,
  RECORDING_DISABLED_SLEEP_MS: 3600000,

  SLACK_MAX_RETRIES: 5,
};

// ─────────────────────────────────────────────────────────────
// CONFIG FILE PARSING
// ─────────────────────────────────────────────────────────────

export interface RawConfigResult {
  config: RawMonitorConfig;
  errors: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function isStringOrNumber(value: unknown): value is string | number {
  return isString(value) || isFiniteNumber(value);
}

function orNull<T>(guard: (value: unknown) => value is T): (value: unknown) => value is T | null {
  return function(value: unknown): value is T | null {
    return value === null || guard(value);
  };
}

function pick<T>(
  source: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  expected: string,
  errors: string[]
): T | undefined {
  if (!(key in source)) {
    return undefined;
  }
  const value = source[key];
  if (guard(value)) {
    return value;
  }
  errors.push(key + ' must be ' + expected + ', got ' + JSON.stringify(value));
  return undefined;
}

function parseSite(value: unknown, errors: string[]): Partial<SiteConfig> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    errors.push('site must be an object');
    return undefined;
  }
  const site: { latitude?: number; longitude?: number; timezone?: string } = {};
  const latitude = pick(value, 'latitude', isFiniteNumber, 'a number', errors);
  const longitude = pick(value, 'longitude', isFiniteNumber, 'a number', errors);
  const timezone = pick(value, 'timezone', isString, 'a string', errors);
  if (latitude !== undefined) {
    site.latitude = latitude;
  }
  if (longitude !== undefined) {
    site.longitude = longitude;
  }
  if (timezone !== undefined) {
    site.timezone = timezone;
  }
  return site;
}

/**
 * Narrow parsed JSON to the config file shape
 *
 * Keys with the wrong type are reported and ignored; unknown keys are
 * ignored silently.
 *
 * @param value - Parsed JSON
 * @returns Typed config and type errors
 */
export function parseRawConfig(value: unknown): RawConfigResult {
  const errors: string[] = [];
  if (!isRecord(value)) {
    return { config: {}, errors: ['Config file must contain a JSON object'] };
  }

  const config: RawMonitorConfig = {
    dataOutputBasePath: pick(value, 'dataOutputBasePath', isString, 'a string', errors),
    cage_id: pick(value, 'cage_id', isStringOrNumber, 'a string or number', errors)?.toString(),
    bird_name: pick(value, 'bird_name', isString, 'a string', errors),
    dataReadingAndSaving: pick(value, 'dataReadingAndSaving', isBoolean, 'a boolean', errors),
    days_offset: pick(value, 'days_offset', orNull(isFiniteNumber), 'a number or null', errors),
    stable_date: pick(value, 'stable_date', orNull(isString), 'a date string or null', errors),
    sunrise: pick(value, 'sunrise', orNull(isStringOrNumber), 'a time or null', errors),
    sunset: pick(value, 'sunset', orNull(isStringOrNumber), 'a time or null', errors),
    serialPath: pick(value, 'serialPath', orNull(isString), 'a string or null', errors),
    flushDelayMinutes: pick(value, 'flushDelayMinutes', isFiniteNumber, 'a number', errors),
    site: parseSite(value['site'], errors),
    logLevel: pick(value, 'logLevel', isFiniteNumber, 'a number', errors),
    consoleLogLevel: pick(value, 'consoleLogLevel', isFiniteNumber, 'a number', errors),
    slackLogLevel: pick(value, 'slackLogLevel', isFiniteNumber, 'a number', errors),
    slackEnabled: pick(value, 'slackEnabled', isBoolean, 'a boolean', errors),
  };

  return { config, errors };
}

// ─────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────

const LEVEL_NAMES: Record<string, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  WARN: 2,
  CRITICAL: 3,
  ERROR: 3,
};

/**
 * Parse LOG_LEVEL: a level name or number. Unrecognised text yields NaN so
 * validation reports it.
 */
export function parseEnvLogLevel(text: string | undefined): number | undefined {
  if (text === undefined || text.trim() === '') {
    return undefined;
  }
  const trimmed = text.trim().toUpperCase();
  if (trimmed in LEVEL_NAMES) {
    return LEVEL_NAMES[trimmed];
  }
  return /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
}

/**
 * Load .env into process.env; variables already set win
 */
export function loadEnvironment(envPath?: string): void {
  dotenv.config({ path: envPath });
}

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────

/**
 * Merge the config file over the defaults and apply environment overrides
 *
 * @param raw - Parsed config file
 * @param env - Environment (SLACK_WEBHOOK_URL, LOG_LEVEL)
 * @returns Full runtime configuration
 */
export function buildConfig(raw: RawMonitorConfig, env: NodeJS.ProcessEnv): MonitorConfig {
  const site = raw.site ?? {};
  const webhook = env['SLACK_WEBHOOK_URL'];

  const user: MonitorUserConfig = {
    ...USER_CONFIG,
    DATA_OUTPUT_BASE_PATH: raw.dataOutputBasePath ?? USER_CONFIG.DATA_OUTPUT_BASE_PATH,
    CAGE_ID: raw.cage_id ?? USER_CONFIG.CAGE_ID,
    BIRD_NAME: raw.bird_name ?? USER_CONFIG.BIRD_NAME,
    DATA_READING_AND_SAVING: raw.dataReadingAndSaving ?? USER_CONFIG.DATA_READING_AND_SAVING,
    FLUSH_DELAY_MINUTES: raw.flushDelayMinutes ?? USER_CONFIG.FLUSH_DELAY_MINUTES,
    SCHEDULE: resolveScheduleMode(raw),
    SITE: {
      latitude: site.latitude ?? USER_CONFIG.SITE.latitude,
      longitude: site.longitude ?? USER_CONFIG.SITE.longitude,
      timezone: site.timezone ?? USER_CONFIG.SITE.timezone,
    },
    SERIAL_PATH: raw.serialPath ?? USER_CONFIG.SERIAL_PATH,
    SLACK_ENABLED: raw.slackEnabled ?? USER_CONFIG.SLACK_ENABLED,
    SLACK_LOG_LEVEL: raw.slackLogLevel ?? USER_CONFIG.SLACK_LOG_LEVEL,
    SLACK_WEBHOOK_URL: webhook !== undefined && webhook !== '' ? webhook : null,
    CONSOLE_LOG_LEVEL: raw.consoleLogLevel ?? USER_CONFIG.CONSOLE_LOG_LEVEL,
    GLOBAL_LOG_LEVEL: parseEnvLogLevel(env['LOG_LEVEL']) ?? raw.logLevel ?? USER_CONFIG.GLOBAL_LOG_LEVEL,
  };

  return { ...APP_CONSTANTS, ...user };
}

/**
 * Read and parse a JSON config file
 *
 * @param filePath - Path to the file
 * @param env - Environment overrides
 * @returns Full runtime configuration
 * @throws {ValidationError} When the file is YAML, cannot be read, is not JSON or has mistyped keys
 */
export async function loadConfig(filePath: string, env: NodeJS.ProcessEnv): Promise<MonitorConfig> {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.yaml' || extension === '.yml') {
    throw new ValidationError(
      'Config file ' + filePath + ' is YAML; rewrite it as JSON with the same keys (see config.example.json)'
    );
  }

  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new ValidationError('Cannot read config file ' + filePath + ': ' + describeError(err));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ValidationError('Config file ' + filePath + ' is not valid JSON: ' + describeError(err));
  }

  const parsed = parseRawConfig(json);
  if (parsed.errors.length > 0) {
    throw new ValidationError('Config file ' + filePath + ' has invalid values: ' + parsed.errors.join('; '));
  }
  return buildConfig(parsed.config, env);
}
