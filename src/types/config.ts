/**
 * Type definition for light monitor configuration
 */

import type { LogLevels } from '@logging';
import type { Schema } from './common';

/**
 * Manually configured light time: "HH:mm" text or an hour-of-day number
 * (6.5 = 06:30, 0 = midnight)
 */
export type ManualTime = string | number;

/**
 * Which light schedule drives the lights and tags the output files.
 * Resolved once when the configuration is loaded.
 */
export type ScheduleMode =
  | { readonly kind: 'manual'; readonly sunrise: ManualTime; readonly sunset: ManualTime }
  | { readonly kind: 'stable-date'; readonly date: string }
  | { readonly kind: 'days-offset'; readonly days: number };

/**
 * Geographic site used for sunrise/sunset computation
 */
export interface SiteConfig {
  readonly latitude: number;
  readonly longitude: number;
  /** IANA zone name, e.g. "Asia/Jerusalem" */
  readonly timezone: string;
}

/**
 * Configuration file contents as written by the operator.
 * Every key is optional; absent keys fall back to defaults.
 */
export interface RawMonitorConfig {
  dataOutputBasePath?: string;
  cage_id?: string;
  bird_name?: string;
  dataReadingAndSaving?: boolean;
  days_offset?: number | null;
  stable_date?: string | null;
  sunrise?: ManualTime | null;
  sunset?: ManualTime | null;
  serialPath?: string | null;
  flushDelayMinutes?: number;
  site?: Partial<SiteConfig>;
  logLevel?: number;
  consoleLogLevel?: number;
  slackLogLevel?: number;
  slackEnabled?: boolean;
}

/**
 * Resolved user settings
 */
export interface MonitorUserConfig {
  // ───────── RECORDING ─────────
  readonly DATA_OUTPUT_BASE_PATH: string;
  readonly CAGE_ID: string;
  readonly BIRD_NAME: string;
  readonly DATA_READING_AND_SAVING: boolean;
  readonly FLUSH_DELAY_MINUTES: number;

  // ───────── LIGHT SCHEDULE ─────────
  readonly SCHEDULE: ScheduleMode;
  readonly SITE: SiteConfig;

  // ───────── DEVICE ─────────
  readonly SERIAL_PATH: string | null;

  // ───────── SLACK SETTINGS ─────────
  readonly SLACK_ENABLED: boolean;
  readonly SLACK_LOG_LEVEL: number;
  readonly SLACK_WEBHOOK_URL: string | null;
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_SEC: number;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: number;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: number;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface MonitorAppConstants {
  readonly LOG_LEVELS: LogLevels;

  // ───────── TELEMETRY ─────────
  readonly SCHEMA: Schema;
  readonly FIELD_DELIMITER: string;

  // ───────── SERIAL ─────────
  readonly SERIAL_BAUD_RATE: number;
  readonly SERIAL_READ_TIMEOUT_MS: number;
  readonly SERIAL_MAX_BUFFERED_LINES: number;
  readonly CANDIDATE_DEVICE_PATHS: readonly string[];
  readonly LIGHT_ON_COMMAND: string;
  readonly LIGHT_OFF_COMMAND: string;

  // ───────── LOOP TIMING ─────────
  readonly INPUT_POLL_MS: number;
  readonly SAMPLE_INTERVAL_MS: number;
  readonly MINUTE_WINDOW_MS: number;
  readonly RECORDING_DISABLED_SLEEP_MS: number;

  // ───────── SLACK ─────────
  readonly SLACK_MAX_RETRIES: number;
}

/**
 * Full runtime configuration
 */
export type MonitorConfig = MonitorUserConfig & MonitorAppConstants;
