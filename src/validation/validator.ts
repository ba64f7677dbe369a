/**
 * Configuration validator
 *
 * Checks the merged user configuration before anything touches the device.
 * Errors stop the boot; warnings are logged and the run continues.
 */

import type { MonitorUserConfig } from '$types';
import { isValidZone, parseManualTime, parseStableDate } from '@features/light-schedule';
import type { ValidationIssue, ValidationResult } from './types';
import {
  addError,
  addWarning,
  validateFileNamePart,
  validateIntegerRange,
  validateLogLevel,
  validateNonEmpty,
  validateNumberRange
} from './helpers';

const MAX_DAYS_OFFSET = 3650;

function isUrl(text: string): boolean {
  try {
    new URL(text);
    return true;
  } catch {
    return false;
  }
}

function validateSchedule(config: MonitorUserConfig, errors: ValidationIssue[]): void {
  const schedule = config.SCHEDULE;

  switch (schedule.kind) {
    case 'manual':
      if (!parseManualTime(schedule.sunrise)) {
        addError(errors, 'sunrise', 'sunrise must be "HH:mm" or an hour 0-23.99 (got ' + schedule.sunrise + ')');
      }
      if (!parseManualTime(schedule.sunset)) {
        addError(errors, 'sunset', 'sunset must be "HH:mm" or an hour 0-23.99 (got ' + schedule.sunset + ')');
      }
      break;
    case 'stable-date':
      if (!parseStableDate(schedule.date, 'UTC')) {
        addError(errors, 'stable_date', 'stable_date must be a YYYY-MM-DD date (got ' + schedule.date + ')');
      }
      break;
    case 'days-offset':
      validateIntegerRange(schedule.days, 'days_offset', -MAX_DAYS_OFFSET, MAX_DAYS_OFFSET, errors);
      break;
  }
}

/**
 * Validate user configuration
 *
 * @param config - Merged user configuration
 * @returns Errors and warnings; valid is false when there is any error
 */
export function validateConfig(config: MonitorUserConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // Recording
  validateNonEmpty(config.DATA_OUTPUT_BASE_PATH, 'DATA_OUTPUT_BASE_PATH', errors);
  validateFileNamePart(config.CAGE_ID, 'CAGE_ID', errors);
  validateFileNamePart(config.BIRD_NAME, 'BIRD_NAME', errors);
  validateNumberRange(config.FLUSH_DELAY_MINUTES, 'FLUSH_DELAY_MINUTES', 1, 1440, errors);

  if (!config.DATA_READING_AND_SAVING) {
    addWarning(warnings, 'DATA_READING_AND_SAVING', 'Recording is disabled; only the lights will be controlled');
  }

  // Site
  validateNumberRange(config.SITE.latitude, 'SITE.latitude', -90, 90, errors);
  validateNumberRange(config.SITE.longitude, 'SITE.longitude', -180, 180, errors);
  if (!isValidZone(config.SITE.timezone)) {
    addError(errors, 'SITE.timezone', 'SITE.timezone must be an IANA zone name (got ' + config.SITE.timezone + ')');
  }

  // Light schedule
  validateSchedule(config, errors);

  // Device
  if (config.SERIAL_PATH !== null) {
    validateNonEmpty(config.SERIAL_PATH, 'SERIAL_PATH', errors);
  }

  // Logging
  validateLogLevel(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', errors);
  validateLogLevel(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', errors);
  validateLogLevel(config.SLACK_LOG_LEVEL, 'SLACK_LOG_LEVEL', errors);

  if (config.SLACK_WEBHOOK_URL !== null && !isUrl(config.SLACK_WEBHOOK_URL)) {
    addError(errors, 'SLACK_WEBHOOK_URL', 'SLACK_WEBHOOK_URL must be a URL');
  }
  if (config.SLACK_ENABLED && config.SLACK_WEBHOOK_URL === null) {
    addWarning(warnings, 'SLACK_WEBHOOK_URL', 'Slack is enabled but SLACK_WEBHOOK_URL is not set; Slack messages are dropped');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
