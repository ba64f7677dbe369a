/**
 * Time utility functions
 */

import { DateTime } from 'luxon';

import type { TimerAPI } from '@logging';
import type { Clock } from './types';

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Get current wall time from the high-resolution clock
 * @returns Microseconds since epoch
 */
export function nowMicros(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}

/**
 * Resolve after the given delay
 * @param ms - Delay in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(function(resolve) {
    setTimeout(resolve, ms);
  });
}

/**
 * Timer API on Node timers. Timers are unref'd so a pending log drain or
 * Slack retry never keeps the process alive on its own.
 */
export const nodeTimer: TimerAPI = {
  set: function(delayMs, repeat, callback) {
    const handle = repeat ? setInterval(callback, delayMs) : setTimeout(callback, delayMs);
    handle.unref();
  }
};

/**
 * Create the wall clock used by the recording loop
 * @param zone - IANA zone name timestamps are rendered in
 * @returns Clock backed by Date, performance and setTimeout
 */
export function createSystemClock(zone: string): Clock {
  return {
    zone,
    nowMs,
    nowMicros,
    sleep
  };
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a sample timestamp as YYYY_MM_DD_HH_mm_ss.ffffff
 * @param micros - Microseconds since epoch
 * @param zone - IANA zone name
 * @returns Formatted timestamp
 */
export function formatSampleTimestamp(micros: number, zone: string): string {
  const ms = Math.floor(micros / 1000);
  const base = DateTime.fromMillis(ms, { zone }).toFormat('yyyy_MM_dd_HH_mm_ss');
  return base + '.' + pad(micros % 1000000, 6);
}

/**
 * Format a flush time for output file names as YYYYMMDD_HH_mm_ss
 * @param ms - Milliseconds since epoch
 * @param zone - IANA zone name
 * @returns Formatted timestamp
 */
export function formatFileTimestamp(ms: number, zone: string): string {
  return DateTime.fromMillis(ms, { zone }).toFormat('yyyyMMdd_HH_mm_ss');
}

/**
 * Format an aggregation time for CSV cells as YYYY-MM-DD HH:mm:ss.ffffff
 * @param date - Aggregation time
 * @param zone - IANA zone name
 * @returns Formatted timestamp
 */
export function formatCsvDateTime(date: Date, zone: string): string {
  return DateTime.fromJSDate(date, { zone }).toFormat('yyyy-MM-dd HH:mm:ss.SSS') + '000';
}
