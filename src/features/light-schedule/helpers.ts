/**
 * Light schedule helpers
 *
 * Parsing of configured times and dates, and sunrise/sunset lookup.
 */

import { DateTime, Info } from 'luxon';
import SunCalc from 'suncalc';

import type { ManualTime, SiteConfig } from '$types/config';
import type { ClockTime, SunTimes } from './types';

const CLOCK_TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a manually configured light time
 *
 * Text is "HH:mm" (seconds allowed and ignored). A number is an hour of day,
 * fractions being minutes: 6.5 is 06:30, 0 is midnight.
 *
 * @param value - Configured time
 * @returns Hour and minute, or null when unparsable
 */
export function parseManualTime(value: ManualTime): ClockTime | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0 || value >= 24) {
      return null;
    }
    const hour = Math.floor(value);
    const minute = Math.round((value - hour) * 60);
    return minute === 60 ? { hour: hour + 1 === 24 ? 0 : hour + 1, minute: 0 } : { hour, minute };
  }

  const match = CLOCK_TIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  const second = match[3] === undefined ? 0 : Number(match[3]);
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  return { hour, minute };
}

/**
 * Parse a stable date (YYYY-MM-DD) in the given zone
 *
 * @returns Start of that day, or null when invalid
 */
export function parseStableDate(text: string, zone: string): DateTime | null {
  if (!DATE_PATTERN.test(text)) {
    return null;
  }
  const date = DateTime.fromISO(text, { zone });
  return date.isValid ? date.startOf('day') : null;
}

/**
 * Check an IANA zone name
 */
export function isValidZone(zone: string): boolean {
  return Info.isValidIANAZone(zone);
}

/**
 * Sunrise and sunset at the site on the given day
 *
 * @param day - Any instant of the day, in the site zone
 * @param site - Site coordinates and zone
 * @returns Sun times, or null when the sun does not rise or set that day
 */
export function getSunTimes(day: DateTime, site: SiteConfig): SunTimes | null {
  const noon = day.set({ hour: 12, minute: 0, second: 0, millisecond: 0 }).toJSDate();
  const times = SunCalc.getTimes(noon, site.latitude, site.longitude);
  const sunrise = DateTime.fromJSDate(times.sunrise, { zone: site.timezone });
  const sunset = DateTime.fromJSDate(times.sunset, { zone: site.timezone });
  if (!sunrise.isValid || !sunset.isValid) {
    return null;
  }
  return { sunrise, sunset };
}

/**
 * Keep the wall-clock time of `time` but move it onto `day`
 */
export function onDay(time: DateTime, day: DateTime): DateTime {
  return day.set({
    hour: time.hour,
    minute: time.minute,
    second: time.second,
    millisecond: time.millisecond
  });
}
