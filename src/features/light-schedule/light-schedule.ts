/**
 * Light schedule
 *
 * Works out when the lights should be on today and switches them when the
 * decided state differs from the last one sent. The state is returned to the
 * caller rather than kept here.
 *
 * ## Schedule modes
 * - manual: fixed local on/off times
 * - stable-date: sunrise/sunset of one fixed date, every day
 * - days-offset: sunrise/sunset of today shifted by N days
 */

import { DateTime } from 'luxon';

import type { LightState } from '$types/common';
import type { ScheduleMode, SiteConfig } from '$types/config';
import { SiteConfigError, describeError } from '$types/errors';
import { switchLights } from '@hardware/light-switch';
import { getSunTimes, isValidZone, onDay, parseManualTime, parseStableDate } from './helpers';
import type { LightControlContext, LightWindow } from './types';

function sunWindow(day: DateTime, site: SiteConfig, today: DateTime): LightWindow {
  const sun = getSunTimes(day, site);
  if (!sun) {
    throw new SiteConfigError(
      'No sunrise/sunset at ' + site.latitude + ', ' + site.longitude + ' on ' + day.toISODate()
    );
  }
  return { on: onDay(sun.sunrise, today), off: onDay(sun.sunset, today) };
}

/**
 * Compute today's light window
 *
 * @param mode - Resolved schedule mode
 * @param site - Site coordinates and zone
 * @param today - Current instant, in the site zone
 * @returns On and off instants on today's date
 * @throws {SiteConfigError} When the sun times or configured values cannot be used
 */
export function computeLightWindow(mode: ScheduleMode, site: SiteConfig, today: DateTime): LightWindow {
  const day = today.setZone(site.timezone);

  switch (mode.kind) {
    case 'manual': {
      const on = parseManualTime(mode.sunrise);
      const off = parseManualTime(mode.sunset);
      if (!on || !off) {
        throw new SiteConfigError('Unparsable manual light times: ' + mode.sunrise + ' / ' + mode.sunset);
      }
      const midnight = day.startOf('day');
      return {
        on: midnight.set({ hour: on.hour, minute: on.minute }),
        off: midnight.set({ hour: off.hour, minute: off.minute })
      };
    }
    case 'stable-date': {
      const date = parseStableDate(mode.date, site.timezone);
      if (!date) {
        throw new SiteConfigError('Invalid stable_date: ' + mode.date);
      }
      return sunWindow(date, site, day);
    }
    case 'days-offset':
      return sunWindow(day.plus({ days: mode.days }), site, day);
  }
}

/**
 * Decide whether the lights should be on
 *
 * A window whose off time comes before its on time wraps midnight. An empty
 * window (on equals off) keeps the lights off.
 *
 * @param window - Today's window
 * @param now - Current instant
 * @returns Desired state
 */
export function decideLightState(window: LightWindow, now: DateTime): 'on' | 'off' {
  const t = now.toMillis();
  const on = window.on.toMillis();
  const off = window.off.toMillis();

  if (on < off) {
    return t >= on && t < off ? 'on' : 'off';
  }
  if (on > off) {
    return t >= on || t < off ? 'on' : 'off';
  }
  return 'off';
}

/**
 * Bring the lights in line with the schedule
 *
 * @param previous - Last state sent, null before the first switch
 * @param context - Schedule, site, device and collaborators
 * @returns State now in effect
 */
export async function controlLights(previous: LightState, context: LightControlContext): Promise<LightState> {
  const { schedule, site, device, logger, clock } = context;
  const now = DateTime.fromMillis(clock.nowMs(), { zone: site.timezone });

  let desired: 'on' | 'off';
  try {
    desired = decideLightState(computeLightWindow(schedule, site, now), now);
  } catch (err) {
    logger.warning('Light schedule unavailable: ' + describeError(err));
    return previous;
  }

  if (desired === previous) {
    return previous;
  }

  try {
    await switchLights(device, desired);
  } catch (err) {
    logger.warning('Failed to switch lights ' + desired.toUpperCase() + ': ' + describeError(err));
    return previous;
  }

  logger.info('Lights switched ' + desired.toUpperCase() + ' at ' + now.toFormat('yyyy-MM-dd HH:mm:ss'));
  return desired;
}

/**
 * Confirm the site can produce today's window
 *
 * @throws {SiteConfigError} When it cannot
 */
export function checkSite(mode: ScheduleMode, site: SiteConfig, now: DateTime): LightWindow {
  if (!isValidZone(site.timezone)) {
    throw new SiteConfigError('Invalid site timezone: ' + site.timezone);
  }
  return computeLightWindow(mode, site, now);
}
