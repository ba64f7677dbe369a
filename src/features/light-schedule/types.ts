/**
 * Light schedule types
 */

import type { DateTime } from 'luxon';

import type { Logger } from '@logging';
import type { Clock } from '@utils/time';
import type { ScheduleMode, SiteConfig } from '$types/config';
import type { CommandSink } from '@hardware/light-switch';

/**
 * Lights-on and lights-off instants for one day, in the site zone
 */
export interface LightWindow {
  readonly on: DateTime;
  readonly off: DateTime;
}

export interface ClockTime {
  readonly hour: number;
  readonly minute: number;
}

export interface SunTimes {
  readonly sunrise: DateTime;
  readonly sunset: DateTime;
}

/**
 * Everything controlLights needs besides the previous state
 */
export interface LightControlContext {
  readonly schedule: ScheduleMode;
  readonly site: SiteConfig;
  readonly device: CommandSink;
  readonly logger: Logger;
  readonly clock: Clock;
}
