/**
 * Control module type definitions
 */

import type { Logger } from '@logging';
import type { Clock } from '@utils/time';
import type { MonitorConfig } from '$types/config';
import type { SerialTransport } from '@hardware/serial';
import type { HourlyBatchWriter } from '@features/hourly-batch';
import type { RecorderState } from '@system/state';

export interface Controller {
  state: RecorderState;
  logger: Logger;
  config: MonitorConfig;
  transport: SerialTransport;
  batch: HourlyBatchWriter;
  clock: Clock;
}
