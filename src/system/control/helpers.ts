/**
 * Control loop helpers
 * One function per step of a cycle
 */

import { readSample } from '@core/sample-reader';
import { aggregateMinute } from '@core/minute-aggregator';
import { controlLights } from '@features/light-schedule';
import type { TelemetryRecord } from '$types/common';
import { TransportClosedError } from '$types/errors';

import type { Controller } from './types';

/**
 * Wait until the device has a line buffered
 *
 * Polls in bounded ticks so the process stays idle between lines.
 *
 * @returns Number of empty ticks before input arrived
 * @throws {TransportClosedError} When the device goes away while idle
 */
export async function waitForInput(controller: Controller): Promise<number> {
  const { transport, config } = controller;
  let idleTicks = 0;
  while (!(await transport.waitForInput(config.INPUT_POLL_MS))) {
    if (!transport.isConnected()) {
      throw new TransportClosedError(transport.path);
    }
    idleTicks++;
  }
  // A failed port also wakes the wait
  if (!transport.isConnected()) {
    throw new TransportClosedError(transport.path);
  }
  return idleTicks;
}

/**
 * Collect one minute of samples
 *
 * Sleeps SAMPLE_INTERVAL_MS after each valid sample; failed reads are
 * retried straight away. Stops at the first check after MINUTE_WINDOW_MS.
 *
 * @returns Valid samples in read order
 * @throws {TransportClosedError} When the device goes away mid-minute
 */
export async function collectMinute(controller: Controller): Promise<TelemetryRecord[]> {
  const { transport, config, logger, clock, state } = controller;
  const records: TelemetryRecord[] = [];
  const windowStart = clock.nowMs();

  for (;;) {
    const record = await readSample(transport, config.SCHEMA, logger, clock, config.FIELD_DELIMITER);
    const elapsed = clock.nowMs() - windowStart;

    if (record === null) {
      state.failedReads++;
      if (!transport.isConnected()) {
        throw new TransportClosedError(transport.path);
      }
      if (elapsed >= config.MINUTE_WINDOW_MS) {
        break;
      }
      continue;
    }

    records.push(record);
    state.samplesRead++;
    if (elapsed >= config.MINUTE_WINDOW_MS) {
      break;
    }
    await clock.sleep(config.SAMPLE_INTERVAL_MS);
  }

  logger.debug('Finished collecting data for 1 minute: ' + records.length + ' samples');
  return records;
}

/**
 * Bring the lights in line with the schedule and remember the result
 */
export async function processLights(controller: Controller): Promise<void> {
  const { state, config, transport, logger, clock } = controller;
  state.lightState = await controlLights(state.lightState, {
    schedule: config.SCHEDULE,
    site: config.SITE,
    device: transport,
    logger,
    clock
  });
}

/**
 * Record one minute and write the batch out when due
 */
export async function processRecording(controller: Controller): Promise<void> {
  const { state, config, logger, clock, batch } = controller;

  const records = await collectMinute(controller);
  batch.append(aggregateMinute(records, config.SCHEMA, logger, clock));
  state.minutesRecorded++;

  const written = await batch.flushIfDue(clock.nowMs());
  if (written !== null) {
    state.filesWritten++;
    state.lastFilePath = written;
  }
}
