/**
 * Recorder loop
 *
 * Each cycle waits for the device, updates the lights, then records one
 * minute of telemetry (or idles for an hour when recording is off).
 */

import { TransportClosedError, describeError } from '$types/errors';

import type { Controller } from './types';

import {
  waitForInput,
  processLights,
  processRecording
} from './helpers';

/**
 * Run one cycle
 *
 * Unexpected errors are logged and counted; the loop carries on.
 *
 * @throws {TransportClosedError} When the device is gone
 */
export async function runCycle(controller: Controller): Promise<void> {
  const { state, logger, config, clock } = controller;
  state.cycles++;

  try {
    await waitForInput(controller);
    await processLights(controller);

    if (!config.DATA_READING_AND_SAVING) {
      logger.info('Data reading and saving is disabled, sleeping for ' + config.RECORDING_DISABLED_SLEEP_MS / 60000 + ' minutes');
      await clock.sleep(config.RECORDING_DISABLED_SLEEP_MS);
      return;
    }

    await processRecording(controller);
  } catch (e) {
    if (e instanceof TransportClosedError) {
      throw e;
    }
    logger.critical('Recorder cycle crashed: ' + describeError(e));
    state.loopErrors++;
  }
}

/**
 * Run cycles until keepRunning returns false
 *
 * @param controller - Wired controller
 * @param keepRunning - Checked before every cycle
 * @throws {TransportClosedError} When the device is gone
 */
export async function runController(
  controller: Controller,
  keepRunning: () => boolean = function() {
    return true;
  }
): Promise<void> {
  while (keepRunning()) {
    await runCycle(controller);
  }
}
