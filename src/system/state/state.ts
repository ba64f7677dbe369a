/**
 * State initialization for the recorder loop
 */

import type { RecorderState } from './types';

export type { RecorderState } from './types';

/**
 * Create the state for a fresh run
 *
 * The light state starts unknown so the first cycle always sends a command.
 *
 * @param nowMs - Start time, ms since epoch
 * @returns Initial state
 */
export function createInitialState(nowMs: number): RecorderState {
  return {
    lightState: null,

    startTimeMs: nowMs,
    cycles: 0,

    minutesRecorded: 0,
    samplesRead: 0,
    failedReads: 0,
    filesWritten: 0,
    lastFilePath: null,

    loopErrors: 0
  };
}
