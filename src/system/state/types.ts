/**
 * Recorder state
 *
 * Everything the loop carries from one cycle to the next. Owned by the
 * controller and passed explicitly; nothing here is module-global.
 */

import type { LightState } from '$types/common';

export interface RecorderState {
  // ═══════════════════════════════════════════════════════════════
  // LIGHTS
  // ═══════════════════════════════════════════════════════════════
  /** Last state sent to the lights; null until the first switch */
  lightState: LightState;

  // ═══════════════════════════════════════════════════════════════
  // TIMING
  // ═══════════════════════════════════════════════════════════════
  startTimeMs: number;
  cycles: number;

  // ═══════════════════════════════════════════════════════════════
  // RECORDING
  // ═══════════════════════════════════════════════════════════════
  minutesRecorded: number;
  samplesRead: number;
  failedReads: number;
  filesWritten: number;
  lastFilePath: string | null;

  // ═══════════════════════════════════════════════════════════════
  // ERRORS
  // ═══════════════════════════════════════════════════════════════
  loopErrors: number;
}
