/**
 * Boot type definitions
 */

import type { ConsoleAPI, HttpPost, TimerAPI } from '@logging';
import type { OpenTransport } from '@hardware/serial';
import type { Clock } from '@utils/time';
import type { Controller } from '@system/control';

/**
 * Collaborators initialize() builds for itself unless given
 */
export interface InitDependencies {
  openTransport?: OpenTransport;
  httpPost?: HttpPost;
  timerApi?: TimerAPI;
  consoleApi?: ConsoleAPI;
  clock?: Clock;
  /** Colour console lines; defaults to whether stdout is a terminal */
  colorize?: boolean;
}

export interface StartDependencies extends InitDependencies {
  /** Checked before every cycle; defaults to forever */
  keepRunning?: () => boolean;
}

export interface InitResult {
  controller: Controller;
  /** Write out buffered console lines */
  flushLogs(): void;
}

export type CliOptions = {
  config: string;
  envFile?: string;
};

export type { Controller } from '@system/control';
