/**
 * Console output sink with rate-limited buffering
 *
 * Buffers messages up to a configurable limit and drains them at a fixed
 * interval so a burst of malformed samples cannot flood the terminal.
 * Overflowing messages are dropped with a warning.
 */

import chalk from 'chalk';

import { colorizeLine } from '../helpers';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, SinkReport, TimerAPI } from '../types';

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling drain
 * @param consoleApi - Console API for output
 * @param config - Sink configuration (bufferSize, drainInterval, colorize)
 * @returns Console sink instance
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const buffer: string[] = [];
  let drainStarted = false;

  function emit(line: string): void {
    consoleApi.log(config.colorize ? colorizeLine(line, chalk) : line);
  }

  function drain(): void {
    const next = buffer.shift();
    if (next !== undefined) {
      emit(next);
    }
  }

  function flush(): void {
    const pending = buffer.splice(0, buffer.length);
    for (const line of pending) {
      emit(line);
    }
  }

  function write(line: string): void {
    if (buffer.length < config.bufferSize) {
      buffer.push(line);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + line);
    }
  }

  function initialize(): Promise<SinkReport> {
    if (!drainStarted) {
      drainStarted = true;
      timerApi.set(config.drainInterval, true, drain);
    }
    return Promise.resolve({ sink: 'console', ok: true, message: 'Console sink draining every ' + config.drainInterval + 'ms' });
  }

  return {
    name: 'console',
    write,
    initialize,
    flush,
    getBufferSize: function() { return buffer.length; }
  };
}
