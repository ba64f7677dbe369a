/**
 * Line queue
 *
 * Holds framed lines until the loop reads them. Readers that arrive before a
 * line wait on a timer instead of polling. Once maxLines are held, the oldest
 * line is dropped for each new one.
 */

import { ReadTimeoutError } from '$types/errors';
import type { LineQueue } from './types';

interface LineWaiter {
  resolve: (line: Buffer) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

interface InputWaiter {
  resolve: (ready: boolean) => void;
  timer: NodeJS.Timeout;
}

/**
 * Create an empty line queue
 *
 * @param maxLines - Lines kept while nobody reads
 */
export function createLineQueue(maxLines: number): LineQueue {
  const lines: Buffer[] = [];
  const lineWaiters: LineWaiter[] = [];
  const inputWaiters: InputWaiter[] = [];
  let failure: Error | null = null;

  function notifyInput(): void {
    while (inputWaiters.length > 0) {
      const waiter = inputWaiters.shift();
      if (waiter) {
        clearTimeout(waiter.timer);
        waiter.resolve(true);
      }
    }
  }

  function push(line: Buffer): void {
    const waiter = lineWaiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(line);
      return;
    }
    lines.push(line);
    if (lines.length > maxLines) {
      lines.shift();
    }
    notifyInput();
  }

  function fail(err: Error): void {
    failure = err;
    while (lineWaiters.length > 0) {
      const waiter = lineWaiters.shift();
      if (waiter) {
        clearTimeout(waiter.timer);
        waiter.reject(err);
      }
    }
    // Wake input waiters so the next read surfaces the failure
    notifyInput();
  }

  function readLine(timeoutMs: number): Promise<Buffer> {
    const next = lines.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (failure) {
      return Promise.reject(failure);
    }
    return new Promise(function(resolve, reject) {
      const waiter: LineWaiter = {
        resolve,
        reject,
        timer: setTimeout(function() {
          const index = lineWaiters.indexOf(waiter);
          if (index >= 0) {
            lineWaiters.splice(index, 1);
          }
          reject(new ReadTimeoutError(timeoutMs));
        }, timeoutMs)
      };
      lineWaiters.push(waiter);
    });
  }

  function waitForInput(timeoutMs: number): Promise<boolean> {
    if (lines.length > 0 || failure) {
      return Promise.resolve(true);
    }
    return new Promise(function(resolve) {
      const waiter: InputWaiter = {
        resolve,
        timer: setTimeout(function() {
          const index = inputWaiters.indexOf(waiter);
          if (index >= 0) {
            inputWaiters.splice(index, 1);
          }
          resolve(false);
        }, timeoutMs)
      };
      inputWaiters.push(waiter);
    });
  }

  return {
    push,
    fail,
    readLine,
    waitForInput,
    size: function() {
      return lines.length;
    }
  };
}
