/**
 * In-process stand-ins shared by the test suites
 */

import type { Mock } from 'vitest';

import type { Logger, LogLevel } from '@logging';
import type { Clock } from '@utils/time';
import type { SerialTransport } from '@hardware/serial';
import { ReadTimeoutError } from '$types/errors';

export interface MockLogger extends Logger {
  debug: Mock<(msg: string) => void>;
  info: Mock<(msg: string) => void>;
  warning: Mock<(msg: string) => void>;
  critical: Mock<(msg: string) => void>;
}

/**
 * Logger whose level methods are spies
 */
export function createMockLogger(): MockLogger {
  let level: LogLevel = 0;
  return {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    critical: vi.fn(),
    setLevel: vi.fn(function(newLevel: LogLevel) {
      level = newLevel;
    }),
    getLevel: vi.fn(function() {
      return level;
    }),
    initialize: vi.fn(function() {
      return Promise.resolve([]);
    })
  };
}

export interface FakeClock extends Clock {
  advance(ms: number): void;
  sleeps: number[];
}

/**
 * Clock that only moves when advanced or slept on
 */
export function createFakeClock(startMs: number, zone = 'UTC'): FakeClock {
  let current = startMs;
  const sleeps: number[] = [];
  return {
    zone,
    sleeps,
    nowMs: function() {
      return current;
    },
    nowMicros: function() {
      return current * 1000;
    },
    sleep: function(ms) {
      sleeps.push(ms);
      current += ms;
      return Promise.resolve();
    },
    advance: function(ms) {
      current += ms;
    }
  };
}

export interface FakeTransport extends SerialTransport {
  /** Lines queued for readLine; an Error entry makes that read reject */
  pending: Array<Buffer | Error>;
  written: string[];
  failWrites: boolean;
  connected: boolean;
}

/**
 * Serial transport fed from an in-memory list. An empty queue behaves like
 * the device staying silent: the read waits out its timeout on the clock.
 */
export function createFakeTransport(clock: FakeClock, lines: Array<string | Buffer | Error> = []): FakeTransport {
  const pending = lines.map(function(line) {
    return typeof line === 'string' ? Buffer.from(line) : line;
  });
  const written: string[] = [];
  const transport: FakeTransport = {
    path: '/dev/fake0',
    readTimeoutMs: 1000,
    pending,
    written,
    failWrites: false,
    connected: true,
    readLine: function() {
      const next = pending.shift();
      if (next === undefined) {
        clock.advance(transport.readTimeoutMs);
        return Promise.reject(new ReadTimeoutError(transport.readTimeoutMs));
      }
      if (next instanceof Error) {
        return Promise.reject(next);
      }
      return Promise.resolve(next);
    },
    waitForInput: function(timeoutMs) {
      if (pending.length > 0) {
        return Promise.resolve(true);
      }
      clock.advance(timeoutMs);
      return Promise.resolve(false);
    },
    isConnected: function() {
      return transport.connected;
    },
    write: function(data) {
      if (transport.failWrites) {
        return Promise.reject(new Error('write failed'));
      }
      written.push(data);
      return Promise.resolve();
    },
    close: function() {
      return Promise.resolve();
    }
  };
  return transport;
}
