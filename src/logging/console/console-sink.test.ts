/**
 * Unit tests for console sink
 */

import type { Mock } from 'vitest';

import { createConsoleSink } from './console-sink';
import type { ConsoleAPI, TimerAPI } from '../types';

describe('createConsoleSink', () => {
  let timerCallbacks: Array<() => void>;
  let timerApi: { set: Mock<TimerAPI['set']> };
  let consoleApi: { log: Mock<ConsoleAPI['log']>; warn: Mock<ConsoleAPI['warn']> };

  beforeEach(() => {
    timerCallbacks = [];
    timerApi = {
      set: vi.fn<TimerAPI['set']>((_delay, _repeat, callback) => {
        timerCallbacks.push(callback);
      })
    };
    consoleApi = { log: vi.fn<ConsoleAPI['log']>(), warn: vi.fn<ConsoleAPI['warn']>() };
  });

  function tick() {
    timerCallbacks.forEach((cb) => cb());
  }

  test('should start a repeating drain timer on initialize', async () => {
    const sink = createConsoleSink(timerApi, consoleApi, { bufferSize: 5, drainInterval: 50, colorize: false });

    const report = await sink.initialize();

    expect(timerApi.set).toHaveBeenCalledWith(50, true, expect.any(Function));
    expect(report).toEqual({ sink: 'console', ok: true, message: 'Console sink draining every 50ms' });
  });

  test('should only start the drain timer once', async () => {
    const sink = createConsoleSink(timerApi, consoleApi, { bufferSize: 5, drainInterval: 50, colorize: false });

    await sink.initialize();
    await sink.initialize();

    expect(timerApi.set).toHaveBeenCalledTimes(1);
  });

  test('should drain one message per tick in order', () => {
    const sink = createConsoleSink(timerApi, consoleApi, { bufferSize: 5, drainInterval: 50, colorize: false });
    void sink.initialize();

    sink.write('first');
    sink.write('second');
    tick();

    expect(consoleApi.log).toHaveBeenCalledTimes(1);
    expect(consoleApi.log).toHaveBeenCalledWith('first');
    expect(sink.getBufferSize()).toBe(1);

    tick();
    expect(consoleApi.log).toHaveBeenLastCalledWith('second');
    expect(sink.getBufferSize()).toBe(0);
  });

  test('should warn and drop when buffer is full', () => {
    const sink = createConsoleSink(timerApi, consoleApi, { bufferSize: 1, drainInterval: 50, colorize: false });

    sink.write('kept');
    sink.write('dropped');

    expect(sink.getBufferSize()).toBe(1);
    expect(consoleApi.warn).toHaveBeenCalledWith('Console log buffer overflow, dropping message: dropped');
  });

  test('should write out every buffered message on flush', () => {
    const sink = createConsoleSink(timerApi, consoleApi, { bufferSize: 5, drainInterval: 50, colorize: false });

    sink.write('a');
    sink.write('b');
    sink.flush();

    expect(consoleApi.log.mock.calls).toEqual([['a'], ['b']]);
    expect(sink.getBufferSize()).toBe(0);
  });
});
