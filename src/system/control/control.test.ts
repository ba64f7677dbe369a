import type { Mock } from 'vitest';

import { createFakeClock, createFakeTransport, createMockLogger } from '$test-utils/helpers';
import type { FakeClock, FakeTransport, MockLogger } from '$test-utils/helpers';
import { buildConfig } from '@boot/config';
import { createHourlyBatchWriter } from '@features/hourly-batch';
import { createLineQueue } from '@hardware/serial/line-queue';
import { createInitialState } from '@system/state';
import { TransportClosedError } from '$types/errors';
import type { MonitorConfig } from '$types/config';
import { collectMinute, waitForInput } from './helpers';
import { runController, runCycle } from './control';
import type { Controller } from './types';

// 2026-03-01T10:00:00Z
const START_MS = Date.UTC(2026, 2, 1, 10, 0, 0);
const VALID = '50;300\n';

function lines(count: number): string[] {
  return Array.from({ length: count }, function() {
    return VALID;
  });
}

describe('control', () => {
  let clock: FakeClock;
  let logger: MockLogger;
  let transport: FakeTransport;
  let config: MonitorConfig;
  let writeFile: Mock<(filePath: string, contents: string) => Promise<void>>;

  function makeController(overrides: Partial<MonitorConfig> = {}): Controller {
    const merged: MonitorConfig = { ...config, ...overrides };
    return {
      state: createInitialState(clock.nowMs()),
      logger,
      config: merged,
      transport,
      batch: createHourlyBatchWriter({
        outputDir: merged.DATA_OUTPUT_BASE_PATH,
        identity: { cageId: merged.CAGE_ID, birdName: merged.BIRD_NAME },
        schedule: merged.SCHEDULE,
        schema: merged.SCHEMA,
        flushDelayMinutes: merged.FLUSH_DELAY_MINUTES,
        logger,
        clock,
        writeFile
      }),
      clock
    };
  }

  beforeEach(() => {
    clock = createFakeClock(START_MS);
    logger = createMockLogger();
    transport = createFakeTransport(clock);
    writeFile = vi.fn(function(_filePath: string, _contents: string) {
      return Promise.resolve();
    });
    config = buildConfig({
      dataOutputBasePath: '/out',
      cage_id: '7',
      bird_name: 'tweety',
      sunrise: '06:00',
      sunset: '20:00',
      site: { latitude: 31.9, longitude: 34.8, timezone: 'UTC' }
    }, {});
  });

  describe('waitForInput', () => {
    it('should return at once when a line is buffered', async () => {
      transport.pending.push(Buffer.from(VALID));

      expect(await waitForInput(makeController())).toBe(0);
      expect(clock.nowMs()).toBe(START_MS);
    });

    it('should throw when the wait ends on a closed port', async () => {
      transport.pending.push(Buffer.from(VALID));
      transport.connected = false;

      await expect(waitForInput(makeController())).rejects.toBeInstanceOf(TransportClosedError);
    });

    it('should throw when the device disconnects while idle', async () => {
      transport.connected = false;

      await expect(waitForInput(makeController())).rejects.toBeInstanceOf(TransportClosedError);
    });
  });

  describe('collectMinute', () => {
    it('should read one sample per second for a minute', async () => {
      transport.pending.push(...lines(70).map(function(line) { return Buffer.from(line); }));
      const controller = makeController();

      const records = await collectMinute(controller);

      expect(records).toHaveLength(61);
      expect(records[0]).toEqual({ lights_on_time: 50, lights_off_time: 300, dateTime: '2026_03_01_10_00_00.000000' });
      expect(clock.nowMs()).toBe(START_MS + 60000);
      expect(clock.sleeps).toHaveLength(60);
      expect(transport.pending).toHaveLength(9);
      expect(controller.state.samplesRead).toBe(61);
      expect(logger.debug).toHaveBeenCalledWith('Finished collecting data for 1 minute: 61 samples');
    });

    it('should retry failed reads without sleeping and stop when the window ends', async () => {
      transport.pending.push(Buffer.from(VALID), Buffer.from('bad\n'), Buffer.from(VALID));
      const controller = makeController();

      const records = await collectMinute(controller);

      expect(records).toHaveLength(2);
      expect(controller.state.failedReads).toBe(59);
      expect(clock.sleeps).toEqual([1000, 1000]);
      expect(clock.nowMs()).toBe(START_MS + 60000);
    });

    it('should throw when the device disconnects mid-minute', async () => {
      transport.pending.push(Buffer.from(VALID), new Error('port gone'));
      const controller = makeController();
      const original = transport.readLine;
      transport.readLine = function() {
        const result = original();
        if (transport.pending.length === 0) {
          transport.connected = false;
        }
        return result;
      };

      await expect(collectMinute(controller)).rejects.toThrow('Serial device /dev/fake0 is no longer connected');
      expect(controller.state.samplesRead).toBe(1);
    });
  });

  describe('runCycle', () => {
    it('should switch the lights on and record one minute', async () => {
      transport.pending.push(...lines(61).map(function(line) { return Buffer.from(line); }));
      const controller = makeController();

      await runCycle(controller);

      expect(transport.written).toEqual(['1\n']);
      expect(controller.state.lightState).toBe('on');
      expect(controller.state.cycles).toBe(1);
      expect(controller.state.minutesRecorded).toBe(1);
      expect(controller.batch.size()).toBe(1);
      expect(writeFile).not.toHaveBeenCalled();
    });

    it('should sleep for an hour when recording is disabled', async () => {
      transport.pending.push(Buffer.from(VALID));
      const controller = makeController({ DATA_READING_AND_SAVING: false });

      await runCycle(controller);

      expect(clock.sleeps).toEqual([3600000]);
      expect(transport.pending).toHaveLength(1);
      expect(logger.info).toHaveBeenCalledWith('Data reading and saving is disabled, sleeping for 60 minutes');
      expect(controller.state.minutesRecorded).toBe(0);
    });

    it('should log and count unexpected errors', async () => {
      transport.pending.push(...lines(61).map(function(line) { return Buffer.from(line); }));
      const controller = makeController();
      controller.batch.append = function() {
        throw new Error('disk gone');
      };

      await runCycle(controller);

      expect(logger.critical).toHaveBeenCalledWith('Recorder cycle crashed: disk gone');
      expect(controller.state.loopErrors).toBe(1);
    });

    it('should rethrow when the device is gone', async () => {
      transport.connected = false;
      const controller = makeController();

      await expect(runCycle(controller)).rejects.toBeInstanceOf(TransportClosedError);
      expect(controller.state.loopErrors).toBe(0);
    });

    it('should stop on a closed port while recording is disabled', async () => {
      const queue = createLineQueue(10);
      queue.fail(new Error('Serial port /dev/fake0 closed'));
      transport.waitForInput = function(timeoutMs) {
        return queue.waitForInput(timeoutMs);
      };
      transport.connected = false;
      const controller = makeController({ DATA_READING_AND_SAVING: false });

      await expect(runCycle(controller)).rejects.toBeInstanceOf(TransportClosedError);
      expect(clock.sleeps).toEqual([]);
      expect(transport.written).toEqual([]);
    });
  });

  describe('runController', () => {
    it('should write the batch once the flush delay has passed', async () => {
      transport.pending.push(...lines(183).map(function(line) { return Buffer.from(line); }));
      const controller = makeController();

      await runController(controller, function() {
        return controller.state.cycles < 3;
      });

      expect(writeFile).toHaveBeenCalledTimes(1);
      const [filePath, contents] = writeFile.mock.calls[0];
      expect(filePath).toBe('/out/cage_7_tweety_20260301_10_03_00_manually_set.csv');
      expect(contents.split('\n')).toEqual([
        ',lights_on_time_min,lights_on_time_max,lights_on_time_median,lights_off_time_min,lights_off_time_max,lights_off_time_median,dateTime',
        '0,50.0,50.0,50.0,300.0,300.0,300.0,2026-03-01 10:01:00.000000',
        '1,50.0,50.0,50.0,300.0,300.0,300.0,2026-03-01 10:02:00.000000',
        '2,50.0,50.0,50.0,300.0,300.0,300.0,2026-03-01 10:03:00.000000',
        ''
      ]);
      expect(controller.state.filesWritten).toBe(1);
      expect(controller.state.lastFilePath).toBe('/out/cage_7_tweety_20260301_10_03_00_manually_set.csv');
      expect(controller.batch.size()).toBe(0);
      expect(transport.written).toEqual(['1\n']);
    });
  });
});
