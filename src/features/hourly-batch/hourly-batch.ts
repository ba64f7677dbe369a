/**
 * Hourly batch writer
 *
 * Collects minute aggregates and writes them to a CSV file once the flush
 * delay has passed since the batch started. A successful write empties the
 * batch and restarts its timer; a failed write keeps everything for the
 * next attempt.
 */

import { mkdir, writeFile as fsWriteFile } from 'node:fs/promises';
import * as path from 'node:path';

import { formatFileTimestamp } from '@utils/time';
import type { AggregatedRecord } from '$types/common';
import { describeError } from '$types/errors';
import { buildFileName, toCsv } from './helpers';
import type { HourlyBatchOptions, HourlyBatchWriter, WriteFile } from './types';

const MS_PER_MINUTE = 60000;

const writeToDisk: WriteFile = async function(filePath, contents) {
  await mkdir(path.dirname(filePath), { recursive: true });
  await fsWriteFile(filePath, contents, 'utf8');
};

/**
 * Create a batch writer; the batch timer starts now
 *
 * @param options - Output location, naming, schema and collaborators
 * @returns Writer
 */
export function createHourlyBatchWriter(options: HourlyBatchOptions): HourlyBatchWriter {
  const { outputDir, identity, schedule, schema, flushDelayMinutes, logger, clock } = options;
  const write = options.writeFile ?? writeToDisk;

  let batch: AggregatedRecord[] = [];
  let batchStart = clock.nowMs();

  function shouldFlush(nowMs: number): boolean {
    return (nowMs - batchStart) / MS_PER_MINUTE >= flushDelayMinutes;
  }

  async function flush(nowMs: number): Promise<string | null> {
    const fileName = buildFileName(identity, schedule, formatFileTimestamp(nowMs, clock.zone));
    const filePath = path.join(outputDir, fileName);
    const records = batch;

    try {
      await write(filePath, toCsv(records, schema, clock.zone));
    } catch (err) {
      logger.warning('Failed writing ' + records.length + ' records to ' + filePath + ': ' + describeError(err));
      return null;
    }

    logger.info('Wrote ' + records.length + ' records to ' + filePath);
    batch = batch.slice(records.length);
    batchStart = nowMs;
    return filePath;
  }

  return {
    append: function(record) {
      batch.push(record);
    },
    shouldFlush,
    flush,
    flushIfDue: function(nowMs) {
      if (!shouldFlush(nowMs)) {
        return Promise.resolve(null);
      }
      logger.debug(flushDelayMinutes + ' minutes have passed, writing batch');
      return flush(nowMs);
    },
    size: function() {
      return batch.length;
    }
  };
}
