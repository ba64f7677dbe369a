/**
 * Sample reader
 *
 * Reads one line from the device and turns it into a telemetry record keyed
 * by the schema. The capture timestamp is taken before the read so it marks
 * when the sample was requested.
 */

import type { Logger } from '@logging';
import type { Clock } from '@utils/time';
import { formatSampleTimestamp } from '@utils/time';
import type { Schema, TelemetryRecord } from '$types/common';
import { describeError } from '$types/errors';
import { parseLine, describePayload } from '../line-parser';
import type { LineSource } from './types';

/**
 * Read and validate one telemetry sample
 *
 * @param source - Device line source
 * @param schema - Field names in wire order, timestamp field last
 * @param logger - Receives read errors and malformed-line warnings
 * @param clock - Provides the capture time
 * @param delimiter - Separator between values on the line
 * @returns Record, or null when the read failed or the line was malformed
 */
export async function readSample(
  source: LineSource,
  schema: Schema,
  logger: Logger,
  clock: Clock,
  delimiter = ';'
): Promise<TelemetryRecord | null> {
  const dateTime = formatSampleTimestamp(clock.nowMicros(), clock.zone);

  let raw: Buffer;
  try {
    raw = await source.readLine();
  } catch (err) {
    logger.warning('Serial read error: ' + describeError(err));
    return null;
  }

  const values = parseLine(raw, logger, delimiter);
  if (values === null) {
    return null;
  }

  const fields = schema.slice(0, -1);
  if (values.length !== fields.length) {
    logger.warning(
      'Expected ' + fields.length + ' values but got ' + values.length + ' in ' + describePayload(raw)
    );
    return null;
  }

  const keyed: Record<string, number> = {};
  fields.forEach(function(field, i) {
    keyed[field] = values[i];
  });
  return { ...keyed, dateTime };
}
