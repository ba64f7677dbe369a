/**
 * Minute aggregator
 *
 * Reduces one minute of telemetry records to min, max and median per field.
 * A field with no numeric values is skipped and reported once together with
 * the whole input batch; the fields that did aggregate are kept.
 */

import type { Logger } from '@logging';
import type { Clock } from '@utils/time';
import { formatFloat } from '@utils/number';
import type { AggregatedRecord, Schema, TelemetryRecord } from '$types/common';
import { aggregateColumns, median } from './helpers';

/**
 * Aggregate a minute buffer
 *
 * @param records - Samples collected during the window
 * @param schema - Field names, timestamp field last
 * @param logger - Receives the partial-failure report
 * @param clock - Provides the aggregation time
 * @returns Aggregated record; always carries a fresh dateTime
 */
export function aggregateMinute(
  records: readonly TelemetryRecord[],
  schema: Schema,
  logger: Logger,
  clock: Clock
): AggregatedRecord {
  const columns: Record<string, string> = {};
  const failed: string[] = [];

  for (const field of schema.slice(0, -1)) {
    const values: number[] = [];
    for (const record of records) {
      const value = record[field];
      if (typeof value === 'number') {
        values.push(value);
      }
    }

    if (values.length === 0) {
      failed.push(field);
      continue;
    }

    const [minKey, maxKey, medianKey] = aggregateColumns(field);
    columns[minKey] = formatFloat(Math.min(...values));
    columns[maxKey] = formatFloat(Math.max(...values));
    columns[medianKey] = formatFloat(median(values));
  }

  if (failed.length > 0) {
    logger.warning(
      'Aggregation failed for ' + failed.join(', ') + ' over ' + records.length +
      ' records: ' + JSON.stringify(records)
    );
  }

  return { ...columns, dateTime: new Date(clock.nowMs()) };
}
