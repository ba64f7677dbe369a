/**
 * Hourly batch helpers
 *
 * File naming, schedule mode resolution and CSV serialisation.
 */

import { formatCsvDateTime } from '@utils/time';
import type { AggregatedRecord, Schema } from '$types/common';
import type { RawMonitorConfig, ScheduleMode } from '$types/config';
import { aggregateColumns } from '@core/minute-aggregator';
import type { RecordingIdentity } from './types';

/**
 * Pick the schedule mode from the light-related config keys
 *
 * Priority: manual times (both sunrise and sunset set, 0 included), then
 * stable_date, then days_offset, then days_offset 0.
 *
 * @param raw - Config file contents
 * @returns Resolved mode
 */
export function resolveScheduleMode(
  raw: Pick<RawMonitorConfig, 'sunrise' | 'sunset' | 'stable_date' | 'days_offset'>
): ScheduleMode {
  const { sunrise, sunset, stable_date, days_offset } = raw;

  if (sunrise !== undefined && sunrise !== null && sunset !== undefined && sunset !== null) {
    return { kind: 'manual', sunrise, sunset };
  }
  if (stable_date !== undefined && stable_date !== null) {
    return { kind: 'stable-date', date: stable_date };
  }
  if (typeof days_offset === 'number') {
    return { kind: 'days-offset', days: days_offset };
  }
  return { kind: 'days-offset', days: 0 };
}

/**
 * File name suffix tagging the schedule mode
 */
export function scheduleSuffix(mode: ScheduleMode): string {
  switch (mode.kind) {
    case 'manual':
      return 'manually_set';
    case 'stable-date':
      return 'stable_date_' + mode.date;
    case 'days-offset':
      return 'Days_offset_' + mode.days;
  }
}

/**
 * Output file name for one flush
 *
 * @param identity - Cage and bird
 * @param mode - Schedule mode
 * @param writtenAt - Flush time formatted YYYYMMDD_HH_mm_ss
 * @returns cage_<cage>_<bird>_<time>_<suffix>.csv
 */
export function buildFileName(identity: RecordingIdentity, mode: ScheduleMode, writtenAt: string): string {
  return 'cage_' + identity.cageId + '_' + identity.birdName + '_' + writtenAt + '_' + scheduleSuffix(mode) + '.csv';
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? '"' + value.replace(/"/g, '""') + '"' : value;
}

/**
 * Serialise aggregated records as CSV
 *
 * The first column is an unnamed 0-based row index. Aggregate columns
 * follow schema order; dateTime comes last. A column a record lacks is
 * left empty.
 *
 * @param records - Batch contents
 * @param schema - Field names, timestamp field last
 * @param zone - Zone dates are written in
 * @returns CSV text with a trailing newline
 */
export function toCsv(records: readonly AggregatedRecord[], schema: Schema, zone: string): string {
  const columns = schema.slice(0, -1).flatMap(aggregateColumns);
  const lines = [['', ...columns, 'dateTime'].map(csvCell).join(',')];

  records.forEach(function(record, index) {
    const cells = columns.map(function(column) {
      const value = record[column];
      return typeof value === 'string' ? value : '';
    });
    lines.push([String(index), ...cells, formatCsvDateTime(record.dateTime, zone)].map(csvCell).join(','));
  });

  return lines.join('\n') + '\n';
}
