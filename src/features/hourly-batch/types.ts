/**
 * Hourly batch types
 */

import type { Logger } from '@logging';
import type { Clock } from '@utils/time';
import type { AggregatedRecord, Schema } from '$types/common';
import type { ScheduleMode } from '$types/config';

/**
 * Who the recording belongs to; both parts appear in file names
 */
export interface RecordingIdentity {
  readonly cageId: string;
  readonly birdName: string;
}

export type WriteFile = (path: string, contents: string) => Promise<void>;

export interface HourlyBatchOptions {
  readonly outputDir: string;
  readonly identity: RecordingIdentity;
  readonly schedule: ScheduleMode;
  readonly schema: Schema;
  readonly flushDelayMinutes: number;
  readonly logger: Logger;
  readonly clock: Clock;
  /** Defaults to creating the directory and writing with fs/promises */
  readonly writeFile?: WriteFile;
}

/**
 * Accumulates minute aggregates and writes them out on a timer
 */
export interface HourlyBatchWriter {
  append(record: AggregatedRecord): void;
  /** True once flushDelayMinutes have passed since the batch started */
  shouldFlush(nowMs: number): boolean;
  /** Write the batch; resolves to the file path, or null when the write failed */
  flush(nowMs: number): Promise<string | null>;
  /** flush when due; null when not due or when the write failed */
  flushIfDue(nowMs: number): Promise<string | null>;
  size(): number;
}
