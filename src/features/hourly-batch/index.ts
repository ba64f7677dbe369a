export { createHourlyBatchWriter } from './hourly-batch';
export { buildFileName, resolveScheduleMode, scheduleSuffix, toCsv } from './helpers';
export type { HourlyBatchWriter, HourlyBatchOptions, RecordingIdentity, WriteFile } from './types';
