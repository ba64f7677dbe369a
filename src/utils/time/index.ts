export {
  nowMs,
  nowMicros,
  sleep,
  nodeTimer,
  createSystemClock,
  formatSampleTimestamp,
  formatFileTimestamp,
  formatCsvDateTime
} from './time';
export type { Clock } from './types';
