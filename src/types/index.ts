export type { LightState, Schema, RawLine, TelemetryRecord, AggregatedRecord } from './common';
export type {
  ManualTime,
  ScheduleMode,
  SiteConfig,
  RawMonitorConfig,
  MonitorUserConfig,
  MonitorAppConstants,
  MonitorConfig
} from './config';
export {
  ValidationError,
  SiteConfigError,
  TransportUnavailableError,
  TransportClosedError,
  ReadTimeoutError,
  describeError
} from './errors';
