/**
 * Common type definitions used throughout the project
 */

/**
 * Light switch state; null until the controller has switched the lights once
 */
export type LightState = 'on' | 'off' | null;

/**
 * Ordered field names of a telemetry line. The last entry is the locally
 * appended timestamp field.
 */
export type Schema = readonly string[];

/**
 * Raw telemetry line as framed by the transport (terminator included or not)
 */
export type RawLine = Buffer;

/**
 * One parsed telemetry sample: a number per device field plus the local
 * capture timestamp (YYYY_MM_DD_HH_mm_ss.ffffff)
 */
export interface TelemetryRecord {
  readonly [field: string]: number | string;
  readonly dateTime: string;
}

/**
 * One minute of samples reduced to `<field>_min`, `<field>_max` and
 * `<field>_median` text columns plus the aggregation time
 */
export interface AggregatedRecord {
  readonly [column: string]: string | Date;
  readonly dateTime: Date;
}
