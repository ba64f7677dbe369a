/**
 * Clock abstraction for the recording loop
 */
export interface Clock {
  /** IANA zone name timestamps are rendered in */
  readonly zone: string;
  /** Wall-clock milliseconds since epoch */
  nowMs(): number;
  /** High-resolution wall-clock microseconds since epoch */
  nowMicros(): number;
  /** Resolve after the given delay */
  sleep(ms: number): Promise<void>;
}
