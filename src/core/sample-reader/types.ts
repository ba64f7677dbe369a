/**
 * Sample reader types
 */

/**
 * Line source the reader pulls from. The serial transport satisfies it.
 */
export interface LineSource {
  /** Bounded wait applied by readLine */
  readonly readTimeoutMs: number;
  /** Next framed line; rejects on timeout or device error */
  readLine(): Promise<Buffer>;
}
