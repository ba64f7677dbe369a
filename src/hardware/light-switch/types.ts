/**
 * Light switch types
 */

/**
 * Anything commands can be written to; the serial transport satisfies it
 */
export interface CommandSink {
  write(data: string): Promise<void>;
}
