/**
 * Serial transport types
 */

/**
 * Line-oriented connection to the sensor/actuator device
 */
export interface SerialTransport {
  /** Device path the transport was opened on */
  readonly path: string;
  /** Bounded wait applied by readLine */
  readonly readTimeoutMs: number;
  /** Next framed line; rejects with ReadTimeoutError when none arrives in time */
  readLine(): Promise<Buffer>;
  /** True once a line is buffered, false when timeoutMs passes first */
  waitForInput(timeoutMs: number): Promise<boolean>;
  /** False once the device closed or reported an error */
  isConnected(): boolean;
  /** Write and drain */
  write(data: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Opens a transport on one device path
 */
export type OpenTransport = (path: string) => Promise<SerialTransport>;

export interface SerialOptions {
  baudRate: number;
  readTimeoutMs: number;
  /** Lines held before the oldest is dropped */
  maxBufferedLines: number;
}

/**
 * The part of a serialport port the transport drives
 */
export interface PortLike {
  open(callback: (err: Error | null) => void): void;
  pipe<T extends NodeJS.WritableStream>(destination: T): T;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  write(data: string, callback: (err: Error | null | undefined) => void): unknown;
  drain(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
}

export type CreatePort = (path: string, baudRate: number) => PortLike;

/**
 * Buffer between the line framer and the reader
 */
export interface LineQueue {
  /** Deliver a framed line */
  push(line: Buffer): void;
  /** Mark the source as broken; pending and later reads reject with err */
  fail(err: Error): void;
  readLine(timeoutMs: number): Promise<Buffer>;
  waitForInput(timeoutMs: number): Promise<boolean>;
  size(): number;
}
