/**
 * Serial transport on the serialport package
 *
 * Frames the byte stream into newline-terminated lines with a delimiter
 * parser. Lines stay raw buffers; decoding is the line parser's job.
 */

import { SerialPort } from 'serialport';
import { DelimiterParser } from '@serialport/parser-delimiter';

import type { Logger } from '@logging';
import { TransportUnavailableError, describeError } from '$types/errors';
import { createLineQueue } from './line-queue';
import type { CreatePort, OpenTransport, SerialOptions, SerialTransport } from './types';

/**
 * Build a closed serialport port
 */
export const createSerialPort: CreatePort = function(path, baudRate) {
  return new SerialPort({ path, baudRate, autoOpen: false });
};

/**
 * Open a line transport on one device path
 *
 * @param path - Device path (e.g. /dev/ttyACM0, COM3)
 * @param options - Baud rate, read timeout and buffer cap
 * @param createPort - Port factory
 * @returns Open transport; rejects when the device cannot be opened
 */
export function openSerialTransport(
  path: string,
  options: SerialOptions,
  createPort: CreatePort = createSerialPort
): Promise<SerialTransport> {
  return new Promise(function(resolve, reject) {
    const port = createPort(path, options.baudRate);

    port.open(function(openErr) {
      if (openErr) {
        reject(openErr);
        return;
      }

      const queue = createLineQueue(options.maxBufferedLines);
      let connected = true;
      const parser = port.pipe(new DelimiterParser({ delimiter: '\n', includeDelimiter: true }));
      parser.on('data', function(line: Buffer) {
        queue.push(line);
      });
      port.on('error', function(err) {
        connected = false;
        queue.fail(err);
      });
      port.on('close', function() {
        connected = false;
        queue.fail(new Error('Serial port ' + path + ' closed'));
      });

      resolve({
        path,
        readTimeoutMs: options.readTimeoutMs,
        readLine: function() {
          return queue.readLine(options.readTimeoutMs);
        },
        waitForInput: function(timeoutMs) {
          return queue.waitForInput(timeoutMs);
        },
        isConnected: function() {
          return connected;
        },
        write: function(data) {
          return new Promise(function(done, fail) {
            port.write(data, function(writeErr) {
              if (writeErr) {
                fail(writeErr);
                return;
              }
              port.drain(function(drainErr) {
                if (drainErr) {
                  fail(drainErr);
                  return;
                }
                done();
              });
            });
          });
        },
        close: function() {
          return new Promise(function(done, fail) {
            port.close(function(closeErr) {
              if (closeErr) {
                fail(closeErr);
                return;
              }
              done();
            });
          });
        }
      });
    });
  });
}

/**
 * Open the first device that responds
 *
 * @param candidates - Ranked device paths
 * @param open - Opens one path
 * @param logger - Receives one line per failed candidate
 * @returns First transport that opened
 * @throws {TransportUnavailableError} When every candidate fails
 */
export async function acquireTransport(
  candidates: readonly string[],
  open: OpenTransport,
  logger: Logger
): Promise<SerialTransport> {
  const tried: string[] = [];
  for (const path of candidates) {
    tried.push(path);
    try {
      const transport = await open(path);
      logger.info('Connected to serial port ' + path);
      return transport;
    } catch (err) {
      logger.debug('Serial port ' + path + ' unavailable: ' + describeError(err));
    }
  }
  throw new TransportUnavailableError(tried);
}
