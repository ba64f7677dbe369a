/**
 * Telemetry line parser
 *
 * Turns one framed line from the sensor into an ordered list of numbers.
 * Parsing is all-or-nothing: a single bad field discards the whole line.
 * Failures are logged with the raw payload and reported as null, never thrown.
 */

import type { Logger } from '@logging';
import type { RawLine } from '$types/common';
import { describePayload, parseNumber, stripTerminator } from './helpers';

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Parse a raw telemetry line
 *
 * @param raw - Line bytes, terminator optional
 * @param logger - Receives a warning on malformed input
 * @param delimiter - Field separator
 * @returns Values in wire order, or null when the line is malformed
 */
export function parseLine(raw: RawLine, logger: Logger, delimiter = ';'): number[] | null {
  let text: string;
  try {
    text = decoder.decode(raw);
  } catch {
    logger.warning('Undecodable telemetry line ' + describePayload(raw));
    return null;
  }

  const line = stripTerminator(text);
  if (line.length === 0) {
    logger.warning('Empty telemetry line ' + describePayload(raw));
    return null;
  }

  const parts = line.split(delimiter);
  const values: number[] = [];
  for (const part of parts) {
    const value = parseNumber(part);
    if (value === null) {
      logger.warning('Malformed telemetry line ' + describePayload(raw) + ': ' + JSON.stringify(part) + ' is not a number');
      return null;
    }
    values.push(value);
  }
  return values;
}
