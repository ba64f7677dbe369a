/**
 * Line parser helpers
 */

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse one delimited field as a decimal number
 *
 * Accepts surrounding whitespace. Rejects empty text, `NaN`/`Infinity`
 * words and trailing garbage such as `12abc`.
 *
 * @param part - Field text
 * @returns Parsed value or null
 */
export function parseNumber(part: string): number | null {
  const trimmed = part.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

/**
 * Render a raw payload for log lines
 *
 * @param raw - Bytes as received
 * @returns Quoted text with control characters escaped
 */
export function describePayload(raw: Buffer): string {
  return JSON.stringify(raw.toString('utf8'));
}

/**
 * Remove the line terminator left by the framer
 */
export function stripTerminator(text: string): string {
  return text.replace(/[\r\n]+$/, '');
}
