/**
 * Number utilities
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Render a number the way a float prints
 *
 * Shortest round-trip digits. Integral values keep one decimal ("50.0").
 * Exponents below -4 or from 16 up switch to scientific form with at least
 * two exponent digits ("1.5e-07", "1e+16").
 *
 * @param value - Number to render
 * @returns Text form
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'inf' : '-inf';
  }
  if (value === 0) {
    return Object.is(value, -0) ? '-0.0' : '0.0';
  }

  const [mantissa, exponentText] = value.toExponential().split('e');
  const exponent = Number(exponentText);
  if (exponent < -4 || exponent >= 16) {
    const sign = exponent < 0 ? '-' : '+';
    return mantissa + 'e' + sign + String(Math.abs(exponent)).padStart(2, '0');
  }

  if (Number.isInteger(value)) {
    return value.toFixed(1);
  }
  return String(value);
}
