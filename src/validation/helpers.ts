/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import type { ValidationIssue } from './types';
import { isFiniteNumber, isInteger } from '@utils/number';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationIssue[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationIssue[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// VALUE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Require a string with visible content
 */
export function validateNonEmpty(value: string, field: string, errors: ValidationIssue[]): void {
  if (value.trim() === '') {
    addError(errors, field, `${field} must not be empty`);
  }
}

/**
 * Require a value usable inside a file name
 */
export function validateFileNamePart(value: string, field: string, errors: ValidationIssue[]): void {
  validateNonEmpty(value, field, errors);
  if (/[\\/]/.test(value)) {
    addError(errors, field, `${field} must not contain path separators (got ${value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against a critical range
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 */
export function validateNumberRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationIssue[]
): void {
  // NaN and Infinity fail the range check too
  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
  }
}

/**
 * Validate an integer against a critical range
 *
 * First checks if the value is an integer, then validates the range
 */
export function validateIntegerRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationIssue[]
): void {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  validateNumberRange(value, field, criticalMin, criticalMax, errors);
}

/**
 * Validate a log level (0=DEBUG .. 3=CRITICAL)
 */
export function validateLogLevel(value: number, field: string, errors: ValidationIssue[]): void {
  validateIntegerRange(value, field, 0, 3, errors);
}
