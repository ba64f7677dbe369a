/**
 * Validation result types
 */

export type IssueLevel = 'CRITICAL' | 'WARNING';

/**
 * One problem found in the configuration
 */
export interface ValidationIssue {
  /** Config key, e.g. FLUSH_DELAY_MINUTES or SITE.latitude */
  field: string;
  message: string;
  level: IssueLevel;
}

export interface ValidationResult {
  /** False when any CRITICAL issue was found */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
