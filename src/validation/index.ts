export { validateConfig } from './validator';
export * from './helpers';
export type { ValidationIssue, ValidationResult, IssueLevel } from './types';
