/**
 * Document validation types
 */

import type { Diagnostic } from '../errors/index.js';

/**
 * A single validation issue (error or warning)
 */
export type ValidationIssue = Diagnostic;

/**
 * Result of validating a layout document
 */
export interface ValidationResult {
  /** True if there are no hard errors (warnings are allowed) */
  valid: boolean;
  /** All validation issues found, in rule order */
  issues: ValidationIssue[];
  /** Convenience accessor for errors only */
  errors: ValidationIssue[];
  /** Convenience accessor for warnings only */
  warnings: ValidationIssue[];
}

/**
 * Options for the document validator
 */
export interface ValidatorOptions {
  /** Skip warning-level validations */
  errorsOnly?: boolean;
  /** Skip specific warning codes. Error codes are always reported. */
  skipCodes?: string[];
}

/**
 * Builds a ValidationResult from a list of issues
 */
export function buildValidationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === 'error');
  const warnings = issues.filter((i) => i.severity === 'warning');

  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  };
}
