/**
 * Shared error types for the Layoutsmith error system.
 *
 * Every layer reports through these shapes:
 * - LayoutsmithError for conditions that abort an operation
 * - Diagnostic for findings that are recorded and reported together
 */

/**
 * Error categories, one per pipeline layer.
 */
export type ErrorCategory = 'parser' | 'validation' | 'mapping' | 'backend' | 'runtime';

/**
 * Severity level for issues.
 */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Kinds of document entities a diagnostic can point at.
 */
export type EntityKind =
  | 'document'
  | 'resource'
  | 'connection'
  | 'layoutObject'
  | 'placement'
  | 'partType'
  | 'property'
  | 'object';

/**
 * The entity an error or diagnostic is about.
 */
export interface DiagnosticSubject {
  entityKind: EntityKind;
  /** Identifier of the entity itself */
  identifier?: string;
  /** Identifier the entity refers to, when the issue is about that reference */
  referenceId?: string;
  /** Property name, for property-level findings */
  property?: string;
}

/**
 * A recorded, non-throwing finding.
 */
export interface Diagnostic {
  /** Unique code for programmatic handling (e.g., "V010", "W102") */
  code: string;
  severity: ErrorSeverity;
  message: string;
  subject?: DiagnosticSubject;
}

/**
 * Base interface for all Layoutsmith errors.
 */
export interface LayoutsmithError extends Error {
  /** Unique error code (e.g., 'P001', 'B010') */
  code: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  subject?: DiagnosticSubject;
  /** Suggested fix (optional) */
  suggestion?: string;
  /** Extra structured context (e.g. the list of config schema violations) */
  details?: Record<string, unknown>;
}

/**
 * Type guard to check if an error is a LayoutsmithError.
 */
export function isLayoutsmithError(error: unknown): error is LayoutsmithError {
  return (
    error instanceof Error &&
    'code' in error &&
    'category' in error &&
    'severity' in error &&
    typeof error.code === 'string' &&
    typeof error.category === 'string' &&
    typeof error.severity === 'string'
  );
}

/**
 * Type guard for errors raised by a backend adapter.
 */
export function isBackendError(error: unknown): error is LayoutsmithError {
  return isLayoutsmithError(error) && error.category === 'backend';
}
