/**
 * Error creation helpers for the Layoutsmith error system.
 *
 * Provides factory functions for creating structured errors and diagnostics
 * with consistent formatting across all layers.
 */

import type {
  Diagnostic,
  DiagnosticSubject,
  ErrorCategory,
  ErrorSeverity,
  LayoutsmithError,
} from './types.js';
import { getErrorCategory, getErrorSeverity } from './codes.js';

/**
 * Options for creating a Layoutsmith error.
 */
export interface CreateErrorOptions {
  /** Error code (e.g., 'P001', 'B010') */
  code: string;
  message: string;
  subject?: DiagnosticSubject;
  suggestion?: string;
  details?: Record<string, unknown>;
  /** Original error that caused this error */
  cause?: unknown;
}

type ErrorHelperOptions = Omit<CreateErrorOptions, 'code' | 'message'>;

class CodedError extends Error implements LayoutsmithError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly subject?: DiagnosticSubject;
  readonly suggestion?: string;
  readonly details?: Record<string, unknown>;

  constructor(options: CreateErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'LayoutsmithError';
    this.code = options.code;
    this.category = getErrorCategory(options.code);
    this.severity = getErrorSeverity(options.code);
    this.subject = options.subject;
    this.suggestion = options.suggestion;
    this.details = options.details;
  }
}

/**
 * Creates a LayoutsmithError with the given options.
 *
 * The category and severity are inferred from the error code.
 */
export function createLayoutsmithError(options: CreateErrorOptions): LayoutsmithError {
  return new CodedError(options);
}

/**
 * Creates a parser error (P-code).
 */
export function createParserError(
  code: string,
  message: string,
  options: ErrorHelperOptions = {},
): LayoutsmithError {
  return createLayoutsmithError({ code, message, ...options });
}

/**
 * Creates a mapping error (M-code).
 */
export function createMappingError(
  code: string,
  message: string,
  options: ErrorHelperOptions = {},
): LayoutsmithError {
  return createLayoutsmithError({ code, message, ...options });
}

/**
 * Creates a backend error (B-code).
 */
export function createBackendError(
  code: string,
  message: string,
  options: ErrorHelperOptions = {},
): LayoutsmithError {
  return createLayoutsmithError({ code, message, ...options });
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: string,
  message: string,
  options: ErrorHelperOptions = {},
): LayoutsmithError {
  return createLayoutsmithError({ code, message, ...options });
}

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * Creates a diagnostic; severity follows the code.
 */
export function createDiagnostic(
  code: string,
  message: string,
  subject?: DiagnosticSubject,
): Diagnostic {
  return {
    code,
    severity: getErrorSeverity(code),
    message,
    subject,
  };
}

/**
 * Converts a caught value into a diagnostic, keeping the code of coded errors.
 */
export function diagnosticFromError(
  error: unknown,
  fallbackCode: string,
  subject?: DiagnosticSubject,
): Diagnostic {
  const message = describeError(error);
  if (error instanceof CodedError) {
    return createDiagnostic(error.code, message, subject ?? error.subject);
  }
  return createDiagnostic(fallbackCode, message, subject);
}

/**
 * Extracts a message from any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Formats a LayoutsmithError for display.
 */
export function formatError(error: LayoutsmithError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.subject) {
    parts.push(`  Subject: ${formatSubject(error.subject)}`);
  }
  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}

/**
 * Formats a Diagnostic for display.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const prefix = diagnostic.severity === 'error' ? 'ERROR' : 'WARNING';
  const parts = [`${prefix} [${diagnostic.code}]: ${diagnostic.message}`];
  if (diagnostic.subject) {
    parts.push(`  Subject: ${formatSubject(diagnostic.subject)}`);
  }
  return parts.join('\n');
}

function formatSubject(subject: DiagnosticSubject): string {
  const parts: string[] = [subject.entityKind];
  if (subject.identifier) {
    parts.push(`'${subject.identifier}'`);
  }
  if (subject.property) {
    parts.push(`property '${subject.property}'`);
  }
  if (subject.referenceId) {
    parts.push(`-> '${subject.referenceId}'`);
  }
  return parts.join(' ');
}
