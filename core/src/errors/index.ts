/**
 * Layoutsmith Error System
 *
 * One error and diagnostic vocabulary across all layers:
 * - P (Parser): document decoding and structure
 * - V (Validation): referential integrity
 * - M (Mapping): per-object property mapping
 * - B (Backend): object-model calls
 * - R (Runtime): configuration and orchestration
 * - W (Warnings): soft findings across all layers
 */

// Types
export type {
  Diagnostic,
  DiagnosticSubject,
  EntityKind,
  ErrorCategory,
  ErrorSeverity,
  LayoutsmithError,
} from './types.js';
export { isBackendError, isLayoutsmithError } from './types.js';

// Error Codes
export {
  ParserErrorCode,
  ValidationErrorCode,
  MappingErrorCode,
  BackendErrorCode,
  RuntimeErrorCode,
  WarningCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';
export type {
  ParserErrorCodeValue,
  ValidationErrorCodeValue,
  MappingErrorCodeValue,
  BackendErrorCodeValue,
  RuntimeErrorCodeValue,
  WarningCodeValue,
  ErrorCode,
} from './codes.js';

// Helpers
export type { CreateErrorOptions } from './helpers.js';
export {
  createLayoutsmithError,
  createParserError,
  createMappingError,
  createBackendError,
  createRuntimeError,
  createDiagnostic,
  diagnosticFromError,
  describeError,
  formatError,
  formatDiagnostic,
} from './helpers.js';
