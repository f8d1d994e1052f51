/**
 * Unified error code constants for Layoutsmith.
 *
 * Code format: {Category}{Number}
 * - P: Parser errors (P001-P099)
 * - V: Validation errors (V001-V099)
 * - M: Mapping errors (M001-M099)
 * - B: Backend errors (B001-B099)
 * - R: Runtime errors (R001-R099)
 * - W: Warnings (W001-W299)
 */

import type { ErrorCategory, ErrorSeverity } from './types.js';

// =============================================================================
// Parser Error Codes (P001-P099)
// =============================================================================

export const ParserErrorCode = {
  // P001-P009: Document Structure
  MALFORMED_DOCUMENT: 'P001',
  MISSING_HEADER: 'P002',
  FILE_LOAD_FAILED: 'P003',

  // P010-P019: Path Queries
  INVALID_PATH_EXPRESSION: 'P010',
} as const;

export type ParserErrorCodeValue = (typeof ParserErrorCode)[keyof typeof ParserErrorCode];

// =============================================================================
// Validation Error Codes (V001-V099)
// =============================================================================

export const ValidationErrorCode = {
  // V001-V009: Document
  MISSING_DOCUMENT_IDENTIFIER: 'V001',
  NO_RESOURCES: 'V002',

  // V010-V019: Layout Objects
  UNKNOWN_LAYOUT_RESOURCE: 'V010',

  // V020-V029: Placements
  UNKNOWN_PLACEMENT_TARGET: 'V020',

  // V030-V039: Connections
  UNKNOWN_CONNECTION_SOURCE: 'V030',
  UNKNOWN_CONNECTION_TARGET: 'V031',
} as const;

export type ValidationErrorCodeValue = (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

// =============================================================================
// Mapping Error Codes (M001-M099)
// =============================================================================

export const MappingErrorCode = {
  // M001-M009: Required Properties
  MISSING_REQUIRED_PROPERTY: 'M001',

  // M010-M019: Value Validation
  VALUE_OUT_OF_RANGE: 'M010',
  INVALID_DATA_TYPE: 'M011',
} as const;

export type MappingErrorCodeValue = (typeof MappingErrorCode)[keyof typeof MappingErrorCode];

// =============================================================================
// Backend Error Codes (B001-B099)
// =============================================================================

export const BackendErrorCode = {
  // B001-B009: Transport
  TRANSPORT_FAILED: 'B001',
  COMMAND_REJECTED: 'B002',
  TIMEOUT: 'B003',

  // B010-B019: Object Model
  TEMPLATE_NOT_FOUND: 'B010',
  DERIVE_FAILED: 'B011',
  PROPERTY_SET_FAILED: 'B012',
  CONNECT_FAILED: 'B013',
  UNKNOWN_HANDLE: 'B014',

  // B020-B029: Registry
  UNKNOWN_BACKEND_MODE: 'B020',
  MISSING_BACKEND_OPTION: 'B021',
} as const;

export type BackendErrorCodeValue = (typeof BackendErrorCode)[keyof typeof BackendErrorCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  // R001-R009: Configuration
  INVALID_CONFIGURATION: 'R001',
  CONFIG_LOAD_FAILED: 'R002',

  // R010-R019: Creation
  CREATION_STOPPED: 'R010',
  MISSING_TEMPLATE: 'R011',
  MATERIAL_UNIT_FAILED: 'R012',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// Warning Codes (W001-W299)
// =============================================================================

export const WarningCode = {
  // W001-W009: Validation Warnings
  RESOURCE_WITHOUT_LAYOUT_OBJECT: 'W001',

  // W010-W019: Parser Warnings
  RESOURCE_WITHOUT_IDENTIFIER: 'W010',
  LAYOUT_OBJECT_INCOMPLETE: 'W011',
  PLACEMENT_WITHOUT_POSITION: 'W012',
  CONNECTION_WITHOUT_TARGET: 'W013',
  PART_TYPE_WITHOUT_IDENTIFIER: 'W014',
  DUPLICATE_IDENTIFIER: 'W015',

  // W100-W109: Mapping Warnings
  MISSING_PLACEMENT: 'W101',
  DEFAULT_VALUE_USED: 'W102',
  UNKNOWN_SPECIAL_HANDLER: 'W103',

  // W110-W119: Unit Conversion Warnings
  UNKNOWN_CONVERSION_CATEGORY: 'W110',
  UNKNOWN_UNIT: 'W111',
  MISSING_UNIT: 'W112',
  NON_NUMERIC_VALUE: 'W113',

  // W200-W209: Creation Warnings
  CONNECTION_ENDPOINT_MISSING: 'W201',
  OBJECT_WITHOUT_CONNECTIONS: 'W202',
} as const;

export type WarningCodeValue = (typeof WarningCode)[keyof typeof WarningCode];

// =============================================================================
// Combined Types
// =============================================================================

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | ParserErrorCodeValue
  | ValidationErrorCodeValue
  | MappingErrorCodeValue
  | BackendErrorCodeValue
  | RuntimeErrorCodeValue
  | WarningCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  P: 'parser',
  V: 'validation',
  M: 'mapping',
  B: 'backend',
  R: 'runtime',
} as const satisfies Record<string, ErrorCategory>;

/**
 * Gets the category for an error code.
 *
 * Warnings take the category of the layer that raises them:
 * W001-W009 validation, W010-W099 parser, W100-W199 mapping, W200+ runtime.
 */
export function getErrorCategory(code: string): ErrorCategory {
  const prefix = code.charAt(0);
  if (prefix === 'W') {
    const number = Number.parseInt(code.slice(1), 10);
    if (number < 10) {
      return 'validation';
    }
    if (number < 100) {
      return 'parser';
    }
    return number < 200 ? 'mapping' : 'runtime';
  }
  if (isCategoryPrefix(prefix)) {
    return ERROR_CODE_CATEGORIES[prefix];
  }
  return 'runtime';
}

/**
 * Gets the severity for an error code.
 */
export function getErrorSeverity(code: string): ErrorSeverity {
  return code.startsWith('W') ? 'warning' : 'error';
}

function isCategoryPrefix(prefix: string): prefix is keyof typeof ERROR_CODE_CATEGORIES {
  return Object.prototype.hasOwnProperty.call(ERROR_CODE_CATEGORIES, prefix);
}
