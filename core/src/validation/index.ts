/**
 * Document Validation Module
 *
 * Referential-integrity checks run between parsing and mapping.
 */

// Types
export {
  type ValidationIssue,
  type ValidationResult,
  type ValidatorOptions,
  buildValidationResult,
} from './types.js';

// Main validator
export {
  validateLayoutDocument,
  // Individual rules (exported for testing)
  validateDocumentBasics,
  validateLayoutObjectReferences,
  validatePlacementReferences,
  validateConnectionEndpoints,
  findResourcesWithoutLayoutObject,
} from './document-validator.js';
