/**
 * Document Validator
 *
 * Checks the referential integrity of a parsed layout document. Every rule
 * runs to completion so a single pass reports all problems.
 */

import { ValidationErrorCode, WarningCode, createDiagnostic } from '../errors/index.js';
import type { LayoutDocument } from '../ir/index.js';
import {
  type ValidationIssue,
  type ValidationResult,
  type ValidatorOptions,
  buildValidationResult,
} from './types.js';

/**
 * Validates a layout document and returns all validation issues.
 * The document is not modified.
 */
export function validateLayoutDocument(
  document: LayoutDocument,
  options: ValidatorOptions = {},
): ValidationResult {
  const issues: ValidationIssue[] = [];

  issues.push(...validateDocumentBasics(document));
  issues.push(...validateLayoutObjectReferences(document));
  issues.push(...validatePlacementReferences(document));
  issues.push(...validateConnectionEndpoints(document));

  if (!options.errorsOnly) {
    issues.push(...findResourcesWithoutLayoutObject(document));
  }

  // errors always count; only warnings can be skipped
  const skipCodes = options.skipCodes;
  const filteredIssues = skipCodes
    ? issues.filter((issue) => issue.severity === 'error' || !skipCodes.includes(issue.code))
    : issues;

  return buildValidationResult(filteredIssues);
}

/**
 * The document needs an identifier and at least one resource.
 */
export function validateDocumentBasics(document: LayoutDocument): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (!document.header.identifier) {
    issues.push(
      createDiagnostic(ValidationErrorCode.MISSING_DOCUMENT_IDENTIFIER, 'Missing document identifier', {
        entityKind: 'document',
      }),
    );
  }
  if (document.resources.size === 0) {
    issues.push(
      createDiagnostic(ValidationErrorCode.NO_RESOURCES, 'No resources defined', {
        entityKind: 'document',
        identifier: document.header.identifier || undefined,
      }),
    );
  }
  return issues;
}

export function validateLayoutObjectReferences(document: LayoutDocument): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const [layoutObjectId, layoutObject] of document.layoutObjects) {
    if (!document.resources.has(layoutObject.associatedResourceId)) {
      issues.push(
        createDiagnostic(
          ValidationErrorCode.UNKNOWN_LAYOUT_RESOURCE,
          `LayoutObject '${layoutObjectId}' references unknown resource '${layoutObject.associatedResourceId}'`,
          { entityKind: 'layoutObject', identifier: layoutObjectId, referenceId: layoutObject.associatedResourceId },
        ),
      );
    }
  }
  return issues;
}

export function validatePlacementReferences(document: LayoutDocument): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (!document.layout) {
    return issues;
  }
  for (const placement of document.layout.placements.values()) {
    if (!document.layoutObjects.has(placement.layoutElementId)) {
      issues.push(
        createDiagnostic(
          ValidationErrorCode.UNKNOWN_PLACEMENT_TARGET,
          `Placement references unknown layout object '${placement.layoutElementId}'`,
          { entityKind: 'placement', identifier: placement.layoutElementId, referenceId: placement.layoutElementId },
        ),
      );
    }
  }
  return issues;
}

/**
 * Source and target are checked independently; a connection with two unknown
 * endpoints yields two errors.
 */
export function validateConnectionEndpoints(document: LayoutDocument): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const connection of document.connections) {
    if (!document.resources.has(connection.fromResourceId)) {
      issues.push(
        createDiagnostic(
          ValidationErrorCode.UNKNOWN_CONNECTION_SOURCE,
          `Connection '${connection.identifier}' references unknown source resource '${connection.fromResourceId}'`,
          { entityKind: 'connection', identifier: connection.identifier, referenceId: connection.fromResourceId },
        ),
      );
    }
    if (!document.resources.has(connection.toResourceId)) {
      issues.push(
        createDiagnostic(
          ValidationErrorCode.UNKNOWN_CONNECTION_TARGET,
          `Connection '${connection.identifier}' references unknown target resource '${connection.toResourceId}'`,
          { entityKind: 'connection', identifier: connection.identifier, referenceId: connection.toResourceId },
        ),
      );
    }
  }
  return issues;
}

/**
 * Resources without a layout object are legal (purely logical resources) but
 * will not be created, so they are reported as warnings.
 */
export function findResourcesWithoutLayoutObject(document: LayoutDocument): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const resourceId of document.resources.keys()) {
    if (!document.getLayoutObjectForResource(resourceId)) {
      issues.push(
        createDiagnostic(
          WarningCode.RESOURCE_WITHOUT_LAYOUT_OBJECT,
          `Resource '${resourceId}' has no associated layout object`,
          { entityKind: 'resource', identifier: resourceId },
        ),
      );
    }
  }
  return issues;
}
