import type { DataType, ScalarValue } from '../config/mapping-rules.js';
import type { Diagnostic } from '../errors/index.js';

export type MappedValueType = DataType | 'string';

/**
 * One attribute to set on a created object, in the order it will be applied.
 */
export type MappedProperty =
  | {
      readonly kind: 'value';
      readonly target: string;
      readonly value: ScalarValue;
      readonly dataType: MappedValueType;
    }
  | {
      /** `Coordinate3D` as [x, y, z] or `_3D.Rotation` as [angle, axisX, axisY, axisZ]. */
      readonly kind: 'vector';
      readonly target: string;
      readonly values: readonly number[];
    }
  | {
      readonly kind: 'name';
      readonly target: 'name';
      readonly value: string;
    }
  | {
      readonly kind: 'material-unit';
      readonly target: string;
      readonly label: string;
      readonly objectName: string;
      readonly sourceValue: string;
    };

export interface ObjectMapping {
  readonly resourceId: string;
  readonly resourceType: string;
  readonly layoutObjectId: string;
  /** Template name from the rule table; resolved to a path by the orchestrator. */
  readonly template: string;
  /** Sanitized object name, also present as the `name` property. */
  readonly name: string;
  readonly properties: MappedProperty[];
  /** Mapping errors, later joined by creation errors for the same object. */
  readonly errors: Diagnostic[];
  readonly warnings: Diagnostic[];
}

export interface MaterialUnitAssignment {
  readonly sourceValue: string;
  readonly label: string;
  readonly objectName: string;
}

export interface MappingOutcome {
  /** Keyed by resource identifier, in layout-object document order. */
  readonly mappings: Map<string, ObjectMapping>;
  /** Distinct material units in first-seen order. */
  readonly materialUnits: readonly MaterialUnitAssignment[];
  /** Resource identifiers skipped because no rule covers their type. */
  readonly unmapped: readonly string[];
}
