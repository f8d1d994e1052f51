import type { MaterialUnitRules } from '../config/mapping-rules.js';
import type { MaterialUnitAssignment } from './types.js';

export const ASSIGN_MATERIAL_UNIT = 'assign_material_unit';

export const KNOWN_SPECIAL_HANDLERS: ReadonlySet<string> = new Set([ASSIGN_MATERIAL_UNIT]);

/**
 * Spreadsheet-style labels: 0 -> A, 25 -> Z, 26 -> AA, 27 -> AB.
 */
export function materialUnitLabel(index: number): string {
  let label = '';
  let remaining = index + 1;
  while (remaining > 0) {
    const digit = (remaining - 1) % 26;
    label = String.fromCharCode(65 + digit) + label;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return label;
}

export interface MaterialUnitRegistry {
  /** Returns the existing assignment for a source value or allocates the next label. */
  assign(sourceValue: string): MaterialUnitAssignment;
  list(): MaterialUnitAssignment[];
}

/**
 * Allocates one material unit per distinct source value. Scoped to a single
 * mapping run.
 */
export function createMaterialUnitRegistry(rules: MaterialUnitRules): MaterialUnitRegistry {
  const assignments = new Map<string, MaterialUnitAssignment>();

  return {
    assign(sourceValue) {
      const existing = assignments.get(sourceValue);
      if (existing) {
        return existing;
      }
      const label = materialUnitLabel(assignments.size);
      const assignment = { sourceValue, label, objectName: `${rules.namePrefix}${label}` };
      assignments.set(sourceValue, assignment);
      return assignment;
    },
    list: () => [...assignments.values()],
  };
}
