import type { UnitCategory } from '../config/mapping-rules.js';

/**
 * How a unit resolves within a category. Everything except `factor` converts
 * as identity.
 */
export type UnitLookup =
  | { readonly kind: 'base' }
  | { readonly kind: 'factor'; readonly factor: number }
  | { readonly kind: 'unknown-category' }
  | { readonly kind: 'unknown-unit' }
  | { readonly kind: 'missing-unit' };

export interface UnitConverter {
  inspect(unit: string | undefined, category: string): UnitLookup;
  /** `value * factor`, identity when the unit does not resolve to a factor. */
  toBase(value: number, unit: string | undefined, category: string): number;
  /** Inverse of toBase. */
  fromBase(value: number, unit: string | undefined, category: string): number;
  baseUnit(category: string): string | undefined;
}

export function createUnitConverter(table: Readonly<Record<string, UnitCategory>>): UnitConverter {
  const inspect = (unit: string | undefined, category: string): UnitLookup => {
    const entry = table[category];
    if (!entry) {
      return { kind: 'unknown-category' };
    }
    if (!unit) {
      return { kind: 'missing-unit' };
    }
    if (unit === entry.baseUnit) {
      return { kind: 'base' };
    }
    const factor = entry.conversions[unit] ?? entry.conversions[unit.toLowerCase()];
    return factor === undefined ? { kind: 'unknown-unit' } : { kind: 'factor', factor };
  };

  return {
    inspect,
    toBase(value, unit, category) {
      const lookup = inspect(unit, category);
      return lookup.kind === 'factor' ? value * lookup.factor : value;
    },
    fromBase(value, unit, category) {
      const lookup = inspect(unit, category);
      return lookup.kind === 'factor' ? value / lookup.factor : value;
    },
    baseUnit: (category) => table[category]?.baseUnit,
  };
}
