import type { Property } from './types.js';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses decimal or exponent notation. Blank and non-numeric text yields undefined.
 */
export function parseNumber(text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }
  const trimmed = text.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

export function parseInteger(text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

export interface PropertyInit {
  name: string;
  value: string;
  unit?: string;
}

export function createProperty(init: PropertyInit): Property {
  const unit = init.unit ? init.unit : undefined;
  return Object.freeze({
    name: init.name,
    value: init.value,
    unit,
    numericValue: () => parseNumber(init.value),
    integerValue: () => parseInteger(init.value),
  });
}
