export { mapLayoutDocument, findResourceRule } from './mapping-engine.js';
export type { MappingOptions } from './mapping-engine.js';
export { sanitizeName, makeUniqueName } from './name-sanitizer.js';
export { createUnitConverter } from './unit-converter.js';
export type { UnitConverter, UnitLookup } from './unit-converter.js';
export { coerceValue, checkValue } from './value-coercion.js';
export {
  ASSIGN_MATERIAL_UNIT,
  KNOWN_SPECIAL_HANDLERS,
  createMaterialUnitRegistry,
  materialUnitLabel,
} from './special-handlers.js';
export type { MaterialUnitRegistry } from './special-handlers.js';
export type {
  MappedProperty,
  MappedValueType,
  MappingOutcome,
  MaterialUnitAssignment,
  ObjectMapping,
} from './types.js';
