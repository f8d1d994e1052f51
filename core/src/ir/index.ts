export type {
  Boundary,
  Connection,
  DocumentHeader,
  Layout,
  LayoutDocument,
  LayoutObject,
  PartType,
  Placement,
  Position,
  Property,
  Resource,
  Rotation,
  UnitDefaults,
} from './types.js';
export type { PropertyInit } from './property.js';
export { createProperty, parseInteger, parseNumber } from './property.js';
export type { LayoutDocumentInit, ResourceInit } from './document.js';
export { createLayoutDocument, createResource } from './document.js';
