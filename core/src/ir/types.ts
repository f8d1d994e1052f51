/**
 * Intermediate representation of a factory-layout document.
 *
 * The document owns every entity through maps and lists keyed by identifier.
 * Entities never point back at the document; cross references are identifier
 * strings resolved through the document accessors.
 */

import type { Diagnostic } from '../errors/index.js';

export interface Property {
  readonly name: string;
  readonly value: string;
  readonly unit?: string;
  /** The value as a float, or undefined when it is not numeric text. */
  numericValue(): number | undefined;
  /** The value as an integer, or undefined when it is not integer text. */
  integerValue(): number | undefined;
}

export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Rotation {
  readonly angle: number;
  readonly axisX: number;
  readonly axisY: number;
  readonly axisZ: number;
}

export interface Boundary {
  readonly width: number;
  readonly depth: number;
  readonly height: number;
  readonly unit: string;
}

export interface Resource {
  readonly identifier: string;
  readonly resourceType: string;
  readonly name: string;
  readonly description: string;
  readonly currentStatus: string;
  readonly resourceClassIdentifier?: string;
  readonly properties: ReadonlyMap<string, Property>;
  /** Target resource identifiers of outgoing connections, in document order. */
  readonly connections: readonly string[];
  /** Case-insensitive property lookup. */
  getProperty(name: string): Property | undefined;
  getPropertyValue(name: string): string | undefined;
}

export interface Connection {
  readonly identifier: string;
  readonly fromResourceId: string;
  readonly toResourceId: string;
  readonly description: string;
}

export interface LayoutObject {
  readonly identifier: string;
  readonly associatedResourceId: string;
  readonly boundary?: Boundary;
}

export interface Placement {
  readonly layoutElementId: string;
  readonly position: Position;
  readonly rotation?: Rotation;
}

export interface Layout {
  readonly identifier: string;
  readonly description: string;
  readonly boundary?: Boundary;
  /** Keyed by layout element identifier. */
  readonly placements: ReadonlyMap<string, Placement>;
}

export interface PartType {
  readonly identifier: string;
  readonly name: string;
  readonly description: string;
  readonly weight?: number;
  readonly dimensions?: Boundary;
}

export interface UnitDefaults {
  readonly time: string;
  readonly length: string;
  readonly weight: string;
}

export interface DocumentHeader {
  readonly identifier: string;
  readonly description: string;
  readonly version: string;
  readonly creationTime: string;
  readonly units: UnitDefaults;
}

export interface LayoutDocument {
  readonly header: DocumentHeader;
  readonly resources: ReadonlyMap<string, Resource>;
  readonly connections: readonly Connection[];
  readonly layoutObjects: ReadonlyMap<string, LayoutObject>;
  readonly layout?: Layout;
  readonly partTypes: ReadonlyMap<string, PartType>;
  /** Entity-skip warnings collected while parsing. */
  readonly diagnostics: readonly Diagnostic[];
  getResource(resourceId: string): Resource | undefined;
  getLayoutObject(layoutObjectId: string): LayoutObject | undefined;
  getPlacement(layoutElementId: string): Placement | undefined;
  getResourceConnections(resourceId: string): readonly string[];
  getLayoutObjectForResource(resourceId: string): LayoutObject | undefined;
}
