import type { Diagnostic } from '../errors/index.js';

export interface CreationStatistics {
  objectsCreated: number;
  connectionsCreated: number;
  materialUnitsCreated: number;
  errors: number;
  warnings: number;
}

export interface CreatedObjectReport {
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/** A created connection as [fromResourceId, toResourceId]. */
export type CreatedConnection = [string, string];
