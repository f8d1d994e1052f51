import type { BackendAdapter, ObjectHandle, PropertyValue } from '../backend/index.js';
import type {
  BackendSettings,
  ErrorHandlingRules,
  ErrorPolicyCategory,
  MappingRules,
  MaterialUnitRules,
  NamingRules,
} from '../config/mapping-rules.js';
import {
  BackendErrorCode,
  RuntimeErrorCode,
  WarningCode,
  createDiagnostic,
  describeError,
  diagnosticFromError,
  type Diagnostic,
  type DiagnosticSubject,
} from '../errors/index.js';
import type { Connection, LayoutDocument } from '../ir/index.js';
import { noopLogger, type Logger } from '../logger.js';
import { makeUniqueName } from '../mapping/name-sanitizer.js';
import type { MappedProperty, ObjectMapping } from '../mapping/types.js';
import { enforceErrorPolicy } from './error-policy.js';
import type { CreatedConnection, CreatedObjectReport, CreationStatistics } from './types.js';

export interface OrchestratorOptions {
  backend: BackendAdapter;
  settings: BackendSettings;
  errorHandling: ErrorHandlingRules;
  materialUnits: MaterialUnitRules;
  naming: NamingRules;
  logger?: Partial<Logger>;
}

export interface Orchestrator {
  /**
   * Creates one object per mapping, in map order, and applies its properties.
   * Returns the handles of the objects that were created, keyed by resource id.
   */
  createObjects(mappings: ReadonlyMap<string, ObjectMapping>): Promise<Map<string, ObjectHandle>>;
  /** Connects created objects in document order. */
  createConnections(document: LayoutDocument): Promise<CreatedConnection[]>;
  getStatistics(): CreationStatistics;
  /** Every created object without an incident connection is reported as a warning. */
  validateCreatedObjects(): CreatedObjectReport;
}

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  return new CreationOrchestrator(options);
}

/**
 * Convenience for the common case where every setting comes from one rule table.
 */
export function createOrchestratorFromRules(
  backend: BackendAdapter,
  rules: MappingRules,
  logger?: Partial<Logger>,
): Orchestrator {
  return createOrchestrator({
    backend,
    settings: rules.backend,
    errorHandling: rules.errorHandling,
    materialUnits: rules.materialUnits,
    naming: rules.naming,
    logger,
  });
}

class CreationOrchestrator implements Orchestrator {
  private readonly backend: BackendAdapter;
  private readonly logger: Partial<Logger>;
  private readonly resolved = new Map<string, ObjectHandle>();
  private readonly created = new Map<string, ObjectHandle>();
  private readonly usedNames = new Set<string>();
  private readonly unitObjects = new Map<string, ObjectHandle>();
  /** Creation incidents per resource id, kept apart from mapping-stage errors. */
  private readonly incidents = new Map<string, Diagnostic[]>();
  private readonly connections: CreatedConnection[] = [];
  private readonly stats: CreationStatistics = {
    objectsCreated: 0,
    connectionsCreated: 0,
    materialUnitsCreated: 0,
    errors: 0,
    warnings: 0,
  };

  constructor(private readonly options: OrchestratorOptions) {
    this.backend = options.backend;
    this.logger = options.logger ?? noopLogger;
  }

  async createObjects(mappings: ReadonlyMap<string, ObjectMapping>): Promise<Map<string, ObjectHandle>> {
    const createdNow = new Map<string, ObjectHandle>();
    this.logger.info?.('creation.objects.start', { count: mappings.size, backend: this.backend.kind });

    for (const [resourceId, mapping] of mappings) {
      const handle = await this.createObject(mapping);
      if (!handle) {
        continue;
      }
      createdNow.set(resourceId, handle);
      this.created.set(resourceId, handle);
      this.stats.objectsCreated += 1;
      this.logger.info?.('creation.object.created', {
        resourceId,
        resourceType: mapping.resourceType,
        path: handle.path,
      });
    }
    return createdNow;
  }

  async createConnections(document: LayoutDocument): Promise<CreatedConnection[]> {
    const createdNow: CreatedConnection[] = [];
    this.logger.info?.('creation.connections.start', { count: document.connections.length });

    for (const connection of document.connections) {
      if (await this.createConnection(connection)) {
        const pair: CreatedConnection = [connection.fromResourceId, connection.toResourceId];
        createdNow.push(pair);
        this.connections.push(pair);
        this.stats.connectionsCreated += 1;
        this.logger.debug?.('creation.connection.created', {
          connectionId: connection.identifier,
          from: connection.fromResourceId,
          to: connection.toResourceId,
        });
      }
    }
    return createdNow;
  }

  getStatistics(): CreationStatistics {
    return { ...this.stats };
  }

  validateCreatedObjects(): CreatedObjectReport {
    const connected = new Set<string>();
    for (const [from, to] of this.connections) {
      connected.add(from);
      connected.add(to);
    }

    const errors: Diagnostic[] = [];
    const warnings: Diagnostic[] = [];
    for (const resourceId of this.created.keys()) {
      // objects that exist but whose properties did not all apply
      errors.push(...(this.incidents.get(resourceId) ?? []));
      if (!connected.has(resourceId)) {
        warnings.push(
          createDiagnostic(WarningCode.OBJECT_WITHOUT_CONNECTIONS, `Object '${resourceId}' has no connections`, {
            entityKind: 'object',
            identifier: resourceId,
          }),
        );
      }
    }
    return { errors, warnings };
  }

  private async createObject(mapping: ObjectMapping): Promise<ObjectHandle | undefined> {
    const subject: DiagnosticSubject = { entityKind: 'object', identifier: mapping.resourceId };
    if (!mapping.template) {
      this.fail('creation', mapping, createDiagnostic(RuntimeErrorCode.MISSING_TEMPLATE, 'No template specified', subject));
      return undefined;
    }

    const { settings } = this.options;
    const templatePath = settings.templates[mapping.template] ?? `${settings.userObjects}.${mapping.template}`;
    const name = makeUniqueName(mapping.name, this.usedNames, this.options.naming);

    let handle: ObjectHandle;
    try {
      const template = await this.resolve(templatePath);
      const parent = await this.resolve(settings.modelFrame);
      handle = await this.backend.derive(template, parent, name);
    } catch (error) {
      this.fail(
        'creation',
        mapping,
        diagnosticFromError(error, BackendErrorCode.DERIVE_FAILED, subject),
      );
      return undefined;
    }
    this.usedNames.add(name);

    for (const property of mapping.properties) {
      if (property.kind === 'name') {
        continue;
      }
      await this.applyProperty(handle, mapping, property);
    }
    return handle;
  }

  private async applyProperty(handle: ObjectHandle, mapping: ObjectMapping, property: MappedProperty): Promise<void> {
    const subject: DiagnosticSubject = {
      entityKind: 'property',
      identifier: mapping.resourceId,
      property: property.target,
    };

    let value: PropertyValue;
    if (property.kind === 'material-unit') {
      const unit = await this.materialUnitObject(property.objectName, mapping);
      if (!unit) {
        return;
      }
      value = unit;
    } else {
      value = property.kind === 'vector' ? property.values : property.value;
    }

    try {
      await this.backend.setProperty(handle, property.target, value);
      this.logger.debug?.('creation.property.set', { path: handle.path, property: property.target });
    } catch (error) {
      this.fail('property', mapping, diagnosticFromError(error, BackendErrorCode.PROPERTY_SET_FAILED, subject));
    }
  }

  /**
   * Material units are created once per object name and shared by every
   * source that produces the same part.
   */
  private async materialUnitObject(objectName: string, mapping: ObjectMapping): Promise<ObjectHandle | undefined> {
    const existing = this.unitObjects.get(objectName);
    if (existing) {
      return existing;
    }
    const { materialUnits, settings } = this.options;
    try {
      const template = await this.resolve(materialUnits.templatePath);
      const parent = await this.resolve(settings.userObjects);
      const unit = await this.backend.derive(template, parent, objectName);
      this.unitObjects.set(objectName, unit);
      this.stats.materialUnitsCreated += 1;
      this.logger.info?.('creation.material_unit.created', { name: objectName, path: unit.path });
      return unit;
    } catch (error) {
      this.fail(
        'property',
        mapping,
        createDiagnostic(
          RuntimeErrorCode.MATERIAL_UNIT_FAILED,
          `Failed to create material unit '${objectName}': ${describeError(error)}`,
          { entityKind: 'property', identifier: mapping.resourceId, property: objectName },
        ),
      );
      return undefined;
    }
  }

  private async createConnection(connection: Connection): Promise<boolean> {
    const from = this.created.get(connection.fromResourceId);
    const to = this.created.get(connection.toResourceId);
    if (!from || !to) {
      const missing = from ? connection.toResourceId : connection.fromResourceId;
      this.stats.warnings += 1;
      this.logger.warn?.('creation.connection.skipped', {
        code: WarningCode.CONNECTION_ENDPOINT_MISSING,
        connectionId: connection.identifier,
        missing,
      });
      return false;
    }

    try {
      const connector = await this.resolve(this.options.settings.connector);
      await this.backend.connect(connector, from, to);
      return true;
    } catch (error) {
      this.fail(
        'connection',
        undefined,
        diagnosticFromError(error, BackendErrorCode.CONNECT_FAILED, {
          entityKind: 'connection',
          identifier: connection.identifier,
        }),
      );
      return false;
    }
  }

  private async resolve(path: string): Promise<ObjectHandle> {
    const cached = this.resolved.get(path);
    if (cached) {
      return cached;
    }
    const handle = await this.backend.resolveTemplate(path);
    this.resolved.set(path, handle);
    return handle;
  }

  /**
   * Records an incident on the mapping and in the statistics, then lets the
   * category's policy decide whether to continue.
   */
  private fail(category: ErrorPolicyCategory, mapping: ObjectMapping | undefined, incident: Diagnostic): void {
    this.stats.errors += 1;
    if (mapping) {
      mapping.errors.push(incident);
      const recorded = this.incidents.get(mapping.resourceId) ?? [];
      recorded.push(incident);
      this.incidents.set(mapping.resourceId, recorded);
    }
    enforceErrorPolicy(this.options.errorHandling, category, incident, this.logger);
  }
}
