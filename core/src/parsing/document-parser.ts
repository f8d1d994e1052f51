import { readFile } from 'node:fs/promises';
import type { BoundarySchema, PlacementSchema, SchemaConfig } from '../config/schema-config.js';
import {
  ParserErrorCode,
  WarningCode,
  createDiagnostic,
  createParserError,
  describeError,
  type Diagnostic,
  type DiagnosticSubject,
  type EntityKind,
} from '../errors/index.js';
import {
  createLayoutDocument,
  createProperty,
  createResource,
  parseNumber,
  type Boundary,
  type Connection,
  type DocumentHeader,
  type Layout,
  type LayoutDocument,
  type LayoutObject,
  type PartType,
  type Placement,
  type Property,
  type Resource,
  type Rotation,
} from '../ir/index.js';
import { noopLogger, type Logger } from '../logger.js';
import { findAll, findFirst, findText } from './path-query.js';
import { parseXmlDocument, type XmlElement } from './xml-tree.js';

export interface ParseOptions {
  logger?: Partial<Logger>;
}

const DEFAULT_LAYOUT_IDENTIFIER = 'main_layout';

/**
 * Parses a layout document into the intermediate representation.
 *
 * Entities lacking their identifier are skipped with a warning diagnostic;
 * missing optional fields become empty strings or undefined. A repeated
 * identifier is reported as W015 and the later entity wins.
 *
 * @throws LayoutsmithError P001 for malformed markup, P002 when the header
 *   section cannot be located
 */
export function parseLayoutDocument(
  xml: string,
  schema: SchemaConfig,
  options: ParseOptions = {},
): LayoutDocument {
  const root = parseXmlDocument(xml);
  const parser = new DocumentParser(schema, options.logger ?? noopLogger);
  return parser.parse(root);
}

export async function parseLayoutFile(
  filePath: string,
  schema: SchemaConfig,
  options: ParseOptions = {},
): Promise<LayoutDocument> {
  let xml: string;
  try {
    xml = await readFile(filePath, 'utf8');
  } catch (error) {
    throw createParserError(
      ParserErrorCode.FILE_LOAD_FAILED,
      `Unable to read layout document ${filePath}: ${describeError(error)}`,
      { cause: error },
    );
  }
  return parseLayoutDocument(xml, schema, options);
}

class DocumentParser {
  private readonly diagnostics: Diagnostic[] = [];

  constructor(
    private readonly schema: SchemaConfig,
    private readonly logger: Partial<Logger>,
  ) {}

  parse(root: XmlElement): LayoutDocument {
    const header = this.parseHeader(root);
    const resourceElements = findAll(root, this.schema.resources.path);
    const resources = this.parseResources(resourceElements);
    const connections = this.parseConnections(resourceElements);
    const layoutObjects = this.parseLayoutObjects(root);
    const layout = this.parseLayout(root);
    const partTypes = this.parsePartTypes(root);

    this.logger.debug?.('parser.document.parsed', {
      documentId: header.identifier,
      resources: resources.length,
      connections: connections.length,
      layoutObjects: layoutObjects.length,
      placements: layout?.placements.size ?? 0,
      partTypes: partTypes.length,
    });

    return createLayoutDocument({
      header,
      resources,
      connections,
      layoutObjects,
      layout,
      partTypes,
      diagnostics: this.diagnostics,
    });
  }

  private parseHeader(root: XmlElement): DocumentHeader {
    const { path, fields } = this.schema.header;
    const section = findFirst(root, path);
    if (!section) {
      throw createParserError(
        ParserErrorCode.MISSING_HEADER,
        `Document header not found at "${path}" (schema "${this.schema.name}")`,
        { subject: { entityKind: 'document' } },
      );
    }
    const text = (fieldPath: string | undefined) => (fieldPath ? findText(section, fieldPath) : '');

    return {
      identifier: text(fields.documentIdentifier),
      description: text(fields.description),
      version: text(fields.version),
      creationTime: text(fields.creationTime),
      units: {
        time: text(fields.timeUnit) || 'second',
        length: text(fields.lengthUnit) || 'meter',
        weight: text(fields.weightUnit) || 'kilogram',
      },
    };
  }

  private parseResources(elements: XmlElement[]): Resource[] {
    const { fields } = this.schema.resources;
    const resources: Resource[] = [];
    const seen = new Set<string>();

    for (const element of elements) {
      const identifier = findText(element, fields.identifier);
      if (!identifier) {
        this.warn(WarningCode.RESOURCE_WITHOUT_IDENTIFIER, 'Skipping resource with no identifier', {
          entityKind: 'resource',
        });
        continue;
      }
      this.checkDuplicate(seen, identifier, 'resource', 'resource');
      const text = (fieldPath: string | undefined) => (fieldPath ? findText(element, fieldPath) : '');

      resources.push(
        createResource({
          identifier,
          resourceType: text(fields.resourceType),
          name: text(fields.name),
          description: text(fields.description),
          currentStatus: text(fields.currentStatus),
          resourceClassIdentifier: text(fields.resourceClassIdentifier),
          properties: this.parseProperties(element),
        }),
      );
    }
    return resources;
  }

  private parseProperties(resourceElement: XmlElement): Property[] {
    const config = this.schema.resources.properties;
    if (!config) {
      return [];
    }
    const properties: Property[] = [];
    for (const element of findAll(resourceElement, config.path)) {
      const name = findText(element, config.fields.name);
      const value = findText(element, config.fields.value);
      if (!name || !value) {
        continue;
      }
      const unit = config.fields.unit ? findText(element, config.fields.unit) : '';
      properties.push(createProperty({ name, value, unit }));
    }
    return properties;
  }

  /**
   * Connections are nested in their source resource. Order follows the
   * document and duplicates are kept.
   */
  private parseConnections(resourceElements: XmlElement[]): Connection[] {
    const config = this.schema.resources.connections;
    if (!config) {
      return [];
    }
    const connections: Connection[] = [];

    for (const resourceElement of resourceElements) {
      const ownerId = findText(resourceElement, this.schema.resources.fields.identifier);
      if (!ownerId) {
        continue;
      }
      for (const element of findAll(resourceElement, config.path)) {
        const fromResourceId = (config.fields.fromResourceId && findText(element, config.fields.fromResourceId)) || ownerId;
        const toResourceId = findText(element, config.fields.toResourceId);
        if (!toResourceId) {
          this.warn(
            WarningCode.CONNECTION_WITHOUT_TARGET,
            `Skipping connection of resource '${fromResourceId}' with no target resource`,
            { entityKind: 'connection', referenceId: fromResourceId },
          );
          continue;
        }
        const identifier = config.fields.identifier ? findText(element, config.fields.identifier) : '';
        connections.push({
          identifier: identifier || `conn_${fromResourceId}_to_${toResourceId}`,
          fromResourceId,
          toResourceId,
          description: config.fields.description ? findText(element, config.fields.description) : '',
        });
      }
    }
    return connections;
  }

  private parseLayoutObjects(root: XmlElement): LayoutObject[] {
    const config = this.schema.layoutObjects;
    if (!config) {
      return [];
    }
    const layoutObjects: LayoutObject[] = [];
    const seen = new Set<string>();
    for (const element of findAll(root, config.path)) {
      const identifier = findText(element, config.fields.identifier);
      const associatedResourceId = findText(element, config.fields.associatedResourceId);
      if (!identifier || !associatedResourceId) {
        this.warn(
          WarningCode.LAYOUT_OBJECT_INCOMPLETE,
          'Skipping layout object with missing identifier or resource reference',
          { entityKind: 'layoutObject', identifier: identifier || undefined },
        );
        continue;
      }
      this.checkDuplicate(seen, identifier, 'layoutObject', 'layout object');
      layoutObjects.push({
        identifier,
        associatedResourceId,
        boundary: parseBoundary(element, config.boundary),
      });
    }
    return layoutObjects;
  }

  private parseLayout(root: XmlElement): Layout | undefined {
    const config = this.schema.layout;
    if (!config) {
      return undefined;
    }
    const element = findFirst(root, config.path);
    if (!element) {
      return undefined;
    }
    const identifier = config.fields.identifier ? findText(element, config.fields.identifier) : '';
    return {
      identifier: identifier || DEFAULT_LAYOUT_IDENTIFIER,
      description: config.fields.description ? findText(element, config.fields.description) : '',
      boundary: parseBoundary(element, config.boundary),
      placements: config.placements ? this.parsePlacements(element, config.placements) : new Map(),
    };
  }

  private parsePlacements(layoutElement: XmlElement, config: PlacementSchema): Map<string, Placement> {
    const { fields } = config;
    const placements = new Map<string, Placement>();

    for (const element of findAll(layoutElement, config.path)) {
      const layoutElementId = findText(element, fields.layoutElementId);
      if (!layoutElementId) {
        this.warn(WarningCode.PLACEMENT_WITHOUT_POSITION, 'Skipping placement with no layout element identifier', {
          entityKind: 'placement',
        });
        continue;
      }

      const number = (fieldPath: string | undefined) => (fieldPath ? parseNumber(findText(element, fieldPath)) : undefined);
      const x = number(fields.positionX);
      const y = number(fields.positionY);
      if (x === undefined || y === undefined) {
        this.warn(
          WarningCode.PLACEMENT_WITHOUT_POSITION,
          `Skipping placement ${layoutElementId} with invalid position`,
          { entityKind: 'placement', identifier: layoutElementId },
        );
        continue;
      }

      if (placements.has(layoutElementId)) {
        this.warn(
          WarningCode.DUPLICATE_IDENTIFIER,
          `Duplicate placement for layout element '${layoutElementId}'; the later definition replaces the earlier one`,
          { entityKind: 'placement', identifier: layoutElementId },
        );
      }

      const angle = number(fields.rotationAngle);
      const rotation: Rotation | undefined =
        angle === undefined
          ? undefined
          : {
              angle,
              axisX: number(fields.rotationAxisX) ?? 0,
              axisY: number(fields.rotationAxisY) ?? 0,
              axisZ: number(fields.rotationAxisZ) ?? 1,
            };

      placements.set(layoutElementId, {
        layoutElementId,
        position: { x, y, z: number(fields.positionZ) ?? 0 },
        rotation,
      });
    }
    return placements;
  }

  private parsePartTypes(root: XmlElement): PartType[] {
    const config = this.schema.partTypes;
    if (!config) {
      return [];
    }
    const { fields } = config;
    const partTypes: PartType[] = [];
    const seen = new Set<string>();

    for (const element of findAll(root, config.path)) {
      const text = (fieldPath: string | undefined) => (fieldPath ? findText(element, fieldPath) : '');
      const identifier = text(fields.identifier);
      if (!identifier) {
        this.warn(WarningCode.PART_TYPE_WITHOUT_IDENTIFIER, 'Skipping part type with no identifier', {
          entityKind: 'partType',
        });
        continue;
      }
      this.checkDuplicate(seen, identifier, 'partType', 'part type');
      const width = parseNumber(text(fields.width));
      const depth = parseNumber(text(fields.depth));
      partTypes.push({
        identifier,
        name: text(fields.name) || identifier,
        description: text(fields.description),
        weight: parseNumber(text(fields.weight)),
        dimensions:
          width !== undefined && depth !== undefined
            ? { width, depth, height: parseNumber(text(fields.height)) ?? 1, unit: 'meter' }
            : undefined,
      });
    }
    return partTypes;
  }

  /** Later definitions replace earlier ones with the same identifier. */
  private checkDuplicate(seen: Set<string>, identifier: string, entityKind: EntityKind, label: string): void {
    if (seen.has(identifier)) {
      this.warn(
        WarningCode.DUPLICATE_IDENTIFIER,
        `Duplicate ${label} identifier '${identifier}'; the later definition replaces the earlier one`,
        { entityKind, identifier },
      );
    }
    seen.add(identifier);
  }

  private warn(code: string, message: string, subject: DiagnosticSubject): void {
    this.diagnostics.push(createDiagnostic(code, message, subject));
    this.logger.warn?.(message, { code, ...subject });
  }
}

/**
 * A boundary needs both width and depth; otherwise there is none.
 */
function parseBoundary(element: XmlElement, config: BoundarySchema | undefined): Boundary | undefined {
  if (!config) {
    return undefined;
  }
  const width = parseNumber(findText(element, config.width));
  const depth = parseNumber(findText(element, config.depth));
  if (width === undefined || depth === undefined) {
    return undefined;
  }
  const height = config.height ? parseNumber(findText(element, config.height)) : undefined;
  const unit = config.unit ? findText(element, config.unit) : '';
  return { width, depth, height: height ?? 1, unit: unit || 'meter' };
}
