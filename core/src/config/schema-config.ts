import { resolve } from 'node:path';
import { RuntimeErrorCode, createRuntimeError } from '../errors/index.js';
import {
  DEFAULT_CONFIG_DIR,
  createConfigValidator,
  parseConfigText,
  readConfigFile,
} from './config-file.js';

/**
 * Where each semantic field lives inside the source markup. Every path is an
 * element path (see parsing/path-query.ts) relative to the element of its
 * section.
 */
export interface SchemaConfig {
  readonly name: string;
  readonly header: HeaderSchema;
  readonly resources: ResourceSchema;
  readonly layoutObjects?: LayoutObjectSchema;
  readonly layout?: LayoutSchema;
  readonly partTypes?: PartTypeSchema;
}

export interface HeaderSchema {
  /** Locates the header section from the document root. */
  readonly path: string;
  readonly fields: {
    readonly documentIdentifier?: string;
    readonly description?: string;
    readonly version?: string;
    readonly creationTime?: string;
    readonly timeUnit?: string;
    readonly lengthUnit?: string;
    readonly weightUnit?: string;
  };
}

export interface ResourceSchema {
  readonly path: string;
  readonly fields: {
    readonly identifier: string;
    readonly resourceType?: string;
    readonly name?: string;
    readonly description?: string;
    readonly currentStatus?: string;
    readonly resourceClassIdentifier?: string;
  };
  readonly properties?: {
    readonly path: string;
    readonly fields: { readonly name: string; readonly value: string; readonly unit?: string };
  };
  readonly connections?: {
    readonly path: string;
    readonly fields: {
      readonly identifier?: string;
      /** Defaults to the owning resource's identifier when absent. */
      readonly fromResourceId?: string;
      readonly toResourceId: string;
      readonly description?: string;
    };
  };
}

export interface BoundarySchema {
  readonly width: string;
  readonly depth: string;
  readonly height?: string;
  readonly unit?: string;
}

export interface LayoutObjectSchema {
  readonly path: string;
  readonly fields: { readonly identifier: string; readonly associatedResourceId: string };
  readonly boundary?: BoundarySchema;
}

export interface PlacementSchema {
  readonly path: string;
  readonly fields: {
    readonly layoutElementId: string;
    readonly positionX: string;
    readonly positionY: string;
    readonly positionZ?: string;
    readonly rotationAngle?: string;
    readonly rotationAxisX?: string;
    readonly rotationAxisY?: string;
    readonly rotationAxisZ?: string;
  };
}

export interface LayoutSchema {
  readonly path: string;
  readonly fields: { readonly identifier?: string; readonly description?: string };
  readonly boundary?: BoundarySchema;
  readonly placements?: PlacementSchema;
}

export interface PartTypeSchema {
  readonly path: string;
  readonly fields: {
    readonly identifier: string;
    readonly name?: string;
    readonly description?: string;
    readonly weight?: string;
    readonly width?: string;
    readonly depth?: string;
    readonly height?: string;
  };
}

export const DEFAULT_SCHEMA_CONFIG_PATH = resolve(DEFAULT_CONFIG_DIR, 'cmsd-schema.yaml');
export const DEFAULT_SCHEMA_NAME = 'cmsd_v1';

// Raw file shapes (snake_case, as written in YAML). Field maps are checked
// for their required keys by the JSON schema; optional keys are read below.
type RawFields = Record<string, string>;

interface RawSection {
  path: string;
  fields: RawFields;
}

interface RawBoundary {
  width: string;
  depth: string;
  height?: string;
  unit?: string;
}

interface RawSchema {
  header: RawSection;
  resources: RawSection & { properties?: RawSection; connections?: RawSection };
  layout_objects?: RawSection & { boundary?: RawBoundary };
  layout?: RawSection & { boundary?: RawBoundary; placements?: RawSection };
  part_types?: RawSection;
}

interface RawSchemaFile {
  schemas: Record<string, RawSchema>;
}

const schemaFileValidator = createConfigValidator<RawSchemaFile>('schema-config.schema.json');

export async function loadSchemaConfig(
  filePath: string = DEFAULT_SCHEMA_CONFIG_PATH,
  schemaName: string = DEFAULT_SCHEMA_NAME,
): Promise<SchemaConfig> {
  const text = await readConfigFile(filePath);
  return parseSchemaConfig(text, schemaName, filePath);
}

/**
 * Parses a schema configuration file and selects one named schema.
 */
export function parseSchemaConfig(
  text: string,
  schemaName: string = DEFAULT_SCHEMA_NAME,
  source = '<inline>',
): SchemaConfig {
  const file = parseConfigText(text, schemaFileValidator, source);
  const raw = file.schemas[schemaName];
  if (!raw) {
    throw createRuntimeError(
      RuntimeErrorCode.INVALID_CONFIGURATION,
      `Schema "${schemaName}" is not defined in ${source}. Available: ${Object.keys(file.schemas).join(', ')}`,
    );
  }
  return normalizeSchema(schemaName, raw);
}

function normalizeSchema(name: string, raw: RawSchema): SchemaConfig {
  const header = raw.header.fields;
  const resourceFields = raw.resources.fields;

  return {
    name,
    header: {
      path: raw.header.path,
      fields: {
        documentIdentifier: header.document_identifier,
        description: header.description,
        version: header.version,
        creationTime: header.creation_time,
        timeUnit: header.time_unit,
        lengthUnit: header.length_unit,
        weightUnit: header.weight_unit,
      },
    },
    resources: {
      path: raw.resources.path,
      fields: {
        identifier: required(resourceFields, 'identifier'),
        resourceType: resourceFields.resource_type,
        name: resourceFields.name,
        description: resourceFields.description,
        currentStatus: resourceFields.current_status,
        resourceClassIdentifier: resourceFields.resource_class_identifier,
      },
      properties: raw.resources.properties && {
        path: raw.resources.properties.path,
        fields: {
          name: required(raw.resources.properties.fields, 'name'),
          value: required(raw.resources.properties.fields, 'value'),
          unit: raw.resources.properties.fields.unit,
        },
      },
      connections: raw.resources.connections && {
        path: raw.resources.connections.path,
        fields: {
          identifier: raw.resources.connections.fields.identifier,
          fromResourceId: raw.resources.connections.fields.from_resource_id,
          toResourceId: required(raw.resources.connections.fields, 'to_resource_id'),
          description: raw.resources.connections.fields.description,
        },
      },
    },
    layoutObjects: raw.layout_objects && {
      path: raw.layout_objects.path,
      fields: {
        identifier: required(raw.layout_objects.fields, 'identifier'),
        associatedResourceId: required(raw.layout_objects.fields, 'associated_resource_id'),
      },
      boundary: raw.layout_objects.boundary,
    },
    layout: raw.layout && {
      path: raw.layout.path,
      fields: {
        identifier: raw.layout.fields.identifier,
        description: raw.layout.fields.description,
      },
      boundary: raw.layout.boundary,
      placements: raw.layout.placements && normalizePlacements(raw.layout.placements),
    },
    partTypes: raw.part_types && {
      path: raw.part_types.path,
      fields: {
        identifier: required(raw.part_types.fields, 'identifier'),
        name: raw.part_types.fields.name,
        description: raw.part_types.fields.description,
        weight: raw.part_types.fields.weight,
        width: raw.part_types.fields.width,
        depth: raw.part_types.fields.depth,
        height: raw.part_types.fields.height,
      },
    },
  };
}

function normalizePlacements(raw: RawSection): PlacementSchema {
  const fields = raw.fields;
  return {
    path: raw.path,
    fields: {
      layoutElementId: required(fields, 'layout_element_id'),
      positionX: required(fields, 'position_x'),
      positionY: required(fields, 'position_y'),
      positionZ: fields.position_z,
      rotationAngle: fields.rotation_angle,
      rotationAxisX: fields.rotation_axis_x,
      rotationAxisY: fields.rotation_axis_y,
      rotationAxisZ: fields.rotation_axis_z,
    },
  };
}

function required(fields: RawFields, key: string): string {
  const value = fields[key];
  if (value === undefined) {
    throw createRuntimeError(RuntimeErrorCode.INVALID_CONFIGURATION, `Schema field "${key}" is required`);
  }
  return value;
}
