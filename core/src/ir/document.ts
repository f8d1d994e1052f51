import type { Diagnostic } from '../errors/index.js';
import type {
  Connection,
  DocumentHeader,
  Layout,
  LayoutDocument,
  LayoutObject,
  PartType,
  Property,
  Resource,
} from './types.js';

export interface ResourceInit {
  identifier: string;
  resourceType: string;
  name: string;
  description?: string;
  currentStatus?: string;
  resourceClassIdentifier?: string;
  properties?: Iterable<Property>;
  connections?: readonly string[];
}

/**
 * Builds a resource with its lower-cased property index. Later properties with
 * the same name replace earlier ones, matching document order.
 */
export function createResource(init: ResourceInit): Resource {
  const properties = new Map<string, Property>();
  const index = new Map<string, Property>();
  for (const property of init.properties ?? []) {
    properties.set(property.name, property);
    index.set(property.name.toLowerCase(), property);
  }
  const connections = Object.freeze([...(init.connections ?? [])]);

  const getProperty = (name: string): Property | undefined => index.get(name.toLowerCase());

  return Object.freeze({
    identifier: init.identifier,
    resourceType: init.resourceType,
    name: init.name,
    description: init.description ?? '',
    currentStatus: init.currentStatus || 'idle',
    resourceClassIdentifier: init.resourceClassIdentifier || undefined,
    properties,
    connections,
    getProperty,
    getPropertyValue: (name: string) => getProperty(name)?.value,
  });
}

export interface LayoutDocumentInit {
  header: DocumentHeader;
  resources: Iterable<Resource>;
  connections?: readonly Connection[];
  layoutObjects?: Iterable<LayoutObject>;
  layout?: Layout;
  partTypes?: Iterable<PartType>;
  diagnostics?: readonly Diagnostic[];
}

/**
 * Assembles the document aggregate and derives each resource's outgoing
 * connection list from the connection list.
 */
export function createLayoutDocument(init: LayoutDocumentInit): LayoutDocument {
  const connections = Object.freeze([...(init.connections ?? [])]);

  const outgoing = new Map<string, string[]>();
  for (const connection of connections) {
    const targets = outgoing.get(connection.fromResourceId) ?? [];
    targets.push(connection.toResourceId);
    outgoing.set(connection.fromResourceId, targets);
  }

  const resources = new Map<string, Resource>();
  for (const resource of init.resources) {
    const targets = outgoing.get(resource.identifier);
    resources.set(
      resource.identifier,
      targets
        ? createResource({
            identifier: resource.identifier,
            resourceType: resource.resourceType,
            name: resource.name,
            description: resource.description,
            currentStatus: resource.currentStatus,
            resourceClassIdentifier: resource.resourceClassIdentifier,
            properties: resource.properties.values(),
            connections: [...resource.connections, ...targets],
          })
        : resource,
    );
  }

  const layoutObjects = toIdentifierMap(init.layoutObjects ?? []);
  const partTypes = toIdentifierMap(init.partTypes ?? []);

  const layoutObjectsByResource = new Map<string, LayoutObject>();
  for (const layoutObject of layoutObjects.values()) {
    if (!layoutObjectsByResource.has(layoutObject.associatedResourceId)) {
      layoutObjectsByResource.set(layoutObject.associatedResourceId, layoutObject);
    }
  }

  const layout = init.layout;

  return Object.freeze({
    header: init.header,
    resources,
    connections,
    layoutObjects,
    layout,
    partTypes,
    diagnostics: Object.freeze([...(init.diagnostics ?? [])]),
    getResource: (resourceId: string) => resources.get(resourceId),
    getLayoutObject: (layoutObjectId: string) => layoutObjects.get(layoutObjectId),
    getPlacement: (layoutElementId: string) => layout?.placements.get(layoutElementId),
    getResourceConnections: (resourceId: string) => resources.get(resourceId)?.connections ?? [],
    getLayoutObjectForResource: (resourceId: string) => layoutObjectsByResource.get(resourceId),
  });
}

function toIdentifierMap<T extends { identifier: string }>(entries: Iterable<T>): Map<string, T> {
  const map = new Map<string, T>();
  for (const entry of entries) {
    map.set(entry.identifier, entry);
  }
  return map;
}
