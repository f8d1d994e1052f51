/**
 * Object model binding used by the in-process backend. A binding exposes the
 * engine's native object graph: lookup by path, derivation from a template,
 * attribute assignment and connector calls. Methods may answer synchronously
 * or with a promise; failures are thrown as ordinary errors.
 */

export interface ModelObject {
  readonly path: string;
  readonly name: string;
}

export type AttributeValue = string | number | boolean | readonly number[] | ModelObject;

type MaybePromise<T> = T | Promise<T>;

export interface ObjectModel {
  findObject(path: string): MaybePromise<ModelObject | undefined>;
  derive(template: ModelObject, parent: ModelObject, name: string): MaybePromise<ModelObject>;
  setAttribute(target: ModelObject, attribute: string, value: AttributeValue): MaybePromise<void>;
  connect(connector: ModelObject, from: ModelObject, to: ModelObject): MaybePromise<void>;
}

export interface InMemoryObject extends ModelObject {
  /** Path of the template this object was derived from; absent for seeded objects. */
  readonly templatePath?: string;
  /** Dotted attribute paths such as `_3D.Rotation` are kept as flat keys. */
  readonly attributes: Map<string, AttributeValue>;
}

export interface ModelConnection {
  readonly connector: string;
  readonly from: string;
  readonly to: string;
}

/** The in-memory model answers synchronously. */
export interface InMemoryObjectModel extends ObjectModel {
  findObject(path: string): InMemoryObject | undefined;
  derive(template: ModelObject, parent: ModelObject, name: string): InMemoryObject;
  setAttribute(target: ModelObject, attribute: string, value: AttributeValue): void;
  connect(connector: ModelObject, from: ModelObject, to: ModelObject): void;
  getObject(path: string): InMemoryObject | undefined;
  /** Paths of the objects created directly inside `path`, in creation order. */
  children(path: string): string[];
  connections(): readonly ModelConnection[];
}

/** Frames and templates present in a fresh model. */
export const DEFAULT_MODEL_PATHS: readonly string[] = [
  '.Models.Model',
  '.UserObjects',
  '.MUs.Entity',
  '.MaterialFlow.Connector',
  '.MaterialFlow.Source',
  '.MaterialFlow.Drain',
  '.MaterialFlow.SingleProc',
  '.MaterialFlow.ParallelProc',
  '.MaterialFlow.Buffer',
  '.MaterialFlow.Line',
];

/**
 * A self-contained model seeded with the given paths. It enforces what an
 * engine would: derivation needs an existing template and parent, names are
 * unique within their parent, and connections join existing objects.
 */
export function createInMemoryObjectModel(paths: Iterable<string> = DEFAULT_MODEL_PATHS): InMemoryObjectModel {
  const objects = new Map<string, InMemoryObject>();
  const childrenByParent = new Map<string, string[]>();
  const links: ModelConnection[] = [];

  function add(path: string, templatePath?: string): InMemoryObject {
    const name = path.slice(path.lastIndexOf('.') + 1);
    const object: InMemoryObject = { path, name, templatePath, attributes: new Map() };
    objects.set(path, object);
    return object;
  }

  function existing(path: string): InMemoryObject {
    const object = objects.get(path);
    if (!object) {
      throw new Error(`No object at ${path}`);
    }
    return object;
  }

  for (const path of paths) {
    add(path);
  }

  return {
    findObject(path) {
      return objects.get(path);
    },

    derive(template, parent, name) {
      existing(template.path);
      existing(parent.path);
      if (!name) {
        throw new Error('Object name must not be empty');
      }
      const path = `${parent.path}.${name}`;
      if (objects.has(path)) {
        throw new Error(`An object named ${name} already exists in ${parent.path}`);
      }
      const created = add(path, template.path);
      const siblings = childrenByParent.get(parent.path) ?? [];
      siblings.push(path);
      childrenByParent.set(parent.path, siblings);
      return created;
    },

    setAttribute(target, attribute, value) {
      if (!attribute) {
        throw new Error(`Empty attribute name on ${target.path}`);
      }
      existing(target.path).attributes.set(attribute, value);
    },

    connect(connector, from, to) {
      existing(connector.path);
      existing(from.path);
      existing(to.path);
      links.push({ connector: connector.path, from: from.path, to: to.path });
    },

    getObject(path) {
      return objects.get(path);
    },

    children(path) {
      return [...(childrenByParent.get(path) ?? [])];
    },

    connections() {
      return [...links];
    },
  };
}
