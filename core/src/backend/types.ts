/**
 * Capability contract between the creation orchestrator and a simulation
 * engine. Implementations live in @layoutsmith/backends.
 */

/** A reference to an engine object by its dotted path, e.g. `.Models.Model.Mill_1`. */
export interface ObjectHandle {
  readonly path: string;
  readonly name: string;
}

export type PropertyValue = string | number | boolean | readonly number[] | ObjectHandle;

export type BackendKind = 'live' | 'in-process' | 'mock';

/**
 * Every method rejects with a LayoutsmithError carrying a B-code when the
 * engine refuses or cannot be reached.
 */
export interface BackendAdapter {
  readonly kind: BackendKind;
  /** Looks up an existing object (template, frame, connector) by path. */
  resolveTemplate(path: string): Promise<ObjectHandle>;
  /** Creates `name` inside `parent` as a derivative of `template`. */
  derive(template: ObjectHandle, parent: ObjectHandle, name: string): Promise<ObjectHandle>;
  /** `path` may be dotted for nested attributes such as `_3D.Rotation`. */
  setProperty(handle: ObjectHandle, path: string, value: PropertyValue): Promise<void>;
  connect(connector: ObjectHandle, from: ObjectHandle, to: ObjectHandle): Promise<void>;
}

export function isObjectHandle(value: unknown): value is ObjectHandle {
  return (
    typeof value === 'object' &&
    value !== null &&
    'path' in value &&
    'name' in value &&
    typeof value.path === 'string' &&
    typeof value.name === 'string'
  );
}

/**
 * Builds a handle from a dotted path; the name is the last segment.
 */
export function handleForPath(path: string): ObjectHandle {
  const name = path.slice(path.lastIndexOf('.') + 1);
  return { path, name };
}

export function childPath(parent: ObjectHandle, name: string): string {
  return `${parent.path}.${name}`;
}
