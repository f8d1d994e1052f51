import {
  BackendErrorCode,
  childPath,
  createBackendError,
  handleForPath,
  type BackendAdapter,
  type ObjectHandle,
  type PropertyValue,
} from '@layoutsmith/core';

export type RecordedCall =
  | { method: 'resolveTemplate'; path: string }
  | { method: 'derive'; template: string; parent: string; name: string }
  | { method: 'setProperty'; target: string; path: string; value: PropertyValue }
  | { method: 'connect'; connector: string; from: string; to: string };

export interface RecordingFaults {
  /** Template paths whose lookup is refused. */
  templates?: readonly string[];
  /** Attribute paths (`ProcTime`) or object-qualified paths (`Mill.ProcTime`) that are refused. */
  properties?: readonly string[];
  /** `[fromName, toName]` pairs whose connection is refused. */
  connections?: ReadonlyArray<readonly [string, string]>;
}

export interface RecordingBackendOptions {
  faults?: RecordingFaults;
}

export interface RecordingBackend extends BackendAdapter {
  /** Every call in the order it was made, refused calls included. */
  readonly calls: RecordedCall[];
  reset(): void;
}

/**
 * Backend for dry runs and tests. Nothing is created anywhere; handles are
 * derived from the requested paths, so two runs over the same input record
 * identical calls.
 */
export function createRecordingBackend(options: RecordingBackendOptions = {}): RecordingBackend {
  const faults = options.faults ?? {};
  const calls: RecordedCall[] = [];

  const refusesProperty = (handle: ObjectHandle, path: string): boolean =>
    faults.properties?.some((fault) => fault === path || fault === `${handle.name}.${path}`) ?? false;

  const refusesConnection = (from: ObjectHandle, to: ObjectHandle): boolean =>
    faults.connections?.some(([faultFrom, faultTo]) => faultFrom === from.name && faultTo === to.name) ?? false;

  return {
    kind: 'mock',
    calls,

    reset() {
      calls.length = 0;
    },

    async resolveTemplate(path) {
      calls.push({ method: 'resolveTemplate', path });
      if (faults.templates?.includes(path)) {
        throw createBackendError(BackendErrorCode.TEMPLATE_NOT_FOUND, `Object ${path} does not exist`, {
          details: { path },
        });
      }
      return handleForPath(path);
    },

    async derive(template, parent, name) {
      calls.push({ method: 'derive', template: template.path, parent: parent.path, name });
      return { path: childPath(parent, name), name };
    },

    async setProperty(handle, path, value) {
      calls.push({ method: 'setProperty', target: handle.path, path, value });
      if (refusesProperty(handle, path)) {
        throw createBackendError(BackendErrorCode.PROPERTY_SET_FAILED, `Cannot set ${handle.path}.${path}`, {
          details: { path },
        });
      }
    },

    async connect(connector, from, to) {
      calls.push({ method: 'connect', connector: connector.path, from: from.path, to: to.path });
      if (refusesConnection(from, to)) {
        throw createBackendError(
          BackendErrorCode.CONNECT_FAILED,
          `Cannot connect ${from.path} to ${to.path}`,
        );
      }
    },
  };
}
