import {
  BackendErrorCode,
  createBackendError,
  describeError,
  isBackendError,
  isObjectHandle,
  noopLogger,
  type BackendAdapter,
  type Logger,
  type ObjectHandle,
  type PropertyValue,
} from '@layoutsmith/core';
import type { AttributeValue, ModelObject, ObjectModel } from './object-model.js';

export interface InProcessBackendOptions {
  model: ObjectModel;
  logger?: Partial<Logger>;
}

/**
 * Drives an object model that lives in the same process. Handles are looked
 * up again on every call, so a handle whose object has gone away fails with
 * B014 instead of touching a stale reference.
 */
export function createInProcessBackend(options: InProcessBackendOptions): BackendAdapter {
  const { model } = options;
  const logger = options.logger ?? noopLogger;

  async function lookup(handle: ObjectHandle): Promise<ModelObject> {
    const object = await model.findObject(handle.path);
    if (!object) {
      throw createBackendError(BackendErrorCode.UNKNOWN_HANDLE, `No object at ${handle.path}`, {
        details: { path: handle.path },
      });
    }
    return object;
  }

  async function attributeValue(value: PropertyValue): Promise<AttributeValue> {
    return isObjectHandle(value) ? lookup(value) : value;
  }

  /** Model exceptions carry no code; they take the operation's code here. */
  async function guard<T>(code: string, subject: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (isBackendError(error)) {
        throw error;
      }
      logger.debug?.('backend.in_process.failed', { code, subject, error: describeError(error) });
      throw createBackendError(code, `${subject}: ${describeError(error)}`, { cause: error });
    }
  }

  return {
    kind: 'in-process',

    async resolveTemplate(path) {
      const object = await guard(BackendErrorCode.TEMPLATE_NOT_FOUND, `Cannot look up ${path}`, async () =>
        model.findObject(path),
      );
      if (!object) {
        throw createBackendError(BackendErrorCode.TEMPLATE_NOT_FOUND, `Object ${path} does not exist`, {
          details: { path },
        });
      }
      return { path: object.path, name: object.name };
    },

    async derive(template, parent, name) {
      return guard(BackendErrorCode.DERIVE_FAILED, `Cannot derive ${name} from ${template.path}`, async () => {
        const created = await model.derive(await lookup(template), await lookup(parent), name);
        return { path: created.path, name: created.name };
      });
    },

    async setProperty(handle, path, value) {
      await guard(BackendErrorCode.PROPERTY_SET_FAILED, `Cannot set ${handle.path}.${path}`, async () => {
        await model.setAttribute(await lookup(handle), path, await attributeValue(value));
      });
    },

    async connect(connector, from, to) {
      await guard(BackendErrorCode.CONNECT_FAILED, `Cannot connect ${from.path} to ${to.path}`, async () => {
        await model.connect(await lookup(connector), await lookup(from), await lookup(to));
      });
    },
  };
}
