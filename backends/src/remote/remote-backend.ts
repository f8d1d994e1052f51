import {
  BackendErrorCode,
  childPath,
  createBackendError,
  describeError,
  handleForPath,
  isBackendError,
  noopLogger,
  type BackendAdapter,
  type Logger,
  type ObjectHandle,
  type PropertyValue,
} from '@layoutsmith/core';
import type { CommandChannel, ExecuteOptions } from './channel.js';
import { commandText } from './command-text.js';

export interface RemoteBackendOptions {
  channel: CommandChannel;
  logger?: Partial<Logger>;
}

/**
 * Drives a running engine by sending one script command per call.
 */
export function createRemoteBackend(options: RemoteBackendOptions): BackendAdapter {
  const { channel } = options;
  const logger = options.logger ?? noopLogger;

  async function send(command: string, executeOptions: ExecuteOptions): Promise<string> {
    logger.debug?.('backend.remote.send', { command, idempotent: executeOptions.idempotent ?? false });
    try {
      return await channel.execute(command, executeOptions);
    } catch (error) {
      if (isBackendError(error)) {
        throw error;
      }
      throw createBackendError(BackendErrorCode.TRANSPORT_FAILED, `Command channel failed: ${describeError(error)}`, {
        cause: error,
        details: { command },
      });
    }
  }

  /**
   * A refused command becomes the operation's own code; transport failures
   * and timeouts keep theirs.
   */
  async function run(
    command: string,
    rejectedCode: string,
    subject: string,
    executeOptions: ExecuteOptions = {},
  ): Promise<string> {
    try {
      return await send(command, executeOptions);
    } catch (error) {
      if (isBackendError(error) && error.code === BackendErrorCode.COMMAND_REJECTED) {
        throw createBackendError(rejectedCode, `${subject}: ${error.message}`, {
          cause: error,
          details: { command },
        });
      }
      throw error;
    }
  }

  return {
    kind: 'live',

    async resolveTemplate(path: string): Promise<ObjectHandle> {
      const reply = await send(commandText.exists(path), { idempotent: true });
      if (reply.trim().toLowerCase() !== 'true') {
        throw createBackendError(BackendErrorCode.TEMPLATE_NOT_FOUND, `Object ${path} does not exist`, {
          details: { path, reply },
        });
      }
      return handleForPath(path);
    },

    async derive(template: ObjectHandle, parent: ObjectHandle, name: string): Promise<ObjectHandle> {
      await run(
        commandText.derive(template, parent, name),
        BackendErrorCode.DERIVE_FAILED,
        `Cannot derive ${name} from ${template.path}`,
      );
      return { path: childPath(parent, name), name };
    },

    async setProperty(handle: ObjectHandle, path: string, value: PropertyValue): Promise<void> {
      await run(
        commandText.setProperty(handle, path, value),
        BackendErrorCode.PROPERTY_SET_FAILED,
        `Cannot set ${handle.path}.${path}`,
        { idempotent: true },
      );
    },

    async connect(connector: ObjectHandle, from: ObjectHandle, to: ObjectHandle): Promise<void> {
      await run(
        commandText.connect(connector, from, to),
        BackendErrorCode.CONNECT_FAILED,
        `Cannot connect ${from.path} to ${to.path}`,
      );
    },
  };
}
