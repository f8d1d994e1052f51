import process from 'node:process';
import {
  BackendErrorCode,
  createBackendError,
  loadEnv,
  type BackendAdapter,
  type BackendKind,
  type Logger,
} from '@layoutsmith/core';
import { createInProcessBackend } from './in-process/in-process-backend.js';
import type { ObjectModel } from './in-process/object-model.js';
import { createRecordingBackend, type RecordingFaults } from './mock/recording-backend.js';
import type { CommandChannel } from './remote/channel.js';
import { createHttpCommandChannel } from './remote/http-channel.js';
import { createRemoteBackend } from './remote/remote-backend.js';

export const BACKEND_MODES: readonly BackendKind[] = ['live', 'in-process', 'mock'];

export interface RemoteBackendSettings {
  url?: string;
  timeoutMs?: number;
  retries?: number;
  sharedSecret?: string;
  fetch?: typeof fetch;
}

export interface CreateBackendOptions {
  /** Falls back to LAYOUTSMITH_BACKEND_MODE, then `mock`. */
  mode?: string;
  remote?: RemoteBackendSettings;
  /** Overrides the HTTP channel in live mode. */
  channel?: CommandChannel;
  /** Required in in-process mode. */
  model?: ObjectModel;
  /** Mock mode only. */
  faults?: RecordingFaults;
  env?: NodeJS.ProcessEnv;
  logger?: Partial<Logger>;
}

function isBackendKind(value: string): value is BackendKind {
  return BACKEND_MODES.some((mode) => mode === value);
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw createBackendError(
      BackendErrorCode.MISSING_BACKEND_OPTION,
      `LAYOUTSMITH_REMOTE_TIMEOUT_MS must be a positive number, got "${raw}"`,
    );
  }
  return value;
}

/**
 * Create the backend for a run. Options win over environment variables.
 *
 * @throws LayoutsmithError B020 for an unknown mode, B021 when the chosen mode
 *   lacks what it needs (an endpoint for `live`, a model for `in-process`)
 */
export function createBackend(options: CreateBackendOptions = {}): BackendAdapter {
  const env = options.env ?? process.env;
  const logger = options.logger;
  const mode = (options.mode ?? env.LAYOUTSMITH_BACKEND_MODE ?? 'mock').trim().toLowerCase();

  if (!isBackendKind(mode)) {
    throw createBackendError(BackendErrorCode.UNKNOWN_BACKEND_MODE, `Unknown backend mode "${mode}"`, {
      suggestion: `Use one of: ${BACKEND_MODES.join(', ')}`,
    });
  }

  switch (mode) {
    case 'live': {
      const channel = options.channel ?? createLiveChannel(options.remote ?? {}, env, logger);
      logger?.info?.('backend.created', { mode });
      return createRemoteBackend({ channel, logger });
    }
    case 'in-process': {
      if (!options.model) {
        throw createBackendError(
          BackendErrorCode.MISSING_BACKEND_OPTION,
          'The in-process backend needs an object model',
          { suggestion: 'Pass `model`, for example createInMemoryObjectModel()' },
        );
      }
      logger?.info?.('backend.created', { mode });
      return createInProcessBackend({ model: options.model, logger });
    }
    case 'mock':
      logger?.info?.('backend.created', { mode });
      return createRecordingBackend({ faults: options.faults });
  }
}

function createLiveChannel(
  remote: RemoteBackendSettings,
  env: NodeJS.ProcessEnv,
  logger: Partial<Logger> | undefined,
): CommandChannel {
  const endpoint = remote.url ?? env.LAYOUTSMITH_REMOTE_URL;
  if (!endpoint) {
    throw createBackendError(BackendErrorCode.MISSING_BACKEND_OPTION, 'The live backend needs an endpoint URL', {
      suggestion: 'Set LAYOUTSMITH_REMOTE_URL or pass remote.url',
    });
  }
  return createHttpCommandChannel({
    endpoint,
    timeoutMs: remote.timeoutMs ?? parseTimeout(env.LAYOUTSMITH_REMOTE_TIMEOUT_MS),
    retries: remote.retries,
    sharedSecret: remote.sharedSecret ?? env.LAYOUTSMITH_REMOTE_SECRET,
    fetch: remote.fetch,
    logger,
  });
}

/**
 * Loads the workspace .env first, then selects the backend from the
 * resulting environment.
 */
export function createBackendFromEnvironment(
  options: Omit<CreateBackendOptions, 'env'> = {},
): BackendAdapter {
  loadEnv(import.meta.url, { logger: options.logger });
  return createBackend({ ...options, env: process.env });
}
