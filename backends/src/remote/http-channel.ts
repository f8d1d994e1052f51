import {
  BackendErrorCode,
  createBackendError,
  describeError,
  isLayoutsmithError,
  noopLogger,
  type LayoutsmithError,
  type Logger,
} from '@layoutsmith/core';
import type { CommandChannel, ExecuteOptions } from './channel.js';

export interface HttpCommandChannelOptions {
  /** URL of the engine's command endpoint. */
  endpoint: string;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /**
   * Extra attempts after a transport failure or timeout, for idempotent
   * commands only. Refused commands are never retried.
   */
  retries?: number;
  retryDelayMs?: number;
  /** Sent as the X-Shared-Secret header when set. */
  sharedSecret?: string;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Partial<Logger>;
}

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 500;

interface CommandReply {
  ok: boolean;
  result?: unknown;
  error?: string | null;
}

function isCommandReply(value: unknown): value is CommandReply {
  if (typeof value !== 'object' || value === null || !('ok' in value) || typeof value.ok !== 'boolean') {
    return false;
  }
  return !('error' in value) || value.error === undefined || value.error === null || typeof value.error === 'string';
}

/**
 * Posts `{ "command": "<text>" }` as JSON and expects
 * `{ "ok": boolean, "result"?: any, "error"?: string }` back.
 */
export function createHttpCommandChannel(options: HttpCommandChannelOptions): CommandChannel {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retries = options.retries ?? DEFAULT_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const sleep = options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const logger = options.logger ?? noopLogger;

  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (options.sharedSecret) {
    headers['X-Shared-Secret'] = options.sharedSecret;
  }

  async function attempt(command: string): Promise<string> {
    let response: Response;
    try {
      response = await fetchImpl(options.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify({ command }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw createBackendError(BackendErrorCode.TIMEOUT, `Command timed out after ${timeoutMs}ms`, {
          cause: error,
          details: { command, retryable: true },
        });
      }
      throw createBackendError(
        BackendErrorCode.TRANSPORT_FAILED,
        `Engine at ${options.endpoint} is unreachable: ${describeError(error)}`,
        { cause: error, details: { command, retryable: true } },
      );
    }

    if (!response.ok) {
      const body = await response.text();
      throw createBackendError(
        BackendErrorCode.TRANSPORT_FAILED,
        `Engine endpoint answered ${response.status}: ${body}`,
        { details: { command, status: response.status, retryable: response.status >= 500 } },
      );
    }

    let reply: unknown;
    try {
      reply = await response.json();
    } catch (error) {
      throw createBackendError(BackendErrorCode.TRANSPORT_FAILED, 'Engine reply is not valid JSON', {
        cause: error,
        details: { command },
      });
    }
    if (!isCommandReply(reply)) {
      throw createBackendError(BackendErrorCode.TRANSPORT_FAILED, 'Engine reply has no boolean "ok" field', {
        details: { command },
      });
    }
    if (!reply.ok) {
      throw createBackendError(
        BackendErrorCode.COMMAND_REJECTED,
        `Engine rejected command: ${reply.error ?? 'no reason given'}`,
        { details: { command } },
      );
    }
    return stringifyResult(reply.result);
  }

  return {
    async execute(command: string, executeOptions: ExecuteOptions = {}): Promise<string> {
      // a timed-out derive may already have run on the engine
      const attempts = executeOptions.idempotent ? retries + 1 : 1;
      let lastError: LayoutsmithError | undefined;
      for (let attemptNumber = 1; attemptNumber <= attempts; attemptNumber += 1) {
        try {
          const result = await attempt(command);
          logger.debug?.('backend.remote.command', { command, attempt: attemptNumber });
          return result;
        } catch (error) {
          if (!isLayoutsmithError(error)) {
            throw error;
          }
          lastError = error;
          if (error.details?.retryable !== true || attemptNumber >= attempts) {
            throw error;
          }
          logger.warn?.('backend.remote.retry', {
            command,
            attempt: attemptNumber,
            retries,
            code: error.code,
            error: error.message,
            retryAfterMs: retryDelayMs,
          });
          await sleep(retryDelayMs);
        }
      }
      // unreachable: the final attempt either returns or throws
      throw lastError ?? createBackendError(BackendErrorCode.TRANSPORT_FAILED, 'Command was not sent');
    },
  };
}

function stringifyResult(result: unknown): string {
  if (result === undefined || result === null) {
    return '';
  }
  return typeof result === 'string' ? result : JSON.stringify(result);
}
