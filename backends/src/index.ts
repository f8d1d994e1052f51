export { createBackend, createBackendFromEnvironment, BACKEND_MODES } from './registry.js';
export type { CreateBackendOptions, RemoteBackendSettings } from './registry.js';

export { createRemoteBackend } from './remote/remote-backend.js';
export type { RemoteBackendOptions } from './remote/remote-backend.js';
export { createHttpCommandChannel, DEFAULT_RETRIES, DEFAULT_RETRY_DELAY_MS, DEFAULT_TIMEOUT_MS } from './remote/http-channel.js';
export type { HttpCommandChannelOptions } from './remote/http-channel.js';
export type { CommandChannel, ExecuteOptions } from './remote/channel.js';
export { commandText, formatLiteral } from './remote/command-text.js';

export { createInProcessBackend } from './in-process/in-process-backend.js';
export type { InProcessBackendOptions } from './in-process/in-process-backend.js';
export { createInMemoryObjectModel, DEFAULT_MODEL_PATHS } from './in-process/object-model.js';
export type {
  AttributeValue,
  InMemoryObject,
  InMemoryObjectModel,
  ModelConnection,
  ModelObject,
  ObjectModel,
} from './in-process/object-model.js';

export { createRecordingBackend } from './mock/recording-backend.js';
export type { RecordedCall, RecordingBackend, RecordingBackendOptions, RecordingFaults } from './mock/recording-backend.js';
