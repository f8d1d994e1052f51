export * from './errors/index.js';
export * from './ir/index.js';
export * from './config/index.js';
export * from './parsing/index.js';
export * from './validation/index.js';
export * from './mapping/index.js';
export * from './backend/index.js';
export * from './creation/index.js';
export { runLayoutPipeline, summarizeRun } from './pipeline.js';
export type { PipelineOptions, PipelineResult, PipelineStage, PipelineStatus } from './pipeline.js';
export { createConsoleLogger, noopLogger } from './logger.js';
export type { ConsoleLoggerOptions, LogLevel, LogMeta, Logger } from './logger.js';
export { loadEnv } from './env-loader.js';
export type { EnvLoaderOptions, EnvLoaderResult } from './env-loader.js';
