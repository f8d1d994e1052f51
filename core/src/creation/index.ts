export { createOrchestrator, createOrchestratorFromRules } from './orchestrator.js';
export type { Orchestrator, OrchestratorOptions } from './orchestrator.js';
export { enforceErrorPolicy } from './error-policy.js';
export type { CreatedConnection, CreatedObjectReport, CreationStatistics } from './types.js';
