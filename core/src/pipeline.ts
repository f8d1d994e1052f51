/**
 * Layout pipeline: parse, validate, map, create objects, create connections,
 * post-validate. Stages run strictly in sequence against one backend.
 */

import type { BackendAdapter, ObjectHandle } from './backend/index.js';
import type { MappingRules } from './config/mapping-rules.js';
import type { SchemaConfig } from './config/schema-config.js';
import { createOrchestratorFromRules } from './creation/orchestrator.js';
import type { CreatedConnection, CreatedObjectReport, CreationStatistics } from './creation/types.js';
import { formatDiagnostic, type Diagnostic } from './errors/index.js';
import type { LayoutDocument } from './ir/index.js';
import { noopLogger, type Logger } from './logger.js';
import { mapLayoutDocument } from './mapping/mapping-engine.js';
import type { MappingOutcome } from './mapping/types.js';
import { parseLayoutDocument } from './parsing/document-parser.js';
import { validateLayoutDocument } from './validation/document-validator.js';
import type { ValidationResult, ValidatorOptions } from './validation/types.js';

export type PipelineStage =
  | 'parse'
  | 'validate'
  | 'map'
  | 'createObjects'
  | 'createConnections'
  | 'postValidate';

export type PipelineStatus = 'completed' | 'invalid';

export interface PipelineOptions {
  xml: string;
  schema: SchemaConfig;
  rules: MappingRules;
  backend: BackendAdapter;
  logger?: Partial<Logger>;
  /** Millisecond clock used for stage timings. */
  clock?: () => number;
  validation?: ValidatorOptions;
}

export interface PipelineResult {
  status: PipelineStatus;
  document: LayoutDocument;
  validation: ValidationResult;
  /** Absent when validation failed. */
  mapping?: MappingOutcome;
  created: Map<string, ObjectHandle>;
  connections: CreatedConnection[];
  statistics: CreationStatistics;
  postValidation?: CreatedObjectReport;
  /** Every diagnostic of the run, in stage order. */
  issues: Diagnostic[];
  /** Elapsed milliseconds per completed stage. */
  timings: Partial<Record<PipelineStage, number>>;
}

const EMPTY_STATISTICS: CreationStatistics = {
  objectsCreated: 0,
  connectionsCreated: 0,
  materialUnitsCreated: 0,
  errors: 0,
  warnings: 0,
};

/**
 * Runs every stage against the given backend. A document that fails
 * validation stops before anything is created and yields status `invalid`.
 *
 * @throws LayoutsmithError P-codes for undecodable documents, R010 when an
 *   `error_and_stop` policy triggers during creation
 */
export async function runLayoutPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const logger = options.logger ?? noopLogger;
  const clock = options.clock ?? (() => Date.now());
  const timings: Partial<Record<PipelineStage, number>> = {};

  async function stage<T>(name: PipelineStage, run: () => T | Promise<T>): Promise<T> {
    const startedAt = clock();
    logger.debug?.('pipeline.stage.start', { stage: name });
    const result = await run();
    timings[name] = clock() - startedAt;
    logger.debug?.('pipeline.stage.done', { stage: name, elapsedMs: timings[name] });
    return result;
  }

  const document = await stage('parse', () => parseLayoutDocument(options.xml, options.schema, { logger }));
  const validation = await stage('validate', () => validateLayoutDocument(document, options.validation));
  const issues: Diagnostic[] = [...document.diagnostics, ...validation.issues];

  if (!validation.valid) {
    logger.error?.('pipeline.validation.failed', {
      documentId: document.header.identifier,
      errors: validation.errors.length,
    });
    return {
      status: 'invalid',
      document,
      validation,
      created: new Map(),
      connections: [],
      statistics: { ...EMPTY_STATISTICS },
      issues,
      timings,
    };
  }

  const mapping = await stage('map', () => mapLayoutDocument(document, options.rules, { logger }));
  const orchestrator = createOrchestratorFromRules(options.backend, options.rules, logger);
  const created = await stage('createObjects', () => orchestrator.createObjects(mapping.mappings));
  const connections = await stage('createConnections', () => orchestrator.createConnections(document));
  const postValidation = await stage('postValidate', () => orchestrator.validateCreatedObjects());

  // creation incidents are recorded on the mappings, so they appear here too
  for (const objectMapping of mapping.mappings.values()) {
    issues.push(...objectMapping.errors, ...objectMapping.warnings);
  }
  issues.push(...postValidation.warnings);

  const statistics = orchestrator.getStatistics();
  logger.info?.('pipeline.completed', { documentId: document.header.identifier, ...statistics });

  return {
    status: 'completed',
    document,
    validation,
    mapping,
    created,
    connections,
    statistics,
    postValidation,
    issues,
    timings,
  };
}

/**
 * Display lines for a finished run, for whatever reporter the caller uses.
 */
export function summarizeRun(result: PipelineResult): string[] {
  const { document, validation, statistics } = result;
  const lines = [
    `Document ${document.header.identifier || '(unnamed)'}: ${document.resources.size} resources, ` +
      `${document.layoutObjects.size} layout objects, ${document.connections.length} connections`,
    `Validation: ${validation.valid ? 'passed' : 'failed'} ` +
      `(${validation.errors.length} errors, ${validation.warnings.length} warnings)`,
  ];

  if (result.status === 'completed') {
    lines.push(
      `Objects created: ${statistics.objectsCreated}`,
      `Connections created: ${statistics.connectionsCreated}`,
      `Material units created: ${statistics.materialUnitsCreated}`,
      `Creation errors: ${statistics.errors}, warnings: ${statistics.warnings}`,
    );
  }

  const errors = result.issues.filter((issue) => issue.severity === 'error');
  for (const error of errors) {
    lines.push(formatDiagnostic(error));
  }
  return lines;
}
