import { describe, expect, it, vi } from 'vitest';
import type { ErrorHandlingRules, MappingRules } from '../config/mapping-rules.js';
import { parseMappingRules } from '../config/mapping-rules.js';
import type { LayoutDocument } from '../ir/index.js';
import { mapLayoutDocument } from '../mapping/mapping-engine.js';
import type { ObjectMapping } from '../mapping/types.js';
import { createFakeBackend, type FakeBackendFailures } from '../testing/fake-backend.js';
import { createTestDocument } from '../testing/layout-fixtures.js';
import { createOrchestratorFromRules } from './orchestrator.js';

const RULES = parseMappingRules(`
resource_mappings:
  source:
    template: Source
    properties:
      product_type: { special_handler: assign_material_unit }
  station:
    template: SingleProc
    properties:
      processing_time: { target: ProcTime, data_type: positive_float }
  drain:
    template: Drain
backend:
  templates:
    Source: .MaterialFlow.Source
    SingleProc: .MaterialFlow.SingleProc
`);

function lineDocument(): LayoutDocument {
  return createTestDocument({
    resources: [
      { id: 'A', type: 'source', properties: [{ name: 'product_type', value: 'Housing' }] },
      { id: 'B', type: 'station', properties: [{ name: 'processing_time', value: '30' }] },
      { id: 'C', type: 'drain' },
    ],
    connections: [
      ['A', 'B'],
      ['B', 'C'],
    ],
    placements: { A: { x: 1, y: 2 } },
  });
}

function setup(
  document: LayoutDocument,
  options: { policies?: Partial<ErrorHandlingRules>; failures?: FakeBackendFailures } = {},
) {
  const rules: MappingRules = { ...RULES, errorHandling: { ...RULES.errorHandling, ...options.policies } };
  const backend = createFakeBackend(options.failures);
  const logger = { warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
  const { mappings } = mapLayoutDocument(document, rules);
  const orchestrator = createOrchestratorFromRules(backend, rules, logger);
  return { backend, logger, mappings, orchestrator };
}

function mappingFor(mappings: Map<string, ObjectMapping>, resourceId: string): ObjectMapping {
  const mapping = mappings.get(resourceId);
  if (!mapping) {
    throw new Error(`no mapping for ${resourceId}`);
  }
  return mapping;
}

describe('creation orchestrator', () => {
  it('creates objects, their material unit and the connections between them', async () => {
    const document = lineDocument();
    const { backend, mappings, orchestrator } = setup(document);

    const created = await orchestrator.createObjects(mappings);
    const connections = await orchestrator.createConnections(document);

    expect(created.get('A')).toEqual({ path: '.Models.Model.A', name: 'A' });
    expect(backend.callsTo('resolveTemplate')).toEqual([
      '.MaterialFlow.Source',
      '.Models.Model',
      '.MUs.Entity',
      '.UserObjects',
      '.MaterialFlow.SingleProc',
      '.UserObjects.Drain',
      '.MaterialFlow.Connector',
    ]);
    expect(backend.callsTo('derive')).toEqual(['A', 'PartA', 'B', 'C']);
    expect(backend.callsTo('setProperty')).toEqual(['A.Coordinate3D', 'A.MU', 'B.ProcTime']);
    expect(backend.calls.find((call) => call.target === 'A.MU')?.value).toEqual({
      path: '.UserObjects.PartA',
      name: 'PartA',
    });
    expect(connections).toEqual([
      ['A', 'B'],
      ['B', 'C'],
    ]);
    expect(backend.callsTo('connect')).toEqual(['A->B', 'B->C']);
    expect(orchestrator.getStatistics()).toEqual({
      objectsCreated: 3,
      connectionsCreated: 2,
      materialUnitsCreated: 1,
      errors: 0,
      warnings: 0,
    });
    expect(orchestrator.validateCreatedObjects()).toEqual({ errors: [], warnings: [] });
  });

  it('creates each material unit once and shares it between sources', async () => {
    const document = createTestDocument({
      resources: [
        { id: 'S1', type: 'source', properties: [{ name: 'product_type', value: 'Housing' }] },
        { id: 'S2', type: 'source', properties: [{ name: 'product_type', value: 'Housing' }] },
        { id: 'S3', type: 'source', properties: [{ name: 'product_type', value: 'Cover' }] },
      ],
    });
    const { backend, mappings, orchestrator } = setup(document);

    await orchestrator.createObjects(mappings);

    expect(backend.callsTo('derive')).toEqual(['S1', 'PartA', 'S2', 'S3', 'PartB']);
    expect(backend.callsTo('setProperty')).toEqual(['S1.MU', 'S2.MU', 'S3.MU']);
    expect(orchestrator.getStatistics().materialUnitsCreated).toBe(2);
  });

  it('keeps object names unique', async () => {
    const document = createTestDocument({
      resources: [
        { id: 'M1', type: 'station', name: 'Mill' },
        { id: 'M2', type: 'station', name: 'Mill' },
      ],
    });
    const { mappings, orchestrator } = setup(document);

    const created = await orchestrator.createObjects(mappings);

    expect(created.get('M1')?.name).toBe('Mill');
    expect(created.get('M2')).toEqual({ path: '.Models.Model.Mill_2', name: 'Mill_2' });
  });

  it('stops at the first creation failure under error_and_stop', async () => {
    const { backend, mappings, orchestrator } = setup(lineDocument(), {
      policies: { creation: 'error_and_stop' },
      failures: { derive: (name) => name === 'B' },
    });

    await expect(orchestrator.createObjects(mappings)).rejects.toMatchObject({
      code: 'R010',
      message: 'Creation stopped on creation error: derive refused for B',
    });
    expect(backend.callsTo('derive')).toEqual(['A', 'PartA', 'B']);
    expect(orchestrator.getStatistics().errors).toBe(1);
  });

  it('stops when a later mapping names a template the backend cannot resolve', async () => {
    const { backend, mappings, orchestrator } = setup(lineDocument(), {
      policies: { creation: 'error_and_stop' },
      failures: { resolve: (path) => path === '.MaterialFlow.SingleProc' },
    });

    await expect(orchestrator.createObjects(mappings)).rejects.toMatchObject({
      code: 'R010',
      message: 'Creation stopped on creation error: missing .MaterialFlow.SingleProc',
    });
    expect(backend.callsTo('derive')).toEqual(['A', 'PartA']);
    expect(mappingFor(mappings, 'B').errors.map((error) => error.code)).toEqual(['B011']);
    expect(orchestrator.getStatistics().errors).toBe(1);
  });

  it('records the failure and continues under warn_and_continue', async () => {
    const document = lineDocument();
    const { logger, mappings, orchestrator } = setup(document, {
      failures: { derive: (name) => name === 'B' },
    });

    const created = await orchestrator.createObjects(mappings);
    const connections = await orchestrator.createConnections(document);

    expect([...created.keys()]).toEqual(['A', 'C']);
    expect(mappingFor(mappings, 'B').errors).toEqual([
      {
        code: 'B011',
        severity: 'error',
        message: 'derive refused for B',
        subject: { entityKind: 'object', identifier: 'B' },
      },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('creation.creation.failed', {
      code: 'B011',
      message: 'derive refused for B',
      entityKind: 'object',
      identifier: 'B',
    });
    expect(connections).toEqual([]);
    expect(orchestrator.getStatistics()).toMatchObject({ objectsCreated: 2, errors: 1, warnings: 2 });

    const report = orchestrator.validateCreatedObjects();
    expect(report.errors).toEqual([]);
    expect(report.warnings.map((warning) => [warning.code, warning.message])).toEqual([
      ['W202', "Object 'A' has no connections"],
      ['W202', "Object 'C' has no connections"],
    ]);
  });

  it('counts ignored property failures without logging them', async () => {
    const document = lineDocument();
    const { logger, mappings, orchestrator } = setup(document, {
      policies: { property: 'ignore' },
      failures: { setProperty: (_handle, path) => path === 'ProcTime' },
    });

    await orchestrator.createObjects(mappings);
    await orchestrator.createConnections(document);

    expect(orchestrator.getStatistics()).toMatchObject({ objectsCreated: 3, errors: 1 });
    expect(logger.warn).not.toHaveBeenCalled();
    expect(orchestrator.validateCreatedObjects().errors).toEqual([
      {
        code: 'B012',
        severity: 'error',
        message: 'cannot set B.ProcTime',
        subject: { entityKind: 'property', identifier: 'B', property: 'ProcTime' },
      },
    ]);
  });

  it('reports a material unit that cannot be created as R012', async () => {
    const { backend, mappings, orchestrator } = setup(lineDocument(), {
      failures: { resolve: (path) => path === '.MUs.Entity' },
    });

    await orchestrator.createObjects(mappings);

    expect(mappingFor(mappings, 'A').errors.map((error) => [error.code, error.message])).toEqual([
      ['R012', "Failed to create material unit 'PartA': missing .MUs.Entity"],
    ]);
    expect(backend.callsTo('setProperty')).toEqual(['A.Coordinate3D', 'B.ProcTime']);
    expect(orchestrator.getStatistics()).toMatchObject({ objectsCreated: 3, materialUnitsCreated: 0, errors: 1 });
  });

  it('stops on a refused connection under error_and_stop', async () => {
    const document = lineDocument();
    const { mappings, orchestrator } = setup(document, {
      policies: { connection: 'error_and_stop' },
      failures: { connect: (from) => from.name === 'A' },
    });

    await orchestrator.createObjects(mappings);

    await expect(orchestrator.createConnections(document)).rejects.toMatchObject({
      code: 'R010',
      message: 'Creation stopped on connection error: cannot connect A to B',
    });
  });

  it('skips a mapping without a template', async () => {
    const { orchestrator } = setup(lineDocument());
    const mapping: ObjectMapping = {
      resourceId: 'X',
      resourceType: 'robot',
      layoutObjectId: 'LO_X',
      template: '',
      name: 'X',
      properties: [],
      errors: [],
      warnings: [],
    };

    const created = await orchestrator.createObjects(new Map([['X', mapping]]));

    expect(created.size).toBe(0);
    expect(mapping.errors.map((error) => [error.code, error.message])).toEqual([['R011', 'No template specified']]);
  });
});
