import { beforeAll, describe, expect, it } from 'vitest';
import { loadMappingRules, type MappingRules } from './config/mapping-rules.js';
import { loadSchemaConfig, type SchemaConfig } from './config/schema-config.js';
import { runLayoutPipeline, summarizeRun } from './pipeline.js';
import { createFakeBackend } from './testing/fake-backend.js';
import { readFixture } from './testing/layout-fixtures.js';

let schema: SchemaConfig;
let rules: MappingRules;

beforeAll(async () => {
  schema = await loadSchemaConfig();
  rules = await loadMappingRules();
});

function steppingClock(stepMs: number): () => number {
  let now = 0;
  return () => {
    now += stepMs;
    return now;
  };
}

describe('runLayoutPipeline', () => {
  it('builds the line described by the document', async () => {
    const backend = createFakeBackend();

    const result = await runLayoutPipeline({
      xml: readFixture('three-station-line.xml'),
      schema,
      rules,
      backend,
      clock: steppingClock(5),
    });

    expect(result.status).toBe('completed');
    expect([...result.created.values()].map((handle) => handle.path)).toEqual([
      '.Models.Model.Raw_Source',
      '.Models.Model.Mill_1',
      '.Models.Model.Buffer_A',
      '.Models.Model.Exit',
    ]);
    expect(result.connections).toEqual([
      ['SRC1', 'ST1'],
      ['ST1', 'BUF1'],
      ['BUF1', 'DRN1'],
    ]);
    expect(result.statistics).toEqual({
      objectsCreated: 4,
      connectionsCreated: 3,
      materialUnitsCreated: 1,
      errors: 0,
      warnings: 0,
    });
    expect(result.issues).toEqual([]);
    expect(result.timings).toEqual({
      parse: 5,
      validate: 5,
      map: 5,
      createObjects: 5,
      createConnections: 5,
      postValidate: 5,
    });
  });

  it('converts units and applies placements on the way', async () => {
    const backend = createFakeBackend();

    await runLayoutPipeline({ xml: readFixture('three-station-line.xml'), schema, rules, backend });

    const valueSetOn = (target: string) => backend.calls.find((call) => call.target === target)?.value;
    // 2 minutes
    expect(valueSetOn('Raw_Source.Interval')).toBe(120);
    expect(valueSetOn('Mill_1.ProcTime')).toBe(45);
    expect(valueSetOn('Mill_1._3D.Rotation')).toEqual([90, 0, 0, 1]);
    expect(valueSetOn('Buffer_A.Coordinate3D')).toEqual([10, 0, 0.5]);
    expect(valueSetOn('Raw_Source.MU')).toEqual({ path: '.UserObjects.PartA', name: 'PartA' });
  });

  it('stops before creation when validation fails', async () => {
    const backend = createFakeBackend();
    const xml = readFixture('three-station-line.xml').replace(
      '<ToResource><ResourceIdentifier>DRN1</ResourceIdentifier>',
      '<ToResource><ResourceIdentifier>NOPE</ResourceIdentifier>',
    );

    const result = await runLayoutPipeline({ xml, schema, rules, backend });

    expect(result.status).toBe('invalid');
    expect(result.mapping).toBeUndefined();
    expect(backend.calls).toEqual([]);
    expect(summarizeRun(result)).toEqual([
      'Document line-demo: 4 resources, 4 layout objects, 3 connections',
      'Validation: failed (1 errors, 0 warnings)',
      "ERROR [V031]: Connection 'conn_BUF1_to_NOPE' references unknown target resource 'NOPE'\n" +
        "  Subject: connection 'conn_BUF1_to_NOPE' -> 'NOPE'",
    ]);
  });

  it('keeps the validation gate closed when error codes are skipped', async () => {
    const backend = createFakeBackend();
    const xml = readFixture('three-station-line.xml').replace(
      '<ToResource><ResourceIdentifier>DRN1</ResourceIdentifier>',
      '<ToResource><ResourceIdentifier>GHOST</ResourceIdentifier>',
    );

    const result = await runLayoutPipeline({
      xml,
      schema,
      rules,
      backend,
      validation: { skipCodes: ['V030', 'V031'] },
    });

    expect(result.status).toBe('invalid');
    expect(result.validation.errors.map((issue) => issue.code)).toEqual(['V031']);
    expect(backend.calls).toEqual([]);
  });

  it('propagates parse errors', async () => {
    await expect(
      runLayoutPipeline({ xml: '<CMSDDocument>', schema, rules, backend: createFakeBackend() }),
    ).rejects.toMatchObject({ code: 'P001' });
  });

  it('propagates a stop requested by the error policy', async () => {
    const stopping: MappingRules = { ...rules, errorHandling: { ...rules.errorHandling, creation: 'error_and_stop' } };
    const backend = createFakeBackend({ derive: (name) => name === 'Mill_1' });

    await expect(
      runLayoutPipeline({ xml: readFixture('three-station-line.xml'), schema, rules: stopping, backend }),
    ).rejects.toMatchObject({ code: 'R010' });
  });
});

describe('summarizeRun', () => {
  it('reports statistics for a completed run', async () => {
    const result = await runLayoutPipeline({
      xml: readFixture('three-station-line.xml'),
      schema,
      rules,
      backend: createFakeBackend(),
    });

    expect(summarizeRun(result)).toEqual([
      'Document line-demo: 4 resources, 4 layout objects, 3 connections',
      'Validation: passed (0 errors, 0 warnings)',
      'Objects created: 4',
      'Connections created: 3',
      'Material units created: 1',
      'Creation errors: 0, warnings: 0',
    ]);
  });
});
