import { describe, expect, it } from 'vitest';
import { createLayoutDocument } from '../ir/index.js';
import { TEST_HEADER, createTestDocument, testResource } from '../testing/layout-fixtures.js';
import { validateLayoutDocument } from './document-validator.js';

describe('validateLayoutDocument', () => {
  it('passes a consistent document', () => {
    const document = createTestDocument({
      resources: [
        { id: 'A', type: 'source' },
        { id: 'B', type: 'drain' },
      ],
      connections: [['A', 'B']],
      placements: { A: { x: 0, y: 0 }, B: { x: 4, y: 0 } },
    });

    const result = validateLayoutDocument(document);

    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it('requires a document identifier and at least one resource', () => {
    const document = createLayoutDocument({ header: { ...TEST_HEADER, identifier: '' }, resources: [] });

    const result = validateLayoutDocument(document);

    expect(result.valid).toBe(false);
    expect(result.errors.map((issue) => [issue.code, issue.message])).toEqual([
      ['V001', 'Missing document identifier'],
      ['V002', 'No resources defined'],
    ]);
  });

  it('reports dangling references of layout objects, placements and connections', () => {
    const document = createTestDocument({
      resources: [{ id: 'A', type: 'source' }],
      layoutObjectsFor: ['A', 'GHOST'],
      connections: [['A', 'MISSING']],
      placements: { A: { x: 0, y: 0 }, NOWHERE: { x: 1, y: 1 } },
    });

    const result = validateLayoutDocument(document);

    expect(result.errors.map((issue) => issue.message)).toEqual([
      "LayoutObject 'LO_GHOST' references unknown resource 'GHOST'",
      "Placement references unknown layout object 'LO_NOWHERE'",
      "Connection 'conn_A_to_MISSING' references unknown target resource 'MISSING'",
    ]);
  });

  it('reports each unknown endpoint of a connection once', () => {
    const document = createTestDocument({
      resources: [{ id: 'A', type: 'source' }],
      connections: [['X', 'Y']],
    });

    const codes = validateLayoutDocument(document).errors.map((issue) => issue.code);

    expect(codes).toEqual(['V030', 'V031']);
  });

  it('warns about resources without a layout object unless errors only are requested', () => {
    const document = createLayoutDocument({
      header: TEST_HEADER,
      resources: [testResource({ id: 'LOGICAL', type: 'station' })],
    });

    const full = validateLayoutDocument(document);
    expect(full.valid).toBe(true);
    expect(full.warnings).toEqual([
      {
        code: 'W001',
        severity: 'warning',
        message: "Resource 'LOGICAL' has no associated layout object",
        subject: { entityKind: 'resource', identifier: 'LOGICAL' },
      },
    ]);

    expect(validateLayoutDocument(document, { errorsOnly: true }).issues).toEqual([]);
  });

  it('drops skipped warning codes from the result', () => {
    const document = createTestDocument({
      resources: [
        { id: 'A', type: 'source' },
        { id: 'B', type: 'drain' },
      ],
      layoutObjectsFor: ['A'],
    });

    const result = validateLayoutDocument(document, { skipCodes: ['W001'] });

    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it('keeps error codes even when they are listed as skipped', () => {
    const document = createTestDocument({
      resources: [{ id: 'A', type: 'source' }],
      connections: [['A', 'MISSING']],
    });

    const result = validateLayoutDocument(document, { skipCodes: ['V030', 'V031'] });

    expect(result.valid).toBe(false);
    expect(result.errors.map((issue) => issue.code)).toEqual(['V031']);
  });
});
