import { describe, expect, it } from 'vitest';
import { compilePath, findAll, findFirst, findText } from './path-query.js';
import { parseXmlDocument } from './xml-tree.js';

const root = parseXmlDocument(`
<Doc xmlns="urn:cmsd">
  <Data>
    <Resource><Identifier>R1</Identifier><Location unit="m"><X>1</X></Location></Resource>
    <Resource><Identifier>R2</Identifier></Resource>
    <Group>
      <Resource><Identifier>R3</Identifier></Resource>
    </Group>
  </Data>
  <Resource xmlns=""><Identifier>LOCAL</Identifier></Resource>
</Doc>`);

const identifiers = (path: string) => findAll(root, path).map((element) => findText(element, '{*}Identifier'));

describe('path queries', () => {
  it('selects direct children in any namespace with {*}', () => {
    expect(identifiers('{*}Data/{*}Resource')).toEqual(['R1', 'R2']);
  });

  it('selects descendants at any depth with .//', () => {
    expect(identifiers('.//{*}Resource')).toEqual(['R1', 'R2', 'R3', 'LOCAL']);
  });

  it('matches an explicit namespace or no namespace', () => {
    expect(identifiers('.//{urn:cmsd}Resource')).toEqual(['R1', 'R2', 'R3']);
    expect(findAll(root, 'Resource').map((element) => findText(element, 'Identifier'))).toEqual(['LOCAL']);
  });

  it('supports * and . steps', () => {
    expect(findAll(root, '{*}Data/*')).toHaveLength(3);
    expect(findFirst(root, '.')).toBe(root);
  });

  it('reads element text and attribute values', () => {
    const first = findFirst(root, '{*}Data/{*}Resource');
    if (!first) {
      throw new Error('no resource');
    }
    expect(findText(first, '{*}Location/{*}X')).toBe('1');
    expect(findText(first, '{*}Location/@unit')).toBe('m');
    expect(findText(first, '{*}Location/@scale')).toBe('');
    expect(findText(first, '{*}Missing')).toBe('');
    expect(findText(first, '')).toBe('');
  });

  it('rejects unsupported syntax with P010', () => {
    for (const path of ['/Doc', 'Data/', '{*}Resource[1]', '{urn:cmsd', '@id/X', 'Data//']) {
      expect(() => compilePath(path), path).toThrow(expect.objectContaining({ code: 'P010' }));
    }
  });

  it('names the path and the reason in the message', () => {
    expect(() => compilePath('{*}')).toThrow('Invalid path "{*}": missing element name in \'{*}\'');
  });
});
