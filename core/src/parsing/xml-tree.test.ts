import { describe, expect, it } from 'vitest';
import { parseXmlDocument } from './xml-tree.js';

describe('parseXmlDocument', () => {
  it('resolves default and prefixed namespaces per element', () => {
    const root = parseXmlDocument(
      '<?xml version="1.0"?>' +
        '<Doc xmlns="urn:a" xmlns:b="urn:b">' +
        '<Item id="1">first</Item>' +
        '<b:Item>second</b:Item>' +
        '<Plain xmlns="">third</Plain>' +
        '</Doc>',
    );

    expect(root.localName).toBe('Doc');
    expect(root.namespaceUri).toBe('urn:a');
    expect(root.children.map((child) => [child.name, child.localName, child.namespaceUri, child.text])).toEqual([
      ['Item', 'Item', 'urn:a', 'first'],
      ['b:Item', 'Item', 'urn:b', 'second'],
      ['Plain', 'Plain', undefined, 'third'],
    ]);
    expect(root.children[0]?.attributes.get('id')).toBe('1');
  });

  it('keeps only the element own text, trimmed', () => {
    const root = parseXmlDocument('<Value>\n  42\n  <Unit>cm</Unit>\n</Value>');

    expect(root.text).toBe('42');
    expect(root.children[0]?.text).toBe('cm');
  });

  it('decodes entities', () => {
    expect(parseXmlDocument('<Name>Cut &amp; Drill</Name>').text).toBe('Cut & Drill');
  });

  it('rejects malformed markup with P001', () => {
    expect(() => parseXmlDocument('<Doc><Open></Doc>')).toThrow(
      expect.objectContaining({ code: 'P001', message: expect.stringMatching(/^Document is not well-formed markup: /) }),
    );
  });
});
