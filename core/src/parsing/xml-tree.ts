import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParserErrorCode, createParserError } from '../errors/index.js';

/**
 * A namespace-resolved XML element. Text is the concatenation of the element's
 * own text nodes (not its descendants'), trimmed.
 */
export interface XmlElement {
  readonly name: string;
  readonly localName: string;
  readonly namespaceUri?: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly children: readonly XmlElement[];
  readonly text: string;
}

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
});

/**
 * Decodes markup into the root element.
 *
 * @throws LayoutsmithError P001 when the text is not well-formed or has no root element
 */
export function parseXmlDocument(xml: string): XmlElement {
  const verdict = XMLValidator.validate(xml);
  if (verdict !== true) {
    const { msg, line, col } = verdict.err;
    throw createParserError(
      ParserErrorCode.MALFORMED_DOCUMENT,
      `Document is not well-formed markup: ${msg} (line ${line}, column ${col})`,
    );
  }

  const nodes: unknown = parser.parse(xml);
  const elements = Array.isArray(nodes) ? buildElements(nodes, new Map([['xml', XML_NAMESPACE]])) : [];
  const root = elements[0];
  if (!root) {
    throw createParserError(ParserErrorCode.MALFORMED_DOCUMENT, 'Document has no root element');
  }
  return root;
}

type NamespaceScope = ReadonlyMap<string, string>;

function buildElements(nodes: unknown[], scope: NamespaceScope): XmlElement[] {
  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    const tagName = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
    if (!tagName) {
      continue;
    }
    elements.push(buildElement(tagName, node, scope));
  }
  return elements;
}

function buildElement(tagName: string, node: Record<string, unknown>, parentScope: NamespaceScope): XmlElement {
  const attributes = readAttributes(node[ATTRIBUTES_KEY]);
  const scope = extendScope(parentScope, attributes);

  const separator = tagName.indexOf(':');
  const prefix = separator >= 0 ? tagName.slice(0, separator) : '';
  const localName = separator >= 0 ? tagName.slice(separator + 1) : tagName;
  const namespaceUri = scope.get(prefix);

  const content = node[tagName];
  const childNodes = Array.isArray(content) ? content : [];
  const textParts: string[] = [];
  for (const child of childNodes) {
    if (isRecord(child) && TEXT_KEY in child) {
      textParts.push(String(child[TEXT_KEY]));
    }
  }

  return {
    name: tagName,
    localName,
    namespaceUri: namespaceUri || undefined,
    attributes,
    children: buildElements(childNodes, scope),
    text: textParts.join('').trim(),
  };
}

function readAttributes(raw: unknown): Map<string, string> {
  const attributes = new Map<string, string>();
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [name, value] of Object.entries(raw)) {
    attributes.set(name, String(value));
  }
  return attributes;
}

function extendScope(parent: NamespaceScope, attributes: ReadonlyMap<string, string>): NamespaceScope {
  let scope: Map<string, string> | undefined;
  for (const [name, value] of attributes) {
    if (name === 'xmlns' || name.startsWith('xmlns:')) {
      scope ??= new Map(parent);
      scope.set(name === 'xmlns' ? '' : name.slice('xmlns:'.length), value);
    }
  }
  return scope ?? parent;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
