import { ParserErrorCode, createParserError } from '../errors/index.js';
import type { XmlElement } from './xml-tree.js';

/**
 * Element paths in the ElementTree subset:
 *
 *   Resource                  direct children named Resource (no namespace)
 *   {*}Resource               direct children named Resource in any namespace
 *   {urn:cmsd}Resource        direct children in that namespace
 *   .//{*}Resource            descendants at any depth
 *   {*}Boundary/{*}Width      nested steps
 *   {*}Location/@unit         attribute of the matched element (text queries only)
 *   * and .                   any child, the context element
 *
 * Paths are always relative to the element they are evaluated against.
 */

interface NameTest {
  readonly kind: 'any' | 'name';
  /** '*' for any namespace, '' for no namespace, otherwise a namespace URI */
  readonly namespace?: string;
  readonly localName?: string;
}

interface Step {
  readonly axis: 'child' | 'descendant' | 'self';
  readonly test: NameTest;
}

export interface CompiledPath {
  readonly source: string;
  readonly steps: readonly Step[];
  /** Set when the path ends in an @attribute step. */
  readonly attribute?: string;
}

const compiled = new Map<string, CompiledPath>();

export function compilePath(source: string): CompiledPath {
  const cached = compiled.get(source);
  if (cached) {
    return cached;
  }

  const tokens = tokenize(source);
  const steps: Step[] = [];
  let attribute: string | undefined;
  let descendant = false;

  tokens.forEach((token, index) => {
    if (token === '') {
      // an empty token between slashes is the '//' descendant marker
      if (index === 0 || index === tokens.length - 1) {
        throw invalidPath(source, 'absolute paths and trailing slashes are not supported');
      }
      descendant = true;
      return;
    }
    if (attribute !== undefined) {
      throw invalidPath(source, 'an attribute step must be the last step');
    }
    if (token.startsWith('@')) {
      attribute = token.slice(1);
      if (!attribute) {
        throw invalidPath(source, 'empty attribute name');
      }
      return;
    }
    if (token === '.') {
      if (descendant) {
        throw invalidPath(source, "'//.' is not supported");
      }
      steps.push({ axis: 'self', test: { kind: 'any' } });
      return;
    }
    steps.push({ axis: descendant ? 'descendant' : 'child', test: parseNameTest(token, source) });
    descendant = false;
  });

  if (descendant) {
    throw invalidPath(source, 'path ends with a descendant marker');
  }

  const result: CompiledPath = { source, steps, attribute };
  compiled.set(source, result);
  return result;
}

/**
 * All elements the path selects, in document order, without duplicates.
 * Attribute steps are ignored.
 */
export function findAll(context: XmlElement, path: string): XmlElement[] {
  if (!path) {
    return [];
  }
  return evaluate(context, compilePath(path));
}

export function findFirst(context: XmlElement, path: string): XmlElement | undefined {
  return findAll(context, path)[0];
}

/**
 * Text of the first selected element, or the attribute value for @ paths.
 * Missing elements and empty paths yield ''.
 */
export function findText(context: XmlElement, path: string): string {
  if (!path) {
    return '';
  }
  const compiledPath = compilePath(path);
  const [match] = evaluate(context, compiledPath);
  if (!match) {
    return '';
  }
  if (compiledPath.attribute !== undefined) {
    return (match.attributes.get(compiledPath.attribute) ?? '').trim();
  }
  return match.text;
}

function evaluate(context: XmlElement, path: CompiledPath): XmlElement[] {
  let current: XmlElement[] = [context];
  for (const step of path.steps) {
    const next: XmlElement[] = [];
    const seen = new Set<XmlElement>();
    const add = (element: XmlElement) => {
      if (!seen.has(element)) {
        seen.add(element);
        next.push(element);
      }
    };
    for (const element of current) {
      if (step.axis === 'self') {
        add(element);
      } else if (step.axis === 'child') {
        for (const child of element.children) {
          if (matches(child, step.test)) {
            add(child);
          }
        }
      } else {
        collectDescendants(element, step.test, add);
      }
    }
    current = next;
  }
  return current;
}

function collectDescendants(element: XmlElement, test: NameTest, add: (element: XmlElement) => void): void {
  for (const child of element.children) {
    if (matches(child, test)) {
      add(child);
    }
    collectDescendants(child, test, add);
  }
}

function matches(element: XmlElement, test: NameTest): boolean {
  if (test.kind === 'any') {
    return true;
  }
  if (element.localName !== test.localName) {
    return false;
  }
  if (test.namespace === '*') {
    return true;
  }
  return (element.namespaceUri ?? '') === test.namespace;
}

function parseNameTest(token: string, source: string): NameTest {
  if (token === '*') {
    return { kind: 'any' };
  }
  if (/[[\]()=]/.test(token)) {
    throw invalidPath(source, `predicates are not supported ('${token}')`);
  }
  if (token.startsWith('{')) {
    const close = token.indexOf('}');
    if (close < 0) {
      throw invalidPath(source, `unterminated namespace in '${token}'`);
    }
    const localName = token.slice(close + 1);
    if (!localName) {
      throw invalidPath(source, `missing element name in '${token}'`);
    }
    return { kind: 'name', namespace: token.slice(1, close), localName };
  }
  return { kind: 'name', namespace: '', localName: token };
}

/**
 * Splits on '/' outside of {namespace} braces, since namespace URIs contain slashes.
 */
function tokenize(source: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let depth = 0;
  for (const char of source) {
    if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
    }
    if (char === '/' && depth === 0) {
      tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  tokens.push(current);
  return tokens;
}

function invalidPath(source: string, reason: string) {
  return createParserError(ParserErrorCode.INVALID_PATH_EXPRESSION, `Invalid path "${source}": ${reason}`);
}
