export { parseLayoutDocument, parseLayoutFile } from './document-parser.js';
export type { ParseOptions } from './document-parser.js';
export { compilePath, findAll, findFirst, findText } from './path-query.js';
export type { CompiledPath } from './path-query.js';
export { parseXmlDocument } from './xml-tree.js';
export type { XmlElement } from './xml-tree.js';
