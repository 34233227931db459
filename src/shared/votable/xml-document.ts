import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedResponseError } from '../../domain/errors/archive.errors';

export type XmlNode = Record<string, unknown>;

const REPEATABLE_ELEMENTS = new Set([
  'RESOURCE',
  'TABLE',
  'FIELD',
  'TR',
  'TD',
  'PARAM',
  'INFO',
  'result',
  'parameter',
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name) => REPEATABLE_ELEMENTS.has(name),
});

/**
 * Parse an XML response into a plain node tree. Namespace prefixes are dropped,
 * attributes are kept under "@_" keys, and every value stays a string.
 */
export function parseXml(xml: string, description: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedResponseError(
      `${description} is not well-formed XML: ${validation.err.msg} (line ${validation.err.line})`,
    );
  }

  const document: unknown = parser.parse(xml);
  if (!isNode(document)) {
    throw new MalformedResponseError(`${description} is empty`);
  }
  return document;
}

export function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function child(node: XmlNode, name: string): XmlNode | undefined {
  const value = node[name];
  return isNode(value) ? value : undefined;
}

/** Child elements of a repeatable element, always as an array of nodes */
export function children(node: XmlNode, name: string): XmlNode[] {
  const value = node[name];
  const items: unknown[] = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return items.map((item) => (isNode(item) ? item : { '#text': textOf(item) }));
}

export function attribute(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

/** Text content of an element, whether it parsed to a bare string or a node with attributes */
export function textOf(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isNode(value)) {
    return textOf(value['#text']);
  }
  return '';
}

export function childText(node: XmlNode, name: string): string | undefined {
  const value = node[name];
  if (value === undefined) {
    return undefined;
  }
  const text = textOf(Array.isArray(value) ? value[0] : value).trim();
  return text.length > 0 ? text : undefined;
}
