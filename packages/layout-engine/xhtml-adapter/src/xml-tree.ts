/**
 * XML Tree Module
 *
 * Thin wrapper over fast-xml-parser that validates chapter markup and returns
 * an ordered, typed node tree:
 * - Document order is kept (preserveOrder), including whitespace-only text
 * - Tag names are lower-cased and namespace prefixes dropped
 * - XML, numeric and common HTML named entities are decoded
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from '@leafline/contracts';
import namedEntities from './html-entities.json';

export type XmlText = {
  type: 'text';
  value: string;
};

export type XmlElement = {
  type: 'element';
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
};

export type XmlNode = XmlText | XmlElement;

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const PARSER_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: true,
  htmlEntities: true,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
};

const createParser = (): XMLParser => {
  const parser = new XMLParser(PARSER_OPTIONS);
  for (const [name, value] of Object.entries(namedEntities)) {
    parser.addEntity(name, value);
  }
  return parser;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toAttributes = (raw: unknown): Record<string, string> => {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    attributes[name.toLowerCase()] = value == null ? '' : String(value);
  }
  return attributes;
};

const toNodes = (raw: unknown): XmlNode[] => {
  if (!Array.isArray(raw)) return [];
  const nodes: XmlNode[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        nodes.push({ type: 'text', value: value == null ? '' : String(value) });
        continue;
      }
      nodes.push({
        type: 'element',
        name: key.toLowerCase(),
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }
  return nodes;
};

/**
 * Parses well-formed (X)HTML into top-level nodes.
 *
 * @throws ParseError when the markup is not well-formed
 */
export function parseXmlTree(markup: string): XmlNode[] {
  const validation = XMLValidator.validate(markup);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new ParseError(`Malformed chapter markup: ${msg}`, { code, line, col });
  }

  const raw: unknown = createParser().parse(markup);
  return toNodes(raw);
}

export const isElement = (node: XmlNode): node is XmlElement => node.type === 'element';

export const childElements = (element: XmlElement): XmlElement[] => element.children.filter(isElement);

/** Depth-first search for the first element named `name`. */
export function findElement(nodes: XmlNode[], name: string): XmlElement | null {
  for (const node of nodes) {
    if (!isElement(node)) continue;
    if (node.name === name) return node;
    const nested = findElement(node.children, name);
    if (nested) return nested;
  }
  return null;
}

/** All descendant elements named `name`, in document order. */
export function findDescendants(element: XmlElement, name: string): XmlElement[] {
  const results: XmlElement[] = [];
  for (const child of childElements(element)) {
    if (child.name === name) results.push(child);
    results.push(...findDescendants(child, name));
  }
  return results;
}

/** Concatenated text of all descendants, skipping the elements named in `skip`. */
export function textContent(node: XmlNode, skip: ReadonlySet<string> = new Set()): string {
  if (!isElement(node)) return node.value;
  if (skip.has(node.name)) return '';
  return node.children.map((child) => textContent(child, skip)).join('');
}
