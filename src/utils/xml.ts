import { XMLParser } from 'fast-xml-parser';
import { safeWrap, type SafeWrap } from './wrap.js';

/** Prefix marking attributes in parsed nodes, e.g. `{ '@_type': 'integer' }`. */
export const ATTRIBUTE_PREFIX = '@_';
/** Key holding an element's text when it also has attributes or children. */
export const TEXT_KEY = '#text';

/** Value of a parsed XML element: text, a nested node, or repeated siblings. */
export type XmlValue = string | XmlNode | XmlValue[];

/**
 * Parsed XML element content. Child elements are keyed by tag name, attributes by
 * `@_name`, and mixed text by `#text`.
 * @example `<result><name>Alice</name></result>` parses to `{ result: { name: 'Alice' } }`
 */
export interface XmlNode {
  [key: string]: XmlValue;
}

/** Decoded `<item>` of an `items` result or `<property>` of an info response. */
export type QueryItem = string | number | bigint | boolean | Date | XmlNode;

/** Type guard for {@link XmlValue}, used to narrow parser output. */
export function isXmlValue(value: unknown): value is XmlValue {
  if (typeof value === 'string') {
    return true;
  }

  if (Array.isArray(value)) {
    return value.every(isXmlValue);
  }

  return isXmlNode(value);
}

/** Type guard for {@link XmlNode}. */
export function isXmlNode(value: unknown): value is XmlNode {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  return Object.values(value).every(isXmlValue);
}

const baseOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
};

/** Synthetic element the result is wrapped in, so sequences of nodes and atomic text parse too. */
const SEQUENCE_ROOT = 'qizx-sequence';

const PROLOG = /^\uFEFF?\s*(<\?xml\s[^?]*\?>)?\s*(<!DOCTYPE[^[>]*(\[[^\]]*\])?\s*>)?/i;

const sequenceParser = new XMLParser(baseOptions);

/**
 * Parses an XML result into an {@link XmlNode} keyed by its top-level element names.
 * The result may be one document, several sibling elements or atomic text; repeated
 * siblings become arrays and top-level text is kept under `#text`. Malformed XML is
 * returned as an error.
 * @example parseXml('<book>a</book><book>b</book>') // [null, { book: ['a', 'b'] }]
 * @example parseXml('42') // [null, { '#text': '42' }]
 */
export function parseXml(text: string): SafeWrap<Error, XmlNode> {
  return parseSequence(sequenceParser, text);
}

/**
 * Parses a document whose root holds repeated `childName` elements (`<item>`, `<property>`),
 * returning those children as an array even when there is only one.
 */
export function parseXmlList(text: string, childName: string): SafeWrap<Error, XmlValue[]> {
  const parser = new XMLParser({
    ...baseOptions,
    isArray: (tagName, jPath, _isLeafNode, isAttribute) =>
      !isAttribute && tagName === childName && jPath.split('.').length === 3,
  });

  const [errParse, sequence] = parseSequence(parser, text);
  if (errParse) {
    return [errParse, null];
  }

  const roots = Object.keys(sequence).filter((key) => key !== TEXT_KEY);
  if (roots.length > 1) {
    return [new Error('error parsing xml list, document has more than one root'), null];
  }

  const root = roots.length === 1 ? sequence[roots[0]] : undefined;
  if (root === undefined || typeof root === 'string') {
    return [null, []];
  }

  if (Array.isArray(root)) {
    return [new Error('error parsing xml list, document has more than one root'), null];
  }

  const children = root[childName];
  return [null, Array.isArray(children) ? children : []];
}

function parseSequence(parser: XMLParser, text: string): SafeWrap<Error, XmlNode> {
  const body = text.replace(PROLOG, '');
  const wrapped = `<${SEQUENCE_ROOT}>${body}</${SEQUENCE_ROOT}>`;
  const [errParse, parsed] = safeWrap((): unknown => parser.parse(wrapped, true));
  if (errParse) {
    return [new Error('error parsing xml', { cause: errParse }), null];
  }

  if (!isXmlNode(parsed)) {
    return [new Error('error parsing xml, unexpected parser output'), null];
  }

  const content = parsed[SEQUENCE_ROOT];
  if (content === undefined || Array.isArray(content)) {
    return [new Error('error parsing xml, unexpected parser output'), null];
  }

  if (typeof content === 'string') {
    return [null, content ? { [TEXT_KEY]: content } : {}];
  }

  return [null, content];
}

/** Text of an element value: the value itself, or its `#text` when it has attributes or children. */
export function textOf(value: XmlValue | undefined): string {
  if (typeof value === 'string') {
    return value;
  }

  if (value === undefined || Array.isArray(value)) {
    return '';
  }

  const text = value[TEXT_KEY];
  return typeof text === 'string' ? text : '';
}

/** Attribute value of an element, or `undefined`. */
export function attributeOf(value: XmlValue | undefined, name: string): string | undefined {
  if (value === undefined || typeof value === 'string' || Array.isArray(value)) {
    return undefined;
  }

  const attribute = value[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof attribute === 'string' ? attribute : undefined;
}

/**
 * Decodes a typed value by its `type` attribute:
 * - `boolean` → `true` only for the text `true`
 * - `integer` (and the other integer XML Schema types) → number, or `bigint` past the safe integer range
 * - `double` (and the other decimal XML Schema types) → number, `INF` and `-INF` as infinities
 * - `dateTime` → `Date`
 * - `element()` → the first child element, as `{ tagName: content }`
 * - anything else → the text
 */
export function decodeItem(item: XmlValue): QueryItem {
  const type = attributeOf(item, 'type') ?? 'string';
  const text = textOf(item);

  switch (type) {
    case 'boolean':
      return text === 'true';
    case 'integer':
    case 'int':
    case 'long':
    case 'short':
      return decodeInteger(text);
    case 'double':
    case 'float':
    case 'decimal':
      return decodeDouble(text);
    case 'dateTime':
      return new Date(text);
    case 'element()':
      return firstElement(item) ?? text;
    default:
      return text;
  }
}

function decodeInteger(text: string): number | bigint {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return Number.NaN;
  }

  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : BigInt(trimmed);
}

function decodeDouble(text: string): number {
  switch (text.trim()) {
    case 'INF':
    case '+INF':
      return Number.POSITIVE_INFINITY;
    case '-INF':
      return Number.NEGATIVE_INFINITY;
    case 'NaN':
      return Number.NaN;
    default:
      return Number(text);
  }
}

function firstElement(value: XmlValue): XmlNode | null {
  if (typeof value === 'string' || Array.isArray(value)) {
    return null;
  }

  for (const [key, child] of Object.entries(value)) {
    if (key === TEXT_KEY || key.startsWith(ATTRIBUTE_PREFIX)) {
      continue;
    }

    return { [key]: Array.isArray(child) ? child[0] : child };
  }

  return null;
}
