import { z } from 'zod';
import { QueryExecutionError } from '../error/queryExecutionError.js';
import { TransportError } from '../error/transportError.js';
import { UnexpectedResponseError } from '../error/unexpectedResponseError.js';
import type { ResponseData } from '../utils/getResponseData.js';
import { tryParse } from '../utils/tryParse.js';
import type { SafeWrap } from '../utils/wrap.js';
import {
  attributeOf,
  decodeItem,
  parseXml,
  parseXmlList,
  type QueryItem,
  textOf,
  type XmlNode,
  type XmlValue,
} from '../utils/xml.js';

/** Content type of the server's native error payloads, `Code: message`. */
export const QIZX_ERROR_MIME = 'text/x-qizx-error';

const XML_MIME_TYPES = new Set(['text/xml', 'application/xml']);

const jsonErrorSchema = z.object({
  code: z.union([z.string().min(1), z.number()]).transform(String),
  message: z.string(),
});

/** Whether the response carries an error payload rather than a result. */
export function isErrorResponse(data: ResponseData): boolean {
  return !data.ok || data.mimeType === QIZX_ERROR_MIME;
}

/**
 * Turns an error response into a {@link QueryExecutionError}, trying in order the native
 * `Code: message` text, a JSON `{ code, message }` object and an XML `<error>` element.
 * Bodies in none of these shapes give a {@link TransportError} with the status and raw body.
 */
export function interpretError(data: ResponseData): QueryExecutionError | TransportError {
  const text = data.text.replace(/^\uFEFF/, '');
  const decoded = (data.mimeType === QIZX_ERROR_MIME ? fromNative(text) : null) ?? fromJson(text) ?? fromXml(text);

  if (decoded) {
    return new QueryExecutionError(decoded.code, decoded.message, data.status);
  }

  return new TransportError(`error response with status ${data.status}`, data.status, data.text);
}

interface DecodedError {
  code: string;
  message: string;
}

function fromNative(text: string): DecodedError | null {
  const separator = text.indexOf(':');
  if (separator <= 0) {
    return null;
  }

  const code = text.slice(0, separator).trim();
  if (!code || /\s/.test(code)) {
    return null;
  }

  return { code, message: text.slice(separator + 1).trim() };
}

function fromJson(text: string): DecodedError | null {
  const parsed = jsonErrorSchema.safeParse(tryParse(text));
  return parsed.success ? parsed.data : null;
}

function fromXml(text: string): DecodedError | null {
  if (!text.trimStart().startsWith('<')) {
    return null;
  }

  const [errParse, document] = parseXml(text);
  if (errParse || !('error' in document)) {
    return null;
  }

  const error: XmlValue = document.error;
  const codeAttribute = attributeOf(error, 'code');
  if (codeAttribute) {
    return { code: codeAttribute, message: textOf(error).trim() };
  }

  if (typeof error === 'string' || Array.isArray(error)) {
    return null;
  }

  const code = textOf(error.code).trim();
  if (!code) {
    return null;
  }

  return { code, message: textOf(error.message).trim() };
}

/** Parses a successful XML result: one document, a sequence of nodes, or atomic text. */
export function decodeDocument(data: ResponseData): SafeWrap<UnexpectedResponseError, XmlNode> {
  const [errParse, document] = parseXml(data.text);
  if (errParse) {
    return [unexpected('error parsing result document', data, errParse), null];
  }

  return [null, document];
}

/** Decodes the `<item>` children of an `items` result. */
export function decodeItems(data: ResponseData): SafeWrap<UnexpectedResponseError, QueryItem[]> {
  const [errParse, items] = parseXmlList(data.text, 'item');
  if (errParse) {
    return [unexpected('error parsing result items', data, errParse), null];
  }

  return [null, items.map(decodeItem)];
}

/** Decodes the `<property name type>` children of an info response. */
export function decodeProperties(data: ResponseData): SafeWrap<UnexpectedResponseError, Record<string, QueryItem>> {
  if (!data.mimeType || !XML_MIME_TYPES.has(data.mimeType)) {
    return [unexpected(`error unexpected content type ${data.mimeType} for server info`, data), null];
  }

  const [errParse, properties] = parseXmlList(data.text, 'property');
  if (errParse) {
    return [unexpected('error parsing server info', data, errParse), null];
  }

  const result: Record<string, QueryItem> = {};
  for (const property of properties) {
    const name = attributeOf(property, 'name');
    if (name) {
      result[name] = decodeItem(property);
    }
  }

  return [null, result];
}

/** Reads the library names, one per line of a `text/plain` body. */
export function decodeLibraries(data: ResponseData): SafeWrap<UnexpectedResponseError, string[]> {
  if (data.mimeType !== 'text/plain') {
    return [unexpected(`error unexpected content type ${data.mimeType} for library list`, data), null];
  }

  const libraries = data.text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  if (libraries.length === 0) {
    return [unexpected('error empty library list', data), null];
  }

  return [null, libraries];
}

function unexpected(message: string, data: ResponseData, cause?: Error): UnexpectedResponseError {
  return new UnexpectedResponseError(message, data.text, data.mimeType, cause ? { cause } : undefined);
}
