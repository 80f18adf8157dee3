import { describe, expect, it } from 'vitest';
import { QueryExecutionError } from '../error/queryExecutionError.js';
import { TransportError } from '../error/transportError.js';
import { UnexpectedResponseError } from '../error/unexpectedResponseError.js';
import type { ResponseData } from '../utils/getResponseData.js';
import {
  decodeDocument,
  decodeItems,
  decodeLibraries,
  decodeProperties,
  interpretError,
  isErrorResponse,
  QIZX_ERROR_MIME,
} from './response.js';

function data(status: number, text: string, mimeType: string | null): ResponseData {
  return {
    status,
    ok: status >= 200 && status < 300,
    mimeType,
    charset: null,
    body: new TextEncoder().encode(text),
    text,
  };
}

describe('isErrorResponse', () => {
  it('flags error statuses and native error payloads', () => {
    expect(isErrorResponse(data(500, '', 'text/plain'))).toBe(true);
    expect(isErrorResponse(data(200, 'Server: down', QIZX_ERROR_MIME))).toBe(true);
    expect(isErrorResponse(data(200, '<ok/>', 'text/xml'))).toBe(false);
  });
});

describe('interpretError', () => {
  it('splits native payloads on the first colon', () => {
    const err = interpretError(data(400, 'Evaluation: at line 2: division by zero\n', QIZX_ERROR_MIME));

    expect(err).toBeInstanceOf(QueryExecutionError);
    expect(err instanceof QueryExecutionError && [err.code, err.message, err.status]).toEqual([
      'Evaluation',
      'at line 2: division by zero',
      400,
    ]);
  });

  it('reads JSON payloads with numeric codes', () => {
    const err = interpretError(data(500, '{"code":17,"message":"index busy"}', 'application/json'));

    expect(err instanceof QueryExecutionError && [err.code, err.message]).toEqual(['17', 'index busy']);
  });

  it('reads XML payloads with code and message elements', () => {
    const err = interpretError(
      data(400, '<error><code>XMLData</code><message>unclosed tag</message></error>', 'application/xml'),
    );

    expect(err instanceof QueryExecutionError && [err.code, err.message]).toEqual(['XMLData', 'unclosed tag']);
  });

  it('falls back to TransportError', () => {
    const err = interpretError(data(503, 'Service Unavailable', 'text/plain'));

    expect(err).toBeInstanceOf(TransportError);
    expect(err.message).toBe('error response with status 503');
    expect(err instanceof TransportError && [err.status, err.body]).toEqual([503, 'Service Unavailable']);
  });

  it('reads JSON payloads behind a byte order mark', () => {
    const error = interpretError(data(500, '\uFEFF{"code":"E02","message":"bad"}', 'application/json'));

    expect(error).toBeInstanceOf(QueryExecutionError);
    expect(error instanceof QueryExecutionError && [error.code, error.message]).toEqual(['E02', 'bad']);
  });

  it('does not read native payloads under other content types', () => {
    expect(interpretError(data(500, 'Server: internal failure', 'text/plain'))).toBeInstanceOf(TransportError);
  });

  it('ignores XML documents without an error root', () => {
    expect(interpretError(data(500, '<status>down</status>', 'text/xml'))).toBeInstanceOf(TransportError);
  });
});

describe('decoders', () => {
  it('decodes documents and items', () => {
    expect(decodeDocument(data(200, '<a><b>1</b></a>', 'text/xml'))).toEqual([null, { a: { b: '1' } }]);
    expect(decodeItems(data(200, '<items><item type="double">0.5</item></items>', 'text/xml'))).toEqual([null, [0.5]]);
  });

  it('decodes node sequences and atomic results', () => {
    expect(decodeDocument(data(200, '<book>a</book><book>b</book>', 'text/xml'))).toEqual([null, { book: ['a', 'b'] }]);
    expect(decodeDocument(data(200, '42', 'text/xml'))).toEqual([null, { '#text': '42' }]);
  });

  it('returns UnexpectedResponseError for malformed XML', () => {
    const [err] = decodeItems(data(200, '<items><item>', 'text/xml'));

    expect(err).toBeInstanceOf(UnexpectedResponseError);
    expect(err?.message).toBe('error parsing result items');
    expect(err?.body).toBe('<items><item>');
  });

  it('skips unnamed properties', () => {
    const [, info] = decodeProperties(
      data(200, '<properties><property>orphan</property><property name="a">x</property></properties>', 'text/xml'),
    );

    expect(info).toEqual({ a: 'x' });
  });

  it('requires text/plain library lists', () => {
    const [err] = decodeLibraries(data(200, 'books', 'text/xml'));

    expect(err?.message).toBe('error unexpected content type text/xml for library list');
  });
});
