import { TransportError } from '../error/transportError.js';
import type { TransportResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/** Response body read into memory, with the fields interpretation needs. */
export interface ResponseData {
  /** HTTP status code */
  status: number;
  /** Whether the status is in the 2xx range */
  ok: boolean;
  /** Lower-cased media type without parameters, e.g. `text/xml` */
  mimeType: string | null;
  /** Lower-cased `charset` parameter of the `Content-Type` header */
  charset: string | null;
  /** Body bytes as received */
  body: Uint8Array;
  /** Body decoded with `charset`, UTF-8 when absent or unknown; a leading BOM is kept */
  text: string;
}

/**
 * Extracts the media type from a `Content-Type` header value.
 * @example parseMimeType('text/plain; charset=UTF-8') // 'text/plain'
 */
export function parseMimeType(contentType: string | null | undefined): string | null {
  const mimeType = contentType?.split(';', 1)[0].trim().toLowerCase();

  return mimeType ? mimeType : null;
}

/**
 * Extracts the `charset` parameter from a `Content-Type` header value.
 * @example parseCharset('text/xml; charset="ISO-8859-1"') // 'iso-8859-1'
 */
export function parseCharset(contentType: string | null | undefined): string | null {
  const match = contentType?.match(/;\s*charset\s*=\s*"?([^";\s]+)"?/i);

  return match ? match[1].toLowerCase() : null;
}

/** Decodes `body` with `charset`, falling back to UTF-8 for labels the runtime does not know. */
export function decodeBody(body: Uint8Array, charset: string | null): string {
  const [errDecoder, decoder] = safeWrap(() => new TextDecoder(charset ?? 'utf-8', { ignoreBOM: true }));

  return (errDecoder ? new TextDecoder('utf-8', { ignoreBOM: true }) : decoder).decode(body);
}

/**
 * Reads the full response body.
 *
 * The body is read once, as bytes, whatever the status; decoding into documents
 * or errors is left to the caller. A failing read is returned as a {@link TransportError}
 * carrying the status.
 */
export async function getResponseData(response: TransportResponse): SafeWrapAsync<Error, ResponseData> {
  const [errRead, buffer] = await safeWrapAsync(() => response.arrayBuffer());
  if (errRead) {
    return [
      new TransportError('error reading response body in getResponseData', response.status, null, { cause: errRead }),
      null,
    ];
  }

  const contentType = response.headers.get('Content-Type');
  const charset = parseCharset(contentType);
  const body = new Uint8Array(buffer);

  return [
    null,
    {
      status: response.status,
      ok: response.ok,
      mimeType: parseMimeType(contentType),
      charset,
      body,
      text: decodeBody(body, charset),
    },
  ];
}
