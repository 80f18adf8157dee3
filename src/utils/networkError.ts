import { AbortError } from '../error/abortError.js';
import { ConnectionError } from '../error/connectionError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { TLSError } from '../error/tlsError.js';
import { TransportError } from '../error/transportError.js';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const TLS_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
]);

const TLS_PREFIXES = ['ERR_TLS_', 'ERR_SSL_', 'CERT_'];

type ErrorKind = 'timeout' | 'connection' | 'tls';

function kindOfCode(code: string): ErrorKind | null {
  if (TIMEOUT_CODES.has(code)) {
    return 'timeout';
  }

  if (CONNECTION_CODES.has(code)) {
    return 'connection';
  }

  if (TLS_CODES.has(code) || TLS_PREFIXES.some((prefix) => code.startsWith(prefix))) {
    return 'tls';
  }

  return null;
}

function codeOf(error: Error): string | null {
  return 'code' in error && typeof error.code === 'string' ? error.code : null;
}

/**
 * Maps a failed transport call onto the client's error taxonomy.
 *
 * Walks the `cause` chain (and the members of an `AggregateError`):
 * - errors that already are {@link TimeoutError}, {@link AbortError}, {@link ConnectionError},
 *   {@link TLSError} or {@link TransportError} are returned as-is,
 * - platform abort and timeout `DOMException`s become {@link AbortError} / {@link TimeoutError},
 * - system and undici error codes decide between timeout, connection and TLS failures,
 * - anything else becomes a {@link TransportError} without status.
 */
export function classifyNetworkError(error: unknown): Error {
  const seen = new Set<Error>();
  const queue: unknown[] = [error];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!(current instanceof Error) || seen.has(current)) {
      continue;
    }

    seen.add(current);

    if (
      current instanceof TimeoutError ||
      current instanceof AbortError ||
      current instanceof ConnectionError ||
      current instanceof TLSError ||
      current instanceof TransportError
    ) {
      return current;
    }

    if (current.name === 'TimeoutError') {
      return new TimeoutError('error request timed out', { cause: error });
    }

    if (current.name === 'AbortError') {
      return new AbortError('error request aborted', { cause: error });
    }

    const code = codeOf(current);
    switch (code && kindOfCode(code)) {
      case 'timeout':
        return new TimeoutError(`error request timed out (${code})`, { cause: error });
      case 'connection':
        return new ConnectionError(`error connecting to server (${code})`, { cause: error });
      case 'tls':
        return new TLSError(`error establishing tls connection (${code})`, { cause: error });
    }

    if (current instanceof AggregateError) {
      queue.push(...current.errors);
    }

    queue.push(current.cause);
  }

  return new TransportError('error sending request', null, null, { cause: error });
}
