import { describe, expect, it } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { ConnectionError } from '../error/connectionError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { TLSError } from '../error/tlsError.js';
import { TransportError } from '../error/transportError.js';
import { classifyNetworkError } from './networkError.js';

function systemError(code: string): Error {
  return Object.assign(new Error(`system failure ${code}`), { code });
}

function fetchFailure(cause: unknown): Error {
  return new Error('error sending GET request in fetchTransport', { cause: new TypeError('fetch failed', { cause }) });
}

describe('classifyNetworkError', () => {
  it('returns typed errors found in the cause chain as-is', () => {
    const timeout = new TimeoutError('error request timed out after 10ms');
    const abort = new AbortError('error client disposed');

    expect(classifyNetworkError(fetchFailure(timeout))).toBe(timeout);
    expect(classifyNetworkError(fetchFailure(abort))).toBe(abort);
  });

  it('maps platform abort and timeout exceptions', () => {
    const aborted = classifyNetworkError(fetchFailure(new DOMException('aborted', 'AbortError')));
    const timedOut = classifyNetworkError(fetchFailure(new DOMException('timed out', 'TimeoutError')));

    expect(aborted).toBeInstanceOf(AbortError);
    expect(timedOut).toBeInstanceOf(TimeoutError);
  });

  it.each(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_SOCKET'])('maps %s to ConnectionError', (code) => {
    const err = classifyNetworkError(fetchFailure(systemError(code)));

    expect(err).toBeInstanceOf(ConnectionError);
    expect(err.message).toBe(`error connecting to server (${code})`);
  });

  it.each(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT'])('maps %s to TimeoutError', (code) => {
    expect(classifyNetworkError(fetchFailure(systemError(code)))).toBeInstanceOf(TimeoutError);
  });

  it.each([
    'DEPTH_ZERO_SELF_SIGNED_CERT',
    'SELF_SIGNED_CERT_IN_CHAIN',
    'ERR_TLS_CERT_ALTNAME_INVALID',
    'CERT_HAS_EXPIRED',
    'ERR_SSL_WRONG_VERSION_NUMBER',
  ])('maps %s to TLSError', (code) => {
    expect(classifyNetworkError(fetchFailure(systemError(code)))).toBeInstanceOf(TLSError);
  });

  it('looks into aggregated connection attempts', () => {
    const aggregate = new AggregateError([systemError('ECONNREFUSED'), systemError('ECONNREFUSED')], 'attempts failed');

    expect(classifyNetworkError(fetchFailure(aggregate))).toBeInstanceOf(ConnectionError);
  });

  it('keeps the original failure as cause', () => {
    const failure = fetchFailure(systemError('ECONNREFUSED'));

    expect(classifyNetworkError(failure).cause).toBe(failure);
  });

  it('falls back to TransportError without status', () => {
    const failure = fetchFailure(new Error('something else'));
    const err = classifyNetworkError(failure);

    expect(err).toBeInstanceOf(TransportError);
    expect(err instanceof TransportError && err.status).toBeNull();
    expect(err.message).toBe('error sending request');
    expect(err.cause).toBe(failure);
  });

  it('handles non-error values', () => {
    expect(classifyNetworkError('boom')).toBeInstanceOf(TransportError);
  });
});
