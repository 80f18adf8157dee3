import { readFile } from 'node:fs/promises';
import { Agent, type Dispatcher, fetch } from 'undici';
import { TLSError } from '../error/tlsError.js';
import type {
  HttpMethod,
  TlsOptions,
  TransportDefinition,
  TransportOptions,
  TransportRequestOptions,
  TransportResponse,
} from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/**
 * Default transport, a thin wrapper around undici's `fetch` that:
 * - applies the TLS policy through a dedicated undici `Agent`,
 * - returns every response, 2xx or not, for the client to interpret,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * The agent is only built when the policy differs from the platform default
 * (verification disabled, a CA bundle, or a client certificate), and only on first use.
 */
export class FetchTransport implements TransportDefinition {
  /** TLS policy, absent for plain http endpoints */
  #tls?: TlsOptions;
  /** Pending or settled agent creation */
  #dispatcher: Promise<SafeWrap<TLSError, Dispatcher | undefined>> | null = null;
  /** Agent to close on dispose */
  #agent: Agent | null = null;

  /** Creates a new transport bound to one TLS policy */
  constructor(opts: TransportOptions = {}) {
    this.#tls = opts.tls;
  }

  /**
   * Executes a GET request.
   *
   * @param url - Absolute URL including the query string.
   * @param opts - Headers and abort signal.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: Omit<TransportRequestOptions, 'body'>): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('GET', url, opts);
  }

  /**
   * Executes a POST request.
   *
   * @param url - Absolute URL.
   * @param opts - Headers, serialized body and abort signal.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: TransportRequestOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('POST', url, opts);
  }

  /**
   * Closes the TLS agent, if one was created.
   */
  public async dispose(): Promise<void> {
    const agent = this.#agent;
    this.#agent = null;
    this.#dispatcher = null;

    if (agent) {
      await agent.close();
    }
  }

  /**
   * Core request implementation used by both verbs.
   *
   * Errors:
   * - Unreadable TLS material is returned as {@link TLSError}.
   * - Network / fetch errors are wrapped in `Error`, with the original as `cause`.
   */
  async #request(
    method: HttpMethod,
    url: string,
    opts: TransportRequestOptions,
  ): SafeWrapAsync<Error, TransportResponse> {
    const [errDispatcher, dispatcher] = await this.#getDispatcher();
    if (errDispatcher) {
      return [errDispatcher, null];
    }

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        method,
        headers: Object.fromEntries(opts.headers.entries()),
        body: opts.body,
        ...(opts.signal && { signal: opts.signal }),
        ...(dispatcher && { dispatcher }),
      }),
    );

    if (err) {
      return [new Error(`error sending ${method} request in fetchTransport`, { cause: err }), null];
    }

    return [null, res];
  }

  #getDispatcher(): Promise<SafeWrap<TLSError, Dispatcher | undefined>> {
    if (!this.#dispatcher) {
      this.#dispatcher = this.#createDispatcher().then((result) => {
        // failed loads are not cached
        if (result[0]) {
          this.#dispatcher = null;
        }

        return result;
      });
    }

    return this.#dispatcher;
  }

  async #createDispatcher(): SafeWrapAsync<TLSError, Dispatcher | undefined> {
    const tls = this.#tls;
    if (!tls || (tls.verify.kind === 'enabled' && !tls.clientCert)) {
      return [null, undefined];
    }

    let ca: Buffer | undefined;
    if (tls.verify.kind === 'bundle') {
      const { path } = tls.verify;
      const [errCa, bundle] = await safeWrapAsync(() => readFile(path));
      if (errCa) {
        return [new TLSError(`error reading CA bundle ${path}`, { cause: errCa }), null];
      }

      ca = bundle;
    }

    let pem: Buffer | undefined;
    if (tls.clientCert) {
      const path = tls.clientCert;
      const [errCert, cert] = await safeWrapAsync(() => readFile(path));
      if (errCert) {
        return [new TLSError(`error reading client certificate ${path}`, { cause: errCert }), null];
      }

      pem = cert;
    }

    this.#agent = new Agent({
      connect: {
        rejectUnauthorized: tls.verify.kind !== 'disabled',
        ...(ca && { ca }),
        ...(pem && { cert: pem, key: pem }),
      },
    });

    return [null, this.#agent];
  }
}
