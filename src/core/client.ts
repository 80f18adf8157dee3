import { ConfigResolver } from '../config/resolver.js';
import { type ConnectionConfig, DEFAULT_SECTION } from '../config/types.js';
import { AbortError } from '../error/abortError.js';
import { TransportError } from '../error/transportError.js';
import { FetchTransport } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import {
  buildEvalRequest,
  buildGetRequest,
  buildInfoRequest,
  buildListLibrariesRequest,
} from '../request/builder.js';
import type { HeaderOptions, HttpRequest, TransportDefinition } from '../types/request.js';
import { getResponseData, type ResponseData } from '../utils/getResponseData.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { classifyNetworkError } from '../utils/networkError.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import {
  decodeDocument,
  decodeItems,
  decodeLibraries,
  decodeProperties,
  interpretError,
  isErrorResponse,
} from './response.js';
import type {
  CallOptions,
  CreateClientOptions,
  EvalOptions,
  GetOptions,
  QizxClientProps,
  QueryItem,
  QueryResult,
} from './types.js';

/**
 * Client for the Qizx REST API that:
 * - builds requests from a resolved {@link ConnectionConfig},
 * - sends them through a pluggable transport with a per-call timeout,
 * - maps error payloads and network failures onto typed errors,
 * - decodes XML results.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}. Returned errors are always
 * one of the client's error classes; the underlying failure, if any, is their `cause`.
 *
 * @example
 * const [errClient, client] = await QizxClient.create('prod');
 * const [err, result] = await client.eval('count(//book)', { format: 'items' });
 */
export class QizxClient {
  /** Endpoint, credentials and TLS policy */
  #connection: ConnectionConfig;
  /** Transport instance, bound to the connection's TLS policy */
  #transport: TransportDefinition;
  /** Headers applied to every request (merged with per-call headers) */
  #headers: HeaderOptions;
  /** Default request timeout in milliseconds */
  #timeout: number | false;
  /** Logger */
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController = new AbortController();

  /**
   * Resolves `target` (a section name or an `http(s)` URL) and creates a client for it.
   *
   * @param target - Config section or literal URL, `qizx` by default.
   * @param options - Client options and config file lookup overrides.
   */
  static async create(
    target: string = DEFAULT_SECTION,
    options: CreateClientOptions = {},
  ): SafeWrapAsync<Error, QizxClient> {
    const { configPath, homeDir, cwd, ...props } = options;
    const logger = props.logger ?? createLogger('client');

    const resolver = new ConfigResolver({ configPath, homeDir, cwd, logger });
    const [errResolve, connection] = await resolver.resolve(target);
    if (errResolve) {
      return [errResolve, null];
    }

    return [null, new QizxClient({ ...props, logger, connection })];
  }

  /**
   * Creates a client for an already resolved connection.
   *
   * @param props - Connection and client options.
   */
  constructor({ connection, transportProvider = FetchTransport, headers, timeout = 60_000, logger }: QizxClientProps) {
    this.#connection = connection;
    this.#headers = headers ?? {};
    this.#timeout = timeout;
    this.#logger = logger ?? createLogger('client');

    const secure = new URL(connection.endpoint).protocol === 'https:';
    if (secure && connection.tlsVerify.kind === 'disabled') {
      this.#logger.warn('tls certificate verification is disabled', { endpoint: connection.endpoint });
    }

    this.#transport = new transportProvider({
      ...(secure && { tls: { verify: connection.tlsVerify, clientCert: connection.clientCert } }),
    });
  }

  /** Connection this client talks to. */
  get connection(): ConnectionConfig {
    return this.#connection;
  }

  /**
   * Evaluates a query expression.
   *
   * - `raw: true` returns the body bytes unchanged.
   * - `format: 'items'` decodes each item by its type (`boolean`, `integer`, `double`,
   *   `dateTime`, `element()`), except with `mode: 'profile'`, which returns a document.
   * - Anything else is parsed as XML: one document, a sequence of nodes, or atomic text.
   *
   * @param expression - Query expression, sent as-is.
   * @param options - Query parameters, bind variables and call options.
   */
  async eval(expression: string, options: EvalOptions = {}): SafeWrapAsync<Error, QueryResult> {
    const { raw, signal, timeout, headers, ...request } = options;

    const [errBuild, httpRequest] = await buildEvalRequest(
      this.#connection,
      { ...request, expression },
      mergeHeaderOptions(this.#headers, headers),
    );
    if (errBuild) {
      return [errBuild, null];
    }

    const [errSend, data] = await this.#send('eval', httpRequest, { signal, timeout });
    if (errSend) {
      return [errSend, null];
    }

    if (raw) {
      return [null, { kind: 'raw', payload: data.body }];
    }

    if (request.format === 'items' && request.mode !== 'profile') {
      const [errItems, items] = decodeItems(data);
      if (errItems) {
        return [errItems, null];
      }

      return [null, { kind: 'items', items }];
    }

    const [errDocument, document] = decodeDocument(data);
    if (errDocument) {
      return [errDocument, null];
    }

    return [null, { kind: 'document', document }];
  }

  /**
   * Retrieves the content of one document.
   *
   * @param path - Document path inside the library.
   * @param options - Library override and call options.
   */
  async get(path: string, options: GetOptions = {}): SafeWrapAsync<Error, string> {
    const { library, headers, ...callOptions } = options;

    const [errBuild, httpRequest] = await buildGetRequest(
      this.#connection,
      { path, library },
      mergeHeaderOptions(this.#headers, headers),
    );
    if (errBuild) {
      return [errBuild, null];
    }

    const [errSend, data] = await this.#send('get', httpRequest, callOptions);
    if (errSend) {
      return [errSend, null];
    }

    return [null, data.text];
  }

  /**
   * Reads the server information properties, e.g. the product version.
   */
  async info(options: CallOptions = {}): SafeWrapAsync<Error, Record<string, QueryItem>> {
    const { headers, ...callOptions } = options;

    const httpRequest = buildInfoRequest(this.#connection, mergeHeaderOptions(this.#headers, headers));
    const [errSend, data] = await this.#send('info', httpRequest, callOptions);
    if (errSend) {
      return [errSend, null];
    }

    return decodeProperties(data);
  }

  /**
   * Lists the libraries of the database.
   */
  async listLibraries(options: CallOptions = {}): SafeWrapAsync<Error, string[]> {
    const { headers, ...callOptions } = options;

    const httpRequest = buildListLibrariesRequest(this.#connection, mergeHeaderOptions(this.#headers, headers));
    const [errSend, data] = await this.#send('listlib', httpRequest, callOptions);
    if (errSend) {
      return [errSend, null];
    }

    return decodeLibraries(data);
  }

  /**
   * Aborts in-flight requests and releases the transport.
   * Later calls fail with an {@link AbortError}.
   */
  async dispose(): SafeWrapAsync<Error, true> {
    if (!this.#abortController.signal.aborted) {
      this.#abortController.abort(new AbortError('error client was disposed'));
    }

    const transport = this.#transport;
    const [errDispose] = await safeWrapAsync(async () => transport.dispose?.());
    if (errDispose) {
      return [new TransportError('error disposing transport', null, null, { cause: errDispose }), null];
    }

    return [null, true];
  }

  /**
   * Sends one request and reads its body.
   *
   * - Merges the caller's signal, the timeout and the client's dispose signal.
   * - Maps transport failures through {@link classifyNetworkError}.
   * - Turns error statuses and error payloads into typed errors.
   */
  async #send(
    operation: string,
    request: HttpRequest,
    { signal: callerSignal, timeout = this.#timeout }: Pick<CallOptions, 'signal' | 'timeout'>,
  ): SafeWrapAsync<Error, ResponseData> {
    const disposeSignal = this.#abortController.signal;
    if (disposeSignal.aborted) {
      return [new AbortError('error client was disposed', { cause: disposeSignal.reason }), null];
    }

    if (callerSignal?.aborted) {
      return [new AbortError('error request aborted before sending', { cause: callerSignal.reason }), null];
    }

    const timeoutSignal = createTimeoutSignal(timeout);
    const merged = mergeSignals([callerSignal, timeoutSignal.signal, disposeSignal]);
    const release = () => {
      merged.release();
      timeoutSignal.release();
    };
    const transportOptions = { headers: request.headers, ...(merged.signal && { signal: merged.signal }) };
    const started = Date.now();

    const transport = this.#transport;
    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      request.method === 'GET'
        ? transport.get(request.url, transportOptions)
        : transport.post(request.url, { ...transportOptions, body: request.body }),
    );
    if (errWrapped) {
      release();
      return [this.#classify(operation, errWrapped, callerSignal, started), null];
    }

    const [errTransport, response] = wrapped;
    if (errTransport) {
      release();
      return [this.#classify(operation, errTransport, callerSignal, started), null];
    }

    const [errRead, data] = await getResponseData(response);
    release();
    if (errRead) {
      const classified = classifyNetworkError(errRead.cause);
      return [classified instanceof TransportError ? errRead : classified, null];
    }

    this.#logger.debug('request completed', { operation, status: data.status, durationMs: Date.now() - started });

    if (isErrorResponse(data)) {
      return [interpretError(data), null];
    }

    return [null, data];
  }

  /** Aborts that surface as anything but a timeout are reported as {@link AbortError}. */
  #classify(operation: string, error: Error, callerSignal: AbortSignal | undefined, started: number): Error {
    const classified = classifyNetworkError(error);
    const aborted = Boolean(callerSignal?.aborted) || this.#abortController.signal.aborted;
    const result =
      aborted && classified instanceof TransportError ? new AbortError('error request aborted', { cause: error }) : classified;

    this.#logger.debug('request failed', { operation, error: result.name, durationMs: Date.now() - started });
    return result;
  }
}
