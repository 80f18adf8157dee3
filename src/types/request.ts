import type { TlsVerify } from '../config/types.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the client and transport; `null` removes a default header. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** HTTP methods used by the Qizx REST API. */
export type HttpMethod = 'GET' | 'POST';

/**
 * Fully specified request, as produced by the request builder.
 * Connection-level settings (TLS) are deliberately absent; they belong to the transport.
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Absolute URL, including the query string for GET requests */
  url: string;
  /** Request headers, including authorization and content type */
  headers: Headers;
  /** Form-encoded body for POST requests */
  body?: string;
}

/** Options for a single transport call. */
export interface TransportRequestOptions {
  /** Headers to send as-is */
  headers: Headers;
  /** Serialized request body */
  body?: string;
  /** Abort signal combining caller, timeout and dispose signals */
  signal?: AbortSignal;
}

/** Minimal response surface the client needs; satisfied by fetch/undici responses. */
export interface TransportResponse {
  /** HTTP status code */
  readonly status: number;
  /** Whether the status is in the 2xx range */
  readonly ok: boolean;
  /** Response headers */
  readonly headers: { get(name: string): string | null };
  /** Reads the whole body as bytes */
  arrayBuffer(): Promise<ArrayBuffer>;
}

/** TLS policy handed to the transport for `https` endpoints. */
export interface TlsOptions {
  /** Server certificate verification policy */
  verify: TlsVerify;
  /** PEM file holding the client certificate and its private key */
  clientCert?: string;
}

/** Options a transport is constructed with. */
export interface TransportOptions {
  /** TLS policy; absent for plain `http` endpoints */
  tls?: TlsOptions;
}

/**
 * Contract for HTTP transports used by the client.
 * Non-2xx responses are returned as responses, not errors; only failures to get a response are errors.
 */
export interface TransportDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<TransportRequestOptions, 'body'>) => SafeWrapAsync<Error, TransportResponse>;
  /** Executes a POST request. */
  post: (url: string, options: TransportRequestOptions) => SafeWrapAsync<Error, TransportResponse>;
  /** Optional lifecycle hook to release resources (e.g., keep-alive agents). */
  dispose?: () => Promise<void>;
}

/** Factory signature for constructing transports. */
export interface TransportProvider {
  /** Creates a new transport bound to one TLS policy */
  new (opts: TransportOptions): TransportDefinition;
}
