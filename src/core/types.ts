import type { ConfigResolverOptions } from '../config/resolver.js';
import type { ConnectionConfig } from '../config/types.js';
import type { EvalRequest } from '../request/types.js';
import type { HeaderOptions, TransportProvider } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { QueryItem, XmlNode } from '../utils/xml.js';

/**
 * Outcome of `eval`:
 * - `raw`: the response body bytes, unchanged
 * - `document`: the parsed XML result, keyed by its top-level element names
 * - `items`: the decoded items of the `items` format
 */
export type QueryResult =
  | { kind: 'raw'; payload: Uint8Array }
  | { kind: 'document'; document: XmlNode }
  | { kind: 'items'; items: QueryItem[] };

/** Options shared by every call. */
export interface CallOptions {
  /** Aborts the request */
  signal?: AbortSignal;
  /** Overrides the client timeout, in milliseconds; `false` disables it */
  timeout?: number | false;
  /** Extra headers, merged over the client headers */
  headers?: HeaderOptions;
}

/** Options of `eval`, on top of the query parameters. */
export interface EvalOptions extends Omit<EvalRequest, 'expression'>, CallOptions {
  /** Return the body as-is instead of parsing it */
  raw?: boolean;
}

/** Options of `get`. */
export interface GetOptions extends CallOptions {
  /** Library holding the document; falls back to the connection's default library */
  library?: string;
}

/** Constructor options of the client. */
export interface QizxClientProps {
  /** Endpoint, credentials and TLS policy */
  connection: ConnectionConfig;
  /** HTTP transport implementation. Defaults to the undici-based `FetchTransport`. */
  transportProvider?: TransportProvider;
  /** Headers added to every request */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /** Logger, defaults to a pino logger for the `client` component */
  logger?: Logger;
}

/** Options of `QizxClient.create`: client options plus where to look for the config file. */
export interface CreateClientOptions
  extends Omit<QizxClientProps, 'connection'>,
    Omit<ConfigResolverOptions, 'logger'> {}

export type { QueryItem, XmlNode };
