/**
 * Root entrypoint: re-exports the client, configuration, transport types and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client for the Qizx REST API.
 */
export { QizxClient } from './core/client.js';
export type {
  CallOptions,
  CreateClientOptions,
  EvalOptions,
  GetOptions,
  QizxClientProps,
  QueryItem,
  QueryResult,
  XmlNode,
} from './core/types.js';

/**
 * Connection settings and config file resolution.
 */
export { ConfigResolver, type ConfigResolverOptions } from './config/resolver.js';
export { createConnectionConfig } from './config/connection.js';
export { CONFIG_FILE_NAME, type ConnectionConfig, DEFAULT_SECTION, type TlsVerify } from './config/types.js';

/**
 * Default transport and the contract for custom ones.
 */
export { FetchTransport } from './fetch/client.js';
export type {
  HeaderOptions,
  TransportDefinition,
  TransportOptions,
  TransportProvider,
  TransportRequestOptions,
  TransportResponse,
} from './types/request.js';

/**
 * Query parameter types.
 */
export type { BindValue, BindVariables, CountingMode, OutputFormat } from './request/types.js';

/**
 * Logger surface accepted by the client.
 */
export { createLogger, type Logger } from './utils/logger.js';

/**
 * Tuple results returned by every fallible call.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * Error classes and helpers.
 */
export * from './error/index.js';
