/**
 * Core entrypoint: exports the client and its option and result types.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Client for the Qizx REST API, returning error-first tuples via {@link SafeWrapAsync}.
 */
export { QizxClient } from './client.js';

/**
 * Helpers interpreting response bodies, for custom transports and tooling.
 */
export { interpretError, isErrorResponse, QIZX_ERROR_MIME } from './response.js';

export type {
  CallOptions,
  CreateClientOptions,
  EvalOptions,
  GetOptions,
  QizxClientProps,
  QueryItem,
  QueryResult,
  XmlNode,
} from './types.js';
