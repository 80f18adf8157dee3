/**
 * Error entrypoint: exports the typed client errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a request is aborted via AbortController or client disposal. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, getAbortError, isAbortError } from './abortError.js';
/** Error for connection targets that look like neither a URL nor a section name. */
export { AmbiguousTargetError, isAmbiguousTargetError } from './ambiguousTargetError.js';
/** Error for configured certificate files that do not exist. */
export { CertificateNotFoundError, isCertificateNotFoundError } from './certificateNotFoundError.js';
/** Error raised when no config file could be found. */
export { ConfigNotFoundError, isConfigNotFoundError } from './configNotFoundError.js';
/** Error raised for malformed config files. */
export { ConfigParseError, isConfigParseError } from './configParseError.js';
/** Error raised when the server cannot be reached. */
export { ConnectionError, getConnectionError, isConnectionError } from './connectionError.js';
/** Error raised for invalid caller input, before any network call. */
export { getInvalidRequestError, InvalidRequestError, isInvalidRequestError } from './invalidRequestError.js';
/** Error representing an unparseable or non-http(s) endpoint URL. */
export { getInvalidURLError, InvalidURLError, isInvalidURLError } from './invalidUrlError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when a config section has no url. */
export { isMissingURLError, MissingURLError } from './missingUrlError.js';
/** Error reported by the database, carrying its code and message. */
export { getQueryExecutionError, isQueryExecutionError, QueryExecutionError } from './queryExecutionError.js';
/** Error raised when the config file lacks the requested section. */
export { isSectionNotFoundError, SectionNotFoundError } from './sectionNotFoundError.js';
/** Error raised when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error raised when the TLS handshake fails or TLS material cannot be loaded. */
export { getTLSError, isTLSError, TLSError } from './tlsError.js';
/** Generic transport failure, with the raw status and body when a response was received. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Error raised when a successful response has an unexpected shape. */
export { isUnexpectedResponseError, UnexpectedResponseError } from './unexpectedResponseError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
