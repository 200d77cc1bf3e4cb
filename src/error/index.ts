/**
 * Error entrypoint: exports the typed client errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a request is aborted via AbortController. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error payload schema and type. */
export { type ApiError, apiErrorSchema } from './apiError.js';
/** Error raised when the backend rejects a call. */
export { BackendError, getBackendError, isBackendError } from './backendError.js';
/** Error raised when logging in fails. */
export { ConnectionError, getConnectionError, isConnectionError } from './connectionError.js';
/** Error representing an error constructing a URL. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Base class of every error an operation raises. */
export { DmartError, type DmartErrorOptions, type ErrorKind, getDmartError, isDmartError } from './dmartError.js';
/** Error representing a non-200 HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error raised when the backend could not be reached or its response decoded. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Error raised when an authenticated call is made without a token. */
export { getUnauthenticatedError, isUnauthenticatedError, UnauthenticatedError } from './unauthenticatedError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of identifiers or payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
