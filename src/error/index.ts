/**
 * Error entrypoint: exports the client error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the clients.
 * @module
 */

/** Error thrown by client constructors for invalid configuration. */
export { type ConfigurationIssue, ConfigurationError, isConfigurationError } from './configurationError.js';
/** Error raised when a call is aborted or its client disposed. */
export { CancelledError, getCancelledError, isCancelledError } from './cancelledError.js';
/** Error representing a path that cannot be resolved under the base URL. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error raised when a request body cannot be serialized. */
export { EncodingError, getEncodingError, isEncodingError } from './encodingError.js';
/** Error raised when a request header has an invalid name or value. */
export { getHeaderError, HeaderError, isHeaderError } from './headerError.js';
/** Error representing a non-2xx HTTP response. */
export {
  getHttpStatusError,
  type HttpStatusErrorResponse,
  HttpStatusError,
  isHttpStatusError,
} from './httpStatusError.js';
/** Generic check that matches an error constructor anywhere in a cause chain. */
export { isErrorType } from './isErrorType.js';
/** Error raised when a connection fails or is reset. */
export { getNetworkError, isNetworkError, NetworkError } from './networkError.js';
/** Base class of every error a call returns. */
export {
  getRestClientError,
  isRestClientError,
  RestClientError,
  type RestClientErrorOptions,
} from './restClientError.js';
/** Error raised when an attempt exceeds its timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error raised when a response does not match its declared shape. */
export { getValidationError, isValidationError, ValidationError, type ValidationErrorDetail } from './validationError.js';
