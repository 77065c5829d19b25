import { RestClientError } from './restClientError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a call is aborted by the caller's signal, or by disposing the client.
 */
export class CancelledError extends RestClientError {
  /** CancelledError error-name */
  name = 'CancelledError';
}

/**
 * Type guard for {@link CancelledError}.
 */
export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/**
 * Extract a {@link CancelledError} from an unknown error value, following nested causes.
 */
export function getCancelledError(error: unknown): null | CancelledError {
  return unwrapErrorType(CancelledError, error);
}
