import { RestClientError } from './restClientError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a connection could not be established or was reset.
 */
export class NetworkError extends RestClientError {
  /** NetworkError error-name */
  name = 'NetworkError';

  /**
   * System error code of the underlying failure (e.g. `ECONNREFUSED`), when the
   * runtime reported one anywhere in the cause chain.
   */
  get code(): string | null {
    const seen = new Set<unknown>();
    let current: unknown = this.cause;
    while (current instanceof Error && !seen.has(current)) {
      if ('code' in current && typeof current.code === 'string') {
        return current.code;
      }

      seen.add(current);
      current = current.cause;
    }

    return null;
  }
}

/**
 * Type guard for {@link NetworkError}.
 */
export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

/**
 * Extract a {@link NetworkError} from an unknown error value, following nested causes.
 */
export function getNetworkError(error: unknown): null | NetworkError {
  return unwrapErrorType(NetworkError, error);
}
