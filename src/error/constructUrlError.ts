import { RestClientError } from './restClientError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a path that could not be turned into a URL under the base URL.
 */
export class ConstructURLError extends RestClientError {
  /** ConstructURLError error-name */
  name = 'ConstructURLError';
  /** Internal URL for what it looked like */
  #url: string;

  /** Creates a new instance of a ConstructURLError with accompanying URL input */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** The path or URL that was rejected */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract an {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return error instanceof ConstructURLError;
}
