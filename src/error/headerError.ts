import { RestClientError } from './restClientError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request header has an invalid name or value.
 */
export class HeaderError extends RestClientError {
  /** HeaderError error-name */
  name = 'HeaderError';
  /** Internal header name that was rejected */
  #header: string;

  /** Creates a new instance of a HeaderError for the rejected header */
  constructor(message: string, header: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#header = header;
  }

  /** Name of the rejected header */
  get header(): string {
    return this.#header;
  }
}

/**
 * Type guard for {@link HeaderError}.
 */
export function isHeaderError(error: unknown): error is HeaderError {
  return error instanceof HeaderError;
}

/**
 * Extract a {@link HeaderError} from an unknown error value, following nested causes.
 */
export function getHeaderError(error: unknown): null | HeaderError {
  return unwrapErrorType(HeaderError, error);
}
