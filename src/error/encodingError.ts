import { RestClientError } from './restClientError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request body cannot be serialized for its content type.
 */
export class EncodingError extends RestClientError {
  /** EncodingError error-name */
  name = 'EncodingError';
  /** Content type the body was being serialized for */
  readonly contentType: string;

  /** Creates a new instance of an EncodingError for the given content type */
  constructor(message: string, contentType: string, opts?: ErrorOptions) {
    super(message, opts);
    this.contentType = contentType;
  }
}

/**
 * Type guard for {@link EncodingError}.
 */
export function isEncodingError(error: unknown): error is EncodingError {
  return error instanceof EncodingError;
}

/**
 * Extract an {@link EncodingError} from an unknown error value, following nested causes.
 */
export function getEncodingError(error: unknown): null | EncodingError {
  return unwrapErrorType(EncodingError, error);
}
