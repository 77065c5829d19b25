import { unwrapErrorType } from './unwrapErrorType.js';

/** Options accepted by every {@link RestClientError}. */
export interface RestClientErrorOptions extends ErrorOptions {
  /** Number of transport attempts made before the error was surfaced. */
  attempts?: number;
}

/**
 * Base class of every error a REST client call can return.
 * The original cause (network error, validation issue, ...) is kept on `cause`.
 */
export class RestClientError extends Error {
  /** RestClientError error-name */
  name = 'RestClientError';
  /** Internal attempts tried before the error was surfaced */
  #attempts: number;

  /** Creates a new instance of a RestClientError with the attempts made so far */
  constructor(message: string, opts?: RestClientErrorOptions) {
    super(message, opts);
    this.#attempts = opts?.attempts ?? 0;
  }

  /** Attempts tried before the error was surfaced, 0 when no request was sent */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Type guard for {@link RestClientError}.
 */
export function isRestClientError(error: unknown): error is RestClientError {
  return error instanceof RestClientError;
}

/**
 * Extract an {@link RestClientError} from an unknown error value, following nested causes.
 */
export function getRestClientError(error: unknown): null | RestClientError {
  return unwrapErrorType(RestClientError, error);
}
