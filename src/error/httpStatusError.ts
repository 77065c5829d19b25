import { safeWrap, type SafeWrap } from '../utils/wrap.js';
import { type RestClientErrorOptions, RestClientError } from './restClientError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Response details carried by an {@link HttpStatusError}. */
export interface HttpStatusErrorResponse {
  /** HTTP status code of the response */
  status: number;
  /** Response headers */
  headers: Headers;
  /** Raw response body */
  body: Uint8Array;
}

/**
 * Error representing an HTTP response with a non-2xx status code.
 */
export class HttpStatusError extends RestClientError {
  /** HttpStatusError error-name */
  name = 'HttpStatusError';
  /** HTTP status code of the response */
  readonly status: number;
  /** Response headers */
  readonly headers: Headers;
  /** Raw response body */
  readonly body: Uint8Array;

  /** Creates a new instance of a HttpStatusError with defaulting message + response to wrap */
  constructor(
    response: HttpStatusErrorResponse,
    message: string = `HTTP Error: ${response.status}`,
    opts?: RestClientErrorOptions,
  ) {
    super(message, opts);
    this.status = response.status;
    this.headers = response.headers;
    this.body = response.body;
  }

  /** Response body decoded as UTF-8 text. */
  text(): string {
    return new TextDecoder().decode(this.body);
  }

  /** Response body parsed as JSON, error-first. */
  json(): SafeWrap<Error, unknown> {
    const [err, parsed] = safeWrap((): unknown => JSON.parse(this.text()));
    if (err) {
      return [new Error('error parsing json body of HttpStatusError', { cause: err }), null];
    }

    return [null, parsed];
  }
}

/**
 * Type guard for {@link HttpStatusError}.
 */
export function isHttpStatusError(error: unknown): error is HttpStatusError {
  return error instanceof HttpStatusError;
}

/**
 * Extract an {@link HttpStatusError} from an unknown error value, following nested causes.
 */
export function getHttpStatusError(error: unknown): null | HttpStatusError {
  return unwrapErrorType(HttpStatusError, error);
}
