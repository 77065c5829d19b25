import { type ClientConfig, parseTimeout, resolveClientConfig } from '../config/config.js';
import type { RestClientError } from '../error/restClientError.js';
import { type Logger, noopLogger } from '../logger.js';
import { buildRequest } from '../request/buildRequest.js';
import type { HttpMethod } from '../request/types.js';
import { bind } from '../schema/bind.js';
import { FetchTransport } from '../transport/fetchTransport.js';
import type { AsyncTransport } from '../transport/types.js';
import { mergeSignals } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { bindingFailure, type CallContext, type CallEnd, runSuspending, settle } from './plan.js';
import type { AsyncCallOptions, RestClientProps } from './types.js';

/**
 * Typed REST client that:
 * - builds requests under a fixed base URL with configured headers and credentials,
 * - retries transport failures and retriable statuses with capped exponential backoff,
 * - binds every response body to the shape given at the call site.
 *
 * Calls suspend at network awaits and backoff timers, so many may be in flight at once.
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 *
 * @example
 * const client = new RestClient({ baseUrl: 'https://api.example.com/v1' });
 * const [err, user] = await client.get('/users/7', { response: shape.object({ id: shape.integer() }) });
 */
export class RestClient {
  /** Resolved, frozen configuration */
  #config: ClientConfig;
  /** Transport used for every attempt */
  #transport: AsyncTransport;
  #logger: Logger;
  /** Aborted on dispose, cancelling every call in flight */
  #abortController = new AbortController();

  /**
   * @throws {ConfigurationError} when the configuration is invalid
   */
  constructor({ logger, transport, ...config }: RestClientProps) {
    this.#config = resolveClientConfig(config);
    this.#logger = logger ?? noopLogger;
    this.#transport = transport ?? new FetchTransport();
  }

  /**
   * Cancels calls in flight and releases the transport.
   */
  dispose() {
    this.#abortController.abort();
    this.#transport.dispose();
  }

  get<Output>(path: string, opts: Omit<AsyncCallOptions<Output>, 'body'>): SafeWrapAsync<RestClientError, Output> {
    return this.request('GET', path, opts);
  }

  post<Output>(path: string, opts: AsyncCallOptions<Output>): SafeWrapAsync<RestClientError, Output> {
    return this.request('POST', path, opts);
  }

  put<Output>(path: string, opts: AsyncCallOptions<Output>): SafeWrapAsync<RestClientError, Output> {
    return this.request('PUT', path, opts);
  }

  patch<Output>(path: string, opts: AsyncCallOptions<Output>): SafeWrapAsync<RestClientError, Output> {
    return this.request('PATCH', path, opts);
  }

  delete<Output>(path: string, opts: Omit<AsyncCallOptions<Output>, 'body'>): SafeWrapAsync<RestClientError, Output> {
    return this.request('DELETE', path, opts);
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * build request → attempts with retry → bind response; the first error ends the call.
   */
  async request<Output>(
    method: HttpMethod,
    path: string,
    { query, headers, body, response, timeout = this.#config.timeout, signal }: AsyncCallOptions<Output>,
  ): SafeWrapAsync<RestClientError, Output> {
    const [errTimeout, attemptTimeout] = parseTimeout(timeout);
    if (errTimeout) {
      this.#logger.error('http.request.invalid', { method, path, error: errTimeout.message });
      return [errTimeout, null];
    }

    const [errBuild, spec] = buildRequest(this.#config, { method, path, query, headers, body });
    if (errBuild) {
      this.#logger.error('http.request.invalid', { method, path, error: errBuild.message });
      return [errBuild, null];
    }

    const ctx: CallContext = { spec, policy: this.#config, logger: this.#logger };
    const callSignal = mergeSignals([signal, this.#abortController.signal]);

    let end: CallEnd;
    try {
      end = await runSuspending(
        ctx,
        () => this.#transport.execute(spec, attemptTimeout, callSignal?.signal),
        callSignal?.signal,
      );
    } finally {
      callSignal?.cleanup();
    }

    const [err, settled] = settle(ctx, end);
    if (err) {
      return [err, null];
    }

    const [errBind, data] = await bind(settled.outcome.body, response);
    if (errBind) {
      return [bindingFailure(ctx, errBind, settled.attempts), null];
    }

    return [null, data];
  }
}
