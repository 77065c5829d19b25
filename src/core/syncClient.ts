import { type ClientConfig, parseTimeout, resolveClientConfig } from '../config/config.js';
import type { RestClientError } from '../error/restClientError.js';
import { type Logger, noopLogger } from '../logger.js';
import { buildRequest } from '../request/buildRequest.js';
import type { HttpMethod } from '../request/types.js';
import { bindSync } from '../schema/bind.js';
import type { SyncTransport } from '../transport/types.js';
import { WorkerSyncTransport } from '../transport/workerTransport.js';
import type { SafeWrap } from '../utils/wrap.js';
import { bindingFailure, type CallContext, runBlocking, settle } from './plan.js';
import type { CallOptions, SyncRestClientProps } from './types.js';

/**
 * Blocking counterpart of {@link RestClient}. Every call, backoff included, runs on
 * the calling thread; the network exchange itself happens on a worker thread the
 * default transport keeps for the lifetime of the client.
 *
 * Errors and retries behave exactly as on {@link RestClient}. Calls cannot be
 * cancelled; each attempt is bounded by its timeout.
 */
export class SyncRestClient {
  #config: ClientConfig;
  #transport: SyncTransport;
  #logger: Logger;
  #abortController = new AbortController();

  /**
   * @throws {ConfigurationError} when the configuration is invalid
   */
  constructor({ logger, transport, ...config }: SyncRestClientProps) {
    this.#config = resolveClientConfig(config);
    this.#logger = logger ?? noopLogger;
    this.#transport = transport ?? new WorkerSyncTransport();
  }

  /**
   * Releases the transport; later calls end in a {@link CancelledError}.
   */
  dispose() {
    this.#abortController.abort();
    this.#transport.dispose();
  }

  get<Output>(path: string, opts: Omit<CallOptions<Output>, 'body'>): SafeWrap<RestClientError, Output> {
    return this.request('GET', path, opts);
  }

  post<Output>(path: string, opts: CallOptions<Output>): SafeWrap<RestClientError, Output> {
    return this.request('POST', path, opts);
  }

  put<Output>(path: string, opts: CallOptions<Output>): SafeWrap<RestClientError, Output> {
    return this.request('PUT', path, opts);
  }

  patch<Output>(path: string, opts: CallOptions<Output>): SafeWrap<RestClientError, Output> {
    return this.request('PATCH', path, opts);
  }

  delete<Output>(path: string, opts: Omit<CallOptions<Output>, 'body'>): SafeWrap<RestClientError, Output> {
    return this.request('DELETE', path, opts);
  }

  request<Output>(
    method: HttpMethod,
    path: string,
    { query, headers, body, response, timeout = this.#config.timeout }: CallOptions<Output>,
  ): SafeWrap<RestClientError, Output> {
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
    const end = runBlocking(ctx, () => this.#transport.execute(spec, attemptTimeout), this.#abortController.signal);
    const [err, settled] = settle(ctx, end);
    if (err) {
      return [err, null];
    }

    const [errBind, data] = bindSync(settled.outcome.body, response);
    if (errBind) {
      return [bindingFailure(ctx, errBind, settled.attempts), null];
    }

    return [null, data];
  }
}
