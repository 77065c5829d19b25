import { TimeoutError } from '../error/timeoutError.js';
import { attemptHeaders } from '../request/headers.js';
import type { RequestSpec } from '../request/types.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { safeWrapAsync } from '../utils/wrap.js';
import { type AsyncTransport, type AttemptOutcome, classifyResponse } from './types.js';

/**
 * Non-blocking transport on top of the native `fetch` API.
 *
 * - Each attempt gets its own deadline, merged with the caller's signal.
 * - Responses are classified by status only; bodies are read as raw bytes.
 * - `dispose()` aborts every attempt still in flight.
 */
export class FetchTransport implements AsyncTransport {
  /** Aborted on dispose */
  #disposed = new AbortController();

  async execute(spec: RequestSpec, timeout: number, signal?: AbortSignal): Promise<AttemptOutcome> {
    const deadline = createTimeoutSignal(timeout);
    const merged = mergeSignals([deadline.signal, signal, this.#disposed.signal]) ?? {
      signal: deadline.signal,
      cleanup: () => {},
    };

    try {
      const [err, res] = await safeWrapAsync(() =>
        fetch(spec.url, {
          method: spec.method,
          headers: attemptHeaders(spec),
          body: spec.body,
          signal: merged.signal,
        }),
      );
      if (err) {
        return this.#failure(err, merged.signal);
      }

      const [errBody, buffer] = await safeWrapAsync(() => res.arrayBuffer());
      if (errBody) {
        return this.#failure(errBody, merged.signal);
      }

      return classifyResponse(res.status, res.headers, new Uint8Array(buffer));
    } finally {
      deadline.clear();
      merged.cleanup();
    }
  }

  dispose(): void {
    this.#disposed.abort();
  }

  /**
   * A deadline abort is a timeout; anything else, caller aborts included, counts as a
   * network failure. Callers check their own signal to tell cancellation apart.
   */
  #failure(err: Error, signal: AbortSignal): AttemptOutcome {
    if (signal.aborted && signal.reason instanceof TimeoutError) {
      return { type: 'transport-failure', reason: 'timeout', cause: signal.reason };
    }

    return { type: 'transport-failure', reason: 'network', cause: err };
  }
}
