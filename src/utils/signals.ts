import { CancelledError } from '../error/cancelledError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Signal that aborts after a deadline, with a handle to stop the timer early. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Stops the timer; call once the guarded work settled. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after
 * `timeoutMs` milliseconds.
 */
export function createTimeoutSignal(timeoutMs: number): TimeoutSignal {
  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/** Merged signal with a handle to detach it from its sources. */
export interface MergedSignal {
  signal: AbortSignal;
  /** Removes the listeners on the sources; call once the guarded work settled. */
  cleanup: () => void;
}

const noop = () => {};

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort.
 * - The abort `reason` of the source is kept, a source without one aborts
 *   with a {@link CancelledError}.
 *
 * Sources outlive the merged signal, so `cleanup` must run on every exit path.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active: AbortSignal[] = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  const [first] = active;
  if (!first) {
    return null;
  }

  if (active.length === 1) {
    return { signal: first, cleanup: noop };
  }

  const controller = new AbortController();
  const listeners: (() => void)[] = [];
  const cleanup = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  const abortFrom = (source: AbortSignal) => {
    cleanup();
    if (source.reason !== undefined) {
      controller.abort(source.reason);
      return;
    }

    controller.abort(new CancelledError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, cleanup };
}
