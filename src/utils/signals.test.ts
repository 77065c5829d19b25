import { getEventListeners } from 'node:events';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { CancelledError } from '../error/cancelledError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('aborts after the configured timeout with a TimeoutError', async () => {
    vi.useFakeTimers();
    const { signal } = createTimeoutSignal(50);

    expect(signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(50);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(TimeoutError);
    expect(signal.reason).toHaveProperty('message', 'error request timed out after 50ms');
  });

  it('never aborts once cleared', async () => {
    vi.useFakeTimers();
    const { signal, clear } = createTimeoutSignal(50);

    clear();
    await vi.advanceTimersByTimeAsync(100);

    expect(signal.aborted).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('creates independent signals for separate invocations', () => {
    vi.useFakeTimers();

    const first = createTimeoutSignal(10);
    const second = createTimeoutSignal(20);

    vi.advanceTimersByTime(15);

    expect(first.signal.aborted).toBe(true);
    expect(second.signal.aborted).toBe(false);
  });
});

describe('mergeSignals', () => {
  it('returns null when no signals are provided', () => {
    expect(mergeSignals([])).toBeNull();
    expect(mergeSignals([null, undefined])).toBeNull();
  });

  it('returns the single active signal when only one is provided', () => {
    const controller = new AbortController();
    expect(mergeSignals([controller.signal, null])?.signal).toBe(controller.signal);
  });

  it('propagates aborts and preserves the provided reason', () => {
    const controllerA = new AbortController();
    const controllerB = new AbortController();

    const merged = mergeSignals([controllerA.signal, controllerB.signal]);

    const abortReason = new CancelledError('external abort');
    controllerB.abort(abortReason);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(abortReason);
  });

  it('immediately aborts when merging an already-aborted signal', () => {
    const controller = new AbortController();
    const reason = new Error('existing abort');
    controller.abort(reason);

    const merged = mergeSignals([controller.signal, new AbortController().signal]);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(reason);
  });

  it('stops listening to the sources after aborting', () => {
    const sourceA = new AbortController();
    const sourceB = new AbortController();
    const removeA = vi.spyOn(sourceA.signal, 'removeEventListener');
    const removeB = vi.spyOn(sourceB.signal, 'removeEventListener');

    const merged = mergeSignals([sourceA.signal, sourceB.signal]);
    sourceA.abort(new Error('reason A'));

    expect(merged?.signal.aborted).toBe(true);
    expect(removeA).toHaveBeenCalledWith('abort', expect.any(Function));
    expect(removeB).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('detaches from the sources on cleanup', () => {
    const shutdown = new AbortController();
    const deadline = new AbortController();

    for (let i = 0; i < 20; i++) {
      mergeSignals([shutdown.signal, deadline.signal])?.cleanup();
    }

    expect(getEventListeners(shutdown.signal, 'abort')).toHaveLength(0);
    expect(getEventListeners(deadline.signal, 'abort')).toHaveLength(0);
  });

  it('no longer follows the sources after cleanup', () => {
    const source = new AbortController();
    const merged = mergeSignals([source.signal, new AbortController().signal]);

    merged?.cleanup();
    source.abort(new Error('late'));

    expect(merged?.signal.aborted).toBe(false);
  });
});
