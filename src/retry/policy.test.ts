import { describe, expect, it } from 'vitest';
import type { AttemptOutcome } from '../transport/types.js';
import { backoffDelay, decide, isRetriableStatus, type RetryPolicy } from './policy.js';

const policy: RetryPolicy = { maxRetries: 3, backoffBase: 500, backoffCap: 30_000 };

const httpError = (status: number): AttemptOutcome => ({
  type: 'http-error',
  status,
  headers: new Headers(),
  body: new Uint8Array(),
});

describe('isRetriableStatus', () => {
  it('accepts 429 and every 5xx by default', () => {
    expect(isRetriableStatus(429, {})).toBe(true);
    expect(isRetriableStatus(500, {})).toBe(true);
    expect(isRetriableStatus(503, {})).toBe(true);
    expect(isRetriableStatus(599, {})).toBe(true);
  });

  it('rejects other statuses by default', () => {
    expect(isRetriableStatus(400, {})).toBe(false);
    expect(isRetriableStatus(404, {})).toBe(false);
    expect(isRetriableStatus(408, {})).toBe(false);
    expect(isRetriableStatus(600, {})).toBe(false);
  });

  it('uses the configured set when given', () => {
    expect(isRetriableStatus(408, { retryStatusCodes: [408] })).toBe(true);
    expect(isRetriableStatus(503, { retryStatusCodes: [408] })).toBe(false);
  });
});

describe('backoffDelay', () => {
  it('doubles from the base', () => {
    expect([0, 1, 2, 3].map((index) => backoffDelay(index, policy))).toEqual([500, 1000, 2000, 4000]);
  });

  it('never exceeds the cap', () => {
    expect(backoffDelay(6, policy)).toBe(30_000);
    expect(backoffDelay(20, policy)).toBe(30_000);
  });

  it('is non-decreasing', () => {
    const waits = Array.from({ length: 12 }, (_, index) => backoffDelay(index, { backoffBase: 7, backoffCap: 1000 }));
    for (let i = 1; i < waits.length; i += 1) {
      expect(waits[i]).toBeGreaterThanOrEqual(waits[i - 1] ?? 0);
    }
  });
});

describe('decide', () => {
  it('never retries a success', () => {
    const outcome: AttemptOutcome = { type: 'success', status: 200, headers: new Headers(), body: new Uint8Array() };
    expect(decide(outcome, 0, policy)).toEqual({ retry: false, wait: 0 });
  });

  it('does not retry a 404', () => {
    expect(decide(httpError(404), 0, policy)).toEqual({ retry: false, wait: 0 });
  });

  it('retries a 503 with the backoff for the attempt', () => {
    expect(decide(httpError(503), 0, policy)).toEqual({ retry: true, wait: 500 });
    expect(decide(httpError(503), 2, policy)).toEqual({ retry: true, wait: 2000 });
  });

  it('retries transport failures of both kinds', () => {
    const timeout: AttemptOutcome = { type: 'transport-failure', reason: 'timeout', cause: new Error('slow') };
    const network: AttemptOutcome = { type: 'transport-failure', reason: 'network', cause: new Error('refused') };

    expect(decide(timeout, 1, policy)).toEqual({ retry: true, wait: 1000 });
    expect(decide(network, 1, policy)).toEqual({ retry: true, wait: 1000 });
  });

  it('stops once the retries are used up', () => {
    expect(decide(httpError(500), 2, policy).retry).toBe(true);
    expect(decide(httpError(500), 3, policy)).toEqual({ retry: false, wait: 0 });
  });

  it('never retries when maxRetries is zero', () => {
    expect(decide(httpError(500), 0, { ...policy, maxRetries: 0 })).toEqual({ retry: false, wait: 0 });
  });
});
