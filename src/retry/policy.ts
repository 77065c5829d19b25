import type { AttemptOutcome } from '../transport/types.js';

/** Retry knobs, taken from the client configuration. */
export interface RetryPolicy {
  /** Retries after the initial attempt; total attempts are `maxRetries + 1` */
  maxRetries: number;
  /** Wait before the first retry, in milliseconds */
  backoffBase: number;
  /** Upper bound of any single wait, in milliseconds */
  backoffCap: number;
  /** Statuses worth retrying; `429` and `5xx` when not given */
  retryStatusCodes?: readonly number[];
}

/** Whether to try again, and how long to wait first. */
export interface RetryDecision {
  retry: boolean;
  wait: number;
}

/**
 * Whether an HTTP status is in the retriable set of the policy.
 */
export function isRetriableStatus(status: number, policy: Pick<RetryPolicy, 'retryStatusCodes'>): boolean {
  if (policy.retryStatusCodes) {
    return policy.retryStatusCodes.includes(status);
  }

  return status === 429 || (status >= 500 && status <= 599);
}

/**
 * Wait after the attempt with the given zero-based index: `backoffBase * 2^attemptIndex`,
 * capped at `backoffCap`.
 */
export function backoffDelay(attemptIndex: number, policy: Pick<RetryPolicy, 'backoffBase' | 'backoffCap'>): number {
  return Math.min(policy.backoffBase * 2 ** attemptIndex, policy.backoffCap);
}

/**
 * Decides what follows an attempt. Pure: the same outcome, index and policy always
 * give the same decision.
 */
export function decide(outcome: AttemptOutcome, attemptIndex: number, policy: RetryPolicy): RetryDecision {
  const eligible =
    outcome.type === 'transport-failure' || (outcome.type === 'http-error' && isRetriableStatus(outcome.status, policy));

  if (!eligible || attemptIndex >= policy.maxRetries) {
    return { retry: false, wait: 0 };
  }

  return { retry: true, wait: backoffDelay(attemptIndex, policy) };
}
