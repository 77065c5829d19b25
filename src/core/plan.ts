import { CancelledError } from '../error/cancelledError.js';
import { HttpStatusError } from '../error/httpStatusError.js';
import { NetworkError } from '../error/networkError.js';
import type { RestClientError } from '../error/restClientError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { ValidationError } from '../error/validationError.js';
import type { Logger } from '../logger.js';
import type { RequestSpec } from '../request/types.js';
import { decide, type RetryPolicy } from '../retry/policy.js';
import type { AttemptOutcome, SuccessOutcome } from '../transport/types.js';
import { sleep, sleepSync } from '../utils/sleep.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Attempt the plan asks for next, and how long to wait before it. */
export interface PlannedAttempt {
  /** Zero-based attempt index */
  index: number;
  /** Milliseconds to wait before the attempt */
  wait: number;
}

/** Last outcome of a plan that ran to completion. */
export interface PlanSettled {
  outcome: AttemptOutcome;
  attempts: number;
}

/** How a driven plan ended. */
export type CallEnd = ({ type: 'settled' } & PlanSettled) | { type: 'cancelled'; attempts: number; reason: unknown };

/** Successful response together with the attempts it took. */
export interface SettledResponse {
  outcome: SuccessOutcome;
  attempts: number;
}

/** Everything a driver needs besides the transport. */
export interface CallContext {
  spec: RequestSpec;
  policy: RetryPolicy;
  logger: Logger;
}

/**
 * Retry loop of a single call, free of any I/O. Yields the attempts to make and is
 * resumed with each attempt's outcome; returns the outcome that ended the loop.
 */
export function* callPlan(policy: RetryPolicy): Generator<PlannedAttempt, PlanSettled, AttemptOutcome> {
  let wait = 0;
  for (let index = 0; ; index += 1) {
    const outcome = yield { index, wait };
    const decision = decide(outcome, index, policy);
    if (!decision.retry) {
      return { outcome, attempts: index + 1 };
    }

    wait = decision.wait;
  }
}

function requestMeta({ spec }: CallContext) {
  return { method: spec.method, url: spec.url };
}

/**
 * Drives a call plan on the calling thread: blocking attempts, blocking backoff.
 * `signal` is checked before every attempt.
 */
export function runBlocking(ctx: CallContext, execute: () => AttemptOutcome, signal?: AbortSignal): CallEnd {
  const plan = callPlan(ctx.policy);

  for (let step = plan.next(); ; ) {
    if (step.done) {
      return { type: 'settled', ...step.value };
    }

    const { index, wait } = step.value;
    if (index > 0) {
      ctx.logger.warn('http.request.retry', { ...requestMeta(ctx), attempt: index + 1, waitMs: wait });
      sleepSync(wait);
    }

    if (signal?.aborted) {
      return { type: 'cancelled', attempts: index, reason: signal.reason };
    }

    ctx.logger.debug('http.request.attempt', { ...requestMeta(ctx), attempt: index + 1 });
    step = plan.next(execute());
  }
}

/**
 * Drives a call plan without blocking. `signal` is checked before every attempt and
 * every wait, and once more when an attempt settles; an abort cuts a running wait short.
 */
export async function runSuspending(
  ctx: CallContext,
  execute: () => Promise<AttemptOutcome>,
  signal?: AbortSignal,
): Promise<CallEnd> {
  const plan = callPlan(ctx.policy);

  for (let step = plan.next(); ; ) {
    if (step.done) {
      return { type: 'settled', ...step.value };
    }

    const { index, wait } = step.value;
    if (index > 0) {
      if (signal?.aborted) {
        return { type: 'cancelled', attempts: index, reason: signal.reason };
      }

      ctx.logger.warn('http.request.retry', { ...requestMeta(ctx), attempt: index + 1, waitMs: wait });
      await sleep(wait, signal);
    }

    if (signal?.aborted) {
      return { type: 'cancelled', attempts: index, reason: signal.reason };
    }

    ctx.logger.debug('http.request.attempt', { ...requestMeta(ctx), attempt: index + 1 });
    const outcome = await execute();
    if (signal?.aborted) {
      return { type: 'cancelled', attempts: index + 1, reason: signal.reason };
    }

    step = plan.next(outcome);
  }
}

/**
 * Turns the end of a call into the response to bind, or into the terminal error built
 * from the last outcome.
 */
export function settle(ctx: CallContext, end: CallEnd): SafeWrap<RestClientError, SettledResponse> {
  const { spec, logger } = ctx;
  const { attempts } = end;

  if (end.type === 'cancelled') {
    logger.info('http.request.cancelled', { ...requestMeta(ctx), attempts });
    return [new CancelledError(`error ${spec.method} ${spec.url} cancelled`, { cause: end.reason, attempts }), null];
  }

  const { outcome } = end;
  switch (outcome.type) {
    case 'success':
      logger.debug('http.request.success', { ...requestMeta(ctx), status: outcome.status, attempts });
      return [null, { outcome, attempts }];
    case 'http-error': {
      const error = new HttpStatusError(outcome, `error ${spec.method} ${spec.url} responded with ${outcome.status}`, {
        attempts,
      });
      logger.error('http.request.failed', { ...requestMeta(ctx), attempts, status: outcome.status, body: error.text() });
      return [error, null];
    }
    case 'transport-failure': {
      logger.error('http.request.failed', {
        ...requestMeta(ctx),
        attempts,
        reason: outcome.reason,
        error: outcome.cause.message,
      });

      if (outcome.reason === 'timeout') {
        return [new TimeoutError(`error ${spec.method} ${spec.url} timed out`, { cause: outcome.cause, attempts }), null];
      }

      return [new NetworkError(`error ${spec.method} ${spec.url} failed`, { cause: outcome.cause, attempts }), null];
    }
  }
}

/**
 * Re-raises a binding failure with the request and attempts it belongs to.
 */
export function bindingFailure(ctx: CallContext, err: ValidationError, attempts: number): ValidationError {
  const { spec, logger } = ctx;
  logger.error('http.response.invalid', {
    ...requestMeta(ctx),
    fieldPath: err.fieldPath,
    expected: err.expected,
    actual: err.actual,
  });

  return new ValidationError(
    `error binding response of ${spec.method} ${spec.url}`,
    { fieldPath: err.fieldPath, expected: err.expected, actual: err.actual, issues: err.issues },
    { cause: err, attempts },
  );
}
