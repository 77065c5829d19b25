import type { RequestSpec } from '../request/types.js';

/** Why an attempt produced no response at all. */
export type TransportFailureReason = 'timeout' | 'network';

/** Response with a 2xx status. */
export interface SuccessOutcome {
  type: 'success';
  status: number;
  headers: Headers;
  body: Uint8Array;
}

/** Response with any other status. */
export interface HttpErrorOutcome {
  type: 'http-error';
  status: number;
  headers: Headers;
  body: Uint8Array;
}

/** No response: the attempt timed out or the connection failed. */
export interface TransportFailureOutcome {
  type: 'transport-failure';
  reason: TransportFailureReason;
  cause: Error;
}

/** Result of a single transport attempt. */
export type AttemptOutcome = SuccessOutcome | HttpErrorOutcome | TransportFailureOutcome;

/** Performs one HTTP exchange, blocking the calling thread until it settles. */
export interface SyncTransport {
  execute(spec: RequestSpec, timeout: number): AttemptOutcome;
  dispose(): void;
}

/** Performs one HTTP exchange without blocking. */
export interface AsyncTransport {
  execute(spec: RequestSpec, timeout: number, signal?: AbortSignal): Promise<AttemptOutcome>;
  dispose(): void;
}

/**
 * Classifies a received response purely by status.
 */
export function classifyResponse(status: number, headers: Headers, body: Uint8Array): SuccessOutcome | HttpErrorOutcome {
  if (status >= 200 && status < 300) {
    return { type: 'success', status, headers, body };
  }

  return { type: 'http-error', status, headers, body };
}
