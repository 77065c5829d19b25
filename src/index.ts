/**
 * Root entrypoint: re-exports the clients, response shapes, configuration, transports and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Typed REST clients and the options their calls take.
 */
export {
  type AsyncCallOptions,
  type BoundResponse,
  type CallOptions,
  type ClientProps,
  type ResponseSchema,
  RestClient,
  type RestClientProps,
  SyncRestClient,
  type SyncRestClientProps,
} from './core/index.js';

/**
 * Declarative response shapes and the helpers binding a body to them.
 */
export {
  type InferShape,
  isShape,
  type Shape,
  type ShapeIssue,
  shape,
} from './schema/shape.js';
export { bind, bindSync, formatFieldPath } from './schema/bind.js';

/**
 * Client configuration.
 */
export {
  type AuthDescriptor,
  type ClientConfig,
  type ClientConfigInput,
  clientConfigSchema,
  configFromEnv,
  resolveClientConfig,
} from './config/config.js';

/**
 * Structured logger the clients write to.
 */
export { type Logger, type LoggerMeta, noopLogger } from './logger.js';

/**
 * Transports carrying single attempts.
 */
export { FetchTransport } from './transport/fetchTransport.js';
export { WorkerSyncTransport, type WorkerSyncTransportOptions } from './transport/workerTransport.js';
export type {
  AsyncTransport,
  AttemptOutcome,
  HttpErrorOutcome,
  SuccessOutcome,
  SyncTransport,
  TransportFailureOutcome,
  TransportFailureReason,
} from './transport/types.js';

/**
 * Retry policy helpers.
 */
export { backoffDelay, decide, isRetriableStatus, type RetryDecision, type RetryPolicy } from './retry/policy.js';

/**
 * Request description types.
 */
export type { HeaderOptions, HttpMethod, QueryParams, RequestSpec } from './request/types.js';

/**
 * Error taxonomy and helpers for identifying and unwrapping error types.
 */
export * from './error/index.js';

/**
 * Tuple-style results returned by every call.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
