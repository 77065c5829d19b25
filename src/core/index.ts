/**
 * Core entrypoint: exports the two typed REST clients and their call options.
 * Import from here if you only need the clients without error helpers.
 * @module
 */

/**
 * Typed REST client whose calls suspend, so many may be in flight at once.
 */
export { RestClient } from './client.js';

/**
 * Typed REST client whose calls block the calling thread until they end.
 */
export { SyncRestClient } from './syncClient.js';

/**
 * Call options and constructor props accepted by the clients.
 */
export type {
  AsyncCallOptions,
  BoundResponse,
  CallOptions,
  ClientProps,
  ResponseSchema,
  RestClientProps,
  SyncRestClientProps,
} from './types.js';
