import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { ClientConfigInput } from '../config/config.js';
import type { Logger } from '../logger.js';
import type { HeaderOptions, QueryParams } from '../request/types.js';
import type { AsyncTransport, SyncTransport } from '../transport/types.js';

/** Response shape: a declared shape or any other Standard Schema. */
export type ResponseSchema<Output = unknown> = StandardSchemaV1<unknown, Output>;

/** Value a call returns for the response shape `S`. */
export type BoundResponse<S extends ResponseSchema> = StandardSchemaV1.InferOutput<S>;

/** Options of a single call on {@link SyncRestClient}. */
export interface CallOptions<Output> {
  /** Query parameters; `null` and `undefined` values are skipped */
  query?: QueryParams;
  /** Headers that win over the configured ones; `null` removes a configured header */
  headers?: HeaderOptions;
  /** Request body, serialized by the declared `Content-Type` (JSON by default) */
  body?: unknown;
  /** Shape the response body is bound to */
  response: ResponseSchema<Output>;
  /** Per-attempt timeout in milliseconds, overriding the configured one */
  timeout?: number;
}

/** Options of a single call on {@link RestClient}. */
export interface AsyncCallOptions<Output> extends CallOptions<Output> {
  /** Aborts the call; no further attempt is made once it fired */
  signal?: AbortSignal;
}

/** Constructor props shared by both clients. */
export type ClientProps = ClientConfigInput & {
  /** Structured logger; logging is off when omitted */
  logger?: Logger;
};

/** Constructor props of {@link RestClient}. */
export type RestClientProps = ClientProps & {
  /** Transport used for every attempt. Defaults to {@link FetchTransport}. */
  transport?: AsyncTransport;
};

/** Constructor props of {@link SyncRestClient}. */
export type SyncRestClientProps = ClientProps & {
  /** Transport used for every attempt. Defaults to {@link WorkerSyncTransport}. */
  transport?: SyncTransport;
};
