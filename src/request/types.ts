/** HTTP methods the clients issue. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Scalar query value; `null` and `undefined` entries are skipped. */
export type QueryValue = string | number | boolean | null | undefined;

/** Query parameters of a call. */
export type QueryParams = Readonly<Record<string, QueryValue>>;

/**
 * Header values accepted at the call site. A `null` value removes a header the
 * client would otherwise send.
 */
export type HeaderValue = string | number | boolean | null | undefined;

/** Header containers accepted when merging headers. */
export type HeaderOptions = Headers | Array<[string, HeaderValue]> | Readonly<Record<string, HeaderValue>>;

/** Per-call input of the request builder. */
export interface RequestCall {
  method: HttpMethod;
  /** Path below the base URL, or an absolute URL on the same origin */
  path: string;
  query?: QueryParams;
  headers?: HeaderOptions;
  /** Value serialized by the declared `Content-Type`, JSON when none is declared */
  body?: unknown;
}

/**
 * Fully built request. Frozen once built; transports copy the headers for each
 * attempt instead of sharing them.
 */
export interface RequestSpec {
  readonly method: HttpMethod;
  readonly url: string;
  /** Lower-cased header names */
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string | Uint8Array;
}
