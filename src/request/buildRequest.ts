import type { ClientConfig } from '../config/config.js';
import type { RestClientError } from '../error/restClientError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { encodeBody } from './body.js';
import { constructUrl } from './constructUrl.js';
import { authHeader, mergeHeaderOptions } from './headers.js';
import type { RequestCall, RequestSpec } from './types.js';

/** Configuration the builder reads. */
export type RequestDefaults = Pick<ClientConfig, 'baseUrl' | 'headers' | 'auth'>;

const DEFAULT_HEADERS: Readonly<Record<string, string>> = { accept: 'application/json' };

/**
 * Builds the request for one call. Header layers, lowest first: `Accept`, configured
 * headers, auth, call-site headers.
 *
 * Never performs I/O; the same defaults and call always build an equal spec.
 */
export function buildRequest(defaults: RequestDefaults, call: RequestCall): SafeWrap<RestClientError, RequestSpec> {
  const [errUrl, url] = constructUrl(defaults.baseUrl, call.path, call.query);
  if (errUrl) {
    return [errUrl, null];
  }

  const [errHeaders, headers] = mergeHeaderOptions(
    DEFAULT_HEADERS,
    defaults.headers,
    defaults.auth && [authHeader(defaults.auth)],
    call.headers,
  );
  if (errHeaders) {
    return [errHeaders, null];
  }

  let body: string | Uint8Array | undefined;
  if (call.body !== undefined) {
    const [errBody, encoded] = encodeBody(call.body, headers.get('content-type'));
    if (errBody) {
      return [errBody, null];
    }

    headers.set('content-type', encoded.contentType);
    // Bytes are copied so later writes to the caller's buffer never reach a retry
    body = encoded.body instanceof Uint8Array ? encoded.body.slice() : encoded.body;
  }

  return [
    null,
    Object.freeze({
      method: call.method,
      url,
      headers: Object.freeze(Object.fromEntries(headers.entries())),
      ...(body !== undefined && { body }),
    }),
  ];
}
