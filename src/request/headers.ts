import type { AuthDescriptor } from '../config/config.js';
import { HeaderError } from '../error/headerError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import type { HeaderOptions, HeaderValue, RequestSpec } from './types.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: HeaderValue): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<readonly [string, HeaderValue]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge header layers into a single `Headers` instance, later layers winning.
 * Keys are matched case-insensitively; a `null` or `undefined` value removes the key.
 * The first invalid name or value ends the merge with a {@link HeaderError}.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): SafeWrap<HeaderError, Headers> {
  const merged = new Headers();

  for (const [key, value] of layers.flatMap((layer) => [...toEntries(layer)])) {
    const clean = value == null ? undefined : sanitize(value);
    if (clean === null) {
      continue;
    }

    const [err] = safeWrap(() => (clean === undefined ? merged.delete(key) : merged.set(key, clean)));
    if (err) {
      return [new HeaderError(`error invalid header ${JSON.stringify(key)}`, key, { cause: err }), null];
    }
  }

  return [null, merged];
}

/**
 * Header that carries the configured credentials.
 */
export function authHeader(auth: AuthDescriptor): [name: string, value: string] {
  switch (auth.type) {
    case 'bearer':
      return ['authorization', `Bearer ${auth.token}`];
    case 'basic':
      return ['authorization', `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`];
    case 'header':
      return [auth.name, auth.value];
  }
}

/**
 * Fresh copy of a request's headers for one attempt. Copies of the same spec are
 * always equal, so idempotency keys survive retries unchanged.
 */
export function attemptHeaders(spec: RequestSpec): Headers {
  return new Headers(Object.entries(spec.headers));
}
