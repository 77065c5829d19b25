import { ConstructURLError } from '../error/constructUrlError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import type { QueryParams } from './types.js';

const SCHEME = /^[a-z][a-z\d+.-]*:/i;

/**
 * Resolves a call path against the base URL and appends query parameters.
 *
 * - Relative paths are appended to the base path; one leading `/` is stripped.
 * - Absolute URLs and `//host` paths are only accepted on the base URL's origin.
 * - `null` and `undefined` query values are skipped.
 */
export function constructUrl(baseUrl: string, path: string, query?: QueryParams): SafeWrap<ConstructURLError, string> {
  const [errBase, base] = safeWrap(() => new URL(baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`));
  if (errBase) {
    return [new ConstructURLError('error invalid base URL', baseUrl, { cause: errBase }), null];
  }

  const absolute = SCHEME.test(path) || path.startsWith('//');
  const [errUrl, url] = safeWrap(() => new URL(absolute ? path : path.replace(/^\//, ''), base));
  if (errUrl) {
    return [new ConstructURLError('error constructing URL', path, { cause: errUrl }), null];
  }

  if (url.origin !== base.origin) {
    return [new ConstructURLError(`error path escapes base origin ${base.origin}`, path), null];
  }

  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }

    url.searchParams.append(key, String(value));
  }

  return [null, url.toString()];
}
