import { EncodingError } from '../error/encodingError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Serialized request body and the content type it was serialized for. */
export interface EncodedBody {
  body: string | Uint8Array;
  contentType: string;
}

const JSON_TYPE = 'application/json';
const FORM_TYPE = 'application/x-www-form-urlencoded';

function mediaType(contentType: string): string {
  return (contentType.split(';')[0] ?? '').trim().toLowerCase();
}

function isJsonType(type: string): boolean {
  return type === JSON_TYPE || type.endsWith('+json');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function encodeJson(value: unknown, contentType: string): SafeWrap<EncodingError, EncodedBody> {
  const [err, text] = safeWrap((): string | undefined => JSON.stringify(value));
  if (err) {
    return [new EncodingError('error serializing body as JSON', contentType, { cause: err }), null];
  }

  if (text === undefined) {
    return [new EncodingError(`error body of type ${typeof value} has no JSON form`, contentType), null];
  }

  return [null, { body: text, contentType }];
}

function encodeForm(value: unknown, contentType: string): SafeWrap<EncodingError, EncodedBody> {
  if (!isPlainObject(value)) {
    return [new EncodingError('error form body must be a plain object', contentType), null];
  }

  const params = new URLSearchParams();
  for (const [key, field] of Object.entries(value)) {
    if (field === undefined || field === null) {
      continue;
    }

    if (typeof field !== 'string' && typeof field !== 'number' && typeof field !== 'boolean') {
      return [new EncodingError(`error form field ${key} is not a scalar`, contentType), null];
    }

    params.append(key, String(field));
  }

  return [null, { body: params.toString(), contentType }];
}

/**
 * Serializes a request body by its declared content type.
 *
 * With no declared type the body is sent as JSON. A declared type means the caller
 * owns the wire form, so strings and bytes are sent as they are; other values are
 * serialized for JSON and form types, and rejected for anything else.
 */
export function encodeBody(value: unknown, declared: string | null): SafeWrap<EncodingError, EncodedBody> {
  if (value instanceof Uint8Array) {
    return [null, { body: value, contentType: declared ?? 'application/octet-stream' }];
  }

  if (declared === null) {
    return encodeJson(value, JSON_TYPE);
  }

  if (typeof value === 'string') {
    return [null, { body: value, contentType: declared }];
  }

  const type = mediaType(declared);
  if (isJsonType(type)) {
    return encodeJson(value, declared);
  }

  if (type === FORM_TYPE) {
    return encodeForm(value, declared);
  }

  return [new EncodingError(`error cannot serialize ${typeof value} body as ${type}`, declared), null];
}
