import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { describeValue } from './shape.js';

type ValidationResult<T> = StandardSchemaV1.Result<T>;

function segmentKey(segment: PropertyKey | StandardSchemaV1.PathSegment): PropertyKey {
  return typeof segment === 'object' ? segment.key : segment;
}

/**
 * Formats an issue path as `items[1].name`; the root is `''`.
 */
export function formatFieldPath(path: ReadonlyArray<PropertyKey | StandardSchemaV1.PathSegment> = []): string {
  let formatted = '';
  for (const segment of path) {
    const key = segmentKey(segment);
    if (typeof key === 'number') {
      formatted += `[${key}]`;
      continue;
    }

    if (typeof key === 'symbol') {
      formatted += `[${key.toString()}]`;
      continue;
    }

    formatted += formatted ? `.${key}` : key;
  }

  return formatted;
}

function valueAt(input: unknown, path: ReadonlyArray<PropertyKey | StandardSchemaV1.PathSegment>): unknown {
  let current = input;
  for (const segment of path) {
    const key = segmentKey(segment);
    if (typeof current !== 'object' || current === null || !(key in current)) {
      return undefined;
    }

    current = Reflect.get(current, key);
  }

  return current;
}

/**
 * Builds the {@link ValidationError} for the first issue a schema reported.
 * Declared shapes spell out `expected`/`actual`; other Standard Schemas contribute
 * their message as `expected` and the offending value's type as `actual`.
 */
function issuesToError(message: string, issues: readonly StandardSchemaV1.Issue[], input: unknown): ValidationError {
  const [first] = issues;
  if (!first) {
    return new ValidationError(message, { fieldPath: '', expected: 'valid value', actual: describeValue(input), issues });
  }

  const path = first.path ?? [];
  const expected = 'expected' in first && typeof first.expected === 'string' ? first.expected : first.message;
  const actual = 'actual' in first && typeof first.actual === 'string' ? first.actual : describeValue(valueAt(input, path));

  return new ValidationError(message, { fieldPath: formatFieldPath(path), expected, actual, issues });
}

function settle<T>(input: unknown, result: ValidationResult<T> | null | undefined): SafeWrap<ValidationError, T> {
  if (!result || typeof result !== 'object') {
    return [
      new ValidationError('error validation result of wrong type', {
        fieldPath: '',
        expected: 'validation result',
        actual: describeValue(result),
        issues: [],
      }),
      null,
    ];
  }

  if (result.issues) {
    return [issuesToError('error validating data', result.issues, input), null];
  }

  return [null, result.value];
}

/**
 * Validates an input value against a Standard Schema (declared shape, zod, ...) and
 * wraps the result in a tuple-style `[error, value]` response.
 *
 * - Thrown validation errors are wrapped in a {@link ValidationError} with the throw as `cause`.
 * - The first reported issue determines `fieldPath`, `expected` and `actual`.
 */
export async function validator<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<ValidationError, Output> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [
      new ValidationError(
        'error validating on validation start',
        { fieldPath: '', expected: 'validation to run', actual: 'thrown error', issues: [] },
        { cause: err },
      ),
      null,
    ];
  }

  if (!(result instanceof Promise)) {
    return settle(input, result);
  }

  const [errAsync, resultAsync] = await safeWrapAsync(() => result);
  if (errAsync) {
    return [
      new ValidationError(
        'error validating async data',
        { fieldPath: '', expected: 'validation to run', actual: 'thrown error', issues: [] },
        { cause: errAsync },
      ),
      null,
    ];
  }

  return settle(input, resultAsync);
}

/**
 * Blocking counterpart of {@link validator}. Schemas that validate asynchronously
 * are rejected, since the caller cannot wait for them.
 */
export function validatorSync<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrap<ValidationError, Output> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [
      new ValidationError(
        'error validating on validation start',
        { fieldPath: '', expected: 'validation to run', actual: 'thrown error', issues: [] },
        { cause: err },
      ),
      null,
    ];
  }

  if (result instanceof Promise) {
    // Avoid an unhandled rejection from the validation we are not waiting for
    result.catch(() => undefined);
    return [
      new ValidationError('error schema validates asynchronously in blocking mode', {
        fieldPath: '',
        expected: 'synchronous schema',
        actual: 'asynchronous schema',
        issues: [],
      }),
      null,
    ];
  }

  return settle(input, result);
}

/**
 * Decodes a response body as UTF-8 JSON. An empty body decodes to `undefined`;
 * malformed UTF-8 is rejected rather than replaced.
 */
export function parseBody(body: Uint8Array | string): SafeWrap<ValidationError, unknown> {
  const [errDecode, text] = safeWrap(() =>
    typeof body === 'string' ? body : new TextDecoder('utf-8', { fatal: true }).decode(body),
  );
  if (errDecode) {
    return [
      new ValidationError(
        'error decoding response body',
        { fieldPath: '', expected: 'UTF-8', actual: 'invalid UTF-8', issues: [] },
        { cause: errDecode },
      ),
      null,
    ];
  }

  if (!text.trim()) {
    return [null, undefined];
  }

  const [err, parsed] = safeWrap((): unknown => JSON.parse(text));
  if (err) {
    return [
      new ValidationError(
        'error parsing response body',
        { fieldPath: '', expected: 'JSON', actual: 'invalid JSON', issues: [] },
        { cause: err },
      ),
      null,
    ];
  }

  return [null, parsed];
}

/**
 * Binds raw response bytes to a response shape: parse as JSON, then validate.
 */
export async function bind<Output>(
  body: Uint8Array | string,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<ValidationError, Output> {
  const [errParse, parsed] = parseBody(body);
  if (errParse) {
    return [errParse, null];
  }

  return validator(parsed, schema);
}

/**
 * Blocking counterpart of {@link bind}.
 */
export function bindSync<Output>(
  body: Uint8Array | string,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrap<ValidationError, Output> {
  const [errParse, parsed] = parseBody(body);
  if (errParse) {
    return [errParse, null];
  }

  return validatorSync(parsed, schema);
}
