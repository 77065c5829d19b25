import type { StandardSchemaV1 } from '@standard-schema/spec';
import { type RestClientErrorOptions, RestClientError } from './restClientError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Location and nature of the first structural mismatch found while binding. */
export interface ValidationErrorDetail {
  /** Dotted path to the offending value, `[i]` for sequence items, `''` for the root */
  fieldPath: string;
  /** Description of what the shape declared */
  expected: string;
  /** Description of what the payload held */
  actual: string;
  /** All issues reported by the schema */
  issues: readonly StandardSchemaV1.Issue[];
}

/**
 * Error representing a response payload that does not match its declared shape.
 */
export class ValidationError extends RestClientError {
  /** ValidationError error-name */
  name = 'ValidationError';
  /** Dotted path to the offending value */
  readonly fieldPath: string;
  /** Description of what the shape declared */
  readonly expected: string;
  /** Description of what the payload held */
  readonly actual: string;
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError with the mismatch it describes */
  constructor(message: string, detail: ValidationErrorDetail, opts?: RestClientErrorOptions) {
    super(`${message} at ${detail.fieldPath || '<root>'}: expected ${detail.expected}, got ${detail.actual}`, opts);

    this.fieldPath = detail.fieldPath;
    this.expected = detail.expected;
    this.actual = detail.actual;
    this.issues = detail.issues;
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
