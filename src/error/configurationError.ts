import { RestClientError } from './restClientError.js';

/** A single problem found in client configuration. */
export interface ConfigurationIssue {
  /** Dotted path of the offending option */
  path: string;
  /** What was wrong with it */
  message: string;
}

/**
 * Error thrown when a client is constructed with invalid configuration, and returned
 * when a call overrides an option with an invalid value.
 */
export class ConfigurationError extends RestClientError {
  /** ConfigurationError error-name */
  name = 'ConfigurationError';
  /** Every problem found in the configuration */
  readonly issues: readonly ConfigurationIssue[];

  /** Creates a new instance of the ConfigurationError listing every issue */
  constructor(message: string, issues: readonly ConfigurationIssue[], opts?: ErrorOptions) {
    const details = issues.map(({ path, message: issue }) => `${path || '<root>'}: ${issue}`).join('; ');
    super(details ? `${message}; ${details}` : message, opts);
    this.issues = issues;
  }
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
