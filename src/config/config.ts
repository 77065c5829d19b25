import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import type { SafeWrap } from '../utils/wrap.js';

/** HTTP token characters */
const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
/** Latin-1 without NUL, CR and LF */
const HEADER_VALUE = /^[^\0\r\n\u0100-\uffff]*$/;

const headerName = z.string().min(1, 'Header name must not be empty').regex(HEADER_NAME, 'Header name must be an HTTP token');
const headerValue = z.string().regex(HEADER_VALUE, 'Header value must be single-line Latin-1 text');

const authSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('bearer'), token: headerValue.min(1, 'Bearer token must not be empty') }),
  z.object({ type: z.literal('basic'), username: z.string(), password: z.string() }),
  z.object({ type: z.literal('header'), name: headerName, value: headerValue }),
]);

const milliseconds = z.number().nonnegative().finite();

/** Per-attempt timeout in milliseconds. */
export const timeoutSchema = z.number().int().positive();

export const clientConfigSchema = z
  .object({
    baseUrl: z
      .string()
      .refine(
        (value) => URL.canParse(value) && ['http:', 'https:'].includes(new URL(value).protocol),
        'Base URL must be an absolute http(s) URL',
      ),
    headers: z.record(headerName, headerValue).default({}),
    auth: authSchema.optional(),
    timeout: timeoutSchema.default(10_000),
    maxRetries: z.number().int().nonnegative().default(3),
    backoffBase: milliseconds.default(500),
    backoffCap: milliseconds.default(30_000),
    retryStatusCodes: z.array(z.number().int().min(100).max(599)).optional(),
  })
  .refine((config) => config.backoffCap >= config.backoffBase, {
    message: 'Backoff cap must not be lower than the backoff base',
    path: ['backoffCap'],
  });

/** Credentials applied to every request as a header. */
export type AuthDescriptor = z.infer<typeof authSchema>;
/** Client configuration as accepted by the constructors; omitted values take their defaults. */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;
/** Resolved client configuration. */
export type ClientConfig = Readonly<z.output<typeof clientConfigSchema>>;

/**
 * Validates client configuration and fills in defaults. The result is frozen.
 *
 * @throws {ConfigurationError} listing every invalid option
 */
export function resolveClientConfig(input: ClientConfigInput): ClientConfig {
  return parseClientConfig(input);
}

function toConfigurationError(message: string, error: z.ZodError): ConfigurationError {
  return new ConfigurationError(
    message,
    error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    { cause: error },
  );
}

function parseClientConfig(input: unknown): ClientConfig {
  const result = clientConfigSchema.safeParse(input);
  if (!result.success) {
    throw toConfigurationError('error invalid client configuration', result.error);
  }

  const { headers, retryStatusCodes, ...rest } = result.data;
  return Object.freeze({
    ...rest,
    headers: Object.freeze({ ...headers }),
    ...(retryStatusCodes && { retryStatusCodes: [...retryStatusCodes] }),
  });
}

function readNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  return Number(raw);
}

/**
 * Checks a per-call timeout override against the same rule as the configured one.
 */
export function parseTimeout(timeout: unknown): SafeWrap<ConfigurationError, number> {
  const result = z.object({ timeout: timeoutSchema }).safeParse({ timeout });
  if (!result.success) {
    return [toConfigurationError('error invalid call options', result.error), null];
  }

  return [null, result.data.timeout];
}

/**
 * Reads client configuration from environment variables:
 * `<PREFIX>_BASE_URL`, `<PREFIX>_TIMEOUT_MS`, `<PREFIX>_MAX_RETRIES`,
 * `<PREFIX>_BACKOFF_BASE_MS`, `<PREFIX>_BACKOFF_CAP_MS` and `<PREFIX>_BEARER_TOKEN`.
 * Variables that are set win over `defaults`.
 *
 * @example
 * const client = new RestClient(configFromEnv(process.env, 'BILLING_API'));
 *
 * @throws {ConfigurationError} when the combined configuration is invalid
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>>,
  prefix: string,
  defaults: Partial<ClientConfigInput> = {},
): ClientConfig {
  const read = (name: string) => env[`${prefix}_${name}`];
  const token = read('BEARER_TOKEN');

  const fromEnv = {
    baseUrl: read('BASE_URL'),
    timeout: readNumber(read('TIMEOUT_MS')),
    maxRetries: readNumber(read('MAX_RETRIES')),
    backoffBase: readNumber(read('BACKOFF_BASE_MS')),
    backoffCap: readNumber(read('BACKOFF_CAP_MS')),
    auth: token ? { type: 'bearer' as const, token } : undefined,
  };

  const input: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(fromEnv)) {
    if (value !== undefined) {
      input[key] = value;
    }
  }

  return parseClientConfig(input);
}
