/** Structured metadata attached to a log line. */
export type LoggerMeta = Record<string, unknown>;

/**
 * Minimal structured logger the clients write to. Anything with these four
 * methods fits (pino, winston, `console`, a test spy).
 */
export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

const noop = (): void => {};

/** Logger that drops everything, used when none is configured. */
export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
