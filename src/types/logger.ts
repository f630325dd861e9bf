/**
 * Logger interface for dependency injection.
 *
 * Matches the subset of Pino's API the plugin core calls, so components
 * can take a logger without depending on Pino directly.
 */
export interface Logger {
  trace(obj: object, msg?: string): void;
  trace(msg: string): void;
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;
  fatal(obj: object, msg?: string): void;
  fatal(msg: string): void;

  /** Create a child logger with additional context */
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Logger that drops everything. Used when a host passes no logger.
 */
export function createNoOpLogger(): Logger {
  const noop = (): void => {
    /* intentionally empty */
  };
  const logger: Logger = {
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => logger,
  };
  return logger;
}
