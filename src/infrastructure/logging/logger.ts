/**
 * subject-registry - Logger
 *
 * Minimal logging contract used by registries and subscribers.
 * Any object with the four level methods can be passed in, so `console`,
 * pino or winston instances work without an adapter.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels understood by {@link ILogger}
 */
export type LogLevel = keyof ILogger;

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Logger that discards everything
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Wrap a logger so every message starts with `[prefix] `.
 *
 * @example
 * ```typescript
 * const logger = createPrefixedLogger(consoleLogger, 'orders');
 * logger.info('Notifying 2 subscriber(s)');
 * // [INFO] [orders] Notifying 2 subscriber(s)
 * ```
 */
export function createPrefixedLogger(logger: ILogger, prefix: string): ILogger {
  const tag = `[${prefix}] `;
  return {
    debug: (message, ...args) => logger.debug(tag + message, ...args),
    info: (message, ...args) => logger.info(tag + message, ...args),
    warn: (message, ...args) => logger.warn(tag + message, ...args),
    error: (message, ...args) => logger.error(tag + message, ...args),
  };
}
