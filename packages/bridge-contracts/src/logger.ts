/**
 * @module @cmdbridge/contracts/logger
 *
 * Structured logger shared by every bridge layer.
 */

export type LogMeta = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Structured logger interface
 */
export interface Logger {
  /**
   * Debug level log (only shown in verbose mode)
   */
  debug(message: string, meta?: LogMeta): void;

  /**
   * Info level log
   */
  info(message: string, meta?: LogMeta): void;

  /**
   * Warning level log
   */
  warn(message: string, meta?: LogMeta): void;

  /**
   * Error level log
   */
  error(message: string, meta?: LogMeta): void;

  /**
   * Create a child logger with additional context
   */
  child(context: LogMeta): Logger;
}

const noop = (): void => undefined;

/**
 * Logger that drops everything. Default for components created without one.
 */
export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => noopLogger,
};
