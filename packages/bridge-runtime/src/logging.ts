/**
 * @module @cmdbridge/runtime/logging
 *
 * Console-backed structured logger and the per-component child loggers the
 * runtime uses.
 */

import type { LogLevel, LogMeta, Logger } from '@cmdbridge/contracts';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  namespace?: string;
  meta?: LogMeta;
}

/**
 * Create a logger writing `[namespace] message {meta}` lines through `console`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug', namespace: 'host' });
 * logger.child({ plugin: 'echo' }).info('Registered');
 * // [host] Registered {"plugin":"echo"}
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';
  const namespace = options.namespace ?? 'cmdbridge';
  const base = options.meta ?? {};
  const threshold = LEVEL_WEIGHT[level];

  function write(at: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void {
    if (LEVEL_WEIGHT[at] < threshold) {
      return;
    }
    const merged = { ...base, ...(meta ?? {}) };
    const line = Object.keys(merged).length > 0
      ? `[${namespace}] ${message} ${safeStringify(merged)}`
      : `[${namespace}] ${message}`;
    console[at](line);
  }

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (context) => createConsoleLogger({ level, namespace, meta: { ...base, ...context } }),
  };
}

/**
 * Child logger for one runtime component.
 */
export function createComponentLogger(logger: Logger, component: string, extra: LogMeta = {}): Logger {
  return logger.child({ layer: 'bridge', component, ...extra });
}

function safeStringify(value: LogMeta): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      v instanceof Error ? { name: v.name, message: v.message } : v
    );
  } catch {
    return '[unserializable meta]';
  }
}
