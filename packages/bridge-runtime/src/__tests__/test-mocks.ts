/**
 * Shared test doubles for runtime tests.
 */

import { vi, type Mock } from 'vitest';
import type { LogMeta, Logger, Plugin } from '@cmdbridge/contracts';
import { syncCommand } from '@cmdbridge/contracts';

/**
 * Logger whose methods are spies. `child()` returns the same logger, so
 * assertions see what every component logged.
 */
export function createMockLogger() {
  const logger = {
    debug: vi.fn<(message: string, meta?: LogMeta) => void>(),
    info: vi.fn<(message: string, meta?: LogMeta) => void>(),
    warn: vi.fn<(message: string, meta?: LogMeta) => void>(),
    error: vi.fn<(message: string, meta?: LogMeta) => void>(),
    child: vi.fn<(context: LogMeta) => Logger>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

/**
 * Plugin answering `ping` with `pong`.
 */
export function createEchoPlugin<TSurface = unknown>(): Plugin<TSurface> & {
  load: Mock<(surface: TSurface) => void>;
} {
  return {
    commands: {
      ping: syncCommand((invoke) => {
        invoke.sendResponse(invoke.tags.success, 'pong');
      }),
    },
    load: vi.fn<(surface: TSurface) => void>(),
  };
}

/**
 * Wait for a macrotask, after promise callbacks scheduled so far.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(() => resolve()));
}
