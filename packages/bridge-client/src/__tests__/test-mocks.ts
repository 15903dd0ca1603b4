/**
 * Shared test doubles for client tests.
 */

import { vi } from 'vitest';
import type { LogMeta, Logger } from '@cmdbridge/contracts';

/**
 * Create a typed mock Logger
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
 * Settle `promise` and return what it rejected with.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
