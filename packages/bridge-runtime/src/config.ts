/**
 * @module @cmdbridge/runtime/config
 *
 * Runtime options: explicit options win over `CMDBRIDGE_*` environment
 * variables, which win over defaults.
 */

import { z } from 'zod';
import type { LogLevel, Logger, ResponseTags } from '@cmdbridge/contracts';
import { DEFAULT_RESPONSE_TAGS } from '@cmdbridge/contracts';
import { InvalidOptionsError } from './errors.js';
import { formatZodIssues } from './utils.js';

export const DEFAULT_QUEUE_LABEL = 'ipc';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const ResponseTagsSchema = z
  .object({
    success: z.number().int(),
    error: z.number().int(),
  })
  .refine((tags) => tags.success !== tags.error, {
    message: 'success and error tags must differ',
  });

const RuntimeOptionsSchema = z.object({
  logLevel: LogLevelSchema.optional(),
  queueLabel: z.string().min(1).optional(),
  maxQueueSize: z.number().int().positive().optional(),
  responseTags: ResponseTagsSchema.optional(),
});

const EnvSchema = z.object({
  CMDBRIDGE_LOG_LEVEL: LogLevelSchema.optional(),
  CMDBRIDGE_QUEUE_LABEL: z.string().min(1).optional(),
  CMDBRIDGE_MAX_QUEUE_SIZE: z.coerce.number().int().positive().optional(),
});

/**
 * Options accepted by `createBridgeRuntime()`.
 */
export interface BridgeRuntimeOptions {
  /** Logger for all components. Default: console logger at `logLevel` */
  logger?: Logger;
  /** Level of the default console logger */
  logLevel?: LogLevel;
  /** Name of the serial execution queue (used in logs) */
  queueLabel?: string;
  /** Pending invocations allowed on the queue. Default: unbounded */
  maxQueueSize?: number;
  /** Tags reported to hosts. Default: success 0, error 1 */
  responseTags?: ResponseTags;
  /** Environment to read fallbacks from. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

export interface BridgeConfig {
  logLevel: LogLevel;
  queueLabel: string;
  maxQueueSize?: number;
  responseTags: ResponseTags;
}

/**
 * Read the `CMDBRIDGE_*` variables.
 *
 * @throws InvalidOptionsError on malformed values
 */
export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): Partial<BridgeConfig> {
  const parsed = EnvSchema.safeParse({
    CMDBRIDGE_LOG_LEVEL: emptyToUndefined(env.CMDBRIDGE_LOG_LEVEL),
    CMDBRIDGE_QUEUE_LABEL: emptyToUndefined(env.CMDBRIDGE_QUEUE_LABEL),
    CMDBRIDGE_MAX_QUEUE_SIZE: emptyToUndefined(env.CMDBRIDGE_MAX_QUEUE_SIZE),
  });
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid environment: ${formatZodIssues(parsed.error)}`);
  }
  return {
    logLevel: parsed.data.CMDBRIDGE_LOG_LEVEL,
    queueLabel: parsed.data.CMDBRIDGE_QUEUE_LABEL,
    maxQueueSize: parsed.data.CMDBRIDGE_MAX_QUEUE_SIZE,
  };
}

/**
 * Merge options, environment and defaults.
 *
 * @throws InvalidOptionsError when an option or variable is malformed
 */
export function resolveBridgeConfig(options: BridgeRuntimeOptions = {}): BridgeConfig {
  const parsed = RuntimeOptionsSchema.safeParse({
    logLevel: options.logLevel,
    queueLabel: options.queueLabel,
    maxQueueSize: options.maxQueueSize,
    responseTags: options.responseTags,
  });
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid runtime options: ${formatZodIssues(parsed.error)}`);
  }

  // Variables shadowed by an explicit option are not read, so not validated.
  const env = options.env ?? process.env;
  const fromEnv = loadBridgeConfig({
    CMDBRIDGE_LOG_LEVEL: parsed.data.logLevel === undefined ? env.CMDBRIDGE_LOG_LEVEL : undefined,
    CMDBRIDGE_QUEUE_LABEL: parsed.data.queueLabel === undefined ? env.CMDBRIDGE_QUEUE_LABEL : undefined,
    CMDBRIDGE_MAX_QUEUE_SIZE: parsed.data.maxQueueSize === undefined ? env.CMDBRIDGE_MAX_QUEUE_SIZE : undefined,
  });

  return {
    logLevel: parsed.data.logLevel ?? fromEnv.logLevel ?? DEFAULT_LOG_LEVEL,
    queueLabel: parsed.data.queueLabel ?? fromEnv.queueLabel ?? DEFAULT_QUEUE_LABEL,
    maxQueueSize: parsed.data.maxQueueSize ?? fromEnv.maxQueueSize,
    responseTags: parsed.data.responseTags ?? DEFAULT_RESPONSE_TAGS,
  };
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
