/**
 * @module @cmdbridge/contracts
 *
 * Types shared by the bridge runtime, plugins and host clients.
 */

export type { LogMeta, LogLevel, Logger } from './logger.js';
export { noopLogger } from './logger.js';

export type {
  ResponseTags,
  SendResponseFn,
  SendChannelDataFn,
  ResultCallback,
  ChannelDataCallback,
  InvokeResponse,
} from './response.js';
export { DEFAULT_RESPONSE_TAGS, NULL_PAYLOAD } from './response.js';

export type { ErrorResponse } from './error-response.js';
export { ErrorResponseSchema, formatErrorResponse } from './error-response.js';

export type { Invoke, ChannelSender } from './invoke.js';

export type {
  CallingConvention,
  SyncCommandFn,
  FallibleCommandFn,
  AsyncCommandFn,
  SyncCommand,
  FallibleCommand,
  AsyncCommand,
  CommandVariant,
  CommandEntry,
  CommandTable,
  Plugin,
} from './handlers.js';
export {
  CONVENTION_PRIORITY,
  syncCommand,
  fallibleCommand,
  asyncCommand,
  definePlugin,
} from './handlers.js';
