/**
 * @module @cmdbridge/runtime
 *
 * Dispatch engine: plugin registry, calling-convention resolution, serial
 * execution and exactly-once terminal responses.
 *
 * @example
 * ```typescript
 * import { createBridgeRuntime } from '@cmdbridge/runtime';
 * import { definePlugin, syncCommand } from '@cmdbridge/contracts';
 *
 * const runtime = createBridgeRuntime();
 * runtime.registerPlugin('echo', definePlugin({
 *   commands: {
 *     ping: syncCommand((invoke) => invoke.sendResponse(invoke.tags.success, 'pong')),
 *   },
 * }));
 * ```
 */

// Runtime
export { BridgeRuntime, createBridgeRuntime, type RuntimeStats } from './runtime.js';

// Components
export {
  PluginRegistry,
  type PluginHandle,
  type PluginSummary,
  type PluginRegistryOptions,
} from './registry.js';
export {
  CommandDirectory,
  buildCommandDirectory,
  type DirectoryEntry,
} from './directory.js';
export { resolveCommand, type ResolvedCommand } from './resolver.js';
export {
  Dispatcher,
  ASYNC_ERROR_PREFIX,
  type DispatchState,
  type DispatchTransition,
  type DispatchRequest,
  type DispatchStats,
  type DispatcherEvents,
  type DispatcherOptions,
} from './dispatcher.js';
export {
  SerialQueue,
  type QueueTask,
  type PushOutcome,
  type SerialQueueEvents,
  type SerialQueueOptions,
} from './queue.js';
export {
  SurfaceAttachmentHook,
  type SurfaceAttachmentHookOptions,
} from './surface-hook.js';
export {
  InvocationContext,
  createInvoke,
  type InvocationContextOptions,
} from './invoke.js';

// Config & logging
export {
  loadBridgeConfig,
  resolveBridgeConfig,
  DEFAULT_LOG_LEVEL,
  DEFAULT_QUEUE_LABEL,
  type BridgeConfig,
  type BridgeRuntimeOptions,
} from './config.js';
export {
  createConsoleLogger,
  createComponentLogger,
  type ConsoleLoggerOptions,
} from './logging.js';

// Errors
export {
  BridgeError,
  PluginNotFoundError,
  CommandNotFoundError,
  HandlerError,
  InvalidArgsError,
  QueueFullError,
  QueueClosedError,
  PluginRegistrationError,
  MissingPluginsError,
  InvalidOptionsError,
  isBridgeError,
  type BridgeErrorCode,
  type SerializedBridgeError,
} from './errors.js';

// Utils
export { describeError, formatZodIssues } from './utils.js';
export { toAssetUrl, ASSET_ORIGIN } from './assets.js';
