/**
 * @module @cmdbridge/contracts/handlers
 *
 * Command handler variants and the plugin shape.
 *
 * A plugin declares, per command name, one or more handler variants. Each
 * variant is tagged with its calling convention:
 *
 * - `sync` - runs and responds through the invoke before returning
 * - `fallible` - like sync, but signals failure by throwing
 * - `async` - returns a promise; rejection is reported as an error
 *
 * When a command declares several variants, `async` wins over `fallible`,
 * which wins over `sync`.
 */

import type { Invoke } from './invoke.js';

export type CallingConvention = 'async' | 'fallible' | 'sync';

/**
 * Resolution order, first match wins.
 */
export const CONVENTION_PRIORITY: readonly CallingConvention[] = ['async', 'fallible', 'sync'];

export type SyncCommandFn = (invoke: Invoke) => void;
export type FallibleCommandFn = (invoke: Invoke) => void;

/**
 * Async handler. The returned promise is the completion signal: a rejection
 * becomes an error response, a non-undefined fulfilment value becomes the
 * success payload if the handler has not responded yet.
 */
export type AsyncCommandFn = (invoke: Invoke) => Promise<unknown>;

interface CommandVariantBase {
  /** Shown in the command directory */
  readonly description?: string;
}

export interface SyncCommand extends CommandVariantBase {
  readonly convention: 'sync';
  readonly run: SyncCommandFn;
}

export interface FallibleCommand extends CommandVariantBase {
  readonly convention: 'fallible';
  readonly run: FallibleCommandFn;
}

export interface AsyncCommand extends CommandVariantBase {
  readonly convention: 'async';
  readonly run: AsyncCommandFn;
}

export type CommandVariant = SyncCommand | FallibleCommand | AsyncCommand;

export type CommandEntry = CommandVariant | readonly CommandVariant[];

/**
 * Command name -> handler variant(s).
 */
export type CommandTable = Readonly<Record<string, CommandEntry>>;

export function syncCommand(run: SyncCommandFn, description?: string): SyncCommand {
  return { convention: 'sync', run, description };
}

export function fallibleCommand(run: FallibleCommandFn, description?: string): FallibleCommand {
  return { convention: 'fallible', run, description };
}

export function asyncCommand(run: AsyncCommandFn, description?: string): AsyncCommand {
  return { convention: 'async', run, description };
}

/**
 * A plugin instance.
 *
 * @template TSurface - Rendering surface type the host shares with plugins
 */
export interface Plugin<TSurface = unknown> {
  readonly commands: CommandTable;

  /**
   * Receives the plugin's raw configuration before any command can run.
   */
  setConfig?(config: string): void;

  /**
   * Receives the rendering surface, at most once per instance.
   */
  load?(surface: TSurface): void;
}

/**
 * Identity helper that keeps the plugin's types inferred.
 *
 * @example
 * ```typescript
 * export const echo = definePlugin({
 *   commands: {
 *     ping: syncCommand((invoke) => {
 *       invoke.sendResponse(invoke.tags.success, 'pong');
 *     }),
 *   },
 * });
 * ```
 */
export function definePlugin<TSurface = unknown>(plugin: Plugin<TSurface>): Plugin<TSurface> {
  return plugin;
}
