/**
 * @module @cmdbridge/runtime/dispatcher
 *
 * Dispatcher - drives one invocation from receipt to its terminal response.
 *
 * ## States
 *
 * ```
 * received -> resolving -> executing -> completed
 * received -> not-found                  (unknown plugin, caller's stack)
 * received -> resolving -> not-found     (unknown command, on the queue)
 * received -> rejected                   (queue full or closed)
 * ```
 *
 * The plugin lookup happens on the caller's stack; resolution and execution
 * happen on the serial queue. Whatever convention runs, the caller sees one
 * terminal response at most: the invoke drops duplicates.
 *
 * The core never synthesizes a success response for sync and fallible
 * commands. A handler that never responds leaves the invocation pending
 * forever; there is no timeout.
 */

import { EventEmitter } from 'node:events';
import type {
  Logger,
  ResponseTags,
  SendChannelDataFn,
  SendResponseFn,
} from '@cmdbridge/contracts';
import { DEFAULT_RESPONSE_TAGS, noopLogger } from '@cmdbridge/contracts';
import { InvocationContext } from './invoke.js';
import type { PluginHandle, PluginRegistry } from './registry.js';
import type { SerialQueue } from './queue.js';
import { resolveCommand, type ResolvedCommand } from './resolver.js';
import {
  type BridgeError,
  CommandNotFoundError,
  HandlerError,
  PluginNotFoundError,
  QueueClosedError,
  QueueFullError,
} from './errors.js';
import { describeError } from './utils.js';

/**
 * Prefix of the error payload reported when an async command rejects.
 */
export const ASYNC_ERROR_PREFIX = 'Async command error: ';

export type DispatchState = 'received' | 'resolving' | 'executing' | 'completed' | 'not-found' | 'rejected';

export interface DispatchTransition {
  invocationId: number;
  plugin: string;
  command: string;
  state: DispatchState;
}

/**
 * Dispatcher events.
 */
export interface DispatcherEvents {
  transition: [transition: DispatchTransition];
}

export interface DispatchRequest {
  invocationId: number;
  plugin: string;
  command: string;
  data: string;
  sendResponse: SendResponseFn;
  sendChannelData: SendChannelDataFn;
}

export interface DispatchStats {
  totalInvocations: number;
  completed: number;
  pluginNotFound: number;
  commandNotFound: number;
  handlerErrors: number;
  queueRejections: number;
  duplicateResponses: number;
}

export interface DispatcherOptions<TSurface> {
  registry: PluginRegistry<TSurface>;
  queue: SerialQueue;
  tags?: ResponseTags;
  logger?: Logger;
}

export class Dispatcher<TSurface = unknown> extends EventEmitter<DispatcherEvents> {
  private readonly registry: PluginRegistry<TSurface>;
  private readonly queue: SerialQueue;
  private readonly tags: ResponseTags;
  private readonly logger: Logger;
  private readonly _stats: DispatchStats = {
    totalInvocations: 0,
    completed: 0,
    pluginNotFound: 0,
    commandNotFound: 0,
    handlerErrors: 0,
    queueRejections: 0,
    duplicateResponses: 0,
  };

  constructor(options: DispatcherOptions<TSurface>) {
    super();
    this.registry = options.registry;
    this.queue = options.queue;
    this.tags = options.tags ?? DEFAULT_RESPONSE_TAGS;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Accept an invocation. Never throws; every failure ends up as the
   * invocation's error response.
   *
   * @returns the invocation context (already settled when the plugin is unknown)
   */
  dispatch(request: DispatchRequest): InvocationContext {
    this._stats.totalInvocations++;

    const invoke = new InvocationContext({
      id: request.invocationId,
      command: request.command,
      data: request.data,
      tags: this.tags,
      sendResponse: request.sendResponse,
      sendChannelData: request.sendChannelData,
      logger: this.logger.child({ plugin: request.plugin }),
      onDuplicateResponse: () => {
        this._stats.duplicateResponses++;
      },
    });
    this.transition(invoke, request.plugin, 'received');

    const handle = this.registry.get(request.plugin);
    if (!handle) {
      this._stats.pluginNotFound++;
      this.fail(invoke, new PluginNotFoundError(request.plugin));
      this.transition(invoke, request.plugin, 'not-found');
      return invoke;
    }

    const outcome = this.queue.push(() => this.execute(handle, invoke));
    if (outcome !== 'accepted') {
      this._stats.queueRejections++;
      this.fail(
        invoke,
        outcome === 'full'
          ? new QueueFullError(this.queue.size, this.queue.maxSize ?? this.queue.size)
          : new QueueClosedError()
      );
      this.transition(invoke, request.plugin, 'rejected');
    }
    return invoke;
  }

  stats(): DispatchStats {
    return { ...this._stats };
  }

  private execute(handle: PluginHandle<TSurface>, invoke: InvocationContext): void {
    this.transition(invoke, handle.name, 'resolving');

    const resolved = resolveCommand(handle.directory, invoke.command);
    if (!resolved) {
      this._stats.commandNotFound++;
      this.fail(invoke, new CommandNotFoundError(handle.name, invoke.command, handle.directory.render()));
      this.transition(invoke, handle.name, 'not-found');
      return;
    }

    invoke.onSettled(() => {
      this._stats.completed++;
      this.transition(invoke, handle.name, 'completed');
    });
    this.transition(invoke, handle.name, 'executing');

    this.logger.debug('Executing command', {
      invocationId: invoke.id,
      plugin: handle.name,
      command: invoke.command,
      convention: resolved.convention,
    });

    switch (resolved.convention) {
      case 'sync':
        this.runSync(handle, resolved, invoke);
        break;
      case 'fallible':
        this.runFallible(resolved, invoke);
        break;
      case 'async':
        this.runAsync(resolved, invoke);
        break;
    }
  }

  private runSync(
    handle: PluginHandle<TSurface>,
    command: Extract<ResolvedCommand, { convention: 'sync' }>,
    invoke: InvocationContext
  ): void {
    try {
      command.run(invoke);
    } catch (error) {
      // Sync commands are not supposed to throw; report it rather than lose the call.
      this.logger.warn('Sync command threw, declare it fallible to signal errors', {
        plugin: handle.name,
        command: invoke.command,
      });
      this.failHandler(invoke, describeError(error), 'sync');
    }
  }

  private runFallible(
    command: Extract<ResolvedCommand, { convention: 'fallible' }>,
    invoke: InvocationContext
  ): void {
    try {
      command.run(invoke);
    } catch (error) {
      this.failHandler(invoke, describeError(error), 'fallible');
    }
  }

  private runAsync(
    command: Extract<ResolvedCommand, { convention: 'async' }>,
    invoke: InvocationContext
  ): void {
    let pending: Promise<unknown>;
    try {
      pending = Promise.resolve(command.run(invoke));
    } catch (error) {
      this.failHandler(invoke, `${ASYNC_ERROR_PREFIX}${describeError(error)}`, 'async');
      return;
    }

    void pending.then(
      (value) => {
        if (invoke.responded) {
          return;
        }
        if (value !== undefined) {
          invoke.resolve(value);
          return;
        }
        this.logger.debug('Async command completed without responding', {
          invocationId: invoke.id,
          command: invoke.command,
        });
      },
      (error: unknown) => {
        this.failHandler(invoke, `${ASYNC_ERROR_PREFIX}${describeError(error)}`, 'async');
      }
    );
  }

  private failHandler(invoke: InvocationContext, message: string, convention: ResolvedCommand['convention']): void {
    if (this.fail(invoke, new HandlerError(message, { command: invoke.command, convention }))) {
      this._stats.handlerErrors++;
    }
  }

  /**
   * @returns false when the invocation had already responded
   */
  private fail(invoke: InvocationContext, error: BridgeError): boolean {
    this.logger.debug('Invocation failed', {
      invocationId: invoke.id,
      command: invoke.command,
      code: error.code,
    });
    return invoke.reject(error.message);
  }

  private transition(invoke: InvocationContext, plugin: string, state: DispatchState): void {
    try {
      this.emit('transition', {
        invocationId: invoke.id,
        plugin,
        command: invoke.command,
        state,
      });
    } catch (error) {
      this.logger.error('Transition listener threw', { state, error: describeError(error) });
    }
  }
}
