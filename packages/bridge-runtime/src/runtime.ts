/**
 * @module @cmdbridge/runtime/runtime
 *
 * BridgeRuntime - the host-facing entry points.
 *
 * The host owns the runtime: it creates one during setup, registers plugins,
 * reports surfaces, and routes command calls through `runCommand()`.
 *
 * @example
 * ```typescript
 * const runtime = createBridgeRuntime<WebSurface, AppWindow>({ logLevel: 'info' });
 *
 * runtime.registerPlugin('echo', echoPlugin, '{}');
 * runtime.surfaceCreated(surface, window);
 *
 * runtime.runCommand(1, 'echo', 'ping', '', (id, ok, payload) => {
 *   console.log(id, ok, payload); // 1 true pong
 * }, () => {});
 * ```
 */

import type {
  ChannelDataCallback,
  Logger,
  Plugin,
  ResponseTags,
  ResultCallback,
} from '@cmdbridge/contracts';
import { NULL_PAYLOAD } from '@cmdbridge/contracts';
import { resolveBridgeConfig, type BridgeConfig, type BridgeRuntimeOptions } from './config.js';
import { Dispatcher, type DispatchStats, type DispatchTransition } from './dispatcher.js';
import { createComponentLogger, createConsoleLogger } from './logging.js';
import { SerialQueue } from './queue.js';
import { PluginRegistry, type PluginSummary } from './registry.js';
import { SurfaceAttachmentHook } from './surface-hook.js';

export interface RuntimeStats extends DispatchStats {
  queueLength: number;
  plugins: number;
}

export class BridgeRuntime<TSurface = unknown, TOwner extends object = object> {
  readonly config: BridgeConfig;
  private readonly logger: Logger;
  private readonly registry: PluginRegistry<TSurface>;
  private readonly queue: SerialQueue;
  private readonly dispatcher: Dispatcher<TSurface>;
  private readonly surfaceHook: SurfaceAttachmentHook<TSurface, TOwner>;

  constructor(options: BridgeRuntimeOptions = {}) {
    this.config = resolveBridgeConfig(options);
    this.logger = options.logger ?? createConsoleLogger({ level: this.config.logLevel });

    this.registry = new PluginRegistry<TSurface>({
      logger: createComponentLogger(this.logger, 'registry'),
    });
    this.queue = new SerialQueue({
      label: this.config.queueLabel,
      maxSize: this.config.maxQueueSize,
      logger: createComponentLogger(this.logger, 'queue'),
    });
    this.dispatcher = new Dispatcher<TSurface>({
      registry: this.registry,
      queue: this.queue,
      tags: this.config.responseTags,
      logger: createComponentLogger(this.logger, 'dispatcher'),
    });
    this.surfaceHook = new SurfaceAttachmentHook<TSurface, TOwner>({
      registry: this.registry,
      logger: createComponentLogger(this.logger, 'surface'),
    });
  }

  get tags(): ResponseTags {
    return this.config.responseTags;
  }

  /** Most recently created surface */
  get surface(): TSurface | undefined {
    return this.surfaceHook.surface;
  }

  /** Owner of the current surface, while it is alive */
  get owner(): TOwner | undefined {
    return this.surfaceHook.owner;
  }

  /**
   * Register (or replace) a plugin.
   *
   * The plugin gets `surface` when given, otherwise the current surface if
   * one has been created already.
   *
   * @throws PluginRegistrationError
   */
  registerPlugin(name: string, instance: Plugin<TSurface>, config = '', surface?: TSurface): void {
    this.registry.register(name, instance, config, surface ?? this.surfaceHook.surface);
  }

  /**
   * A rendering surface was created by the embedding application.
   */
  surfaceCreated(surface: TSurface, owner?: TOwner): void {
    this.surfaceHook.surfaceCreated(surface, owner);
  }

  /**
   * Run `command` on plugin `pluginName`.
   *
   * `onResult` fires at most once with `isSuccess` derived from the response
   * tag; a response without payload is reported as `"null"`. `onChannelData`
   * fires for every chunk the handler streams.
   */
  runCommand(
    invocationId: number,
    pluginName: string,
    command: string,
    data: string,
    onResult: ResultCallback,
    onChannelData: ChannelDataCallback
  ): void {
    const tags = this.config.responseTags;
    this.dispatcher.dispatch({
      invocationId,
      plugin: pluginName,
      command,
      data,
      sendResponse: (tag, payload) => {
        onResult(invocationId, tag === tags.success, payload ?? NULL_PAYLOAD);
      },
      sendChannelData: (channelId, payload) => {
        onChannelData(channelId, payload);
      },
    });
  }

  /**
   * Check, at startup, that every plugin the host relies on is registered.
   *
   * @throws MissingPluginsError
   */
  assertPlugins(names: readonly string[]): void {
    this.registry.assertRegistered(names);
  }

  listPlugins(): PluginSummary[] {
    return this.registry.summaries();
  }

  onTransition(listener: (transition: DispatchTransition) => void): () => void {
    this.dispatcher.on('transition', listener);
    return () => {
      this.dispatcher.off('transition', listener);
    };
  }

  stats(): RuntimeStats {
    return {
      ...this.dispatcher.stats(),
      queueLength: this.queue.size,
      plugins: this.registry.names().length,
    };
  }

  /**
   * Resolves when the execution queue has nothing left to run.
   * Async work a command started may still be in flight.
   */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  /**
   * Stop accepting invocations and wait for the queued ones to run.
   */
  async shutdown(): Promise<void> {
    this.queue.close();
    await this.queue.onIdle();
    this.logger.debug('Runtime shut down');
  }
}

export function createBridgeRuntime<TSurface = unknown, TOwner extends object = object>(
  options: BridgeRuntimeOptions = {}
): BridgeRuntime<TSurface, TOwner> {
  return new BridgeRuntime<TSurface, TOwner>(options);
}
