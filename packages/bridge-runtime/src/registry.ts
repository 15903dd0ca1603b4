/**
 * @module @cmdbridge/runtime/registry
 *
 * PluginRegistry - plugin name -> handle.
 *
 * Keys are unique and the last registration wins. Handles are never removed.
 * Mutated only by `register()`, which the host is expected to call during its
 * setup sequence, before invocations referencing the name arrive.
 */

import type { Logger, Plugin } from '@cmdbridge/contracts';
import { noopLogger } from '@cmdbridge/contracts';
import { buildCommandDirectory, type CommandDirectory } from './directory.js';
import { MissingPluginsError, PluginRegistrationError } from './errors.js';
import { describeError } from './utils.js';

/**
 * Registry entry for one plugin.
 */
export interface PluginHandle<TSurface = unknown> {
  readonly name: string;
  readonly instance: Plugin<TSurface>;
  readonly directory: CommandDirectory;
  /** True once a surface has been pushed to the instance */
  attached: boolean;
  readonly registeredAt: number;
}

export interface PluginSummary {
  name: string;
  attached: boolean;
  commands: string[];
}

export interface PluginRegistryOptions {
  logger?: Logger;
}

export class PluginRegistry<TSurface = unknown> {
  private readonly handles = new Map<string, PluginHandle<TSurface>>();
  private readonly logger: Logger;

  constructor(options: PluginRegistryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Store (or replace) the plugin registered under `name`.
   *
   * The configuration is applied before the handle becomes visible. When a
   * surface is given it is pushed immediately.
   *
   * @throws PluginRegistrationError on an empty name or when `setConfig` throws
   */
  register(
    name: string,
    instance: Plugin<TSurface>,
    config: string,
    surface?: TSurface
  ): PluginHandle<TSurface> {
    if (name.length === 0) {
      throw new PluginRegistrationError(name, 'name must not be empty');
    }

    try {
      instance.setConfig?.(config);
    } catch (error) {
      throw new PluginRegistrationError(name, `configuration rejected (${describeError(error)})`);
    }

    const handle: PluginHandle<TSurface> = {
      name,
      instance,
      directory: buildCommandDirectory(instance.commands, this.logger.child({ plugin: name })),
      attached: false,
      registeredAt: Date.now(),
    };

    if (surface !== undefined) {
      this.push(handle, surface);
    }

    if (this.handles.has(name)) {
      this.logger.info('Replacing registered plugin', { plugin: name });
    }
    this.handles.set(name, handle);

    this.logger.debug('Plugin registered', {
      plugin: name,
      commands: handle.directory.commandNames,
      attached: handle.attached,
    });
    return handle;
  }

  /**
   * Push `surface` to every plugin that has none yet.
   *
   * @returns names of the plugins attached by this call
   */
  attachSurface(surface: TSurface): string[] {
    const attached: string[] = [];
    for (const handle of this.handles.values()) {
      if (handle.attached) {
        continue;
      }
      this.push(handle, surface);
      attached.push(handle.name);
    }
    return attached;
  }

  get(name: string): PluginHandle<TSurface> | undefined {
    return this.handles.get(name);
  }

  has(name: string): boolean {
    return this.handles.has(name);
  }

  names(): string[] {
    return [...this.handles.keys()];
  }

  summaries(): PluginSummary[] {
    return [...this.handles.values()].map((handle) => ({
      name: handle.name,
      attached: handle.attached,
      commands: handle.directory.commandNames,
    }));
  }

  /**
   * Startup precondition.
   *
   * @throws MissingPluginsError listing every name not registered
   */
  assertRegistered(names: readonly string[]): void {
    const missing = names.filter((name) => !this.handles.has(name));
    if (missing.length > 0) {
      throw new MissingPluginsError(missing);
    }
  }

  private push(handle: PluginHandle<TSurface>, surface: TSurface): void {
    // Marked attached even when load() throws: a surface goes to an instance once.
    handle.attached = true;
    try {
      handle.instance.load?.(surface);
    } catch (error) {
      this.logger.error('Plugin failed to load surface', {
        plugin: handle.name,
        error: describeError(error),
      });
    }
  }
}
