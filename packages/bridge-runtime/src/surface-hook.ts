/**
 * @module @cmdbridge/runtime/surface-hook
 *
 * SurfaceAttachmentHook - forwards a newly created rendering surface to the
 * plugins that have none yet.
 *
 * The owner (the embedding application's controller) is held weakly; the
 * bridge never keeps the application's view hierarchy alive.
 */

import type { Logger } from '@cmdbridge/contracts';
import { noopLogger } from '@cmdbridge/contracts';
import type { PluginRegistry } from './registry.js';

export interface SurfaceAttachmentHookOptions<TSurface> {
  registry: PluginRegistry<TSurface>;
  logger?: Logger;
}

export class SurfaceAttachmentHook<TSurface = unknown, TOwner extends object = object> {
  private readonly registry: PluginRegistry<TSurface>;
  private readonly logger: Logger;
  private ownerRef: WeakRef<TOwner> | undefined;
  private current: TSurface | undefined;

  constructor(options: SurfaceAttachmentHookOptions<TSurface>) {
    this.registry = options.registry;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * The most recently created surface.
   */
  get surface(): TSurface | undefined {
    return this.current;
  }

  /**
   * Owner of the current surface, while it is still alive. Undefined when the
   * surface was reported without one.
   */
  get owner(): TOwner | undefined {
    return this.ownerRef?.deref();
  }

  /**
   * @returns names of the plugins attached by this event
   */
  surfaceCreated(surface: TSurface, owner?: TOwner): string[] {
    this.ownerRef = owner === undefined ? undefined : new WeakRef(owner);
    this.current = surface;

    const attached = this.registry.attachSurface(surface);
    this.logger.debug('Surface created', { attached });
    return attached;
  }
}
