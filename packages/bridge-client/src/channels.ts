/**
 * @module @cmdbridge/client/channels
 *
 * Host-side channels for data a command streams besides its response.
 *
 * A channel serializes as its numeric id, so it can be passed inside a call
 * payload; the handler sends on it with `invoke.channel(id).send(value)`.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Logger } from '@cmdbridge/contracts';
import { noopLogger } from '@cmdbridge/contracts';

export type ChannelListener<T> = (message: T) => void;

type Decoded<T> = { ok: true; value: T } | { ok: false; reason: string };
type Decoder<T> = (raw: unknown) => Decoded<T>;

export class Channel<T = unknown> {
  readonly id: number;
  private readonly registry: ChannelRegistry;

  constructor(id: number, registry: ChannelRegistry) {
    this.id = id;
    this.registry = registry;
  }

  close(): void {
    this.registry.unregister(this.id);
  }

  toJSON(): number {
    return this.id;
  }
}

interface ChannelSlot {
  /** Decode and deliver; returns the rejection reason when decoding fails */
  deliver(raw: unknown): string | undefined;
}

export interface ChannelRegistryOptions {
  logger?: Logger;
}

export class ChannelRegistry {
  private nextId = 0;
  private readonly channels = new Map<number, ChannelSlot>();
  private readonly logger: Logger;

  constructor(options: ChannelRegistryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  get size(): number {
    return this.channels.size;
  }

  /**
   * Open a channel delivering JSON-decoded messages as they arrive.
   */
  create(listener: ChannelListener<unknown>): Channel<unknown> {
    return this.open(listener, (raw) => ({ ok: true, value: raw }));
  }

  /**
   * Open a channel whose messages are validated; invalid ones are dropped.
   */
  createTyped<T>(schema: ZodType<T, ZodTypeDef, unknown>, listener: ChannelListener<T>): Channel<T> {
    return this.open(listener, (raw) => {
      const parsed = schema.safeParse(raw);
      return parsed.success
        ? { ok: true, value: parsed.data }
        : { ok: false, reason: parsed.error.issues.map((issue) => issue.message).join('; ') };
    });
  }

  unregister(id: number): void {
    this.channels.delete(id);
  }

  /**
   * Route a raw chunk to its channel.
   *
   * @returns false when the chunk was dropped (unknown channel, not JSON, invalid)
   */
  dispatch(id: number, payload: string): boolean {
    const slot = this.channels.get(id);
    if (!slot) {
      this.logger.debug('Dropped data for unknown channel', { channelId: id });
      return false;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      this.logger.warn('Dropped unparsable channel data', {
        channelId: id,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }

    let rejected: string | undefined;
    try {
      rejected = slot.deliver(raw);
    } catch (error) {
      this.logger.error('Channel listener threw', {
        channelId: id,
        error: error instanceof Error ? error.message : String(error),
      });
      return true;
    }

    if (rejected !== undefined) {
      this.logger.warn('Dropped invalid channel data', { channelId: id, reason: rejected });
      return false;
    }
    return true;
  }

  private open<T>(listener: ChannelListener<T>, decode: Decoder<T>): Channel<T> {
    const channel = new Channel<T>(this.nextId++, this);
    this.channels.set(channel.id, {
      deliver: (raw) => {
        const decoded = decode(raw);
        if (!decoded.ok) {
          return decoded.reason;
        }
        listener(decoded.value);
        return undefined;
      },
    });
    return channel;
  }
}
