/**
 * @module @cmdbridge/client/client
 *
 * BridgeClient - typed, promise-based calls into plugins hosted by a
 * `BridgeRuntime`.
 *
 * The client owns the two tables the runtime's callbacks land in: pending
 * calls (by invocation id) and channels (by channel id). Payloads cross the
 * runtime as JSON strings; responses are decoded here.
 *
 * @example
 * ```typescript
 * const client = new BridgeClient(runtime);
 * const fs = client.registerPlugin('fs', fsPlugin, { root: '/tmp' });
 *
 * const progress = client.createChannel((message) => console.log(message));
 * const { written } = await fs.run('write', { path: 'a.txt', progress }, WriteResultSchema);
 * ```
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Logger, Plugin } from '@cmdbridge/contracts';
import { ErrorResponseSchema, noopLogger } from '@cmdbridge/contracts';
import { formatZodIssues, type BridgeRuntime } from '@cmdbridge/runtime';
import { Channel, ChannelRegistry, type ChannelListener } from './channels.js';
import {
  CannotDeserializeResponseError,
  CannotSerializePayloadError,
  InvokeRejectedError,
} from './errors.js';
import { PendingCalls } from './pending-calls.js';

export interface BridgeClientOptions {
  logger?: Logger;
}

/**
 * What a `PluginClient` needs from its client.
 */
export interface CommandCaller {
  call(name: string, command: string, payload: unknown): Promise<unknown>;
  call<T>(name: string, command: string, payload: unknown, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
}

export class BridgeClient<TSurface = unknown, TOwner extends object = object> implements CommandCaller {
  readonly runtime: BridgeRuntime<TSurface, TOwner>;
  private readonly pending = new PendingCalls();
  private readonly channels: ChannelRegistry;
  private readonly logger: Logger;

  constructor(runtime: BridgeRuntime<TSurface, TOwner>, options: BridgeClientOptions = {}) {
    this.runtime = runtime;
    this.logger = (options.logger ?? noopLogger).child({ layer: 'client' });
    this.channels = new ChannelRegistry({ logger: this.logger });
  }

  /** Calls still waiting for their response */
  get pendingCalls(): number {
    return this.pending.size;
  }

  /**
   * Register a plugin with JSON configuration and get a handle to call it.
   * The plugin receives the current surface if one exists.
   *
   * @throws CannotSerializePayloadError when `config` is not serializable
   */
  registerPlugin(name: string, plugin: Plugin<TSurface>, config: unknown = {}): PluginClient {
    this.runtime.registerPlugin(name, plugin, serialize(config));
    return new PluginClient(this, name);
  }

  /**
   * Handle for a plugin registered elsewhere.
   */
  plugin(name: string): PluginClient {
    return new PluginClient(this, name);
  }

  createChannel(listener: ChannelListener<unknown>): Channel<unknown> {
    return this.channels.create(listener);
  }

  createTypedChannel<T>(schema: ZodType<T, ZodTypeDef, unknown>, listener: ChannelListener<T>): Channel<T> {
    return this.channels.createTyped(schema, listener);
  }

  /**
   * Send `command` to plugin `name` and decode the response.
   */
  call(name: string, command: string, payload: unknown): Promise<unknown>;
  call<T>(name: string, command: string, payload: unknown, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
  call<T>(
    name: string,
    command: string,
    payload: unknown,
    schema?: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T | unknown> {
    let data: string;
    try {
      data = serialize(payload);
    } catch (error) {
      return Promise.reject(error);
    }

    return new Promise<T | unknown>((resolve, reject) => {
      const id = this.pending.register((isSuccess, response) => {
        if (!isSuccess) {
          reject(toRejection(response));
          return;
        }
        const decoded = decode(response, schema);
        if (decoded.ok) {
          resolve(decoded.value);
        } else {
          reject(decoded.error);
        }
      });

      this.logger.debug('Running plugin command', { invocationId: id, plugin: name, command });
      this.runtime.runCommand(
        id,
        name,
        command,
        data,
        (invocationId, isSuccess, response) => {
          if (!this.pending.settle(invocationId, isSuccess, response)) {
            this.logger.warn('Result for unknown invocation', { invocationId });
          }
        },
        (channelId, chunk) => {
          this.channels.dispatch(channelId, chunk);
        }
      );
    });
  }
}

/**
 * Calls into one plugin.
 */
export class PluginClient {
  readonly name: string;
  private readonly client: CommandCaller;

  constructor(client: CommandCaller, name: string) {
    this.client = client;
    this.name = name;
  }

  run(command: string, payload?: unknown): Promise<unknown>;
  run<T>(command: string, payload: unknown, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
  run<T>(command: string, payload: unknown = {}, schema?: ZodType<T, ZodTypeDef, unknown>): Promise<T | unknown> {
    return schema
      ? this.client.call(this.name, command, payload, schema)
      : this.client.call(this.name, command, payload);
  }
}

type Decoded<T> = { ok: true; value: T } | { ok: false; error: CannotDeserializeResponseError };

function decode<T>(payload: string, schema?: ZodType<T, ZodTypeDef, unknown>): Decoded<T | unknown> {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new CannotDeserializeResponseError(`${reason}, data: ${payload}`, payload) };
  }

  if (!schema) {
    return { ok: true, value };
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, error: new CannotDeserializeResponseError(formatZodIssues(parsed.error), payload) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Error payloads are structured `ErrorResponse` JSON or a bare message.
 */
function toRejection(payload: string): InvokeRejectedError {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch {
    return new InvokeRejectedError({ message: payload });
  }
  const parsed = ErrorResponseSchema.safeParse(value);
  return parsed.success
    ? new InvokeRejectedError(parsed.data)
    : new InvokeRejectedError({ message: payload });
}

function serialize(value: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch (error) {
    throw new CannotSerializePayloadError(error instanceof Error ? error.message : String(error));
  }
  if (json === undefined) {
    throw new CannotSerializePayloadError(`${typeof value} is not serializable`);
  }
  return json;
}
