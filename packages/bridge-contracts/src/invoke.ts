/**
 * @module @cmdbridge/contracts/invoke
 *
 * The invocation context a command handler receives.
 *
 * One `Invoke` is built per call. It carries the command name, the raw request
 * payload and the two callback surfaces:
 *
 * - the terminal response, delivered at most once;
 * - channel data, any number of times, on any channel id.
 *
 * The core never parses `data`; `parseArgs()` is a convenience for handlers.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { ErrorResponse } from './error-response.js';
import type { ResponseTags } from './response.js';

/**
 * Sender bound to one channel id.
 */
export interface ChannelSender {
  readonly id: number;

  /**
   * Send a JSON-serializable value on the channel.
   */
  send(value: unknown): void;
}

export interface Invoke {
  /** Requested command, matched verbatim against the plugin's commands */
  readonly command: string;

  /** Opaque request payload */
  readonly data: string;

  /** Success/error tags for this invocation */
  readonly tags: ResponseTags;

  /** True once the terminal response has been delivered */
  readonly responded: boolean;

  /**
   * Deliver the terminal response.
   *
   * @returns false when a response was already delivered (the call is dropped)
   */
  sendResponse(tag: number, payload?: string): boolean;

  /**
   * Stream raw channel data. Ordering against the terminal response is the
   * handler's responsibility.
   */
  sendChannelData(channelId: number, payload: string): void;

  /**
   * Respond with success. `value` is JSON-serialized; `undefined` sends no payload.
   */
  resolve(value?: unknown): boolean;

  /**
   * Respond with an error carrying `message` as-is.
   */
  reject(message: string): boolean;

  /**
   * Respond with a structured error (JSON-serialized).
   */
  rejectWith(error: ErrorResponse): boolean;

  /**
   * Parse `data` as JSON and validate it.
   *
   * @throws InvalidArgsError when the payload is not JSON or fails the schema
   */
  parseArgs<T>(schema: ZodType<T, ZodTypeDef, unknown>): T;

  channel(channelId: number): ChannelSender;
}
