/**
 * @module @cmdbridge/runtime/invoke
 *
 * InvocationContext - the runtime's `Invoke` implementation.
 *
 * The terminal callback is a one-shot slot: the first `sendResponse()` takes it
 * and every later attempt is dropped with a warning. Host callbacks that throw
 * are logged, never rethrown into the handler.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type {
  ChannelSender,
  ErrorResponse,
  Invoke,
  InvokeResponse,
  Logger,
  ResponseTags,
  SendChannelDataFn,
  SendResponseFn,
} from '@cmdbridge/contracts';
import { DEFAULT_RESPONSE_TAGS, noopLogger } from '@cmdbridge/contracts';
import { InvalidArgsError } from './errors.js';
import { describeError, formatZodIssues } from './utils.js';

export interface InvocationContextOptions {
  /** Host-assigned invocation id (used for logs and events) */
  id?: number;
  command: string;
  data: string;
  tags?: ResponseTags;
  sendResponse: SendResponseFn;
  sendChannelData: SendChannelDataFn;
  logger?: Logger;
  /** Called for every dropped duplicate response */
  onDuplicateResponse?: (tag: number) => void;
}

type SettleListener = (response: InvokeResponse) => void;

export class InvocationContext implements Invoke {
  readonly id: number;
  readonly command: string;
  readonly data: string;
  readonly tags: ResponseTags;

  private respond: SendResponseFn | undefined;
  private readonly forwardChannelData: SendChannelDataFn;
  private readonly logger: Logger;
  private readonly onDuplicateResponse?: (tag: number) => void;
  private readonly settleListeners: SettleListener[] = [];
  private response: InvokeResponse | undefined;

  constructor(options: InvocationContextOptions) {
    this.id = options.id ?? 0;
    this.command = options.command;
    this.data = options.data;
    this.tags = options.tags ?? DEFAULT_RESPONSE_TAGS;
    this.respond = options.sendResponse;
    this.forwardChannelData = options.sendChannelData;
    this.logger = (options.logger ?? noopLogger).child({
      invocationId: this.id,
      command: this.command,
    });
    this.onDuplicateResponse = options.onDuplicateResponse;
  }

  get responded(): boolean {
    return this.response !== undefined;
  }

  /**
   * The delivered response, if any.
   */
  get outcome(): InvokeResponse | undefined {
    return this.response;
  }

  sendResponse(tag: number, payload?: string): boolean {
    const respond = this.respond;
    if (!respond) {
      this.logger.warn('Dropped duplicate terminal response', { tag });
      this.onDuplicateResponse?.(tag);
      return false;
    }
    this.respond = undefined;

    const response: InvokeResponse = tag === this.tags.success
      ? { ok: true, tag, payload }
      : { ok: false, tag, payload };
    this.response = response;

    try {
      respond(tag, payload);
    } catch (error) {
      this.logger.error('Response callback threw', { error: describeError(error) });
    }

    for (const listener of this.settleListeners.splice(0)) {
      try {
        listener(response);
      } catch (error) {
        this.logger.error('Settle listener threw', { error: describeError(error) });
      }
    }
    return true;
  }

  sendChannelData(channelId: number, payload: string): void {
    if (this.responded) {
      this.logger.debug('Channel data sent after terminal response', { channelId });
    }
    try {
      this.forwardChannelData(channelId, payload);
    } catch (error) {
      this.logger.error('Channel callback threw', { channelId, error: describeError(error) });
    }
  }

  resolve(value?: unknown): boolean {
    if (value === undefined) {
      return this.sendResponse(this.tags.success);
    }
    let payload: string | undefined;
    try {
      payload = JSON.stringify(value);
    } catch (error) {
      return this.reject(`Cannot serialize response: ${describeError(error)}`);
    }
    return this.sendResponse(this.tags.success, payload);
  }

  reject(message: string): boolean {
    return this.sendResponse(this.tags.error, message);
  }

  rejectWith(error: ErrorResponse): boolean {
    return this.sendResponse(this.tags.error, JSON.stringify(error));
  }

  parseArgs<T>(schema: ZodType<T, ZodTypeDef, unknown>): T {
    let raw: unknown;
    if (this.data.trim() === '') {
      raw = {};
    } else {
      try {
        raw = JSON.parse(this.data);
      } catch (error) {
        throw new InvalidArgsError(this.command, describeError(error));
      }
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidArgsError(this.command, formatZodIssues(parsed.error));
    }
    return parsed.data;
  }

  channel(channelId: number): ChannelSender {
    return {
      id: channelId,
      send: (value: unknown) => {
        this.sendChannelData(channelId, JSON.stringify(value) ?? 'null');
      },
    };
  }

  /**
   * Register a listener for the terminal response. Fires immediately when the
   * invocation has already settled.
   */
  onSettled(listener: SettleListener): void {
    if (this.response) {
      listener(this.response);
      return;
    }
    this.settleListeners.push(listener);
  }
}

export function createInvoke(options: InvocationContextOptions): InvocationContext {
  return new InvocationContext(options);
}
