/**
 * @module @cmdbridge/contracts/response
 *
 * Terminal response and channel callback shapes.
 */

/**
 * The two tags an invocation reports its outcome with.
 * Fixed for the lifetime of one invocation.
 */
export interface ResponseTags {
  readonly success: number;
  readonly error: number;
}

export const DEFAULT_RESPONSE_TAGS: ResponseTags = Object.freeze({
  success: 0,
  error: 1,
});

/**
 * Payload reported to the host when a handler responds without one.
 */
export const NULL_PAYLOAD = 'null';

/** Terminal callback. `payload` undefined is not the same as `''`. */
export type SendResponseFn = (tag: number, payload?: string) => void;

/** Non-terminal, multi-shot callback. */
export type SendChannelDataFn = (channelId: number, payload: string) => void;

/**
 * Host-facing result callback: `isSuccess` is derived from the tag.
 */
export type ResultCallback = (invocationId: number, isSuccess: boolean, payload: string) => void;

export type ChannelDataCallback = (channelId: number, payload: string) => void;

/**
 * A delivered terminal response.
 */
export type InvokeResponse =
  | { ok: true; tag: number; payload?: string }
  | { ok: false; tag: number; payload?: string };
