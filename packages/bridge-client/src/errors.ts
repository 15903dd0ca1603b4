/**
 * @module @cmdbridge/client/errors
 *
 * Errors a host sees when a plugin call fails.
 */

import type { ErrorResponse } from '@cmdbridge/contracts';
import { formatErrorResponse } from '@cmdbridge/contracts';

export type PluginInvokeErrorCode =
  | 'INVOKE_REJECTED'
  | 'CANNOT_DESERIALIZE_RESPONSE'
  | 'CANNOT_SERIALIZE_PAYLOAD';

/**
 * Base client error.
 */
export class PluginInvokeError extends Error {
  readonly code: PluginInvokeErrorCode;

  constructor(message: string, code: PluginInvokeErrorCode) {
    super(message);
    this.name = 'PluginInvokeError';
    this.code = code;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isPluginInvokeError(error: unknown): error is PluginInvokeError {
  return error instanceof PluginInvokeError;
}

/**
 * The plugin (or the dispatcher) answered with an error response.
 */
export class InvokeRejectedError extends PluginInvokeError {
  readonly response: ErrorResponse;

  constructor(response: ErrorResponse) {
    super(formatErrorResponse(response), 'INVOKE_REJECTED');
    this.name = 'InvokeRejectedError';
    this.response = response;
  }

  get errorCode(): string | undefined {
    return this.response.code ?? undefined;
  }
}

/**
 * Success payload is not JSON or does not match the expected shape.
 */
export class CannotDeserializeResponseError extends PluginInvokeError {
  readonly payload: string;

  constructor(reason: string, payload: string) {
    super(`failed to deserialize response: ${reason}`, 'CANNOT_DESERIALIZE_RESPONSE');
    this.name = 'CannotDeserializeResponseError';
    this.payload = payload;
  }
}

export class CannotSerializePayloadError extends PluginInvokeError {
  constructor(reason: string) {
    super(`failed to serialize payload: ${reason}`, 'CANNOT_SERIALIZE_PAYLOAD');
    this.name = 'CannotSerializePayloadError';
  }
}
