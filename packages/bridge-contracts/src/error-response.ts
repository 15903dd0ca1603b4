/**
 * @module @cmdbridge/contracts/error-response
 *
 * Structured error payload a handler can reject with and a host can decode.
 */

import { z } from 'zod';

/**
 * Error payload. Extra keys are kept as error data.
 */
export const ErrorResponseSchema = z
  .object({
    code: z.string().nullish(),
    message: z.string().nullish(),
  })
  .passthrough();

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/**
 * Render an error response the way hosts show it:
 * `[code] - message`, `[code]` or `message`.
 */
export function formatErrorResponse(response: ErrorResponse): string {
  let out = '';
  if (response.code) {
    out += `[${response.code}]`;
    if (response.message) {
      out += ' - ';
    }
  }
  if (response.message) {
    out += response.message;
  }
  return out;
}
