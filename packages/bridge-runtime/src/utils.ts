/**
 * @module @cmdbridge/runtime/utils
 */

import type { ZodError } from 'zod';

/**
 * Stringify anything a handler threw or rejected with.
 *
 * - Error: `String(error)`, i.e. `Name: message`
 * - string: as-is
 * - anything else: JSON, falling back to `String()`
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return String(error);
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    const json = JSON.stringify(error);
    return json === undefined ? String(error) : json;
  } catch {
    return String(error);
  }
}

/**
 * One line per zod issue: `path: message`, joined with `; `.
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}
