/**
 * @module @cmdbridge/runtime/resolver
 *
 * Calling-convention resolution: async, then fallible, then sync.
 */

import type {
  AsyncCommand,
  CommandVariant,
  FallibleCommand,
  SyncCommand,
} from '@cmdbridge/contracts';
import { CONVENTION_PRIORITY } from '@cmdbridge/contracts';
import type { CommandDirectory } from './directory.js';

export type ResolvedCommand = AsyncCommand | FallibleCommand | SyncCommand;

/**
 * Pick the handler variant to run for `command`.
 *
 * @returns undefined when the plugin declares no handler for the command
 */
export function resolveCommand(directory: CommandDirectory, command: string): ResolvedCommand | undefined {
  const variants = directory.variants(command);
  for (const convention of CONVENTION_PRIORITY) {
    const match = variants.find((variant: CommandVariant) => variant.convention === convention);
    if (match) {
      return match;
    }
  }
  return undefined;
}
