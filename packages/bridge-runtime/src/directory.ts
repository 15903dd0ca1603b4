/**
 * @module @cmdbridge/runtime/directory
 *
 * CommandDirectory - the registration-time index of a plugin's commands.
 *
 * Built once from the plugin's command table. Dispatch resolves commands from
 * it, and its rendering is what `CommandNotFoundError` shows callers.
 */

import type {
  CallingConvention,
  CommandEntry,
  CommandTable,
  CommandVariant,
  Logger,
} from '@cmdbridge/contracts';
import { CONVENTION_PRIORITY, noopLogger } from '@cmdbridge/contracts';

const SIGNATURES: Record<CallingConvention, string> = {
  sync: '(invoke: Invoke) => void',
  fallible: '(invoke: Invoke) => void throws',
  async: '(invoke: Invoke) => Promise<unknown>',
};

export interface DirectoryEntry {
  command: string;
  convention: CallingConvention;
  signature: string;
  description?: string;
}

export class CommandDirectory {
  private readonly commands: ReadonlyMap<string, readonly CommandVariant[]>;
  readonly entries: readonly DirectoryEntry[];

  constructor(commands: ReadonlyMap<string, readonly CommandVariant[]>) {
    this.commands = commands;
    this.entries = buildEntries(commands);
  }

  /**
   * Variants declared for `command`, in declaration order.
   * Empty for unknown commands.
   */
  variants(command: string): readonly CommandVariant[] {
    return this.commands.get(command) ?? [];
  }

  has(command: string): boolean {
    return this.commands.has(command);
  }

  get commandNames(): string[] {
    return [...this.commands.keys()].sort();
  }

  /**
   * One line per command variant, or `(none)`.
   *
   * @example "ping [sync]: (invoke: Invoke) => void - Replies with pong"
   */
  render(): string {
    if (this.entries.length === 0) {
      return '(none)';
    }
    return this.entries
      .map((entry) => {
        const line = `${entry.command} [${entry.convention}]: ${entry.signature}`;
        return entry.description ? `${line} - ${entry.description}` : line;
      })
      .join('\n');
  }
}

/**
 * Build a directory from a plugin's command table.
 *
 * Only own keys are read. Variants with an unknown convention or a `run` that
 * is not a function are skipped with a warning; commands left without any
 * usable variant are dropped.
 */
export function buildCommandDirectory(table: CommandTable, logger: Logger = noopLogger): CommandDirectory {
  const commands = new Map<string, CommandVariant[]>();

  for (const [command, entry] of Object.entries(table)) {
    const usable = toVariantList(entry).filter((variant) => {
      if (isUsableVariant(variant)) {
        return true;
      }
      logger.warn('Skipping malformed command handler', { command });
      return false;
    });
    if (usable.length > 0) {
      commands.set(command, usable);
    }
  }

  return new CommandDirectory(commands);
}

function toVariantList(entry: CommandEntry | undefined): readonly CommandVariant[] {
  if (entry === undefined || entry === null) {
    return [];
  }
  return isVariantList(entry) ? entry : [entry];
}

function isVariantList(entry: CommandEntry): entry is readonly CommandVariant[] {
  return Array.isArray(entry);
}

function isUsableVariant(variant: unknown): variant is CommandVariant {
  if (typeof variant !== 'object' || variant === null) {
    return false;
  }
  const convention: unknown = Reflect.get(variant, 'convention');
  const run: unknown = Reflect.get(variant, 'run');
  return (
    typeof run === 'function' &&
    CONVENTION_PRIORITY.some((known) => known === convention)
  );
}

function buildEntries(commands: ReadonlyMap<string, readonly CommandVariant[]>): DirectoryEntry[] {
  const entries: DirectoryEntry[] = [];
  for (const command of [...commands.keys()].sort()) {
    const variants = commands.get(command) ?? [];
    for (const convention of CONVENTION_PRIORITY) {
      for (const variant of variants) {
        if (variant.convention !== convention) continue;
        entries.push({
          command,
          convention,
          signature: SIGNATURES[convention],
          description: variant.description,
        });
      }
    }
  }
  return entries;
}
