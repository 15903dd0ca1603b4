import { describe, it, expect, vi } from 'vitest';
import type { CommandTable } from '@cmdbridge/contracts';
import { asyncCommand, fallibleCommand, syncCommand } from '@cmdbridge/contracts';
import { buildCommandDirectory } from '../directory.js';
import { resolveCommand } from '../resolver.js';
import { createMockLogger } from './test-mocks.js';

describe('CommandDirectory', () => {
  const pong = vi.fn();
  const saveSync = vi.fn();
  const saveAsync = vi.fn(async () => undefined);
  const saveFallible = vi.fn();

  const table: CommandTable = {
    save: [syncCommand(saveSync), asyncCommand(saveAsync), fallibleCommand(saveFallible)],
    ping: syncCommand(pong, 'Replies with pong'),
  };

  it('should render one sorted line per variant', () => {
    const directory = buildCommandDirectory(table);

    expect(directory.render()).toBe(
      [
        'ping [sync]: (invoke: Invoke) => void - Replies with pong',
        'save [async]: (invoke: Invoke) => Promise<unknown>',
        'save [fallible]: (invoke: Invoke) => void throws',
        'save [sync]: (invoke: Invoke) => void',
      ].join('\n')
    );
    expect(directory.commandNames).toEqual(['ping', 'save']);
  });

  it('should render an empty plugin as (none)', () => {
    expect(buildCommandDirectory({}).render()).toBe('(none)');
  });

  it('should skip malformed variants with a warning', () => {
    const logger = createMockLogger();
    const malformed: CommandTable = JSON.parse(
      '{"broken":{"convention":"sync","run":1},"odd":{"convention":"later","run":null}}'
    );

    const directory = buildCommandDirectory({ ...malformed, ping: syncCommand(pong) }, logger);

    expect(directory.commandNames).toEqual(['ping']);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Skipping malformed command handler', { command: 'broken' });
  });

  it('should ignore inherited commands', () => {
    const inherited: CommandTable = Object.create({ hidden: syncCommand(pong) });

    const directory = buildCommandDirectory(inherited);

    expect(directory.has('hidden')).toBe(false);
    expect(resolveCommand(directory, 'hidden')).toBeUndefined();
  });
});

describe('resolveCommand', () => {
  const runSync = vi.fn();
  const runFallible = vi.fn();
  const runAsync = vi.fn(async () => undefined);

  it('should prefer async over fallible over sync', () => {
    const directory = buildCommandDirectory({
      all: [syncCommand(runSync), fallibleCommand(runFallible), asyncCommand(runAsync)],
      noAsync: [syncCommand(runSync), fallibleCommand(runFallible)],
      onlySync: syncCommand(runSync),
    });

    expect(resolveCommand(directory, 'all')?.run).toBe(runAsync);
    expect(resolveCommand(directory, 'noAsync')?.run).toBe(runFallible);
    expect(resolveCommand(directory, 'onlySync')?.run).toBe(runSync);
  });

  it('should match command names exactly', () => {
    const directory = buildCommandDirectory({ ping: syncCommand(runSync) });

    expect(resolveCommand(directory, 'ping')?.convention).toBe('sync');
    expect(resolveCommand(directory, 'Ping')).toBeUndefined();
    expect(resolveCommand(directory, 'ping ')).toBeUndefined();
    expect(resolveCommand(directory, 'missing')).toBeUndefined();
  });
});
