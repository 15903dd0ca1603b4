import { describe, it, expect, vi } from 'vitest';
import {
  asyncCommand,
  fallibleCommand,
  syncCommand,
  type CommandTable,
} from '@cmdbridge/contracts';
import { Dispatcher, type DispatchRequest, type DispatchState } from '../dispatcher.js';
import { SerialQueue } from '../queue.js';
import { PluginRegistry } from '../registry.js';
import { createMockLogger, flush } from './test-mocks.js';

function setup(commands: CommandTable, queueOptions: { maxSize?: number } = {}) {
  const logger = createMockLogger();
  const registry = new PluginRegistry();
  registry.register('p', { commands }, '');
  const queue = new SerialQueue(queueOptions);
  const dispatcher = new Dispatcher({ registry, queue, logger });
  const states: DispatchState[] = [];
  dispatcher.on('transition', (transition) => states.push(transition.state));
  return { dispatcher, queue, logger, states };
}

function request(command: string, overrides: Partial<DispatchRequest> = {}) {
  const sendResponse = vi.fn<(tag: number, payload?: string) => void>();
  const sendChannelData = vi.fn<(channelId: number, payload: string) => void>();
  return {
    sendResponse,
    sendChannelData,
    request: {
      invocationId: 7,
      plugin: 'p',
      command,
      data: '',
      sendResponse,
      sendChannelData,
      ...overrides,
    },
  };
}

const ping = syncCommand((invoke) => {
  invoke.sendResponse(invoke.tags.success, 'pong');
});

describe('Dispatcher', () => {
  describe('lookup', () => {
    it('should reject an unknown plugin on the calling stack', () => {
      const { dispatcher, states } = setup({ ping });
      const { request: req, sendResponse } = request('ping', { plugin: 'nope' });

      dispatcher.dispatch(req);

      expect(sendResponse).toHaveBeenCalledWith(1, 'Plugin nope not initialized');
      expect(states).toEqual(['received', 'not-found']);
      expect(dispatcher.stats().pluginNotFound).toBe(1);
    });

    it('should reject an unknown command from the queue with the directory', async () => {
      const { dispatcher, queue, states } = setup({ ping });
      const { request: req, sendResponse } = request('boom');

      dispatcher.dispatch(req);
      expect(sendResponse).not.toHaveBeenCalled();
      await queue.onIdle();

      expect(sendResponse).toHaveBeenCalledWith(
        1,
        'No command boom found for plugin p.\nAvailable commands:\nping [sync]: (invoke: Invoke) => void'
      );
      expect(states).toEqual(['received', 'resolving', 'not-found']);
      expect(dispatcher.stats().commandNotFound).toBe(1);
    });
  });

  describe('sync', () => {
    it('should run through every state', async () => {
      const { dispatcher, queue, states } = setup({ ping });
      const { request: req, sendResponse } = request('ping');

      dispatcher.dispatch(req);
      await queue.onIdle();

      expect(sendResponse).toHaveBeenCalledWith(0, 'pong');
      expect(states).toEqual(['received', 'resolving', 'executing', 'completed']);
      expect(dispatcher.stats().completed).toBe(1);
    });

    it('should report a throwing sync handler', async () => {
      const { dispatcher, queue, logger } = setup({
        oops: syncCommand(() => {
          throw new Error('oops');
        }),
      });
      const { request: req, sendResponse } = request('oops');

      dispatcher.dispatch(req);
      await queue.onIdle();

      expect(sendResponse).toHaveBeenCalledWith(1, 'Error: oops');
      expect(logger.warn).toHaveBeenCalledWith('Sync command threw, declare it fallible to signal errors', {
        plugin: 'p',
        command: 'oops',
      });
    });

    it('should leave a silent handler pending', async () => {
      const { dispatcher, queue, states } = setup({ silent: syncCommand(() => undefined) });
      const { request: req, sendResponse } = request('silent');

      const invoke = dispatcher.dispatch(req);
      await queue.onIdle();

      expect(sendResponse).not.toHaveBeenCalled();
      expect(invoke.responded).toBe(false);
      expect(states).toEqual(['received', 'resolving', 'executing']);
    });
  });

  describe('fallible', () => {
    it('should turn a throw into an error response', async () => {
      const { dispatcher, queue } = setup({
        write: fallibleCommand(() => {
          throw new Error('disk full');
        }),
      });
      const { request: req, sendResponse } = request('write');

      dispatcher.dispatch(req);
      await queue.onIdle();

      expect(sendResponse).toHaveBeenCalledWith(1, 'Error: disk full');
      expect(dispatcher.stats().handlerErrors).toBe(1);
    });

    it('should drop the error when the handler already responded', async () => {
      const { dispatcher, queue } = setup({
        write: fallibleCommand((invoke) => {
          invoke.resolve({ written: 3 });
          throw new Error('after the fact');
        }),
      });
      const { request: req, sendResponse } = request('write');

      dispatcher.dispatch(req);
      await queue.onIdle();

      expect(sendResponse).toHaveBeenCalledTimes(1);
      expect(sendResponse).toHaveBeenCalledWith(0, '{"written":3}');
      expect(dispatcher.stats().duplicateResponses).toBe(1);
      expect(dispatcher.stats().handlerErrors).toBe(0);
    });
  });

  describe('async', () => {
    it('should report a rejection with the async prefix', async () => {
      const { dispatcher, queue } = setup({
        fetch: asyncCommand(async () => {
          throw new Error('nope');
        }),
      });
      const { request: req, sendResponse } = request('fetch');

      dispatcher.dispatch(req);
      await queue.onIdle();
      await flush();

      expect(sendResponse).toHaveBeenCalledWith(1, 'Async command error: Error: nope');
    });

    it('should report a synchronous throw with the async prefix', async () => {
      const { dispatcher, queue } = setup({
        fetch: asyncCommand(() => {
          throw new Error('early');
        }),
      });
      const { request: req, sendResponse } = request('fetch');

      dispatcher.dispatch(req);
      await queue.onIdle();

      expect(sendResponse).toHaveBeenCalledWith(1, 'Async command error: Error: early');
    });

    it('should stringify non-error rejections', async () => {
      const { dispatcher, queue } = setup({
        fetch: asyncCommand(() => Promise.reject('offline')),
      });
      const { request: req, sendResponse } = request('fetch');

      dispatcher.dispatch(req);
      await queue.onIdle();
      await flush();

      expect(sendResponse).toHaveBeenCalledWith(1, 'Async command error: offline');
    });

    it('should resolve with the fulfilment value when nothing was sent', async () => {
      const { dispatcher, queue } = setup({
        fetch: asyncCommand(async () => ({ items: 2 })),
      });
      const { request: req, sendResponse } = request('fetch');

      dispatcher.dispatch(req);
      await queue.onIdle();
      await flush();

      expect(sendResponse).toHaveBeenCalledWith(0, '{"items":2}');
    });

    it('should keep an explicit response over the fulfilment value', async () => {
      const { dispatcher, queue } = setup({
        fetch: asyncCommand(async (invoke) => {
          invoke.sendResponse(invoke.tags.success, 'explicit');
          return 'ignored';
        }),
      });
      const { request: req, sendResponse } = request('fetch');

      dispatcher.dispatch(req);
      await queue.onIdle();
      await flush();

      expect(sendResponse).toHaveBeenCalledTimes(1);
      expect(sendResponse).toHaveBeenCalledWith(0, 'explicit');
      expect(dispatcher.stats().duplicateResponses).toBe(0);
    });

    it('should not synthesize a response for an undefined fulfilment', async () => {
      const { dispatcher, queue } = setup({ fetch: asyncCommand(async () => undefined) });
      const { request: req, sendResponse } = request('fetch');

      dispatcher.dispatch(req);
      await queue.onIdle();
      await flush();

      expect(sendResponse).not.toHaveBeenCalled();
    });
  });

  it('should run only the highest-priority variant', async () => {
    const runSync = vi.fn();
    const runAsync = vi.fn(async () => 'from async');
    const { dispatcher, queue } = setup({ both: [syncCommand(runSync), asyncCommand(runAsync)] });
    const { request: req, sendResponse } = request('both');

    dispatcher.dispatch(req);
    await queue.onIdle();
    await flush();

    expect(runSync).not.toHaveBeenCalled();
    expect(runAsync).toHaveBeenCalledTimes(1);
    expect(sendResponse).toHaveBeenCalledWith(0, '"from async"');
  });

  it('should execute invocations in dispatch order', async () => {
    const order: number[] = [];
    const { dispatcher, queue } = setup({
      record: syncCommand((invoke) => {
        order.push(Number(invoke.data));
        invoke.resolve();
      }),
    });

    for (const n of [1, 2, 3]) {
      dispatcher.dispatch(request('record', { invocationId: n, data: String(n) }).request);
    }
    await queue.onIdle();

    expect(order).toEqual([1, 2, 3]);
  });

  it('should contain a throwing transition listener', async () => {
    const { dispatcher, queue, logger } = setup({ fetch: asyncCommand(async () => 42) });
    dispatcher.on('transition', (transition) => {
      if (transition.state === 'completed') {
        throw new Error('listener bug');
      }
    });
    const { request: req, sendResponse } = request('fetch');

    dispatcher.dispatch(req);
    await queue.onIdle();
    await flush();

    expect(sendResponse).toHaveBeenCalledWith(0, '42');
    expect(dispatcher.stats().completed).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('Transition listener threw', {
      state: 'completed',
      error: 'Error: listener bug',
    });
  });

  describe('queue rejections', () => {
    it('should reject when the queue is full', async () => {
      const { dispatcher, queue, states } = setup({ ping }, { maxSize: 1 });
      const first = request('ping');
      const second = request('ping');

      dispatcher.dispatch(first.request);
      dispatcher.dispatch(second.request);

      expect(second.sendResponse).toHaveBeenCalledWith(1, 'Invocation queue full: 1/1 pending');
      expect(states).toEqual(['received', 'received', 'rejected']);
      await queue.onIdle();
      expect(first.sendResponse).toHaveBeenCalledWith(0, 'pong');
      expect(dispatcher.stats().queueRejections).toBe(1);
    });

    it('should reject once the queue is closed', () => {
      const { dispatcher, queue, states } = setup({ ping });
      const { request: req, sendResponse } = request('ping');
      queue.close();

      dispatcher.dispatch(req);

      expect(sendResponse).toHaveBeenCalledWith(1, 'Invocation queue closed');
      expect(states).toEqual(['received', 'rejected']);
    });
  });
});
