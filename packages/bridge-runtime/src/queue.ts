/**
 * @module @cmdbridge/runtime/queue
 *
 * SerialQueue - the FIFO execution queue shared by every plugin.
 *
 * Tasks run one per macrotask tick, never on the stack that pushed them and
 * never concurrently with each other. Work a task starts asynchronously
 * (promises, timers) continues outside the queue.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from '@cmdbridge/contracts';
import { noopLogger } from '@cmdbridge/contracts';
import { describeError } from './utils.js';

export type QueueTask = () => void;

export type PushOutcome = 'accepted' | 'full' | 'closed';

/**
 * Queue events.
 */
export interface SerialQueueEvents {
  taskFailed: [error: unknown];
  drained: [];
}

export interface SerialQueueOptions {
  /** Used in logs */
  label?: string;
  /** Pending tasks allowed. Default: unbounded */
  maxSize?: number;
  logger?: Logger;
}

export class SerialQueue extends EventEmitter<SerialQueueEvents> {
  readonly label: string;
  readonly maxSize?: number;
  private readonly tasks: QueueTask[] = [];
  private readonly logger: Logger;
  private scheduled: ReturnType<typeof setImmediate> | undefined;
  private closed = false;

  constructor(options: SerialQueueOptions = {}) {
    super();
    this.label = options.label ?? 'ipc';
    this.maxSize = options.maxSize;
    this.logger = (options.logger ?? noopLogger).child({ queue: this.label });
  }

  /** Pending tasks */
  get size(): number {
    return this.tasks.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(task: QueueTask): PushOutcome {
    if (this.closed) {
      return 'closed';
    }
    if (this.maxSize !== undefined && this.tasks.length >= this.maxSize) {
      return 'full';
    }
    this.tasks.push(task);
    this.schedule();
    return 'accepted';
  }

  /**
   * Resolves once every task pushed so far has run.
   */
  onIdle(): Promise<void> {
    if (this.tasks.length === 0 && this.scheduled === undefined) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.once('drained', () => resolve());
    });
  }

  /**
   * Stop accepting tasks. Tasks already queued still run.
   */
  close(): void {
    this.closed = true;
  }

  private schedule(): void {
    if (this.scheduled !== undefined) {
      return;
    }
    this.scheduled = setImmediate(() => this.runNext());
  }

  private runNext(): void {
    this.scheduled = undefined;
    const task = this.tasks.shift();
    if (task) {
      try {
        task();
      } catch (error) {
        this.logger.error('Queued task threw', { error: describeError(error) });
        this.emit('taskFailed', error);
      }
    }

    if (this.tasks.length > 0) {
      this.schedule();
    } else {
      this.emit('drained');
    }
  }
}
