/**
 * Execution Pool
 *
 * Runs model invocations on a bounded number of lanes so that at most
 * `maxConcurrent` handler calls are in progress at once. Work beyond the
 * bound waits in FIFO order.
 *
 * Tasks sharing an exclusive key never overlap; this is how handlers that
 * declare `exclusive: true` (model object not safe for concurrent use) are
 * serialized without an ad hoc lock inside the handler.
 *
 * Failures propagate unchanged. Nothing is retried here: a heavy call that
 * failed from resource exhaustion would most likely fail again.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { cancelledError, shuttingDownError } from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';

/**
 * Unit of work; the signal is the caller's cancellation token, to be
 * checked between internal steps.
 */
export type PoolTask<T> = (signal?: AbortSignal) => Promise<T> | T;

export interface RunOptions {
  signal?: AbortSignal;
}

interface QueuedTask {
  id: string;
  enqueuedAt: number;
  exclusiveKey?: string;
  signal?: AbortSignal;
  onAbort?: () => void;
  /** Invokes the task and settles the caller; never rejects */
  start: () => Promise<void>;
  reject: (error: Error) => void;
}

export interface ExecutionPoolConfig {
  /**
   * Number of lanes. Derived from the admission limiter's maxConcurrent at
   * the composition root so the two bounds agree.
   */
  maxConcurrent: number;
  logger?: Logger;
}

export interface ExecutionPoolStats {
  active: number;
  queued: number;
  maxConcurrent: number;
  exclusiveKeysBusy: string[];
  totalCompleted: number;
  totalFailed: number;
}

export class ExecutionPool {
  private readonly maxConcurrent: number;
  private readonly logger?: Logger;

  private readonly queue: QueuedTask[] = [];
  private readonly active = new Set<string>();
  private readonly busyKeys = new Set<string>();
  private readonly idleWaiters: Array<() => void> = [];
  private closed = false;

  private totalCompleted = 0;
  private totalFailed = 0;

  constructor(config: ExecutionPoolConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new Error(
        `ExecutionPool: maxConcurrent must be a positive integer, got ${config.maxConcurrent}`
      );
    }

    this.maxConcurrent = config.maxConcurrent;
    this.logger = config.logger;

    this.logger?.debug({ maxConcurrent: this.maxConcurrent }, 'ExecutionPool initialized');
  }

  /**
   * Run a task on the next free lane.
   */
  public run<T>(task: PoolTask<T>, options: RunOptions = {}): Promise<T> {
    return this.enqueue(task, undefined, options);
  }

  /**
   * Run a task on the next free lane, never overlapping with other tasks
   * that use the same key.
   */
  public runExclusive<T>(key: string, task: PoolTask<T>, options: RunOptions = {}): Promise<T> {
    return this.enqueue(task, key, options);
  }

  public getStats(): ExecutionPoolStats {
    return {
      active: this.active.size,
      queued: this.queue.length,
      maxConcurrent: this.maxConcurrent,
      exclusiveKeysBusy: Array.from(this.busyKeys),
      totalCompleted: this.totalCompleted,
      totalFailed: this.totalFailed,
    };
  }

  /**
   * Refuse new work, reject queued tasks and wait for running ones.
   */
  public async shutdown(): Promise<void> {
    if (this.closed && this.active.size === 0) {
      return;
    }
    this.closed = true;

    const queued = this.queue.splice(0);
    for (const task of queued) {
      this.detachSignal(task);
      task.reject(shuttingDownError());
    }

    this.logger?.info(
      { rejectedQueued: queued.length, active: this.active.size },
      'ExecutionPool shutting down'
    );

    if (this.active.size === 0) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private enqueue<T>(task: PoolTask<T>, exclusiveKey: string | undefined, options: RunOptions): Promise<T> {
    if (this.closed) {
      return Promise.reject(shuttingDownError());
    }
    if (options.signal?.aborted) {
      return Promise.reject(cancelledError('Task cancelled before execution'));
    }

    return new Promise<T>((resolve, reject) => {
      const id = randomUUID();
      const signal = options.signal;

      const queued: QueuedTask = {
        id,
        enqueuedAt: Date.now(),
        exclusiveKey,
        signal,
        reject,
        start: async () => {
          try {
            const result = await task(signal);
            this.totalCompleted++;
            resolve(result);
          } catch (error) {
            this.totalFailed++;
            lazyLog(
              this.logger,
              'debug',
              () => ({ taskId: id, exclusiveKey, err: error }),
              'Pool task failed'
            );
            reject(error instanceof Error ? error : new Error(String(error)));
          }
        },
      };

      if (signal) {
        queued.onAbort = () => this.cancelQueued(queued);
        signal.addEventListener('abort', queued.onAbort, { once: true });
      }

      this.queue.push(queued);

      lazyLog(
        this.logger,
        'debug',
        () => ({ taskId: id, exclusiveKey, queued: this.queue.length, active: this.active.size }),
        'Pool task enqueued'
      );

      this.processQueue();
    });
  }

  /**
   * Start queued tasks, oldest first, while lanes are free. A task whose
   * exclusive key is busy is skipped until that key frees up.
   */
  private processQueue(): void {
    let index = 0;
    while (this.active.size < this.maxConcurrent && index < this.queue.length) {
      const candidate = this.queue[index];
      if (candidate.exclusiveKey !== undefined && this.busyKeys.has(candidate.exclusiveKey)) {
        index++;
        continue;
      }

      this.queue.splice(index, 1);
      this.detachSignal(candidate);
      this.startTask(candidate);
    }
  }

  private startTask(task: QueuedTask): void {
    this.active.add(task.id);
    if (task.exclusiveKey !== undefined) {
      this.busyKeys.add(task.exclusiveKey);
    }

    lazyLog(
      this.logger,
      'debug',
      () => ({ taskId: task.id, waitedMs: Date.now() - task.enqueuedAt, active: this.active.size }),
      'Pool task started'
    );

    void task.start().finally(() => {
      this.active.delete(task.id);
      if (task.exclusiveKey !== undefined) {
        this.busyKeys.delete(task.exclusiveKey);
      }
      this.processQueue();
      this.notifyIdle();
    });
  }

  private cancelQueued(task: QueuedTask): void {
    const index = this.queue.indexOf(task);
    if (index === -1) {
      return;
    }
    this.queue.splice(index, 1);
    task.reject(cancelledError('Task cancelled while waiting for a worker'));
    lazyLog(this.logger, 'debug', () => ({ taskId: task.id }), 'Pool task cancelled (queued)');
  }

  private detachSignal(task: QueuedTask): void {
    if (task.signal && task.onAbort) {
      task.signal.removeEventListener('abort', task.onAbort);
    }
  }

  private notifyIdle(): void {
    if (this.active.size !== 0 || this.idleWaiters.length === 0) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
