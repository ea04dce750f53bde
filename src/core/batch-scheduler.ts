/**
 * Batch Scheduler
 *
 * Coalesces concurrently arriving requests for the same model into one
 * model invocation, then hands each caller back exactly the slice of the
 * output that corresponds to its inputs.
 *
 * Architecture:
 * - One pending batch per model name, created lazily
 * - Flushes when the pending sub-item count reaches maxBatchSize, or
 *   maxBatchWaitMs after the first item arrived in an empty batch
 * - Flush detaches the pending items synchronously, so later submits start
 *   a fresh batch while the detached one is in flight
 * - A failed invocation rejects every member of that batch with the same
 *   BatchFailure; there is no partial success
 *
 * Output slices are positionally correlated with inputs. A handler that
 * returns a different number of outputs than it was given fails the whole
 * batch rather than delivering misaligned vectors.
 */

import type { Logger } from 'pino';
import {
  batchFailureError,
  cancelledError,
  shuttingDownError,
  type GatewayError,
} from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { safeAverage, safeDivide } from '../utils/math-helpers.js';
import { TimerGuard } from '../utils/timer-guard.js';

/**
 * Performs one model invocation for a concatenated batch of inputs.
 */
export type BatchDispatcher<T, R> = (modelName: string, inputs: T[]) => Promise<R[]>;

/**
 * Batch scheduler configuration
 */
export interface BatchSchedulerConfig {
  /**
   * Maximum number of sub-items in one dispatched batch
   * @default 32
   */
  maxBatchSize: number;

  /**
   * Maximum time a partial batch waits before a forced flush (milliseconds)
   * @default 5
   */
  maxBatchWaitMs: number;

  /**
   * Enable batching globally (can be disabled for debugging)
   * @default true
   */
  enabled: boolean;

  /**
   * Per-model overrides of `enabled`
   */
  perModel?: Record<string, boolean>;

  /**
   * Called once per dispatched batch with its sub-item count and outcome
   */
  onBatchComplete?: (modelName: string, batchSize: number, failed: boolean) => void;

  logger?: Logger;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

/**
 * One caller's contribution to a pending batch
 */
interface BatchItem<T, R> {
  inputs: T[];
  enqueuedAt: number;
  settled: boolean;
  resolve: (outputs: R[]) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

interface PendingBatch<T, R> {
  items: Array<BatchItem<T, R>>;
  size: number;
  timer: TimerGuard;
}

export interface BatchSchedulerStats {
  batches: number;
  requests: number;
  items: number;
  fallbacks: number;
  failures: number;
  cancelled: number;
  pendingItems: Record<string, number>;
  /** Requests per dispatched batch */
  efficiency: number;
  avgBatchSize: number;
  avgQueueLatencyMs: number;
  avgBatchTimeMs: number;
}

export class BatchScheduler<T, R> {
  private readonly dispatcher: BatchDispatcher<T, R>;
  private readonly config: BatchSchedulerConfig;
  private readonly logger?: Logger;

  private readonly pending = new Map<string, PendingBatch<T, R>>();
  private readonly inFlight = new Set<Promise<void>>();

  private stats = {
    batches: 0,
    requests: 0,
    items: 0,
    fallbacks: 0,
    failures: 0,
    cancelled: 0,
  };

  // Rolling window of recent samples
  private performanceMetrics = {
    batchSizes: [] as number[],
    batchTimes: [] as number[],
    queueLatencies: [] as number[],
  };
  private readonly MAX_SAMPLES = 100;

  constructor(dispatcher: BatchDispatcher<T, R>, config: BatchSchedulerConfig) {
    if (!Number.isInteger(config.maxBatchSize) || config.maxBatchSize < 1) {
      throw new Error(
        `BatchScheduler: maxBatchSize must be a positive integer, got ${config.maxBatchSize}`
      );
    }
    if (!(config.maxBatchWaitMs >= 0)) {
      throw new Error(
        `BatchScheduler: maxBatchWaitMs must be >= 0, got ${config.maxBatchWaitMs}`
      );
    }

    this.dispatcher = dispatcher;
    this.config = config;
    this.logger = config.logger;

    this.logger?.info(
      {
        maxBatchSize: config.maxBatchSize,
        maxBatchWaitMs: config.maxBatchWaitMs,
        enabled: config.enabled,
        perModel: config.perModel,
      },
      'BatchScheduler initialized'
    );
  }

  /**
   * Whether submits for `modelName` are coalesced.
   */
  public isEnabled(modelName: string): boolean {
    return this.config.perModel?.[modelName] ?? this.config.enabled;
  }

  /**
   * Submit a caller's ordered inputs and wait for its ordered outputs.
   *
   * Falls back to a direct dispatch of the caller's own inputs when batching
   * is disabled for the model.
   */
  public async submit(modelName: string, inputs: T[], options: SubmitOptions = {}): Promise<R[]> {
    if (inputs.length === 0) {
      return [];
    }

    if (!this.isEnabled(modelName)) {
      this.stats.fallbacks++;
      return this.dispatcher(modelName, inputs);
    }

    if (options.signal?.aborted) {
      throw cancelledError('Request cancelled before batching');
    }

    return new Promise<R[]>((resolve, reject) => {
      const item: BatchItem<T, R> = {
        inputs,
        enqueuedAt: Date.now(),
        settled: false,
        resolve,
        reject,
        signal: options.signal,
      };

      if (item.signal) {
        item.onAbort = () => {
          // Inputs stay in the batch; only this caller's slice is dropped.
          this.stats.cancelled++;
          this.settle(item, () => reject(cancelledError('Request cancelled while batched')));
        };
        item.signal.addEventListener('abort', item.onAbort, { once: true });
      }

      this.stats.requests++;
      this.stats.items += inputs.length;
      this.enqueue(modelName, item);
    });
  }

  /**
   * Force flush pending batches (all models when no name is given) and wait
   * for every in-flight batch to settle.
   */
  public async flush(modelName?: string): Promise<void> {
    const names = modelName !== undefined ? [modelName] : Array.from(this.pending.keys());
    for (const name of names) {
      this.flushModel(name);
    }

    await Promise.all(Array.from(this.inFlight));
    lazyLog(this.logger, 'debug', () => ({ models: names }), 'Batch queues flushed');
  }

  public getStats(): BatchSchedulerStats {
    const pendingItems: Record<string, number> = {};
    for (const [name, batch] of this.pending) {
      if (batch.size > 0) {
        pendingItems[name] = batch.size;
      }
    }

    return {
      ...this.stats,
      pendingItems,
      efficiency: safeDivide(this.stats.requests - this.stats.fallbacks, this.stats.batches),
      avgBatchSize: safeAverage(this.performanceMetrics.batchSizes),
      avgQueueLatencyMs: safeAverage(this.performanceMetrics.queueLatencies),
      avgBatchTimeMs: safeAverage(this.performanceMetrics.batchTimes),
    };
  }

  /**
   * Reset statistics (useful for testing)
   */
  public resetStats(): void {
    this.stats = {
      batches: 0,
      requests: 0,
      items: 0,
      fallbacks: 0,
      failures: 0,
      cancelled: 0,
    };
    this.performanceMetrics = {
      batchSizes: [],
      batchTimes: [],
      queueLatencies: [],
    };
  }

  /**
   * Clear timers and reject anything still pending.
   */
  public cleanup(): void {
    for (const [name, batch] of this.pending) {
      batch.timer.clear();
      const error = shuttingDownError();
      for (const item of batch.items.splice(0)) {
        this.settle(item, () => item.reject(error));
      }
      batch.size = 0;
      this.pending.delete(name);
    }

    this.logger?.debug('BatchScheduler cleaned up');
  }

  private enqueue(modelName: string, item: BatchItem<T, R>): void {
    let batch = this.pending.get(modelName);
    if (!batch) {
      batch = { items: [], size: 0, timer: new TimerGuard(`batch:${modelName}`) };
      this.pending.set(modelName, batch);
    }

    // Never let a batch grow past maxBatchSize: dispatch what is there first.
    if (batch.size > 0 && batch.size + item.inputs.length > this.config.maxBatchSize) {
      this.flushModel(modelName);
    }

    batch.items.push(item);
    batch.size += item.inputs.length;

    lazyLog(
      this.logger,
      'debug',
      () => ({ model: modelName, pendingItems: batch?.size, callers: batch?.items.length }),
      'Batch item queued'
    );

    if (batch.size >= this.config.maxBatchSize) {
      this.flushModel(modelName);
      return;
    }

    if (batch.items.length === 1) {
      batch.timer.set(() => this.flushModel(modelName), this.config.maxBatchWaitMs);
    }
  }

  /**
   * Detach the model's pending items and dispatch them as one batch.
   */
  private flushModel(modelName: string): void {
    const batch = this.pending.get(modelName);
    if (!batch) {
      return;
    }

    batch.timer.clear();
    const items = batch.items.splice(0);
    batch.size = 0;

    if (items.length === 0) {
      return;
    }

    const dispatch = this.dispatchBatch(modelName, items);
    this.inFlight.add(dispatch);
    void dispatch.finally(() => this.inFlight.delete(dispatch));
  }

  private async dispatchBatch(modelName: string, items: Array<BatchItem<T, R>>): Promise<void> {
    const inputs = items.flatMap((item) => item.inputs);
    const batchStartTime = Date.now();
    const queueLatencies = items.map((item) => batchStartTime - item.enqueuedAt);

    this.stats.batches++;

    lazyLog(
      this.logger,
      'debug',
      () => ({ model: modelName, batchSize: inputs.length, callers: items.length }),
      'Flushing batch'
    );

    let outputs: R[];
    try {
      outputs = await this.dispatcher(modelName, inputs);
      if (outputs.length !== inputs.length) {
        throw new Error(
          `Handler returned ${outputs.length} output(s) for ${inputs.length} input(s)`
        );
      }
    } catch (err) {
      this.stats.failures++;
      const error: GatewayError = batchFailureError(modelName, inputs.length, err);

      this.logger?.error(
        { err, model: modelName, batchSize: inputs.length, callers: items.length },
        'Batch dispatch failed'
      );

      for (const item of items) {
        this.settle(item, () => item.reject(error));
      }
      this.notifyBatchComplete(modelName, inputs.length, true);
      return;
    }

    let offset = 0;
    for (const item of items) {
      const slice = outputs.slice(offset, offset + item.inputs.length);
      offset += item.inputs.length;
      this.settle(item, () => item.resolve(slice));
    }

    this.recordBatchMetrics(Date.now() - batchStartTime, inputs.length, queueLatencies);
    this.notifyBatchComplete(modelName, inputs.length, false);
  }

  private notifyBatchComplete(modelName: string, batchSize: number, failed: boolean): void {
    if (!this.config.onBatchComplete) {
      return;
    }
    try {
      this.config.onBatchComplete(modelName, batchSize, failed);
    } catch (err) {
      this.logger?.warn({ err, model: modelName }, 'Batch completion hook failed');
    }
  }

  private settle(item: BatchItem<T, R>, finish: () => void): void {
    if (item.settled) {
      return;
    }
    item.settled = true;
    if (item.signal && item.onAbort) {
      item.signal.removeEventListener('abort', item.onAbort);
    }
    finish();
  }

  private recordBatchMetrics(batchTime: number, batchSize: number, queueLatencies: number[]): void {
    const metrics = this.performanceMetrics;

    metrics.batchTimes.push(batchTime);
    metrics.batchSizes.push(batchSize);
    metrics.queueLatencies.push(...queueLatencies);

    if (metrics.batchTimes.length > this.MAX_SAMPLES) {
      metrics.batchTimes = metrics.batchTimes.slice(-this.MAX_SAMPLES);
    }
    if (metrics.batchSizes.length > this.MAX_SAMPLES) {
      metrics.batchSizes = metrics.batchSizes.slice(-this.MAX_SAMPLES);
    }
    if (metrics.queueLatencies.length > this.MAX_SAMPLES * 10) {
      // More latency samples than batches (each batch has multiple callers)
      metrics.queueLatencies = metrics.queueLatencies.slice(-this.MAX_SAMPLES * 10);
    }
  }
}
