import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BatchScheduler, type BatchSchedulerConfig } from '../../../src/core/batch-scheduler.js';
import { GatewayError } from '../../../src/api/errors.js';

/**
 * Model stub whose "vector" for each input is its index within the batch.
 */
function indexDispatcher() {
  return vi.fn(async (_model: string, inputs: string[]) => inputs.map((_, index) => index));
}

function createScheduler(
  dispatcher: (model: string, inputs: string[]) => Promise<number[]>,
  overrides: Partial<BatchSchedulerConfig> = {}
): BatchScheduler<string, number> {
  return new BatchScheduler(dispatcher, {
    maxBatchSize: 8,
    maxBatchWaitMs: 10,
    enabled: true,
    ...overrides,
  });
}

describe('BatchScheduler', () => {
  let scheduler: BatchScheduler<string, number> | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    scheduler?.cleanup();
    scheduler = undefined;
    vi.useRealTimers();
  });

  describe('ordering', () => {
    it('returns each caller exactly its slice of the batch output', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher);

      const a = scheduler.submit('embedder', ['a0', 'a1']);
      const b = scheduler.submit('embedder', ['b0']);
      const c = scheduler.submit('embedder', ['c0', 'c1', 'c2']);

      await vi.advanceTimersByTimeAsync(10);

      await expect(a).resolves.toEqual([0, 1]);
      await expect(b).resolves.toEqual([2]);
      await expect(c).resolves.toEqual([3, 4, 5]);

      expect(dispatcher).toHaveBeenCalledTimes(1);
      expect(dispatcher).toHaveBeenCalledWith('embedder', ['a0', 'a1', 'b0', 'c0', 'c1', 'c2']);
    });

    it('keeps batches for different models apart', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher);

      const first = scheduler.submit('model-a', ['x']);
      const second = scheduler.submit('model-b', ['y', 'z']);
      await vi.advanceTimersByTimeAsync(10);

      await expect(first).resolves.toEqual([0]);
      await expect(second).resolves.toEqual([0, 1]);
      expect(dispatcher).toHaveBeenCalledWith('model-a', ['x']);
      expect(dispatcher).toHaveBeenCalledWith('model-b', ['y', 'z']);
    });
  });

  describe('flush triggers', () => {
    it('flushes as soon as the batch reaches maxBatchSize', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher, { maxBatchSize: 3 });

      const results = Promise.all([
        scheduler.submit('embedder', ['a']),
        scheduler.submit('embedder', ['b']),
        scheduler.submit('embedder', ['c']),
      ]);

      expect(dispatcher).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
      await expect(results).resolves.toEqual([[0], [1], [2]]);
    });

    it('flushes a partial batch exactly at the wait deadline', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher, { maxBatchWaitMs: 10 });

      const pending = scheduler.submit('embedder', ['only']);

      await vi.advanceTimersByTimeAsync(9);
      expect(dispatcher).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(dispatcher).toHaveBeenCalledTimes(1);
      await expect(pending).resolves.toEqual([0]);
    });

    it('dispatches the current batch first when a caller would overflow it', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher, { maxBatchSize: 4 });

      const a = scheduler.submit('embedder', ['a0', 'a1', 'a2']);
      const b = scheduler.submit('embedder', ['b0', 'b1']);

      expect(dispatcher).toHaveBeenCalledTimes(1);
      expect(dispatcher).toHaveBeenLastCalledWith('embedder', ['a0', 'a1', 'a2']);

      await vi.advanceTimersByTimeAsync(10);

      expect(dispatcher).toHaveBeenCalledTimes(2);
      expect(dispatcher).toHaveBeenLastCalledWith('embedder', ['b0', 'b1']);
      await expect(a).resolves.toEqual([0, 1, 2]);
      await expect(b).resolves.toEqual([0, 1]);
    });

    it('flush() dispatches pending work and waits for it', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher);

      const pending = scheduler.submit('embedder', ['a', 'b']);
      await scheduler.flush();

      expect(dispatcher).toHaveBeenCalledTimes(1);
      await expect(pending).resolves.toEqual([0, 1]);
      expect(scheduler.getStats().pendingItems).toEqual({});
    });
  });

  describe('failures', () => {
    it('rejects every member of a failed batch with the same BatchFailure', async () => {
      const dispatcher = vi.fn(async (_model: string, _inputs: string[]): Promise<number[]> => {
        throw new Error('out of memory');
      });
      scheduler = createScheduler(dispatcher);

      const errors: unknown[] = [];
      const a = scheduler.submit('embedder', ['a']).catch((error: unknown) => errors.push(error));
      const b = scheduler.submit('embedder', ['b']).catch((error: unknown) => errors.push(error));

      await vi.advanceTimersByTimeAsync(10);
      await Promise.all([a, b]);

      expect(errors).toHaveLength(2);
      expect(errors[0]).toBe(errors[1]);
      expect(errors[0]).toBeInstanceOf(GatewayError);
      expect(errors[0]).toMatchObject({
        code: 'BatchFailure',
        message: 'Batch of 2 item(s) for model embedder failed: out of memory',
        details: { model: 'embedder', batchSize: 2 },
      });
      expect(scheduler.getStats().failures).toBe(1);
    });

    it('fails the batch when the handler returns the wrong number of outputs', async () => {
      const dispatcher = vi.fn(async () => [0]);
      scheduler = createScheduler(dispatcher);

      const pending = scheduler.submit('embedder', ['a', 'b']);
      const assertion = expect(pending).rejects.toMatchObject({
        code: 'BatchFailure',
        message: 'Batch of 2 item(s) for model embedder failed: Handler returned 1 output(s) for 2 input(s)',
      });

      await vi.advanceTimersByTimeAsync(10);
      await assertion;
    });

    it('reports every batch outcome to onBatchComplete', async () => {
      const onBatchComplete = vi.fn();
      const dispatcher = vi
        .fn(async (_model: string, inputs: string[]) => inputs.map((_, index) => index))
        .mockResolvedValueOnce([0, 1])
        .mockRejectedValueOnce(new Error('boom'));
      scheduler = createScheduler(dispatcher, { onBatchComplete });

      const ok = scheduler.submit('embedder', ['a', 'b']);
      await vi.advanceTimersByTimeAsync(10);
      await ok;

      const failed = scheduler.submit('embedder', ['c']).catch(() => undefined);
      await vi.advanceTimersByTimeAsync(10);
      await failed;

      expect(onBatchComplete.mock.calls).toEqual([
        ['embedder', 2, false],
        ['embedder', 1, true],
      ]);
    });
  });

  describe('cancellation', () => {
    it('rejects the cancelled caller but still dispatches its items', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher);
      const controller = new AbortController();

      const cancelled = scheduler.submit('embedder', ['a'], { signal: controller.signal });
      const other = scheduler.submit('embedder', ['b']);

      controller.abort();
      await expect(cancelled).rejects.toMatchObject({ code: 'Cancelled' });

      await vi.advanceTimersByTimeAsync(10);

      expect(dispatcher).toHaveBeenCalledWith('embedder', ['a', 'b']);
      await expect(other).resolves.toEqual([1]);
      expect(scheduler.getStats().cancelled).toBe(1);
    });

    it('rejects a caller whose signal is already aborted', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher);
      const controller = new AbortController();
      controller.abort();

      await expect(
        scheduler.submit('embedder', ['a'], { signal: controller.signal })
      ).rejects.toMatchObject({ code: 'Cancelled' });
      expect(dispatcher).not.toHaveBeenCalled();
    });
  });

  describe('degenerate mode', () => {
    it('calls the dispatcher directly when batching is disabled', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher, { enabled: false });

      await expect(scheduler.submit('embedder', ['a', 'b'])).resolves.toEqual([0, 1]);
      await expect(scheduler.submit('embedder', ['c'])).resolves.toEqual([0]);

      expect(dispatcher).toHaveBeenCalledTimes(2);
      expect(scheduler.getStats()).toMatchObject({ fallbacks: 2, batches: 0 });
    });

    it('honours per-model overrides', () => {
      scheduler = createScheduler(indexDispatcher(), {
        enabled: true,
        perModel: { speech: false, embedder: true },
      });

      expect(scheduler.isEnabled('speech')).toBe(false);
      expect(scheduler.isEnabled('embedder')).toBe(true);
      expect(scheduler.isEnabled('unlisted')).toBe(true);
    });

    it('returns an empty result for empty input without dispatching', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher);

      await expect(scheduler.submit('embedder', [])).resolves.toEqual([]);
      expect(dispatcher).not.toHaveBeenCalled();
    });
  });

  describe('lifecycle', () => {
    it('cleanup() rejects pending callers with ShuttingDown', async () => {
      const dispatcher = indexDispatcher();
      scheduler = createScheduler(dispatcher);

      const pending = scheduler.submit('embedder', ['a']);
      scheduler.cleanup();

      await expect(pending).rejects.toMatchObject({ code: 'ShuttingDown' });
      await vi.advanceTimersByTimeAsync(10);
      expect(dispatcher).not.toHaveBeenCalled();
    });

    it('tracks batch statistics', async () => {
      scheduler = createScheduler(indexDispatcher());

      const all = Promise.all([
        scheduler.submit('embedder', ['a0', 'a1']),
        scheduler.submit('embedder', ['b0']),
        scheduler.submit('embedder', ['c0', 'c1', 'c2']),
      ]);
      await vi.advanceTimersByTimeAsync(10);
      await all;

      expect(scheduler.getStats()).toMatchObject({
        batches: 1,
        requests: 3,
        items: 6,
        efficiency: 3,
        avgBatchSize: 6,
      });

      scheduler.resetStats();
      expect(scheduler.getStats()).toMatchObject({
        batches: 0,
        requests: 0,
        items: 0,
        efficiency: 0,
        avgBatchSize: 0,
      });
    });
  });
});
