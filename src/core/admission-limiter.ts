/**
 * Admission Limiter
 *
 * Bounds the number of requests admitted into the service (running plus
 * waiting) and, within those, the number allowed to execute at once.
 *
 * Architecture:
 * - Admission check is non-blocking: above `maxAdmitted` the caller is
 *   rejected immediately with QueueFull
 * - Admitted callers beyond `maxConcurrent` wait on a FIFO list, bounded
 *   by `queueTimeoutMs` and by the caller's AbortSignal
 * - `drain()` stops new admissions and waits for in-flight tickets
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import {
  cancelledError,
  queueFullError,
  queueTimeoutError,
  shuttingDownError,
} from '../api/errors.js';
import type {
  AcquireOptions,
  AdmissionLimits,
  AdmissionStats,
  AdmissionTicket,
} from '../types/concurrency.js';
import { lazyLog } from '../utils/logger-helpers.js';

/**
 * Parked ticket waiting for a run slot
 */
interface Waiter {
  ticket: AdmissionTicket;
  enqueuedAt: number;
  resolve: () => void;
  reject: (error: Error) => void;
  timeoutHandle?: NodeJS.Timeout;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Admission limiter events
 */
export interface AdmissionLimiterEvents {
  admitted: (ticketId: string, waitedMs: number) => void;
  queued: (ticketId: string, waiting: number) => void;
  released: (ticketId: string) => void;
  timeout: (ticketId: string) => void;
  rejected: (reason: 'queue_full' | 'shutting_down') => void;
  cancelled: (ticketId: string) => void;
  drained: (completed: boolean) => void;
}

export const DEFAULT_DRAIN_GRACE_MS = 30_000;

export interface AdmissionLimiterConfig extends AdmissionLimits {
  logger?: Logger;
}

export class AdmissionLimiter extends EventEmitter<AdmissionLimiterEvents> {
  private readonly logger?: Logger;
  private readonly maxConcurrent: number;
  private readonly maxAdmitted: number;
  private readonly queueTimeoutMs: number;
  private readonly drainGraceMs: number;

  private running = 0;
  private admitted = 0;
  private shuttingDown = false;
  private readonly waiters: Waiter[] = [];
  private readonly idleWaiters: Array<() => void> = [];

  // Statistics
  private totalAdmitted = 0;
  private totalQueued = 0;
  private totalReleased = 0;
  private totalTimeouts = 0;
  private totalRejected = 0;
  private totalCancelled = 0;

  constructor(config: AdmissionLimiterConfig) {
    super();

    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new Error(
        `AdmissionLimiter: maxConcurrent must be a positive integer, got ${config.maxConcurrent}`
      );
    }
    if (!Number.isInteger(config.maxAdmitted) || config.maxAdmitted < config.maxConcurrent) {
      throw new Error(
        `AdmissionLimiter: maxAdmitted (${config.maxAdmitted}) must be an integer >= maxConcurrent (${config.maxConcurrent})`
      );
    }
    if (config.drainGraceMs !== undefined && !(config.drainGraceMs >= 0)) {
      throw new Error(
        `AdmissionLimiter: drainGraceMs must be >= 0, got ${config.drainGraceMs}`
      );
    }
    if (!(config.queueTimeoutMs > 0)) {
      throw new Error(
        `AdmissionLimiter: queueTimeoutMs must be positive, got ${config.queueTimeoutMs}`
      );
    }

    this.maxConcurrent = config.maxConcurrent;
    this.maxAdmitted = config.maxAdmitted;
    this.queueTimeoutMs = config.queueTimeoutMs;
    this.drainGraceMs = config.drainGraceMs ?? DEFAULT_DRAIN_GRACE_MS;
    this.logger = config.logger;

    this.logger?.info(
      {
        maxConcurrent: this.maxConcurrent,
        maxAdmitted: this.maxAdmitted,
        queueTimeoutMs: this.queueTimeoutMs,
      },
      'AdmissionLimiter initialized'
    );
  }

  /**
   * Acquire an admission ticket and, once available, an execution slot.
   *
   * @throws GatewayError `ShuttingDown` or `QueueFull` immediately,
   * `QueueTimeout` after `queueTimeoutMs`, `Cancelled` when the signal aborts
   */
  public async acquire(options: AcquireOptions = {}): Promise<AdmissionTicket> {
    const { signal } = options;

    if (this.shuttingDown) {
      this.totalRejected++;
      this.safeEmit('rejected', () => this.emit('rejected', 'shutting_down'));
      throw shuttingDownError();
    }

    if (signal?.aborted) {
      this.totalCancelled++;
      throw cancelledError('Request cancelled before admission');
    }

    if (this.admitted >= this.maxAdmitted) {
      this.totalRejected++;
      this.safeEmit('rejected', () => this.emit('rejected', 'queue_full'));
      this.logger?.warn(
        { admitted: this.admitted, maxAdmitted: this.maxAdmitted, running: this.running },
        'Admission rejected (queue full)'
      );
      throw queueFullError(this.admitted, this.maxAdmitted);
    }

    const ticket: AdmissionTicket = {
      id: randomUUID(),
      createdAt: Date.now(),
      state: 'queued',
    };
    this.admitted++;

    if (this.running < this.maxConcurrent) {
      this.startTicket(ticket, 0);
      return ticket;
    }

    await this.park(ticket, signal);
    return ticket;
  }

  /**
   * Release a ticket. Releasing twice is a logged no-op.
   */
  public release(ticket: AdmissionTicket): void {
    if (ticket.state === 'released') {
      this.logger?.warn({ ticketId: ticket.id }, 'Attempted to release an already released ticket');
      return;
    }

    if (ticket.state === 'queued') {
      // Queued tickets are never handed out; they leave through abandonWaiter().
      this.logger?.warn({ ticketId: ticket.id }, 'Attempted to release a ticket that is not running');
      return;
    }

    this.running--;
    ticket.state = 'released';
    this.admitted--;
    this.totalReleased++;
    this.safeEmit('released', () => this.emit('released', ticket.id));

    lazyLog(
      this.logger,
      'debug',
      () => ({ ticketId: ticket.id, running: this.running, admitted: this.admitted }),
      'Ticket released'
    );

    this.promoteNext();
    this.notifyIdle();
  }

  /**
   * Run `fn` while admitted; the ticket is released on every exit path.
   */
  public async run<T>(
    fn: (ticket: AdmissionTicket) => Promise<T> | T,
    options: AcquireOptions = {}
  ): Promise<T> {
    const ticket = await this.acquire(options);
    try {
      return await fn(ticket);
    } finally {
      this.release(ticket);
    }
  }

  /**
   * Stop admitting and wait for admitted tickets to finish.
   *
   * @param graceMs - Upper bound on the wait; defaults to `drainGraceMs`
   * @returns true when every ticket completed within the grace period
   */
  public async drain(graceMs: number = this.drainGraceMs): Promise<boolean> {
    this.shuttingDown = true;

    this.logger?.info(
      { admitted: this.admitted, running: this.running, graceMs },
      'AdmissionLimiter draining'
    );

    if (this.admitted === 0) {
      this.safeEmit('drained', () => this.emit('drained', true));
      return true;
    }

    const completed = await new Promise<boolean>((resolve) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        const index = this.idleWaiters.indexOf(onIdle);
        if (index !== -1) this.idleWaiters.splice(index, 1);
        resolve(false);
      }, graceMs);

      const onIdle = (): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };
      this.idleWaiters.push(onIdle);
    });

    if (completed) {
      this.logger?.info('AdmissionLimiter drained');
    } else {
      this.logger?.warn(
        { admitted: this.admitted, running: this.running, graceMs },
        'Drain grace period elapsed with tickets still admitted'
      );
    }
    this.safeEmit('drained', () => this.emit('drained', completed));
    return completed;
  }

  public isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  public getStats(): AdmissionStats {
    return {
      running: this.running,
      waiting: this.waiters.length,
      admitted: this.admitted,
      maxConcurrent: this.maxConcurrent,
      maxAdmitted: this.maxAdmitted,
      shuttingDown: this.shuttingDown,
      totalAdmitted: this.totalAdmitted,
      totalQueued: this.totalQueued,
      totalReleased: this.totalReleased,
      totalTimeouts: this.totalTimeouts,
      totalRejected: this.totalRejected,
      totalCancelled: this.totalCancelled,
    };
  }

  private park(ticket: AdmissionTicket, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        ticket,
        enqueuedAt: Date.now(),
        resolve,
        reject,
        signal,
      };

      waiter.timeoutHandle = setTimeout(() => {
        this.abandonWaiter(waiter, 'timeout');
      }, this.queueTimeoutMs);

      if (signal) {
        waiter.onAbort = () => this.abandonWaiter(waiter, 'cancelled');
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
      this.totalQueued++;
      this.safeEmit('queued', () => this.emit('queued', ticket.id, this.waiters.length));

      this.logger?.info(
        {
          ticketId: ticket.id,
          waiting: this.waiters.length,
          running: this.running,
          maxConcurrent: this.maxConcurrent,
        },
        'Request queued (at concurrency limit)'
      );
    });
  }

  /**
   * Remove a waiter that timed out or was cancelled, releasing its admission.
   */
  private abandonWaiter(waiter: Waiter, reason: 'timeout' | 'cancelled'): void {
    const index = this.waiters.indexOf(waiter);
    if (index === -1) {
      return;
    }

    this.waiters.splice(index, 1);
    this.disposeWaiter(waiter);

    waiter.ticket.state = 'released';
    this.admitted--;
    this.totalReleased++;

    if (reason === 'timeout') {
      this.totalTimeouts++;
      this.safeEmit('timeout', () => this.emit('timeout', waiter.ticket.id));
      this.logger?.warn(
        { ticketId: waiter.ticket.id, timeoutMs: this.queueTimeoutMs },
        'Queued request timed out'
      );
      waiter.reject(queueTimeoutError(waiter.ticket.id, this.queueTimeoutMs));
    } else {
      this.totalCancelled++;
      this.safeEmit('cancelled', () => this.emit('cancelled', waiter.ticket.id));
      this.logger?.info({ ticketId: waiter.ticket.id }, 'Queued request cancelled');
      waiter.reject(cancelledError('Request cancelled while waiting for an execution slot'));
    }

    this.notifyIdle();
  }

  private promoteNext(): void {
    while (this.running < this.maxConcurrent && this.waiters.length > 0) {
      const next = this.waiters.shift();
      if (!next) {
        return;
      }
      this.disposeWaiter(next);
      this.startTicket(next.ticket, Date.now() - next.enqueuedAt);
      next.resolve();
    }
  }

  private startTicket(ticket: AdmissionTicket, waitedMs: number): void {
    ticket.state = 'running';
    this.running++;
    this.totalAdmitted++;
    this.safeEmit('admitted', () => this.emit('admitted', ticket.id, waitedMs));

    lazyLog(
      this.logger,
      'debug',
      () => ({
        ticketId: ticket.id,
        waitedMs,
        running: this.running,
        admitted: this.admitted,
      }),
      'Ticket running'
    );
  }

  private disposeWaiter(waiter: Waiter): void {
    if (waiter.timeoutHandle) {
      clearTimeout(waiter.timeoutHandle);
      waiter.timeoutHandle = undefined;
    }
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }

  private notifyIdle(): void {
    if (this.admitted !== 0 || this.idleWaiters.length === 0) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }

  /**
   * Listener failures must never break admission bookkeeping.
   */
  private safeEmit(event: keyof AdmissionLimiterEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err, event }, 'Error emitting admission event');
    }
  }
}
