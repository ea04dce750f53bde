/**
 * Admission and execution types
 */

export type TicketState = 'queued' | 'running' | 'released';

/**
 * One in-flight request's claim on capacity.
 *
 * Only the limiter mutates `state`; holders treat the ticket as opaque.
 */
export interface AdmissionTicket {
  readonly id: string;
  readonly createdAt: number;
  state: TicketState;
}

export interface AdmissionLimits {
  /** Execution parallelism ceiling */
  maxConcurrent: number;
  /** Total admission ceiling (running + waiting) */
  maxAdmitted: number;
  /** Max wait for an execution slot */
  queueTimeoutMs: number;
  /** Grace period `drain()` uses when called without one (default 30s) */
  drainGraceMs?: number;
}

export interface AcquireOptions {
  signal?: AbortSignal;
}

export interface AdmissionStats {
  running: number;
  waiting: number;
  admitted: number;
  maxConcurrent: number;
  maxAdmitted: number;
  shuttingDown: boolean;
  totalAdmitted: number;
  totalQueued: number;
  totalReleased: number;
  totalTimeouts: number;
  totalRejected: number;
  totalCancelled: number;
}
