/**
 * Gateway error utilities.
 *
 * Provides a consistent error type for the admission, batching and
 * execution layers, plus helpers to convert arbitrary failures into
 * GatewayError instances the HTTP surface can map to status codes.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 *
 * The three admission codes (`QueueFull`, `QueueTimeout`, `ShuttingDown`)
 * are recoverable signals: the caller translates them into retry guidance
 * and they are never retried internally.
 */
export type GatewayErrorCode =
  | 'QueueFull'
  | 'QueueTimeout'
  | 'ShuttingDown'
  | 'BatchFailure'
  | 'InferenceFailed'
  | 'Cancelled'
  | 'ModelNotFound'
  | 'UnsupportedCapability'
  | 'InvalidParams'
  | 'ValidationError'
  | 'ConfigError'
  | 'InternalError';

/**
 * Plain serializable error shape (JSON responses / telemetry)
 */
export interface GatewayErrorShape {
  code: GatewayErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class GatewayError extends Error implements GatewayErrorShape {
  public readonly code: GatewayErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: GatewayErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GatewayError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): GatewayErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Admission errors are the ones clients should back off and retry.
 */
export function isAdmissionError(error: unknown): error is GatewayError {
  return (
    error instanceof GatewayError &&
    (error.code === 'QueueFull' || error.code === 'QueueTimeout' || error.code === 'ShuttingDown')
  );
}

/**
 * Map unknown errors into GatewayError instances.
 *
 * @param error - Error thrown by a handler, the pool or the transport
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toGatewayError(
  error: unknown,
  fallbackCode: GatewayErrorCode = 'InternalError'
): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new GatewayError('Cancelled', error.message || 'Operation aborted by caller', undefined, {
        cause: error,
      });
    }

    return new GatewayError(fallbackCode, error.message, undefined, { cause: error });
  }

  return new GatewayError(fallbackCode, 'Unknown gateway error', { value: String(error) });
}

export function queueFullError(admitted: number, maxAdmitted: number): GatewayError {
  return new GatewayError(
    'QueueFull',
    `Request queue full (${admitted}/${maxAdmitted} admitted)`,
    { admitted, maxAdmitted }
  );
}

export function queueTimeoutError(ticketId: string, timeoutMs: number): GatewayError {
  return new GatewayError(
    'QueueTimeout',
    `Timed out after ${timeoutMs}ms waiting for an execution slot (ticket: ${ticketId})`,
    { ticketId, timeoutMs }
  );
}

export function shuttingDownError(): GatewayError {
  return new GatewayError('ShuttingDown', 'Service is shutting down');
}

export function cancelledError(reason?: string): GatewayError {
  return new GatewayError('Cancelled', reason ?? 'Operation cancelled by caller');
}

/**
 * Batch failure shared by every member of a flushed batch.
 */
export function batchFailureError(
  modelName: string,
  batchSize: number,
  cause: unknown
): GatewayError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new GatewayError(
    'BatchFailure',
    `Batch of ${batchSize} item(s) for model ${modelName} failed: ${reason}`,
    { model: modelName, batchSize },
    { cause }
  );
}

/**
 * Convert Zod validation error to GatewayError
 *
 * Only the first issue ends up in the message; all issues are kept in
 * `details.issues`.
 *
 * @example
 * ```typescript
 * const result = EmbeddingRequestSchema.safeParse({ model: '' });
 * if (!result.success) {
 *   throw zodErrorToGatewayError(result.error);
 * }
 * // Throws: "Validation error on field 'model': Model cannot be empty"
 * ```
 */
export function zodErrorToGatewayError(error: ZodError): GatewayError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new GatewayError('ValidationError', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

const HTTP_STATUS: Record<GatewayErrorCode, number> = {
  QueueFull: 429,
  QueueTimeout: 429,
  ShuttingDown: 503,
  BatchFailure: 500,
  InferenceFailed: 500,
  Cancelled: 499,
  ModelNotFound: 404,
  UnsupportedCapability: 400,
  InvalidParams: 400,
  ValidationError: 400,
  ConfigError: 500,
  InternalError: 500,
};

/**
 * HTTP status code for an error code.
 */
export function httpStatusFor(code: GatewayErrorCode): number {
  return HTTP_STATUS[code];
}
