export { createApp, type CreateAppOptions, type GatewayApp } from './app.js';
export { ApiServer, type ApiServerConfig, type ApiServerDeps } from './api/server.js';
export {
  GatewayError,
  type GatewayErrorCode,
  type GatewayErrorShape,
  isAdmissionError,
  toGatewayError,
  httpStatusFor,
} from './api/errors.js';

export { AdmissionLimiter, type AdmissionLimiterConfig, type AdmissionLimiterEvents } from './core/admission-limiter.js';
export { ExecutionPool, type ExecutionPoolConfig, type ExecutionPoolStats, type PoolTask } from './core/execution-pool.js';
export {
  BatchScheduler,
  type BatchDispatcher,
  type BatchSchedulerConfig,
  type BatchSchedulerStats,
} from './core/batch-scheduler.js';

export {
  InferenceService,
  createEmbeddingDispatcher,
  type EmbeddingResult,
  type CallOptions,
} from './services/inference-service.js';

export { ModelRegistry, HANDLER_KINDS, type HandlerKind, type HandlerFactory } from './models/registry.js';
export { HashingEmbedding } from './models/hashing-embedding.js';
export { ToneSpeech } from './models/tone-speech.js';

export { loadConfig, validateConfig, type Config, type ModelEntry } from './config/loader.js';
export { TelemetryManager, MetricsRecorder, type TelemetryConfig, type GatewayMetrics } from './telemetry/otel.js';
export { createRootLogger } from './utils/logger-helpers.js';

export type * from './types/models.js';
export type * from './types/concurrency.js';
