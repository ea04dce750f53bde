/**
 * Composition root
 *
 * Builds the limiter, pool, scheduler, registry, service and HTTP server
 * from one validated configuration and owns their start/stop order. Nothing
 * here is a module-level singleton; tests build as many apps as they need.
 */

import type { Logger } from 'pino';
import type { AddressInfo } from 'node:net';
import { ApiServer } from './api/server.js';
import { AdmissionLimiter } from './core/admission-limiter.js';
import { BatchScheduler } from './core/batch-scheduler.js';
import { ExecutionPool } from './core/execution-pool.js';
import { ModelRegistry } from './models/registry.js';
import {
  createEmbeddingDispatcher,
  InferenceService,
  type EmbeddingScheduler,
} from './services/inference-service.js';
import { MetricsRecorder, TelemetryManager } from './telemetry/otel.js';
import type { RuntimeConfig } from './types/schemas/config.js';

export interface CreateAppOptions {
  logger?: Logger;
  /** Prebuilt registry; defaults to one built from `config.models` */
  registry?: ModelRegistry;
}

export interface GatewayApp {
  readonly config: RuntimeConfig;
  readonly registry: ModelRegistry;
  readonly limiter: AdmissionLimiter;
  readonly pool: ExecutionPool;
  readonly scheduler: EmbeddingScheduler;
  readonly service: InferenceService;
  readonly server: ApiServer;
  readonly telemetry?: TelemetryManager;
  start(): Promise<AddressInfo>;
  /**
   * Drain admissions (bounded by `admission.drain_grace_ms`), flush pending
   * batches, stop the pool, then close the HTTP server and telemetry.
   *
   * @returns whether every admitted request finished within the grace period
   */
  shutdown(): Promise<boolean>;
}

export function createApp(config: RuntimeConfig, options: CreateAppOptions = {}): GatewayApp {
  const logger = options.logger;
  const registry = options.registry ?? ModelRegistry.fromConfig(config.models, logger);

  const limiter = new AdmissionLimiter({
    maxConcurrent: config.admission.max_concurrent,
    maxAdmitted: config.admission.max_admitted,
    queueTimeoutMs: config.admission.queue_timeout_ms,
    drainGraceMs: config.admission.drain_grace_ms,
    logger: logger?.child({ component: 'admission' }),
  });

  // Same bound as the limiter: every running ticket gets a lane.
  const pool = new ExecutionPool({
    maxConcurrent: config.admission.max_concurrent,
    logger: logger?.child({ component: 'pool' }),
  });

  const telemetry = config.telemetry.enabled
    ? new TelemetryManager({
        enabled: true,
        serviceName: config.telemetry.service_name,
        prometheusPort: config.telemetry.prometheus_port,
        logger,
      })
    : undefined;
  const metrics = new MetricsRecorder(telemetry, logger);

  const perModel: Record<string, boolean> = {};
  for (const model of config.models) {
    if (model.batching !== undefined) {
      perModel[model.name] = model.batching;
    }
  }

  const scheduler: EmbeddingScheduler = new BatchScheduler(
    createEmbeddingDispatcher(registry, pool, logger),
    {
      maxBatchSize: config.batching.max_batch_size,
      maxBatchWaitMs: config.batching.max_batch_wait_ms,
      enabled: config.batching.enabled,
      perModel,
      onBatchComplete: (model, size, failed) => metrics.recordBatch(model, size, failed),
      logger: logger?.child({ component: 'batching' }),
    }
  );

  if (config.admission.max_concurrent > 1) {
    const exclusive = registry.handlers().filter((handler) => handler.exclusive);
    if (exclusive.length > 0) {
      logger?.warn(
        {
          models: exclusive.map((handler) => handler.name),
          maxConcurrent: config.admission.max_concurrent,
        },
        'Exclusive models run one call at a time; extra concurrency only queues for them'
      );
    }
  }

  const service = new InferenceService({ registry, limiter, pool, scheduler, metrics, logger });

  const server = new ApiServer(
    {
      host: config.server.host,
      port: config.server.port,
      maxTextChars: config.server.max_text_chars,
      maxBatchSize: config.batching.max_batch_size,
      queueTimeoutMs: config.admission.queue_timeout_ms,
      bodyLimit: config.server.body_limit,
      maxUploadBytes: config.server.max_upload_bytes,
    },
    { service, registry, limiter, logger: logger?.child({ component: 'http' }) }
  );

  return {
    config,
    registry,
    limiter,
    pool,
    scheduler,
    service,
    server,
    telemetry,

    async start(): Promise<AddressInfo> {
      if (telemetry) {
        await telemetry.start();
      }
      const address = await server.start();
      logger?.info(
        { models: registry.list(), maxConcurrent: config.admission.max_concurrent },
        'Gateway ready'
      );
      return address;
    },

    async shutdown(): Promise<boolean> {
      const drained = await limiter.drain();
      await scheduler.flush();
      scheduler.cleanup();
      await pool.shutdown();
      if (server.isRunning()) {
        await server.stop();
      }
      await telemetry?.shutdown();

      logger?.info({ drained }, 'Gateway stopped');
      return drained;
    },
  };
}
