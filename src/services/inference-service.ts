/**
 * Inference Service
 *
 * Request-level entry point behind the HTTP routes. Every call is scoped by
 * an admission ticket; the model invocation itself runs on the execution
 * pool, through the batch scheduler for embeddings when batching is enabled
 * for the model.
 */

import type { Logger } from 'pino';
import {
  GatewayError,
  toGatewayError,
  type GatewayErrorCode,
} from '../api/errors.js';
import type { AdmissionLimiter } from '../core/admission-limiter.js';
import type { BatchDispatcher, BatchScheduler } from '../core/batch-scheduler.js';
import type { ExecutionPool, PoolTask } from '../core/execution-pool.js';
import type { ModelRegistry } from '../models/registry.js';
import type { MetricsRecorder, RequestStatus } from '../telemetry/otel.js';
import {
  isEmbeddingModel,
  isSpeechModel,
  isTranscriptionModel,
  type EmbeddingModel,
  type ModelCapability,
  type ModelHandler,
  type SpeechModel,
  type SpeechOptions,
  type SpeechResult,
  type TranscriptionModel,
  type TranscriptionOptions,
  type TranscriptionResult,
} from '../types/models.js';

export type EmbeddingScheduler = BatchScheduler<string, number[]>;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface EmbeddingResult {
  vectors: number[][];
  promptTokens: number;
}

interface InvokeContext {
  pool: ExecutionPool;
  logger?: Logger;
}

/**
 * Run one handler invocation on the pool. Handlers that declare
 * `exclusive` are serialized under their model name.
 *
 * On failure the handler's `releaseResources()` runs before the original
 * error is rethrown; a failure inside cleanup is only logged.
 */
export async function invokeHandler<T>(
  ctx: InvokeContext,
  handler: ModelHandler,
  task: PoolTask<T>,
  options: CallOptions & { batchSize: number }
): Promise<T> {
  const runOptions = { signal: options.signal };
  try {
    return handler.exclusive
      ? await ctx.pool.runExclusive(handler.name, task, runOptions)
      : await ctx.pool.run(task, runOptions);
  } catch (err) {
    if (err instanceof GatewayError && (err.code === 'Cancelled' || err.code === 'ShuttingDown')) {
      throw err;
    }

    ctx.logger?.error(
      { err, model: handler.name, batchSize: options.batchSize, device: handler.device },
      'Model invocation failed'
    );

    if (handler.releaseResources) {
      try {
        await handler.releaseResources();
      } catch (cleanupError) {
        ctx.logger?.warn(
          { err: cleanupError, model: handler.name },
          'releaseResources failed after model error'
        );
      }
    }
    throw err;
  }
}

/**
 * Dispatcher for the embedding batch scheduler: one pool invocation per
 * flushed batch. Batches are shared, so no single caller's signal is
 * passed down.
 */
export function createEmbeddingDispatcher(
  registry: ModelRegistry,
  pool: ExecutionPool,
  logger?: Logger
): BatchDispatcher<string, number[]> {
  return async (modelName, texts) => {
    const handler = requireEmbedding(registry.get(modelName));
    return invokeHandler(
      { pool, logger },
      handler,
      async (signal) => handler.embed(texts, signal),
      { batchSize: texts.length }
    );
  };
}

function unsupported(handler: ModelHandler, capability: ModelCapability): GatewayError {
  return new GatewayError(
    'UnsupportedCapability',
    `Model ${handler.name} does not support ${capability}`,
    { model: handler.name, capability }
  );
}

function requireEmbedding(handler: ModelHandler): EmbeddingModel {
  if (!isEmbeddingModel(handler)) {
    throw unsupported(handler, 'text-embedding');
  }
  return handler;
}

function requireTranscription(
  handler: ModelHandler,
  capability: ModelCapability
): TranscriptionModel {
  if (!isTranscriptionModel(handler) || !handler.capabilities.includes(capability)) {
    throw unsupported(handler, capability);
  }
  return handler;
}

function requireSpeech(handler: ModelHandler): SpeechModel {
  if (!isSpeechModel(handler)) {
    throw unsupported(handler, 'text-to-speech');
  }
  return handler;
}

const REJECTION_REASON: Partial<Record<GatewayErrorCode, 'full' | 'timeout' | 'shutting_down'>> = {
  QueueFull: 'full',
  QueueTimeout: 'timeout',
  ShuttingDown: 'shutting_down',
};

/** Caller mistakes; counted apart from model failures */
const INVALID_REQUEST_CODES: ReadonlySet<GatewayErrorCode> = new Set<GatewayErrorCode>([
  'ModelNotFound',
  'UnsupportedCapability',
  'InvalidParams',
  'ValidationError',
]);

export interface InferenceServiceDeps {
  registry: ModelRegistry;
  limiter: AdmissionLimiter;
  pool: ExecutionPool;
  scheduler: EmbeddingScheduler;
  metrics?: MetricsRecorder;
  logger?: Logger;
}

export class InferenceService {
  private readonly registry: ModelRegistry;
  private readonly limiter: AdmissionLimiter;
  private readonly pool: ExecutionPool;
  private readonly scheduler: EmbeddingScheduler;
  private readonly metrics?: MetricsRecorder;
  private readonly logger?: Logger;

  constructor(deps: InferenceServiceDeps) {
    this.registry = deps.registry;
    this.limiter = deps.limiter;
    this.pool = deps.pool;
    this.scheduler = deps.scheduler;
    this.metrics = deps.metrics;
    this.logger = deps.logger;
  }

  /**
   * Embed `texts` with an embedding model.
   *
   * @throws GatewayError `ModelNotFound`, admission codes, `Cancelled`,
   * `BatchFailure` (batched) or `InferenceFailed` (direct)
   */
  public async embed(
    modelName: string,
    texts: string[],
    options: CallOptions = {}
  ): Promise<EmbeddingResult> {
    return this.track(modelName, async () => {
      const handler = requireEmbedding(this.registry.get(modelName));

      const vectors = await this.limiter.run(async () => {
        if (this.scheduler.isEnabled(modelName)) {
          return this.scheduler.submit(modelName, texts, { signal: options.signal });
        }
        return invokeHandler(
          { pool: this.pool, logger: this.logger },
          handler,
          async (signal) => handler.embed(texts, signal),
          { signal: options.signal, batchSize: texts.length }
        );
      }, options);

      return { vectors, promptTokens: this.countTokens(handler, texts) };
    });
  }

  /**
   * Transcribe (or translate into English) an audio payload. Never batched.
   */
  public async transcribe(
    modelName: string,
    audio: Buffer,
    transcription: TranscriptionOptions,
    options: CallOptions = {}
  ): Promise<TranscriptionResult> {
    return this.track(modelName, async () => {
      const capability: ModelCapability =
        transcription.task === 'translate' ? 'audio-translation' : 'audio-transcription';
      const handler = requireTranscription(this.registry.get(modelName), capability);

      return this.limiter.run(
        () =>
          invokeHandler(
            { pool: this.pool, logger: this.logger },
            handler,
            (signal) => handler.transcribe(audio, transcription, signal),
            { signal: options.signal, batchSize: 1 }
          ),
        options
      );
    });
  }

  /**
   * Synthesize speech. Never batched; the signal reaches the handler so a
   * client disconnect stops the render.
   */
  public async synthesize(
    modelName: string,
    text: string,
    speech: SpeechOptions,
    options: CallOptions = {}
  ): Promise<SpeechResult> {
    return this.track(modelName, async () => {
      const handler = requireSpeech(this.registry.get(modelName));

      return this.limiter.run(
        () =>
          invokeHandler(
            { pool: this.pool, logger: this.logger },
            handler,
            (signal) => handler.synthesize(text, speech, signal),
            { signal: options.signal, batchSize: 1 }
          ),
        options
      );
    });
  }

  private countTokens(handler: EmbeddingModel, texts: string[]): number {
    try {
      return handler.countTokens(texts);
    } catch (err) {
      this.logger?.warn({ err, model: handler.name }, 'Token counting failed');
      return 0;
    }
  }

  /**
   * Normalize failures into GatewayError and record the request outcome.
   */
  private async track<T>(modelName: string, fn: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await fn();
      this.metrics?.recordRequest(modelName, 'success', Date.now() - startedAt);
      return result;
    } catch (err) {
      const error = toGatewayError(err, 'InferenceFailed');
      const rejection = REJECTION_REASON[error.code];

      let status: RequestStatus = 'error';
      if (rejection) {
        status = 'rejected';
        this.metrics?.recordQueueRejection(modelName, rejection);
      } else if (error.code === 'Cancelled') {
        status = 'cancelled';
      } else if (INVALID_REQUEST_CODES.has(error.code)) {
        status = 'invalid';
      }
      this.metrics?.recordRequest(modelName, status, Date.now() - startedAt);

      throw error;
    }
  }
}
