/**
 * API Server
 *
 * OpenAI-compatible REST surface over the inference service:
 * - POST /v1/embeddings
 * - POST /v1/audio/transcriptions, POST /v1/audio/translations (multipart
 *   form: `file` part plus `model`, `response_format`, ... fields)
 * - POST /v1/audio/speech
 * - GET /v1/models
 * - GET /health
 *
 * Every request gets an AbortSignal that fires when the client goes away
 * before the response is written.
 */

import express, {
  type Application,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import cors from 'cors';
import multer from 'multer';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import type { AdmissionLimiter } from '../core/admission-limiter.js';
import type { ModelRegistry } from '../models/registry.js';
import type { InferenceService } from '../services/inference-service.js';
import {
  EmbeddingRequestSchema,
  SpeechRequestSchema,
  TranscriptionFormSchema,
} from '../types/schemas/api.js';
import type { TranscriptionTask } from '../types/models.js';
import {
  GatewayError,
  httpStatusFor,
  toGatewayError,
  zodErrorToGatewayError,
} from './errors.js';

export interface ApiServerConfig {
  host: string;
  port: number;
  maxTextChars: number;
  /** Largest accepted `input` list on /v1/embeddings */
  maxBatchSize: number;
  /** Drives the Retry-After header on 429 responses */
  queueTimeoutMs: number;
  /** express JSON body size limit, e.g. '25mb' */
  bodyLimit: string;
  /** Audio upload cap; a larger `file` part is a 400 */
  maxUploadBytes: number;
}

export interface ApiServerDeps {
  service: InferenceService;
  registry: ModelRegistry;
  limiter: AdmissionLimiter;
  logger?: Logger;
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

const GENERIC_FAILURE_MESSAGE: Record<string, string> = {
  '/v1/embeddings': 'Embedding generation failed',
  '/v1/audio/transcriptions': 'Transcription failed',
  '/v1/audio/translations': 'Translation failed',
  '/v1/audio/speech': 'Speech synthesis failed',
};

function errorType(status: number): string {
  if (status === 429) return 'rate_limit_error';
  if (status >= 400 && status < 500) return 'invalid_request_error';
  return 'server_error';
}

function httpErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export class ApiServer {
  private readonly app: Application;
  private server?: Server;
  private readonly config: ApiServerConfig;
  private readonly service: InferenceService;
  private readonly registry: ModelRegistry;
  private readonly limiter: AdmissionLimiter;
  private readonly logger?: Logger;

  constructor(config: ApiServerConfig, deps: ApiServerDeps) {
    this.config = config;
    this.service = deps.service;
    this.registry = deps.registry;
    this.limiter = deps.limiter;
    this.logger = deps.logger;

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  public getApp(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(
      cors({
        origin: '*',
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
      })
    );

    this.app.use(express.json({ limit: this.config.bodyLimit }));

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger?.debug({ method: req.method, path: req.path }, 'HTTP request');
      next();
    });
  }

  private setupRoutes(): void {
    const audioUpload = multer({
      storage: multer.memoryStorage(),
      limits: { fileSize: this.config.maxUploadBytes, files: 1 },
    }).single('file');

    this.app.get('/health', this.handleHealth.bind(this));
    this.app.get('/v1/models', this.handleModels.bind(this));
    this.app.post('/v1/embeddings', this.route(this.handleEmbeddings.bind(this)));
    this.app.post(
      '/v1/audio/transcriptions',
      audioUpload,
      this.route((req, res) => this.handleAudio(req, res, 'transcribe'))
    );
    this.app.post(
      '/v1/audio/translations',
      audioUpload,
      this.route((req, res) => this.handleAudio(req, res, 'translate'))
    );
    this.app.post('/v1/audio/speech', this.route(this.handleSpeech.bind(this)));
  }

  private setupErrorHandling(): void {
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({
        error: {
          message: `Route ${req.method} ${req.path} not found`,
          type: 'invalid_request_error',
          code: 'NotFound',
        },
      });
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.sendError(req, res, err);
    });
  }

  /**
   * Forward rejections of an async route to the error handler.
   */
  private route(handler: AsyncRoute): RequestHandler {
    return (req, res, next) => {
      handler(req, res).catch(next);
    };
  }

  /**
   * Signal that fires when the client disconnects before the response is
   * complete.
   */
  private abortOnDisconnect(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });
    return controller.signal;
  }

  private handleHealth(_req: Request, res: Response): void {
    const models = this.registry.list();
    if (this.limiter.isShuttingDown()) {
      res.status(503).json({ status: 'draining', models });
      return;
    }
    res.json({ status: 'ok', models });
  }

  private handleModels(_req: Request, res: Response): void {
    res.json({ object: 'list', data: this.registry.describe() });
  }

  private async handleEmbeddings(req: Request, res: Response): Promise<void> {
    const parsed = EmbeddingRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw zodErrorToGatewayError(parsed.error);
    }
    const body = parsed.data;

    if (body.encoding_format !== undefined && body.encoding_format !== 'float') {
      throw new GatewayError('InvalidParams', "Only encoding_format='float' is supported", {
        encoding_format: body.encoding_format,
      });
    }

    const texts = typeof body.input === 'string' ? [body.input] : body.input;
    if (texts.length > this.config.maxBatchSize) {
      throw new GatewayError(
        'InvalidParams',
        `Batch size ${texts.length} exceeds maximum of ${this.config.maxBatchSize}`
      );
    }
    const tooLong = texts.findIndex((text) => text.length > this.config.maxTextChars);
    if (tooLong !== -1) {
      throw new GatewayError(
        'InvalidParams',
        `Input at index ${tooLong} exceeds maximum length of ${this.config.maxTextChars} characters`
      );
    }

    const result = await this.service.embed(body.model, texts, {
      signal: this.abortOnDisconnect(res),
    });

    res.json({
      object: 'list',
      data: result.vectors.map((embedding, index) => ({ object: 'embedding', index, embedding })),
      model: body.model,
      usage: { prompt_tokens: result.promptTokens, total_tokens: result.promptTokens },
    });
  }

  private async handleAudio(req: Request, res: Response, task: TranscriptionTask): Promise<void> {
    const parsed = TranscriptionFormSchema.safeParse(req.body);
    if (!parsed.success) {
      throw zodErrorToGatewayError(parsed.error);
    }
    const form = parsed.data;

    const file = req.file;
    if (!file || file.buffer.length === 0) {
      throw new GatewayError('InvalidParams', "Request must include the audio as the 'file' form field");
    }

    const result = await this.service.transcribe(
      form.model,
      file.buffer,
      {
        task,
        language: form.language,
        prompt: form.prompt,
        temperature: form.temperature,
        timestampGranularity: form.timestamp_granularity,
      },
      { signal: this.abortOnDisconnect(res) }
    );

    switch (form.response_format) {
      case 'text':
        res.type('text/plain').send(result.text);
        return;
      case 'verbose_json':
        res.json({
          task,
          language: result.language,
          duration: result.duration,
          text: result.text,
          segments: result.segments,
        });
        return;
      case 'json':
        res.json({ text: result.text });
        return;
    }
  }

  private async handleSpeech(req: Request, res: Response): Promise<void> {
    const parsed = SpeechRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw zodErrorToGatewayError(parsed.error);
    }
    const body = parsed.data;

    if (body.input.length > this.config.maxTextChars) {
      throw new GatewayError(
        'InvalidParams',
        `Input exceeds maximum length of ${this.config.maxTextChars} characters`
      );
    }

    const result = await this.service.synthesize(
      body.model,
      body.input,
      { voice: body.voice, speed: body.speed },
      { signal: this.abortOnDisconnect(res) }
    );

    res.set('Content-Type', result.contentType).send(result.audio);
  }

  /**
   * Upload errors (size cap, unexpected parts) are client errors.
   */
  private uploadError(err: multer.MulterError): GatewayError {
    const message =
      err.code === 'LIMIT_FILE_SIZE'
        ? `Audio file exceeds maximum size of ${this.config.maxUploadBytes} bytes`
        : err.message;
    return new GatewayError('InvalidParams', message, { multerCode: err.code, field: err.field });
  }

  private sendError(req: Request, res: Response, err: unknown): void {
    const clientStatus = httpErrorStatus(err);
    let error: GatewayError;
    if (err instanceof multer.MulterError) {
      error = this.uploadError(err);
    } else if (clientStatus !== undefined && !(err instanceof GatewayError)) {
      error = new GatewayError('InvalidParams', err instanceof Error ? err.message : 'Bad request');
    } else {
      error = toGatewayError(err);
    }
    const status = clientStatus ?? httpStatusFor(error.code);

    if (status >= 500) {
      this.logger?.error({ err, code: error.code, method: req.method, path: req.path }, 'Request failed');
    } else {
      this.logger?.debug({ code: error.code, path: req.path, message: error.message }, 'Request rejected');
    }

    if (res.headersSent || res.destroyed) {
      return;
    }

    if (status === 429) {
      res.set('Retry-After', String(Math.max(1, Math.ceil(this.config.queueTimeoutMs / 1000))));
    }

    // Internal failure details stay in the log.
    const message =
      status >= 500 && error.code !== 'ShuttingDown'
        ? GENERIC_FAILURE_MESSAGE[req.path] ?? 'Internal server error'
        : error.message;

    res.status(status).json({
      error: { message, type: errorType(status), code: error.code },
    });
  }

  /**
   * Start listening; resolves with the bound address (port 0 picks a free
   * port).
   */
  public async start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host);
      this.server = server;

      server.once('error', (error) => {
        this.logger?.error({ err: error }, 'Server error');
        reject(error);
      });
      server.once('listening', () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        this.logger?.info(
          { host: address.address, port: address.port },
          'API server started'
        );
        resolve(address);
      });
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.logger?.warn('Server not running');
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          this.logger?.error({ err: error }, 'Failed to stop server');
          reject(error);
          return;
        }
        this.logger?.info('API server stopped');
        this.server = undefined;
        resolve();
      });
    });
  }

  public isRunning(): boolean {
    return this.server !== undefined;
  }
}
