/**
 * Model handler contracts
 *
 * Handlers do the actual inference. The gateway only needs these narrow
 * interfaces; device and capability tags are used for logging and routing,
 * never for admission or batching decisions.
 *
 * Calls run inside an execution-pool lane on the request thread. Handlers
 * that compute in-process must yield between units of work (texts,
 * characters, audio chunks); heavy compute belongs in native code or a
 * worker the handler awaits. A call that never yields stalls admission
 * timeouts, batch deadlines and aborts until it returns.
 */

export type ModelCapability =
  | 'text-embedding'
  | 'audio-transcription'
  | 'audio-translation'
  | 'text-to-speech';

export interface ModelHandlerBase {
  /** Name clients address the model by */
  readonly name: string;
  /** Registry kind tag the handler was built from */
  readonly kind: string;
  readonly capabilities: readonly ModelCapability[];
  /** Device identifier (logging/metrics only) */
  readonly device: string;
  /**
   * The underlying model object must not be invoked concurrently. The
   * gateway serializes such handlers through the execution pool.
   */
  readonly exclusive: boolean;
  /**
   * Best-effort cleanup after a failed invocation (e.g. freeing
   * accelerator caches). Failures here are logged and ignored.
   */
  releaseResources?(): void | Promise<void>;
}

export interface EmbeddingModel extends ModelHandlerBase {
  readonly dimensions: number;
  /** One vector per input text, in input order */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]> | number[][];
  countTokens(texts: string[]): number;
}

export type TranscriptionTask = 'transcribe' | 'translate';

export interface TranscriptionOptions {
  task: TranscriptionTask;
  language?: string;
  prompt?: string;
  temperature?: number;
  timestampGranularity?: 'segment' | 'word';
}

export interface TranscriptionSegment {
  id: number;
  start: number;
  end: number;
  text: string;
}

export interface TranscriptionResult {
  text: string;
  language: string;
  /** Seconds */
  duration: number;
  segments: TranscriptionSegment[];
}

export interface TranscriptionModel extends ModelHandlerBase {
  transcribe(
    audio: Buffer,
    options: TranscriptionOptions,
    signal?: AbortSignal
  ): Promise<TranscriptionResult>;
}

export interface SpeechOptions {
  voice?: string;
  /** Playback speed multiplier, 0.25–4 */
  speed?: number;
}

export interface SpeechResult {
  audio: Buffer;
  sampleRate: number;
  contentType: 'audio/wav';
}

export interface SpeechModel extends ModelHandlerBase {
  synthesize(text: string, options: SpeechOptions, signal?: AbortSignal): Promise<SpeechResult>;
}

export type ModelHandler = EmbeddingModel | TranscriptionModel | SpeechModel;

export function isEmbeddingModel(handler: ModelHandler): handler is EmbeddingModel {
  return 'embed' in handler && handler.capabilities.includes('text-embedding');
}

export function isTranscriptionModel(handler: ModelHandler): handler is TranscriptionModel {
  return 'transcribe' in handler;
}

export function isSpeechModel(handler: ModelHandler): handler is SpeechModel {
  return 'synthesize' in handler && handler.capabilities.includes('text-to-speech');
}

/**
 * Public listing entry (GET /v1/models)
 */
export interface ModelInfo {
  id: string;
  object: 'model';
  owned_by: 'local';
  kind: string;
  capabilities: ModelCapability[];
  embedding_dimensions: number | null;
}
