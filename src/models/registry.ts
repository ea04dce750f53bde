/**
 * Model registry
 *
 * Maps the closed set of handler kinds to factories and holds the handlers
 * built at startup. Configuration naming an unknown kind is a fatal
 * startup error, never a late runtime failure.
 */

import type { Logger } from 'pino';
import { GatewayError } from '../api/errors.js';
import type { ModelEntry } from '../types/schemas/config.js';
import {
  isEmbeddingModel,
  type ModelHandler,
  type ModelInfo,
} from '../types/models.js';
import { HashingEmbedding } from './hashing-embedding.js';
import { ToneSpeech } from './tone-speech.js';

export type HandlerFactory = (entry: ModelEntry) => ModelHandler;

function numberOption(entry: ModelEntry, key: string): number | undefined {
  const value = entry.options?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw new GatewayError(
      'ConfigError',
      `Model '${entry.name}': option '${key}' must be a number`
    );
  }
  return value;
}

export const HANDLER_KINDS = {
  'hashing-embedding': (entry) =>
    new HashingEmbedding({
      name: entry.name,
      device: entry.device,
      dimensions: numberOption(entry, 'dimensions'),
    }),
  'tone-speech': (entry) =>
    new ToneSpeech({
      name: entry.name,
      device: entry.device,
      sampleRate: numberOption(entry, 'sample_rate'),
    }),
} satisfies Record<string, HandlerFactory>;

export type HandlerKind = keyof typeof HANDLER_KINDS;

export function isHandlerKind(kind: string): kind is HandlerKind {
  return Object.prototype.hasOwnProperty.call(HANDLER_KINDS, kind);
}

export class ModelRegistry {
  private readonly models = new Map<string, ModelHandler>();
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Build every configured handler.
   *
   * @throws GatewayError `ConfigError` for an unknown kind
   */
  public static fromConfig(entries: readonly ModelEntry[], logger?: Logger): ModelRegistry {
    const registry = new ModelRegistry(logger);

    for (const entry of entries) {
      if (!isHandlerKind(entry.kind)) {
        throw new GatewayError(
          'ConfigError',
          `Unknown model kind '${entry.kind}' for model '${entry.name}'. ` +
            `Known kinds: ${Object.keys(HANDLER_KINDS).join(', ')}`,
          { model: entry.name, kind: entry.kind }
        );
      }
      const factory: HandlerFactory = HANDLER_KINDS[entry.kind];
      registry.register(factory(entry));
    }

    return registry;
  }

  public register(handler: ModelHandler): void {
    if (this.models.has(handler.name)) {
      throw new GatewayError('ConfigError', `Model '${handler.name}' is already registered`);
    }
    this.models.set(handler.name, handler);

    this.logger?.info(
      {
        model: handler.name,
        kind: handler.kind,
        device: handler.device,
        capabilities: handler.capabilities,
        exclusive: handler.exclusive,
      },
      'Model registered'
    );
  }

  /**
   * @throws GatewayError `ModelNotFound`
   */
  public get(name: string): ModelHandler {
    const handler = this.models.get(name);
    if (!handler) {
      throw new GatewayError('ModelNotFound', `Model ${name} not found`, { model: name });
    }
    return handler;
  }

  public has(name: string): boolean {
    return this.models.has(name);
  }

  public list(): string[] {
    return Array.from(this.models.keys());
  }

  public handlers(): ModelHandler[] {
    return Array.from(this.models.values());
  }

  public describe(): ModelInfo[] {
    return this.handlers().map((handler) => ({
      id: handler.name,
      object: 'model',
      owned_by: 'local',
      kind: handler.kind,
      capabilities: [...handler.capabilities],
      embedding_dimensions: isEmbeddingModel(handler) ? handler.dimensions : null,
    }));
  }
}
