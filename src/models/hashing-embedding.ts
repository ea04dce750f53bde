/**
 * Feature-hashing text embedder.
 *
 * Lower-cases the text, splits it into letter/digit runs and hashes every
 * token (FNV-1a, 32-bit) into one of `dimensions` signed buckets. The
 * result is L2-normalized, so cosine similarity is a dot product.
 *
 * Stateless, so concurrent calls need no locking. A batch gives the event
 * loop a turn between texts: admission timeouts, batch deadlines and aborts
 * still fire while a large batch is being embedded.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { cancelledError } from '../api/errors.js';
import type { EmbeddingModel, ModelCapability } from '../types/models.js';
import { l2NormalizeInPlace } from '../utils/math-helpers.js';

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

export const DEFAULT_HASHING_DIMENSIONS = 384;

export interface HashingEmbeddingOptions {
  name: string;
  device?: string;
  dimensions?: number;
}

export function fnv1a32(value: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function tokenizeWords(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export class HashingEmbedding implements EmbeddingModel {
  public readonly name: string;
  public readonly kind = 'hashing-embedding';
  public readonly capabilities: readonly ModelCapability[] = ['text-embedding'];
  public readonly device: string;
  public readonly exclusive = false;
  public readonly dimensions: number;

  constructor(options: HashingEmbeddingOptions) {
    const dimensions = options.dimensions ?? DEFAULT_HASHING_DIMENSIONS;
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new Error(`HashingEmbedding: dimensions must be a positive integer, got ${dimensions}`);
    }

    this.name = options.name;
    this.device = options.device ?? 'cpu';
    this.dimensions = dimensions;
  }

  public async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const [index, text] of texts.entries()) {
      if (index > 0) {
        await yieldToEventLoop();
      }
      if (signal?.aborted) {
        throw cancelledError('Embedding cancelled');
      }
      vectors.push(this.embedOne(text));
    }
    return vectors;
  }

  public countTokens(texts: string[]): number {
    let total = 0;
    for (const text of texts) {
      total += tokenizeWords(text).length;
    }
    return total;
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenizeWords(text)) {
      const hash = fnv1a32(token);
      // Low bits pick the bucket, the top bit picks the sign.
      const bucket = (hash & 0x7fffffff) % this.dimensions;
      vector[bucket] += hash >>> 31 === 1 ? -1 : 1;
    }
    return l2NormalizeInPlace(vector);
  }
}
