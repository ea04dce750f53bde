/**
 * Tone synthesizer for development deployments.
 *
 * Renders every character of the input as a short sine tone (whitespace as
 * silence) into 16-bit mono PCM wrapped in a WAV container. Samples are
 * rendered into one scratch buffer owned by the handler, so calls must not
 * overlap: the handler declares `exclusive`.
 *
 * The abort signal is checked between characters, and the render yields to
 * the event loop every `YIELD_EVERY` characters so a cancellation arriving
 * mid-render is observed within one slice.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { cancelledError } from '../api/errors.js';
import type {
  ModelCapability,
  SpeechModel,
  SpeechOptions,
  SpeechResult,
} from '../types/models.js';

export const TONE_SAMPLE_RATE = 16_000;
const BASE_CHAR_MS = 40;
const YIELD_EVERY = 64;
const AMPLITUDE = 0.3;
const WAV_HEADER_BYTES = 44;

export interface ToneSpeechOptions {
  name: string;
  device?: string;
  sampleRate?: number;
}

/**
 * Tone frequency for a character: voices shift the base pitch.
 */
export function toneFrequency(char: string, voice = 'default'): number {
  const code = char.codePointAt(0) ?? 0;
  const voiceShift = voice === 'default' ? 0 : (voice.length % 5) * 25;
  return 200 + (code % 40) * 20 + voiceShift;
}

export function encodeWav(samples: Int16Array, sampleRate: number): Buffer {
  const dataBytes = samples.length * 2;
  const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16); // PCM chunk size
  buffer.writeUInt16LE(1, 20); // PCM format
  buffer.writeUInt16LE(1, 22); // mono
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * 2, 28); // byte rate
  buffer.writeUInt16LE(2, 32); // block align
  buffer.writeUInt16LE(16, 34); // bits per sample
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < samples.length; i++) {
    buffer.writeInt16LE(samples[i], WAV_HEADER_BYTES + i * 2);
  }
  return buffer;
}

export class ToneSpeech implements SpeechModel {
  public readonly name: string;
  public readonly kind = 'tone-speech';
  public readonly capabilities: readonly ModelCapability[] = ['text-to-speech'];
  public readonly device: string;
  public readonly exclusive = true;
  public readonly sampleRate: number;

  private scratch = new Int16Array(0);

  constructor(options: ToneSpeechOptions) {
    this.name = options.name;
    this.device = options.device ?? 'cpu';
    this.sampleRate = options.sampleRate ?? TONE_SAMPLE_RATE;
  }

  public samplesPerChar(speed = 1): number {
    return Math.round((this.sampleRate * BASE_CHAR_MS) / 1000 / speed);
  }

  public async synthesize(
    text: string,
    options: SpeechOptions,
    signal?: AbortSignal
  ): Promise<SpeechResult> {
    const speed = options.speed ?? 1;
    if (!(speed >= 0.25 && speed <= 4)) {
      throw new Error(`speed must be between 0.25 and 4, got ${speed}`);
    }

    const chars = Array.from(text);
    const perChar = this.samplesPerChar(speed);
    const total = chars.length * perChar;
    if (this.scratch.length < total) {
      this.scratch = new Int16Array(total);
    }

    for (let c = 0; c < chars.length; c++) {
      if (signal?.aborted) {
        throw cancelledError('Speech synthesis cancelled');
      }
      if (c > 0 && c % YIELD_EVERY === 0) {
        await yieldToEventLoop();
      }

      const offset = c * perChar;
      const char = chars[c];
      if (char.trim() === '') {
        this.scratch.fill(0, offset, offset + perChar);
        continue;
      }

      const step = (2 * Math.PI * toneFrequency(char, options.voice)) / this.sampleRate;
      for (let i = 0; i < perChar; i++) {
        this.scratch[offset + i] = Math.round(Math.sin(step * i) * AMPLITUDE * 0x7fff);
      }
    }

    return {
      audio: encodeWav(this.scratch.subarray(0, total), this.sampleRate),
      sampleRate: this.sampleRate,
      contentType: 'audio/wav',
    };
  }
}
