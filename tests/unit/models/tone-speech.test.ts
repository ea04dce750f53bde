import { describe, it, expect } from 'vitest';
import {
  TONE_SAMPLE_RATE,
  ToneSpeech,
  encodeWav,
  toneFrequency,
} from '../../../src/models/tone-speech.js';

describe('ToneSpeech', () => {
  describe('encodeWav', () => {
    it('writes a 16-bit mono PCM header followed by the samples', () => {
      const wav = encodeWav(new Int16Array([1, -1, 300]), 8000);

      expect(wav.length).toBe(44 + 6);
      expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
      expect(wav.readUInt32LE(4)).toBe(36 + 6);
      expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
      expect(wav.readUInt16LE(20)).toBe(1);
      expect(wav.readUInt16LE(22)).toBe(1);
      expect(wav.readUInt32LE(24)).toBe(8000);
      expect(wav.readUInt32LE(28)).toBe(16000);
      expect(wav.readUInt16LE(34)).toBe(16);
      expect(wav.toString('ascii', 36, 40)).toBe('data');
      expect(wav.readUInt32LE(40)).toBe(6);
      expect([wav.readInt16LE(44), wav.readInt16LE(46), wav.readInt16LE(48)]).toEqual([1, -1, 300]);
    });
  });

  describe('toneFrequency', () => {
    it('derives the pitch from the character and shifts it per voice', () => {
      // 'A' = 65: 200 + (65 % 40) * 20
      expect(toneFrequency('A')).toBe(700);
      // 'alloy'.length % 5 = 0, 'nova'.length % 5 = 4
      expect(toneFrequency('A', 'alloy')).toBe(700);
      expect(toneFrequency('A', 'nova')).toBe(800);
    });
  });

  it('renders 40ms per character at the default speed', async () => {
    const model = new ToneSpeech({ name: 'tts' });
    const result = await model.synthesize('hi there', {});

    const samples = 8 * Math.round((TONE_SAMPLE_RATE * 40) / 1000);
    expect(result.sampleRate).toBe(TONE_SAMPLE_RATE);
    expect(result.contentType).toBe('audio/wav');
    expect(result.audio.length).toBe(44 + samples * 2);
  });

  it('renders whitespace as silence', async () => {
    const model = new ToneSpeech({ name: 'tts', sampleRate: 1000 });
    const result = await model.synthesize(' ', {});

    // 40 samples at 1kHz, all zero
    expect(result.audio.length).toBe(44 + 80);
    expect(result.audio.subarray(44).every((byte) => byte === 0)).toBe(true);
  });

  it('shortens the output for faster speech', async () => {
    const model = new ToneSpeech({ name: 'tts', sampleRate: 1000 });

    expect(model.samplesPerChar(1)).toBe(40);
    expect(model.samplesPerChar(2)).toBe(20);
    const result = await model.synthesize('ab', { speed: 2 });
    expect(result.audio.length).toBe(44 + 2 * 20 * 2);
  });

  it('rejects speeds outside 0.25-4', async () => {
    const model = new ToneSpeech({ name: 'tts' });

    await expect(model.synthesize('a', { speed: 5 })).rejects.toThrow(
      'speed must be between 0.25 and 4, got 5'
    );
  });

  it('stops between characters once the signal aborts', async () => {
    const model = new ToneSpeech({ name: 'tts', sampleRate: 1000 });
    const controller = new AbortController();
    const text = 'x'.repeat(200);

    const pending = model.synthesize(text, {}, controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      code: 'Cancelled',
      message: 'Speech synthesis cancelled',
    });
  });

  it('declares an exclusive text-to-speech handler', () => {
    expect(new ToneSpeech({ name: 'tts', device: 'cpu:1' })).toMatchObject({
      kind: 'tone-speech',
      capabilities: ['text-to-speech'],
      device: 'cpu:1',
      exclusive: true,
    });
  });
});
