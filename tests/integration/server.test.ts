import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createApp, type GatewayApp } from '../../src/app.js';
import { validateConfig } from '../../src/config/loader.js';
import { ModelRegistry } from '../../src/models/registry.js';
import type { EmbeddingModel, TranscriptionModel } from '../../src/types/models.js';
import type { RuntimeConfig } from '../../src/types/schemas/config.js';

function testConfig(): RuntimeConfig {
  return validateConfig({
    server: {
      host: '127.0.0.1',
      port: 0,
      max_text_chars: 50,
      body_limit: '1mb',
      max_upload_bytes: 64,
    },
    admission: { max_concurrent: 1, max_admitted: 2, queue_timeout_ms: 1500, drain_grace_ms: 100 },
    batching: { enabled: true, max_batch_size: 4, max_batch_wait_ms: 5 },
    telemetry: { enabled: false, service_name: 'infergate-test', prometheus_port: 9464 },
    logging: { level: 'silent' },
    models: [
      { name: 'embed-16', kind: 'hashing-embedding', options: { dimensions: 16 } },
      { name: 'tone-tts', kind: 'tone-speech', batching: false, options: { sample_rate: 8000 } },
    ],
  });
}

const fakeAsr: TranscriptionModel = {
  name: 'fake-asr',
  kind: 'fake',
  capabilities: ['audio-transcription'],
  device: 'test-device',
  exclusive: false,
  async transcribe(audio) {
    return {
      text: `heard ${audio.length} bytes`,
      language: 'en',
      duration: 0.5,
      segments: [{ id: 0, start: 0, end: 0.5, text: `heard ${audio.length} bytes` }],
    };
  },
};

const brokenEmbedding: EmbeddingModel = {
  name: 'broken-embed',
  kind: 'fake',
  capabilities: ['text-embedding'],
  device: 'test-device',
  exclusive: false,
  dimensions: 4,
  embed() {
    throw new Error('accelerator out of memory');
  },
  countTokens() {
    return 0;
  },
};

function buildApp(): GatewayApp {
  const config = testConfig();
  const registry = ModelRegistry.fromConfig(config.models);
  registry.register(fakeAsr);
  registry.register(brokenEmbedding);
  return createApp(config, { registry });
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

function audioForm(fields: Record<string, string>, audio?: Uint8Array): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  if (audio) {
    form.append('file', new Blob([audio], { type: 'audio/wav' }), 'audio.wav');
  }
  return form;
}

describe('HTTP API', () => {
  let app: GatewayApp;
  let base: string;

  beforeAll(async () => {
    app = buildApp();
    const address = await app.start();
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await app.shutdown();
  });

  describe('GET /health', () => {
    it('reports ok with the served models', async () => {
      const res = await fetch(`${base}/health`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        models: ['embed-16', 'tone-tts', 'fake-asr', 'broken-embed'],
      });
    });
  });

  describe('GET /v1/models', () => {
    it('lists models with capabilities and dimensions', async () => {
      const res = await fetch(`${base}/v1/models`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.object).toBe('list');
      expect(body.data[0]).toEqual({
        id: 'embed-16',
        object: 'model',
        owned_by: 'local',
        kind: 'hashing-embedding',
        capabilities: ['text-embedding'],
        embedding_dimensions: 16,
      });
      expect(body.data[1].embedding_dimensions).toBeNull();
    });
  });

  describe('POST /v1/embeddings', () => {
    it('embeds a single string', async () => {
      const res = await postJson(`${base}/v1/embeddings`, {
        model: 'embed-16',
        input: 'hello world',
      });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.object).toBe('list');
      expect(body.model).toBe('embed-16');
      expect(body.data).toHaveLength(1);
      expect(body.data[0].object).toBe('embedding');
      expect(body.data[0].index).toBe(0);
      expect(body.data[0].embedding).toHaveLength(16);
      expect(body.usage).toEqual({ prompt_tokens: 2, total_tokens: 2 });
    });

    it('keeps input order for a list', async () => {
      const res = await postJson(`${base}/v1/embeddings`, {
        model: 'embed-16',
        input: ['alpha', 'beta gamma', 'alpha'],
        encoding_format: 'float',
      });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.data.map((item: { index: number }) => item.index)).toEqual([0, 1, 2]);
      expect(body.data[2].embedding).toEqual(body.data[0].embedding);
      expect(body.usage.prompt_tokens).toBe(4);
    });

    it('rejects non-float encodings', async () => {
      const res = await postJson(`${base}/v1/embeddings`, {
        model: 'embed-16',
        input: 'x',
        encoding_format: 'base64',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          message: "Only encoding_format='float' is supported",
          type: 'invalid_request_error',
          code: 'InvalidParams',
        },
      });
    });

    it('rejects more inputs than the batch limit', async () => {
      const res = await postJson(`${base}/v1/embeddings`, {
        model: 'embed-16',
        input: ['a', 'b', 'c', 'd', 'e'],
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe('Batch size 5 exceeds maximum of 4');
    });

    it('rejects texts over the character limit', async () => {
      const res = await postJson(`${base}/v1/embeddings`, {
        model: 'embed-16',
        input: ['ok', 'x'.repeat(51)],
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe(
        'Input at index 1 exceeds maximum length of 50 characters'
      );
    });

    it('validates the request body', async () => {
      const res = await postJson(`${base}/v1/embeddings`, { input: 'x' });

      expect(res.status).toBe(400);
      expect((await res.json()).error).toEqual({
        message: "Validation error on field 'model': Required",
        type: 'invalid_request_error',
        code: 'ValidationError',
      });
    });

    it('rejects malformed JSON', async () => {
      const res = await fetch(`${base}/v1/embeddings`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"model": ',
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error.code).toBe('InvalidParams');
    });

    it('returns 404 for an unknown model', async () => {
      const res = await postJson(`${base}/v1/embeddings`, { model: 'nope', input: 'x' });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: {
          message: 'Model nope not found',
          type: 'invalid_request_error',
          code: 'ModelNotFound',
        },
      });
    });

    it('hides model failure details behind a generic message', async () => {
      const res = await postJson(`${base}/v1/embeddings`, { model: 'broken-embed', input: 'x' });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: {
          message: 'Embedding generation failed',
          type: 'server_error',
          code: 'BatchFailure',
        },
      });
    });

    it('answers 429 with Retry-After when admission is full', async () => {
      const running = await app.limiter.acquire();
      const waiting = app.limiter.acquire();

      try {
        const res = await postJson(`${base}/v1/embeddings`, { model: 'embed-16', input: 'x' });

        expect(res.status).toBe(429);
        expect(res.headers.get('retry-after')).toBe('2');
        expect((await res.json()).error).toEqual({
          message: 'Request queue full (2/2 admitted)',
          type: 'rate_limit_error',
          code: 'QueueFull',
        });
      } finally {
        app.limiter.release(running);
        app.limiter.release(await waiting);
      }
    });

    it('answers 429 with Retry-After when the wait for a slot times out', async () => {
      const running = await app.limiter.acquire();

      try {
        const res = await postJson(`${base}/v1/embeddings`, { model: 'embed-16', input: 'x' });
        const body = await res.json();

        expect(res.status).toBe(429);
        expect(res.headers.get('retry-after')).toBe('2');
        expect(body.error.code).toBe('QueueTimeout');
        expect(body.error.type).toBe('rate_limit_error');
        expect(body.error.message).toMatch(
          /^Timed out after 1500ms waiting for an execution slot \(ticket: /
        );
      } finally {
        app.limiter.release(running);
      }
    });
  });

  describe('POST /v1/audio/speech', () => {
    it('returns a WAV file', async () => {
      const res = await postJson(`${base}/v1/audio/speech`, { model: 'tone-tts', input: 'hi' });
      const audio = Buffer.from(await res.arrayBuffer());

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('audio/wav');
      expect(audio.toString('ascii', 0, 4)).toBe('RIFF');
      // 2 characters x 320 samples (40ms at 8kHz) x 2 bytes
      expect(audio.length).toBe(44 + 1280);
    });

    it('validates speed', async () => {
      const res = await postJson(`${base}/v1/audio/speech`, {
        model: 'tone-tts',
        input: 'hi',
        speed: 10,
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe(
        "Validation error on field 'speed': Speed cannot exceed 4"
      );
    });

    it('rejects a model without speech support', async () => {
      const res = await postJson(`${base}/v1/audio/speech`, { model: 'embed-16', input: 'hi' });

      expect(res.status).toBe(400);
      expect((await res.json()).error.code).toBe('UnsupportedCapability');
    });
  });

  describe('POST /v1/audio/transcriptions', () => {
    const audio = new Uint8Array([1, 2, 3]);

    it('returns plain text when asked', async () => {
      const res = await fetch(`${base}/v1/audio/transcriptions`, {
        method: 'POST',
        body: audioForm({ model: 'fake-asr', response_format: 'text' }, audio),
      });

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
      expect(await res.text()).toBe('heard 3 bytes');
    });

    it('returns JSON by default', async () => {
      const res = await fetch(`${base}/v1/audio/transcriptions`, {
        method: 'POST',
        body: audioForm({ model: 'fake-asr' }, audio),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ text: 'heard 3 bytes' });
    });

    it('includes segments in verbose_json', async () => {
      const res = await fetch(`${base}/v1/audio/transcriptions`, {
        method: 'POST',
        body: audioForm(
          { model: 'fake-asr', response_format: 'verbose_json', language: 'en', temperature: '0.2' },
          audio
        ),
      });

      expect(await res.json()).toEqual({
        task: 'transcribe',
        language: 'en',
        duration: 0.5,
        text: 'heard 3 bytes',
        segments: [{ id: 0, start: 0, end: 0.5, text: 'heard 3 bytes' }],
      });
    });

    it('requires the model form field', async () => {
      const res = await fetch(`${base}/v1/audio/transcriptions`, {
        method: 'POST',
        body: audioForm({}, audio),
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error).toEqual({
        message: "Validation error on field 'model': Required",
        type: 'invalid_request_error',
        code: 'ValidationError',
      });
    });

    it('requires the audio file part', async () => {
      const res = await fetch(`${base}/v1/audio/transcriptions`, {
        method: 'POST',
        body: audioForm({ model: 'fake-asr' }),
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe(
        "Request must include the audio as the 'file' form field"
      );
    });

    it('rejects an upload over the size cap with 400', async () => {
      const res = await fetch(`${base}/v1/audio/transcriptions`, {
        method: 'POST',
        body: audioForm({ model: 'fake-asr' }, new Uint8Array(100)),
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error).toEqual({
        message: 'Audio file exceeds maximum size of 64 bytes',
        type: 'invalid_request_error',
        code: 'InvalidParams',
      });
    });

    it('returns 404 for an unknown model', async () => {
      const res = await fetch(`${base}/v1/audio/transcriptions`, {
        method: 'POST',
        body: audioForm({ model: 'missing' }, audio),
      });

      expect(res.status).toBe(404);
      expect((await res.json()).error.code).toBe('ModelNotFound');
    });

    it('rejects translation on a transcription-only model', async () => {
      const res = await fetch(`${base}/v1/audio/translations`, {
        method: 'POST',
        body: audioForm({ model: 'fake-asr' }, audio),
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error).toEqual({
        message: 'Model fake-asr does not support audio-translation',
        type: 'invalid_request_error',
        code: 'UnsupportedCapability',
      });
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${base}/v1/unknown`);

    expect(res.status).toBe(404);
    expect((await res.json()).error.message).toBe('Route GET /v1/unknown not found');
  });
});

describe('HTTP API while draining', () => {
  let app: GatewayApp;
  let base: string;

  beforeAll(async () => {
    app = buildApp();
    const address = await app.start();
    base = `http://127.0.0.1:${address.port}`;
    await app.limiter.drain(100);
  });

  afterAll(async () => {
    await app.shutdown();
  });

  it('reports draining on /health', async () => {
    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(503);
    expect((await res.json()).status).toBe('draining');
  });

  it('refuses new work with 503', async () => {
    const res = await postJson(`${base}/v1/embeddings`, { model: 'embed-16', input: 'x' });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: {
        message: 'Service is shutting down',
        type: 'server_error',
        code: 'ShuttingDown',
      },
    });
  });
});
