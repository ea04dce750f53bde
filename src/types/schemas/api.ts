/**
 * HTTP request schemas
 *
 * OpenAI-compatible request bodies and upload forms. Limits that come
 * from configuration (batch size, text length) are checked by the route
 * handlers, not here.
 *
 * @module schemas/api
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

export const EmbeddingRequestSchema = z.object({
  model: NonEmptyString,
  input: z.union([z.string(), z.array(z.string()).min(1, 'Input list cannot be empty')]),
  encoding_format: z.string().optional(),
  user: z.string().optional(),
});

export type EmbeddingRequest = z.infer<typeof EmbeddingRequestSchema>;

export const SpeechRequestSchema = z.object({
  model: NonEmptyString,
  input: NonEmptyString,
  voice: z.string().optional(),
  speed: z
    .number()
    .min(0.25, 'Speed must be at least 0.25')
    .max(4, 'Speed cannot exceed 4')
    .optional(),
});

export type SpeechRequest = z.infer<typeof SpeechRequestSchema>;

export const TranscriptionResponseFormat = z.enum(['json', 'text', 'verbose_json']);

/**
 * Text fields of the multipart audio form; the audio itself is the `file`
 * part. Form values arrive as strings, hence the coercion.
 */
export const TranscriptionFormSchema = z.object({
  model: NonEmptyString,
  response_format: TranscriptionResponseFormat.default('json'),
  language: z.string().min(1).optional(),
  prompt: z.string().optional(),
  temperature: z.coerce
    .number()
    .min(0, 'Temperature must be at least 0')
    .max(1, 'Temperature cannot exceed 1')
    .optional(),
  timestamp_granularity: z.enum(['segment', 'word']).optional(),
});

export type TranscriptionForm = z.infer<typeof TranscriptionFormSchema>;
