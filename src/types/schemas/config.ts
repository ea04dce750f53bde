/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml after environment overrides
 * have been applied.
 *
 * @module schemas/config
 */

import { z } from 'zod';

/**
 * HTTP server
 */
export const ServerConfigSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty'),
  port: z.number().int().min(0).max(65535, 'Port must be 0-65535'),
  max_text_chars: z.number().int().positive('Max text chars must be positive'),
  body_limit: z.string().min(1, 'Body limit cannot be empty'),
  /** Largest accepted audio upload; larger files are rejected with 400 */
  max_upload_bytes: z
    .number()
    .int()
    .positive('Max upload bytes must be positive')
    .default(25 * 1024 * 1024),
});

/**
 * Admission control. `max_admitted` counts running plus waiting requests.
 */
export const AdmissionConfigSchema = z
  .object({
    max_concurrent: z.number().int().min(1, 'must be >= 1'),
    max_admitted: z.number().int().min(1, 'must be >= 1'),
    queue_timeout_ms: z.number().positive('Queue timeout must be positive'),
    drain_grace_ms: z.number().int().min(0, 'must be >= 0'),
  })
  .refine((data) => data.max_admitted >= data.max_concurrent, {
    message: 'must be >= max_concurrent',
    path: ['max_admitted'],
  });

/**
 * Dynamic batching
 */
export const BatchingConfigSchema = z.object({
  enabled: z.boolean(),
  max_batch_size: z.number().int().positive('Max batch size must be positive'),
  max_batch_wait_ms: z.number().int().min(0, 'must be >= 0'),
});

/**
 * Telemetry (Prometheus exporter)
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean(),
  service_name: z.string().min(1, 'Service name cannot be empty'),
  prometheus_port: z.number().int().min(1).max(65535, 'Port must be 1-65535'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * One served model. `kind` is resolved against the static handler registry
 * at startup.
 */
export const ModelEntrySchema = z.object({
  name: z.string().min(1, 'Model name cannot be empty'),
  kind: z.string().min(1, 'Model kind cannot be empty'),
  device: z.string().min(1).optional(),
  batching: z.boolean().optional(),
  options: z.record(z.unknown()).optional(),
});

export const RuntimeConfigSchema = z
  .object({
    server: ServerConfigSchema,
    admission: AdmissionConfigSchema,
    batching: BatchingConfigSchema,
    telemetry: TelemetryConfigSchema,
    logging: LoggingConfigSchema,
    models: z.array(ModelEntrySchema).min(1, 'At least one model must be configured'),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.models.forEach((model, index) => {
      if (seen.has(model.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate model name '${model.name}'`,
          path: ['models', index, 'name'],
        });
      }
      seen.add(model.name);
    });
  });

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type ModelEntry = z.infer<typeof ModelEntrySchema>;
