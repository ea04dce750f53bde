/**
 * Configuration Loader
 *
 * Loads config/runtime.yaml, applies the environment-specific section
 * (`environments.<NODE_ENV>`), then process environment overrides, and
 * validates the result. Read once at startup by the composition root.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { GatewayError } from '../api/errors.js';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';

export type { RuntimeConfig as Config, ModelEntry } from '../types/schemas/config.js';

export type Environment = 'production' | 'development' | 'test';

export interface LoadConfigOptions {
  configPath?: string;
  environment?: Environment;
  /** Source of overrides; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects into a new one; arrays and scalars from
 * `source` replace. Nested mappings are copied, never shared.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue)) {
      output[key] = deepMerge(isPlainObject(targetValue) ? targetValue : {}, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new GatewayError('ConfigError', `Environment variable ${name} must be a number, got '${value}'`);
  }
  return parsed;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new GatewayError('ConfigError', `Environment variable ${name} must be a boolean, got '${value}'`);
}

function section(raw: PlainObject, key: string): PlainObject {
  const existing = raw[key];
  if (isPlainObject(existing)) {
    return existing;
  }
  const created: PlainObject = {};
  raw[key] = created;
  return created;
}

/**
 * Apply process environment overrides onto the raw (pre-validation) config.
 *
 * QUEUE_TIMEOUT_SEC is fractional seconds; everything else uses the unit of
 * the YAML key it replaces.
 */
export function applyEnvOverrides(raw: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  const output = deepMerge({}, raw);

  const numeric: Array<[string, string, string, number]> = [
    ['MAX_CONCURRENT', 'admission', 'max_concurrent', 1],
    ['MAX_ADMITTED', 'admission', 'max_admitted', 1],
    ['QUEUE_TIMEOUT_SEC', 'admission', 'queue_timeout_ms', 1000],
    ['DRAIN_GRACE_MS', 'admission', 'drain_grace_ms', 1],
    ['MAX_BATCH_SIZE', 'batching', 'max_batch_size', 1],
    ['MAX_BATCH_WAIT_MS', 'batching', 'max_batch_wait_ms', 1],
    ['MAX_TEXT_CHARS', 'server', 'max_text_chars', 1],
    ['MAX_UPLOAD_BYTES', 'server', 'max_upload_bytes', 1],
    ['PORT', 'server', 'port', 1],
    ['PROMETHEUS_PORT', 'telemetry', 'prometheus_port', 1],
  ];

  for (const [name, sectionKey, key, scale] of numeric) {
    const value = env[name];
    if (value !== undefined) {
      section(output, sectionKey)[key] = parseNumber(name, value) * scale;
    }
  }

  if (env.BATCHING_ENABLED !== undefined) {
    section(output, 'batching').enabled = parseBoolean('BATCHING_ENABLED', env.BATCHING_ENABLED);
  }
  if (env.ENABLE_METRICS !== undefined) {
    section(output, 'telemetry').enabled = parseBoolean('ENABLE_METRICS', env.ENABLE_METRICS);
  }
  if (env.HOST !== undefined) {
    section(output, 'server').host = env.HOST;
  }
  if (env.LOG_LEVEL !== undefined) {
    section(output, 'logging').level = env.LOG_LEVEL.toLowerCase();
  }

  return output;
}

/**
 * Validate configuration values
 *
 * @throws GatewayError `ConfigError` listing every invalid field
 */
export function validateConfig(raw: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new GatewayError('ConfigError', `Configuration validation failed:\n${errors.join('\n')}`, {
      errors,
    });
  }
  return parseResult.data;
}

/**
 * Restrict the served models to `names` (the MODELS environment variable).
 *
 * @throws GatewayError `ConfigError` when a requested name is not configured
 */
export function selectModels(config: RuntimeConfig, names: readonly string[]): RuntimeConfig {
  const requested = new Set(names.map((name) => name.trim()).filter((name) => name.length > 0));
  if (requested.size === 0) {
    return config;
  }

  const models = config.models.filter((model) => requested.has(model.name));
  const missing = Array.from(requested).filter((name) => !models.some((m) => m.name === name));
  if (missing.length > 0) {
    throw new GatewayError(
      'ConfigError',
      `Requested model(s) not found in config: ${missing.sort().join(', ')}`,
      { missing }
    );
  }

  return { ...config, models };
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  const finalPath = options.configPath ?? defaultConfigPath();
  const env = options.env ?? process.env;

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new GatewayError('ConfigError', `Configuration file not found: ${finalPath}`, undefined, {
        cause: error,
      });
    }
    throw new GatewayError('ConfigError', `Failed to read configuration: ${String(error)}`, undefined, {
      cause: error,
    });
  }

  const parsed: unknown = yaml.load(fileContents);
  if (!isPlainObject(parsed)) {
    throw new GatewayError('ConfigError', `Configuration file ${finalPath} must contain a mapping`);
  }

  const { environments, ...baseConfig } = parsed;
  const environment = options.environment ?? env.NODE_ENV ?? 'development';

  let merged: PlainObject = baseConfig;
  if (isPlainObject(environments)) {
    const envSection = environments[environment];
    if (isPlainObject(envSection)) {
      merged = deepMerge(baseConfig, envSection);
    }
  }

  const config = validateConfig(applyEnvOverrides(merged, env));
  return env.MODELS !== undefined ? selectModels(config, env.MODELS.split(',')) : config;
}
