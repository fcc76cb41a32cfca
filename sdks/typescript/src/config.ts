/**
 * Configuration loading from YAML files and environment variables.
 *
 * File keys are snake_case (`address`, `base_url`, `api_key`, `auth_scheme`,
 * `timeout_ms`, `read_chunk_size`, `batch_concurrency`, `enable_logging`).
 * Environment variables override file values.
 *
 * @example
 * ```ts
 * const config = loadConfig({ filePath: './vaultline.yaml' });
 * const client = new VaultlineClient(toClientConfig(config));
 * ```
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { InvalidArgumentError, toError } from '@vaultline/client/errors';
import type { ClientConfig, HttpAuthScheme, HttpClientConfig } from '@vaultline/client/types';

const RawConfigSchema = z
  .object({
    address: z.string().min(1).optional(),
    base_url: z.string().url().optional(),
    api_key: z.string().optional(),
    auth_scheme: z.enum(['api-key', 'bearer']).optional(),
    timeout_ms: z.number().positive().optional(),
    read_chunk_size: z.number().int().positive().optional(),
    batch_concurrency: z.number().int().positive().optional(),
    enable_logging: z.boolean().optional(),
  })
  .strict();

type RawConfig = z.infer<typeof RawConfigSchema>;

/**
 * Settings shared by both transports, as loaded from file and environment.
 */
export interface VaultlineConfig {
  address?: string;
  baseUrl?: string;
  apiKey?: string;
  authScheme?: HttpAuthScheme;
  timeout?: number;
  readChunkSize?: number;
  batchConcurrency?: number;
  enableLogging?: boolean;
}

export interface LoadConfigOptions {
  /** YAML file to read first (optional) */
  filePath?: string;

  /** Environment to read `VAULTLINE_*` variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

const ENV_KEYS = {
  VAULTLINE_ADDRESS: 'address',
  VAULTLINE_BASE_URL: 'base_url',
  VAULTLINE_API_KEY: 'api_key',
  VAULTLINE_AUTH_SCHEME: 'auth_scheme',
  VAULTLINE_TIMEOUT_MS: 'timeout_ms',
  VAULTLINE_READ_CHUNK_SIZE: 'read_chunk_size',
  VAULTLINE_BATCH_CONCURRENCY: 'batch_concurrency',
  VAULTLINE_ENABLE_LOGGING: 'enable_logging',
} as const;

const NUMERIC_KEYS: ReadonlySet<string> = new Set(['timeout_ms', 'read_chunk_size', 'batch_concurrency']);

/**
 * Read a YAML config file.
 *
 * @returns The raw document; an empty file yields `{}`
 * @throws InvalidArgumentError if the file cannot be read or parsed
 */
export function loadConfigFile(filePath: string): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new InvalidArgumentError(`Failed to read config file ${filePath}: ${toError(err).message}`);
  }

  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (err) {
    throw new InvalidArgumentError(`Failed to parse config file ${filePath}: ${toError(err).message}`);
  }

  if (document === null || document === undefined) {
    return {};
  }
  if (!isRecord(document)) {
    throw new InvalidArgumentError(`Config file ${filePath} must contain a mapping`);
  }
  return document;
}

/**
 * Collect `VAULTLINE_*` variables into raw config keys. Numbers and booleans
 * are converted; unparseable values are passed through for validation to
 * reject.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;

    if (NUMERIC_KEYS.has(key)) {
      const parsed = Number(value);
      raw[key] = Number.isNaN(parsed) ? value : parsed;
    } else if (key === 'enable_logging') {
      raw[key] = parseBoolean(value);
    } else {
      raw[key] = value;
    }
  }

  return raw;
}

/**
 * Load configuration from an optional YAML file and the environment.
 *
 * @throws InvalidArgumentError if the merged configuration is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): VaultlineConfig {
  const fromFile = options.filePath ? loadConfigFile(options.filePath) : {};
  const fromEnv = readEnvConfig(options.env ?? process.env);

  const result = RawConfigSchema.safeParse({ ...fromFile, ...fromEnv });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new InvalidArgumentError(`Invalid configuration: ${issues}`);
  }

  return fromRaw(result.data);
}

/**
 * Derive a binary client config.
 *
 * @throws InvalidArgumentError if no address is configured
 */
export function toClientConfig(config: VaultlineConfig): ClientConfig {
  if (!config.address) {
    throw new InvalidArgumentError('No server address configured (address / VAULTLINE_ADDRESS)');
  }
  return {
    address: config.address,
    apiKey: config.apiKey,
    timeout: config.timeout,
    readChunkSize: config.readChunkSize,
    batchConcurrency: config.batchConcurrency,
    enableLogging: config.enableLogging,
  };
}

/**
 * Derive an HTTP client config.
 *
 * @throws InvalidArgumentError if no base URL is configured
 */
export function toHttpClientConfig(config: VaultlineConfig): HttpClientConfig {
  if (!config.baseUrl) {
    throw new InvalidArgumentError('No base URL configured (base_url / VAULTLINE_BASE_URL)');
  }
  return {
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    authScheme: config.authScheme,
    timeout: config.timeout,
    batchConcurrency: config.batchConcurrency,
    enableLogging: config.enableLogging,
  };
}

function fromRaw(raw: RawConfig): VaultlineConfig {
  const config: VaultlineConfig = {};
  if (raw.address !== undefined) config.address = raw.address;
  if (raw.base_url !== undefined) config.baseUrl = raw.base_url;
  if (raw.api_key !== undefined) config.apiKey = raw.api_key;
  if (raw.auth_scheme !== undefined) config.authScheme = raw.auth_scheme;
  if (raw.timeout_ms !== undefined) config.timeout = raw.timeout_ms;
  if (raw.read_chunk_size !== undefined) config.readChunkSize = raw.read_chunk_size;
  if (raw.batch_concurrency !== undefined) config.batchConcurrency = raw.batch_concurrency;
  if (raw.enable_logging !== undefined) config.enableLogging = raw.enable_logging;
  return config;
}

function parseBoolean(value: string): boolean | string {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
