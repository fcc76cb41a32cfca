/**
 * TypeScript type definitions for the Vaultline client.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Logger } from '@vaultline/client/logger';

/**
 * Key type - can be string or raw bytes. Encoded as UTF-8 on the wire.
 */
export type Key = Uint8Array | string;

/**
 * Value type - can be string or raw bytes.
 */
export type Value = Uint8Array | string;

/**
 * Binary protocol operation codes.
 */
export const OpCode = {
  GET: 0x01,
  SET: 0x02,
  DELETE: 0x03,
  HEALTH: 0x05,
  AUTH: 0x06,
} as const;

export type OpCode = (typeof OpCode)[keyof typeof OpCode];

/**
 * Binary protocol status bytes. Any non-zero status is a failure.
 */
export const Status = {
  SUCCESS: 0x00,
  ERROR: 0xff,
} as const;

/**
 * Host and port of a binary-protocol server.
 */
export interface Endpoint {
  host: string;
  port: number;
}

/**
 * Health report returned by the server.
 */
export interface HealthStatus {
  /** "healthy" when the server is serving */
  status: string;

  /** Seconds since the server started */
  uptimeSeconds: number;

  /** Number of cached items */
  cacheItems: number;

  /** Cache size in MiB */
  cacheSizeMb: number;

  /** On-disk storage size in MiB */
  storageSizeMb: number;

  /** Server worker count, when reported */
  goroutines?: number;

  /** Server heap usage in MiB, when reported */
  memoryMb?: number;
}

/**
 * Schema accepted by `getJSON` to validate decoded values.
 */
export type JSONSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * The logical surface shared by the binary and HTTP transports.
 */
export interface KeyValueStore {
  /** Raw bytes for a key, or null when absent or on failure */
  get(key: Key): Promise<Uint8Array | null>;

  /** Store raw bytes; false on failure */
  set(key: Key, value: Value): Promise<boolean>;

  /** Delete a key; false on failure */
  delete(key: Key): Promise<boolean>;

  /** Whether `get` returns a present value */
  exists(key: Key): Promise<boolean>;

  /** Server health, or null on failure */
  health(): Promise<HealthStatus | null>;

  /** Decoded JSON value, or null when absent or undecodable */
  getJSON(key: Key): Promise<unknown>;
  getJSON<T>(key: Key, schema: JSONSchema<T>): Promise<T | null>;

  /** Store a value as JSON; false on failure */
  setJSON(key: Key, value: unknown): Promise<boolean>;
}

/**
 * Options for batch helpers.
 */
export interface BatchOptions {
  /** Maximum operations in flight (default: 10) */
  concurrency?: number;

  /** Where per-key failures are reported */
  logger?: Logger;
}

/**
 * One entry of a batch set.
 */
export interface BatchEntry {
  key: string;
  value: Value;
}

/**
 * Configuration for VaultlineClient (binary transport).
 */
export interface ClientConfig {
  /** Server address (host:port) */
  address: string;

  /** Credential sent in the AUTH handshake (optional) */
  apiKey?: string;

  /** Connect, write and read timeout in milliseconds (default: 5000) */
  timeout?: number;

  /** Maximum bytes requested per body read (default: 8192) */
  readChunkSize?: number;

  /** Concurrency for mget/mset (default: 10) */
  batchConcurrency?: number;

  /** Enable debug logging on the default console logger */
  enableLogging?: boolean;

  /** Custom logger; overrides enableLogging */
  logger?: Logger;
}

/**
 * Configuration for VaultlineHttpClient.
 */
export interface HttpClientConfig {
  /** Base URL of the server, e.g. http://localhost:8080 */
  baseUrl: string;

  /** API key for authenticated requests (optional) */
  apiKey?: string;

  /** How the API key is sent (default: 'api-key') */
  authScheme?: HttpAuthScheme;

  /** Request timeout in milliseconds (default: 5000) */
  timeout?: number;

  /** Concurrency for mget/mset (default: 10) */
  batchConcurrency?: number;

  /** Enable debug logging on the default console logger */
  enableLogging?: boolean;

  /** Custom logger; overrides enableLogging */
  logger?: Logger;
}

/**
 * `api-key` sends `X-API-Key`, `bearer` sends `Authorization: Bearer`.
 */
export type HttpAuthScheme = 'api-key' | 'bearer';
