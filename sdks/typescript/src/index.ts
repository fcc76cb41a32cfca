/**
 * Vaultline TypeScript Client
 *
 * Clients for the Vaultline key-value server over its binary TCP protocol and
 * its HTTP API.
 *
 * @example
 * ```ts
 * import { VaultlineClient, bytesToString } from '@vaultline/client';
 *
 * const client = new VaultlineClient({ address: 'localhost:3000' });
 *
 * await client.set('user:123', 'Alice');
 * const value = await client.get('user:123');
 * console.log(value && bytesToString(value));
 * ```
 *
 * @packageDocumentation
 */

// Main clients
export { VaultlineClient, createClient, DEFAULT_TIMEOUT_MS, type ClientInternals } from '@vaultline/client/client';
export { VaultlineHttpClient, createHttpClient } from '@vaultline/client/http';
export { BaseStore } from '@vaultline/client/store';

// Ephemeral (in-memory) server for testing
export {
  EphemeralVault,
  createEphemeral,
  EphemeralServerError,
  DEFAULT_MAX_VALUE_SIZE,
  type AuthMode,
  type EphemeralOptions,
  type RecordedCall,
} from '@vaultline/client/ephemeral';

// Types
export { OpCode, Status } from '@vaultline/client/types';
export type {
  Key,
  Value,
  Endpoint,
  HealthStatus,
  JSONSchema,
  KeyValueStore,
  BatchOptions,
  BatchEntry,
  ClientConfig,
  HttpClientConfig,
  HttpAuthScheme,
} from '@vaultline/client/types';

// Errors
export {
  VaultlineError,
  ConnectFailedError,
  WriteFailedError,
  IncompleteHeaderError,
  ConnectionClosedError,
  ServerError,
  AuthFailedError,
  FrameTooLargeError,
  DecodeFailedError,
  DeadlineExceededError,
  InvalidArgumentError,
  SessionClosedError,
  HttpStatusError,
} from '@vaultline/client/errors';

// Wire format (advanced usage)
export {
  encodeRequest,
  decodeRequest,
  encodeResponse,
  decodeResponseHeader,
  decodeResponseBody,
  MAX_KEY_LENGTH,
  MAX_VALUE_LENGTH,
  type ByteReader,
  type ResponseHeader,
} from '@vaultline/client/codec';
export { TransportSession, createSessionOpener, type Session, type SessionOpener } from '@vaultline/client/session';

// Batches
export { getMany, setMany, runBounded, DEFAULT_BATCH_CONCURRENCY } from '@vaultline/client/batch';

// Configuration and logging
export {
  loadConfig,
  loadConfigFile,
  readEnvConfig,
  toClientConfig,
  toHttpClientConfig,
  type VaultlineConfig,
  type LoadConfigOptions,
} from '@vaultline/client/config';
export { ConsoleLogger, LogLevel, silentLogger, type Logger } from '@vaultline/client/logger';

// Utilities
export { keyToBytes, valueToBytes, bytesToString } from '@vaultline/client/encoding';

// Version constant
export const VERSION = '0.1.0';
