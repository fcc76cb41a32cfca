/**
 * Binary-protocol Vaultline client.
 *
 * This is the primary entry point for talking to a Vaultline server over its
 * native TCP protocol.
 */

import { DEFAULT_READ_CHUNK_SIZE, MAX_KEY_LENGTH, encodeRequest } from '@vaultline/client/codec';
import { describeKey, parseJSONBytes } from '@vaultline/client/encoding';
import { parseAddress } from '@vaultline/client/endpoint';
import { InvalidArgumentError } from '@vaultline/client/errors';
import { resolveLogger } from '@vaultline/client/logger';
import { createSessionOpener, type SessionOpener } from '@vaultline/client/session';
import { BaseStore } from '@vaultline/client/store';
import { parseHealth } from '@vaultline/client/wire-types';
import { OpCode, type ClientConfig, type Endpoint, type HealthStatus, type Key, type Value } from '@vaultline/client/types';

/** Key sent with HEALTH requests. */
export const HEALTH_KEY = 'health';

/** Default connect/read/write timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Test and extension hooks that are not part of the user-facing config.
 */
export interface ClientInternals {
  /** Replaces how sessions are opened (pooling decorators, test spies) */
  openSession?: SessionOpener;
}

/**
 * Vaultline client for the binary protocol.
 *
 * Every call opens its own connection, authenticates when an API key is
 * configured, performs one operation and closes the connection. Transport and
 * server failures never throw: reads return `null`, writes return `false`, and
 * the cause goes to the logger. A zero-length GET body also reads as `null`,
 * so an empty stored value is indistinguishable from a missing key.
 *
 * @example
 * ```ts
 * const client = new VaultlineClient({
 *   address: 'localhost:3000',
 *   apiKey: process.env.VAULTLINE_API_KEY,
 * });
 *
 * await client.set('user:123', 'Alice');
 * const value = await client.get('user:123');
 * console.log(value && bytesToString(value)); // 'Alice'
 *
 * await client.setJSON('user:124', { name: 'Bob' });
 * const user = await client.getJSON('user:124');
 *
 * await client.delete('user:123');
 * ```
 */
export class VaultlineClient extends BaseStore {
  private readonly endpoint: Endpoint;
  private readonly apiKey?: string;
  private readonly timeout: number;
  private readonly openSession: SessionOpener;

  constructor(config: ClientConfig, internals: ClientInternals = {}) {
    super(resolveLogger('Vaultline', config.logger, config.enableLogging), config.batchConcurrency);

    if (!config.address) {
      throw new InvalidArgumentError('A server address (host:port) is required');
    }

    this.endpoint = parseAddress(config.address);
    this.apiKey = config.apiKey || undefined;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;

    const readChunkSize = config.readChunkSize ?? DEFAULT_READ_CHUNK_SIZE;
    if (!Number.isFinite(this.timeout) || this.timeout <= 0) {
      throw new InvalidArgumentError(`timeout must be a positive number, got ${this.timeout}`);
    }
    if (!Number.isInteger(readChunkSize) || readChunkSize < 1) {
      throw new InvalidArgumentError(`readChunkSize must be a positive integer, got ${readChunkSize}`);
    }
    if (this.apiKey && Buffer.byteLength(this.apiKey, 'utf8') > MAX_KEY_LENGTH) {
      throw new InvalidArgumentError(`apiKey must fit in ${MAX_KEY_LENGTH} bytes`);
    }

    this.openSession = internals.openSession ?? createSessionOpener({ readChunkSize });
  }

  /**
   * Get the raw bytes stored under a key.
   *
   * @returns The value, or null if the key is missing, the value is empty, or
   * the call failed
   * @throws FrameTooLargeError if the key exceeds 65535 bytes
   */
  async get(key: Key): Promise<Uint8Array | null> {
    const request = encodeRequest(OpCode.GET, key);
    try {
      const data = await this.execute(request);
      if (data.length === 0) {
        this.logger.debug(`Cache miss: ${describeKey(key)}`);
        return null;
      }
      this.logger.debug(`Cache hit: ${describeKey(key)} (${data.length} bytes)`);
      return data;
    } catch (error) {
      this.logger.error(`GET failed for ${describeKey(key)}:`, error);
      return null;
    }
  }

  /**
   * Store a value under a key.
   *
   * @returns true if the server acknowledged the write
   * @throws FrameTooLargeError if the key or value overflows its length field
   */
  async set(key: Key, value: Value): Promise<boolean> {
    const request = encodeRequest(OpCode.SET, key, value);
    try {
      await this.execute(request);
      this.logger.debug(`Cache set: ${describeKey(key)}`);
      return true;
    } catch (error) {
      this.logger.error(`SET failed for ${describeKey(key)}:`, error);
      return false;
    }
  }

  /**
   * Delete a key.
   *
   * @returns true if the server acknowledged the delete
   */
  async delete(key: Key): Promise<boolean> {
    const request = encodeRequest(OpCode.DELETE, key);
    try {
      await this.execute(request);
      this.logger.debug(`Cache delete: ${describeKey(key)}`);
      return true;
    } catch (error) {
      this.logger.error(`DELETE failed for ${describeKey(key)}:`, error);
      return false;
    }
  }

  /**
   * Get server health.
   *
   * @returns The health report, or null if the call or decoding failed
   */
  async health(): Promise<HealthStatus | null> {
    const request = encodeRequest(OpCode.HEALTH, HEALTH_KEY);
    try {
      const data = await this.execute(request);
      return parseHealth(parseJSONBytes(data));
    } catch (error) {
      this.logger.error('Health check failed:', error);
      return null;
    }
  }

  /**
   * Open a session, authenticate, send one request and close the session.
   */
  private async execute(request: Uint8Array): Promise<Buffer> {
    const session = await this.openSession(this.endpoint, this.timeout);
    try {
      await session.authenticate(this.apiKey);
      return await session.roundTrip(request);
    } finally {
      session.close();
    }
  }
}

/**
 * Create a new binary-protocol client.
 *
 * @param config - Client configuration
 * @returns VaultlineClient instance
 */
export function createClient(config: ClientConfig): VaultlineClient {
  return new VaultlineClient(config);
}
