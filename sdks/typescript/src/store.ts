/**
 * Behaviour shared by both transports. Subclasses supply the four primitive
 * operations; JSON helpers and batches are layered on top of them.
 */

import { DEFAULT_BATCH_CONCURRENCY, getMany, setMany } from '@vaultline/client/batch';
import { describeKey, parseJSONBytes, serializeJSON } from '@vaultline/client/encoding';
import { InvalidArgumentError } from '@vaultline/client/errors';
import type { Logger } from '@vaultline/client/logger';
import { validateJSON } from '@vaultline/client/wire-types';
import type {
  BatchEntry,
  HealthStatus,
  JSONSchema,
  Key,
  KeyValueStore,
  Value,
} from '@vaultline/client/types';

export abstract class BaseStore implements KeyValueStore {
  protected readonly batchConcurrency: number;

  protected constructor(
    protected readonly logger: Logger,
    batchConcurrency: number = DEFAULT_BATCH_CONCURRENCY
  ) {
    if (!Number.isInteger(batchConcurrency) || batchConcurrency < 1) {
      throw new InvalidArgumentError(`batchConcurrency must be a positive integer, got ${batchConcurrency}`);
    }
    this.batchConcurrency = batchConcurrency;
  }

  abstract get(key: Key): Promise<Uint8Array | null>;
  abstract set(key: Key, value: Value): Promise<boolean>;
  abstract delete(key: Key): Promise<boolean>;
  abstract health(): Promise<HealthStatus | null>;

  /**
   * Check if `get` would return a value for a key.
   */
  async exists(key: Key): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  /**
   * Get a value and decode it as UTF-8 JSON.
   *
   * @param key - The key
   * @param schema - Optional zod schema the decoded value must satisfy
   * @returns The decoded value, or null if absent or undecodable
   *
   * @example
   * ```ts
   * const User = z.object({ name: z.string() });
   * const user = await client.getJSON('user:124', User); // { name: string } | null
   * ```
   */
  getJSON(key: Key): Promise<unknown>;
  getJSON<T>(key: Key, schema: JSONSchema<T>): Promise<T | null>;
  async getJSON<T>(key: Key, schema?: JSONSchema<T>): Promise<unknown> {
    const data = await this.get(key);
    if (data === null) return null;

    try {
      const parsed = parseJSONBytes(data);
      return schema ? validateJSON(parsed, schema) : parsed;
    } catch (error) {
      this.logger.error(`Failed to parse JSON for key ${describeKey(key)}:`, error);
      return null;
    }
  }

  /**
   * Serialize a value as JSON and store it.
   *
   * @returns true if the server acknowledged the write, false if the value
   * could not be serialized or the call failed
   */
  async setJSON(key: Key, value: unknown): Promise<boolean> {
    let data: Buffer;
    try {
      data = serializeJSON(value);
    } catch (error) {
      this.logger.error(`Failed to serialize JSON for key ${describeKey(key)}:`, error);
      return false;
    }
    return this.set(key, data);
  }

  /**
   * Get several keys with bounded concurrency.
   *
   * @returns Map of key to value (null when absent or failed)
   */
  async mget(keys: readonly string[]): Promise<Map<string, Uint8Array | null>> {
    return getMany(this, keys, { concurrency: this.batchConcurrency, logger: this.logger });
  }

  /**
   * Set several keys with bounded concurrency.
   *
   * @returns Map of key to write outcome
   */
  async mset(entries: readonly BatchEntry[]): Promise<Map<string, boolean>> {
    return setMany(this, entries, { concurrency: this.batchConcurrency, logger: this.logger });
  }
}
