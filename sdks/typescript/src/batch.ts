/**
 * Multi-key helpers with bounded concurrency.
 *
 * Work is dispatched through a fixed number of in-flight slots regardless of
 * batch size. Completion order is unspecified; every key is attempted, and a
 * failure on one key never aborts the others.
 */

import { describeKey } from '@vaultline/client/encoding';
import { silentLogger } from '@vaultline/client/logger';
import type { BatchEntry, BatchOptions, KeyValueStore } from '@vaultline/client/types';

/** Default number of operations a batch keeps in flight. */
export const DEFAULT_BATCH_CONCURRENCY = 10;

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 *
 * @returns Results in input order
 * @throws RangeError if concurrency is not a positive integer
 */
export async function runBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Batch concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Get several keys.
 *
 * @returns Map of key to value; null when absent or failed
 */
export async function getMany(
  store: Pick<KeyValueStore, 'get'>,
  keys: readonly string[],
  options: BatchOptions = {}
): Promise<Map<string, Uint8Array | null>> {
  const logger = options.logger ?? silentLogger;
  const values = await runBounded(keys, options.concurrency ?? DEFAULT_BATCH_CONCURRENCY, async (key) => {
    try {
      return await store.get(key);
    } catch (error) {
      logger.error(`Batch GET failed for ${describeKey(key)}:`, error);
      return null;
    }
  });

  return new Map(keys.map((key, i) => [key, values[i]]));
}

/**
 * Set several keys.
 *
 * @returns Map of key to write outcome
 */
export async function setMany(
  store: Pick<KeyValueStore, 'set'>,
  entries: readonly BatchEntry[],
  options: BatchOptions = {}
): Promise<Map<string, boolean>> {
  const logger = options.logger ?? silentLogger;
  const outcomes = await runBounded(entries, options.concurrency ?? DEFAULT_BATCH_CONCURRENCY, async ({ key, value }) => {
    try {
      return await store.set(key, value);
    } catch (error) {
      logger.error(`Batch SET failed for ${describeKey(key)}:`, error);
      return false;
    }
  });

  return new Map(entries.map((entry, i) => [entry.key, outcomes[i]]));
}
