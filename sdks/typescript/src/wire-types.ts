/**
 * Conversions between the server's JSON documents and SDK types.
 *
 * The server speaks snake_case; the SDK's public types are camelCase. Anything
 * arriving from the wire is validated before it is handed to callers.
 */

import { z } from 'zod';
import { DecodeFailedError } from '@vaultline/client/errors';
import type { HealthStatus, JSONSchema } from '@vaultline/client/types';

const count = z.number().nonnegative();

/**
 * Health document as sent by the server.
 */
export const WireHealthSchema = z.object({
  status: z.string(),
  uptime_seconds: count,
  cache_items: count,
  cache_size_mb: count,
  storage_size_mb: count,
  goroutines: count.optional(),
  memory_mb: count.optional(),
});

export type WireHealth = z.infer<typeof WireHealthSchema>;

/**
 * Convert a validated wire health document to the SDK type.
 */
export function fromWireHealth(wire: WireHealth): HealthStatus {
  const health: HealthStatus = {
    status: wire.status,
    uptimeSeconds: wire.uptime_seconds,
    cacheItems: wire.cache_items,
    cacheSizeMb: wire.cache_size_mb,
    storageSizeMb: wire.storage_size_mb,
  };
  if (wire.goroutines !== undefined) {
    health.goroutines = wire.goroutines;
  }
  if (wire.memory_mb !== undefined) {
    health.memoryMb = wire.memory_mb;
  }
  return health;
}

/**
 * Convert an SDK health report to its wire form.
 */
export function toWireHealth(health: HealthStatus): WireHealth {
  return {
    status: health.status,
    uptime_seconds: health.uptimeSeconds,
    cache_items: health.cacheItems,
    cache_size_mb: health.cacheSizeMb,
    storage_size_mb: health.storageSizeMb,
    goroutines: health.goroutines,
    memory_mb: health.memoryMb,
  };
}

/**
 * Validate a decoded health document.
 *
 * @throws DecodeFailedError if the document does not match the schema
 */
export function parseHealth(json: unknown): HealthStatus {
  return fromWireHealth(validateJSON(json, WireHealthSchema));
}

/**
 * Validate a decoded JSON value against a schema.
 *
 * @throws DecodeFailedError listing each failing path
 */
export function validateJSON<T>(json: unknown, schema: JSONSchema<T>): T {
  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new DecodeFailedError(`Validation failed: ${issues}`);
  }
  return result.data;
}
