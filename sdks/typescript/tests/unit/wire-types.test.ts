import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { DecodeFailedError } from '@vaultline/client/errors';
import { parseHealth, toWireHealth, validateJSON } from '@vaultline/client/wire-types';

describe('Wire types', () => {
  describe('parseHealth', () => {
    it('should convert the snake_case document', () => {
      const health = parseHealth({
        status: 'healthy',
        uptime_seconds: 42,
        cache_items: 3,
        cache_size_mb: 1,
        storage_size_mb: 2,
        goroutines: 12,
        memory_mb: 8,
      });

      expect(health).toEqual({
        status: 'healthy',
        uptimeSeconds: 42,
        cacheItems: 3,
        cacheSizeMb: 1,
        storageSizeMb: 2,
        goroutines: 12,
        memoryMb: 8,
      });
    });

    it('should leave optional fields out when absent', () => {
      const health = parseHealth({
        status: 'healthy',
        uptime_seconds: 0,
        cache_items: 0,
        cache_size_mb: 0,
        storage_size_mb: 0,
      });

      expect(Object.keys(health)).toEqual(['status', 'uptimeSeconds', 'cacheItems', 'cacheSizeMb', 'storageSizeMb']);
    });

    it('should reject malformed documents', () => {
      expect(() => parseHealth({ status: 'healthy', uptime_seconds: 'long' })).toThrow(DecodeFailedError);
      expect(() => parseHealth(null)).toThrow(/^Validation failed: \(root\): /);
    });
  });

  describe('toWireHealth', () => {
    it('should produce the server form', () => {
      expect(
        toWireHealth({ status: 'healthy', uptimeSeconds: 5, cacheItems: 1, cacheSizeMb: 0, storageSizeMb: 0, memoryMb: 30 })
      ).toEqual({
        status: 'healthy',
        uptime_seconds: 5,
        cache_items: 1,
        cache_size_mb: 0,
        storage_size_mb: 0,
        memory_mb: 30,
      });
    });
  });

  describe('validateJSON', () => {
    const User = z.object({ name: z.string(), age: z.number().optional() });

    it('should return the parsed value', () => {
      expect(validateJSON({ name: 'Alice', age: 30 }, User)).toEqual({ name: 'Alice', age: 30 });
    });

    it('should list failing paths', () => {
      expect(() => validateJSON({ name: 1 }, User)).toThrow('Validation failed: name: Expected string, received number');
    });
  });
});
