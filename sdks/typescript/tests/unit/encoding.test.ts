/**
 * Unit tests for byte, text and JSON conversions.
 */

import { describe, it, expect } from 'vitest';
import {
  bytesToString,
  describeKey,
  keyToBytes,
  parseJSONBytes,
  serializeJSON,
  valueToBytes,
} from '@vaultline/client/encoding';
import { DecodeFailedError } from '@vaultline/client/errors';

describe('Encoding', () => {
  describe('keyToBytes / valueToBytes', () => {
    it('should encode strings as UTF-8', () => {
      expect(keyToBytes('héllo').toString('hex')).toBe('68c3a96c6c6f');
      expect(valueToBytes('€').toString('hex')).toBe('e282ac');
    });

    it('should pass bytes through unchanged', () => {
      const bytes = new Uint8Array([1, 2, 3, 4]).subarray(1, 3);
      expect(keyToBytes(bytes).toString('hex')).toBe('0203');
      expect(valueToBytes(bytes).toString('hex')).toBe('0203');
    });
  });

  describe('bytesToString', () => {
    it('should decode UTF-8', () => {
      expect(bytesToString(Buffer.from('68c3a96c6c6f', 'hex'))).toBe('héllo');
    });

    it('should reject invalid UTF-8', () => {
      expect(() => bytesToString(new Uint8Array([0xff, 0xfe]))).toThrow(DecodeFailedError);
      expect(() => bytesToString(new Uint8Array([0xff, 0xfe]))).toThrow(/^Invalid UTF-8: /);
    });
  });

  describe('describeKey', () => {
    it('should print strings as-is and bytes as hex', () => {
      expect(describeKey('user:1')).toBe('user:1');
      expect(describeKey(new Uint8Array([0x01, 0xab]))).toBe('0x01ab');
    });
  });

  describe('parseJSONBytes', () => {
    it('should parse JSON', () => {
      expect(parseJSONBytes(Buffer.from('{"name":"Alice","tags":[1,2]}'))).toEqual({ name: 'Alice', tags: [1, 2] });
    });

    it('should reject malformed JSON', () => {
      expect(() => parseJSONBytes(Buffer.from('{oops'))).toThrow(DecodeFailedError);
      expect(() => parseJSONBytes(Buffer.from('{oops'))).toThrow(/^Invalid JSON: /);
    });
  });

  describe('serializeJSON', () => {
    it('should serialize to UTF-8 bytes', () => {
      expect(serializeJSON({ a: 1, b: 'é' }).toString('utf8')).toBe('{"a":1,"b":"é"}');
    });

    it('should reject values without a JSON form', () => {
      expect(() => serializeJSON(undefined)).toThrow('Value of type undefined has no JSON representation');
    });

    it('should reject circular values', () => {
      const value: Record<string, unknown> = {};
      value.self = value;
      expect(() => serializeJSON(value)).toThrow(DecodeFailedError);
      expect(() => serializeJSON(value)).toThrow(/^Value is not JSON-serializable: /);
    });
  });
});
