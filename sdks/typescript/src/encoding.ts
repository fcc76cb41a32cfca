/**
 * Byte, text and JSON conversions shared by both transports.
 */

import { DecodeFailedError } from '@vaultline/client/errors';
import type { Key, Value } from '@vaultline/client/types';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Convert a key to UTF-8 bytes.
 */
export function keyToBytes(key: Key): Buffer {
  return typeof key === 'string' ? Buffer.from(key, 'utf8') : Buffer.from(key.buffer, key.byteOffset, key.byteLength);
}

/**
 * Convert a value to bytes. Strings are encoded as UTF-8.
 */
export function valueToBytes(value: Value): Buffer {
  return typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
}

/**
 * Decode bytes as UTF-8 text.
 *
 * @throws DecodeFailedError if the bytes are not valid UTF-8
 */
export function bytesToString(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new DecodeFailedError(`Invalid UTF-8: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Printable form of a key for log messages.
 */
export function describeKey(key: Key): string {
  return typeof key === 'string' ? key : `0x${Buffer.from(key).toString('hex')}`;
}

/**
 * Decode UTF-8 JSON bytes.
 *
 * @throws DecodeFailedError on invalid UTF-8 or JSON
 */
export function parseJSONBytes(bytes: Uint8Array): unknown {
  const text = bytesToString(bytes);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DecodeFailedError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Serialize a value as UTF-8 JSON bytes.
 *
 * @throws DecodeFailedError if the value has no JSON representation
 */
export function serializeJSON(value: unknown): Buffer {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (err) {
    throw new DecodeFailedError(`Value is not JSON-serializable: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (text === undefined) {
    throw new DecodeFailedError(`Value of type ${typeof value} has no JSON representation`);
  }
  return Buffer.from(text, 'utf8');
}
