/**
 * Binary frame codec.
 *
 * Request frame:
 * - op (u8), key length (u16 LE), key bytes
 * - SET only: value length (u32 LE), flags (u8, 0 = uncompressed), value bytes
 *
 * Response frame:
 * - status (u8), body length (u32 LE), body bytes
 *
 * Pure transformations; the session module supplies the bytes.
 */

import {
  ConnectionClosedError,
  DecodeFailedError,
  FrameTooLargeError,
  IncompleteHeaderError,
  InvalidArgumentError,
  ServerError,
  VaultlineError,
} from '@vaultline/client/errors';
import { keyToBytes, valueToBytes } from '@vaultline/client/encoding';
import { OpCode, Status, type Key, type Value } from '@vaultline/client/types';

/** Largest key the u16 length prefix can carry. */
export const MAX_KEY_LENGTH = 0xffff;

/** Largest value the u32 length prefix can carry. */
export const MAX_VALUE_LENGTH = 0xffffffff;

/** Size of a response header: status + body length. */
export const RESPONSE_HEADER_SIZE = 5;

/** Default upper bound for a single body read. */
export const DEFAULT_READ_CHUNK_SIZE = 8 * 1024;

const REQUEST_PREFIX_SIZE = 3;
const VALUE_PREFIX_SIZE = 5;
const FLAGS_UNCOMPRESSED = 0;

const OP_CODES: ReadonlySet<number> = new Set(Object.values(OpCode));

/**
 * Source of response bytes. A zero-length read means end-of-stream.
 */
export interface ByteReader {
  read(maxBytes: number): Promise<Uint8Array>;
}

/**
 * Decoded response header.
 */
export interface ResponseHeader {
  status: number;
  bodyLength: number;
}

/**
 * A request frame decoded from the wire.
 */
export interface DecodedRequest {
  op: OpCode;
  key: Buffer;
  /** Present for SET only */
  value?: Buffer;
  /** Present for SET only */
  flags?: number;
  /** Total bytes consumed by this frame */
  frameLength: number;
}

export function isOpCode(value: number): value is OpCode {
  return OP_CODES.has(value);
}

/**
 * Encode a request frame.
 *
 * @param op - Operation code
 * @param key - The key (for AUTH, the credential token)
 * @param value - The value; required for SET, forbidden otherwise
 * @throws InvalidArgumentError on an unknown op or wrong value presence
 * @throws FrameTooLargeError if the key or value overflows its length field
 */
export function encodeRequest(op: OpCode, key: Key, value?: Value): Buffer {
  if (!isOpCode(op)) {
    throw new InvalidArgumentError(`Unknown operation code: 0x${Number(op).toString(16)}`);
  }
  if (op === OpCode.SET && value === undefined) {
    throw new InvalidArgumentError('SET requires a value');
  }
  if (op !== OpCode.SET && value !== undefined) {
    throw new InvalidArgumentError(`Operation 0x${op.toString(16).padStart(2, '0')} does not take a value`);
  }

  const keyBytes = keyToBytes(key);
  if (keyBytes.length > MAX_KEY_LENGTH) {
    throw new FrameTooLargeError('key', keyBytes.length, MAX_KEY_LENGTH);
  }

  const valueBytes = value === undefined ? null : valueToBytes(value);
  if (valueBytes && valueBytes.length > MAX_VALUE_LENGTH) {
    throw new FrameTooLargeError('value', valueBytes.length, MAX_VALUE_LENGTH);
  }

  const size = REQUEST_PREFIX_SIZE + keyBytes.length + (valueBytes ? VALUE_PREFIX_SIZE + valueBytes.length : 0);
  const frame = Buffer.allocUnsafe(size);
  frame[0] = op;
  frame.writeUInt16LE(keyBytes.length, 1);
  keyBytes.copy(frame, REQUEST_PREFIX_SIZE);

  if (valueBytes) {
    const offset = REQUEST_PREFIX_SIZE + keyBytes.length;
    frame.writeUInt32LE(valueBytes.length, offset);
    frame[offset + 4] = FLAGS_UNCOMPRESSED;
    valueBytes.copy(frame, offset + VALUE_PREFIX_SIZE);
  }

  return frame;
}

/**
 * Decode one request frame from the start of `bytes`.
 *
 * @returns The request, or null if `bytes` holds less than a full frame
 * @throws DecodeFailedError on an unknown op code
 */
export function decodeRequest(bytes: Uint8Array): DecodedRequest | null {
  if (bytes.length < REQUEST_PREFIX_SIZE) {
    return null;
  }

  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const op = buf[0];
  if (!isOpCode(op)) {
    throw new DecodeFailedError(`Unknown operation code: 0x${op.toString(16).padStart(2, '0')}`);
  }

  const keyLength = buf.readUInt16LE(1);
  const keyEnd = REQUEST_PREFIX_SIZE + keyLength;
  if (buf.length < keyEnd) {
    return null;
  }
  const key = buf.subarray(REQUEST_PREFIX_SIZE, keyEnd);

  if (op !== OpCode.SET) {
    return { op, key, frameLength: keyEnd };
  }

  if (buf.length < keyEnd + VALUE_PREFIX_SIZE) {
    return null;
  }
  const valueLength = buf.readUInt32LE(keyEnd);
  const flags = buf[keyEnd + 4];
  const valueStart = keyEnd + VALUE_PREFIX_SIZE;
  if (buf.length < valueStart + valueLength) {
    return null;
  }

  return {
    op,
    key,
    value: buf.subarray(valueStart, valueStart + valueLength),
    flags,
    frameLength: valueStart + valueLength,
  };
}

/**
 * Encode a response frame.
 */
export function encodeResponse(status: number, body: Uint8Array = new Uint8Array(0)): Buffer {
  const frame = Buffer.allocUnsafe(RESPONSE_HEADER_SIZE + body.length);
  frame[0] = status;
  frame.writeUInt32LE(body.length, 1);
  frame.set(body, RESPONSE_HEADER_SIZE);
  return frame;
}

/**
 * Decode a 5-byte response header.
 *
 * @throws IncompleteHeaderError if fewer than 5 bytes are given
 */
export function decodeResponseHeader(raw: Uint8Array): ResponseHeader {
  if (raw.length < RESPONSE_HEADER_SIZE) {
    throw new IncompleteHeaderError(
      `Incomplete response header: got ${raw.length} of ${RESPONSE_HEADER_SIZE} bytes`,
      raw.length
    );
  }
  const buf = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength);
  return {
    status: buf[0],
    bodyLength: buf.readUInt32LE(1),
  };
}

/**
 * Read up to `length` bytes, stopping early only at end-of-stream.
 *
 * @throws ConnectionClosedError if the reader fails with an untyped error
 */
export async function readFully(
  reader: ByteReader,
  length: number,
  chunkSize: number = DEFAULT_READ_CHUNK_SIZE
): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  let received = 0;

  while (received < length) {
    let chunk: Uint8Array;
    try {
      chunk = await reader.read(Math.min(length - received, chunkSize));
    } catch (err) {
      if (err instanceof VaultlineError) throw err;
      throw new ConnectionClosedError(
        `Connection lost while reading data: got ${received} of ${length} bytes`,
        length,
        received,
        { cause: err }
      );
    }
    if (chunk.length === 0) {
      break;
    }
    chunks.push(chunk);
    received += chunk.length;
  }

  return Buffer.concat(chunks, received);
}

/**
 * Read a response body.
 *
 * @throws ServerError if `status` is not SUCCESS; no body bytes are read
 * @throws ConnectionClosedError if the stream ends before `declaredLength` bytes
 */
export async function decodeResponseBody(
  status: number,
  declaredLength: number,
  reader: ByteReader,
  chunkSize: number = DEFAULT_READ_CHUNK_SIZE
): Promise<Buffer> {
  if (status !== Status.SUCCESS) {
    throw new ServerError(status);
  }

  const body = await readFully(reader, declaredLength, chunkSize);
  if (body.length < declaredLength) {
    throw new ConnectionClosedError(
      `Connection closed while reading data: got ${body.length} of ${declaredLength} bytes`,
      declaredLength,
      body.length
    );
  }
  return body;
}
