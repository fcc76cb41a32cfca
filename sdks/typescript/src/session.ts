/**
 * Single-use transport sessions for the binary protocol.
 *
 * This module handles:
 * - Opening a TCP connection with a connect timeout
 * - The optional AUTH handshake
 * - One request/response round trip with partial-read accumulation
 * - Idle timeouts on every write and read
 * - Releasing the socket
 *
 * A session serves one logical client call and is then closed; nothing is
 * pooled or retried here.
 */

import * as net from 'net';
import {
  AuthFailedError,
  ConnectFailedError,
  DeadlineExceededError,
  IncompleteHeaderError,
  ServerError,
  SessionClosedError,
  VaultlineError,
  WriteFailedError,
} from '@vaultline/client/errors';
import {
  DEFAULT_READ_CHUNK_SIZE,
  RESPONSE_HEADER_SIZE,
  decodeResponseBody,
  decodeResponseHeader,
  encodeRequest,
  type ByteReader,
  type ResponseHeader,
} from '@vaultline/client/codec';
import { formatEndpoint } from '@vaultline/client/endpoint';
import { OpCode, type Endpoint } from '@vaultline/client/types';

/**
 * One connection, one optional AUTH, one operation.
 */
export interface Session {
  /** Send AUTH with the credential; no-op when it is absent or empty */
  authenticate(credential?: string): Promise<void>;

  /** Write one request frame and return the response body */
  roundTrip(request: Uint8Array): Promise<Buffer>;

  /** Release the connection */
  close(): void;
}

/**
 * Opens sessions. Wrap this to pool connections or observe lifecycles.
 */
export type SessionOpener = (endpoint: Endpoint, timeoutMs: number) => Promise<Session>;

/**
 * Options for a transport session.
 */
export interface SessionOptions {
  /** Maximum bytes requested per body read (default: 8192) */
  readChunkSize?: number;
}

const EMPTY = Buffer.alloc(0);

/**
 * Buffers socket data and hands it out in bounded reads.
 */
class SocketReader implements ByteReader {
  private chunks: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.notify();
  }

  end(): void {
    this.ended = true;
    this.notify();
  }

  fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    this.notify();
  }

  async read(maxBytes: number): Promise<Uint8Array> {
    while (this.chunks.length === 0) {
      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        return EMPTY;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }

    const head = this.chunks[0];
    if (head.length <= maxBytes) {
      this.chunks.shift();
      return head;
    }
    this.chunks[0] = head.subarray(maxBytes);
    return head.subarray(0, maxBytes);
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * A TCP session speaking the binary protocol.
 */
export class TransportSession implements Session {
  private readonly reader = new SocketReader();
  private readonly address: string;
  private readonly readChunkSize: number;
  private pendingWrite: ((error: Error) => void) | null = null;
  private closed = false;

  /**
   * Open a session.
   *
   * @param endpoint - Server host and port
   * @param timeoutMs - Connect timeout, then idle timeout for writes and reads
   * @throws ConnectFailedError on any connection-establishment error
   */
  static open(endpoint: Endpoint, timeoutMs: number, options: SessionOptions = {}): Promise<TransportSession> {
    const address = formatEndpoint(endpoint);

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new ConnectFailedError(`Connection timeout after ${timeoutMs}ms`, address));
      }, timeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(new ConnectFailedError(`Connection failed: ${err.message}`, address));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.removeListener('error', onError);
        resolve(new TransportSession(socket, address, timeoutMs, options));
      });
    });
  }

  constructor(
    private readonly socket: net.Socket,
    address: string,
    private readonly timeoutMs: number,
    options: SessionOptions = {}
  ) {
    this.address = address;
    this.readChunkSize = options.readChunkSize ?? DEFAULT_READ_CHUNK_SIZE;

    socket.setNoDelay(true);
    socket.setTimeout(timeoutMs);

    socket.on('data', (chunk: Buffer) => this.reader.push(chunk));
    socket.on('end', () => this.reader.end());
    socket.on('close', () => this.reader.end());
    socket.on('error', (err) => this.fail(err));
    socket.on('timeout', () => {
      this.fail(new DeadlineExceededError(`Request timeout after ${this.timeoutMs}ms (${this.address})`, this.timeoutMs));
    });
  }

  async authenticate(credential?: string): Promise<void> {
    if (!credential) {
      return;
    }

    try {
      await this.roundTrip(encodeRequest(OpCode.AUTH, credential));
    } catch (err) {
      if (err instanceof ServerError) {
        throw new AuthFailedError(`Authentication rejected by ${this.address}`, err.status);
      }
      throw err;
    }
  }

  async roundTrip(request: Uint8Array): Promise<Buffer> {
    if (this.closed) {
      throw new SessionClosedError();
    }

    await this.write(request);
    const header = await this.readHeader();
    return decodeResponseBody(header.status, header.bodyLength, this.reader, this.readChunkSize);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
  }

  isClosed(): boolean {
    return this.closed;
  }

  private write(frame: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.pendingWrite = (error) => {
        this.pendingWrite = null;
        reject(new WriteFailedError(`Write to ${this.address} failed: ${error.message}`));
      };

      this.socket.write(frame, (err) => {
        if (!this.pendingWrite) return;
        this.pendingWrite = null;
        if (err) {
          reject(new WriteFailedError(`Write to ${this.address} failed: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  private async readHeader(): Promise<ResponseHeader> {
    const chunks: Uint8Array[] = [];
    let received = 0;

    while (received < RESPONSE_HEADER_SIZE) {
      let chunk: Uint8Array;
      try {
        chunk = await this.reader.read(RESPONSE_HEADER_SIZE - received);
      } catch (err) {
        if (err instanceof DeadlineExceededError) {
          throw new IncompleteHeaderError(
            `Timed out waiting for response header from ${this.address}: got ${received} of ${RESPONSE_HEADER_SIZE} bytes`,
            received
          );
        }
        if (err instanceof VaultlineError) throw err;
        throw new IncompleteHeaderError(
          `Connection lost while reading response header from ${this.address}: got ${received} of ${RESPONSE_HEADER_SIZE} bytes`,
          received,
          { cause: err }
        );
      }
      if (chunk.length === 0) break;
      chunks.push(chunk);
      received += chunk.length;
    }

    return decodeResponseHeader(Buffer.concat(chunks, received));
  }

  private fail(error: Error): void {
    this.reader.fail(error);
    this.pendingWrite?.(error);
  }
}

/**
 * The default opener: a fresh TCP connection per call.
 */
export function createSessionOpener(options: SessionOptions = {}): SessionOpener {
  return (endpoint, timeoutMs) => TransportSession.open(endpoint, timeoutMs, options);
}
