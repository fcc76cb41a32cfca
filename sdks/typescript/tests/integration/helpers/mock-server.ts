/**
 * Scripted binary-protocol server for integration testing.
 *
 * Each decoded request frame is handed to a script that writes whatever bytes
 * the test needs: well-formed replies, truncated headers, short bodies or
 * nothing at all.
 */

import * as net from 'net';
import { decodeRequest, encodeResponse, type DecodedRequest } from '@vaultline/client/codec';
import { Status } from '@vaultline/client/types';

/**
 * Reacts to one request. `index` counts frames on this connection.
 */
export type RequestScript = (request: DecodedRequest, socket: net.Socket, index: number) => void;

interface CallRecord {
  connection: number;
  request: DecodedRequest;
}

export class MockBinaryServer {
  private server: net.Server;
  private sockets = new Set<net.Socket>();
  private callHistory: CallRecord[] = [];
  private connectionCount = 0;
  private closedCount = 0;
  private port = 0;

  constructor(private script: RequestScript = replyOk()) {
    this.server = net.createServer((socket) => this.handleConnection(socket));
  }

  private handleConnection(socket: net.Socket): void {
    const connection = ++this.connectionCount;
    this.sockets.add(socket);
    let pending = Buffer.alloc(0);
    let index = 0;

    socket.on('data', (chunk: Buffer) => {
      pending = Buffer.concat([pending, chunk]);
      let request = decodeRequest(pending);
      while (request && !socket.destroyed) {
        pending = pending.subarray(request.frameLength);
        this.callHistory.push({ connection, request });
        this.script(request, socket, index++);
        request = decodeRequest(pending);
      }
    });
    socket.on('error', () => {});
    socket.on('close', () => {
      this.closedCount++;
      this.sockets.delete(socket);
    });
  }

  /**
   * Replace the script for subsequent requests.
   */
  setScript(script: RequestScript): void {
    this.script = script;
  }

  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(0, '127.0.0.1', () => {
        const address = this.server.address();
        if (address && typeof address === 'object') {
          this.port = address.port;
          resolve(this.port);
        } else {
          reject(new Error('Failed to get port from server'));
        }
      });
    });
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }

  getAddress(): string {
    return `127.0.0.1:${this.port}`;
  }

  getCallHistory(): CallRecord[] {
    return [...this.callHistory];
  }

  getConnectionCount(): number {
    return this.connectionCount;
  }

  getClosedCount(): number {
    return this.closedCount;
  }
}

/**
 * Reply SUCCESS with the given body to every request.
 */
export function replyOk(body: Uint8Array = new Uint8Array(0)): RequestScript {
  return (_request, socket) => {
    socket.write(encodeResponse(Status.SUCCESS, body));
  };
}

/**
 * Write raw bytes, then optionally end the connection.
 */
export function replyRaw(bytes: Uint8Array, options: { end?: boolean } = {}): RequestScript {
  return (_request, socket) => {
    if (options.end) {
      socket.end(bytes);
    } else {
      socket.write(bytes);
    }
  };
}

export async function createMockServer(script?: RequestScript): Promise<MockBinaryServer> {
  const server = new MockBinaryServer(script);
  await server.start();
  return server;
}
