/**
 * Ephemeral (in-memory) Vaultline server for testing and development.
 *
 * Runs inside the current process and speaks the binary protocol, plus the
 * HTTP API when asked to. Data lives in a Map and disappears on stop.
 *
 * @example
 * ```typescript
 * import { createEphemeral, bytesToString } from '@vaultline/client';
 *
 * const server = await createEphemeral({ http: true });
 * const client = server.getClient();
 *
 * await client.set('key', 'value');
 * const value = await client.get('key');
 * console.log(value && bytesToString(value)); // 'value'
 * await server.stop();
 * ```
 */

import * as http from 'http';
import * as net from 'net';
import { decodeRequest, encodeResponse, type DecodedRequest } from '@vaultline/client/codec';
import { VaultlineClient } from '@vaultline/client/client';
import { keyToBytes, serializeJSON } from '@vaultline/client/encoding';
import { VaultlineError, toError } from '@vaultline/client/errors';
import { HEALTH_PATH, VaultlineHttpClient, decodeKeyPath } from '@vaultline/client/http';
import { resolveLogger, type Logger } from '@vaultline/client/logger';
import { toWireHealth } from '@vaultline/client/wire-types';
import { OpCode, Status, type ClientConfig, type HttpClientConfig, type Key } from '@vaultline/client/types';

/** Largest value the server accepts (100 MiB). */
export const DEFAULT_MAX_VALUE_SIZE = 100 * 1024 * 1024;

const MB = 1024 * 1024;

/**
 * Error thrown when ephemeral server operations fail.
 */
export class EphemeralServerError extends VaultlineError {
  constructor(message: string) {
    super(message, 'EPHEMERAL_SERVER');
    this.name = 'EphemeralServerError';
    Object.setPrototypeOf(this, EphemeralServerError.prototype);
  }
}

/**
 * Which operations require a credential.
 * - `none`: nothing
 * - `writes`: SET and DELETE
 * - `all`: everything except HEALTH and AUTH
 */
export type AuthMode = 'none' | 'writes' | 'all';

export type OpName = keyof typeof OpCode;

/**
 * One request seen by the server.
 */
export interface RecordedCall {
  transport: 'binary' | 'http';
  op: OpName;
  /** Key (or AUTH token) decoded as UTF-8 */
  key: string;
}

/**
 * Options for creating an ephemeral server.
 */
export interface EphemeralOptions {
  /** Interface to bind (default: 127.0.0.1) */
  host?: string;

  /** Binary listener port; 0 auto-assigns (default: 0) */
  port?: number;

  /** Also start the HTTP listener (default: false) */
  http?: boolean;

  /** HTTP listener port; 0 auto-assigns (default: 0) */
  httpPort?: number;

  /** Credential clients must present (default: none) */
  authKey?: string;

  /** Which operations need the credential (default: 'none') */
  authMode?: AuthMode;

  /** Largest accepted value in bytes (default: 100 MiB) */
  maxValueSize?: number;

  /** Custom logger for server diagnostics */
  logger?: Logger;

  /** Enable debug logging on the default console logger */
  enableLogging?: boolean;
}

interface Reply {
  status: number;
  body?: Uint8Array;
  /** Close the connection after replying */
  close?: boolean;
}

const OP_NAMES: Record<OpCode, OpName> = {
  [OpCode.GET]: 'GET',
  [OpCode.SET]: 'SET',
  [OpCode.DELETE]: 'DELETE',
  [OpCode.HEALTH]: 'HEALTH',
  [OpCode.AUTH]: 'AUTH',
};

/**
 * Manages an in-process Vaultline server.
 *
 * @example
 * ```typescript
 * const server = new EphemeralVault({ authKey: 'test-secret', authMode: 'writes' });
 * await server.start();
 * const client = server.getClient();
 * await client.set('key', 'value');
 * await server.stop();
 * ```
 */
export class EphemeralVault {
  private readonly host: string;
  private readonly port: number;
  private readonly httpEnabled: boolean;
  private readonly httpPort: number;
  private readonly authKey?: string;
  private readonly authMode: AuthMode;
  private readonly maxValueSize: number;
  private readonly logger: Logger;

  // Runtime state
  private readonly store = new Map<string, Buffer>();
  private readonly sockets = new Set<net.Socket>();
  private readonly calls: RecordedCall[] = [];
  private binaryServer?: net.Server;
  private httpServer?: http.Server;
  private boundPort?: number;
  private boundHttpPort?: number;
  private startTime = 0;
  private started = false;

  constructor(options: EphemeralOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 0;
    this.httpEnabled = options.http ?? false;
    this.httpPort = options.httpPort ?? 0;
    this.authKey = options.authKey || undefined;
    this.authMode = options.authMode ?? 'none';
    this.maxValueSize = options.maxValueSize ?? DEFAULT_MAX_VALUE_SIZE;
    this.logger = resolveLogger('VaultlineEphemeral', options.logger, options.enableLogging);

    if (this.authMode !== 'none' && !this.authKey) {
      throw new EphemeralServerError(`authMode "${this.authMode}" requires an authKey`);
    }
  }

  /**
   * Start listening.
   *
   * @throws {EphemeralServerError} If already started or a listener fails to bind
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new EphemeralServerError('Server already started');
    }

    const binaryServer = net.createServer((socket) => this.handleConnection(socket));
    try {
      this.boundPort = await listen(binaryServer, this.port, this.host);
      this.binaryServer = binaryServer;

      if (this.httpEnabled) {
        const httpServer = http.createServer((req, res) => this.handleHttp(req, res));
        this.httpServer = httpServer;
        this.boundHttpPort = await listen(httpServer, this.httpPort, this.host);
      }
    } catch (err) {
      await this.cleanup();
      throw new EphemeralServerError(`Failed to start server: ${toError(err).message}`);
    }

    this.startTime = Date.now();
    this.started = true;
    this.logger.debug(`Listening on ${this.getAddress()}`);
  }

  /**
   * Stop listening, drop open connections and clear the store.
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    await this.cleanup();
    this.store.clear();
    this.started = false;
  }

  /**
   * Binary listener address (`host:port`).
   *
   * @throws {EphemeralServerError} If server is not started
   */
  getAddress(): string {
    if (!this.started || this.boundPort === undefined) {
      throw new EphemeralServerError('Server not started. Call start() first.');
    }
    return `${this.host}:${this.boundPort}`;
  }

  /**
   * HTTP listener base URL.
   *
   * @throws {EphemeralServerError} If server is not started or HTTP is disabled
   */
  getBaseUrl(): string {
    if (!this.started) {
      throw new EphemeralServerError('Server not started. Call start() first.');
    }
    if (this.boundHttpPort === undefined) {
      throw new EphemeralServerError('HTTP listener is disabled. Pass { http: true }.');
    }
    return `http://${this.host}:${this.boundHttpPort}`;
  }

  /**
   * Get a binary client for this server, carrying the auth key if one is set.
   */
  getClient(overrides: Partial<ClientConfig> = {}): VaultlineClient {
    return new VaultlineClient({ address: this.getAddress(), apiKey: this.authKey, ...overrides });
  }

  /**
   * Get an HTTP client for this server, carrying the auth key if one is set.
   */
  getHttpClient(overrides: Partial<HttpClientConfig> = {}): VaultlineHttpClient {
    return new VaultlineHttpClient({ baseUrl: this.getBaseUrl(), apiKey: this.authKey, ...overrides });
  }

  /**
   * Read a stored value directly, bypassing both protocols.
   */
  getStoreValue(key: Key): Buffer | undefined {
    return this.store.get(storeKey(keyToBytes(key)));
  }

  /**
   * Remove every stored value and forget recorded calls.
   */
  clearStore(): void {
    this.store.clear();
    this.calls.length = 0;
  }

  /**
   * Requests seen so far, oldest first.
   */
  getCallHistory(): readonly RecordedCall[] {
    return [...this.calls];
  }

  private handleConnection(socket: net.Socket): void {
    this.sockets.add(socket);
    let pending: Buffer = Buffer.alloc(0);
    let authenticated = this.authMode === 'none';

    socket.on('data', (chunk: Buffer) => {
      pending = pending.length === 0 ? chunk : Buffer.concat([pending, chunk]);

      while (!socket.destroyed) {
        let request: DecodedRequest | null;
        try {
          request = decodeRequest(pending);
        } catch (err) {
          this.logger.warn('Dropping connection after malformed frame:', err);
          socket.end(encodeResponse(Status.ERROR));
          return;
        }
        if (!request) return;
        pending = pending.subarray(request.frameLength);

        const reply = this.dispatch(request, authenticated);
        if (request.op === OpCode.AUTH && reply.status === Status.SUCCESS) {
          authenticated = true;
        }

        if (reply.close) {
          socket.end(encodeResponse(reply.status, reply.body));
          return;
        }
        socket.write(encodeResponse(reply.status, reply.body));
      }
    });

    socket.on('error', (err) => this.logger.debug('Connection error:', err));
    socket.on('close', () => this.sockets.delete(socket));
  }

  private dispatch(request: DecodedRequest, authenticated: boolean): Reply {
    this.calls.push({ transport: 'binary', op: OP_NAMES[request.op], key: request.key.toString('utf8') });

    if (!authenticated && this.requiresAuth(request.op)) {
      return { status: Status.ERROR, close: true };
    }

    switch (request.op) {
      case OpCode.AUTH:
        return { status: this.checkCredential(request.key.toString('utf8')) ? Status.SUCCESS : Status.ERROR };

      case OpCode.GET: {
        const value = this.store.get(storeKey(request.key));
        return value ? { status: Status.SUCCESS, body: value } : { status: Status.ERROR };
      }

      case OpCode.SET:
        if (request.flags !== 0 || !request.value || request.value.length > this.maxValueSize) {
          return { status: Status.ERROR };
        }
        this.store.set(storeKey(request.key), Buffer.from(request.value));
        return { status: Status.SUCCESS };

      case OpCode.DELETE:
        this.store.delete(storeKey(request.key));
        return { status: Status.SUCCESS };

      case OpCode.HEALTH:
        return { status: Status.SUCCESS, body: this.healthDocument() };
    }
  }

  private handleHttp(req: http.IncomingMessage, res: http.ServerResponse): void {
    const chunks: Buffer[] = [];
    let size = 0;
    let rejected = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > this.maxValueSize) {
        if (!rejected) {
          rejected = true;
          respond(res, 413, 'Value too large');
        }
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!rejected) {
        this.routeHttp(req, res, Buffer.concat(chunks));
      }
    });
    req.on('error', (err) => this.logger.debug('HTTP request error:', err));
  }

  private routeHttp(req: http.IncomingMessage, res: http.ServerResponse, body: Buffer): void {
    const path = (req.url ?? '/').split('?')[0];
    const method = req.method ?? 'GET';

    if (path === HEALTH_PATH && method === 'GET') {
      this.calls.push({ transport: 'http', op: 'HEALTH', key: 'health' });
      respond(res, 200, this.healthDocument(), 'application/json');
      return;
    }

    let key: Buffer;
    try {
      key = decodeKeyPath(path.slice(1));
    } catch {
      respond(res, 400, 'Malformed key');
      return;
    }
    if (key.length === 0) {
      respond(res, 400, 'Key required');
      return;
    }

    const op = httpOp(method);
    if (!op) {
      respond(res, 405, 'Method not allowed');
      return;
    }

    this.calls.push({ transport: 'http', op: OP_NAMES[op], key: key.toString('utf8') });

    if (this.requiresAuth(op) && !this.checkCredential(presentedCredential(req))) {
      respond(res, 401, 'Unauthorized');
      return;
    }

    switch (op) {
      case OpCode.GET: {
        const value = this.store.get(storeKey(key));
        if (value) {
          respond(res, 200, value, 'application/octet-stream');
        } else {
          respond(res, 404, 'Key not found');
        }
        return;
      }
      case OpCode.SET:
        this.store.set(storeKey(key), body);
        respond(res, 204);
        return;
      case OpCode.DELETE:
        this.store.delete(storeKey(key));
        respond(res, 204);
        return;
    }
  }

  private requiresAuth(op: OpCode): boolean {
    switch (this.authMode) {
      case 'all':
        return op !== OpCode.HEALTH && op !== OpCode.AUTH;
      case 'writes':
        return op === OpCode.SET || op === OpCode.DELETE;
      case 'none':
        return false;
    }
  }

  private checkCredential(credential: string | undefined): boolean {
    return this.authKey !== undefined && credential === this.authKey;
  }

  private healthDocument(): Buffer {
    let bytes = 0;
    for (const value of this.store.values()) {
      bytes += value.length;
    }
    return serializeJSON(
      toWireHealth({
        status: 'healthy',
        uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
        cacheItems: this.store.size,
        cacheSizeMb: Math.floor(bytes / MB),
        storageSizeMb: Math.floor(bytes / MB),
        memoryMb: Math.floor(process.memoryUsage().heapUsed / MB),
      })
    );
  }

  private async cleanup(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    const closing: Promise<void>[] = [];
    if (this.binaryServer) closing.push(close(this.binaryServer));
    if (this.httpServer) {
      this.httpServer.closeAllConnections();
      closing.push(close(this.httpServer));
    }
    this.binaryServer = undefined;
    this.httpServer = undefined;
    this.boundPort = undefined;
    this.boundHttpPort = undefined;
    await Promise.all(closing);
  }
}

/**
 * Create and start an ephemeral server.
 *
 * @param options - Configuration options for the ephemeral server
 * @returns EphemeralVault instance that is started and ready to use
 */
export async function createEphemeral(options: EphemeralOptions = {}): Promise<EphemeralVault> {
  const server = new EphemeralVault(options);
  await server.start();
  return server;
}

function storeKey(key: Uint8Array): string {
  return Buffer.from(key).toString('latin1');
}

function httpOp(method: string): OpCode | null {
  switch (method) {
    case 'GET':
      return OpCode.GET;
    case 'PUT':
    case 'POST':
      return OpCode.SET;
    case 'DELETE':
      return OpCode.DELETE;
    default:
      return null;
  }
}

function presentedCredential(req: http.IncomingMessage): string | undefined {
  const apiKey = req.headers['x-api-key'];
  if (typeof apiKey === 'string') {
    return apiKey;
  }
  const authorization = req.headers.authorization;
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice('Bearer '.length);
  }
  return undefined;
}

function respond(res: http.ServerResponse, status: number, body?: string | Uint8Array, contentType = 'text/plain'): void {
  if (body === undefined) {
    res.writeHead(status).end();
    return;
  }
  res.writeHead(status, { 'Content-Type': contentType }).end(body);
}

function listen(server: net.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.removeListener('error', reject);
      const address = server.address();
      if (address && typeof address === 'object') {
        resolve(address.port);
      } else {
        reject(new Error('Failed to get port from server'));
      }
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
