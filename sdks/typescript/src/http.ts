/**
 * HTTP transport for Vaultline.
 *
 * Exposes the same surface as the binary client over the server's REST
 * endpoints: `GET|PUT|DELETE /<key>` and `GET /health`.
 */

import { describeKey, keyToBytes, parseJSONBytes, valueToBytes } from '@vaultline/client/encoding';
import {
  ConnectFailedError,
  DeadlineExceededError,
  InvalidArgumentError,
  fromHttpStatus,
  toError,
} from '@vaultline/client/errors';
import { DEFAULT_TIMEOUT_MS } from '@vaultline/client/client';
import { resolveLogger } from '@vaultline/client/logger';
import { BaseStore } from '@vaultline/client/store';
import { parseHealth } from '@vaultline/client/wire-types';
import type { HealthStatus, HttpAuthScheme, HttpClientConfig, Key, Value } from '@vaultline/client/types';

/** Path of the health endpoint. */
export const HEALTH_PATH = '/health';

const MAX_ERROR_DETAIL = 200;
const UNRESERVED = /^[A-Za-z0-9\-_.~]$/;

interface HttpResponse {
  status: number;
  body: Buffer;
}

/**
 * Percent-encode a key as a single URL path segment. Every byte outside the
 * unreserved set is escaped, so binary keys survive the trip.
 *
 * @throws InvalidArgumentError on an empty key
 */
export function encodeKeyPath(key: Key): string {
  const bytes = keyToBytes(key);
  if (bytes.length === 0) {
    throw new InvalidArgumentError('Key must not be empty');
  }

  let path = '/';
  for (const byte of bytes) {
    const char = String.fromCharCode(byte);
    path += byte < 0x80 && UNRESERVED.test(char) ? char : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return path;
}

/**
 * Decode a percent-encoded path segment (without the leading slash) to bytes.
 *
 * @throws InvalidArgumentError on a malformed escape
 */
export function decodeKeyPath(segment: string): Buffer {
  const bytes: number[] = [];
  for (let i = 0; i < segment.length; i++) {
    const char = segment[i];
    if (char === '%') {
      const hex = segment.slice(i + 1, i + 3);
      if (!/^[0-9A-Fa-f]{2}$/.test(hex)) {
        throw new InvalidArgumentError(`Malformed escape in path: %${hex}`);
      }
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(...Buffer.from(char, 'utf8'));
    }
  }
  return Buffer.from(bytes);
}

/**
 * Vaultline client for the HTTP API.
 *
 * Failures are collapsed the same way as on the binary client. Unlike the
 * binary protocol, HTTP has a distinct not-found status, so a zero-length
 * stored value is returned as an empty array rather than `null`.
 *
 * @example
 * ```ts
 * const client = new VaultlineHttpClient({
 *   baseUrl: 'http://localhost:8080',
 *   apiKey: process.env.VAULTLINE_API_KEY,
 * });
 *
 * await client.set('greeting', 'hello');
 * const health = await client.health();
 * ```
 */
export class VaultlineHttpClient extends BaseStore {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly authScheme: HttpAuthScheme;
  private readonly timeout: number;

  constructor(config: HttpClientConfig) {
    super(resolveLogger('VaultlineHttp', config.logger, config.enableLogging), config.batchConcurrency);

    if (!config.baseUrl) {
      throw new InvalidArgumentError('A base URL is required');
    }

    let url: URL;
    try {
      url = new URL(config.baseUrl);
    } catch {
      throw new InvalidArgumentError(`Invalid base URL "${config.baseUrl}"`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new InvalidArgumentError(`Unsupported protocol "${url.protocol}" in base URL`);
    }

    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey || undefined;
    this.authScheme = config.authScheme ?? 'api-key';
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;

    if (!Number.isFinite(this.timeout) || this.timeout <= 0) {
      throw new InvalidArgumentError(`timeout must be a positive number, got ${this.timeout}`);
    }
  }

  /**
   * Get the raw bytes stored under a key.
   *
   * @returns The value, or null if the key is missing or the call failed
   * @throws InvalidArgumentError on an empty key
   */
  async get(key: Key): Promise<Uint8Array | null> {
    const path = encodeKeyPath(key);
    try {
      const response = await this.send('GET', path);
      if (response.status === 404) {
        this.logger.debug(`Cache miss: ${describeKey(key)}`);
        return null;
      }
      this.expectOk(response);
      this.logger.debug(`Cache hit: ${describeKey(key)} (${response.body.length} bytes)`);
      return response.body;
    } catch (error) {
      this.logger.error(`GET failed for ${describeKey(key)}:`, error);
      return null;
    }
  }

  /**
   * Store a value under a key.
   *
   * @returns true on a 2xx response
   */
  async set(key: Key, value: Value): Promise<boolean> {
    const path = encodeKeyPath(key);
    try {
      this.expectOk(await this.send('PUT', path, valueToBytes(value)));
      this.logger.debug(`Cache set: ${describeKey(key)}`);
      return true;
    } catch (error) {
      this.logger.error(`SET failed for ${describeKey(key)}:`, error);
      return false;
    }
  }

  /**
   * Delete a key.
   *
   * @returns true on a 2xx response
   */
  async delete(key: Key): Promise<boolean> {
    const path = encodeKeyPath(key);
    try {
      this.expectOk(await this.send('DELETE', path));
      this.logger.debug(`Cache delete: ${describeKey(key)}`);
      return true;
    } catch (error) {
      this.logger.error(`DELETE failed for ${describeKey(key)}:`, error);
      return false;
    }
  }

  /**
   * Get server health.
   *
   * @returns The health report, or null if the call or decoding failed
   */
  async health(): Promise<HealthStatus | null> {
    try {
      const response = await this.send('GET', HEALTH_PATH);
      this.expectOk(response);
      return parseHealth(parseJSONBytes(response.body));
    } catch (error) {
      this.logger.error('Health check failed:', error);
      return null;
    }
  }

  private headers(body?: Uint8Array): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      if (this.authScheme === 'bearer') {
        headers['Authorization'] = `Bearer ${this.apiKey}`;
      } else {
        headers['X-API-Key'] = this.apiKey;
      }
    }
    if (body) {
      headers['Content-Type'] = 'application/octet-stream';
    }
    return headers;
  }

  /**
   * Perform one request and read its whole body within the timeout.
   */
  private async send(method: string, path: string, body?: Uint8Array): Promise<HttpResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers(body),
        body,
        signal: controller.signal,
      });
      return { status: response.status, body: Buffer.from(await response.arrayBuffer()) };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new DeadlineExceededError(`Request timeout after ${this.timeout}ms (${method} ${path})`, this.timeout);
      }
      throw new ConnectFailedError(`Request failed: ${toError(error).message}`, this.baseUrl);
    } finally {
      clearTimeout(timer);
    }
  }

  private expectOk(response: HttpResponse): void {
    if (response.status >= 200 && response.status < 300) {
      return;
    }
    const detail = response.body.length <= MAX_ERROR_DETAIL ? response.body.toString('utf8').trim() : '';
    throw fromHttpStatus(response.status, detail, this.timeout);
  }
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(config: HttpClientConfig): VaultlineHttpClient {
  return new VaultlineHttpClient(config);
}
