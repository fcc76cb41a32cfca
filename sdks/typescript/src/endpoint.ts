import { InvalidArgumentError } from '@vaultline/client/errors';
import type { Endpoint } from '@vaultline/client/types';

/**
 * Parse a `host:port` address. IPv6 hosts must be bracketed (`[::1]:3000`).
 *
 * @throws InvalidArgumentError on a missing host or an invalid port
 */
export function parseAddress(address: string): Endpoint {
  const trimmed = address.trim();
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/.exec(trimmed);
  if (!match) {
    throw new InvalidArgumentError(`Invalid address "${address}": expected host:port`);
  }

  const host = match[1] ?? match[2] ?? '';
  const port = Number(match[3]);
  if (!host) {
    throw new InvalidArgumentError(`Invalid address "${address}": host is empty`);
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`Invalid address "${address}": port must be 1-65535`);
  }

  return { host, port };
}

/**
 * Format an endpoint back into `host:port`.
 */
export function formatEndpoint(endpoint: Endpoint): string {
  return endpoint.host.includes(':') ? `[${endpoint.host}]:${endpoint.port}` : `${endpoint.host}:${endpoint.port}`;
}
