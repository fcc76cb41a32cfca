/**
 * Custom error classes for the Vaultline client.
 */

/**
 * Base error class for all Vaultline errors.
 */
export class VaultlineError extends Error {
  constructor(message: string, public readonly code?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'VaultlineError';
    Object.setPrototypeOf(this, VaultlineError.prototype);
  }
}

/**
 * Error indicating the TCP connection could not be established
 * (DNS failure, refusal, or connect timeout).
 */
export class ConnectFailedError extends VaultlineError {
  constructor(message: string, public readonly address?: string) {
    super(message, 'CONNECT_FAILED');
    this.name = 'ConnectFailedError';
    Object.setPrototypeOf(this, ConnectFailedError.prototype);
  }
}

/**
 * Error indicating a request frame could not be fully written.
 */
export class WriteFailedError extends VaultlineError {
  constructor(message: string) {
    super(message, 'WRITE_FAILED');
    this.name = 'WriteFailedError';
    Object.setPrototypeOf(this, WriteFailedError.prototype);
  }
}

/**
 * Error indicating fewer than 5 response header bytes arrived before
 * end-of-stream or timeout.
 */
export class IncompleteHeaderError extends VaultlineError {
  constructor(
    message: string,
    /** Number of header bytes received */
    public readonly received: number,
    options?: ErrorOptions
  ) {
    super(message, 'INCOMPLETE_HEADER', options);
    this.name = 'IncompleteHeaderError';
    Object.setPrototypeOf(this, IncompleteHeaderError.prototype);
  }
}

/**
 * Error indicating the stream ended before the declared body length was read.
 */
export class ConnectionClosedError extends VaultlineError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly received: number,
    options?: ErrorOptions
  ) {
    super(message, 'CONNECTION_CLOSED', options);
    this.name = 'ConnectionClosedError';
    Object.setPrototypeOf(this, ConnectionClosedError.prototype);
  }
}

/**
 * Error indicating the server answered with a non-success status byte.
 */
export class ServerError extends VaultlineError {
  constructor(public readonly status: number) {
    super(`Server returned error status: 0x${status.toString(16).padStart(2, '0')}`, 'SERVER_ERROR');
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}

/**
 * Error indicating the server rejected the credential.
 */
export class AuthFailedError extends VaultlineError {
  constructor(
    message: string,
    /** Binary status byte or HTTP status code, when known */
    public readonly status?: number
  ) {
    super(message, 'AUTH_FAILED');
    this.name = 'AuthFailedError';
    Object.setPrototypeOf(this, AuthFailedError.prototype);
  }
}

/**
 * Error indicating a key or value does not fit its length prefix.
 */
export class FrameTooLargeError extends VaultlineError {
  constructor(
    public readonly field: 'key' | 'value',
    public readonly size: number,
    public readonly maxSize: number
  ) {
    super(`${field} length ${size} exceeds maximum ${maxSize}`, 'FRAME_TOO_LARGE');
    this.name = 'FrameTooLargeError';
    Object.setPrototypeOf(this, FrameTooLargeError.prototype);
  }
}

/**
 * Error indicating malformed bytes, text or JSON.
 */
export class DecodeFailedError extends VaultlineError {
  constructor(message: string) {
    super(message, 'DECODE_FAILED');
    this.name = 'DecodeFailedError';
    Object.setPrototypeOf(this, DecodeFailedError.prototype);
  }
}

/**
 * Error indicating the request exceeded the deadline/timeout.
 */
export class DeadlineExceededError extends VaultlineError {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message, 'DEADLINE_EXCEEDED');
    this.name = 'DeadlineExceededError';
    Object.setPrototypeOf(this, DeadlineExceededError.prototype);
  }
}

/**
 * Error indicating invalid request parameters.
 */
export class InvalidArgumentError extends VaultlineError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Error indicating a session was used after it was closed.
 */
export class SessionClosedError extends VaultlineError {
  constructor(message: string = 'Session is closed') {
    super(message, 'SESSION_CLOSED');
    this.name = 'SessionClosedError';
    Object.setPrototypeOf(this, SessionClosedError.prototype);
  }
}

/**
 * Error indicating an unexpected HTTP status from the HTTP transport.
 */
export class HttpStatusError extends VaultlineError {
  constructor(message: string, public readonly status: number) {
    super(message, 'HTTP_STATUS');
    this.name = 'HttpStatusError';
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }
}

/**
 * Convert an HTTP status code to a Vaultline error.
 */
export function fromHttpStatus(status: number, detail: string = '', timeoutMs: number = 0): VaultlineError {
  const message = detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;

  switch (status) {
    case 401:
    case 403:
      return new AuthFailedError(message, status);

    case 408:
    case 504:
      return new DeadlineExceededError(message, timeoutMs);

    default:
      return new HttpStatusError(message, status);
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
