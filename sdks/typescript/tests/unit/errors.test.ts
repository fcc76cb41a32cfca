/**
 * Unit tests for the error taxonomy.
 */

import { describe, it, expect } from 'vitest';
import {
  AuthFailedError,
  ConnectFailedError,
  DeadlineExceededError,
  FrameTooLargeError,
  HttpStatusError,
  ServerError,
  SessionClosedError,
  VaultlineError,
  fromHttpStatus,
  toError,
} from '@vaultline/client/errors';

describe('Errors', () => {
  it('should keep the prototype chain for instanceof', () => {
    const error = new ConnectFailedError('Connection failed: refused', '127.0.0.1:1');

    expect(error).toBeInstanceOf(ConnectFailedError);
    expect(error).toBeInstanceOf(VaultlineError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConnectFailedError');
    expect(error.code).toBe('CONNECT_FAILED');
    expect(error.address).toBe('127.0.0.1:1');
  });

  it('should format server status bytes as two hex digits', () => {
    expect(new ServerError(0xff).message).toBe('Server returned error status: 0xff');
    expect(new ServerError(0x01).message).toBe('Server returned error status: 0x01');
    expect(new ServerError(0x01).code).toBe('SERVER_ERROR');
  });

  it('should describe oversized fields', () => {
    const error = new FrameTooLargeError('value', 10, 4);
    expect(error.message).toBe('value length 10 exceeds maximum 4');
    expect(error.code).toBe('FRAME_TOO_LARGE');
  });

  it('should default the session-closed message', () => {
    expect(new SessionClosedError().message).toBe('Session is closed');
  });

  describe('fromHttpStatus', () => {
    it('should map 401 and 403 to AuthFailedError', () => {
      const error = fromHttpStatus(401, 'Unauthorized');
      expect(error).toBeInstanceOf(AuthFailedError);
      expect(error.message).toBe('HTTP 401: Unauthorized');
      expect(error instanceof AuthFailedError && error.status).toBe(401);
      expect(fromHttpStatus(403)).toBeInstanceOf(AuthFailedError);
    });

    it('should map 408 and 504 to DeadlineExceededError', () => {
      const error = fromHttpStatus(504, '', 2000);
      expect(error).toBeInstanceOf(DeadlineExceededError);
      expect(error.message).toBe('HTTP 504');
      expect(error instanceof DeadlineExceededError && error.timeoutMs).toBe(2000);
      expect(fromHttpStatus(408)).toBeInstanceOf(DeadlineExceededError);
    });

    it('should map everything else to HttpStatusError', () => {
      const error = fromHttpStatus(500, 'boom');
      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error.message).toBe('HTTP 500: boom');
      expect(error.code).toBe('HTTP_STATUS');
    });
  });

  describe('toError', () => {
    it('should keep errors and wrap other values', () => {
      const original = new Error('x');
      expect(toError(original)).toBe(original);
      expect(toError('plain').message).toBe('plain');
    });
  });
});
