/**
 * Integration tests for error handling using the scripted server.
 *
 * Every failure must surface as null/false plus one logged error, and the
 * session must be closed exactly once whatever happened.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as net from 'net';
import { VaultlineClient } from '@vaultline/client/client';
import { encodeResponse } from '@vaultline/client/codec';
import {
  ConnectFailedError,
  ConnectionClosedError,
  DeadlineExceededError,
  DecodeFailedError,
  FrameTooLargeError,
  IncompleteHeaderError,
  InvalidArgumentError,
  ServerError,
} from '@vaultline/client/errors';
import { createSessionOpener, type Session, type SessionOpener } from '@vaultline/client/session';
import { OpCode, Status } from '@vaultline/client/types';
import { MockBinaryServer, createMockServer, replyOk, replyRaw } from '../helpers/mock-server';
import { RecordingLogger, expectSingleLoggedError, waitFor } from '../helpers/assertions';

/**
 * Wrap the default opener to count session closes.
 */
function countingOpener(): { openSession: SessionOpener; closes: () => number } {
  const open = createSessionOpener();
  let closes = 0;
  return {
    closes: () => closes,
    openSession: async (endpoint, timeoutMs) => {
      const session = await open(endpoint, timeoutMs);
      const counted: Session = {
        authenticate: (credential) => session.authenticate(credential),
        roundTrip: (request) => session.roundTrip(request),
        close: () => {
          closes++;
          session.close();
        },
      };
      return counted;
    },
  };
}

describe('Error Handling (Scripted)', () => {
  let server: MockBinaryServer;
  let logger: RecordingLogger;

  beforeEach(async () => {
    server = await createMockServer();
    logger = new RecordingLogger();
  });

  afterEach(async () => {
    await server.stop();
  });

  const clientFor = (config: { apiKey?: string; timeout?: number } = {}, openSession?: SessionOpener) =>
    new VaultlineClient({ address: server.getAddress(), logger, ...config }, { openSession });

  describe('Response header', () => {
    it('should fail when the stream ends inside the header', async () => {
      server.setScript(replyRaw(new Uint8Array([0x00, 0x05]), { end: true }));

      expect(await clientFor().get('k')).toBeNull();

      const error = expectSingleLoggedError(logger, 'GET failed for k:');
      expect(error).toBeInstanceOf(IncompleteHeaderError);
      expect(error instanceof IncompleteHeaderError && error.received).toBe(2);
      expect(error instanceof IncompleteHeaderError && error.message).toBe(
        'Incomplete response header: got 2 of 5 bytes'
      );
    });

    it('should fail when the header stalls until the timeout', async () => {
      server.setScript(replyRaw(new Uint8Array([0x00, 0x05, 0x00])));

      expect(await clientFor({ timeout: 100 }).get('k')).toBeNull();

      const error = expectSingleLoggedError(logger, 'GET failed for k:');
      expect(error).toBeInstanceOf(IncompleteHeaderError);
      expect(error instanceof IncompleteHeaderError && error.received).toBe(3);
    });

    it('should fail when the connection is reset inside the header', async () => {
      server.setScript((_request, socket) => {
        socket.write(Buffer.from([0x00, 0x05]));
        setTimeout(() => socket.resetAndDestroy(), 20);
      });

      expect(await clientFor().get('k')).toBeNull();

      const error = expectSingleLoggedError(logger, 'GET failed for k:');
      expect(error).toBeInstanceOf(IncompleteHeaderError);
      expect(error instanceof IncompleteHeaderError && error.received).toBe(2);
      expect(error instanceof IncompleteHeaderError && error.message).toBe(
        `Connection lost while reading response header from ${server.getAddress()}: got 2 of 5 bytes`
      );
      expect(error instanceof IncompleteHeaderError && error.cause).toBeInstanceOf(Error);
    });

    it('should fail when no bytes arrive before end-of-stream', async () => {
      server.setScript((_request, socket) => socket.end());

      expect(await clientFor().delete('k')).toBe(false);

      const error = expectSingleLoggedError(logger, 'DELETE failed for k:');
      expect(error instanceof IncompleteHeaderError && error.received).toBe(0);
    });
  });

  describe('Response body', () => {
    it('should fail when the stream ends inside the body', async () => {
      const header = Buffer.from([Status.SUCCESS, 10, 0, 0, 0]);
      server.setScript(replyRaw(Buffer.concat([header, Buffer.from('abcd')]), { end: true }));

      expect(await clientFor().get('k')).toBeNull();

      const error = expectSingleLoggedError(logger, 'GET failed for k:');
      expect(error).toBeInstanceOf(ConnectionClosedError);
      expect(error instanceof ConnectionClosedError && error.message).toBe(
        'Connection closed while reading data: got 4 of 10 bytes'
      );
    });

    it('should fail when the connection is reset inside the body', async () => {
      server.setScript((_request, socket) => {
        socket.write(Buffer.concat([Buffer.from([Status.SUCCESS, 10, 0, 0, 0]), Buffer.from('abcd')]));
        setTimeout(() => socket.resetAndDestroy(), 20);
      });

      expect(await clientFor().get('k')).toBeNull();

      const error = expectSingleLoggedError(logger, 'GET failed for k:');
      expect(error).toBeInstanceOf(ConnectionClosedError);
      expect(error instanceof ConnectionClosedError && error.message).toBe(
        'Connection lost while reading data: got 4 of 10 bytes'
      );
      expect(error instanceof ConnectionClosedError && error.cause).toBeInstanceOf(Error);
    });

    it('should fail when the body stalls until the timeout', async () => {
      server.setScript(replyRaw(Buffer.from([Status.SUCCESS, 10, 0, 0, 0, 0x61])));
      const counter = countingOpener();

      expect(await clientFor({ timeout: 100 }, counter.openSession).get('k')).toBeNull();

      const error = expectSingleLoggedError(logger, 'GET failed for k:');
      expect(error).toBeInstanceOf(DeadlineExceededError);
      expect(error instanceof DeadlineExceededError && error.message).toBe(
        `Request timeout after 100ms (${server.getAddress()})`
      );
      expect(counter.closes()).toBe(1);
    });

    it('should reassemble a body delivered in pieces', async () => {
      server.setScript((_request, socket) => {
        socket.write(Buffer.from([Status.SUCCESS, 5]));
        setTimeout(() => socket.write(Buffer.from([0, 0, 0, 0x68, 0x65])), 10);
        setTimeout(() => socket.write(Buffer.from('llo')), 20);
      });

      const value = await clientFor().get('k');

      expect(value && Buffer.from(value).toString()).toBe('hello');
      expect(logger.errors()).toHaveLength(0);
    });

    it('should treat a zero-length success body as a miss', async () => {
      server.setScript(replyOk());

      expect(await clientFor().get('k')).toBeNull();
      expect(logger.errors()).toHaveLength(0);
      expect(logger.entries).toEqual([{ level: 'debug', message: 'Cache miss: k', args: [] }]);
    });
  });

  describe('Error status', () => {
    it('should collapse an error status into null and false', async () => {
      server.setScript(replyRaw(encodeResponse(Status.ERROR)));

      expect(await clientFor().get('k')).toBeNull();
      expect(await clientFor().set('k', 'v')).toBe(false);
      expect(await clientFor().health()).toBeNull();

      expect(logger.errors().map((entry) => entry.message)).toEqual([
        'GET failed for k:',
        'SET failed for k:',
        'Health check failed:',
      ]);
      expect(logger.errors().every((entry) => entry.args[0] instanceof ServerError)).toBe(true);
    });

    it('should pass through any non-zero status byte', async () => {
      server.setScript(replyRaw(Buffer.from([0x02, 0, 0, 0, 0])));

      expect(await clientFor().get('k')).toBeNull();

      const error = expectSingleLoggedError(logger, 'GET failed for k:');
      expect(error instanceof ServerError && error.status).toBe(0x02);
    });
  });

  describe('Health', () => {
    it('should fail on a body that is not a health document', async () => {
      server.setScript(replyOk(Buffer.from('{"status":"healthy"}')));

      expect(await clientFor().health()).toBeNull();
      expect(expectSingleLoggedError(logger, 'Health check failed:')).toBeInstanceOf(DecodeFailedError);
    });

    it('should send the health key', async () => {
      server.setScript(
        replyOk(
          Buffer.from('{"status":"healthy","uptime_seconds":1,"cache_items":0,"cache_size_mb":0,"storage_size_mb":0,"goroutines":4}')
        )
      );

      expect(await clientFor().health()).toEqual({
        status: 'healthy',
        uptimeSeconds: 1,
        cacheItems: 0,
        cacheSizeMb: 0,
        storageSizeMb: 0,
        goroutines: 4,
      });

      const [call] = server.getCallHistory();
      expect(call.request.op).toBe(OpCode.HEALTH);
      expect(call.request.key.toString()).toBe('health');
    });
  });

  describe('Authentication', () => {
    it('should not send the operation when AUTH is rejected', async () => {
      server.setScript(replyRaw(encodeResponse(Status.ERROR)));
      const counter = countingOpener();

      expect(await clientFor({ apiKey: 'tok' }, counter.openSession).get('k')).toBeNull();

      expect(server.getCallHistory().map((call) => call.request.op)).toEqual([OpCode.AUTH]);
      expect(server.getCallHistory()[0].request.key.toString()).toBe('tok');
      expect(counter.closes()).toBe(1);
      await waitFor(() => server.getClosedCount() === 1);
    });

    it('should send AUTH then the operation on one connection', async () => {
      server.setScript(replyOk());

      expect(await clientFor({ apiKey: 'test-secret' }).set('k', 'v')).toBe(true);

      const calls = server.getCallHistory();
      expect(calls.map((call) => call.request.op)).toEqual([OpCode.AUTH, OpCode.SET]);
      expect(calls.map((call) => call.connection)).toEqual([1, 1]);
    });

    it('should skip AUTH for an empty key', async () => {
      server.setScript(replyOk());

      await clientFor({ apiKey: '' }).set('k', 'v');

      expect(server.getCallHistory().map((call) => call.request.op)).toEqual([OpCode.SET]);
    });
  });

  describe('Session lifecycle', () => {
    it('should close the session once on success', async () => {
      server.setScript(replyOk(Buffer.from('v')));
      const counter = countingOpener();

      await clientFor({}, counter.openSession).get('k');

      expect(counter.closes()).toBe(1);
    });

    it('should close the session once on timeout', async () => {
      server.setScript(() => {});
      const counter = countingOpener();

      expect(await clientFor({ timeout: 50 }, counter.openSession).get('k')).toBeNull();

      expect(counter.closes()).toBe(1);
    });

    it('should close the session once on an error status', async () => {
      server.setScript(replyRaw(encodeResponse(Status.ERROR)));
      const counter = countingOpener();

      await clientFor({}, counter.openSession).set('k', 'v');

      expect(counter.closes()).toBe(1);
    });

    it('should open a new connection per operation', async () => {
      server.setScript(replyOk(Buffer.from('v')));
      const client = clientFor();

      await client.get('a');
      await client.get('b');
      await client.get('c');

      expect(server.getConnectionCount()).toBe(3);
      await waitFor(() => server.getClosedCount() === 3);
    });
  });

  describe('Connection failures', () => {
    it('should report a refused connection', async () => {
      const closed = net.createServer();
      const port = await new Promise<number>((resolve) => {
        closed.listen(0, '127.0.0.1', () => {
          const address = closed.address();
          resolve(address && typeof address === 'object' ? address.port : 0);
        });
      });
      await new Promise<void>((resolve) => closed.close(() => resolve()));

      const client = new VaultlineClient({ address: `127.0.0.1:${port}`, logger });
      expect(await client.get('k')).toBeNull();

      const error = expectSingleLoggedError(logger, 'GET failed for k:');
      expect(error).toBeInstanceOf(ConnectFailedError);
      expect(error instanceof ConnectFailedError && error.address).toBe(`127.0.0.1:${port}`);
    });
  });

  describe('Caller errors', () => {
    it('should throw for oversized keys without connecting', async () => {
      const client = clientFor();

      await expect(client.get('x'.repeat(70000))).rejects.toThrow(FrameTooLargeError);
      expect(server.getConnectionCount()).toBe(0);
    });

    it('should validate configuration', () => {
      expect(() => new VaultlineClient({ address: '' })).toThrow(InvalidArgumentError);
      expect(() => new VaultlineClient({ address: 'localhost' })).toThrow('expected host:port');
      expect(() => new VaultlineClient({ address: 'localhost:1', timeout: 0 })).toThrow(
        'timeout must be a positive number, got 0'
      );
      expect(() => new VaultlineClient({ address: 'localhost:1', readChunkSize: 0 })).toThrow(
        'readChunkSize must be a positive integer, got 0'
      );
      expect(() => new VaultlineClient({ address: 'localhost:1', batchConcurrency: 0 })).toThrow(
        'batchConcurrency must be a positive integer, got 0'
      );
      expect(() => new VaultlineClient({ address: 'localhost:1', apiKey: 'k'.repeat(70000) })).toThrow(
        'apiKey must fit in 65535 bytes'
      );
    });
  });
});
