/**
 * =============================================================================
 * CONNECTION HANDLER - Unit Tests
 * =============================================================================
 *
 * Session lifecycle against an in-process socket:
 * - open / refused registration
 * - ordered, bounded outbound queue
 * - inbound command parsing
 * - heartbeat and close handling
 * =============================================================================
 */

import { UserRole } from '../core/constants';
import { AuthRejectedError } from '../core/errors/AppError';
import { FakeSocket } from './helpers/fake-socket';
import { Connection, ConnectionOptions } from '../modules/realtime/connection.handler';

const OPTIONS: ConnectionOptions = {
  heartbeatIntervalMs: 1000,
  closeGraceMs: 2000,
  outboundBufferSize: 2
};

describe('Connection', () => {
  let socket: FakeSocket;
  let hooks: { onOpen: jest.Mock; onCommand: jest.Mock; onClosed: jest.Mock };
  let connection: Connection;

  beforeEach(() => {
    jest.useFakeTimers();
    socket = new FakeSocket();
    hooks = { onOpen: jest.fn(), onCommand: jest.fn(), onClosed: jest.fn() };
    connection = new Connection({ userId: 7, role: UserRole.COURIER }, socket, OPTIONS, hooks);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('start()', () => {
    it('opens the session and greets the client', () => {
      expect(connection.start()).toBe(true);

      expect(connection.state).toBe('open');
      expect(hooks.onOpen).toHaveBeenCalledWith(connection);
      expect(socket.frames()).toEqual([{
        type: 'connection_established',
        connection_id: connection.id,
        user_id: 7,
        role: 'courier',
        message: 'Connected to real-time updates',
        timestamp: expect.any(String)
      }]);
    });

    it('closes with the refusal code when registration is rejected', () => {
      hooks.onOpen.mockImplementation(() => {
        throw new AuthRejectedError('not allowed');
      });

      expect(connection.start()).toBe(false);

      expect(connection.state).toBe('closed');
      expect(socket.closedWith).toEqual({ code: 1008, reason: 'Unauthorized' });
      expect(socket.sent).toEqual([]);
      expect(hooks.onClosed).not.toHaveBeenCalled();
    });

    it('treats any registration failure as a policy violation', () => {
      hooks.onOpen.mockImplementation(() => {
        throw new Error('boom');
      });

      connection.start();

      expect(socket.closedWith).toEqual({ code: 1008, reason: 'Unauthorized' });
    });

    it('survives a socket error emitted while a refused session closes', () => {
      hooks.onOpen.mockImplementation(() => {
        throw new AuthRejectedError('not allowed');
      });

      connection.start();

      expect(socket.listenerCount('error')).toBe(1);
      expect(() => socket.emit('error', new Error('EPIPE'))).not.toThrow();
      expect(connection.state).toBe('closed');
      expect(socket.closedWith).toEqual({ code: 1008, reason: 'Unauthorized' });
      expect(hooks.onClosed).not.toHaveBeenCalled();
    });

    it('listens for socket errors once after opening', () => {
      connection.start();

      expect(socket.listenerCount('error')).toBe(1);
    });

    it('refuses frames before the session is open', () => {
      expect(connection.deliver('{"type":"pong"}')).toBe(false);
      expect(socket.sent).toEqual([]);
    });
  });

  describe('outbound queue', () => {
    it('writes one frame at a time in order', () => {
      socket.autoAck = false;
      connection.start();

      connection.deliver('a');
      connection.deliver('b');

      expect(socket.sent).toHaveLength(1);
      expect(connection.pendingFrames).toBe(2);

      socket.flush();
      expect(socket.sent.slice(1)).toEqual(['a']);

      socket.flush();
      expect(socket.sent.slice(1)).toEqual(['a', 'b']);
      expect(connection.pendingFrames).toBe(0);
    });

    it('drops a slow consumer with 1013 when the queue is full', () => {
      socket.autoAck = false;
      connection.start();

      expect(connection.deliver('a')).toBe(true);
      expect(connection.deliver('b')).toBe(true);
      expect(connection.deliver('c')).toBe(false);

      expect(connection.state).toBe('closing');
      expect(connection.pendingFrames).toBe(0);

      // In-flight write completes, nothing left to flush
      socket.flush();

      expect(socket.closedWith).toEqual({ code: 1013, reason: 'Outbound buffer overflow' });
      expect(connection.state).toBe('closed');
      expect(hooks.onClosed).toHaveBeenCalledTimes(1);
      expect(socket.sent).toHaveLength(1);
    });

    it('closes with 1011 when a write fails', () => {
      socket.autoAck = false;
      connection.start();

      socket.flush(new Error('EPIPE'));

      expect(socket.closedWith).toEqual({ code: 1011, reason: 'Write failed' });
      expect(connection.state).toBe('closed');
      expect(hooks.onClosed).toHaveBeenCalledTimes(1);
    });
  });

  describe('inbound commands', () => {
    beforeEach(() => {
      connection.start();
    });

    it('hands valid commands to the hook in internal form', () => {
      socket.receive({ type: 'subscribe_delivery', delivery_id: 42 });

      expect(hooks.onCommand).toHaveBeenCalledWith(connection, { type: 'subscribe_delivery', deliveryId: 42 });
    });

    it('closes with 1002 on a frame that is not JSON', () => {
      socket.receive('not json');

      expect(socket.closedWith).toEqual({ code: 1002, reason: 'Protocol error' });
      expect(connection.state).toBe('closed');
      expect(hooks.onClosed).toHaveBeenCalledTimes(1);
    });

    it('closes with 1002 on a frame without a string type', () => {
      socket.receive({ delivery_id: 42 });

      expect(socket.closedWith).toEqual({ code: 1002, reason: 'Protocol error' });
    });

    it('ignores unknown command types', () => {
      socket.receive({ type: 'dance' });

      expect(connection.state).toBe('open');
      expect(socket.sent).toHaveLength(1);
      expect(hooks.onCommand).not.toHaveBeenCalled();
    });

    it('answers a known command with bad fields with an error frame', () => {
      socket.receive({ type: 'subscribe_delivery', delivery_id: 'forty-two' });

      expect(connection.state).toBe('open');
      expect(hooks.onCommand).not.toHaveBeenCalled();
      expect(socket.framesOfType('error').map(frame => frame.message))
        .toEqual(['Invalid subscribe_delivery command']);
    });

    it('reports a failing command handler without closing', () => {
      hooks.onCommand.mockImplementation(() => {
        throw new Error('boom');
      });

      socket.receive({ type: 'ping' });

      expect(connection.state).toBe('open');
      expect(socket.framesOfType('error').map(frame => frame.message)).toEqual(['Message handling failed']);
    });
  });

  describe('heartbeat', () => {
    it('keeps a session that answers pings', () => {
      connection.start();

      jest.advanceTimersByTime(1000);
      socket.answerPing();
      jest.advanceTimersByTime(1000);
      socket.answerPing();
      jest.advanceTimersByTime(1000);

      expect(socket.pings).toBe(3);
      expect(connection.state).toBe('open');
      expect(socket.terminated).toBe(false);
    });

    it('terminates a session that missed a pong', () => {
      connection.start();

      jest.advanceTimersByTime(1000);
      jest.advanceTimersByTime(1000);

      expect(socket.pings).toBe(1);
      expect(socket.terminated).toBe(true);
      expect(connection.state).toBe('closed');
      expect(hooks.onClosed).toHaveBeenCalledTimes(1);
    });
  });

  describe('closing', () => {
    it('closes at once when nothing is queued', () => {
      connection.start();

      connection.close(1001, 'Server shutting down');

      expect(socket.closedWith).toEqual({ code: 1001, reason: 'Server shutting down' });
      expect(connection.state).toBe('closed');
    });

    it('gives queued frames the grace period to flush', () => {
      socket.autoAck = false;
      connection.start();
      connection.deliver('last words');

      connection.close(1000, 'bye');

      expect(connection.state).toBe('closing');
      expect(socket.closedWith).toBeNull();
      expect(connection.deliver('too late')).toBe(false);

      jest.advanceTimersByTime(2000);

      expect(socket.closedWith).toEqual({ code: 1000, reason: 'bye' });
      expect(connection.state).toBe('closed');
      expect(hooks.onClosed).toHaveBeenCalledTimes(1);
    });

    it('finishes early once the queue drains', () => {
      socket.autoAck = false;
      connection.start();
      connection.deliver('last words');
      connection.close(1000, 'bye');

      socket.flush();
      socket.flush();

      expect(socket.sent.slice(1)).toEqual(['last words']);
      expect(socket.closedWith).toEqual({ code: 1000, reason: 'bye' });
      expect(connection.state).toBe('closed');
    });

    it('runs cleanup once when the peer goes away', () => {
      connection.start();

      socket.peerClose(1001, 'tab closed');
      socket.peerClose(1001, 'tab closed');
      connection.close(1000, 'bye');

      expect(connection.state).toBe('closed');
      expect(hooks.onClosed).toHaveBeenCalledTimes(1);
      expect(socket.closedWith).toBeNull();
    });

    it('closes with 1011 on a socket error', () => {
      connection.start();

      socket.emit('error', new Error('ECONNRESET'));

      expect(socket.closedWith).toEqual({ code: 1011, reason: 'Socket error' });
      expect(hooks.onClosed).toHaveBeenCalledTimes(1);
    });

    it('stops the heartbeat after closing', () => {
      connection.start();
      connection.close(1000, 'bye');

      jest.advanceTimersByTime(5000);

      expect(socket.pings).toBe(0);
      expect(socket.terminated).toBe(false);
    });
  });
});
