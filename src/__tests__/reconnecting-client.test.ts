/**
 * =============================================================================
 * RECONNECTING CLIENT - Unit Tests
 * =============================================================================
 *
 * Drives the client with a scripted socket factory and fake timers.
 * =============================================================================
 */

import { Connectivity } from '../client/reconnect.machine';
import { ClientSocket, ClientSocketHandlers, ReconnectingClient, ServerFrame } from '../client/reconnecting-client';

class ScriptedSocket implements ClientSocket {
  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;

  constructor(readonly url: string, readonly handlers: ClientSocketHandlers) {}

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
  }

  commands(): unknown[] {
    return this.sent.map(data => JSON.parse(data));
  }
}

describe('ReconnectingClient', () => {
  let sockets: ScriptedSocket[];
  let openedAt: number[];
  let client: ReconnectingClient;

  const latest = (): ScriptedSocket => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('No socket created yet');
    return socket;
  };

  beforeEach(() => {
    jest.useFakeTimers();
    sockets = [];
    openedAt = [];
    client = new ReconnectingClient({
      url: 'ws://localhost:8000/api/ws/connect',
      token: 'test-token',
      socketFactory: (url, handlers) => {
        const socket = new ScriptedSocket(url, handlers);
        sockets.push(socket);
        openedAt.push(Date.now());
        return socket;
      }
    });
  });

  afterEach(() => {
    client.stop();
    jest.useRealTimers();
  });

  it('connects with the token in the query string', () => {
    client.start();

    expect(sockets).toHaveLength(1);
    expect(latest().url).toBe('ws://localhost:8000/api/ws/connect?token=test-token');
    expect(client.status).toBe('connecting');
  });

  it('reports connected once the socket opens', () => {
    const seen: Connectivity[] = [];
    client.onConnectivity(status => seen.push(status));

    client.start();
    latest().handlers.onOpen();

    expect(client.status).toBe('open');
    expect(client.connectivity).toBe('connected');
    expect(seen).toEqual(['connected']);
  });

  it('sends subscriptions only while open and replays them on open', () => {
    client.subscribe(42);
    expect(client.send({ type: 'ping' })).toBe(false);

    client.start();
    latest().handlers.onOpen();

    expect(latest().commands()).toEqual([{ type: 'subscribe_delivery', delivery_id: 42 }]);

    client.unsubscribe(42);
    expect(latest().commands()).toEqual([
      { type: 'subscribe_delivery', delivery_id: 42 },
      { type: 'unsubscribe_delivery', delivery_id: 42 }
    ]);
    expect(client.activeSubscriptions()).toEqual([]);
  });

  it('replays package subscriptions after delivery subscriptions on reconnect', () => {
    client.start();
    latest().handlers.onOpen();
    client.subscribe(42);
    client.subscribePackage(5);
    client.subscribePackage(6);
    client.unsubscribePackage(6);

    latest().handlers.onClose(1006, '');
    jest.advanceTimersByTime(1000);
    latest().handlers.onOpen();

    expect(client.activePackageSubscriptions()).toEqual([5]);
    expect(latest().commands()).toEqual([
      { type: 'subscribe_delivery', delivery_id: 42 },
      { type: 'subscribe_package', package_id: 5 }
    ]);
  });

  it('backs off across failed attempts and restores subscriptions on reconnect', () => {
    client.start();
    latest().handlers.onOpen();
    client.subscribe(42);

    latest().handlers.onClose(1006, '');
    expect(client.status).toBe('waiting');
    expect(client.connectivity).toBe('disconnected');

    jest.advanceTimersByTime(1000);
    latest().handlers.onClose(1006, '');
    jest.advanceTimersByTime(2000);
    latest().handlers.onClose(1006, '');
    jest.advanceTimersByTime(4000);

    expect(sockets).toHaveLength(4);
    expect(client.attempt).toBe(3);

    const delays = openedAt.slice(1).map((time, i) => time - openedAt[i]);
    expect(delays).toEqual([1000, 2000, 4000]);

    latest().handlers.onOpen();

    expect(client.attempt).toBe(0);
    expect(client.connectivity).toBe('connected');
    expect(latest().commands()).toEqual([{ type: 'subscribe_delivery', delivery_id: 42 }]);
  });

  it('does not retry before the backoff delay has passed', () => {
    client.start();
    latest().handlers.onClose(1006, '');

    jest.advanceTimersByTime(999);
    expect(sockets).toHaveLength(1);

    jest.advanceTimersByTime(1);
    expect(sockets).toHaveLength(2);
  });

  it('gives up with an error after the last attempt', () => {
    const seen: Connectivity[] = [];
    client.onConnectivity(status => seen.push(status));

    client.start();
    for (let attempt = 0; attempt < 5; attempt++) {
      latest().handlers.onClose(1006, '');
      jest.runOnlyPendingTimers();
    }
    latest().handlers.onClose(1006, '');

    expect(sockets).toHaveLength(6);
    expect(client.status).toBe('failed');
    expect(client.connectivity).toBe('error');
    expect(client.connectionError).toBe('Unable to reach the realtime service');
    expect(seen).toEqual(['error']);

    jest.advanceTimersByTime(60000);
    expect(sockets).toHaveLength(6);
  });

  it('stays down after a normal close', () => {
    client.start();
    latest().handlers.onOpen();

    latest().handlers.onClose(1000, 'bye');
    jest.advanceTimersByTime(60000);

    expect(client.status).toBe('idle');
    expect(client.connectivity).toBe('disconnected');
    expect(sockets).toHaveLength(1);
  });

  it('closes the socket and cancels the retry on stop', () => {
    client.start();
    const first = latest();
    first.handlers.onOpen();

    client.stop();

    expect(first.closedWith).toEqual({ code: 1000, reason: 'Client closed' });
    expect(client.status).toBe('stopped');

    client.start();
    latest().handlers.onClose(1006, '');
    client.stop();
    jest.advanceTimersByTime(60000);

    expect(sockets).toHaveLength(2);
  });

  it('ignores events from a socket it has replaced', () => {
    client.start();
    const first = latest();
    client.stop();
    client.start();
    latest().handlers.onOpen();

    first.handlers.onClose(1006, '');

    expect(client.status).toBe('open');
  });

  it('keeps the last frame and the last known location per delivery', () => {
    const frames: ServerFrame[] = [];
    client.onFrame(frame => frames.push(frame));
    client.start();
    latest().handlers.onOpen();

    latest().handlers.onMessage(JSON.stringify({
      type: 'delivery_location', delivery_id: 42, lat: 1, lng: 2, timestamp: '2024-05-01T10:00:00.000Z'
    }));
    latest().handlers.onMessage(JSON.stringify({ type: 'pong', timestamp: '2024-05-01T10:00:01.000Z' }));

    expect(client.lastKnownLocation(42)).toEqual({
      deliveryId: 42, lat: 1, lng: 2, receivedAt: '2024-05-01T10:00:00.000Z'
    });
    expect(client.lastKnownLocation(43)).toBeNull();
    expect(client.lastFrame).toEqual({ type: 'pong', timestamp: '2024-05-01T10:00:01.000Z' });
    expect(frames.map(frame => frame.type)).toEqual(['delivery_location', 'pong']);
  });

  it('ignores frames that are not JSON objects with a type', () => {
    const listener = jest.fn();
    client.onFrame(listener);
    client.start();
    latest().handlers.onOpen();

    latest().handlers.onMessage('not json');
    latest().handlers.onMessage(JSON.stringify({ no: 'type' }));

    expect(listener).not.toHaveBeenCalled();
    expect(client.lastFrame).toBeNull();
  });

  it('keeps notifying other listeners when one throws', () => {
    const healthy = jest.fn();
    client.onConnectivity(() => {
      throw new Error('listener bug');
    });
    client.onConnectivity(healthy);

    client.start();
    latest().handlers.onOpen();

    expect(healthy).toHaveBeenCalledWith('connected');
  });

  it('stops notifying a listener after it unsubscribes', () => {
    const listener = jest.fn();
    const off = client.onConnectivity(listener);
    off();

    client.start();
    latest().handlers.onOpen();

    expect(listener).not.toHaveBeenCalled();
  });

  it('treats a socket that cannot be created as an abnormal close', () => {
    client = new ReconnectingClient({
      url: 'ws://localhost:8000/api/ws/connect',
      token: () => 'test-token',
      socketFactory: () => {
        throw new Error('connect ECONNREFUSED');
      }
    });

    client.start();

    expect(client.status).toBe('waiting');
    expect(client.attempt).toBe(1);
    expect(client.connectionError).toBe('connect ECONNREFUSED');
  });
});
