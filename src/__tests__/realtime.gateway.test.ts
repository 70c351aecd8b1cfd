import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { Duplex } from 'stream';
import { UserRole } from '../core/constants';
import { signAccessToken } from '../modules/realtime/realtime.auth';
import { RealtimeGateway, rejectUpgrade } from '../modules/realtime/realtime.gateway';
import { RealtimeService } from '../modules/realtime/realtime.service';

/**
 * Duplex that records what the gateway writes before dropping it
 */
class CapturingSocket extends Duplex {
  readonly written: string[] = [];

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(chunk.toString());
    callback();
  }

  _read(): void {
    // nothing to read
  }
}

function upgradeRequest(url: string): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.url = url;
  req.method = 'GET';
  return req;
}

describe('rejectUpgrade', () => {
  it('writes a bare HTTP response and destroys the socket', () => {
    const socket = new CapturingSocket();

    rejectUpgrade(socket, 401);

    expect(socket.written.join('')).toBe(
      'HTTP/1.1 401 Unauthorized\r\n' +
      'Connection: close\r\n' +
      'Content-Type: text/plain\r\n' +
      'Content-Length: 12\r\n' +
      '\r\n' +
      'Unauthorized'
    );
    expect(socket.destroyed).toBe(true);
  });
});

describe('RealtimeGateway.handleUpgrade', () => {
  let service: RealtimeService;
  let gateway: RealtimeGateway;
  let accept: jest.SpyInstance;

  beforeEach(() => {
    service = new RealtimeService({
      settings: { heartbeatIntervalMs: 30000, closeGraceMs: 2000, outboundBufferSize: 16, maxConnectionsPerUser: 5 },
      isAuthorized: identity => identity.role !== UserRole.RECIPIENT
    });
    accept = jest.spyOn(service, 'accept');
    gateway = new RealtimeGateway(service, { path: '/api/ws/connect', maxPayloadBytes: 1024 });
  });

  afterEach(() => {
    gateway.close();
  });

  it('answers 404 on any other path', () => {
    const socket = new CapturingSocket();

    gateway.handleUpgrade(upgradeRequest('/api/v1/live?token=abc'), socket, Buffer.alloc(0));

    expect(socket.written.join('')).toMatch(/^HTTP\/1\.1 404 Not Found\r\n/);
    expect(socket.destroyed).toBe(true);
    expect(accept).not.toHaveBeenCalled();
  });

  it('answers 401 without a token', () => {
    const socket = new CapturingSocket();

    gateway.handleUpgrade(upgradeRequest('/api/ws/connect'), socket, Buffer.alloc(0));

    expect(socket.written.join('')).toMatch(/^HTTP\/1\.1 401 Unauthorized\r\n/);
    expect(socket.destroyed).toBe(true);
    expect(accept).not.toHaveBeenCalled();
  });

  it('answers 401 for an invalid token', () => {
    const socket = new CapturingSocket();

    gateway.handleUpgrade(upgradeRequest('/api/ws/connect?token=not-a-token'), socket, Buffer.alloc(0));

    expect(socket.written.join('')).toMatch(/^HTTP\/1\.1 401 Unauthorized\r\n/);
    expect(accept).not.toHaveBeenCalled();
  });

  it('answers 401 when the capability check denies the caller', () => {
    const socket = new CapturingSocket();
    const token = signAccessToken({ userId: 12, role: UserRole.RECIPIENT }, 'test-secret');

    gateway.handleUpgrade(upgradeRequest(`/api/ws/connect?token=${token}`), socket, Buffer.alloc(0));

    expect(socket.written.join('')).toMatch(/^HTTP\/1\.1 401 Unauthorized\r\n/);
    expect(service.registry.size).toBe(0);
    expect(accept).not.toHaveBeenCalled();
  });
});
