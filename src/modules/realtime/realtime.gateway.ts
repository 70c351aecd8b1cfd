/**
 * =============================================================================
 * REALTIME GATEWAY
 * =============================================================================
 *
 * Hooks the HTTP server's `upgrade` event.
 *
 * UPGRADE:
 *   GET {REALTIME_PATH}?token=<jwt>
 *   - other path                 -> 404, socket destroyed
 *   - missing / invalid token    -> 401, socket destroyed, no handshake
 *   - capability check denies    -> 401, socket destroyed, no handshake
 *   - otherwise                  -> ws handshake, session handed to RealtimeService
 * =============================================================================
 */

import { IncomingMessage, Server, STATUS_CODES } from 'http';
import { Duplex } from 'stream';
import { WebSocket, WebSocketServer } from 'ws';
import { config } from '../../config/environment';
import { HTTP_STATUS } from '../../core/constants';
import { createScopedLogger } from '../../shared/services/logger.service';
import { upgradeQuerySchema } from './realtime.schema';
import { RealtimeService, realtimeService } from './realtime.service';

const log = createScopedLogger('realtime:gateway');

export interface RealtimeGatewayOptions {
  path?: string;
  maxPayloadBytes?: number;
}

export class RealtimeGateway {
  private readonly wss: WebSocketServer;
  private readonly path: string;

  constructor(
    private readonly service: RealtimeService = realtimeService,
    options: RealtimeGatewayOptions = {}
  ) {
    this.path = options.path ?? config.realtime.path;
    this.wss = new WebSocketServer({
      noServer: true,
      maxPayload: options.maxPayloadBytes ?? config.realtime.maxPayloadBytes
    });
  }

  attach(server: Server): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });
    log.info('Realtime gateway attached', { path: this.path });
  }

  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (url.pathname !== this.path) {
      rejectUpgrade(socket, HTTP_STATUS.NOT_FOUND);
      return;
    }

    const query = upgradeQuerySchema.safeParse({ token: url.searchParams.get('token') ?? undefined });
    const identity = this.service.authenticate(query.success ? query.data.token : null);
    if (!identity) {
      rejectUpgrade(socket, HTTP_STATUS.UNAUTHORIZED);
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
      this.service.accept(ws, identity);
    });
  }

  close(): void {
    this.service.shutdown();
    this.wss.close();
  }
}

/**
 * Answer a refused upgrade with a bare HTTP response and drop the socket
 */
export function rejectUpgrade(socket: Duplex, status: number): void {
  const reason = STATUS_CODES[status] ?? 'Error';
  socket.write(
    `HTTP/1.1 ${status} ${reason}\r\n` +
    'Connection: close\r\n' +
    'Content-Type: text/plain\r\n' +
    `Content-Length: ${Buffer.byteLength(reason)}\r\n` +
    '\r\n' +
    reason
  );
  socket.destroy();
}
