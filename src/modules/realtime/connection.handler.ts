/**
 * =============================================================================
 * CONNECTION HANDLER
 * =============================================================================
 *
 * One instance per live WebSocket session.
 *
 * STATE MACHINE:
 *   connecting ──start()──▶ open ──error / close() / overflow──▶ closing ──▶ closed
 *        │                                                                    ▲
 *        └──────────── registration refused ─────────────────────────────────┘
 *
 * OUTBOUND:
 * - Frames go through a bounded FIFO, one socket write in flight at a time,
 *   so frames leave in the order the router handed them over.
 * - A full FIFO means the client cannot keep up: the session is dropped.
 *
 * HEARTBEAT:
 * - Protocol-level ping every heartbeatIntervalMs.
 * - No pong since the previous ping -> the socket is terminated (idle timeout).
 *
 * CLOSING:
 * - Queued writes get closeGraceMs to flush, then the socket is closed and
 *   onClosed runs exactly once (registry + subscription cleanup).
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import type { RawData } from 'ws';
import { WS_CLOSE_CODES, WsCloseCode } from '../../core/constants';
import { BufferOverflowError, ProtocolError, isRealtimeError } from '../../core/errors/AppError';
import { createScopedLogger, errorMeta } from '../../shared/services/logger.service';
import { rawDataToString } from '../../shared/utils/ws.utils';
import { serializeFrame } from './realtime.frames';
import {
  clientCommandSchema,
  envelopeSchema,
  KNOWN_COMMAND_TYPES,
  toClientCommand
} from './realtime.schema';
import {
  ClientCommand,
  ConnectionId,
  ConnectionState,
  OutboundFrame,
  RealtimeConnection,
  UserIdentity
} from './realtime.types';

const log = createScopedLogger('realtime:connection');

/**
 * The parts of a `ws` WebSocket the handler relies on
 */
export interface RealtimeSocket {
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  ping(): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
}

export interface ConnectionOptions {
  heartbeatIntervalMs: number;
  closeGraceMs: number;
  outboundBufferSize: number;
}

export interface ConnectionHooks {
  /** Called once in `connecting`; throwing keeps the session from opening */
  onOpen(connection: Connection): void;
  onCommand(connection: Connection, command: ClientCommand): void;
  /** Called exactly once when the session reaches `closed` after being open */
  onClosed(connection: Connection): void;
}

export class Connection implements RealtimeConnection {
  readonly id: ConnectionId = uuidv4();
  readonly connectedAt = new Date();

  private currentState: ConnectionState = 'connecting';
  private readonly outbound: string[] = [];
  private writing = false;
  private alive = true;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private graceTimer: NodeJS.Timeout | null = null;
  private closeFrame: { code: WsCloseCode; reason: string } = { code: WS_CLOSE_CODES.NORMAL, reason: '' };

  constructor(
    readonly identity: UserIdentity,
    private readonly socket: RealtimeSocket,
    private readonly options: ConnectionOptions,
    private readonly hooks: ConnectionHooks
  ) {}

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Frames waiting behind the in-flight write */
  get pendingFrames(): number {
    return this.outbound.length;
  }

  /**
   * connecting -> open. Returns false if the session was refused.
   */
  start(): boolean {
    if (this.currentState !== 'connecting') return false;

    // Registered before onOpen: a refused socket can still emit 'error' while it closes
    this.socket.on('error', error => this.handleSocketError(error));

    try {
      this.hooks.onOpen(this);
    } catch (error) {
      const code = isRealtimeError(error) ? error.closeCode : WS_CLOSE_CODES.POLICY_VIOLATION;
      log.warn('Session refused during registration', { connectionId: this.id, ...errorMeta(error) });
      this.currentState = 'closed';
      this.socket.close(code, 'Unauthorized');
      return false;
    }

    this.currentState = 'open';

    this.socket.on('message', data => this.handleMessage(data));
    this.socket.on('pong', () => { this.alive = true; });
    this.socket.on('close', (code, reason) => this.handleSocketClosed(code, reason.toString()));

    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.options.heartbeatIntervalMs);

    log.info('Session open', {
      connectionId: this.id,
      userId: this.identity.userId,
      role: this.identity.role
    });

    this.send({
      type: 'connection_established',
      connection_id: this.id,
      user_id: this.identity.userId,
      role: this.identity.role,
      message: 'Connected to real-time updates'
    });

    return true;
  }

  /**
   * Queue a serialized frame. Never blocks; a full queue drops the session.
   */
  deliver(payload: string): boolean {
    if (this.currentState !== 'open') return false;

    if (this.outbound.length >= this.options.outboundBufferSize) {
      const overflow = new BufferOverflowError(this.id, this.options.outboundBufferSize);
      log.warn('Slow consumer dropped', { connectionId: this.id, userId: this.identity.userId });
      this.outbound.length = 0;
      this.close(overflow.closeCode, 'Outbound buffer overflow');
      return false;
    }

    this.outbound.push(payload);
    this.pump();
    return true;
  }

  send(frame: OutboundFrame): boolean {
    return this.deliver(serializeFrame(frame));
  }

  /**
   * open -> closing -> closed, flushing queued frames for at most closeGraceMs.
   */
  close(code: WsCloseCode, reason: string): void {
    if (this.currentState === 'connecting') {
      this.currentState = 'closed';
      this.socket.close(code, reason);
      return;
    }
    if (this.currentState !== 'open') return;

    this.currentState = 'closing';
    this.closeFrame = { code, reason };
    this.stopHeartbeat();

    if (!this.writing && this.outbound.length === 0) {
      this.finishClose();
      return;
    }

    this.graceTimer = setTimeout(() => {
      log.debug('Close grace period elapsed with frames pending', {
        connectionId: this.id,
        pending: this.outbound.length
      });
      this.finishClose();
    }, this.options.closeGraceMs);
  }

  // ===========================================================================
  // INBOUND
  // ===========================================================================

  private handleMessage(data: RawData): void {
    if (this.currentState !== 'open') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawDataToString(data));
    } catch {
      this.failProtocol(new ProtocolError('Frame is not valid JSON'));
      return;
    }

    const envelope = envelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      this.failProtocol(new ProtocolError('Frame must be an object with a string type'));
      return;
    }

    const { type } = envelope.data;
    if (!KNOWN_COMMAND_TYPES.has(type)) {
      log.warn('Ignoring unknown command', { connectionId: this.id, type });
      return;
    }

    const command = clientCommandSchema.safeParse(parsed);
    if (!command.success) {
      log.warn('Invalid command payload', {
        connectionId: this.id,
        type,
        issues: command.error.issues.map(issue => issue.message)
      });
      this.send({ type: 'error', message: `Invalid ${type} command` });
      return;
    }

    try {
      this.hooks.onCommand(this, toClientCommand(command.data));
    } catch (error) {
      log.error('Command handling failed', { connectionId: this.id, type, ...errorMeta(error) });
      this.send({ type: 'error', message: 'Message handling failed' });
    }
  }

  private failProtocol(error: ProtocolError): void {
    log.warn('Protocol error, closing session', { connectionId: this.id, reason: error.message });
    this.close(error.closeCode, 'Protocol error');
  }

  // ===========================================================================
  // OUTBOUND
  // ===========================================================================

  private pump(): void {
    if (this.writing) return;

    const next = this.outbound.shift();
    if (next === undefined) {
      if (this.currentState === 'closing') this.finishClose();
      return;
    }

    this.writing = true;
    try {
      this.socket.send(next, error => this.afterWrite(error));
    } catch (error) {
      this.afterWrite(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private afterWrite(error?: Error): void {
    this.writing = false;

    if (error) {
      log.debug('Write failed', { connectionId: this.id, error: error.message });
      this.outbound.length = 0;
      if (this.currentState === 'open') {
        this.close(WS_CLOSE_CODES.INTERNAL_ERROR, 'Write failed');
      } else {
        this.finishClose();
      }
      return;
    }

    this.pump();
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  private heartbeat(): void {
    if (!this.alive) {
      log.info('Heartbeat missed, terminating session', { connectionId: this.id });
      this.socket.terminate();
      this.finalize();
      return;
    }

    this.alive = false;
    try {
      this.socket.ping();
    } catch (error) {
      log.debug('Ping failed', { connectionId: this.id, ...errorMeta(error) });
    }
  }

  private handleSocketClosed(code: number, reason: string): void {
    log.info('Session closed by peer', { connectionId: this.id, code, reason });
    // The socket is gone: nothing left to flush
    this.finalize();
  }

  private handleSocketError(error: Error): void {
    log.warn('Socket error', { connectionId: this.id, state: this.currentState, error: error.message });
    if (this.currentState === 'connecting' || this.currentState === 'closed') return;

    this.outbound.length = 0;
    if (this.currentState === 'open') {
      this.close(WS_CLOSE_CODES.INTERNAL_ERROR, 'Socket error');
    } else {
      this.finishClose();
    }
  }

  private finishClose(): void {
    if (this.currentState === 'closed') return;

    const { code, reason } = this.closeFrame;
    try {
      this.socket.close(code, reason);
    } catch (error) {
      log.debug('Close handshake failed, terminating', { connectionId: this.id, ...errorMeta(error) });
      this.socket.terminate();
    }
    this.finalize();
  }

  private finalize(): void {
    if (this.currentState === 'closed') return;
    this.currentState = 'closed';

    this.stopHeartbeat();
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
    this.outbound.length = 0;

    try {
      this.hooks.onClosed(this);
    } catch (error) {
      log.error('Session cleanup failed', { connectionId: this.id, ...errorMeta(error) });
    }
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}
