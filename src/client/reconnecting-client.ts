/**
 * =============================================================================
 * RECONNECTING CLIENT
 * =============================================================================
 *
 * Node client for the realtime channel. Drives the reconnect machine with
 * real timers and a socket factory (the `ws` client by default).
 *
 * - Keeps the active delivery and package subscriptions and re-sends them
 *   after every successful open (the server forgets them with the session)
 * - Keeps the last received frame and the last known location per delivery
 * - Reports connectivity through listeners; nothing here blocks the caller
 *
 * USAGE:
 * ```typescript
 * const client = new ReconnectingClient({ url: 'ws://localhost:8000/api/ws/connect', token });
 * client.onFrame(frame => render(frame));
 * client.onConnectivity(status => banner(status));
 * client.start();
 * client.subscribe(42);
 * ```
 * =============================================================================
 */

import WebSocket from 'ws';
import { z } from 'zod';
import { createScopedLogger } from '../shared/services/logger.service';
import { rawDataToString } from '../shared/utils/ws.utils';
import {
  Connectivity,
  DEFAULT_RECONNECT_POLICY,
  INITIAL_STATE,
  ReconnectEffect,
  ReconnectInput,
  ReconnectPolicy,
  ReconnectState,
  ReconnectStatus,
  transition
} from './reconnect.machine';

const log = createScopedLogger('realtime:client');

/** Close code used when the socket disappears without a close frame */
const ABNORMAL_CLOSURE = 1006;

// =============================================================================
// SOCKET ABSTRACTION
// =============================================================================

export interface ClientSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface ClientSocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export type SocketFactory = (url: string, handlers: ClientSocketHandlers) => ClientSocket;

export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);
  socket.on('open', () => handlers.onOpen());
  socket.on('message', data => handlers.onMessage(rawDataToString(data)));
  socket.on('close', (code, reason) => handlers.onClose(code, reason.toString()));
  socket.on('error', error => handlers.onError(error));
  return socket;
};

// =============================================================================
// FRAMES
// =============================================================================

const serverFrameSchema = z.object({ type: z.string() }).passthrough();

const deliveryLocationSchema = z.object({
  type: z.literal('delivery_location'),
  delivery_id: z.number(),
  lat: z.number(),
  lng: z.number(),
  timestamp: z.string().optional()
});

export type ServerFrame = z.infer<typeof serverFrameSchema>;

export interface KnownLocation {
  deliveryId: number;
  lat: number;
  lng: number;
  receivedAt: string;
}

export type ClientCommand =
  | { type: 'subscribe_delivery'; delivery_id: number }
  | { type: 'unsubscribe_delivery'; delivery_id: number }
  | { type: 'subscribe_package'; package_id: number }
  | { type: 'unsubscribe_package'; package_id: number }
  | { type: 'ping' }
  | { type: 'get_stats' };

// =============================================================================
// CLIENT
// =============================================================================

export interface ReconnectingClientOptions {
  /** Upgrade URL without the token, e.g. ws://host:8000/api/ws/connect */
  url: string;
  /** Bearer token, or a provider called before every connect attempt */
  token: string | (() => string);
  policy?: Partial<ReconnectPolicy>;
  socketFactory?: SocketFactory;
}

type Listener<T> = (value: T) => void;

export class ReconnectingClient {
  private state: ReconnectState = INITIAL_STATE;
  private readonly policy: ReconnectPolicy;
  private readonly socketFactory: SocketFactory;

  private socket: ClientSocket | null = null;
  /** Bumped per socket so events from a replaced socket are ignored */
  private generation = 0;
  private retryTimer: NodeJS.Timeout | null = null;

  private readonly subscriptions = new Set<number>();
  private readonly packageSubscriptions = new Set<number>();
  private readonly locations = new Map<number, KnownLocation>();
  private latestFrame: ServerFrame | null = null;
  private currentConnectivity: Connectivity = 'disconnected';
  private lastError: string | null = null;

  private readonly frameListeners = new Set<Listener<ServerFrame>>();
  private readonly connectivityListeners = new Set<Listener<Connectivity>>();

  constructor(private readonly options: ReconnectingClientOptions) {
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options.policy };
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  start(): void {
    this.dispatch({ type: 'start' });
  }

  stop(): void {
    this.dispatch({ type: 'stop' });
  }

  get status(): ReconnectStatus {
    return this.state.status;
  }

  get attempt(): number {
    return this.state.attempt;
  }

  get connectivity(): Connectivity {
    return this.currentConnectivity;
  }

  get connectionError(): string | null {
    return this.lastError;
  }

  // ===========================================================================
  // SUBSCRIPTIONS
  // ===========================================================================

  subscribe(deliveryId: number): void {
    this.subscriptions.add(deliveryId);
    this.send({ type: 'subscribe_delivery', delivery_id: deliveryId });
  }

  unsubscribe(deliveryId: number): void {
    this.subscriptions.delete(deliveryId);
    this.send({ type: 'unsubscribe_delivery', delivery_id: deliveryId });
  }

  activeSubscriptions(): number[] {
    return Array.from(this.subscriptions);
  }

  subscribePackage(packageId: number): void {
    this.packageSubscriptions.add(packageId);
    this.send({ type: 'subscribe_package', package_id: packageId });
  }

  unsubscribePackage(packageId: number): void {
    this.packageSubscriptions.delete(packageId);
    this.send({ type: 'unsubscribe_package', package_id: packageId });
  }

  activePackageSubscriptions(): number[] {
    return Array.from(this.packageSubscriptions);
  }

  /**
   * Send a command if the socket is open. Returns false otherwise;
   * subscriptions are replayed on the next open anyway.
   */
  send(command: ClientCommand): boolean {
    if (this.state.status !== 'open' || !this.socket) return false;
    try {
      this.socket.send(JSON.stringify(command));
      return true;
    } catch (error) {
      log.warn('Send failed', { type: command.type, error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  // ===========================================================================
  // LAST KNOWN STATE
  // ===========================================================================

  get lastFrame(): ServerFrame | null {
    return this.latestFrame;
  }

  lastKnownLocation(deliveryId: number): KnownLocation | null {
    return this.locations.get(deliveryId) ?? null;
  }

  onFrame(listener: Listener<ServerFrame>): () => void {
    this.frameListeners.add(listener);
    return () => { this.frameListeners.delete(listener); };
  }

  onConnectivity(listener: Listener<Connectivity>): () => void {
    this.connectivityListeners.add(listener);
    return () => { this.connectivityListeners.delete(listener); };
  }

  // ===========================================================================
  // MACHINE DRIVER
  // ===========================================================================

  private dispatch(input: ReconnectInput): void {
    const { state, effects } = transition(this.state, input, this.policy);
    if (state !== this.state) {
      log.debug('Client state', { from: this.state.status, to: state.status, attempt: state.attempt });
    }
    this.state = state;
    for (const effect of effects) {
      this.perform(effect);
    }
  }

  private perform(effect: ReconnectEffect): void {
    switch (effect.type) {
      case 'open_socket':
        this.openSocket();
        return;

      case 'close_socket':
        this.closeSocket(effect.code, effect.reason);
        return;

      case 'schedule_retry':
        this.clearRetry();
        log.info('Reconnecting', { attempt: this.state.attempt, delayMs: effect.delayMs });
        this.retryTimer = setTimeout(() => {
          this.retryTimer = null;
          this.dispatch({ type: 'retry' });
        }, effect.delayMs);
        return;

      case 'cancel_retry':
        this.clearRetry();
        return;

      case 'resubscribe':
        for (const deliveryId of this.subscriptions) {
          this.send({ type: 'subscribe_delivery', delivery_id: deliveryId });
        }
        for (const packageId of this.packageSubscriptions) {
          this.send({ type: 'subscribe_package', package_id: packageId });
        }
        return;

      case 'notify':
        this.setConnectivity(effect.connectivity);
        return;
    }
  }

  private openSocket(): void {
    const generation = ++this.generation;
    const isCurrent = (): boolean => generation === this.generation;

    const handlers: ClientSocketHandlers = {
      onOpen: () => {
        if (!isCurrent()) return;
        this.lastError = null;
        this.dispatch({ type: 'opened' });
      },
      onMessage: data => {
        if (isCurrent()) this.handleMessage(data);
      },
      onClose: (code, reason) => {
        if (!isCurrent()) return;
        log.info('Socket closed', { code, reason });
        this.socket = null;
        this.dispatch({ type: 'closed', code });
      },
      onError: error => {
        if (!isCurrent()) return;
        // A close event follows; the machine reacts to that
        this.lastError = error.message;
        log.warn('Socket error', { error: error.message });
      }
    };

    try {
      this.socket = this.socketFactory(this.buildUrl(), handlers);
    } catch (error) {
      this.socket = null;
      this.lastError = error instanceof Error ? error.message : String(error);
      log.warn('Failed to create socket', { error: this.lastError });
      this.dispatch({ type: 'closed', code: ABNORMAL_CLOSURE });
    }
  }

  private closeSocket(code: number, reason: string): void {
    const socket = this.socket;
    this.socket = null;
    // Events from the closed socket must not drive the machine any more
    this.generation++;
    if (!socket) return;
    try {
      socket.close(code, reason);
    } catch (error) {
      log.debug('Close failed', { error: error instanceof Error ? error.message : String(error) });
    }
  }

  private handleMessage(data: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      log.warn('Ignoring non-JSON frame');
      return;
    }

    const frame = serverFrameSchema.safeParse(parsed);
    if (!frame.success) {
      log.warn('Ignoring frame without a type');
      return;
    }

    const value = frame.data;
    this.latestFrame = value;

    const location = deliveryLocationSchema.safeParse(parsed);
    if (location.success) {
      const { delivery_id, lat, lng, timestamp } = location.data;
      this.locations.set(delivery_id, {
        deliveryId: delivery_id,
        lat,
        lng,
        receivedAt: timestamp ?? new Date().toISOString()
      });
    }

    for (const listener of this.frameListeners) {
      this.safely(() => listener(value));
    }
  }

  private setConnectivity(connectivity: Connectivity): void {
    if (connectivity === 'error' && !this.lastError) {
      this.lastError = 'Unable to reach the realtime service';
    }
    if (connectivity === this.currentConnectivity) return;
    this.currentConnectivity = connectivity;
    for (const listener of this.connectivityListeners) {
      this.safely(() => listener(connectivity));
    }
  }

  private buildUrl(): string {
    const token = typeof this.options.token === 'function' ? this.options.token() : this.options.token;
    const url = new URL(this.options.url);
    url.searchParams.set('token', token);
    return url.toString();
  }

  private clearRetry(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  private safely(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      log.error('Listener failed', { error: error instanceof Error ? error.message : String(error) });
    }
  }
}
