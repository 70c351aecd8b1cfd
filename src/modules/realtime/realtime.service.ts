/**
 * =============================================================================
 * REALTIME SERVICE
 * =============================================================================
 *
 * Owns the session registry, the subscription table and the event router.
 * Everything that touches them goes through this object, on the event loop.
 *
 * FLOW:
 *   service layer ──publish(event)──▶ EventRouter ──▶ Connection.deliver()
 *   gateway ──accept(socket, identity)──▶ Connection.start() ──▶ registry
 *   client frame ──▶ Connection ──onCommand──▶ handleCommand()
 *
 * USAGE:
 * ```typescript
 * import { realtimeService } from '../realtime/realtime.service';
 *
 * // after the package row is committed
 * realtimeService.publish({ kind: 'package_assigned', packageId, courierId, senderId, title });
 * ```
 * =============================================================================
 */

import { config, RealtimeConfig } from '../../config/environment';
import { UserRole, WS_CLOSE_CODES } from '../../core/constants';
import { createScopedLogger } from '../../shared/services/logger.service';
import { Connection, RealtimeSocket } from './connection.handler';
import { EventRouter, Schedule } from './event-router';
import { defaultIsAuthorized, verifyAccessToken } from './realtime.auth';
import {
  ClientCommand,
  DeliveryId,
  DomainEvent,
  EventPublisher,
  PackageId,
  RealtimeStats,
  UserIdentity
} from './realtime.types';
import { AuthorizationCheck, SessionRegistry } from './session-registry';
import { SubscriptionTable } from './subscription-table';

const log = createScopedLogger('realtime');

export interface RealtimeServiceOptions {
  settings?: Pick<RealtimeConfig, 'heartbeatIntervalMs' | 'closeGraceMs' | 'outboundBufferSize' | 'maxConnectionsPerUser'>;
  isAuthorized?: AuthorizationCheck;
  schedule?: Schedule;
  clock?: () => Date;
}

export class RealtimeService implements EventPublisher {
  readonly registry: SessionRegistry;
  readonly subscriptions = new SubscriptionTable<DeliveryId>();
  readonly packageSubscriptions = new SubscriptionTable<PackageId>();
  readonly router: EventRouter;

  private readonly settings: NonNullable<RealtimeServiceOptions['settings']>;
  private readonly isAuthorized: AuthorizationCheck;

  constructor(options: RealtimeServiceOptions = {}) {
    this.settings = options.settings ?? config.realtime;
    this.isAuthorized = options.isAuthorized ?? defaultIsAuthorized;
    this.registry = new SessionRegistry({
      isAuthorized: this.isAuthorized,
      maxConnectionsPerUser: this.settings.maxConnectionsPerUser
    });
    this.router = new EventRouter(
      this.registry,
      this.subscriptions,
      this.packageSubscriptions,
      options.schedule,
      options.clock
    );
  }

  /**
   * Hand a committed state change to the router. Returns immediately.
   */
  publish(event: DomainEvent): void {
    try {
      this.router.publish(event);
    } catch (error) {
      // Producers must never fail because of the realtime channel
      log.error('Failed to enqueue event', { kind: event.kind, error: String(error) });
    }
  }

  /**
   * Resolve the identity behind an upgrade token, or null to refuse the upgrade.
   */
  authenticate(token: string | null): UserIdentity | null {
    if (!token) return null;

    let identity: UserIdentity;
    try {
      identity = verifyAccessToken(token);
    } catch (error) {
      log.info('Upgrade token rejected', { reason: error instanceof Error ? error.message : String(error) });
      return null;
    }

    if (!this.isAuthorized(identity)) {
      log.info('Upgrade refused by capability check', { userId: identity.userId, role: identity.role });
      return null;
    }
    return identity;
  }

  /**
   * Wrap an upgraded socket in a Connection and open it.
   */
  accept(socket: RealtimeSocket, identity: UserIdentity): Connection {
    const connection = new Connection(
      identity,
      socket,
      {
        heartbeatIntervalMs: this.settings.heartbeatIntervalMs,
        closeGraceMs: this.settings.closeGraceMs,
        outboundBufferSize: this.settings.outboundBufferSize
      },
      {
        onOpen: conn => { this.registry.register(conn); },
        onCommand: (conn, command) => this.handleCommand(conn, command),
        onClosed: conn => this.release(conn)
      }
    );

    connection.start();
    return connection;
  }

  stats(): RealtimeStats {
    const registry = this.registry.stats();
    return {
      total_connections: registry.totalConnections,
      unique_users: registry.uniqueUsers,
      connections_by_role: registry.connectionsByRole,
      total_delivery_subscriptions: this.subscriptions.size,
      subscribed_deliveries: this.subscriptions.topicCount,
      total_package_subscriptions: this.packageSubscriptions.size,
      subscribed_packages: this.packageSubscriptions.topicCount
    };
  }

  /**
   * Close every session with 1001. Used on graceful shutdown.
   */
  shutdown(): void {
    const connections = this.registry.all();
    log.info('Closing realtime sessions', { count: connections.length });
    for (const connection of connections) {
      connection.close(WS_CLOSE_CODES.GOING_AWAY, 'Server shutting down');
    }
  }

  private handleCommand(connection: Connection, command: ClientCommand): void {
    switch (command.type) {
      case 'subscribe_delivery':
        this.subscriptions.subscribe(connection.id, command.deliveryId);
        connection.send({
          type: 'delivery_subscribed',
          delivery_id: command.deliveryId,
          message: `Subscribed to delivery ${command.deliveryId} updates`
        });
        return;

      case 'unsubscribe_delivery':
        this.subscriptions.unsubscribe(connection.id, command.deliveryId);
        connection.send({
          type: 'delivery_unsubscribed',
          delivery_id: command.deliveryId,
          message: `Unsubscribed from delivery ${command.deliveryId} updates`
        });
        return;

      case 'subscribe_package':
        this.packageSubscriptions.subscribe(connection.id, command.packageId);
        connection.send({
          type: 'package_subscribed',
          package_id: command.packageId,
          message: `Subscribed to package ${command.packageId} updates`
        });
        return;

      case 'unsubscribe_package':
        this.packageSubscriptions.unsubscribe(connection.id, command.packageId);
        connection.send({
          type: 'package_unsubscribed',
          package_id: command.packageId,
          message: `Unsubscribed from package ${command.packageId} updates`
        });
        return;

      case 'ping':
        connection.send({ type: 'pong' });
        return;

      case 'get_stats':
        if (connection.identity.role !== UserRole.ADMIN) {
          connection.send({ type: 'error', message: 'Stats are available to admins only' });
          return;
        }
        connection.send({ type: 'stats', data: this.stats() });
        return;
    }
  }

  private release(connection: Connection): void {
    this.subscriptions.clear(connection.id);
    this.packageSubscriptions.clear(connection.id);
    this.registry.unregister(connection.id);
    log.info('Session released', {
      connectionId: connection.id,
      userId: connection.identity.userId,
      remaining: this.registry.size
    });
  }
}

export const realtimeService = new RealtimeService();
