/**
 * =============================================================================
 * SESSION REGISTRY
 * =============================================================================
 *
 * Tracks live WebSocket sessions keyed by user identity.
 *
 * - A user may hold several sessions at once (tabs, devices); every session
 *   receives the user's pushes.
 * - MAX_CONNECTIONS_PER_USER caps that: the oldest session is closed with
 *   1000 (normal) when a new one would exceed it. A reconnecting client stays
 *   idle on 1000 instead of coming back and evicting the newer session.
 * - All state lives in this object and is only touched from the event loop,
 *   so no caller ever sees a half-updated index.
 * =============================================================================
 */

import { UserRole, WS_CLOSE_CODES } from '../../core/constants';
import { AuthRejectedError } from '../../core/errors/AppError';
import { createScopedLogger } from '../../shared/services/logger.service';
import { ConnectionId, RealtimeConnection, UserId, UserIdentity } from './realtime.types';

const log = createScopedLogger('realtime:registry');

export type AuthorizationCheck = (identity: UserIdentity) => boolean;

export interface SessionRegistryOptions {
  isAuthorized: AuthorizationCheck;
  maxConnectionsPerUser: number;
}

export interface RegistryStats {
  totalConnections: number;
  uniqueUsers: number;
  connectionsByRole: Record<UserRole, number>;
}

export class SessionRegistry {
  private readonly connections = new Map<ConnectionId, RealtimeConnection>();
  private readonly byUser = new Map<UserId, Set<ConnectionId>>();
  private readonly byRole = new Map<UserRole, Set<ConnectionId>>();

  constructor(private readonly options: SessionRegistryOptions) {}

  /**
   * Insert an authenticated session.
   * Throws AuthRejectedError if the identity does not pass the authorization check.
   */
  register(connection: RealtimeConnection): ConnectionId {
    const { identity } = connection;

    if (!this.options.isAuthorized(identity)) {
      throw new AuthRejectedError(`User ${identity.userId} is not allowed on the realtime channel`);
    }

    if (this.connections.has(connection.id)) {
      return connection.id;
    }

    let userSet = this.byUser.get(identity.userId);
    if (!userSet) {
      userSet = new Set();
      this.byUser.set(identity.userId, userSet);
    }

    // Sets iterate in insertion order, so the first entry is the oldest session
    while (userSet.size >= this.options.maxConnectionsPerUser) {
      const oldestId = userSet.values().next().value;
      if (oldestId === undefined) break;
      const oldest = this.connections.get(oldestId);
      log.warn('Connection limit exceeded, closing oldest session', {
        userId: identity.userId,
        limit: this.options.maxConnectionsPerUser,
        connectionId: oldestId
      });
      this.unregister(oldestId);
      oldest?.close(WS_CLOSE_CODES.NORMAL, 'Connection limit exceeded');
    }

    // unregister() may have dropped the emptied set from the index
    this.byUser.set(identity.userId, userSet);
    userSet.add(connection.id);

    this.connections.set(connection.id, connection);
    this.roleSet(identity.role).add(connection.id);

    log.debug('Session registered', {
      connectionId: connection.id,
      userId: identity.userId,
      role: identity.role
    });

    return connection.id;
  }

  /**
   * Remove a session. No-op if it is not registered.
   */
  unregister(connectionId: ConnectionId): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;

    this.connections.delete(connectionId);

    const { userId, role } = connection.identity;
    const userSet = this.byUser.get(userId);
    if (userSet) {
      userSet.delete(connectionId);
      if (userSet.size === 0) {
        this.byUser.delete(userId);
      }
    }
    this.byRole.get(role)?.delete(connectionId);

    log.debug('Session unregistered', { connectionId, userId });
  }

  get(connectionId: ConnectionId): RealtimeConnection | undefined {
    return this.connections.get(connectionId);
  }

  has(connectionId: ConnectionId): boolean {
    return this.connections.has(connectionId);
  }

  connectionsForUser(userId: UserId): ConnectionId[] {
    return Array.from(this.byUser.get(userId) ?? []);
  }

  connectionsForRole(role: UserRole): ConnectionId[] {
    return Array.from(this.byRole.get(role) ?? []);
  }

  allConnectionIds(): ConnectionId[] {
    return Array.from(this.connections.keys());
  }

  all(): RealtimeConnection[] {
    return Array.from(this.connections.values());
  }

  get size(): number {
    return this.connections.size;
  }

  stats(): RegistryStats {
    const count = (role: UserRole): number => this.byRole.get(role)?.size ?? 0;

    return {
      totalConnections: this.connections.size,
      uniqueUsers: this.byUser.size,
      connectionsByRole: {
        [UserRole.ADMIN]: count(UserRole.ADMIN),
        [UserRole.COURIER]: count(UserRole.COURIER),
        [UserRole.SENDER]: count(UserRole.SENDER),
        [UserRole.RECIPIENT]: count(UserRole.RECIPIENT)
      }
    };
  }

  private roleSet(role: UserRole): Set<ConnectionId> {
    let set = this.byRole.get(role);
    if (!set) {
      set = new Set();
      this.byRole.set(role, set);
    }
    return set;
  }
}
