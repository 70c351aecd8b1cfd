/**
 * =============================================================================
 * REALTIME MODULE - TYPES
 * =============================================================================
 *
 * Domain events flow in from the service layer, frames flow out on the wire.
 * Both are closed unions discriminated on a single tag so every consumer can
 * switch over them exhaustively.
 * =============================================================================
 */

import { PackageStatus, UserRole, WsCloseCode } from '../../core/constants';

export type UserId = number;
export type DeliveryId = number;
export type PackageId = number;
export type ConnectionId = string;

/**
 * Verified caller, derived from the bearer token
 */
export interface UserIdentity {
  readonly userId: UserId;
  readonly role: UserRole;
}

// =============================================================================
// DOMAIN EVENTS (service layer -> router)
// =============================================================================

export interface PackageSummary {
  readonly id: PackageId;
  readonly title: string;
  readonly status: PackageStatus;
  readonly senderId: UserId;
}

export interface PackageCreatedEvent {
  readonly kind: 'package_created';
  readonly package: PackageSummary;
  /** Couriers the producer considers eligible for assignment */
  readonly eligibleCourierIds: readonly UserId[];
}

export interface PackageStatusChangedEvent {
  readonly kind: 'package_status_changed';
  readonly packageId: PackageId;
  readonly title: string;
  readonly oldStatus: PackageStatus;
  readonly newStatus: PackageStatus;
  readonly senderId: UserId;
  readonly courierId: UserId | null;
  readonly recipientId: UserId | null;
}

export interface PackageAssignedEvent {
  readonly kind: 'package_assigned';
  readonly packageId: PackageId;
  readonly courierId: UserId;
  readonly senderId: UserId;
  readonly title: string;
}

export interface DeliveryLocationUpdatedEvent {
  readonly kind: 'delivery_location_updated';
  readonly deliveryId: DeliveryId;
  readonly lat: number;
  readonly lng: number;
}

export interface SystemAnnouncementEvent {
  readonly kind: 'system_announcement';
  readonly message: string;
  /** Restrict to these roles; omitted means every connection */
  readonly targetRoles?: readonly UserRole[];
}

export type DomainEvent =
  | PackageCreatedEvent
  | PackageStatusChangedEvent
  | PackageAssignedEvent
  | DeliveryLocationUpdatedEvent
  | SystemAnnouncementEvent;

export type DomainEventKind = DomainEvent['kind'];

/**
 * What producers depend on. Implemented by RealtimeService.
 */
export interface EventPublisher {
  publish(event: DomainEvent): void;
}

// =============================================================================
// INBOUND COMMANDS (client -> server)
// =============================================================================

export type ClientCommand =
  | { readonly type: 'subscribe_delivery'; readonly deliveryId: DeliveryId }
  | { readonly type: 'unsubscribe_delivery'; readonly deliveryId: DeliveryId }
  | { readonly type: 'subscribe_package'; readonly packageId: PackageId }
  | { readonly type: 'unsubscribe_package'; readonly packageId: PackageId }
  | { readonly type: 'ping' }
  | { readonly type: 'get_stats' };

// =============================================================================
// OUTBOUND FRAMES (server -> client, snake_case on the wire)
// =============================================================================

export type OutboundFrame =
  | {
      type: 'connection_established';
      connection_id: ConnectionId;
      user_id: UserId;
      role: UserRole;
      message: string;
    }
  | {
      type: 'package_created';
      package_id: PackageId;
      package: { id: PackageId; title: string; status: PackageStatus; sender_id: UserId };
      message: string;
    }
  | {
      type: 'package_status_updated';
      package_id: PackageId;
      old_status: PackageStatus;
      new_status: PackageStatus;
      message: string;
    }
  | {
      type: 'package_update';
      update_type: 'status_updated';
      package_id: PackageId;
      old_status: PackageStatus;
      new_status: PackageStatus;
    }
  | { type: 'package_picked_up'; package_id: PackageId; message: string }
  | { type: 'package_delivered'; package_id: PackageId; message: string }
  | { type: 'delivery_failed'; package_id: PackageId; message: string }
  | { type: 'package_assigned_to_you'; package_id: PackageId; message: string }
  | { type: 'package_assigned'; package_id: PackageId; courier_id: UserId; message: string }
  | { type: 'delivery_location'; delivery_id: DeliveryId; lat: number; lng: number }
  | { type: 'system_announcement'; message: string }
  | { type: 'delivery_subscribed'; delivery_id: DeliveryId; message: string }
  | { type: 'delivery_unsubscribed'; delivery_id: DeliveryId; message: string }
  | { type: 'package_subscribed'; package_id: PackageId; message: string }
  | { type: 'package_unsubscribed'; package_id: PackageId; message: string }
  | { type: 'pong' }
  | { type: 'stats'; data: RealtimeStats }
  | { type: 'error'; message: string };

export type OutboundFrameType = OutboundFrame['type'];

/** Frame as it is written to the socket */
export type WireFrame = OutboundFrame & { timestamp: string };

// =============================================================================
// CONNECTION CONTRACT
// =============================================================================

export type ConnectionState = 'connecting' | 'open' | 'closing' | 'closed';

/**
 * What the registry and router need from a live session
 */
export interface RealtimeConnection {
  readonly id: ConnectionId;
  readonly identity: UserIdentity;
  readonly state: ConnectionState;
  /**
   * Queue a serialized frame without blocking.
   * Returns false when the frame was not accepted (connection not open or dropped).
   */
  deliver(payload: string): boolean;
  close(code: WsCloseCode, reason: string): void;
}

export interface RealtimeStats {
  total_connections: number;
  unique_users: number;
  connections_by_role: Record<UserRole, number>;
  total_delivery_subscriptions: number;
  subscribed_deliveries: number;
  total_package_subscriptions: number;
  subscribed_packages: number;
}
