/**
 * =============================================================================
 * EVENT ROUTER
 * =============================================================================
 *
 * Receives domain events from the service layer and fans them out.
 *
 * DISPATCH POLICY:
 * ┌───────────────────────────┬──────────────────────────────────────────────┐
 * │ package_created           │ all admins + eligible couriers               │
 * │ package_status_changed    │ sender, assigned courier, recipient, admins  │
 * │                           │ + package_update to other package watchers   │
 * │                           │ + picked_up / delivered notice to sender     │
 * │                           │ + delivery_failed to sender and courier      │
 * │ package_assigned          │ courier (package_assigned_to_you) + sender   │
 * │ delivery_location_updated │ subscribers of that delivery only            │
 * │ system_announcement       │ every connection (or targetRoles)            │
 * └───────────────────────────┴──────────────────────────────────────────────┘
 *
 * publish() only enqueues. Dispatch runs on a later event-loop turn, draining
 * events in the order they were published, so producers never wait on sockets.
 * Each frame is serialized once and handed to every target's own bounded
 * queue; a full queue drops that connection and the loop continues.
 * =============================================================================
 */

import { UserRole } from '../../core/constants';
import { createScopedLogger, errorMeta } from '../../shared/services/logger.service';
import {
  announcementFrame,
  assignedForSenderFrame,
  assignedToCourierFrame,
  deliveryLocationFrame,
  packageCreatedFrame,
  packageStatusFrame,
  packageUpdateFrame,
  serializeFrame,
  statusNoticeFrame
} from './realtime.frames';
import {
  ConnectionId,
  DomainEvent,
  OutboundFrame,
  PackageId,
  PackageStatusChangedEvent,
  UserId
} from './realtime.types';
import { SessionRegistry } from './session-registry';
import { SubscriptionTable } from './subscription-table';

const log = createScopedLogger('realtime:router');

/**
 * One frame and the connections that should receive it
 */
export interface Delivery {
  frame: OutboundFrame;
  targets: ConnectionId[];
}

export interface DispatchResult {
  kind: DomainEvent['kind'];
  delivered: number;
  dropped: number;
}

export type Schedule = (task: () => void) => void;

export class EventRouter {
  private readonly pending: DomainEvent[] = [];
  private drainScheduled = false;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly subscriptions: SubscriptionTable,
    private readonly packageSubscriptions: SubscriptionTable<PackageId>,
    private readonly schedule: Schedule = task => { setImmediate(task); },
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Accept an event from the service layer. Never blocks, never throws.
   */
  publish(event: DomainEvent): void {
    this.pending.push(event);
    if (this.drainScheduled) return;

    this.drainScheduled = true;
    this.schedule(() => this.drain());
  }

  /** Events accepted but not yet dispatched */
  get backlog(): number {
    return this.pending.length;
  }

  /**
   * Resolve the audience for an event (pure; no delivery).
   */
  route(event: DomainEvent): Delivery[] {
    switch (event.kind) {
      case 'package_created': {
        const eligible = new Set(event.eligibleCourierIds);
        const couriers = this.registry
          .connectionsForRole(UserRole.COURIER)
          .filter(id => {
            const connection = this.registry.get(id);
            return connection !== undefined && eligible.has(connection.identity.userId);
          });
        return [{
          frame: packageCreatedFrame(event),
          targets: union(this.registry.connectionsForRole(UserRole.ADMIN), couriers)
        }];
      }

      case 'package_status_changed': {
        const stakeholders = union(
          this.forUsers([event.senderId, event.courierId, event.recipientId]),
          this.registry.connectionsForRole(UserRole.ADMIN)
        );
        const notified = new Set(stakeholders);
        const watchers = this.packageSubscriptions
          .subscribersOf(event.packageId)
          .filter(id => !notified.has(id));
        return [
          { frame: packageStatusFrame(event), targets: stakeholders },
          { frame: packageUpdateFrame(event), targets: watchers },
          ...this.statusNotice(event)
        ];
      }

      case 'package_assigned': {
        const courierTargets = this.registry.connectionsForUser(event.courierId);
        const courierSet = new Set(courierTargets);
        const senderTargets = this.registry
          .connectionsForUser(event.senderId)
          .filter(id => !courierSet.has(id));
        return [
          { frame: assignedToCourierFrame(event), targets: courierTargets },
          { frame: assignedForSenderFrame(event), targets: senderTargets }
        ];
      }

      case 'delivery_location_updated':
        return [{
          frame: deliveryLocationFrame(event),
          targets: this.subscriptions.subscribersOf(event.deliveryId)
        }];

      case 'system_announcement': {
        const targets = event.targetRoles
          ? union(...event.targetRoles.map(role => this.registry.connectionsForRole(role)))
          : this.registry.allConnectionIds();
        return [{ frame: announcementFrame(event), targets }];
      }
    }
  }

  /**
   * Deliver one event right now.
   */
  dispatch(event: DomainEvent): DispatchResult {
    const now = this.clock();
    let delivered = 0;
    let dropped = 0;

    for (const { frame, targets } of this.route(event)) {
      if (targets.length === 0) continue;
      const payload = serializeFrame(frame, now);

      for (const connectionId of targets) {
        const connection = this.registry.get(connectionId);
        if (connection && connection.deliver(payload)) {
          delivered++;
        } else {
          dropped++;
        }
      }
    }

    log.debug('Event dispatched', { kind: event.kind, delivered, dropped });
    return { kind: event.kind, delivered, dropped };
  }

  private drain(): void {
    this.drainScheduled = false;

    // Events published while draining are picked up in this same pass
    while (this.pending.length > 0) {
      const event = this.pending.shift();
      if (!event) break;
      try {
        this.dispatch(event);
      } catch (error) {
        log.error('Failed to dispatch event', { kind: event.kind, ...errorMeta(error) });
      }
    }
  }

  private statusNotice(event: PackageStatusChangedEvent): Delivery[] {
    const frame = statusNoticeFrame(event);
    if (!frame) return [];

    const userIds = frame.type === 'delivery_failed'
      ? [event.senderId, event.courierId]
      : [event.senderId];
    return [{ frame, targets: union(this.forUsers(userIds)) }];
  }

  private forUsers(userIds: Array<UserId | null>): ConnectionId[] {
    const ids: ConnectionId[] = [];
    for (const userId of userIds) {
      if (userId === null) continue;
      ids.push(...this.registry.connectionsForUser(userId));
    }
    return ids;
  }
}

/**
 * Ordered union without duplicates: one frame per connection per event
 */
function union(...groups: ConnectionId[][]): ConnectionId[] {
  return Array.from(new Set(groups.flat()));
}
