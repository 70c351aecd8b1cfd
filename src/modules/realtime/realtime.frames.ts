/**
 * =============================================================================
 * REALTIME MODULE - WIRE FRAMES
 * =============================================================================
 *
 * Builds the JSON text frames pushed to clients:
 *   { "type": "<kind>", ...snake_case fields, "timestamp": "<ISO8601>" }
 * =============================================================================
 */

import { PackageStatus } from '../../core/constants';
import {
  DeliveryLocationUpdatedEvent,
  OutboundFrame,
  PackageAssignedEvent,
  PackageCreatedEvent,
  PackageStatusChangedEvent,
  SystemAnnouncementEvent,
  WireFrame
} from './realtime.types';

/**
 * Serialize a frame, stamping it with the send time
 */
export function serializeFrame(frame: OutboundFrame, now: Date = new Date()): string {
  const wire: WireFrame = { ...frame, timestamp: now.toISOString() };
  return JSON.stringify(wire);
}

export function packageCreatedFrame(event: PackageCreatedEvent): OutboundFrame {
  const pkg = event.package;
  return {
    type: 'package_created',
    package_id: pkg.id,
    package: { id: pkg.id, title: pkg.title, status: pkg.status, sender_id: pkg.senderId },
    message: `New package created: ${pkg.title}`
  };
}

export function packageStatusFrame(event: PackageStatusChangedEvent): OutboundFrame {
  return {
    type: 'package_status_updated',
    package_id: event.packageId,
    old_status: event.oldStatus,
    new_status: event.newStatus,
    message: `Package ${event.packageId} status changed from ${event.oldStatus} to ${event.newStatus}`
  };
}

export function packageUpdateFrame(event: PackageStatusChangedEvent): OutboundFrame {
  return {
    type: 'package_update',
    update_type: 'status_updated',
    package_id: event.packageId,
    old_status: event.oldStatus,
    new_status: event.newStatus
  };
}

/**
 * Extra notice for the statuses a sender (and, on failure, the courier)
 * is told about directly. Null for every other status.
 */
export function statusNoticeFrame(event: PackageStatusChangedEvent): OutboundFrame | null {
  switch (event.newStatus) {
    case PackageStatus.PICKED_UP:
      return {
        type: 'package_picked_up',
        package_id: event.packageId,
        message: `Your package '${event.title}' has been picked up`
      };
    case PackageStatus.DELIVERED:
      return {
        type: 'package_delivered',
        package_id: event.packageId,
        message: `Your package '${event.title}' has been delivered successfully`
      };
    case PackageStatus.FAILED:
      return {
        type: 'delivery_failed',
        package_id: event.packageId,
        message: `Delivery failed for package '${event.title}'`
      };
    default:
      return null;
  }
}

export function assignedToCourierFrame(event: PackageAssignedEvent): OutboundFrame {
  return {
    type: 'package_assigned_to_you',
    package_id: event.packageId,
    message: `Package '${event.title}' has been assigned to you`
  };
}

export function assignedForSenderFrame(event: PackageAssignedEvent): OutboundFrame {
  return {
    type: 'package_assigned',
    package_id: event.packageId,
    courier_id: event.courierId,
    message: `Your package '${event.title}' has been assigned to a courier`
  };
}

export function deliveryLocationFrame(event: DeliveryLocationUpdatedEvent): OutboundFrame {
  return {
    type: 'delivery_location',
    delivery_id: event.deliveryId,
    lat: event.lat,
    lng: event.lng
  };
}

export function announcementFrame(event: SystemAnnouncementEvent): OutboundFrame {
  return { type: 'system_announcement', message: event.message };
}
