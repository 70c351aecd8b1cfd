/**
 * =============================================================================
 * DELIVERY SERVICE
 * =============================================================================
 *
 * A delivery is opened when a courier is assigned to a package and stays
 * trackable until the package reaches a terminal status.
 *
 * Location reports are stored as "last known location" and pushed to the
 * connections subscribed to that delivery id.
 * =============================================================================
 */

import { ErrorCode, UserRole } from '../../core/constants';
import {
  ConflictError,
  DeliveryNotFoundError,
  ForbiddenError
} from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { realtimeService } from '../realtime/realtime.service';
import { DeliveryId, EventPublisher, PackageId, UserId, UserIdentity } from '../realtime/realtime.types';
import { LocationUpdateInput } from './delivery.schema';

export interface LocationFix {
  lat: number;
  lng: number;
  recordedAt: string;
}

export interface DeliveryRecord {
  id: DeliveryId;
  packageId: PackageId;
  courierId: UserId;
  active: boolean;
  startedAt: string;
  endedAt: string | null;
  lastLocation: LocationFix | null;
}

export class DeliveryService {
  private readonly deliveries = new Map<DeliveryId, DeliveryRecord>();
  private readonly byPackage = new Map<PackageId, DeliveryId>();
  private nextId = 1;

  constructor(private readonly publisher: EventPublisher) {}

  /**
   * Open a delivery for a freshly assigned package
   */
  open(packageId: PackageId, courierId: UserId): DeliveryRecord {
    const record: DeliveryRecord = {
      id: this.nextId++,
      packageId,
      courierId,
      active: true,
      startedAt: new Date().toISOString(),
      endedAt: null,
      lastLocation: null
    };
    this.deliveries.set(record.id, record);
    this.byPackage.set(packageId, record.id);

    logger.info('Delivery opened', { deliveryId: record.id, packageId, courierId });
    return record;
  }

  /**
   * Stop tracking once the package reaches a terminal status
   */
  end(packageId: PackageId): void {
    const deliveryId = this.byPackage.get(packageId);
    if (deliveryId === undefined) return;

    const record = this.deliveries.get(deliveryId);
    if (!record || !record.active) return;

    record.active = false;
    record.endedAt = new Date().toISOString();
    logger.info('Delivery ended', { deliveryId, packageId });
  }

  get(deliveryId: DeliveryId): DeliveryRecord {
    const record = this.deliveries.get(deliveryId);
    if (!record) {
      throw new DeliveryNotFoundError(deliveryId);
    }
    return record;
  }

  findByPackage(packageId: PackageId): DeliveryRecord | null {
    const deliveryId = this.byPackage.get(packageId);
    return deliveryId === undefined ? null : this.deliveries.get(deliveryId) ?? null;
  }

  /**
   * Record the courier's position and push it to subscribers of the delivery
   */
  recordLocation(caller: UserIdentity, deliveryId: DeliveryId, input: LocationUpdateInput): DeliveryRecord {
    const record = this.get(deliveryId);

    if (caller.role !== UserRole.COURIER || caller.userId !== record.courierId) {
      throw new ForbiddenError('Only the assigned courier can report location');
    }
    if (!record.active) {
      throw new ConflictError(
        `Delivery ${deliveryId} is no longer being tracked`,
        ErrorCode.DELIVERY_NOT_TRACKABLE,
        { deliveryId }
      );
    }

    record.lastLocation = { lat: input.lat, lng: input.lng, recordedAt: new Date().toISOString() };

    this.publisher.publish({
      kind: 'delivery_location_updated',
      deliveryId,
      lat: input.lat,
      lng: input.lng
    });

    return record;
  }
}

export const deliveryService = new DeliveryService(realtimeService);
