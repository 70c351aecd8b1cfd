/**
 * =============================================================================
 * COURIER SERVICE
 * =============================================================================
 *
 * Live availability table of couriers.
 *
 * A courier toggles availability from the app. The set of available couriers
 * is the audience for `package_created` pushes and the pool an admin may
 * assign packages to.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { UserId } from '../realtime/realtime.types';

export interface CourierAvailability {
  courierId: UserId;
  available: boolean;
  updatedAt: string;
}

export class CourierService {
  private readonly availability = new Map<UserId, CourierAvailability>();

  setAvailability(courierId: UserId, available: boolean): CourierAvailability {
    const record: CourierAvailability = {
      courierId,
      available,
      updatedAt: new Date().toISOString()
    };
    // Re-insert so the map keeps couriers in the order they last changed state
    this.availability.delete(courierId);
    this.availability.set(courierId, record);

    logger.info('Courier availability changed', { courierId, available });
    return record;
  }

  getAvailability(courierId: UserId): CourierAvailability {
    return this.availability.get(courierId) ?? {
      courierId,
      available: false,
      updatedAt: new Date(0).toISOString()
    };
  }

  isAvailable(courierId: UserId): boolean {
    return this.availability.get(courierId)?.available ?? false;
  }

  /**
   * Couriers currently eligible for new packages, in the order they came online
   */
  availableCourierIds(): UserId[] {
    const ids: UserId[] = [];
    for (const record of this.availability.values()) {
      if (record.available) ids.push(record.courierId);
    }
    return ids;
  }
}

export const courierService = new CourierService();
