/**
 * =============================================================================
 * PACKAGE SERVICE - Unit Tests
 * =============================================================================
 */

import { ErrorCode, PackageStatus, UserRole } from '../core/constants';
import {
  ConflictError,
  ForbiddenError,
  InvalidPackageStatusError,
  PackageNotFoundError,
  ValidationError
} from '../core/errors/AppError';
import { RecordingPublisher } from './helpers/recording-publisher';
import { CourierService } from '../modules/courier/courier.service';
import { DeliveryService } from '../modules/delivery/delivery.service';
import { UserIdentity } from '../modules/realtime/realtime.types';
import { PackageService, canTransition } from '../modules/package/package.service';

const ADMIN: UserIdentity = { userId: 1, role: UserRole.ADMIN };
const COURIER: UserIdentity = { userId: 7, role: UserRole.COURIER };
const OTHER_COURIER: UserIdentity = { userId: 8, role: UserRole.COURIER };
const SENDER: UserIdentity = { userId: 9, role: UserRole.SENDER };

describe('PackageService', () => {
  let publisher: RecordingPublisher;
  let couriers: CourierService;
  let deliveries: DeliveryService;
  let service: PackageService;

  beforeEach(() => {
    publisher = new RecordingPublisher();
    couriers = new CourierService();
    deliveries = new DeliveryService(publisher);
    service = new PackageService(publisher, couriers, deliveries);
  });

  describe('create()', () => {
    it('stores the package for the calling sender', () => {
      const record = service.create(SENDER, { title: 'Books', recipientId: 12 });

      expect(record).toMatchObject({
        id: 1,
        title: 'Books',
        description: null,
        senderId: 9,
        recipientId: 12,
        courierId: null,
        status: PackageStatus.CREATED
      });
      expect(service.get(1)).toBe(record);
    });

    it('ignores a senderId supplied by a sender', () => {
      const record = service.create(SENDER, { title: 'Books', senderId: 99 });

      expect(record.senderId).toBe(9);
    });

    it('lets an admin create on behalf of a sender', () => {
      expect(service.create(ADMIN, { title: 'Books', senderId: 9 }).senderId).toBe(9);
    });

    it('requires a senderId from an admin', () => {
      expect(() => service.create(ADMIN, { title: 'Books' })).toThrow(ValidationError);
    });

    it('announces the package to the couriers available at that moment', () => {
      couriers.setAvailability(7, true);
      couriers.setAvailability(8, false);
      couriers.setAvailability(10, true);

      service.create(SENDER, { title: 'Books' });

      expect(publisher.events).toEqual([{
        kind: 'package_created',
        package: { id: 1, title: 'Books', status: PackageStatus.CREATED, senderId: 9 },
        eligibleCourierIds: [7, 10]
      }]);
    });
  });

  describe('get() / view()', () => {
    it('throws for an unknown package', () => {
      expect(() => service.get(404)).toThrow(PackageNotFoundError);
    });

    it('includes the delivery id once assigned', () => {
      couriers.setAvailability(7, true);
      service.create(SENDER, { title: 'Books' });

      expect(service.view(1).deliveryId).toBeNull();

      service.assign(1, 7);

      expect(service.view(1).deliveryId).toBe(1);
    });
  });

  describe('assign()', () => {
    beforeEach(() => {
      couriers.setAvailability(7, true);
      service.create(SENDER, { title: 'Books', recipientId: 12 });
      publisher.clear();
    });

    it('assigns the courier and opens a delivery', () => {
      const result = service.assign(1, 7);

      expect(result.package.status).toBe(PackageStatus.ASSIGNED);
      expect(result.package.courierId).toBe(7);
      expect(result.delivery).toMatchObject({ id: 1, packageId: 1, courierId: 7, active: true });
    });

    it('publishes the assignment and then the status change', () => {
      service.assign(1, 7);

      expect(publisher.events).toEqual([
        { kind: 'package_assigned', packageId: 1, courierId: 7, senderId: 9, title: 'Books' },
        {
          kind: 'package_status_changed',
          packageId: 1,
          title: 'Books',
          oldStatus: PackageStatus.CREATED,
          newStatus: PackageStatus.ASSIGNED,
          senderId: 9,
          courierId: 7,
          recipientId: 12
        }
      ]);
    });

    it('refuses a second assignment', () => {
      couriers.setAvailability(8, true);
      service.assign(1, 7);

      expect(() => service.assign(1, 8)).toThrow(
        expect.objectContaining({ code: ErrorCode.PACKAGE_ALREADY_ASSIGNED })
      );
    });

    it('refuses a courier who is not available', () => {
      expect(() => service.assign(1, 8)).toThrow(ConflictError);
      expect(publisher.events).toEqual([]);
      expect(service.get(1).courierId).toBeNull();
    });

    it('refuses a cancelled package', () => {
      service.updateStatus(ADMIN, 1, PackageStatus.CANCELLED);

      expect(() => service.assign(1, 7)).toThrow(InvalidPackageStatusError);
    });
  });

  describe('updateStatus()', () => {
    beforeEach(() => {
      couriers.setAvailability(7, true);
      service.create(SENDER, { title: 'Books', recipientId: 12 });
      service.assign(1, 7);
      publisher.clear();
    });

    it('lets the assigned courier move the package forward', () => {
      const record = service.updateStatus(COURIER, 1, PackageStatus.PICKED_UP);

      expect(record.status).toBe(PackageStatus.PICKED_UP);
      expect(publisher.events).toEqual([{
        kind: 'package_status_changed',
        packageId: 1,
        title: 'Books',
        oldStatus: PackageStatus.ASSIGNED,
        newStatus: PackageStatus.PICKED_UP,
        senderId: 9,
        courierId: 7,
        recipientId: 12
      }]);
    });

    it('forbids other couriers and senders', () => {
      expect(() => service.updateStatus(OTHER_COURIER, 1, PackageStatus.PICKED_UP)).toThrow(ForbiddenError);
      expect(() => service.updateStatus(SENDER, 1, PackageStatus.CANCELLED)).toThrow(ForbiddenError);
      expect(publisher.events).toEqual([]);
    });

    it('rejects transitions the lifecycle does not allow', () => {
      expect(() => service.updateStatus(COURIER, 1, PackageStatus.DELIVERED)).toThrow(InvalidPackageStatusError);
      expect(service.get(1).status).toBe(PackageStatus.ASSIGNED);
    });

    it('ends the delivery on a terminal status', () => {
      service.updateStatus(COURIER, 1, PackageStatus.PICKED_UP);
      service.updateStatus(COURIER, 1, PackageStatus.IN_TRANSIT);
      expect(deliveries.get(1).active).toBe(true);

      service.updateStatus(COURIER, 1, PackageStatus.DELIVERED);

      expect(deliveries.get(1).active).toBe(false);
      expect(deliveries.get(1).endedAt).not.toBeNull();
    });
  });
});

describe('canTransition', () => {
  it('follows the package lifecycle', () => {
    expect(canTransition(PackageStatus.CREATED, PackageStatus.ASSIGNED)).toBe(true);
    expect(canTransition(PackageStatus.ASSIGNED, PackageStatus.PICKED_UP)).toBe(true);
    expect(canTransition(PackageStatus.PICKED_UP, PackageStatus.CANCELLED)).toBe(false);
    expect(canTransition(PackageStatus.DELIVERED, PackageStatus.IN_TRANSIT)).toBe(false);
  });
});
