/**
 * =============================================================================
 * PACKAGE SERVICE
 * =============================================================================
 *
 * Package lifecycle and the events it produces.
 *
 * EVENTS (published after the in-memory write completes):
 * - create        -> package_created        (admins + available couriers)
 * - assign        -> package_assigned       (courier + sender)
 *                    package_status_changed (created -> assigned)
 * - status change -> package_status_changed (sender, courier, recipient, admins,
 *                    package watchers; picked_up / delivered / failed notices)
 *
 * STATUS MACHINE: see PACKAGE_STATUS_TRANSITIONS
 * =============================================================================
 */

import {
  PACKAGE_STATUS_TRANSITIONS,
  PackageStatus,
  UserRole,
  ErrorCode
} from '../../core/constants';
import {
  ConflictError,
  ForbiddenError,
  InvalidPackageStatusError,
  PackageNotFoundError,
  ValidationError
} from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { CourierService, courierService } from '../courier/courier.service';
import { DeliveryRecord, DeliveryService, deliveryService } from '../delivery/delivery.service';
import { realtimeService } from '../realtime/realtime.service';
import { EventPublisher, PackageId, UserId, UserIdentity } from '../realtime/realtime.types';
import { CreatePackageInput } from './package.schema';

export interface PackageRecord {
  id: PackageId;
  title: string;
  description: string | null;
  senderId: UserId;
  recipientId: UserId | null;
  courierId: UserId | null;
  status: PackageStatus;
  createdAt: string;
  updatedAt: string;
}

export interface PackageView extends PackageRecord {
  deliveryId: number | null;
}

export interface AssignmentResult {
  package: PackageRecord;
  delivery: DeliveryRecord;
}

const TERMINAL_STATUSES: ReadonlySet<PackageStatus> = new Set(
  Object.values(PackageStatus).filter(status => PACKAGE_STATUS_TRANSITIONS[status].length === 0)
);

export function canTransition(from: PackageStatus, to: PackageStatus): boolean {
  return PACKAGE_STATUS_TRANSITIONS[from].includes(to);
}

export class PackageService {
  private readonly packages = new Map<PackageId, PackageRecord>();
  private nextId = 1;

  constructor(
    private readonly publisher: EventPublisher,
    private readonly couriers: CourierService,
    private readonly deliveries: DeliveryService
  ) {}

  create(caller: UserIdentity, input: CreatePackageInput): PackageRecord {
    const senderId = caller.role === UserRole.ADMIN ? input.senderId : caller.userId;
    if (senderId === undefined) {
      throw new ValidationError('senderId is required when creating on behalf of a sender', [
        { field: 'senderId', message: 'Required' }
      ]);
    }

    const now = new Date().toISOString();
    const record: PackageRecord = {
      id: this.nextId++,
      title: input.title,
      description: input.description ?? null,
      senderId,
      recipientId: input.recipientId ?? null,
      courierId: null,
      status: PackageStatus.CREATED,
      createdAt: now,
      updatedAt: now
    };
    this.packages.set(record.id, record);

    logger.info('Package created', { packageId: record.id, senderId });

    this.publisher.publish({
      kind: 'package_created',
      package: { id: record.id, title: record.title, status: record.status, senderId },
      eligibleCourierIds: this.couriers.availableCourierIds()
    });

    return record;
  }

  get(packageId: PackageId): PackageRecord {
    const record = this.packages.get(packageId);
    if (!record) {
      throw new PackageNotFoundError(packageId);
    }
    return record;
  }

  view(packageId: PackageId): PackageView {
    const record = this.get(packageId);
    return { ...record, deliveryId: this.deliveries.findByPackage(packageId)?.id ?? null };
  }

  /**
   * Assign a courier and open the delivery they will report location for
   */
  assign(packageId: PackageId, courierId: UserId): AssignmentResult {
    const record = this.get(packageId);

    if (record.courierId !== null) {
      throw new ConflictError(
        `Package ${packageId} is already assigned`,
        ErrorCode.PACKAGE_ALREADY_ASSIGNED,
        { packageId, courierId: record.courierId }
      );
    }
    if (!canTransition(record.status, PackageStatus.ASSIGNED)) {
      throw new InvalidPackageStatusError(record.status, PackageStatus.ASSIGNED);
    }
    if (!this.couriers.isAvailable(courierId)) {
      throw new ConflictError(
        `Courier ${courierId} is not available`,
        ErrorCode.COURIER_NOT_ELIGIBLE,
        { courierId }
      );
    }

    const oldStatus = record.status;
    record.courierId = courierId;
    record.status = PackageStatus.ASSIGNED;
    record.updatedAt = new Date().toISOString();
    const delivery = this.deliveries.open(packageId, courierId);

    logger.info('Courier assigned', { packageId, courierId, deliveryId: delivery.id });

    this.publisher.publish({
      kind: 'package_assigned',
      packageId,
      courierId,
      senderId: record.senderId,
      title: record.title
    });
    this.publishStatusChange(record, oldStatus);

    return { package: record, delivery };
  }

  /**
   * Move a package along its lifecycle.
   * Admins may move any package; couriers only the ones assigned to them.
   */
  updateStatus(caller: UserIdentity, packageId: PackageId, status: PackageStatus): PackageRecord {
    const record = this.get(packageId);

    const isAssignedCourier = caller.role === UserRole.COURIER && record.courierId === caller.userId;
    if (caller.role !== UserRole.ADMIN && !isAssignedCourier) {
      throw new ForbiddenError('Only an admin or the assigned courier can change this package');
    }
    if (!canTransition(record.status, status)) {
      throw new InvalidPackageStatusError(record.status, status);
    }

    const oldStatus = record.status;
    record.status = status;
    record.updatedAt = new Date().toISOString();

    if (TERMINAL_STATUSES.has(status)) {
      this.deliveries.end(packageId);
    }

    logger.info('Package status changed', { packageId, oldStatus, newStatus: status, by: caller.userId });

    this.publishStatusChange(record, oldStatus);
    return record;
  }

  private publishStatusChange(record: PackageRecord, oldStatus: PackageStatus): void {
    this.publisher.publish({
      kind: 'package_status_changed',
      packageId: record.id,
      title: record.title,
      oldStatus,
      newStatus: record.status,
      senderId: record.senderId,
      courierId: record.courierId,
      recipientId: record.recipientId
    });
  }
}

export const packageService = new PackageService(realtimeService, courierService, deliveryService);
