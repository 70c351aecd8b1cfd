/**
 * =============================================================================
 * PACKAGE MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { PackageStatus } from '../../core/constants';

const userIdSchema = z.number().int().positive();

export const createPackageSchema = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().trim().max(2000).optional(),
  recipientId: userIdSchema.optional(),
  /** Admins create on behalf of a sender; ignored for senders */
  senderId: userIdSchema.optional()
});

export const assignCourierSchema = z.object({
  courierId: userIdSchema
});

/**
 * `assigned` is only reachable through the assign endpoint, which needs a courier
 */
export const updateStatusSchema = z.object({
  status: z.nativeEnum(PackageStatus).refine(status => status !== PackageStatus.ASSIGNED, {
    message: 'Use the assign endpoint to assign a courier'
  })
});

export type CreatePackageInput = z.infer<typeof createPackageSchema>;
export type AssignCourierInput = z.infer<typeof assignCourierSchema>;
export type UpdateStatusInput = z.infer<typeof updateStatusSchema>;
