/**
 * =============================================================================
 * REALTIME MODULE - ROUTES
 * =============================================================================
 *
 * Admin HTTP surface of the realtime channel. The channel itself is the
 * WebSocket upgrade handled by RealtimeGateway.
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { UserRole } from '../../core/constants';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { logger } from '../../shared/services/logger.service';
import { validateRequest } from '../../shared/utils/validation.utils';
import { AnnouncementInput, announcementSchema } from './realtime.schema';
import { realtimeService } from './realtime.service';

const router = Router();

/**
 * @route   GET /realtime/stats
 * @desc    Live session and subscription counts
 * @access  Admin only
 */
router.get(
  '/stats',
  authMiddleware,
  roleGuard([UserRole.ADMIN]),
  (_req: Request, res: Response, next: NextFunction) => {
    try {
      ApiResponse.success(res, realtimeService.stats());
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   POST /realtime/announcements
 * @desc    Push a system announcement to everyone, or to the given roles
 * @access  Admin only
 */
router.post(
  '/announcements',
  authMiddleware,
  roleGuard([UserRole.ADMIN]),
  validateRequest(announcementSchema),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const { message, targetRoles }: AnnouncementInput = req.body;
      realtimeService.publish({
        kind: 'system_announcement',
        message,
        ...(targetRoles && { targetRoles })
      });
      logger.info('System announcement queued', { targetRoles: targetRoles ?? 'all' });
      ApiResponse.accepted(res, 'Announcement queued');
    } catch (error) {
      next(error);
    }
  }
);

export { router as realtimeRouter };
