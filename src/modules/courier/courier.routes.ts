/**
 * =============================================================================
 * COURIER MODULE - ROUTES
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { UserRole } from '../../core/constants';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { authMiddleware, currentUser, roleGuard } from '../../shared/middleware/auth.middleware';
import { validateRequest } from '../../shared/utils/validation.utils';
import { AvailabilityInput, availabilitySchema } from './courier.schema';
import { courierService } from './courier.service';

const router = Router();

/**
 * @route   GET /couriers/availability
 * @desc    Read own availability
 * @access  Courier only
 */
router.get(
  '/availability',
  authMiddleware,
  roleGuard([UserRole.COURIER]),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      ApiResponse.success(res, courierService.getAvailability(currentUser(req).userId));
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   PUT /couriers/availability
 * @desc    Go online/offline for new packages
 * @access  Courier only
 */
router.put(
  '/availability',
  authMiddleware,
  roleGuard([UserRole.COURIER]),
  validateRequest(availabilitySchema),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const { available }: AvailabilityInput = req.body;
      const record = courierService.setAvailability(currentUser(req).userId, available);
      ApiResponse.success(res, record, available ? 'You are now available' : 'You are now unavailable');
    } catch (error) {
      next(error);
    }
  }
);

export { router as courierRouter };
