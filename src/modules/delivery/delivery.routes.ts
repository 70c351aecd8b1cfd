/**
 * =============================================================================
 * DELIVERY MODULE - ROUTES
 * =============================================================================
 *
 * Couriers report location over HTTP; watchers receive it over the
 * realtime channel after sending `subscribe_delivery`.
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { UserRole } from '../../core/constants';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { authMiddleware, currentUser, roleGuard } from '../../shared/middleware/auth.middleware';
import { locationRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { idParamSchema, validateRequest, validateSchema } from '../../shared/utils/validation.utils';
import { LocationUpdateInput, locationUpdateSchema } from './delivery.schema';
import { deliveryService } from './delivery.service';

const router = Router();

/**
 * @route   POST /deliveries/:id/location
 * @desc    Report the courier's current position
 * @access  Assigned courier only
 */
router.post(
  '/:id/location',
  authMiddleware,
  roleGuard([UserRole.COURIER]),
  locationRateLimiter,
  validateRequest(locationUpdateSchema),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validateSchema(idParamSchema, req.params);
      const input: LocationUpdateInput = req.body;
      const delivery = deliveryService.recordLocation(currentUser(req), id, input);
      ApiResponse.success(res, delivery, 'Location updated');
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   GET /deliveries/:id
 * @desc    Delivery with last known location
 * @access  Any authenticated user
 */
router.get(
  '/:id',
  authMiddleware,
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validateSchema(idParamSchema, req.params);
      ApiResponse.success(res, deliveryService.get(id));
    } catch (error) {
      next(error);
    }
  }
);

export { router as deliveryRouter };
