/**
 * =============================================================================
 * PACKAGE MODULE - ROUTES
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { UserRole } from '../../core/constants';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { authMiddleware, currentUser, roleGuard } from '../../shared/middleware/auth.middleware';
import { idParamSchema, validateRequest, validateSchema } from '../../shared/utils/validation.utils';
import {
  AssignCourierInput,
  assignCourierSchema,
  CreatePackageInput,
  createPackageSchema,
  UpdateStatusInput,
  updateStatusSchema
} from './package.schema';
import { packageService } from './package.service';

const router = Router();

/**
 * @route   POST /packages
 * @desc    Register a package for delivery
 * @access  Sender, Admin
 */
router.post(
  '/',
  authMiddleware,
  roleGuard([UserRole.SENDER, UserRole.ADMIN]),
  validateRequest(createPackageSchema),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: CreatePackageInput = req.body;
      const pkg = packageService.create(currentUser(req), input);
      ApiResponse.created(res, pkg, 'Package created');
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   GET /packages/:id
 * @access  Any authenticated user
 */
router.get(
  '/:id',
  authMiddleware,
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validateSchema(idParamSchema, req.params);
      ApiResponse.success(res, packageService.view(id));
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   POST /packages/:id/assign
 * @desc    Assign an available courier; opens the delivery
 * @access  Admin only
 */
router.post(
  '/:id/assign',
  authMiddleware,
  roleGuard([UserRole.ADMIN]),
  validateRequest(assignCourierSchema),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validateSchema(idParamSchema, req.params);
      const { courierId }: AssignCourierInput = req.body;
      ApiResponse.success(res, packageService.assign(id, courierId), 'Courier assigned');
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   PATCH /packages/:id/status
 * @access  Admin, assigned courier
 */
router.patch(
  '/:id/status',
  authMiddleware,
  roleGuard([UserRole.ADMIN, UserRole.COURIER]),
  validateRequest(updateStatusSchema),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validateSchema(idParamSchema, req.params);
      const { status }: UpdateStatusInput = req.body;
      ApiResponse.success(res, packageService.updateStatus(currentUser(req), id, status));
    } catch (error) {
      next(error);
    }
  }
);

export { router as packageRouter };
