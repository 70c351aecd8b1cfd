/**
 * =============================================================================
 * AUTH MIDDLEWARE
 * =============================================================================
 *
 * Authentication and authorization middleware.
 *
 * SECURITY:
 * - Token validation on every request
 * - Role-based access control
 * - No trust by default
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { UserRole } from '../../core/constants';
import { AppError, ForbiddenError, UnauthorizedError } from '../../core/errors/AppError';
import { verifyAccessToken } from '../../modules/realtime/realtime.auth';
import { UserIdentity } from '../../modules/realtime/realtime.types';
import { logger } from '../services/logger.service';

/**
 * Extended Request type with user info
 */
declare global {
  namespace Express {
    interface Request {
      user?: UserIdentity;
    }
  }
}

/**
 * Auth middleware - validates the Bearer token
 * Must be applied to all protected routes
 */
export function authMiddleware(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedError('Authentication required');
    }

    req.user = verifyAccessToken(authHeader.substring(7));
    next();
  } catch (error) {
    if (error instanceof AppError) {
      next(error);
    } else {
      logger.error('Auth middleware error', { error: String(error) });
      next(new UnauthorizedError('Authentication failed'));
    }
  }
}

/**
 * Role guard - restricts access to specific roles
 * Must be used after authMiddleware
 */
export function roleGuard(allowedRoles: UserRole[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new UnauthorizedError('Authentication required'));
      return;
    }

    if (!allowedRoles.includes(req.user.role)) {
      logger.warn('Access denied - insufficient role', {
        userId: req.user.userId,
        role: req.user.role,
        requiredRoles: allowedRoles,
        path: req.path
      });
      next(new ForbiddenError('Insufficient permissions'));
      return;
    }

    next();
  };
}

/**
 * The authenticated caller. Only valid behind authMiddleware.
 */
export function currentUser(req: Request): UserIdentity {
  if (!req.user) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.user;
}
