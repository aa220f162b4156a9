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
import { authService } from '../../modules/auth/auth.service';
import { AuthenticationError, AuthorizationError } from '../types/error.types';
import type { Actor, UserRole } from '../types/api.types';
import { logger } from '../services/logger.service';

/**
 * Extended Request type with user info
 */
declare global {
  namespace Express {
    interface Request {
      user?: Actor;
    }
  }
}

function bearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.substring(7); // Remove 'Bearer '
}

/**
 * Auth middleware - validates JWT token
 * Must be applied to all protected routes
 */
export function authMiddleware(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  try {
    const token = bearerToken(req);
    if (!token) {
      throw new AuthenticationError();
    }

    req.user = authService.verifyToken(token);
    next();
  } catch (error) {
    next(error);
  }
}

/**
 * Role guard - restricts access to specific roles
 * Must be used after authMiddleware
 *
 * @param allowedRoles - Array of roles that can access the route
 */
export function roleGuard(allowedRoles: UserRole[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new AuthenticationError());
      return;
    }

    if (!allowedRoles.includes(req.user.role)) {
      logger.warn('Access denied - insufficient role', {
        userId: req.user.userId,
        role: req.user.role,
        requiredRoles: allowedRoles,
        path: req.path
      });
      next(new AuthorizationError('Insufficient permissions'));
      return;
    }

    next();
  };
}

/**
 * Identity of an authenticated request.
 * Only valid behind authMiddleware.
 */
export function getActor(req: Request): Actor {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
}
