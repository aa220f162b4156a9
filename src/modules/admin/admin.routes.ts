/**
 * =============================================================================
 * ADMIN MODULE - ROUTES
 * =============================================================================
 *
 * GET /stats            - Public platform counters
 * GET /admin/overview   - Counters plus recent signups (admin)
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { successResponse } from '../../shared/types/api.types';
import { adminService } from './admin.service';

const statsRouter = Router();
const adminRouter = Router();

/**
 * @route   GET /stats
 * @access  Public
 */
statsRouter.get('/', (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(successResponse(adminService.getStats()));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   GET /admin/overview
 * @access  Admin only
 */
adminRouter.get(
  '/overview',
  authMiddleware,
  roleGuard(['admin']),
  (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(successResponse(adminService.getOverview()));
    } catch (error) {
      next(error);
    }
  }
);

export { statsRouter, adminRouter };
