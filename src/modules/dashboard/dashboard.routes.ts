/**
 * =============================================================================
 * DASHBOARD MODULE - ROUTES
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware, getActor } from '../../shared/middleware/auth.middleware';
import { successResponse } from '../../shared/types/api.types';
import { dashboardService } from './dashboard.service';

const router = Router();

/**
 * @route   GET /dashboard
 * @desc    Loads and bids relevant to the caller's role
 * @access  Authenticated
 */
router.get('/', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const dashboard = await dashboardService.getDashboard(getActor(req));
    res.json(successResponse(dashboard));
  } catch (error) {
    next(error);
  }
});

export { router as dashboardRouter };
