/**
 * =============================================================================
 * SAVED LOAD MODULE - ROUTES
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware, getActor } from '../../shared/middleware/auth.middleware';
import { successResponse } from '../../shared/types/api.types';
import { savedLoadService } from './saved-load.service';

const router = Router();

/**
 * @route   POST /saved-loads/:loadId/toggle
 * @desc    Bookmark a load, or remove the bookmark
 * @access  Authenticated
 */
router.post('/:loadId/toggle', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await savedLoadService.toggle(getActor(req), req.params.loadId);
    res.json(successResponse(result));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   GET /saved-loads
 * @access  Authenticated
 */
router.get('/', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const loads = await savedLoadService.list(getActor(req));
    res.json(successResponse(loads));
  } catch (error) {
    next(error);
  }
});

export { router as savedLoadRouter };
