/**
 * =============================================================================
 * USER MODULE - ROUTES
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware } from '../../shared/middleware/auth.middleware';
import { successResponse } from '../../shared/types/api.types';
import { userService } from './user.service';

const router = Router();

/**
 * @route   GET /users/:id
 * @desc    Public profile (no credentials)
 * @access  Authenticated
 */
router.get('/:id', authMiddleware, (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(successResponse(userService.getProfile(req.params.id)));
  } catch (error) {
    next(error);
  }
});

export { router as userRouter };
