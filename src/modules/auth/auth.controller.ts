/**
 * =============================================================================
 * AUTH MODULE - CONTROLLER
 * =============================================================================
 *
 * Handles HTTP requests for authentication.
 * Controller only handles request/response - business logic is in service.
 * =============================================================================
 */

import { Request, Response } from 'express';
import { authService } from './auth.service';
import { userService } from '../user/user.service';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { getActor } from '../../shared/middleware/auth.middleware';

class AuthController {
  /**
   * Create an account and sign in
   */
  register = asyncHandler(async (req: Request, res: Response) => {
    const session = await authService.register(req.body);
    res.status(201).json(successResponse(session));
  });

  /**
   * Exchange email + password for an access token
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const session = await authService.login(req.body);
    res.status(200).json(successResponse(session));
  });

  /**
   * Get current user info
   */
  getCurrentUser = asyncHandler(async (req: Request, res: Response) => {
    const user = userService.getProfile(getActor(req).userId);
    res.status(200).json(successResponse(user));
  });
}

export const authController = new AuthController();
