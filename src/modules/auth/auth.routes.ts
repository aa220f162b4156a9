/**
 * =============================================================================
 * AUTH MODULE - ROUTES
 * =============================================================================
 *
 * Endpoints:
 * POST /auth/register  - Create a shipper or trucker account
 * POST /auth/login     - Email + password login
 * GET  /auth/me        - Current user
 * =============================================================================
 */

import { Router } from 'express';
import { authController } from './auth.controller';
import { authRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { authMiddleware } from '../../shared/middleware/auth.middleware';

const router = Router();

/**
 * @route   POST /api/v1/auth/register
 * @access  Public (rate limited)
 */
router.post('/register', authRateLimiter, authController.register);

/**
 * @route   POST /api/v1/auth/login
 * @access  Public (rate limited)
 */
router.post('/login', authRateLimiter, authController.login);

/**
 * @route   GET /api/v1/auth/me
 * @desc    Get current user info
 * @access  Private
 */
router.get('/me', authMiddleware, authController.getCurrentUser);

export { router as authRouter };
