/**
 * =============================================================================
 * LOAD MODULE - ROUTES
 * =============================================================================
 *
 * Load board search and the load lifecycle. Every state change is handed
 * to the Assignment Engine; these handlers only parse and respond.
 *
 * Endpoints:
 * GET   /loads                  - Search the board (public)
 * POST  /loads                  - Post a load (shipper, admin)
 * GET   /loads/:id              - Load detail with ranked bids (public)
 * PATCH /loads/:id              - Change terms while open
 * POST  /loads/:id/cancel       - Cancel (owner, admin)
 * POST  /loads/:id/in-transit   - Pick up (assigned trucker, admin)
 * POST  /loads/:id/complete     - Deliver (owner, assigned trucker, admin)
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware, getActor, roleGuard } from '../../shared/middleware/auth.middleware';
import { successResponse } from '../../shared/types/api.types';
import { validateSchema } from '../../shared/utils/validation.utils';
import { assignmentEngine } from '../assignment/assignment.engine';
import { bidLedger } from '../bid/bid.ledger';
import { loadRepository } from './load.repository';
import { createLoadSchema, searchLoadsQuerySchema, updateLoadTermsSchema } from './load.schema';

const router = Router();

// =============================================================================
// PUBLIC ROUTES (No auth required)
// =============================================================================

/**
 * @route   GET /loads
 * @desc    Search loads. Defaults to open loads, newest first.
 * @access  Public
 */
router.get('/', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, limit, status = 'open', ...filters } = validateSchema(
      searchLoadsQuerySchema,
      req.query,
      'Invalid search parameters'
    );
    const result = loadRepository.search({ ...filters, status }, { page, limit });

    res.json(successResponse(result.items, {
      page: result.page,
      limit: result.limit,
      total: result.total,
      hasMore: result.hasMore
    }));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   GET /loads/:id
 * @desc    Load detail with its bids, lowest first
 * @access  Public
 */
router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
  try {
    const load = loadRepository.get(req.params.id);
    const bids = bidLedger.listForLoad(load.id);
    res.json(successResponse({ load, bids }));
  } catch (error) {
    next(error);
  }
});

// =============================================================================
// PROTECTED ROUTES (Auth required)
// =============================================================================

/**
 * @route   POST /loads
 * @desc    Post a new load
 * @access  Shipper, Admin
 */
router.post(
  '/',
  authMiddleware,
  roleGuard(['shipper', 'admin']),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = validateSchema(createLoadSchema, req.body, 'Invalid load');
      const load = await assignmentEngine.postLoad(getActor(req), data);
      res.status(201).json(successResponse(load));
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   PATCH /loads/:id
 * @desc    Change the terms of an open load
 * @access  Owner, Admin
 */
router.patch('/:id', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = validateSchema(updateLoadTermsSchema, req.body, 'Invalid load');
    const load = await assignmentEngine.updateLoadTerms(req.params.id, getActor(req), data);
    res.json(successResponse(load));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   POST /loads/:id/cancel
 * @desc    Cancel an open or assigned load; pending bids are rejected
 * @access  Owner, Admin
 */
router.post('/:id/cancel', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await assignmentEngine.cancelLoad(req.params.id, getActor(req));
    res.json(successResponse(result));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   POST /loads/:id/in-transit
 * @desc    Mark an assigned load as picked up
 * @access  Assigned trucker, Admin
 */
router.post('/:id/in-transit', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const load = await assignmentEngine.advanceToInTransit(req.params.id, getActor(req));
    res.json(successResponse(load));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   POST /loads/:id/complete
 * @desc    Mark an in-transit load as delivered
 * @access  Owner, Assigned trucker, Admin
 */
router.post('/:id/complete', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const load = await assignmentEngine.markComplete(req.params.id, getActor(req));
    res.json(successResponse(load));
  } catch (error) {
    next(error);
  }
});

export { router as loadRouter };
