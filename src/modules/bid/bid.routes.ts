/**
 * =============================================================================
 * BID MODULE - ROUTES
 * =============================================================================
 *
 * Two routers:
 * - loadBidsRouter, mounted at /loads/:id/bids (list, place, accept)
 * - bidRouter, mounted at /bids (withdraw, reject)
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware, getActor, roleGuard } from '../../shared/middleware/auth.middleware';
import { successResponse } from '../../shared/types/api.types';
import { validateSchema } from '../../shared/utils/validation.utils';
import { assignmentEngine } from '../assignment/assignment.engine';
import { loadRepository } from '../load/load.repository';
import { bidLedger } from './bid.ledger';
import { listBidsQuerySchema, placeBidSchema } from './bid.schema';

const loadBidsRouter = Router({ mergeParams: true });
const bidRouter = Router();

/**
 * Load id from the parent mount path
 */
function loadIdParam(req: Request): string {
  return String(req.params.id);
}

// =============================================================================
// BIDS ON A LOAD
// =============================================================================

/**
 * @route   GET /loads/:id/bids
 * @desc    Bids on a load, lowest amount first. `?status=pending` narrows the list.
 * @access  Public
 */
loadBidsRouter.get('/', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { status } = validateSchema(listBidsQuerySchema, req.query, 'Invalid query parameters');
    const load = loadRepository.get(loadIdParam(req));
    const bids = bidLedger.listForLoad(load.id);
    res.json(successResponse(status ? bids.filter(b => b.status === status) : bids));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   POST /loads/:id/bids
 * @desc    Place a bid. Replaces the trucker's earlier pending bid on this load.
 * @access  Trucker only
 */
loadBidsRouter.post(
  '/',
  authMiddleware,
  roleGuard(['trucker']),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const offer = validateSchema(placeBidSchema, req.body, 'Invalid bid');
      const bid = await assignmentEngine.placeBid(loadIdParam(req), getActor(req), offer);
      res.status(201).json(successResponse(bid));
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   POST /loads/:id/bids/:bidId/accept
 * @desc    Accept a bid and assign its trucker; sibling bids are rejected
 * @access  Owner, Admin
 */
loadBidsRouter.post('/:bidId/accept', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await assignmentEngine.acceptBid(loadIdParam(req), req.params.bidId, getActor(req));
    res.json(successResponse(result));
  } catch (error) {
    next(error);
  }
});

// =============================================================================
// SINGLE BID ACTIONS
// =============================================================================

/**
 * @route   POST /bids/:id/withdraw
 * @desc    Withdraw a pending bid
 * @access  Bidding trucker, Admin
 */
bidRouter.post('/:id/withdraw', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const bid = await assignmentEngine.withdrawBid(req.params.id, getActor(req));
    res.json(successResponse(bid));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   POST /bids/:id/reject
 * @desc    Turn down one pending bid; the load stays open
 * @access  Load owner, Admin
 */
bidRouter.post('/:id/reject', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const bid = await assignmentEngine.rejectBid(req.params.id, getActor(req));
    res.json(successResponse(bid));
  } catch (error) {
    next(error);
  }
});

export { loadBidsRouter, bidRouter };
