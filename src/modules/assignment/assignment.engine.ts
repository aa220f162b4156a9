/**
 * =============================================================================
 * ASSIGNMENT MODULE - ENGINE
 * =============================================================================
 *
 * The single authority for every state-changing load or bid action:
 * post, update terms, bid, withdraw, accept, reject, cancel, pick up,
 * deliver. Route handlers call the engine; they never touch the Load
 * Repository or Bid Ledger write paths themselves.
 *
 * Each operation is one db.transaction(). The guard checks and the writes
 * that depend on them run in the same synchronous block, so the load's
 * status acts as the serialization point: a second accept (or a cancel
 * racing an accept) sees the load is no longer open and fails with
 * InvalidStateError.
 * =============================================================================
 */

import { BidRecord, db, DatabaseService, LoadRecord } from '../../shared/database/db';
import {
  IBidLedger,
  ILoadRepository,
  LoadTerms,
  LoadTermsUpdate
} from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { AuthorizationError, NotFoundError } from '../../shared/types/error.types';
import type { Actor } from '../../shared/types/api.types';
import { bidLedger } from '../bid/bid.ledger';
import { PlaceBidInput } from '../bid/bid.schema';
import { loadRepository } from '../load/load.repository';
import { assertLoadEvent, assertNotTerminal } from './assignment.guards';

export interface AcceptedBid {
  load: LoadRecord;
  bid: BidRecord;
  rejectedBids: number;
}

export interface CancelledLoad {
  load: LoadRecord;
  rejectedBids: number;
}

export class AssignmentEngine {
  constructor(
    private readonly db: DatabaseService,
    private readonly loads: ILoadRepository,
    private readonly bids: IBidLedger
  ) {}

  // ==========================================================================
  // LOAD POSTING
  // ==========================================================================

  async postLoad(actor: Actor, fields: LoadTerms): Promise<LoadRecord> {
    if (actor.role !== 'shipper' && actor.role !== 'admin') {
      throw new AuthorizationError('Only shippers can post loads');
    }

    const load = this.loads.create(actor.userId, fields);
    logger.info(`Load posted: ${load.id}`, { shipperId: actor.userId, rate: load.rate });
    return load;
  }

  async updateLoadTerms(loadId: string, actor: Actor, fields: LoadTermsUpdate): Promise<LoadRecord> {
    const load = this.loads.updateTerms(loadId, actor, fields);
    logger.info(`Load terms updated: ${loadId}`, { actorId: actor.userId });
    return load;
  }

  // ==========================================================================
  // BIDDING
  // ==========================================================================

  async placeBid(loadId: string, actor: Actor, offer: PlaceBidInput): Promise<BidRecord> {
    const bid = this.db.transaction(tx => {
      assertNotTerminal(this.loads.findIn(tx, loadId));
      if (actor.role !== 'trucker') {
        throw new AuthorizationError('Only truckers can bid on loads');
      }
      return this.bids.place(tx, loadId, actor.userId, offer.amount, offer.message);
    });
    logger.info(`Bid placed: ${bid.id} on load ${loadId}`, { truckerId: actor.userId, amount: bid.amount });
    return bid;
  }

  async withdrawBid(bidId: string, actor: Actor): Promise<BidRecord> {
    const bid = this.db.transaction(tx => {
      assertNotTerminal(this.loads.findIn(tx, this.bids.findIn(tx, bidId).loadId));
      return this.bids.withdraw(tx, bidId, actor);
    });
    logger.info(`Bid withdrawn: ${bidId}`, { actorId: actor.userId });
    return bid;
  }

  /**
   * Shipper turns down one pending bid; the load stays open
   */
  async rejectBid(bidId: string, actor: Actor): Promise<BidRecord> {
    const bid = this.db.transaction(tx => {
      const target = this.bids.findIn(tx, bidId);
      assertLoadEvent(this.loads.findIn(tx, target.loadId), actor, 'reject_bid');
      return this.bids.reject(tx, bidId);
    });
    logger.info(`Bid rejected: ${bidId}`, { actorId: actor.userId });
    return bid;
  }

  /**
   * Accept one bid and assign its trucker. All four writes (load status,
   * assigned trucker, bid status, sibling rejections) commit together or
   * not at all.
   */
  async acceptBid(loadId: string, bidId: string, actor: Actor): Promise<AcceptedBid> {
    const result = this.db.transaction(tx => {
      const load = this.loads.findIn(tx, loadId);
      const target = this.bids.findIn(tx, bidId);
      if (target.loadId !== load.id) {
        throw new NotFoundError('Bid');
      }

      assertLoadEvent(load, actor, 'accept_bid');

      const bid = this.bids.markAccepted(tx, bidId);
      const assigned = this.loads.setStatus(tx, loadId, 'assigned', { assignedTruckerId: bid.truckerId });
      const rejectedBids = this.bids.rejectOthers(tx, loadId, bidId);

      return { load: assigned, bid, rejectedBids };
    });

    logger.info(`Bid accepted: ${bidId} — load ${loadId} assigned to ${result.bid.truckerId}`, {
      actorId: actor.userId,
      rejectedBids: result.rejectedBids
    });
    return result;
  }

  // ==========================================================================
  // LOAD LIFECYCLE
  // ==========================================================================

  /**
   * open → cancelled rejects every pending bid.
   * assigned → cancelled releases the trucker; the accepted bid stays on
   * record.
   */
  async cancelLoad(loadId: string, actor: Actor): Promise<CancelledLoad> {
    const result = this.db.transaction(tx => {
      assertLoadEvent(this.loads.findIn(tx, loadId), actor, 'cancel');

      const rejectedBids = this.bids.rejectAllPending(tx, loadId);
      const load = this.loads.setStatus(tx, loadId, 'cancelled', { assignedTruckerId: null });
      return { load, rejectedBids };
    });

    logger.info(`Load cancelled: ${loadId}`, { actorId: actor.userId, rejectedBids: result.rejectedBids });
    return result;
  }

  async advanceToInTransit(loadId: string, actor: Actor): Promise<LoadRecord> {
    const load = this.db.transaction(tx => {
      assertLoadEvent(this.loads.findIn(tx, loadId), actor, 'advance_to_in_transit');
      return this.loads.setStatus(tx, loadId, 'in_transit');
    });
    logger.info(`Load in transit: ${loadId}`, { actorId: actor.userId });
    return load;
  }

  async markComplete(loadId: string, actor: Actor): Promise<LoadRecord> {
    const load = this.db.transaction(tx => {
      assertLoadEvent(this.loads.findIn(tx, loadId), actor, 'mark_complete');
      return this.loads.setStatus(tx, loadId, 'completed');
    });
    logger.info(`Load completed: ${loadId}`, { actorId: actor.userId });
    return load;
  }
}

export const assignmentEngine = new AssignmentEngine(db, loadRepository, bidLedger);
