/**
 * =============================================================================
 * BID MODULE - LEDGER
 * =============================================================================
 *
 * Owns bids against loads. Bids are never deleted: every bid ends in one of
 * accepted / rejected / withdrawn and stays as the audit trail.
 *
 * Every write takes the caller's transaction. The Assignment Engine is the
 * only caller that opens one.
 * =============================================================================
 */

import { v4 as uuid } from 'uuid';
import { BidRecord, db, DatabaseService, Tables } from '../../shared/database/db';
import { IBidLedger, ILoadRepository } from '../../shared/database/repository.interface';
import {
  AuthorizationError,
  InvalidStateError,
  NotFoundError
} from '../../shared/types/error.types';
import type { Actor, BidStatus } from '../../shared/types/api.types';
import { validateSchema } from '../../shared/utils/validation.utils';
import { loadRepository } from '../load/load.repository';
import { placeBidSchema } from './bid.schema';

/** Bids that still count as a trucker's live offer or win */
const ACTIVE_BID_STATUSES: ReadonlySet<BidStatus> = new Set<BidStatus>(['pending', 'accepted']);

/**
 * Cheapest first, then earliest. Display order only.
 */
export function rankBids(bids: BidRecord[]): BidRecord[] {
  return bids.sort((a, b) => a.amount - b.amount || a.createdAt.localeCompare(b.createdAt));
}

function newestFirst(bids: BidRecord[]): BidRecord[] {
  return bids.reverse().sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export class BidLedger implements IBidLedger {
  constructor(
    private readonly db: DatabaseService,
    private readonly loads: ILoadRepository
  ) {}

  // ==========================================================================
  // WRITES (inside the caller's transaction)
  // ==========================================================================

  /**
   * Place a bid on an open load. A pending bid the same trucker already has
   * on this load is withdrawn in the same transaction.
   */
  place(tx: Tables, loadId: string, truckerId: string, amount: number, message?: string): BidRecord {
    const offer = validateSchema(placeBidSchema, { amount, message }, 'Invalid bid');
    const load = this.loads.findIn(tx, loadId);

    if (load.status !== 'open') {
      throw new InvalidStateError(`Load is ${load.status} and no longer accepts bids`, { loadId });
    }

    const now = new Date().toISOString();

    for (const prior of tx.bids) {
      if (prior.loadId === loadId && prior.truckerId === truckerId && prior.status === 'pending') {
        prior.status = 'withdrawn';
        prior.updatedAt = now;
      }
    }

    const bid: BidRecord = {
      id: uuid(),
      loadId,
      truckerId,
      amount: offer.amount,
      ...(offer.message ? { message: offer.message } : {}),
      status: 'pending',
      createdAt: now,
      updatedAt: now
    };
    tx.bids.push(bid);
    return bid;
  }

  /**
   * Bidding trucker (or admin) pulls a pending bid
   */
  withdraw(tx: Tables, bidId: string, actor: Actor): BidRecord {
    const bid = this.findIn(tx, bidId);

    if (actor.role !== 'admin' && actor.userId !== bid.truckerId) {
      throw new AuthorizationError('Only the trucker who placed this bid can withdraw it');
    }

    return this.transition(bid, 'withdrawn');
  }

  markAccepted(tx: Tables, bidId: string): BidRecord {
    const bid = this.findIn(tx, bidId);
    const alreadyAccepted = tx.bids.some(b => b.loadId === bid.loadId && b.status === 'accepted');
    if (alreadyAccepted) {
      throw new InvalidStateError('This load already has an accepted bid', { loadId: bid.loadId });
    }
    return this.transition(bid, 'accepted');
  }

  reject(tx: Tables, bidId: string): BidRecord {
    return this.transition(this.findIn(tx, bidId), 'rejected');
  }

  /**
   * Reject every pending bid on the load except the accepted one
   */
  rejectOthers(tx: Tables, loadId: string, acceptedBidId: string): number {
    return this.rejectPending(tx, loadId, bid => bid.id !== acceptedBidId);
  }

  rejectAllPending(tx: Tables, loadId: string): number {
    return this.rejectPending(tx, loadId, () => true);
  }

  private rejectPending(tx: Tables, loadId: string, include: (bid: BidRecord) => boolean): number {
    const now = new Date().toISOString();
    let rejected = 0;
    for (const bid of tx.bids) {
      if (bid.loadId === loadId && bid.status === 'pending' && include(bid)) {
        bid.status = 'rejected';
        bid.updatedAt = now;
        rejected++;
      }
    }
    return rejected;
  }

  /**
   * Only pending bids move, and only once
   */
  private transition(bid: BidRecord, next: BidStatus): BidRecord {
    if (bid.status !== 'pending') {
      throw new InvalidStateError(`Bid is ${bid.status}, not pending`, { bidId: bid.id });
    }
    bid.status = next;
    bid.updatedAt = new Date().toISOString();
    return bid;
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  findIn(tx: Tables, bidId: string): BidRecord {
    const bid = tx.bids.find(b => b.id === bidId);
    if (!bid) {
      throw new NotFoundError('Bid');
    }
    return bid;
  }

  get(bidId: string): BidRecord {
    const bid = this.db.read(tables => tables.bids.find(b => b.id === bidId));
    if (!bid) {
      throw new NotFoundError('Bid');
    }
    return bid;
  }

  listForLoad(loadId: string): BidRecord[] {
    return rankBids(this.db.read(tables => tables.bids.filter(b => b.loadId === loadId)));
  }

  listByTrucker(truckerId: string): BidRecord[] {
    return newestFirst(this.db.read(tables => tables.bids.filter(b => b.truckerId === truckerId)));
  }

  /**
   * Bids on every load the shipper owns
   */
  listForShipper(shipperId: string): BidRecord[] {
    return newestFirst(this.db.read(tables => {
      const owned = new Set(tables.loads.filter(l => l.shipperId === shipperId).map(l => l.id));
      return tables.bids.filter(b => owned.has(b.loadId));
    }));
  }

  listRecent(limit: number): BidRecord[] {
    return newestFirst(this.db.read(tables => [...tables.bids])).slice(0, limit);
  }

  hasActiveBid(tables: Readonly<Tables>, loadId: string, truckerId: string): boolean {
    return tables.bids.some(b =>
      b.loadId === loadId && b.truckerId === truckerId && ACTIVE_BID_STATUSES.has(b.status)
    );
  }
}

export const bidLedger = new BidLedger(db, loadRepository);
