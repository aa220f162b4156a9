/**
 * =============================================================================
 * ASSIGNMENT ENGINE - Lifecycle, Guards and Atomic Accept
 * =============================================================================
 */

import { LoadRecord } from '../shared/database/db';
import type { Actor } from '../shared/types/api.types';
import {
  AuthorizationError,
  InvalidStateError,
  NotFoundError
} from '../shared/types/error.types';
import { CHICAGO_TO_DALLAS, createMarketplace, Marketplace } from './setup/marketplace';

describe('AssignmentEngine', () => {
  let market: Marketplace;
  let shipper: Actor;
  let otherShipper: Actor;
  let t1: Actor;
  let t2: Actor;
  let admin: Actor;

  beforeEach(() => {
    market = createMarketplace();
    shipper = market.actor('shipper', 'Sam');
    otherShipper = market.actor('shipper', 'Sue');
    t1 = market.actor('trucker', 'Tom');
    t2 = market.actor('trucker', 'Tia');
    admin = market.actor('admin', 'Ada');
  });

  async function post(): Promise<LoadRecord> {
    return market.engine.postLoad(shipper, CHICAGO_TO_DALLAS);
  }

  async function assignedLoad(): Promise<LoadRecord> {
    const load = await post();
    const bid = await market.engine.placeBid(load.id, t1, { amount: 2400 });
    const { load: assigned } = await market.engine.acceptBid(load.id, bid.id, shipper);
    return assigned;
  }

  // ===========================================================================
  // POSTING AND BIDDING
  // ===========================================================================

  describe('postLoad', () => {
    it('lets shippers and admins post', async () => {
      await expect(market.engine.postLoad(shipper, CHICAGO_TO_DALLAS)).resolves.toMatchObject({ status: 'open' });
      await expect(market.engine.postLoad(admin, CHICAGO_TO_DALLAS)).resolves.toMatchObject({
        shipperId: admin.userId
      });
    });

    it('refuses truckers', async () => {
      await expect(market.engine.postLoad(t1, CHICAGO_TO_DALLAS)).rejects.toThrow(AuthorizationError);
      expect(market.database.getStats().loads).toBe(0);
    });
  });

  describe('placeBid', () => {
    it('accepts bids from truckers only', async () => {
      const load = await post();

      await expect(market.engine.placeBid(load.id, t1, { amount: 2400 })).resolves.toMatchObject({
        truckerId: t1.userId,
        status: 'pending'
      });
      await expect(market.engine.placeBid(load.id, shipper, { amount: 2400 })).rejects.toThrow(AuthorizationError);
      await expect(market.engine.placeBid(load.id, admin, { amount: 2400 })).rejects.toThrow(AuthorizationError);
    });

    it('refuses bids once the load is assigned', async () => {
      const load = await assignedLoad();
      await expect(market.engine.placeBid(load.id, t2, { amount: 2000 })).rejects.toThrow(InvalidStateError);
    });
  });

  // ===========================================================================
  // ACCEPT
  // ===========================================================================

  describe('acceptBid', () => {
    it('assigns the chosen trucker and rejects the other bids', async () => {
      const load = await post();
      const bid1 = await market.engine.placeBid(load.id, t1, { amount: 500 });
      const bid2 = await market.engine.placeBid(load.id, t2, { amount: 450 });

      const result = await market.engine.acceptBid(load.id, bid2.id, shipper);

      expect(result.load.status).toBe('assigned');
      expect(result.load.assignedTruckerId).toBe(t2.userId);
      expect(result.bid.status).toBe('accepted');
      expect(result.rejectedBids).toBe(1);

      expect(market.loads.get(load.id)).toMatchObject({ status: 'assigned', assignedTruckerId: t2.userId });
      expect(market.bids.get(bid2.id).status).toBe('accepted');
      expect(market.bids.get(bid1.id).status).toBe('rejected');
    });

    it('is not repeatable', async () => {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 500 });

      await market.engine.acceptBid(load.id, bid.id, shipper);
      await expect(market.engine.acceptBid(load.id, bid.id, shipper)).rejects.toThrow(InvalidStateError);
    });

    it('lets exactly one of two concurrent accepts win', async () => {
      const load = await post();
      const bid1 = await market.engine.placeBid(load.id, t1, { amount: 500 });
      const bid2 = await market.engine.placeBid(load.id, t2, { amount: 450 });

      const outcomes = await Promise.allSettled([
        market.engine.acceptBid(load.id, bid1.id, shipper),
        market.engine.acceptBid(load.id, bid2.id, shipper)
      ]);

      const fulfilled = outcomes.filter(o => o.status === 'fulfilled');
      const rejected = outcomes.flatMap(o => (o.status === 'rejected' ? [o.reason] : []));
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(InvalidStateError);

      const accepted = market.bids.listForLoad(load.id).filter(b => b.status === 'accepted');
      expect(accepted).toHaveLength(1);
      expect(market.loads.get(load.id).assignedTruckerId).toBe(accepted[0].truckerId);
    });

    it('serializes a cancel racing an accept', async () => {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 500 });

      const [accept, cancel] = await Promise.allSettled([
        market.engine.acceptBid(load.id, bid.id, shipper),
        market.engine.cancelLoad(load.id, shipper)
      ]);

      // The accept commits first; the cancel then finds an assigned load and
      // is a legal assigned → cancelled step.
      expect(accept.status).toBe('fulfilled');
      expect(cancel.status).toBe('fulfilled');
      expect(market.loads.get(load.id)).toMatchObject({ status: 'cancelled', assignedTruckerId: null });
      expect(market.bids.get(bid.id).status).toBe('accepted');
    });

    it('refuses a non-owner and changes nothing', async () => {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 500 });

      await expect(market.engine.acceptBid(load.id, bid.id, otherShipper)).rejects.toThrow(AuthorizationError);
      await expect(market.engine.acceptBid(load.id, bid.id, t1)).rejects.toThrow(AuthorizationError);

      expect(market.loads.get(load.id).status).toBe('open');
      expect(market.bids.get(bid.id).status).toBe('pending');
    });

    it('lets an admin accept on the owner\'s behalf', async () => {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 500 });

      const result = await market.engine.acceptBid(load.id, bid.id, admin);
      expect(result.load.assignedTruckerId).toBe(t1.userId);
    });

    it('treats a bid from another load as not found', async () => {
      const load = await post();
      const other = await post();
      const foreign = await market.engine.placeBid(other.id, t1, { amount: 500 });

      await expect(market.engine.acceptBid(load.id, foreign.id, shipper)).rejects.toThrow(NotFoundError);
      expect(market.bids.get(foreign.id).status).toBe('pending');
    });

    it('refuses a withdrawn bid and leaves the load open', async () => {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 500 });
      await market.engine.withdrawBid(bid.id, t1);

      await expect(market.engine.acceptBid(load.id, bid.id, shipper)).rejects.toThrow(InvalidStateError);
      expect(market.loads.get(load.id)).toMatchObject({ status: 'open', assignedTruckerId: null });
    });
  });

  // ===========================================================================
  // REJECT / WITHDRAW
  // ===========================================================================

  describe('rejectBid', () => {
    it('turns down one bid and keeps the load open', async () => {
      const load = await post();
      const bid1 = await market.engine.placeBid(load.id, t1, { amount: 500 });
      const bid2 = await market.engine.placeBid(load.id, t2, { amount: 450 });

      await expect(market.engine.rejectBid(bid1.id, shipper)).resolves.toMatchObject({ status: 'rejected' });
      expect(market.bids.get(bid2.id).status).toBe('pending');
      expect(market.loads.get(load.id).status).toBe('open');
    });

    it('refuses the bidder', async () => {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 500 });

      await expect(market.engine.rejectBid(bid.id, t1)).rejects.toThrow(AuthorizationError);
    });
  });

  describe('withdrawBid', () => {
    it('refuses once the load is terminal, even for an admin', async () => {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 500 });
      await market.engine.cancelLoad(load.id, shipper);

      await expect(market.engine.withdrawBid(bid.id, admin)).rejects.toThrow(InvalidStateError);
    });
  });

  // ===========================================================================
  // CANCEL AND DELIVERY
  // ===========================================================================

  describe('cancelLoad', () => {
    it('rejects pending bids when an open load is cancelled', async () => {
      const load = await post();
      const bid1 = await market.engine.placeBid(load.id, t1, { amount: 500 });
      const bid2 = await market.engine.placeBid(load.id, t2, { amount: 450 });

      const result = await market.engine.cancelLoad(load.id, shipper);

      expect(result.load.status).toBe('cancelled');
      expect(result.rejectedBids).toBe(2);
      expect(market.bids.get(bid1.id).status).toBe('rejected');
      expect(market.bids.get(bid2.id).status).toBe('rejected');
    });

    it('releases the trucker of an assigned load', async () => {
      const load = await assignedLoad();
      const result = await market.engine.cancelLoad(load.id, shipper);

      expect(result.load).toMatchObject({ status: 'cancelled', assignedTruckerId: null });
      expect(result.rejectedBids).toBe(0);
    });

    it('refuses another shipper and leaves the status unchanged', async () => {
      const load = await post();

      await expect(market.engine.cancelLoad(load.id, otherShipper)).rejects.toThrow(AuthorizationError);
      expect(market.loads.get(load.id).status).toBe('open');
    });

    it('refuses once the load is in transit', async () => {
      const load = await assignedLoad();
      await market.engine.advanceToInTransit(load.id, t1);

      await expect(market.engine.cancelLoad(load.id, shipper)).rejects.toThrow(InvalidStateError);
    });

    it('throws NotFoundError for an unknown load', async () => {
      await expect(market.engine.cancelLoad('missing', shipper)).rejects.toThrow(NotFoundError);
    });
  });

  describe('advanceToInTransit', () => {
    it('lets the assigned trucker pick up', async () => {
      const load = await assignedLoad();
      await expect(market.engine.advanceToInTransit(load.id, t1)).resolves.toMatchObject({
        status: 'in_transit',
        assignedTruckerId: t1.userId
      });
    });

    it('refuses the shipper and other truckers', async () => {
      const load = await assignedLoad();
      await expect(market.engine.advanceToInTransit(load.id, shipper)).rejects.toThrow(AuthorizationError);
      await expect(market.engine.advanceToInTransit(load.id, t2)).rejects.toThrow(AuthorizationError);
    });

    it('refuses an open load', async () => {
      const load = await post();
      await expect(market.engine.advanceToInTransit(load.id, admin)).rejects.toThrow(InvalidStateError);
    });
  });

  describe('markComplete', () => {
    it('lets the owner or the assigned trucker deliver', async () => {
      const first = await assignedLoad();
      await market.engine.advanceToInTransit(first.id, t1);
      await expect(market.engine.markComplete(first.id, shipper)).resolves.toMatchObject({ status: 'completed' });

      const second = await assignedLoad();
      await market.engine.advanceToInTransit(second.id, t1);
      await expect(market.engine.markComplete(second.id, t1)).resolves.toMatchObject({
        status: 'completed',
        assignedTruckerId: t1.userId
      });
    });

    it('refuses an assigned load that has not been picked up', async () => {
      const load = await assignedLoad();
      await expect(market.engine.markComplete(load.id, shipper)).rejects.toThrow(InvalidStateError);
    });
  });

  // ===========================================================================
  // TERMINAL STATES
  // ===========================================================================

  describe('terminal loads', () => {
    interface TerminalLoad {
      load: LoadRecord;
      bidId: string;
    }

    async function completedLoad(): Promise<TerminalLoad> {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 2400 });
      await market.engine.acceptBid(load.id, bid.id, shipper);
      await market.engine.advanceToInTransit(load.id, t1);
      return { load: await market.engine.markComplete(load.id, t1), bidId: bid.id };
    }

    async function cancelledLoad(): Promise<TerminalLoad> {
      const load = await post();
      const bid = await market.engine.placeBid(load.id, t1, { amount: 2400 });
      return { load: (await market.engine.cancelLoad(load.id, shipper)).load, bidId: bid.id };
    }

    it.each([
      ['completed', completedLoad],
      ['cancelled', cancelledLoad]
    ])('refuse every transition from %s, whoever asks', async (_status, make) => {
      const { load, bidId } = await make();
      const bidBefore = market.bids.get(bidId);

      for (const actor of [shipper, otherShipper, t1, t2, admin]) {
        await expect(market.engine.cancelLoad(load.id, actor)).rejects.toThrow(InvalidStateError);
        await expect(market.engine.advanceToInTransit(load.id, actor)).rejects.toThrow(InvalidStateError);
        await expect(market.engine.markComplete(load.id, actor)).rejects.toThrow(InvalidStateError);
        await expect(market.engine.placeBid(load.id, actor, { amount: 100 })).rejects.toThrow(InvalidStateError);
        await expect(market.engine.updateLoadTerms(load.id, actor, { rate: 100 })).rejects.toThrow(InvalidStateError);
        await expect(market.engine.acceptBid(load.id, bidId, actor)).rejects.toThrow(InvalidStateError);
        await expect(market.engine.rejectBid(bidId, actor)).rejects.toThrow(InvalidStateError);
        await expect(market.engine.withdrawBid(bidId, actor)).rejects.toThrow(InvalidStateError);
      }

      expect(market.loads.get(load.id).status).toBe(load.status);
      expect(market.bids.get(bidId)).toEqual(bidBefore);
    });
  });
});
