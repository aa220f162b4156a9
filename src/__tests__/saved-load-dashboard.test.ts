/**
 * =============================================================================
 * SAVED LOADS, DASHBOARD AND ADMIN - Tests
 * =============================================================================
 */

import { AdminService } from '../modules/admin/admin.service';
import { DashboardService } from '../modules/dashboard/dashboard.service';
import { NotFoundError } from '../shared/types/error.types';
import { CHICAGO_TO_DALLAS, createMarketplace, Marketplace } from './setup/marketplace';

describe('SavedLoadService', () => {
  let market: Marketplace;

  beforeEach(() => {
    market = createMarketplace();
  });

  it('toggles a bookmark on and off', async () => {
    const trucker = market.actor('trucker', 'Tom');
    const load = market.loads.create('owner-1', CHICAGO_TO_DALLAS);

    await expect(market.savedLoads.toggle(trucker, load.id)).resolves.toEqual({ loadId: load.id, saved: true });
    expect((await market.savedLoads.list(trucker)).map(l => l.id)).toEqual([load.id]);

    await expect(market.savedLoads.toggle(trucker, load.id)).resolves.toEqual({ loadId: load.id, saved: false });
    expect(await market.savedLoads.list(trucker)).toEqual([]);
  });

  it('lists the most recent bookmark first', async () => {
    const trucker = market.actor('trucker', 'Tom');
    const first = market.loads.create('owner-1', CHICAGO_TO_DALLAS);
    const second = market.loads.create('owner-1', { ...CHICAGO_TO_DALLAS, origin: 'Denver' });

    await market.savedLoads.toggle(trucker, second.id);
    await market.savedLoads.toggle(trucker, first.id);

    expect((await market.savedLoads.list(trucker)).map(l => l.id)).toEqual([first.id, second.id]);
  });

  it('keeps bookmarks per user', async () => {
    const tom = market.actor('trucker', 'Tom');
    const tia = market.actor('trucker', 'Tia');
    const load = market.loads.create('owner-1', CHICAGO_TO_DALLAS);

    await market.savedLoads.toggle(tom, load.id);
    expect(await market.savedLoads.list(tia)).toEqual([]);
  });

  it('throws NotFoundError for an unknown load', async () => {
    const trucker = market.actor('trucker', 'Tom');
    await expect(market.savedLoads.toggle(trucker, 'missing')).rejects.toThrow(NotFoundError);
  });
});

describe('DashboardService', () => {
  it('shows each role its own slice', async () => {
    const market = createMarketplace();
    const dashboards = new DashboardService(market.loads, market.bids);
    const shipper = market.actor('shipper', 'Sam');
    const trucker = market.actor('trucker', 'Tom');
    const admin = market.actor('admin', 'Ada');

    const won = await market.engine.postLoad(shipper, CHICAGO_TO_DALLAS);
    const other = await market.engine.postLoad(shipper, { ...CHICAGO_TO_DALLAS, origin: 'Denver' });
    const winning = await market.engine.placeBid(won.id, trucker, { amount: 2400 });
    await market.engine.placeBid(other.id, trucker, { amount: 2100 });
    await market.engine.acceptBid(won.id, winning.id, shipper);

    const forShipper = await dashboards.getDashboard(shipper);
    expect(forShipper.role).toBe('shipper');
    expect(forShipper.loads.map(l => l.id)).toEqual([other.id, won.id]);
    expect(forShipper.bids).toHaveLength(2);

    const forTrucker = await dashboards.getDashboard(trucker);
    expect(forTrucker.loads.map(l => l.id)).toEqual([won.id]);
    expect(forTrucker.bids).toHaveLength(2);

    const forAdmin = await dashboards.getDashboard(admin);
    expect(forAdmin.loads).toHaveLength(2);
    expect(forAdmin.bids).toHaveLength(2);
  });
});

describe('AdminService', () => {
  it('reports platform counters and recent users without credentials', async () => {
    const market = createMarketplace();
    const admin = new AdminService(market.database, market.users);
    const shipper = market.actor('shipper', 'Sam');
    market.actor('trucker', 'Tom');
    await market.engine.postLoad(shipper, CHICAGO_TO_DALLAS);

    expect(admin.getStats()).toEqual({ users: 2, loads: 1, openLoads: 1, bids: 0 });

    const overview = admin.getOverview();
    expect(overview.stats).toEqual({
      users: 2,
      shippers: 1,
      truckers: 1,
      loads: 1,
      openLoads: 1,
      bids: 0,
      messages: 0
    });
    expect(overview.recentUsers.map(u => u.name)).toEqual(['Tom', 'Sam']);
    expect(overview.recentUsers[0]).not.toHaveProperty('passwordHash');
  });
});
