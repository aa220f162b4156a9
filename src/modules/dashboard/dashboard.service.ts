/**
 * =============================================================================
 * DASHBOARD MODULE - SERVICE
 * =============================================================================
 *
 * Per-role landing data:
 * - shipper: own loads + bids received on them
 * - trucker: loads assigned to them + their own bids
 * - admin:   latest loads and bids platform-wide
 * =============================================================================
 */

import { BidRecord, LoadRecord } from '../../shared/database/db';
import { IBidLedger, ILoadRepository } from '../../shared/database/repository.interface';
import type { Actor } from '../../shared/types/api.types';
import { bidLedger } from '../bid/bid.ledger';
import { loadRepository } from '../load/load.repository';

const ADMIN_RECENT_LIMIT = 10;

export interface Dashboard {
  role: Actor['role'];
  loads: LoadRecord[];
  bids: BidRecord[];
}

export class DashboardService {
  constructor(
    private readonly loads: ILoadRepository,
    private readonly bids: IBidLedger
  ) {}

  async getDashboard(actor: Actor): Promise<Dashboard> {
    switch (actor.role) {
      case 'shipper':
        return {
          role: actor.role,
          loads: this.loads.listByShipper(actor.userId),
          bids: this.bids.listForShipper(actor.userId)
        };
      case 'trucker':
        return {
          role: actor.role,
          loads: this.loads.listByTrucker(actor.userId),
          bids: this.bids.listByTrucker(actor.userId)
        };
      case 'admin':
        return {
          role: actor.role,
          loads: this.loads.listRecent(ADMIN_RECENT_LIMIT),
          bids: this.bids.listRecent(ADMIN_RECENT_LIMIT)
        };
    }
  }
}

export const dashboardService = new DashboardService(loadRepository, bidLedger);
