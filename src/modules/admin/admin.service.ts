/**
 * =============================================================================
 * ADMIN MODULE - SERVICE
 * =============================================================================
 */

import { db, DatabaseService } from '../../shared/database/db';
import { PublicUser, userService, UserService } from '../user/user.service';

const RECENT_USERS_LIMIT = 20;

export interface PlatformStats {
  users: number;
  loads: number;
  openLoads: number;
  bids: number;
}

export interface AdminOverview {
  stats: PlatformStats & { shippers: number; truckers: number; messages: number };
  recentUsers: PublicUser[];
}

export class AdminService {
  constructor(
    private readonly db: DatabaseService,
    private readonly users: UserService
  ) {}

  /**
   * Public headline numbers
   */
  getStats(): PlatformStats {
    const { users, loads, openLoads, bids } = this.db.getStats();
    return { users, loads, openLoads, bids };
  }

  getOverview(): AdminOverview {
    const { dbPath: _dbPath, ...stats } = this.db.getStats();
    return {
      stats,
      recentUsers: this.users.listRecent(RECENT_USERS_LIMIT)
    };
  }
}

export const adminService = new AdminService(db, userService);
