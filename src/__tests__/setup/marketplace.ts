/**
 * =============================================================================
 * TEST FIXTURES - Fresh in-memory marketplace per test
 * =============================================================================
 */

import { DatabaseService } from '../../shared/database/db';
import { LoadTerms } from '../../shared/database/repository.interface';
import type { Actor, UserRole } from '../../shared/types/api.types';
import { AssignmentEngine } from '../../modules/assignment/assignment.engine';
import { BidLedger } from '../../modules/bid/bid.ledger';
import { LoadRepository } from '../../modules/load/load.repository';
import { MessagingChannel } from '../../modules/message/message.channel';
import { SavedLoadService } from '../../modules/saved-load/saved-load.service';
import { UserService } from '../../modules/user/user.service';

export function createMarketplace() {
  const database = new DatabaseService({ filePath: null });
  const users = new UserService(database);
  const loads = new LoadRepository(database);
  const bids = new BidLedger(database, loads);
  const engine = new AssignmentEngine(database, loads, bids);
  const messages = new MessagingChannel(database, bids);
  const savedLoads = new SavedLoadService(database);

  /**
   * Register a user straight in the store and return their identity
   */
  function actor(role: UserRole, name: string): Actor {
    const user = users.createUser({
      role,
      name,
      email: `${name.toLowerCase()}@example.com`,
      passwordHash: 'not-a-real-hash'
    });
    return { userId: user.id, role: user.role };
  }

  return { database, users, loads, bids, engine, messages, savedLoads, actor };
}

export type Marketplace = ReturnType<typeof createMarketplace>;

export const CHICAGO_TO_DALLAS: LoadTerms = {
  origin: 'Chicago',
  originState: 'IL',
  destination: 'Dallas',
  destinationState: 'TX',
  equipment: 'Dry Van',
  weight: 42000,
  rate: 2500
};
