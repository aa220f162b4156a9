/**
 * =============================================================================
 * LOAD MODULE - REPOSITORY
 * =============================================================================
 *
 * Owns load records and is the only code that writes `status` or
 * `assignedTruckerId`. Status changes go through setStatus(), which the
 * Assignment Engine calls from inside its transactions.
 * =============================================================================
 */

import { v4 as uuid } from 'uuid';
import { db, DatabaseService, LoadRecord, Tables } from '../../shared/database/db';
import {
  ILoadRepository,
  LoadSearchFilters,
  LoadTerms,
  LoadTermsUpdate,
  PageRequest,
  PaginatedResult,
  StatusChange
} from '../../shared/database/repository.interface';
import { AuthorizationError, InvalidStateError, NotFoundError } from '../../shared/types/error.types';
import type { Actor, LoadStatus } from '../../shared/types/api.types';
import { validateSchema } from '../../shared/utils/validation.utils';
import { createLoadSchema, updateLoadTermsSchema } from './load.schema';
import { canTransition, isTerminal, requiresAssignedTrucker } from './load.state-machine';

/**
 * Newest first. Loads created in the same millisecond keep reverse
 * insertion order.
 */
function newestFirst(loads: LoadRecord[]): LoadRecord[] {
  return loads.reverse().sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

function contains(value: string | undefined, needle: string): boolean {
  return (value ?? '').toLowerCase().includes(needle.toLowerCase());
}

/** Title given to a load posted without one */
function routeTitle(origin: string, destination: string): string {
  return `${origin} → ${destination}`;
}

export class LoadRepository implements ILoadRepository {
  constructor(private readonly db: DatabaseService) {}

  // ==========================================================================
  // WRITES
  // ==========================================================================

  create(ownerId: string, fields: LoadTerms): LoadRecord {
    const terms = validateSchema(createLoadSchema, fields, 'Invalid load');
    const now = new Date().toISOString();
    const load: LoadRecord = {
      ...terms,
      id: uuid(),
      shipperId: ownerId,
      title: terms.title ?? routeTitle(terms.origin, terms.destination),
      status: 'open',
      assignedTruckerId: null,
      createdAt: now,
      updatedAt: now
    };

    return this.db.transaction(tx => {
      tx.loads.push(load);
      return load;
    });
  }

  /**
   * Change a load's terms. Owner (or admin) only, open loads only.
   */
  updateTerms(loadId: string, actor: Actor, fields: LoadTermsUpdate): LoadRecord {
    const changes = validateSchema(updateLoadTermsSchema, fields, 'Invalid load terms');

    return this.db.transaction(tx => {
      const load = this.findIn(tx, loadId);

      if (isTerminal(load.status)) {
        throw new InvalidStateError(`Load is ${load.status}; its terms can no longer change`);
      }
      if (actor.role !== 'admin' && actor.userId !== load.shipperId) {
        throw new AuthorizationError('Only the shipper who posted this load can change its terms');
      }
      if (load.status !== 'open') {
        throw new InvalidStateError(`Load terms are locked once the load is ${load.status}`);
      }

      const derivedTitle = load.title === routeTitle(load.origin, load.destination);
      Object.assign(load, changes, { updatedAt: new Date().toISOString() });
      if (derivedTitle && changes.title === undefined) {
        load.title = routeTitle(load.origin, load.destination);
      }
      return load;
    });
  }

  /**
   * Move a load along the adjacency table. Called by the Assignment Engine
   * only, inside its transaction.
   */
  setStatus(tx: Tables, loadId: string, next: LoadStatus, change: StatusChange = {}): LoadRecord {
    const load = this.findIn(tx, loadId);

    if (!canTransition(load.status, next)) {
      throw new InvalidStateError(`Load cannot move from ${load.status} to ${next}`, {
        loadId,
        from: load.status,
        to: next
      });
    }

    const assignedTruckerId = change.assignedTruckerId !== undefined
      ? change.assignedTruckerId
      : load.assignedTruckerId;

    if (requiresAssignedTrucker(next) !== (assignedTruckerId !== null)) {
      throw new InvalidStateError(
        requiresAssignedTrucker(next)
          ? `A ${next} load needs an assigned trucker`
          : `A ${next} load cannot keep an assigned trucker`
      );
    }

    load.status = next;
    load.assignedTruckerId = assignedTruckerId;
    load.updatedAt = new Date().toISOString();
    return load;
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  /**
   * Live record inside a transaction
   */
  findIn(tx: Tables, loadId: string): LoadRecord {
    const load = tx.loads.find(l => l.id === loadId);
    if (!load) {
      throw new NotFoundError('Load');
    }
    return load;
  }

  get(loadId: string): LoadRecord {
    const load = this.db.read(tables => tables.loads.find(l => l.id === loadId));
    if (!load) {
      throw new NotFoundError('Load');
    }
    return load;
  }

  search(filters: LoadSearchFilters, page: PageRequest): PaginatedResult<LoadRecord> {
    const matches = this.db.read(tables => tables.loads.filter(load => {
      if (filters.origin && !contains(load.origin, filters.origin)) return false;
      if (filters.destination && !contains(load.destination, filters.destination)) return false;
      if (filters.equipment && !contains(load.equipment, filters.equipment)) return false;
      if (filters.minRate !== undefined && load.rate < filters.minRate) return false;
      if (filters.maxWeight !== undefined && (load.weight ?? 0) > filters.maxWeight) return false;
      if (filters.status && load.status !== filters.status) return false;
      return true;
    }));

    const ordered = newestFirst(matches);
    const start = (page.page - 1) * page.limit;
    const items = ordered.slice(start, start + page.limit);

    return {
      items,
      total: ordered.length,
      page: page.page,
      limit: page.limit,
      hasMore: start + items.length < ordered.length
    };
  }

  listByShipper(shipperId: string): LoadRecord[] {
    return newestFirst(this.db.read(tables => tables.loads.filter(l => l.shipperId === shipperId)));
  }

  listByTrucker(truckerId: string): LoadRecord[] {
    return newestFirst(this.db.read(tables => tables.loads.filter(l => l.assignedTruckerId === truckerId)));
  }

  listRecent(limit: number): LoadRecord[] {
    return newestFirst(this.db.read(tables => [...tables.loads])).slice(0, limit);
  }
}

export const loadRepository = new LoadRepository(db);
