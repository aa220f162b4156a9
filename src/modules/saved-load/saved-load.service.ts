/**
 * =============================================================================
 * SAVED LOAD MODULE - SERVICE
 * =============================================================================
 *
 * Bookmarks: a (user, load) pair with no lifecycle beyond create/delete.
 * =============================================================================
 */

import { v4 as uuid } from 'uuid';
import { db, DatabaseService, LoadRecord } from '../../shared/database/db';
import { NotFoundError } from '../../shared/types/error.types';
import type { Actor } from '../../shared/types/api.types';

export interface SavedLoadToggle {
  loadId: string;
  saved: boolean;
}

export class SavedLoadService {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Save the load if it is not saved yet, otherwise remove the bookmark
   */
  async toggle(actor: Actor, loadId: string): Promise<SavedLoadToggle> {
    return this.db.transaction(tx => {
      if (!tx.loads.some(l => l.id === loadId)) {
        throw new NotFoundError('Load');
      }

      const index = tx.savedLoads.findIndex(s => s.userId === actor.userId && s.loadId === loadId);
      if (index >= 0) {
        tx.savedLoads.splice(index, 1);
        return { loadId, saved: false };
      }

      tx.savedLoads.push({
        id: uuid(),
        userId: actor.userId,
        loadId,
        createdAt: new Date().toISOString()
      });
      return { loadId, saved: true };
    });
  }

  /**
   * The actor's saved loads, most recently saved first
   */
  async list(actor: Actor): Promise<LoadRecord[]> {
    return this.db.read(tables => {
      const bookmarks = tables.savedLoads
        .filter(s => s.userId === actor.userId)
        .reverse()
        .sort((a, b) => b.createdAt.localeCompare(a.createdAt));

      const loads: LoadRecord[] = [];
      for (const bookmark of bookmarks) {
        const load = tables.loads.find(l => l.id === bookmark.loadId);
        if (load) loads.push(load);
      }
      return loads;
    });
  }
}

export const savedLoadService = new SavedLoadService(db);
