/**
 * =============================================================================
 * DATABASE SERVICE - Transactional JSON Document Store
 * =============================================================================
 *
 * Holds every table of the load board in memory and, when a data file is
 * configured, persists committed state to disk as JSON.
 *
 * TRANSACTIONS:
 * - transaction(work) runs `work` against a draft copy of the tables
 * - The draft replaces the live tables only if `work` returns normally
 * - `work` is synchronous, so no other request can interleave between a
 *   check and the write that depends on it
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { config } from '../../config/environment';
import { logger } from '../services/logger.service';
import type { BidStatus, LoadStatus, UserRole } from '../types/api.types';

// =============================================================================
// RECORDS
// =============================================================================

export interface UserRecord {
  id: string;
  role: UserRole;
  name: string;
  email: string;
  passwordHash: string;
  company?: string;
  phone?: string;
  mcNumber?: string;   // Motor carrier / DOT number (truckers)
  createdAt: string;
  updatedAt: string;
}

export interface LoadRecord {
  id: string;
  shipperId: string;
  title: string;
  origin: string;
  originState?: string;
  pickupDate?: string;
  destination: string;
  destinationState?: string;
  deliveryDate?: string;
  cargoDescription?: string;
  weight?: number;      // lbs
  equipment?: string;   // Dry Van / Reefer / Flatbed ...
  rate: number;
  notes?: string;
  status: LoadStatus;
  assignedTruckerId: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface BidRecord {
  id: string;
  loadId: string;
  truckerId: string;
  amount: number;
  message?: string;
  status: BidStatus;
  createdAt: string;
  updatedAt: string;
}

export interface MessageRecord {
  id: string;
  loadId: string;
  senderId: string;
  recipientId: string;
  body: string;
  createdAt: string;
}

export interface SavedLoadRecord {
  id: string;
  userId: string;
  loadId: string;
  createdAt: string;
}

/**
 * Every table. Transactions receive a draft of this shape.
 */
export interface Tables {
  users: UserRecord[];
  loads: LoadRecord[];
  bids: BidRecord[];
  messages: MessageRecord[];
  savedLoads: SavedLoadRecord[];
}

export interface Database extends Tables {
  _meta: {
    version: string;
    lastUpdated: string;
  };
}

export interface DatabaseStats {
  users: number;
  shippers: number;
  truckers: number;
  loads: number;
  openLoads: number;
  bids: number;
  messages: number;
  dbPath: string | null;
}

export interface DatabaseOptions {
  /** JSON file to load from and persist to; null keeps everything in memory */
  filePath: string | null;
  /** Debounce for disk writes after a commit */
  saveDebounceMs?: number;
}

function emptyDatabase(): Database {
  return {
    users: [],
    loads: [],
    bids: [],
    messages: [],
    savedLoads: [],
    _meta: {
      version: '1.0.0',
      lastUpdated: new Date().toISOString()
    }
  };
}

/**
 * Database class - owns the tables and the commit protocol
 */
export class DatabaseService {
  private data: Database;
  private readonly filePath: string | null;
  private readonly saveDebounceMs: number;
  private saveTimeout: NodeJS.Timeout | null = null;

  constructor(options: DatabaseOptions) {
    this.filePath = options.filePath;
    this.saveDebounceMs = options.saveDebounceMs ?? 100;
    this.data = this.load();
  }

  /**
   * Load database from file (or start empty)
   */
  private load(): Database {
    if (!this.filePath) {
      return emptyDatabase();
    }

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info(`Created database directory: ${dir}`);
    }

    if (!fs.existsSync(this.filePath)) {
      const fresh = emptyDatabase();
      this.saveSync(fresh);
      return fresh;
    }

    const raw = fs.readFileSync(this.filePath, 'utf-8');
    const parsed: Database = { ...emptyDatabase(), ...JSON.parse(raw) };
    logger.info(`Database loaded from ${this.filePath}`, {
      users: parsed.users.length,
      loads: parsed.loads.length,
      bids: parsed.bids.length
    });
    return parsed;
  }

  /**
   * Save database to file (debounced)
   */
  private scheduleSave(): void {
    if (!this.filePath) return;

    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.saveSync(this.data);
    }, this.saveDebounceMs);
  }

  /**
   * Synchronous save
   */
  private saveSync(data: Database): void {
    if (!this.filePath) return;
    try {
      data._meta.lastUpdated = new Date().toISOString();
      fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2));
    } catch (error) {
      logger.error('Failed to save database', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  /**
   * Write any pending changes now (used on shutdown)
   */
  flush(): void {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    this.saveSync(this.data);
  }

  // ==========================================================================
  // TRANSACTIONS
  // ==========================================================================

  /**
   * Run `work` atomically. Every write `work` makes lands together,
   * or none does if it throws.
   */
  transaction<T>(work: (tx: Tables) => T): T {
    const draft: Database = structuredClone(this.data);
    const result = work(draft);
    this.data = draft;
    this.scheduleSave();
    return structuredClone(result);
  }

  /**
   * Read committed state. The result is a copy; mutating it has no effect.
   */
  read<T>(query: (tables: Readonly<Tables>) => T): T {
    return structuredClone(query(this.data));
  }

  // ==========================================================================
  // UTILITY
  // ==========================================================================

  /**
   * Get database stats
   */
  getStats(): DatabaseStats {
    return {
      users: this.data.users.length,
      shippers: this.data.users.filter(u => u.role === 'shipper').length,
      truckers: this.data.users.filter(u => u.role === 'trucker').length,
      loads: this.data.loads.length,
      openLoads: this.data.loads.filter(l => l.status === 'open').length,
      bids: this.data.bids.length,
      messages: this.data.messages.length,
      dbPath: this.filePath
    };
  }
}

// Export singleton instance
export const db = new DatabaseService({
  filePath: config.database.file,
  saveDebounceMs: config.database.saveDebounceMs
});
