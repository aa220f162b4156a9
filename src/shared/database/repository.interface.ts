/**
 * =============================================================================
 * REPOSITORY INTERFACES - Storage Contracts of the Workflow Core
 * =============================================================================
 *
 * The Assignment Engine depends on these contracts, not on the concrete
 * JSON store. Methods that take a `tx` run inside a caller's transaction
 * and must not open one of their own.
 * =============================================================================
 */

import type { Actor, LoadStatus } from '../types/api.types';
import type { BidRecord, LoadRecord, Tables } from './db';

/**
 * Pagination request (1-based page)
 */
export interface PageRequest {
  page: number;
  limit: number;
}

/**
 * Pagination result wrapper
 */
export interface PaginatedResult<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  hasMore: boolean;
}

/**
 * Shipper-editable terms of a load
 */
export interface LoadTerms {
  title?: string;
  origin: string;
  originState?: string;
  pickupDate?: string;
  destination: string;
  destinationState?: string;
  deliveryDate?: string;
  cargoDescription?: string;
  weight?: number;
  equipment?: string;
  rate: number;
  notes?: string;
}

export type LoadTermsUpdate = Partial<LoadTerms>;

/**
 * Load search filters
 */
export interface LoadSearchFilters {
  origin?: string;
  destination?: string;
  equipment?: string;
  minRate?: number;
  maxWeight?: number;
  status?: LoadStatus;
}

/**
 * Fields the state machine may change alongside a status transition
 */
export interface StatusChange {
  assignedTruckerId?: string | null;
}

export interface ILoadRepository {
  create(ownerId: string, fields: LoadTerms): LoadRecord;
  get(loadId: string): LoadRecord;
  updateTerms(loadId: string, actor: Actor, fields: LoadTermsUpdate): LoadRecord;
  findIn(tx: Tables, loadId: string): LoadRecord;
  setStatus(tx: Tables, loadId: string, next: LoadStatus, change?: StatusChange): LoadRecord;
  search(filters: LoadSearchFilters, page: PageRequest): PaginatedResult<LoadRecord>;
  listByShipper(shipperId: string): LoadRecord[];
  listByTrucker(truckerId: string): LoadRecord[];
  listRecent(limit: number): LoadRecord[];
}

export interface IBidLedger {
  place(tx: Tables, loadId: string, truckerId: string, amount: number, message?: string): BidRecord;
  withdraw(tx: Tables, bidId: string, actor: Actor): BidRecord;
  findIn(tx: Tables, bidId: string): BidRecord;
  get(bidId: string): BidRecord;
  markAccepted(tx: Tables, bidId: string): BidRecord;
  reject(tx: Tables, bidId: string): BidRecord;
  rejectOthers(tx: Tables, loadId: string, acceptedBidId: string): number;
  rejectAllPending(tx: Tables, loadId: string): number;
  listForLoad(loadId: string): BidRecord[];
  listByTrucker(truckerId: string): BidRecord[];
  listForShipper(shipperId: string): BidRecord[];
  listRecent(limit: number): BidRecord[];
  hasActiveBid(tables: Readonly<Tables>, loadId: string, truckerId: string): boolean;
}
