/**
 * =============================================================================
 * API TYPES - SHARED CONTRACTS
 * =============================================================================
 *
 * These types define the API contract between backend and clients.
 * =============================================================================
 */

/**
 * Standard API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ApiMeta;
}

/**
 * API error structure
 */
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * API metadata (pagination, etc.)
 */
export interface ApiMeta {
  page?: number;
  limit?: number;
  total?: number;
  hasMore?: boolean;
}

/**
 * User roles
 */
export type UserRole = 'shipper' | 'trucker' | 'admin';

/**
 * Identity attached to every authenticated request
 */
export interface Actor {
  userId: string;
  role: UserRole;
}

/**
 * Load status
 */
export type LoadStatus =
  | 'open'        // Accepting bids
  | 'assigned'    // One bid accepted, trucker bound
  | 'in_transit'  // Picked up
  | 'completed'   // Delivered
  | 'cancelled';  // Closed by shipper/admin

/**
 * Bid status
 */
export type BidStatus =
  | 'pending'     // Awaiting shipper decision
  | 'accepted'    // Won the load
  | 'rejected'    // Turned down or lost to another bid
  | 'withdrawn';  // Pulled by the trucker or superseded by a re-bid

/**
 * Helper to create success response
 */
export function successResponse<T>(data: T, meta?: ApiMeta): ApiResponse<T> {
  return {
    success: true,
    data,
    ...(meta && { meta })
  };
}

/**
 * Helper to create error response
 */
export function errorResponse(code: string, message: string, details?: Record<string, unknown>): ApiResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details })
    }
  };
}
