/**
 * =============================================================================
 * BID MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { bidStatusSchema, moneySchema } from '../../shared/utils/validation.utils';

/**
 * Place Bid Schema
 */
export const placeBidSchema = z.object({
  amount: moneySchema,
  message: z.string().trim().max(500).optional()
}).strict();

/**
 * List Bids Query Schema
 */
export const listBidsQuerySchema = z.object({
  status: bidStatusSchema.optional()
});

// Type exports
export type PlaceBidInput = z.infer<typeof placeBidSchema>;
