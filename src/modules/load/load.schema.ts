/**
 * =============================================================================
 * LOAD MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { loadStatusSchema, moneySchema, paginationSchema } from '../../shared/utils/validation.utils';

const place = z.string().trim().min(1, 'Required').max(100);
const state = z.string().trim().max(50);
const dateText = z.string().trim().max(30);

/**
 * Post Load Schema
 */
export const createLoadSchema = z.object({
  title: z.string().trim().min(1).max(150).optional(),
  origin: place,
  originState: state.optional(),
  pickupDate: dateText.optional(),
  destination: place,
  destinationState: state.optional(),
  deliveryDate: dateText.optional(),
  cargoDescription: z.string().trim().max(500).optional(),
  weight: z.number({ invalid_type_error: 'Weight must be a number' }).finite().positive().max(200_000).optional(),
  equipment: z.string().trim().max(50).optional(),
  rate: moneySchema,
  notes: z.string().trim().max(1000).optional()
}).strict();

/**
 * Update Load Terms Schema (any subset of the posting fields)
 */
export const updateLoadTermsSchema = createLoadSchema.partial().strict().refine(
  fields => Object.keys(fields).length > 0,
  { message: 'At least one field must be provided' }
);

/**
 * Search Loads Query Schema
 */
export const searchLoadsQuerySchema = paginationSchema.extend({
  origin: z.string().trim().max(100).optional(),
  destination: z.string().trim().max(100).optional(),
  equipment: z.string().trim().max(50).optional(),
  minRate: z.coerce.number().finite().min(0).optional(),
  maxWeight: z.coerce.number().finite().min(0).optional(),
  status: loadStatusSchema.optional()
});
