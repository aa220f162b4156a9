/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 *
 * SECURITY:
 * - Strict schema validation
 * - Reject unknown fields
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../types/error.types';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * UUID schema
 */
export const uuidSchema = z.string().uuid();

/**
 * Money amount (USD) in a JSON body. Must be strictly positive.
 */
export const moneySchema = z.number({ invalid_type_error: 'Amount must be a number' })
  .finite()
  .positive('Amount must be greater than 0')
  .max(10_000_000);

/**
 * Pagination schema
 */
export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20)
});

/**
 * Load status schema
 */
export const loadStatusSchema = z.enum([
  'open',
  'assigned',
  'in_transit',
  'completed',
  'cancelled'
]);

/**
 * Bid status schema
 */
export const bidStatusSchema = z.enum([
  'pending',
  'accepted',
  'rejected',
  'withdrawn'
]);

/**
 * User role schema
 */
export const userRoleSchema = z.enum([
  'shipper',
  'trucker',
  'admin'
]);

// ============================================================
// VALIDATION HELPERS
// ============================================================

function toValidationError(error: z.ZodError, message: string): ValidationError {
  const fields = error.errors.map(e => ({
    field: e.path.join('.'),
    message: e.message
  }));
  return new ValidationError(message, { fields });
}

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on validation failure
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  message: string = 'Invalid request data'
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw toValidationError(result.error, message);
  }
  return result.data;
}
