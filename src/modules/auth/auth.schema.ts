/**
 * =============================================================================
 * AUTH MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * Zod schemas for validating auth requests.
 * These define the API contract for auth endpoints.
 * =============================================================================
 */

import { z } from 'zod';
import { userRoleSchema, uuidSchema } from '../../shared/utils/validation.utils';

const emailSchema = z.string().trim().toLowerCase().email('Invalid email');

/**
 * Register request schema
 * Admin accounts are seeded from configuration, never self-registered.
 */
export const registerSchema = z.object({
  name: z.string().trim().min(1).max(100),
  email: emailSchema,
  password: z.string().min(6, 'Password must be at least 6 characters').max(128),
  role: z.enum(['shipper', 'trucker']).default('shipper'),
  company: z.string().trim().max(150).optional(),
  phone: z.string().trim().max(30).optional(),
  mcNumber: z.string().trim().max(30).optional()
}).strict(); // Reject unknown fields

/**
 * Login request schema
 */
export const loginSchema = z.object({
  email: emailSchema,
  password: z.string().min(1, 'Password is required')
}).strict();

/**
 * Claims carried by an access token
 */
export const tokenPayloadSchema = z.object({
  userId: uuidSchema,
  role: userRoleSchema
});
