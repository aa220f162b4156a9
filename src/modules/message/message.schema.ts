/**
 * =============================================================================
 * MESSAGE MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { paginationSchema, uuidSchema } from '../../shared/utils/validation.utils';

/**
 * Send Message Schema
 */
export const sendMessageSchema = z.object({
  recipientId: uuidSchema,
  body: z.string().trim().min(1, 'Message cannot be empty').max(2000)
}).strict();

/**
 * Thread Query Schema
 */
export const threadQuerySchema = paginationSchema.extend({
  limit: z.coerce.number().int().min(1).max(200).default(50)
});
