/**
 * Session Input Schemas
 *
 * @module @campus-desk/shared/schemas/session
 */

import { z } from 'zod';

/**
 * Validates a user query before a session is started.
 */
export const userQuerySchema = z.object({
  query: z.string().trim().min(1, 'Query cannot be empty').max(10000, 'Query too long (max 10000 chars)'),
  context: z.record(z.unknown()).default({}),
  maxTurns: z.number().int().min(1).max(50).optional(),
});

export type UserQueryInput = z.infer<typeof userQuerySchema>;
