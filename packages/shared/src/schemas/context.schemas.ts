/**
 * Context & Tool Argument Schemas
 *
 * Zod schemas for the context flags the handoff handlers read and write,
 * and for the arguments of every tool an agent may call.
 *
 * @module @campus-desk/shared/schemas/context
 */

import { z } from 'zod';

/**
 * `response_haiku` as stored in context: the strings "true" / "false".
 */
export const responseHaikuFlagSchema = z.enum(['true', 'false']);

export type ResponseHaikuFlag = z.infer<typeof responseHaikuFlagSchema>;

/**
 * Read the haiku flag from a raw context value.
 * Anything that is not exactly "true" reads as "false".
 */
export function readResponseHaikuFlag(value: unknown): ResponseHaikuFlag {
  const parsed = responseHaikuFlagSchema.safeParse(value);
  return parsed.success ? parsed.data : 'false';
}

/** Arguments of route tools that take none. */
export const routeArgsSchema = z.object({}).passthrough();

/** Arguments of `route_to_university_poet`. */
export const routeToPoetArgsSchema = z
  .object({
    response_haiku: z.boolean().optional(),
  })
  .passthrough();

export type RouteToPoetArgs = z.infer<typeof routeToPoetArgsSchema>;

/** Arguments of finalize tools. */
export const finaliseArgsSchema = z.object({}).passthrough();

/** Arguments of `read_query`. */
export const readQueryArgsSchema = z.object({
  query: z.string().trim().min(1, 'query cannot be empty').max(10000, 'query too long (max 10000 chars)'),
});

export type ReadQueryArgs = z.infer<typeof readQueryArgsSchema>;
