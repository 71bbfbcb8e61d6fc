/**
 * Validation Schemas
 *
 * Zod schemas for context flags, tool arguments and session input.
 *
 * @module @campus-desk/shared/schemas
 */

export {
  responseHaikuFlagSchema,
  readResponseHaikuFlag,
  routeArgsSchema,
  routeToPoetArgsSchema,
  finaliseArgsSchema,
  readQueryArgsSchema,
} from './context.schemas';

export type {
  ResponseHaikuFlag,
  RouteToPoetArgs,
  ReadQueryArgs,
} from './context.schemas';

export { userQuerySchema } from './session.schemas';
export type { UserQueryInput } from './session.schemas';
