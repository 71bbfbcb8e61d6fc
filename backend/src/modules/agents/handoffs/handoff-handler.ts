/**
 * Handoff Handler
 *
 * A handoff handler is one entry in an agent's tool table: a name, a
 * description for the model, an argument schema and a pure function from
 * (arguments, context) to a Transition.
 *
 * @module modules/agents/handoffs/handoff-handler
 */

import type { z } from 'zod';
import type { AgentId, ContextMap, HandoffToolName } from '@campus-desk/shared';
import { InvalidToolArgumentsError } from '@/types/error.types';
import type { ContinueWithTransition, TerminateTransition } from './transition';

export type HandoffTransition = ContinueWithTransition | TerminateTransition;

/**
 * Tool spec advertised to the model (schema is the zod argument schema).
 */
export interface ToolSpec {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
}

export interface HandoffHandler extends ToolSpec {
  name: HandoffToolName;
  /** Declared routing edge, for route handlers only */
  routesTo?: AgentId;
  /**
   * Validate raw arguments and resolve the transition.
   * @throws InvalidToolArgumentsError if the arguments fail the schema
   */
  resolve(rawArgs: Record<string, unknown>, context: Readonly<ContextMap>): HandoffTransition;
}

export interface HandoffHandlerSpec<TSchema extends z.ZodTypeAny> {
  name: HandoffToolName;
  description: string;
  schema: TSchema;
  routesTo?: AgentId;
  handle(args: z.infer<TSchema>, context: Readonly<ContextMap>): HandoffTransition;
}

/**
 * Build a handler whose `resolve` parses arguments before calling `handle`.
 */
export function defineHandoffHandler<TSchema extends z.ZodTypeAny>(
  spec: HandoffHandlerSpec<TSchema>
): HandoffHandler {
  return {
    name: spec.name,
    description: spec.description,
    schema: spec.schema,
    routesTo: spec.routesTo,
    resolve(rawArgs, context) {
      const parsed = spec.schema.safeParse(rawArgs);
      if (!parsed.success) {
        throw new InvalidToolArgumentsError(spec.name, parsed.error.issues.map(i => i.message).join('; '));
      }
      return spec.handle(parsed.data, context);
    },
  };
}
