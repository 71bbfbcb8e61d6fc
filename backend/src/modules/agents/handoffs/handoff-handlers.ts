/**
 * Handoff Handler Tables
 *
 * Per-agent tool tables. The triage agent only routes; each specialist only
 * finalizes. Handlers are pure: same arguments and context in, same
 * transition out.
 *
 * @module modules/agents/handoffs/handoff-handlers
 */

import {
  AGENT_ID,
  AGENT_DISPLAY_NAME,
  CANONICAL_CLOSING_MESSAGE,
  CONTEXT_KEY,
  HANDOFF_TOOL,
  POET_HAIKU_CLOSING,
  finaliseArgsSchema,
  readResponseHaikuFlag,
  routeArgsSchema,
  routeToPoetArgsSchema,
  type AgentId,
  type ContextMap,
} from '@campus-desk/shared';
import { continueWith, terminate } from './transition';
import { defineHandoffHandler, type HandoffHandler } from './handoff-handler';

function routeDescription(target: AgentId): string {
  return `Transfer the conversation to the ${AGENT_DISPLAY_NAME[target]}.`;
}

// ============================================
// Triage (dispatcher)
// ============================================

export const routeToCourseAdvisor = defineHandoffHandler({
  name: HANDOFF_TOOL.ROUTE_TO_COURSE_ADVISOR,
  description: `${routeDescription(AGENT_ID.COURSE_ADVISOR)} Use for course recommendations and questions about available courses.`,
  schema: routeArgsSchema,
  routesTo: AGENT_ID.COURSE_ADVISOR,
  handle: () => continueWith(AGENT_ID.COURSE_ADVISOR),
});

/**
 * Routes to the poet and, when the model passes `response_haiku`, records the
 * flag in context. An omitted argument leaves any existing value untouched.
 */
export const routeToUniversityPoet = defineHandoffHandler({
  name: HANDOFF_TOOL.ROUTE_TO_UNIVERSITY_POET,
  description: `${routeDescription(AGENT_ID.UNIVERSITY_POET)} Use for campus culture, events and social life. Set response_haiku to true when the user asks for a haiku.`,
  schema: routeToPoetArgsSchema,
  routesTo: AGENT_ID.UNIVERSITY_POET,
  handle: (args) => {
    const updates: ContextMap =
      args.response_haiku === undefined
        ? {}
        : { [CONTEXT_KEY.RESPONSE_HAIKU]: args.response_haiku ? 'true' : 'false' };
    return continueWith(AGENT_ID.UNIVERSITY_POET, updates);
  },
});

export const routeToSchedulingAssistant = defineHandoffHandler({
  name: HANDOFF_TOOL.ROUTE_TO_SCHEDULING_ASSISTANT,
  description: `${routeDescription(AGENT_ID.SCHEDULING_ASSISTANT)} Use for class times, exam dates and academic deadlines.`,
  schema: routeArgsSchema,
  routesTo: AGENT_ID.SCHEDULING_ASSISTANT,
  handle: () => continueWith(AGENT_ID.SCHEDULING_ASSISTANT),
});

// ============================================
// Specialists (finalize)
// ============================================

const FINALISE_DESCRIPTION = 'Finish the conversation once the user has been answered.';

export const courseAdvisorFinalise = defineHandoffHandler({
  name: HANDOFF_TOOL.COURSE_ADVISOR_FINALISE,
  description: FINALISE_DESCRIPTION,
  schema: finaliseArgsSchema,
  handle: (_args, context) => terminate(CANONICAL_CLOSING_MESSAGE, { ...context }),
});

export const universityPoetFinalise = defineHandoffHandler({
  name: HANDOFF_TOOL.UNIVERSITY_POET_FINALISE,
  description: FINALISE_DESCRIPTION,
  schema: finaliseArgsSchema,
  handle: (_args, context) => {
    const wantsHaiku = readResponseHaikuFlag(context[CONTEXT_KEY.RESPONSE_HAIKU]) === 'true';
    return terminate(wantsHaiku ? POET_HAIKU_CLOSING : CANONICAL_CLOSING_MESSAGE, { ...context });
  },
});

export const schedulingAssistantFinalise = defineHandoffHandler({
  name: HANDOFF_TOOL.SCHEDULING_ASSISTANT_FINALISE,
  description: FINALISE_DESCRIPTION,
  schema: finaliseArgsSchema,
  handle: (_args, context) => terminate(CANONICAL_CLOSING_MESSAGE, { ...context }),
});

/**
 * Handler table per agent, in declaration order.
 */
export const HANDOFF_HANDLERS: Record<AgentId, readonly HandoffHandler[]> = {
  [AGENT_ID.TRIAGE]: [routeToCourseAdvisor, routeToUniversityPoet, routeToSchedulingAssistant],
  [AGENT_ID.COURSE_ADVISOR]: [courseAdvisorFinalise],
  [AGENT_ID.UNIVERSITY_POET]: [universityPoetFinalise],
  [AGENT_ID.SCHEDULING_ASSISTANT]: [schedulingAssistantFinalise],
};
