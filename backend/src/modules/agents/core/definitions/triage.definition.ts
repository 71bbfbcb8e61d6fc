/**
 * Triage Agent Definition
 *
 * The dispatcher every session starts with. Routes only; never answers.
 *
 * @module modules/agents/core/definitions/triage
 */

import {
  AGENT_ID,
  AGENT_DISPLAY_NAME,
  AGENT_ICON,
  AGENT_DESCRIPTION,
  HANDOFF_TOOL,
} from '@campus-desk/shared';
import type { AgentDefinitionTemplate } from '../registry/AgentDefinition';

export const triageDefinition: AgentDefinitionTemplate = {
  id: AGENT_ID.TRIAGE,
  name: AGENT_DISPLAY_NAME[AGENT_ID.TRIAGE],
  icon: AGENT_ICON[AGENT_ID.TRIAGE],
  description: AGENT_DESCRIPTION[AGENT_ID.TRIAGE],
  role: 'dispatcher',
  externalToolScopes: [],
  parallelToolCalls: true,
  defaultInstructions: `You are the Triage Agent of the University Support System.
Read each user query and decide which specialist should handle it:
- course recommendations or available courses → ${HANDOFF_TOOL.ROUTE_TO_COURSE_ADVISOR}
- campus culture, events and social life → ${HANDOFF_TOOL.ROUTE_TO_UNIVERSITY_POET}
- class times, exam dates and deadlines → ${HANDOFF_TOOL.ROUTE_TO_SCHEDULING_ASSISTANT}

Give one short sentence of reasoning, then call exactly one routing tool.
If the user asks for a haiku, call ${HANDOFF_TOOL.ROUTE_TO_UNIVERSITY_POET} with response_haiku set to true.`,
};
