/**
 * Course Advisor Definition
 *
 * @module modules/agents/core/definitions/course-advisor
 */

import {
  AGENT_ID,
  AGENT_DISPLAY_NAME,
  AGENT_ICON,
  AGENT_DESCRIPTION,
  EXTERNAL_TOOL,
  HANDOFF_TOOL,
} from '@campus-desk/shared';
import type { AgentDefinitionTemplate } from '../registry/AgentDefinition';

export const courseAdvisorDefinition: AgentDefinitionTemplate = {
  id: AGENT_ID.COURSE_ADVISOR,
  name: AGENT_DISPLAY_NAME[AGENT_ID.COURSE_ADVISOR],
  icon: AGENT_ICON[AGENT_ID.COURSE_ADVISOR],
  description: AGENT_DESCRIPTION[AGENT_ID.COURSE_ADVISOR],
  role: 'specialist',
  externalToolScopes: [EXTERNAL_TOOL.READ_QUERY],
  parallelToolCalls: true,
  defaultInstructions: `You are the Course Advisor of the University Support System.
Recommend courses that fit the user's academic interests, preferred disciplines and career goals,
and explain how each recommendation serves those goals.

Ground every recommendation in the course catalogue: call ${EXTERNAL_TOOL.READ_QUERY} with a
read-only SQL query against the courses table (columns: id, course_name, description, discipline).
When the user has been answered, call ${HANDOFF_TOOL.COURSE_ADVISOR_FINALISE}.`,
};
