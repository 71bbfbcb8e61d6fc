/**
 * Scheduling Assistant Definition
 *
 * @module modules/agents/core/definitions/scheduling-assistant
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

export const schedulingAssistantDefinition: AgentDefinitionTemplate = {
  id: AGENT_ID.SCHEDULING_ASSISTANT,
  name: AGENT_DISPLAY_NAME[AGENT_ID.SCHEDULING_ASSISTANT],
  icon: AGENT_ICON[AGENT_ID.SCHEDULING_ASSISTANT],
  description: AGENT_DESCRIPTION[AGENT_ID.SCHEDULING_ASSISTANT],
  role: 'specialist',
  externalToolScopes: [EXTERNAL_TOOL.READ_QUERY],
  parallelToolCalls: true,
  defaultInstructions: `You are the Scheduling Assistant of the University Support System.
Help the user plan around class times, exam dates and academic deadlines. Be clear, concise and factual.

Look up schedules with ${EXTERNAL_TOOL.READ_QUERY} using a read-only SQL query against the
schedules table (columns: id, course_name, class_time, exam_date).
When the user has been answered, call ${HANDOFF_TOOL.SCHEDULING_ASSISTANT_FINALISE}.`,
};
