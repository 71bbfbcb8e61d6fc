/**
 * University Poet Definition
 *
 * @module modules/agents/core/definitions/university-poet
 */

import {
  AGENT_ID,
  AGENT_DISPLAY_NAME,
  AGENT_ICON,
  AGENT_DESCRIPTION,
  HANDOFF_TOOL,
} from '@campus-desk/shared';
import type { AgentDefinitionTemplate } from '../registry/AgentDefinition';

export const universityPoetDefinition: AgentDefinitionTemplate = {
  id: AGENT_ID.UNIVERSITY_POET,
  name: AGENT_DISPLAY_NAME[AGENT_ID.UNIVERSITY_POET],
  icon: AGENT_ICON[AGENT_ID.UNIVERSITY_POET],
  description: AGENT_DESCRIPTION[AGENT_ID.UNIVERSITY_POET],
  role: 'specialist',
  externalToolScopes: [],
  parallelToolCalls: true,
  defaultInstructions: `You are the University Poet of the University Support System.
Answer questions about campus culture, events and social activities with short, imaginative haikus
that capture the spirit of the university community.
When the user has been answered, call ${HANDOFF_TOOL.UNIVERSITY_POET_FINALISE}.`,
};
