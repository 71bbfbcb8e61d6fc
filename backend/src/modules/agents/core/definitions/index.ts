/**
 * Agent Definitions Index
 *
 * @module modules/agents/core/definitions
 */

import type { AgentDefinitionTemplate } from '../registry/AgentDefinition';
import { triageDefinition } from './triage.definition';
import { courseAdvisorDefinition } from './course-advisor.definition';
import { universityPoetDefinition } from './university-poet.definition';
import { schedulingAssistantDefinition } from './scheduling-assistant.definition';

export {
  triageDefinition,
  courseAdvisorDefinition,
  universityPoetDefinition,
  schedulingAssistantDefinition,
};

/** The four canonical roles, dispatcher first. */
export const AGENT_DEFINITION_TEMPLATES: readonly AgentDefinitionTemplate[] = [
  triageDefinition,
  courseAdvisorDefinition,
  universityPoetDefinition,
  schedulingAssistantDefinition,
];
